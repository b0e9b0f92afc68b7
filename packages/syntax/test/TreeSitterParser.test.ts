import { describe, it, expect, beforeAll } from "vitest";
import { TreeSitterParser } from "../src/infrastructure/parsers/TreeSitterParser.js";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURES = join(__dirname, "fixtures");

describe("TreeSitterParser", () => {
  let parser: TreeSitterParser;

  beforeAll(() => {
    parser = new TreeSitterParser();
  });

  describe("TypeScript parsing", () => {
    const file = join(FIXTURES, "inventory.ts");
    const source = readFileSync(file, "utf-8");

    it("parses without errors", async () => {
      const result = await parser.parse(source, file);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.errors).toHaveLength(0);
      expect(result.value.language.id).toBe("typescript");
    });

    it("exposes the top-level statements", async () => {
      const result = await parser.parse(source, file);
      if (!result.ok) throw result.error;

      const types = result.value.tree.rootNode.namedChildren.map((n) => n.type);
      expect(types).toEqual(["import_statement", "export_statement", "export_statement"]);
    });
  });

  describe("TSX parsing", () => {
    it("uses the tsx grammar for .tsx files", async () => {
      const file = join(FIXTURES, "button.tsx");
      const result = await parser.parse(readFileSync(file, "utf-8"), file);
      if (!result.ok) throw result.error;

      expect(result.value.language.id).toBe("tsx");
      expect(result.value.errors).toHaveLength(0);
    });
  });

  describe("JavaScript parsing", () => {
    it("parses plain JavaScript", async () => {
      const result = await parser.parse("export const answer = () => 42;\n", "answer.mjs");
      if (!result.ok) throw result.error;

      expect(result.value.language.id).toBe("javascript");
      expect(result.value.tree.rootNode.namedChildren[0].type).toBe("export_statement");
    });
  });

  describe("error handling", () => {
    it("reports syntax faults but keeps a usable tree", async () => {
      const file = join(FIXTURES, "broken.ts");
      const result = await parser.parse(readFileSync(file, "utf-8"), file);
      if (!result.ok) throw result.error;

      expect(result.value.errors.length).toBeGreaterThan(0);
      const first = result.value.tree.rootNode.namedChildren[0];
      expect(first.type).toBe("export_statement");
      expect(first.text.startsWith("export function ok()")).toBe(true);
    });

    it("rejects unsupported files", async () => {
      const result = await parser.parse("print('hi')", "script.py");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("Unsupported file type: script.py");
      }
    });

    it("treats declaration files as unsupported", () => {
      expect(parser.detectLanguage("types/index.d.ts")).toBeUndefined();
      expect(parser.detectLanguage("src/index.cts")?.id).toBe("typescript");
    });
  });
});
