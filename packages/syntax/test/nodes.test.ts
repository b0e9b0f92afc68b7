import { describe, it, expect, beforeAll } from "vitest";
import { TreeSitterParser } from "../src/infrastructure/parsers/TreeSitterParser.js";
import { staticStringValue, nodeToSpan, walk } from "../src/infrastructure/parsers/nodes.js";
import type { SyntaxNode } from "../src/core/model.js";

describe("node helpers", () => {
  let parser: TreeSitterParser;

  beforeAll(() => {
    parser = new TreeSitterParser();
  });

  async function firstOfType(source: string, type: string): Promise<SyntaxNode> {
    const result = await parser.parse(source, "sample.ts");
    if (!result.ok) throw result.error;
    let found: SyntaxNode | undefined;
    walk(result.value.tree.rootNode, (node) => {
      if (!found && node.type === type) {
        found = node;
        return false;
      }
      return true;
    });
    if (!found) throw new Error(`no ${type} in ${source}`);
    return found;
  }

  describe("staticStringValue", () => {
    it("reads quoted strings", async () => {
      expect(staticStringValue(await firstOfType(`load("./plugins/a");`, "string"))).toBe(
        "./plugins/a"
      );
    });

    it("reads templates without substitutions", async () => {
      expect(staticStringValue(await firstOfType("load(`./b`);", "template_string"))).toBe("./b");
    });

    it("refuses templates with substitutions", async () => {
      const node = await firstOfType("load(`./${name}`);", "template_string");
      expect(staticStringValue(node)).toBeUndefined();
    });

    it("refuses non-literals", async () => {
      expect(staticStringValue(await firstOfType("load(name);", "identifier"))).toBeUndefined();
    });
  });

  describe("nodeToSpan", () => {
    it("uses 1-based lines and columns", async () => {
      const node = await firstOfType("\n  const x = 1;", "lexical_declaration");
      expect(nodeToSpan(node)).toEqual({
        start: { line: 2, column: 3, offset: 3 },
        end: { line: 2, column: 15, offset: 15 },
      });
    });
  });
});
