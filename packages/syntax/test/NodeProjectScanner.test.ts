import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { NodeProjectScanner } from "../src/infrastructure/scanner/NodeProjectScanner.js";
import type { ScanOptions } from "../src/core/ports/ProjectScanner.js";

const OPTIONS: ScanOptions = {
  include: ["**/*.{ts,tsx,js}"],
  exclude: ["**/dist/**", "**/*.test.*", "**/*.d.ts"],
};

describe("NodeProjectScanner", () => {
  let root: string;
  const scanner = new NodeProjectScanner();

  beforeAll(() => {
    root = mkdtempSync(join(tmpdir(), "deadwood-scan-"));
    const files = [
      "src/index.ts",
      "src/util.js",
      "src/view.tsx",
      "src/util.test.ts",
      "src/types.d.ts",
      "dist/index.js",
      "node_modules/pkg/index.js",
      "README.md",
    ];
    for (const file of files) {
      mkdirSync(join(root, file, ".."), { recursive: true });
      writeFileSync(join(root, file), "");
    }
  });

  afterAll(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("lists included files sorted and root-relative", async () => {
    const result = await scanner.scan(root, OPTIONS);
    if (!result.ok) throw result.error;
    expect(result.value).toEqual(["src/index.ts", "src/util.js", "src/view.tsx"]);
  });

  it("answers exclusion for single paths", () => {
    expect(scanner.isExcluded("src/index.ts", OPTIONS)).toBe(false);
    expect(scanner.isExcluded("src/util.test.ts", OPTIONS)).toBe(true);
    expect(scanner.isExcluded("node_modules/pkg/index.js", OPTIONS)).toBe(true);
    expect(scanner.isExcluded("README.md", OPTIONS)).toBe(true);
  });
});
