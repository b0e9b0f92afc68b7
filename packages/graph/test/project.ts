import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { tmpdir } from "os";
import { TreeSitterParser, type ProjectScanner } from "@deadwood/syntax";
import { AnalysisRun } from "../src/AnalysisRun.js";
import { ConfigSchema, type ConfigInput } from "../src/config/schema.js";
import { SymbolTable } from "../src/extraction/SymbolTable.js";
import { extractUnit, type ExtractedUnit } from "../src/extraction/SymbolTableBuilder.js";

export type Files = Record<string, string | string[]>;

/** Write a throwaway project; array contents are joined as lines. */
export function writeProject(files: Files): string {
  const root = mkdtempSync(join(tmpdir(), "deadwood-graph-"));
  for (const [file, content] of Object.entries(files)) {
    const target = join(root, file);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, Array.isArray(content) ? `${content.join("\n")}\n` : content);
  }
  return root;
}

export function removeProject(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

export function analyze(root: string, config: ConfigInput = {}, scanner?: ProjectScanner) {
  return new AnalysisRun({ root, config: ConfigSchema.parse(config), scanner }).execute();
}

/** Parse and extract files in memory, without touching the disk. */
export async function buildTable(files: Files): Promise<SymbolTable> {
  const parser = new TreeSitterParser();
  const units: ExtractedUnit[] = [];
  for (const [file, content] of Object.entries(files)) {
    const source = Array.isArray(content) ? `${content.join("\n")}\n` : content;
    const parsed = await parser.parse(source, file);
    if (!parsed.ok) throw parsed.error;
    units.push(extractUnit(parsed.value, file));
  }
  return new SymbolTable(units);
}

export const UTILS_PROJECT: Files = {
  "src/main.ts": ['import { usedFunction } from "./utils";', "", "console.log(usedFunction(2));"],
  "src/utils.ts": [
    "export function usedFunction(n: number): number {",
    "  return helperFunction(n) + 1;",
    "}",
    "",
    "export function unusedFunction(): string {",
    '  return "never called";',
    "}",
    "",
    "function helperFunction(n: number): number {",
    "  return n * 2;",
    "}",
  ],
};

export const CLASSES_PROJECT: Files = {
  "src/main.ts": [
    'import { UsedClass } from "./classes";',
    "",
    "const instance = new UsedClass(3);",
    "console.log(instance.usedMethod());",
  ],
  "src/classes.ts": [
    "export class UsedClass {",
    "  constructor(private readonly size: number) {}",
    "",
    "  usedMethod(): number {",
    "    return this.size * 2;",
    "  }",
    "",
    "  unusedMethod(): number {",
    "    return this.size + 1;",
    "  }",
    "}",
    "",
    "export class UnusedClass {",
    '  label = "idle";',
    "",
    "  describe(): string {",
    "    return this.label;",
    "  }",
    "}",
    "",
    "const value = 42;",
    "",
    "function compute(): number {",
    "  return value * 2;",
    "}",
  ],
};
