import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { tmpdir } from "os";
import { plainColors } from "../src/output/colors.js";
import type { CommandIo } from "../src/io.js";

export function writeProject(files: Record<string, string[]>): string {
  const root = mkdtempSync(join(tmpdir(), "deadwood-cli-"));
  for (const [file, lines] of Object.entries(files)) {
    const target = join(root, file);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, `${lines.join("\n")}\n`);
  }
  return root;
}

export function removeProject(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

export interface CapturedIo extends CommandIo {
  stdout: string[];
  stderr: string[];
}

export function captureIo(): CapturedIo {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => stdout.push(text),
    err: (text) => stderr.push(text),
    colors: plainColors,
  };
}

/** One exported entry point, one unused export and a helper only it calls */
export const LIBRARY_PROJECT: Record<string, string[]> = {
  "src/index.ts": ["export function main(): void {}"],
  "src/lib.ts": [
    "export function entry(): number {",
    "  return helper();",
    "}",
    "",
    "function helper(): number {",
    "  return 1;",
    "}",
  ],
};
