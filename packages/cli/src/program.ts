/**
 * @deadwood/cli
 *
 * Commands:
 *   deadwood analyze [path]  report unreachable code with confidence scores
 *   deadwood init [path]     write the default deadwood.json
 *   deadwood watch [path]    analyze again on every change
 */

import { Command } from "commander";
import { registerAnalyzeCommand } from "./commands/analyze.js";
import { registerInitCommand } from "./commands/init.js";
import { registerWatchCommand } from "./commands/watch.js";

export { runAnalyze } from "./commands/analyze.js";
export { runInit } from "./commands/init.js";
export { Rerunner, runWatch, type WatchOptions } from "./commands/watch.js";
export { consoleIo, type CommandIo } from "./io.js";
export {
  EXIT_CLEAN,
  EXIT_DEAD_CODE,
  EXIT_ERROR,
  exitCodeFor,
  logLevelFor,
  parseConfidence,
  toOverrides,
  type AnalyzeOptions,
} from "./options.js";
export {
  type Colors,
  plainColors,
  terminalColors,
  render,
  renderCompact,
  renderJson,
  renderTable,
} from "./output/index.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("deadwood")
    .description("Confidence-scored dead code detection for TypeScript and JavaScript")
    .version("0.1.0");

  registerAnalyzeCommand(program);
  registerInitCommand(program);
  registerWatchCommand(program);
  return program;
}
