import * as path from "node:path";
import { Command, Option } from "commander";
import { createLogger, describeFault, levelFromEnv } from "@deadwood/core";
import { AnalysisRun, loadConfig } from "@deadwood/graph";
import { consoleIo, type CommandIo } from "../io.js";
import {
  EXIT_ERROR,
  exitCodeFor,
  logLevelFor,
  parseConfidence,
  toOverrides,
  type AnalyzeOptions,
} from "../options.js";
import { render } from "../output/index.js";

/**
 * Load configuration, run the analysis once and print the report.
 * Resolves to the process exit code.
 */
export async function runAnalyze(
  target: string,
  options: AnalyzeOptions,
  io: CommandIo = consoleIo
): Promise<number> {
  const root = path.resolve(target);
  const logger = createLogger("deadwood", logLevelFor(options, levelFromEnv()));

  const loaded = await loadConfig(root, { configPath: options.config, overrides: toOverrides(options) });
  if (!loaded.ok) {
    io.err(describeFault(loaded.error));
    return EXIT_ERROR;
  }
  if (loaded.value.source) logger.debug(`config from ${loaded.value.source}`);

  const { config } = loaded.value;
  const result = await new AnalysisRun({ root, config, logger: logger.child("run") }).execute();
  if (!result.ok) {
    io.err(describeFault(result.error));
    return EXIT_ERROR;
  }

  const report = result.value;
  const text = render(report, config.output, io.colors);
  if (text.length > 0) io.out(text);
  return exitCodeFor(report.verdict, options.check ?? false);
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command("analyze")
    .description("Report code that no entry point can reach")
    .argument("[path]", "project root", ".")
    .option("-c, --config <file>", "configuration file (default: deadwood.json)")
    .addOption(
      new Option("-f, --format <format>", "output format").choices(["table", "json", "compact"])
    )
    .option("--confidence <level>", "minimum confidence: high, medium, low or 0-100", parseConfidence)
    .option("--no-chains", "hide reachability chains")
    .option("--check", "exit with code 1 when dead code is found")
    .option("--include-tests", "analyze test files as entry points instead of skipping them")
    .option("-e, --entry <files...>", "entry files, replacing configured ones")
    .option("--verbose", "log every phase")
    .option("--quiet", "log errors only")
    .action(async (target: string, options: AnalyzeOptions) => {
      process.exitCode = await runAnalyze(target, options);
    });
}
