/**
 * deadwood watch: analyze, then analyze again whenever a source file
 * changes.
 */

import * as path from "node:path";
import { Command } from "commander";
import { createLogger, describeFault, levelFromEnv } from "@deadwood/core";
import { loadConfig, scanOptions, type MinimumConfidence } from "@deadwood/graph";
import { NodeFileWatcher, NodeProjectScanner } from "@deadwood/syntax";
import { consoleIo, type CommandIo } from "../io.js";
import { EXIT_CLEAN, EXIT_ERROR, logLevelFor, parseConfidence } from "../options.js";
import { runAnalyze } from "./analyze.js";

export interface WatchOptions {
  config?: string;
  confidence?: MinimumConfidence;
  debounce: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Runs one job at a time. Requests that arrive during a run collapse into a
 * single follow-up run.
 */
export class Rerunner {
  private running: Promise<void> | undefined;
  private queued = false;

  constructor(private readonly job: () => Promise<void>) {}

  request(): Promise<void> {
    if (this.running) {
      this.queued = true;
      return this.running;
    }
    this.running = this.drain().finally(() => {
      this.running = undefined;
    });
    return this.running;
  }

  private async drain(): Promise<void> {
    do {
      this.queued = false;
      await this.job();
    } while (this.queued);
  }
}

export async function runWatch(
  target: string,
  options: WatchOptions,
  io: CommandIo = consoleIo
): Promise<number> {
  const root = path.resolve(target);
  const logger = createLogger("deadwood", logLevelFor(options, levelFromEnv()));

  const loaded = await loadConfig(root, { configPath: options.config });
  if (!loaded.ok) {
    io.err(describeFault(loaded.error));
    return EXIT_ERROR;
  }

  const rerunner = new Rerunner(async () => {
    await runAnalyze(
      root,
      {
        config: options.config,
        confidence: options.confidence,
        format: "compact",
        chains: false,
        verbose: options.verbose,
        quiet: options.quiet,
      },
      io
    );
  });
  await rerunner.request();

  const debounceMs = Number.parseInt(options.debounce, 10);
  const watcher = new NodeFileWatcher(
    new NodeProjectScanner(),
    scanOptions(loaded.value.config),
    logger.child("watch"),
    Number.isNaN(debounceMs) ? undefined : debounceMs
  );
  const started = watcher.watch(root, (changes) => {
    logger.info(`${changes.size} file(s) changed, analyzing again`);
    rerunner.request().catch((error: unknown) => logger.error("analysis failed", error));
  });
  if (!started.ok) {
    io.err(`Cannot watch ${root}: ${started.error.message}`);
    return EXIT_ERROR;
  }

  logger.info(`watching ${root} (Ctrl+C to stop)`);
  process.once("SIGINT", () => watcher.stop());
  return EXIT_CLEAN;
}

export function registerWatchCommand(program: Command): void {
  program
    .command("watch")
    .description("Analyze again on every source change, printing compact output")
    .argument("[path]", "project root", ".")
    .option("-c, --config <file>", "configuration file (default: deadwood.json)")
    .option("--confidence <level>", "minimum confidence: high, medium, low or 0-100", parseConfidence)
    .option("--debounce <ms>", "quiet period before analyzing again", "200")
    .option("--verbose", "log every phase")
    .option("--quiet", "log errors only")
    .action(async (target: string, options: WatchOptions) => {
      process.exitCode = await runWatch(target, options);
    });
}
