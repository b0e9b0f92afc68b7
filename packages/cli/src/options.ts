/**
 * Translation of command-line flags into configuration overrides, log
 * levels and exit codes.
 */

import { InvalidArgumentError } from "commander";
import type { LogLevel } from "@deadwood/core";
import type { ConfigOverrides, MinimumConfidence, OutputFormat, Verdict } from "@deadwood/graph";

export interface AnalyzeOptions {
  config?: string;
  format?: OutputFormat;
  confidence?: MinimumConfidence;
  /** false under --no-chains */
  chains: boolean;
  check?: boolean;
  includeTests?: boolean;
  entry?: string[];
  verbose?: boolean;
  quiet?: boolean;
}

export const EXIT_CLEAN = 0;
export const EXIT_DEAD_CODE = 1;
export const EXIT_ERROR = 2;

/** Commander argument parser for --confidence */
export function parseConfidence(value: string): MinimumConfidence {
  const trimmed = value.trim().toLowerCase();
  if (trimmed === "high" || trimmed === "medium" || trimmed === "low") return trimmed;
  if (/^\d{1,3}$/.test(trimmed)) {
    const score = Number(trimmed);
    if (score <= 100) return score;
  }
  throw new InvalidArgumentError("Expected high, medium, low or a score from 0 to 100.");
}

/** Only flags that were given become overrides; the rest keep file values. */
export function toOverrides(options: AnalyzeOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.entry && options.entry.length > 0) overrides.entry = { files: options.entry };
  if (options.includeTests) overrides.analysis = { includeTests: true };
  if (options.confidence !== undefined) overrides.confidence = { minimum: options.confidence };

  const output: NonNullable<ConfigOverrides["output"]> = {};
  if (options.format) output.format = options.format;
  if (!options.chains) output.showChains = false;
  if (Object.keys(output).length > 0) overrides.output = output;
  return overrides;
}

export function logLevelFor(options: Pick<AnalyzeOptions, "verbose" | "quiet">, fallback: LogLevel): LogLevel {
  if (options.quiet) return "error";
  if (options.verbose) return "debug";
  return fallback;
}

/** Dead code fails the process only when --check asks for it. */
export function exitCodeFor(verdict: Verdict, check: boolean): number {
  switch (verdict) {
    case "clean":
      return EXIT_CLEAN;
    case "dead-code-found":
      return check ? EXIT_DEAD_CODE : EXIT_CLEAN;
    case "error":
      return EXIT_ERROR;
  }
}
