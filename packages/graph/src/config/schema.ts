import * as z from "zod/v4";

export const DEFAULT_INCLUDE = ["**/*.{ts,tsx,mts,cts,js,jsx,mjs,cjs}"];

export const DEFAULT_EXCLUDE = [
  "**/node_modules/**",
  "**/dist/**",
  "**/build/**",
  "**/*.d.ts",
  "**/*.test.*",
  "**/*.spec.*",
  "**/__tests__/**",
];

// patterns that only exist to keep tests out; includeTests drops them
export const TEST_EXCLUDES = new Set(["**/*.test.*", "**/*.spec.*", "**/__tests__/**"]);

export const ConfidenceBandSchema = z.enum(["high", "medium", "low"]);

export const WeightsSchema = z.object({
  "reflective-access": z.number().min(0).default(30),
  "dynamic-access": z.number().min(0).default(20),
  "dynamic-import": z.number().min(0).default(25),
  "string-property-access": z.number().min(0).default(20),
  "framework-convention": z.number().min(0).default(40),
  decorated: z.number().min(0).default(20),
  "unresolved-import": z.number().min(0).default(15),
  "parse-degraded": z.number().min(0).default(15),
  transitive: z.number().min(0).default(5),
  "class-member": z.number().min(0).default(5),
});

const EntrySchema = z.object({
  files: z.array(z.string()).default([]),
  patterns: z.array(z.string()).default([]),
  autoDetect: z.boolean().default(true),
  exports: z.array(z.string()).default([]),
});

const AnalysisSchema = z.object({
  includeTypes: z.boolean().default(true),
  includeTests: z.boolean().default(false),
  maxReexportDepth: z.number().int().min(1).default(10),
  ignoreSymbols: z.array(z.string()).default([]),
  ignorePatterns: z.array(z.string()).default(["^_"]),
});

const ConfidenceSchema = z.object({
  baseline: z.number().min(0).max(100).default(100),
  minimum: z.union([ConfidenceBandSchema, z.number().min(0).max(100)]).default("high"),
  weights: WeightsSchema.default(WeightsSchema.parse({})),
});

const PluginsSchema = z.object({
  enabled: z.array(z.string()).default([]),
  disabled: z.array(z.string()).default([]),
  autoDetect: z.boolean().default(true),
});

export const OutputFormatSchema = z.enum(["table", "json", "compact"]);

const OutputSchema = z.object({
  format: OutputFormatSchema.default("table"),
  showChains: z.boolean().default(true),
  maxChainLength: z.number().int().min(1).default(5),
  groupByFile: z.boolean().default(true),
});

export const ConfigSchema = z.object({
  include: z.array(z.string()).default(DEFAULT_INCLUDE),
  exclude: z.array(z.string()).default(DEFAULT_EXCLUDE),
  entry: EntrySchema.default(EntrySchema.parse({})),
  analysis: AnalysisSchema.default(AnalysisSchema.parse({})),
  confidence: ConfidenceSchema.default(ConfidenceSchema.parse({})),
  plugins: PluginsSchema.default(PluginsSchema.parse({})),
  output: OutputSchema.default(OutputSchema.parse({})),
});

export type DeadwoodConfig = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type RiskWeights = z.infer<typeof WeightsSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type MinimumConfidence = DeadwoodConfig["confidence"]["minimum"];

export function defaultConfig(): DeadwoodConfig {
  return ConfigSchema.parse({});
}
