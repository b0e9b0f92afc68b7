/**
 * Configuration discovery, parsing and validation.
 *
 * Order: explicit path, deadwood.json, .deadwoodrc.json, the "deadwood"
 * field of package.json, built-in defaults. Overrides (CLI flags) are laid
 * over whatever was found, section by section.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Minimatch } from "minimatch";
import * as z from "zod/v4";
import { ConfigurationError, Err, Ok, toError, type Result } from "@deadwood/core";
import { ConfigSchema, defaultConfig, type DeadwoodConfig } from "./schema.js";

export const CONFIG_FILES = ["deadwood.json", ".deadwoodrc.json"];

export interface ConfigOverrides {
  include?: string[];
  exclude?: string[];
  entry?: Partial<DeadwoodConfig["entry"]>;
  analysis?: Partial<DeadwoodConfig["analysis"]>;
  confidence?: Partial<DeadwoodConfig["confidence"]>;
  plugins?: Partial<DeadwoodConfig["plugins"]>;
  output?: Partial<DeadwoodConfig["output"]>;
}

export interface LoadedConfig {
  config: DeadwoodConfig;
  /** Root-relative file the configuration came from; undefined for defaults */
  source?: string;
}

export interface LoadConfigOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
}

export async function loadConfig(
  root: string,
  options: LoadConfigOptions = {}
): Promise<Result<LoadedConfig, ConfigurationError>> {
  const found = await findConfig(root, options.configPath);
  if (!found.ok) return found;

  const parsed = ConfigSchema.safeParse(found.value.raw ?? {});
  if (!parsed.success) {
    return Err(
      new ConfigurationError(
        `Invalid configuration${found.value.source ? ` in ${found.value.source}` : ""}:\n${z.prettifyError(parsed.error)}`,
        "Correct the listed fields, or run `deadwood init --force` to start from the defaults."
      )
    );
  }

  const merged = applyOverrides(parsed.data, options.overrides ?? {});
  if (!merged.ok) return merged;

  const validated = validateConfig(merged.value);
  if (!validated.ok) return validated;
  return Ok({ config: validated.value, source: found.value.source });
}

/**
 * Lay overrides over a configuration and re-validate the result against the
 * schema.
 */
export function applyOverrides(
  config: DeadwoodConfig,
  overrides: ConfigOverrides
): Result<DeadwoodConfig, ConfigurationError> {
  const merged = {
    include: overrides.include ?? config.include,
    exclude: overrides.exclude ?? config.exclude,
    entry: { ...config.entry, ...overrides.entry },
    analysis: { ...config.analysis, ...overrides.analysis },
    confidence: { ...config.confidence, ...overrides.confidence },
    plugins: { ...config.plugins, ...overrides.plugins },
    output: { ...config.output, ...overrides.output },
  };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    return Err(
      new ConfigurationError(
        `Invalid option:\n${z.prettifyError(parsed.error)}`,
        "Check the command-line flags against `deadwood analyze --help`."
      )
    );
  }
  return Ok(parsed.data);
}

/**
 * Checks the schema cannot express: globs must compile, ignore patterns
 * must be valid regular expressions, and no provider may be both enabled
 * and disabled.
 */
export function validateConfig(config: DeadwoodConfig): Result<DeadwoodConfig, ConfigurationError> {
  const globs: Array<[string, string[]]> = [
    ["include", config.include],
    ["exclude", config.exclude],
    ["entry.patterns", config.entry.patterns],
  ];
  for (const [field, patterns] of globs) {
    for (const pattern of patterns) {
      if (pattern.trim() === "" || new Minimatch(pattern).makeRe() === false) {
        return Err(
          new ConfigurationError(
            `Invalid glob in ${field}: "${pattern}"`,
            `Fix or remove the pattern in ${field}.`
          )
        );
      }
    }
  }

  for (const pattern of config.analysis.ignorePatterns) {
    try {
      new RegExp(pattern);
    } catch (error) {
      return Err(
        new ConfigurationError(
          `Invalid regular expression in analysis.ignorePatterns: "${pattern}" (${toError(error).message})`,
          "Fix or remove the expression in analysis.ignorePatterns."
        )
      );
    }
  }

  const conflicting = config.plugins.enabled.filter((name) => config.plugins.disabled.includes(name));
  if (conflicting.length > 0) {
    return Err(
      new ConfigurationError(
        `Plugin(s) both enabled and disabled: ${conflicting.join(", ")}`,
        "Remove each of them from either plugins.enabled or plugins.disabled."
      )
    );
  }
  return Ok(config);
}

/**
 * Write the default configuration as deadwood.json. Refuses to overwrite an
 * existing file unless forced.
 */
export async function writeDefaultConfig(
  root: string,
  force = false
): Promise<Result<string, ConfigurationError>> {
  const target = path.join(root, CONFIG_FILES[0] ?? "deadwood.json");
  if (!force && (await exists(target))) {
    return Err(
      new ConfigurationError(
        `${path.relative(root, target)} already exists`,
        "Pass --force to overwrite it."
      )
    );
  }
  await fs.writeFile(target, `${JSON.stringify(defaultConfig(), null, 2)}\n`, "utf-8");
  return Ok(target);
}

interface FoundConfig {
  raw?: unknown;
  source?: string;
}

async function findConfig(
  root: string,
  explicit: string | undefined
): Promise<Result<FoundConfig, ConfigurationError>> {
  if (explicit) {
    const file = path.resolve(root, explicit);
    if (!(await exists(file))) {
      return Err(
        new ConfigurationError(
          `Config file not found: ${explicit}`,
          "Check the --config path, or omit it to use deadwood.json."
        )
      );
    }
    return readJson(file, path.relative(root, file));
  }

  for (const name of CONFIG_FILES) {
    const file = path.join(root, name);
    if (await exists(file)) return readJson(file, name);
  }

  const manifest = path.join(root, "package.json");
  if (await exists(manifest)) {
    const read = await readJson(manifest, "package.json");
    if (!read.ok) return read;
    const raw = read.value.raw;
    if (raw && typeof raw === "object" && "deadwood" in raw && raw.deadwood !== undefined) {
      return Ok({ raw: raw.deadwood, source: "package.json#deadwood" });
    }
  }
  return Ok({});
}

async function readJson(
  file: string,
  source: string
): Promise<Result<FoundConfig, ConfigurationError>> {
  try {
    return Ok({ raw: JSON.parse(await fs.readFile(file, "utf-8")), source });
  } catch (error) {
    return Err(
      new ConfigurationError(
        `Cannot read ${source}: ${toError(error).message}`,
        `Make sure ${source} exists and contains valid JSON.`
      )
    );
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
