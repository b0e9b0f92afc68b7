import * as path from "node:path";
import ts from "typescript";
import { Err, Ok, type Result } from "@deadwood/core";
import type { PathAliases } from "./ModuleResolver.js";

// "No inputs were found in config file": harmless when only paths are wanted
const NO_INPUTS = 18003;

/**
 * Read `compilerOptions.paths` and `baseUrl` from the root tsconfig.json,
 * following `extends`. Resolves to undefined when there is no tsconfig or it
 * declares neither.
 */
export function loadPathAliases(root: string): Result<PathAliases | undefined, Error> {
  const configPath = ts.findConfigFile(root, ts.sys.fileExists, "tsconfig.json");
  if (!configPath || path.dirname(path.resolve(configPath)) !== path.resolve(root)) {
    return Ok(undefined);
  }

  const configFile = ts.readConfigFile(configPath, ts.sys.readFile);
  if (configFile.error) {
    return Err(new Error(ts.flattenDiagnosticMessageText(configFile.error.messageText, "\n")));
  }

  const parsed = ts.parseJsonConfigFileContent(configFile.config, ts.sys, path.dirname(configPath));
  const errors = parsed.errors.filter((e) => e.code !== NO_INPUTS);
  if (errors.length > 0) {
    return Err(
      new Error(errors.map((e) => ts.flattenDiagnosticMessageText(e.messageText, "\n")).join("\n"))
    );
  }

  const { baseUrl, paths } = parsed.options;
  if (!baseUrl && !paths) return Ok(undefined);

  const base = baseUrl ?? path.dirname(configPath);
  const baseDir = path.relative(root, base).split(path.sep).join("/");
  return Ok({ baseDir, paths: paths ?? {}, hasBaseUrl: baseUrl !== undefined });
}
