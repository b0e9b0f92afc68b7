import { glob } from "glob";
import { minimatch } from "minimatch";
import { type Result, Ok, Err, toError } from "@deadwood/core";
import type { ProjectScanner, ScanOptions } from "../../core/ports/ProjectScanner.js";

// Never source, whatever the configuration says
const ALWAYS_IGNORE = ["**/node_modules/**", "**/.git/**"];

/**
 * Glob-based implementation of ProjectScanner.
 */
export class NodeProjectScanner implements ProjectScanner {
  async scan(rootPath: string, options: ScanOptions): Promise<Result<string[], Error>> {
    try {
      const files = await glob(options.include, {
        cwd: rootPath,
        ignore: [...ALWAYS_IGNORE, ...options.exclude],
        nodir: true,
        posix: true,
        dot: false,
      });
      return Ok([...new Set(files)].sort());
    } catch (error) {
      return Err(toError(error));
    }
  }

  isExcluded(relativePath: string, options: ScanOptions): boolean {
    const normalized = relativePath.replace(/\\/g, "/");
    const included = options.include.some((pattern) => minimatch(normalized, pattern));
    if (!included) return true;
    return [...ALWAYS_IGNORE, ...options.exclude].some((pattern) => minimatch(normalized, pattern));
  }
}
