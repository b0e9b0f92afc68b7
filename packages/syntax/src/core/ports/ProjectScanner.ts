import type { Result } from "@deadwood/core";

export interface ScanOptions {
  /** Globs a file must match at least one of */
  include: string[];
  /** Globs that remove a file even when included */
  exclude: string[];
}

/**
 * Port for discovering the source units of a project.
 */
export interface ProjectScanner {
  /**
   * List files under `rootPath`.
   *
   * @returns Root-relative, `/`-separated paths, sorted
   */
  scan(rootPath: string, options: ScanOptions): Promise<Result<string[], Error>>;

  /**
   * Whether a root-relative path would be excluded by `options`.
   */
  isExcluded(relativePath: string, options: ScanOptions): boolean;
}
