import type { Result } from "@deadwood/core";

/**
 * Port for the source reads the analysis needs. Paths are absolute or
 * relative to the implementation's base path.
 */
export interface FileSystem {
  read(filePath: string): Promise<Result<string, Error>>;
}
