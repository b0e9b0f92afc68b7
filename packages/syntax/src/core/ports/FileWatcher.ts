import type { Result } from "@deadwood/core";

export type FileWatchEvent = "change" | "unlink";

/**
 * Receives one call per quiet period with every path that changed in it.
 */
export type FileWatchCallback = (changes: Map<string, FileWatchEvent>) => void;

/**
 * Port for watching a project for source changes.
 */
export interface FileWatcher {
  watch(rootPath: string, callback: FileWatchCallback): Result<void, Error>;

  stop(): void;

  isWatching(): boolean;
}
