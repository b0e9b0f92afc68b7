import * as fs from "node:fs";
import * as path from "node:path";
import { type Result, Ok, Err, toError, type Logger, silentLogger } from "@deadwood/core";
import type { FileWatcher, FileWatchCallback, FileWatchEvent } from "../../core/ports/FileWatcher.js";
import type { ProjectScanner, ScanOptions } from "../../core/ports/ProjectScanner.js";

/**
 * Node.js implementation of FileWatcher using recursive fs.watch.
 * Changes are collected until the tree has been quiet for `debounceMs`,
 * then delivered as one batch.
 */
export class NodeFileWatcher implements FileWatcher {
  private watcher: fs.FSWatcher | null = null;
  private pending = new Map<string, FileWatchEvent>();
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly scanner: ProjectScanner,
    private readonly scanOptions: ScanOptions,
    private readonly logger: Logger = silentLogger,
    private readonly debounceMs = 200
  ) {}

  watch(rootPath: string, callback: FileWatchCallback): Result<void, Error> {
    if (this.watcher) {
      this.stop();
    }

    try {
      this.watcher = fs.watch(rootPath, { recursive: true }, (_eventType, filename) => {
        if (!filename) return;

        const relativePath = filename.toString().replace(/\\/g, "/");
        if (this.scanner.isExcluded(relativePath, this.scanOptions)) return;

        const exists = fs.existsSync(path.join(rootPath, relativePath));
        this.pending.set(relativePath, exists ? "change" : "unlink");
        this.schedule(callback);
      });

      this.watcher.on("error", (error) => {
        this.logger.error("watch error", error);
      });

      return Ok(undefined);
    } catch (error) {
      return Err(toError(error));
    }
  }

  stop(): void {
    this.watcher?.close();
    this.watcher = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pending.clear();
  }

  isWatching(): boolean {
    return this.watcher !== null;
  }

  private schedule(callback: FileWatchCallback): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      const batch = this.pending;
      this.pending = new Map();
      callback(batch);
    }, this.debounceMs);
  }
}
