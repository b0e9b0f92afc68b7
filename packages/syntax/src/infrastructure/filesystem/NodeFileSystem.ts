import { readFile } from "node:fs/promises";
import path from "node:path";
import { type Result, tryCatchAsync } from "@deadwood/core";
import type { FileSystem } from "../../core/ports/FileSystem.js";

export class NodeFileSystem implements FileSystem {
  constructor(private readonly basePath: string = process.cwd()) {}

  read(filePath: string): Promise<Result<string, Error>> {
    const resolved = path.isAbsolute(filePath) ? filePath : path.resolve(this.basePath, filePath);
    return tryCatchAsync(() => readFile(resolved, "utf-8"));
  }
}
