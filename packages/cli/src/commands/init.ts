import * as path from "node:path";
import { Command } from "commander";
import { describeFault } from "@deadwood/core";
import { writeDefaultConfig } from "@deadwood/graph";
import { consoleIo, type CommandIo } from "../io.js";
import { EXIT_CLEAN, EXIT_ERROR } from "../options.js";

export async function runInit(
  target: string,
  options: { force?: boolean },
  io: CommandIo = consoleIo
): Promise<number> {
  const result = await writeDefaultConfig(path.resolve(target), options.force ?? false);
  if (!result.ok) {
    io.err(describeFault(result.error));
    return EXIT_ERROR;
  }
  io.out(`${io.colors.green("✓")} Wrote ${result.value}`);
  return EXIT_CLEAN;
}

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Write a deadwood.json with the default configuration")
    .argument("[path]", "project root", ".")
    .option("--force", "overwrite an existing deadwood.json")
    .action(async (target: string, options: { force?: boolean }) => {
      process.exitCode = await runInit(target, options);
    });
}
