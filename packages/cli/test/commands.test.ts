import { describe, it, expect, afterEach } from "vitest";
import { existsSync } from "fs";
import { join } from "path";
import { runInit } from "../src/commands/init.js";
import { Rerunner } from "../src/commands/watch.js";
import { createProgram } from "../src/program.js";
import { captureIo, removeProject, writeProject } from "./helpers.js";

let root: string | undefined;

afterEach(() => {
  if (root) removeProject(root);
  root = undefined;
});

describe("runInit", () => {
  it("writes deadwood.json once unless forced", async () => {
    root = writeProject({ "src/index.ts": [""] });
    const target = join(root, "deadwood.json");

    const first = captureIo();
    expect(await runInit(root, {}, first)).toBe(0);
    expect(first.stdout).toEqual([`✓ Wrote ${target}`]);
    expect(existsSync(target)).toBe(true);

    const second = captureIo();
    expect(await runInit(root, {}, second)).toBe(2);
    expect(second.stderr).toEqual([
      "Configuration error: deadwood.json already exists\n  Fix: Pass --force to overwrite it.",
    ]);

    expect(await runInit(root, { force: true }, captureIo())).toBe(0);
  });
});

describe("Rerunner", () => {
  it("collapses requests made during a run into one more run", async () => {
    const releases: Array<() => void> = [];
    let calls = 0;
    const rerunner = new Rerunner(() => {
      calls++;
      return new Promise<void>((resolve) => releases.push(resolve));
    });

    const first = rerunner.request();
    const second = rerunner.request();
    rerunner.request();
    expect(calls).toBe(1);
    expect(second).toBe(first);

    releases[0]?.();
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(calls).toBe(2);

    releases[1]?.();
    await first;
    expect(calls).toBe(2);
  });
});

describe("createProgram", () => {
  it("registers the three commands", () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual(["analyze", "init", "watch"]);
  });
});
