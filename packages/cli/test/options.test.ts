import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { exitCodeFor, logLevelFor, parseConfidence, toOverrides } from "../src/options.js";

describe("parseConfidence", () => {
  it("accepts band names and scores", () => {
    expect(parseConfidence("Medium")).toBe("medium");
    expect(parseConfidence("75")).toBe(75);
    expect(parseConfidence("0")).toBe(0);
  });

  it("rejects anything else", () => {
    expect(() => parseConfidence("101")).toThrow(InvalidArgumentError);
    expect(() => parseConfidence("sure")).toThrow("Expected high, medium, low or a score from 0 to 100.");
  });
});

describe("toOverrides", () => {
  it("leaves out flags that were not given", () => {
    expect(toOverrides({ chains: true })).toEqual({});
  });

  it("maps every given flag to its section", () => {
    expect(
      toOverrides({
        chains: false,
        format: "json",
        confidence: "low",
        includeTests: true,
        entry: ["src/cli.ts"],
      })
    ).toEqual({
      entry: { files: ["src/cli.ts"] },
      analysis: { includeTests: true },
      confidence: { minimum: "low" },
      output: { format: "json", showChains: false },
    });
  });
});

describe("exitCodeFor", () => {
  it("maps verdicts to exit codes", () => {
    expect(exitCodeFor("clean", true)).toBe(0);
    expect(exitCodeFor("dead-code-found", false)).toBe(0);
    expect(exitCodeFor("dead-code-found", true)).toBe(1);
    expect(exitCodeFor("error", false)).toBe(2);
  });
});

describe("logLevelFor", () => {
  it("lets --quiet win over --verbose", () => {
    expect(logLevelFor({ verbose: true }, "info")).toBe("debug");
    expect(logLevelFor({ verbose: true, quiet: true }, "info")).toBe("error");
    expect(logLevelFor({}, "warn")).toBe("warn");
  });
});
