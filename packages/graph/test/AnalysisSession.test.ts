import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { silentLogger } from "@deadwood/core";
import { AnalysisSession } from "../src/AnalysisSession.js";
import { serializeReport } from "../src/report/serialize.js";
import { compactLine, summaryLines } from "../src/report/text.js";
import { UTILS_PROJECT, removeProject, writeProject } from "./project.js";

describe("AnalysisSession", () => {
  let root: string;
  let session: AnalysisSession;

  beforeAll(async () => {
    root = writeProject(UTILS_PROJECT);
    session = new AnalysisSession(silentLogger);

    const early = session.explain("unusedFunction");
    expect(early.ok).toBe(false);
    if (!early.ok) expect(early.error.message).toBe("No analysis yet. Run deadwood_analyze first.");

    const result = await session.analyze({ root });
    if (!result.ok) throw result.error;
  });

  afterAll(() => {
    removeProject(root);
  });

  it("keeps the last report", () => {
    expect(session.lastReport()?.summary.totalSymbols).toBe(3);
  });

  it("explains a dead symbol", () => {
    const result = session.explain("unusedFunction");

    if (!result.ok || result.value.status !== "dead") throw new Error("expected a dead explanation");
    expect(result.value.finding.reason).toBe("unused-export");
    expect(result.value.chain).toEqual(["unusedFunction"]);
  });

  it("explains a live symbol by the path that reaches it", () => {
    const result = session.explain("src/utils.ts#helperFunction");

    if (!result.ok || result.value.status !== "alive") throw new Error("expected an alive explanation");
    expect(result.value.path).toEqual(["src/main.ts", "usedFunction", "helperFunction"]);
    expect(result.value.rootReason).toBe("index-fallback");
  });

  it("reports unknown symbols", () => {
    const result = session.explain("nothingLikeThis");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('No symbol matches "nothingLikeThis"');
  });

  it("serializes findings with their location and score", () => {
    const report = session.lastReport();
    if (!report) throw new Error("no report");

    const serialized = serializeReport(report);
    expect(serialized.deadCount).toBe(1);
    expect(serialized.totalFiles).toBe(2);
    expect(serialized.deadSymbols[0]).toMatchObject({
      id: "src/utils.ts#unusedFunction",
      name: "unusedFunction",
      kind: "function",
      file: "src/utils.ts",
      line: 5,
      column: 8,
      confidence: "high",
      confidenceScore: 100,
      reason: "unused-export",
      exported: true,
      factors: [],
      chain: ["unusedFunction"],
    });
    expect(serializeReport(report, 0).deadSymbols).toEqual([]);
  });

  it("renders text lines", () => {
    const report = session.lastReport();
    if (!report) throw new Error("no report");
    const [finding] = report.findings;
    if (!finding) throw new Error("no finding");

    expect(summaryLines(report)).toEqual([
      "Analyzed 3 symbols in 2 files",
      "Dead code: 1 high, 0 medium, 0 low confidence",
    ]);
    expect(compactLine(finding)).toBe("src/utils.ts:5:8: unusedFunction (function) - high (100)");
  });
});
