/**
 * Keeps the most recent report so follow-up questions (explain, stats) can
 * be answered without re-running the analysis.
 */

import * as path from "node:path";
import { Err, Ok, type AnalysisFault, type Logger, type Result } from "@deadwood/core";
import { AnalysisRun } from "./AnalysisRun.js";
import { loadConfig, type ConfigOverrides } from "./config/loader.js";
import type { AnalysisReport, EntryReason, Finding, SymbolRecord } from "./model.js";
import { symbolLabel } from "./report/serialize.js";

export type Explanation =
  | { status: "dead"; symbol: SymbolRecord; finding: Finding; chain: string[] }
  | {
      status: "alive";
      symbol: SymbolRecord;
      /** From the root that reaches it down to the symbol */
      path: string[];
      rootReason?: EntryReason;
    }
  /** Unreached, but not reported: module symbols and ignored names */
  | { status: "ignored"; symbol: SymbolRecord };

export interface AnalyzeRequest {
  root: string;
  configPath?: string;
  overrides?: ConfigOverrides;
}

export class AnalysisSession {
  private report: AnalysisReport | undefined;

  constructor(private readonly logger: Logger) {}

  async analyze(request: AnalyzeRequest): Promise<Result<AnalysisReport, AnalysisFault>> {
    const root = path.resolve(request.root);
    const loaded = await loadConfig(root, {
      configPath: request.configPath,
      overrides: request.overrides,
    });
    if (!loaded.ok) return loaded;
    if (loaded.value.source) this.logger.debug(`config from ${loaded.value.source}`);

    const result = await new AnalysisRun({
      root,
      config: loaded.value.config,
      logger: this.logger.child("run"),
    }).execute();
    if (result.ok) this.report = result.value;
    return result;
  }

  lastReport(): AnalysisReport | undefined {
    return this.report;
  }

  /**
   * Look a symbol up by id, qualified name or plain name and say why it is
   * (or is not) dead.
   */
  explain(query: string): Result<Explanation, Error> {
    const report = this.report;
    if (!report) return Err(new Error("No analysis yet. Run deadwood_analyze first."));

    const matches = findSymbols(report, query);
    const [symbol] = matches;
    if (!symbol) return Err(new Error(`No symbol matches "${query}"`));
    if (matches.length > 1) {
      const ids = matches.slice(0, 10).map((match) => `  ${match.id}`);
      return Err(new Error(`"${query}" is ambiguous; use one of these ids:\n${ids.join("\n")}`));
    }

    const { graph, reachability } = report;
    if (reachability.distance.has(symbol.id)) {
      const path = [symbol.id];
      for (let next = reachability.via.get(symbol.id); next !== undefined; next = reachability.via.get(next)) {
        path.unshift(next);
      }
      const [root] = path;
      return Ok({
        status: "alive",
        symbol,
        path: path.map((id) => symbolLabel(graph, id)),
        rootReason: root === undefined ? undefined : report.roots.get(root),
      });
    }

    const finding = report.allFindings.find((candidate) => candidate.symbol.id === symbol.id);
    if (!finding) return Ok({ status: "ignored", symbol });
    return Ok({
      status: "dead",
      symbol,
      finding,
      chain: finding.chain.path.map((id) => symbolLabel(graph, id)),
    });
  }
}

function findSymbols(report: AnalysisReport, query: string): SymbolRecord[] {
  const symbols = [...report.graph.symbols()];
  const byId = symbols.filter((symbol) => symbol.id === query);
  if (byId.length > 0) return byId;
  const byQualified = symbols.filter((symbol) => symbol.qualifiedName === query);
  if (byQualified.length > 0) return byQualified;
  return symbols.filter((symbol) => symbol.name === query && symbol.kind !== "module");
}
