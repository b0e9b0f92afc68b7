/**
 * Plain-JSON view of a report, shared by the json renderer and the MCP tools.
 */

import type { CallGraph } from "../CallGraph.js";
import type {
  AnalysisReport,
  AnalysisSummary,
  DiagnosticCode,
  FiredFactor,
  Finding,
  SymbolId,
} from "../model.js";

export interface SerializedFinding {
  id: string;
  name: string;
  kind: string;
  file: string;
  line: number;
  column: number;
  confidence: string;
  confidenceScore: number;
  reason: string;
  explanation: string;
  exported: boolean;
  factors: FiredFactor[];
  chain: string[];
}

export interface SerializedWarning {
  file: string;
  code: DiagnosticCode;
  message: string;
  line?: number;
}

export interface SerializedReport {
  [key: string]: unknown;
  totalSymbols: number;
  totalFiles: number;
  deadCount: number;
  durationMs: number;
  verdict: string;
  summary: AnalysisSummary;
  deadSymbols: SerializedFinding[];
  warnings: SerializedWarning[];
}

/** Human label for a symbol id: qualified name, or the file for a module */
export function symbolLabel(graph: CallGraph, id: SymbolId): string {
  const symbol = graph.getSymbol(id);
  if (!symbol) return id;
  return symbol.kind === "module" ? symbol.unitPath : symbol.qualifiedName;
}

export function serializeFinding(graph: CallGraph, finding: Finding): SerializedFinding {
  const { symbol } = finding;
  return {
    id: symbol.id,
    name: symbol.qualifiedName,
    kind: symbol.kind,
    file: symbol.unitPath,
    line: symbol.span.start.line,
    column: symbol.span.start.column,
    confidence: finding.band,
    confidenceScore: finding.score,
    reason: finding.reason,
    explanation: finding.explanation,
    exported: symbol.exported,
    factors: finding.factors,
    chain: finding.chain.path.map((id) => symbolLabel(graph, id)),
  };
}

export function serializeReport(report: AnalysisReport, limit?: number): SerializedReport {
  const findings = limit === undefined ? report.findings : report.findings.slice(0, limit);
  return {
    totalSymbols: report.summary.totalSymbols,
    totalFiles: report.summary.totalUnits,
    deadCount: report.findings.length,
    durationMs: report.summary.durationMs,
    verdict: report.verdict,
    summary: report.summary,
    deadSymbols: findings.map((finding) => serializeFinding(report.graph, finding)),
    warnings: report.diagnostics.map((diagnostic) => ({
      file: diagnostic.unitPath,
      code: diagnostic.code,
      message: diagnostic.message,
      ...(diagnostic.line !== undefined ? { line: diagnostic.line } : {}),
    })),
  };
}
