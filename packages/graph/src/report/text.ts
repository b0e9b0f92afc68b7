import type { AnalysisReport, Finding } from "../model.js";

export function summaryLines(report: AnalysisReport): string[] {
  const { summary } = report;
  return [
    `Analyzed ${summary.totalSymbols} symbols in ${summary.totalUnits} files`,
    `Dead code: ${summary.bands.high} high, ${summary.bands.medium} medium, ${summary.bands.low} low confidence`,
  ];
}

/** `file:line:col: name (kind) - band (score)` */
export function compactLine(finding: Finding): string {
  const { symbol } = finding;
  const { line, column } = symbol.span.start;
  return `${symbol.unitPath}:${line}:${column}: ${symbol.qualifiedName} (${symbol.kind}) - ${finding.band} (${finding.score})`;
}
