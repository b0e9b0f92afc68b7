/**
 * Human-readable report: findings grouped by file, one aligned table per
 * group, optional reachability chains, then the summary.
 */

import {
  boundChain,
  summaryLines,
  symbolLabel,
  type AnalysisReport,
  type ConfidenceBand,
  type DeadwoodConfig,
  type Finding,
} from "@deadwood/graph";
import type { Colors } from "./colors.js";

type OutputOptions = Pick<DeadwoodConfig["output"], "showChains" | "maxChainLength" | "groupByFile">;

const INDENT = "  ";
const GAP = "  ";

export function renderTable(report: AnalysisReport, options: OutputOptions, colors: Colors): string {
  const lines: string[] = [];

  if (report.findings.length === 0) {
    lines.push(colors.green("No dead code found."), "");
  } else if (options.groupByFile) {
    for (const [unitPath, findings] of groupByUnit(report.findings)) {
      lines.push(colors.bold(unitPath));
      lines.push(...tableLines(report, findings, false, options, colors), "");
    }
  } else {
    lines.push(...tableLines(report, report.findings, true, options, colors), "");
  }

  lines.push(...summaryLines(report));
  if (report.summary.failedUnits > 0) {
    lines.push(colors.yellow(`Skipped ${report.summary.failedUnits} file(s) that could not be read or parsed`));
  }
  return lines.join("\n");
}

function groupByUnit(findings: readonly Finding[]): Map<string, Finding[]> {
  const groups = new Map<string, Finding[]>();
  for (const finding of findings) {
    const group = groups.get(finding.symbol.unitPath);
    if (group) group.push(finding);
    else groups.set(finding.symbol.unitPath, [finding]);
  }
  return groups;
}

function tableLines(
  report: AnalysisReport,
  findings: readonly Finding[],
  withFile: boolean,
  options: OutputOptions,
  colors: Colors
): string[] {
  const header = [withFile ? "Location" : "Line", "Name", "Kind", "Confidence", "Reason"];
  const rows = findings.map((finding) => {
    const { symbol } = finding;
    const line = String(symbol.span.start.line);
    return [
      withFile ? `${symbol.unitPath}:${line}` : line,
      symbol.qualifiedName,
      symbol.kind,
      `${finding.band} (${finding.score})`,
      finding.reason,
    ];
  });

  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => (row[column] ?? "").length))
  );
  const pad = (cells: string[]) =>
    cells.map((cell, column) => (column < cells.length - 1 ? cell.padEnd(widths[column] ?? 0) : cell));

  const lines = [INDENT + colors.dim(pad(header).join(GAP))];
  const chainIndent = INDENT + " ".repeat((widths[0] ?? 0) + GAP.length);

  rows.forEach((row, index) => {
    const finding = findings[index];
    if (!finding) return;
    const cells = pad(row);
    cells[3] = bandColor(finding.band, colors)(cells[3] ?? "");
    lines.push(INDENT + cells.join(GAP));

    if (options.showChains && finding.chain.path.length > 1) {
      lines.push(chainIndent + colors.dim(`↳ ${chainText(report, finding, options.maxChainLength)}`));
    }
  });
  return lines;
}

function chainText(report: AnalysisReport, finding: Finding, maxLength: number): string {
  const chain = boundChain(finding.chain, maxLength);
  const labels = chain.path.map((id) => symbolLabel(report.graph, id));
  if (chain.truncated && labels.length > 1) labels.splice(1, 0, "…");
  return labels.join(" → ");
}

function bandColor(band: ConfidenceBand, colors: Colors): (text: string) => string {
  switch (band) {
    case "high":
      return colors.red;
    case "medium":
      return colors.yellow;
    case "low":
      return colors.dim;
  }
}
