import {
  compactLine,
  serializeReport,
  type AnalysisReport,
  type DeadwoodConfig,
} from "@deadwood/graph";
import type { Colors } from "./colors.js";
import { renderTable } from "./table.js";

export { type Colors, plainColors, terminalColors } from "./colors.js";
export { renderTable } from "./table.js";

export function renderJson(report: AnalysisReport): string {
  return JSON.stringify(serializeReport(report), null, 2);
}

export function renderCompact(report: AnalysisReport): string {
  return report.findings.map(compactLine).join("\n");
}

export function render(report: AnalysisReport, output: DeadwoodConfig["output"], colors: Colors): string {
  switch (output.format) {
    case "json":
      return renderJson(report);
    case "compact":
      return renderCompact(report);
    case "table":
      return renderTable(report, output, colors);
  }
}
