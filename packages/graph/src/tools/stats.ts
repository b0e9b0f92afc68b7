/**
 * deadwood_stats - Summary of the last analysis.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { successResponse, textResponse } from "@deadwood/core";
import type { AnalysisSession } from "../AnalysisSession.js";
import { summaryLines } from "../report/text.js";

export function registerStats(server: McpServer, session: AnalysisSession): void {
  server.registerTool(
    "deadwood_stats",
    {
      title: "Analysis stats",
      description: "Summary of the last deadwood_analyze run: symbols, files, edges, roots and findings per band.",
      inputSchema: {},
    },
    async () => {
      const report = session.lastReport();
      if (!report) {
        return textResponse("No analysis yet. Call deadwood_analyze first.");
      }

      const graph = report.graph.stats();
      const { summary } = report;
      const lines = [
        "## Analysis Statistics",
        "",
        `**Root:** ${report.root}`,
        ...summaryLines(report).map((line) => `- ${line}`),
        `- Reachable: ${summary.reachable}, unreached: ${summary.candidates}, reported: ${summary.reported}`,
        `- Edges: ${graph.edges}, roots: ${summary.roots}`,
        `- Unresolved references: ${summary.unresolvedReferences}, failed files: ${summary.failedUnits}`,
        `- Duration: ${summary.durationMs}ms`,
      ];

      return successResponse(lines.join("\n"), {
        root: report.root,
        verdict: report.verdict,
        summary,
        edges: graph.edges,
        edgesByKind: graph.edgesByKind,
      });
    }
  );
}
