/**
 * deadwood_explain - Why a symbol of the last run is dead or alive.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse } from "@deadwood/core";
import type { AnalysisSession, Explanation } from "../AnalysisSession.js";

const InputSchema = {
  symbol: z.string().describe("Symbol id (file#Name), qualified name (Class.method) or plain name"),
};

export function registerExplain(server: McpServer, session: AnalysisSession): void {
  server.registerTool(
    "deadwood_explain",
    {
      title: "Explain a symbol",
      description:
        "Explain the verdict on one symbol from the last deadwood_analyze run: the reachability chain, " +
        "fired risk factors and reason for a dead symbol, or the path from an entry point for a live one.",
      inputSchema: InputSchema,
    },
    async (input: { symbol: string }) =>
      resultToResponse(session.explain(input.symbol), (explanation) => ({
        text: formatExplanation(explanation),
        data: toData(explanation),
      }))
  );
}

function formatExplanation(explanation: Explanation): string {
  const { symbol } = explanation;
  const heading = `## ${symbol.qualifiedName} (${symbol.kind}) at ${symbol.unitPath}:${symbol.span.start.line}`;

  switch (explanation.status) {
    case "alive":
      return [
        heading,
        "",
        `Reachable${explanation.rootReason ? ` from an entry point (${explanation.rootReason})` : ""}:`,
        `  ${explanation.path.join(" → ")}`,
      ].join("\n");

    case "ignored":
      return [heading, "", "Unreached, but excluded from findings by configuration."].join("\n");

    case "dead": {
      const { finding } = explanation;
      const lines = [
        heading,
        "",
        `**Dead** (${finding.reason}): ${finding.explanation}`,
        `**Confidence:** ${finding.score} (${finding.band})`,
      ];
      if (finding.factors.length > 0) {
        lines.push("", "Risk factors:");
        for (const factor of finding.factors) {
          lines.push(`- ${factor.factor} (-${factor.weight}): ${factor.detail}`);
        }
      }
      lines.push("", `Chain: ${explanation.chain.join(" → ")}${finding.chain.truncated ? " (truncated)" : ""}`);
      return lines.join("\n");
    }
  }
}

function toData(explanation: Explanation): Record<string, unknown> {
  const { symbol } = explanation;
  const base = { id: symbol.id, name: symbol.qualifiedName, kind: symbol.kind, file: symbol.unitPath };
  switch (explanation.status) {
    case "alive":
      return { ...base, status: "alive", path: explanation.path, rootReason: explanation.rootReason };
    case "ignored":
      return { ...base, status: "ignored" };
    case "dead":
      return {
        ...base,
        status: "dead",
        reason: explanation.finding.reason,
        explanation: explanation.finding.explanation,
        confidenceScore: explanation.finding.score,
        confidence: explanation.finding.band,
        factors: explanation.finding.factors,
        chain: explanation.chain,
      };
  }
}
