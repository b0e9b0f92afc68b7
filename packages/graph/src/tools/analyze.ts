/**
 * deadwood_analyze - Run the dead-code analysis on a directory.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse } from "@deadwood/core";
import type { AnalysisSession } from "../AnalysisSession.js";
import type { ConfigOverrides } from "../config/loader.js";
import { serializeReport } from "../report/serialize.js";
import { compactLine, summaryLines } from "../report/text.js";

const DEFAULT_LIMIT = 50;

const InputSchema = {
  path: z.string().optional().describe("Project root to analyze (default: the server's working directory)"),
  min_confidence: z
    .union([z.enum(["high", "medium", "low"]), z.number().min(0).max(100)])
    .optional()
    .describe("Only report findings at or above this band or score (default: from config, usually high)"),
  include_tests: z.boolean().optional().describe("Analyze test files too; they become entry points"),
  entry: z.array(z.string()).optional().describe("Entry files, root-relative, replacing configured ones"),
  limit: z.number().int().min(1).optional().describe(`Maximum findings to return (default: ${DEFAULT_LIMIT})`),
};

interface AnalyzeInput {
  path?: string;
  min_confidence?: "high" | "medium" | "low" | number;
  include_tests?: boolean;
  entry?: string[];
  limit?: number;
}

export function registerAnalyze(server: McpServer, session: AnalysisSession): void {
  server.registerTool(
    "deadwood_analyze",
    {
      title: "Find dead code",
      description: `Find unused functions, classes, methods, variables and types in a TypeScript/JavaScript project.

Builds a reference graph of the whole project, walks it from the entry points
(package.json main/exports/bin, configured entry files, index files) and reports
every symbol nothing reachable refers to. Each finding carries a confidence score
(100 = certainly dead) lowered by risk factors such as dynamic imports, computed
member access, decorators or framework conventions.

Use deadwood_explain afterwards to see why one symbol is (or is not) dead.`,
      inputSchema: InputSchema,
    },
    async (input: AnalyzeInput) => {
      const overrides: ConfigOverrides = {};
      if (input.min_confidence !== undefined) overrides.confidence = { minimum: input.min_confidence };
      if (input.include_tests !== undefined) overrides.analysis = { includeTests: input.include_tests };
      if (input.entry) overrides.entry = { files: input.entry };

      const result = await session.analyze({ root: input.path ?? process.cwd(), overrides });
      const limit = input.limit ?? DEFAULT_LIMIT;

      return resultToResponse(result, (report) => {
        const lines = [
          `## Dead code: ${report.verdict}`,
          "",
          ...summaryLines(report),
          `Roots: ${report.summary.roots}, unresolved references: ${report.summary.unresolvedReferences}`,
          "",
        ];
        if (report.findings.length === 0) {
          lines.push("No findings at the requested confidence.");
        } else {
          for (const finding of report.findings.slice(0, limit)) {
            lines.push(`- ${compactLine(finding)}: ${finding.explanation}`);
          }
          if (report.findings.length > limit) {
            lines.push(`... and ${report.findings.length - limit} more`);
          }
        }
        return { text: lines.join("\n"), data: serializeReport(report, limit) };
      });
    }
  );
}
