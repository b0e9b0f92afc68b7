/**
 * MCP tool registration for the analysis server.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AnalysisSession } from "../AnalysisSession.js";

import { registerAnalyze } from "./analyze.js";
import { registerExplain } from "./explain.js";
import { registerStats } from "./stats.js";

export interface Services {
  session: AnalysisSession;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { session } = services;

  registerAnalyze(server, session);
  registerExplain(server, session);
  registerStats(server, session);
}
