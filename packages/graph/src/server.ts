#!/usr/bin/env node
/**
 * MCP server exposing dead-code analysis to agents.
 */

import { runServer } from "@deadwood/core";
import { AnalysisSession } from "./AnalysisSession.js";
import { registerAllTools, type Services } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "deadwood",
    version: "0.1.0",
  },
  createServices: (logger) => ({
    session: new AnalysisSession(logger),
  }),
  registerTools: registerAllTools,
  onStartup: (_services, logger) => {
    logger.info(`ready; deadwood_analyze defaults to ${process.cwd()}`);
  },
});
