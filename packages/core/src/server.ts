/**
 * MCP server bootstrap shared by every package that exposes tools.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger, type Logger } from "./logger.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Builds the services the tools close over */
  createServices: (logger: Logger) => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs after tools are registered, before the transport connects */
  onStartup?: (services: S, logger: Logger) => Promise<void> | void;

  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Create services, register tools, install signal handlers and connect the
 * stdio transport.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "deadwood", version: "0.1.0" },
 *   createServices: (logger) => ({ session: new AnalysisSession(logger) }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;
  const logger = createLogger(config.name);

  const services = await createServices(logger);

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.debug(`received ${signal}, shutting down`);
    shutdown().catch((error: unknown) => {
      logger.error("shutdown failed", error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services, logger);

  await server.connect(transport);
  logger.debug("connected on stdio");
}

/**
 * Entry point for server binaries: bootstrap and exit non-zero on failure.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
