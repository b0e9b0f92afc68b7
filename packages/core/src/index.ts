export { type Result, Ok, Err, toError, tryCatchAsync } from "./result.js";

export {
  ConfigurationError,
  InvariantViolation,
  type AnalysisFault,
  isAnalysisFault,
  describeFault,
} from "./errors.js";

export {
  type LogLevel,
  type Logger,
  type LogSink,
  isLogLevel,
  levelFromEnv,
  createLogger,
  silentLogger,
} from "./logger.js";

export {
  type TextContent,
  type ToolResponse,
  type FailurePayload,
  textResponse,
  errorResponse,
  successResponse,
  resultToResponse,
} from "./mcp.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";
