/**
 * Scoped stderr logging. stdout belongs to reports and the MCP stdio transport,
 * so every line goes through console.error with a `[scope]` prefix.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, cause?: unknown): void;
  child(scope: string): Logger;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => console.error(line);

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Level from DEADWOOD_LOG_LEVEL, falling back to the given default.
 */
export function levelFromEnv(fallback: LogLevel = "info"): LogLevel {
  const raw = process.env.DEADWOOD_LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : fallback;
}

export function createLogger(
  scope: string,
  level: LogLevel = levelFromEnv(),
  sink: LogSink = stderrSink
): Logger {
  const enabled = (wanted: LogLevel): boolean => LEVEL_ORDER[wanted] >= LEVEL_ORDER[level];
  const write = (wanted: LogLevel, message: string): void => {
    if (enabled(wanted)) {
      sink(wanted === "info" ? `[${scope}] ${message}` : `[${scope}] ${wanted}: ${message}`);
    }
  };

  return {
    scope,
    level,
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message, cause) => {
      if (cause === undefined) {
        write("error", message);
        return;
      }
      const detail = cause instanceof Error ? cause.message : String(cause);
      write("error", `${message}: ${detail}`);
    },
    child: (childScope) => createLogger(`${scope}:${childScope}`, level, sink),
  };
}

export const silentLogger: Logger = createLogger("deadwood", "silent");
