// =============================================================================
// Logging — Structured extraction & merge event logging
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  data?: Record<string, unknown>;
}

export type Logger = (entry: LogEntry) => void;

export interface ConsoleLoggerOptions {
  /** Entries below this level are dropped (default: "info") */
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = options.level ?? "info";
  return (entry: LogEntry) => {
    if (!isLevelEnabled(entry.level, threshold)) return;
    const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
    const write = entry.level === "error" ? console.error : entry.level === "warn" ? console.warn : console.log;
    write(`${prefix} ${entry.event}`, entry.data ?? "");
  };
}

export const silentLogger: Logger = () => undefined;

export function emit(logger: Logger, level: LogLevel, event: string, data?: Record<string, unknown>): void {
  logger({ timestamp: Date.now(), level, event, data });
}

export function describeError(error: unknown): Record<string, unknown> | string {
  return error instanceof Error ? { name: error.name, message: error.message } : String(error);
}
