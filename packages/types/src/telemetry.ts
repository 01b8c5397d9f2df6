export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Structured logger used by the pipeline for its own diagnostics. */
export interface TelemetryLogger {
  debug(message: string, attributes?: Record<string, unknown>): void;
  info(message: string, attributes?: Record<string, unknown>): void;
  warn(message: string, attributes?: Record<string, unknown>): void;
  error(message: string, attributes?: Record<string, unknown>): void;

  /** Create a named child logger. Adds the name to all log records. */
  child(name: string, attributes?: Record<string, unknown>): TelemetryLogger;
}
