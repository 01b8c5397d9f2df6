import pino from "pino";
import type { LogLevel, TelemetryLogger } from "@edot-node/types";

/**
 * Thin pino wrapper implementing TelemetryLogger.
 * Every method delegates directly to the underlying pino instance.
 */
export class TelemetryLoggerImpl implements TelemetryLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.log("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.log("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.log("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.log("error", message, attributes);
  }

  private log(level: LogLevel, message: string, attributes?: Record<string, unknown>): void {
    const fn = this.pinoLogger[level].bind(this.pinoLogger);
    if (attributes) fn(attributes, message);
    else fn(message);
  }

  child(name: string, attributes?: Record<string, unknown>): TelemetryLogger {
    return new TelemetryLoggerImpl(this.pinoLogger.child({ name, ...attributes }));
  }
}

export type LoggerSettings = {
  level?: LogLevel | "silent";
  destination?: pino.DestinationStream;
};

/**
 * Default logger for the pipeline's own warnings: JSON lines on stderr,
 * warn and above. Synchronous, so nothing is lost if the process exits
 * right after startup.
 */
export function createLogger(settings: LoggerSettings = {}): TelemetryLoggerImpl {
  const logger = pino(
    {
      name: "edot",
      level: settings.level ?? "warn",
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    settings.destination ?? pino.destination({ dest: 2, sync: true }),
  );
  return new TelemetryLoggerImpl(logger);
}
