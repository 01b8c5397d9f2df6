import { mkdirSync, openSync } from "node:fs";
import { basename, extname, join } from "node:path";
import createDebug from "debug";
import pino from "pino";
import { toPinoLevel, type FileLogLevel } from "@edot-node/config";
import type { TelemetryLogger } from "@edot-node/types";
import { DiagnosticLogUnavailableError } from "./errors";
import { createLogger, type TelemetryLoggerImpl } from "./logger";

const debug = createDebug("edot:telemetry");

type Destination = ReturnType<typeof pino.destination>;

export type DiagnosticLogSettings = {
  directory: string;
  level: FileLogLevel;
  processName?: string;
  pid?: number;
  now?: Date;
};

/** An open diagnostic log file. Closing flushes and releases the descriptor. */
export interface DiagnosticLog {
  readonly path: string;
  readonly logger: TelemetryLoggerImpl;
  close(): Promise<void>;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function defaultProcessName(): string {
  const script = process.argv[1];
  return script ? basename(script, extname(script)) : "node";
}

/** `<process>_<yyyyMMdd-HHmmss>_<pid>.instrumentation.log`, in local time. */
export function diagnosticLogFileName(processName: string, pid: number, now: Date): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}-` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${processName}_${stamp}_${pid}.instrumentation.log`;
}

/**
 * Creates the directory and a fresh log file for this process start.
 * Returns null when file logging is off, or when the directory or file
 * cannot be created; the latter is reported once through `warnings`.
 */
export function openDiagnosticLog(
  settings: DiagnosticLogSettings,
  warnings: TelemetryLogger,
): DiagnosticLog | null {
  const { directory, level } = settings;
  if (!directory || level === "None") return null;

  const path = join(
    directory,
    diagnosticLogFileName(
      settings.processName ?? defaultProcessName(),
      settings.pid ?? process.pid,
      settings.now ?? new Date(),
    ),
  );

  let fd: number;
  try {
    mkdirSync(directory, { recursive: true });
    fd = openSync(path, "a");
  } catch (cause) {
    const error = new DiagnosticLogUnavailableError(directory, cause);
    warnings.warn(error.message, { directory, path });
    return null;
  }

  debug("diagnostic log opened at %s", path);
  const destination = pino.destination({ fd, sync: true });
  return {
    path,
    logger: createLogger({ level: toPinoLevel(level), destination }),
    close: () => closeDestination(destination),
  };
}

function closeDestination(destination: Destination): Promise<void> {
  return new Promise((resolve, reject) => {
    destination.once("close", () => resolve());
    destination.once("error", reject);
    destination.flushSync();
    destination.end();
  });
}
