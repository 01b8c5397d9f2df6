import type { TelemetryLogger } from "@edot-node/types";

export class NoopLogger implements TelemetryLogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}

  child(): TelemetryLogger {
    return this;
  }
}

export const NOOP_LOGGER: TelemetryLogger = new NoopLogger();
