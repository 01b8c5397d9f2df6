function reason(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class TelemetryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TelemetryError";
  }
}

/** `build()` was called on a builder that has already been finalized. */
export class PipelineAlreadyBuiltError extends TelemetryError {
  constructor() {
    super(
      "The telemetry pipeline has already been built. " +
        "A builder is single-use; create a new one to build another session.",
    );
    this.name = "PipelineAlreadyBuiltError";
  }
}

/**
 * The diagnostic log file could not be created. Never thrown out of `build()`;
 * it is reported once through the logger and file logging is turned off.
 */
export class DiagnosticLogUnavailableError extends TelemetryError {
  constructor(
    public readonly directory: string,
    cause: unknown,
  ) {
    super(`Diagnostic file logging disabled: cannot write to "${directory}" (${reason(cause)})`, {
      cause,
    });
    this.name = "DiagnosticLogUnavailableError";
  }
}

export class SessionDisposedError extends TelemetryError {
  constructor(what: string) {
    super(`Cannot access ${what}: the telemetry session has been disposed`);
    this.name = "SessionDisposedError";
  }
}
