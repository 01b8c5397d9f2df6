function from(origin?: string): string {
  return origin ? ` (from ${origin})` : "";
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A raw value for a known option could not be converted to the option's type. */
export class InvalidOptionValueError extends ConfigurationError {
  constructor(
    public readonly option: string,
    public readonly value: string,
    public readonly expected: string,
    public readonly origin?: string,
  ) {
    super(`Invalid value "${value}" for option "${option}"${from(origin)}: expected ${expected}`);
    this.name = "InvalidOptionValueError";
  }
}

export class UnknownDefaultsFlagError extends ConfigurationError {
  constructor(
    public readonly token: string,
    public readonly origin?: string,
  ) {
    super(
      `Unknown defaults flag "${token}"${from(origin)}. ` +
        "Expected a comma-separated list of None, Traces, Metrics, Logs or All.",
    );
    this.name = "UnknownDefaultsFlagError";
  }
}

export class InvalidDefaultsCombinationError extends ConfigurationError {
  constructor(public readonly flags: readonly string[]) {
    super(`"None" cannot be combined with other defaults flags (got ${flags.join(",")})`);
    this.name = "InvalidDefaultsCombinationError";
  }
}
