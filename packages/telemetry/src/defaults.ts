import {
  InvalidDefaultsCombinationError,
  formatDefaultsFlags,
  parseDefaultsFlags,
  type DefaultsFlag,
  type Environment,
} from "@edot-node/config";
import type { SignalKind } from "@edot-node/types";

const SIGNAL_FLAGS: Record<SignalKind, DefaultsFlag> = {
  traces: "Traces",
  metrics: "Metrics",
  logs: "Logs",
};

const ENDPOINT_VARIABLES = [
  "OTEL_EXPORTER_OTLP_ENDPOINT",
  "OTEL_EXPORTER_OTLP_TRACES_ENDPOINT",
  "OTEL_EXPORTER_OTLP_METRICS_ENDPOINT",
  "OTEL_EXPORTER_OTLP_LOGS_ENDPOINT",
];

export type ActivationPlan = {
  /** Whether each signal gets the opinionated defaults. */
  readonly defaults: Readonly<Record<SignalKind, boolean>>;
  readonly registerOtlpExporter: boolean;
  /**
   * Whether an OTLP endpoint is set in the environment. Informational: the
   * SDK falls back to its localhost default when it is not.
   */
  readonly otlpEndpointConfigured: boolean;
};

export type ExporterSettings = {
  skipOtlpExporter: boolean;
  /** Where the SDK's own OTLP settings are read from. Defaults to `process.env`. */
  env?: Environment;
};

function toFlagSet(flags: string | Iterable<DefaultsFlag>): ReadonlySet<DefaultsFlag> {
  return typeof flags === "string" ? parseDefaultsFlags(flags) : new Set(flags);
}

/**
 * Decides which signals receive the opinionated defaults and whether the
 * OTLP exporter is registered.
 *
 * - no flags → every signal
 * - `None` → no signal; combined with anything else it is an error
 * - otherwise a signal is on when its own flag or `All` is present
 *
 * The exporter decision only depends on `skipOtlpExporter`.
 */
export function selectDefaults(
  flags: string | Iterable<DefaultsFlag>,
  exporter: ExporterSettings = { skipOtlpExporter: false },
): ActivationPlan {
  const set = toFlagSet(flags);

  if (set.has("None") && set.size > 1) {
    throw new InvalidDefaultsCombinationError(formatDefaultsFlags(set).split(","));
  }

  const all = set.size === 0 || set.has("All");
  const none = set.has("None");
  const enabled = (signal: SignalKind) => !none && (all || set.has(SIGNAL_FLAGS[signal]));
  const defaults: Record<SignalKind, boolean> = {
    traces: enabled("traces"),
    metrics: enabled("metrics"),
    logs: enabled("logs"),
  };

  const env = exporter.env ?? process.env;
  return {
    defaults,
    registerOtlpExporter: !exporter.skipOtlpExporter,
    otlpEndpointConfigured: ENDPOINT_VARIABLES.some((name) => !!env[name]?.trim()),
  };
}
