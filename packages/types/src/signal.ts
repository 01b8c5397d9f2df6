/** The three kinds of telemetry data a pipeline carries. */
export type SignalKind = "traces" | "metrics" | "logs";

export const SIGNAL_KINDS: readonly SignalKind[] = ["traces", "metrics", "logs"];
