import { HttpInstrumentation } from "@opentelemetry/instrumentation-http";
import { UndiciInstrumentation } from "@opentelemetry/instrumentation-undici";
import type { Instrumentation } from "@opentelemetry/instrumentation";
import type { SignalKind } from "@edot-node/types";

export const HTTP_INSTRUMENTATION = "@opentelemetry/instrumentation-http";
export const UNDICI_INSTRUMENTATION = "@opentelemetry/instrumentation-undici";

/**
 * Instrumentation sources enabled by default, per signal. The HTTP and
 * undici instrumentations record client/server duration metrics as well as
 * spans, so they serve both signals and are only created once.
 */
export const DEFAULT_INSTRUMENTATIONS: Readonly<Record<SignalKind, readonly string[]>> = {
  traces: [HTTP_INSTRUMENTATION, UNDICI_INSTRUMENTATION],
  metrics: [HTTP_INSTRUMENTATION, UNDICI_INSTRUMENTATION],
  logs: [],
};

// Created disabled: registerInstrumentations() enables them once the
// providers exist, so nothing is patched before build() succeeds.
const FACTORIES: Record<string, () => Instrumentation> = {
  [HTTP_INSTRUMENTATION]: () => new HttpInstrumentation({ enabled: false }) as Instrumentation,
  [UNDICI_INSTRUMENTATION]: () => new UndiciInstrumentation({ enabled: false }) as Instrumentation,
};

export function createInstrumentation(name: string): Instrumentation {
  const factory = FACTORIES[name];
  if (!factory) {
    throw new Error(`No default instrumentation named "${name}"`);
  }
  return factory();
}
