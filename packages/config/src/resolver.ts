import createDebug from "debug";
import {
  describe,
  OPTION_DEFAULTS,
  type ElasticOpenTelemetryOptions,
  type OptionDescriptor,
  type OptionName,
  type ResolvedOptions,
} from "./options";
import type { OptionSource, SourceKind } from "./readers/types";
import { environmentSource, type Environment } from "./readers/environment";
import { explicitSource } from "./readers/explicit";
import { structuredSource } from "./readers/structured";
import type { ConfigurationStore } from "./stores/types";
import { MemoryConfigurationStore } from "./stores/memory";

const debug = createDebug("edot:config");

export type ValueSource = SourceKind | "default";

export type ResolvedOptionSet = {
  readonly values: Readonly<ResolvedOptions>;
  /** Where each final value came from. */
  readonly sources: Readonly<Record<OptionName, ValueSource>>;
};

type Resolution<K extends OptionName> = {
  value: ResolvedOptions[K];
  source: ValueSource;
};

function resolveOne<K extends OptionName>(
  descriptor: OptionDescriptor<K>,
  sources: readonly OptionSource[],
): Resolution<K> {
  for (const source of sources) {
    const value = source.read(descriptor);
    if (value !== undefined) return { value, source: source.kind };
  }
  return { value: descriptor.defaultValue, source: "default" };
}

/**
 * Merges the three sources with the fixed precedence
 * explicit > environment > structured > descriptor default.
 *
 * Each option is resolved on its own: the first source that supplies it wins
 * and lower sources are never read for that option, so a malformed value
 * further down cannot fail resolution.
 */
export function resolveOptions(
  explicit: OptionSource,
  environment: OptionSource,
  structured: OptionSource,
): ResolvedOptionSet {
  const ordered = [explicit, environment, structured];
  const values: Partial<ResolvedOptions> = {};
  const sources: Partial<Record<OptionName, ValueSource>> = {};

  for (const descriptor of describe()) {
    const { value, source } = resolveOne(descriptor, ordered);
    assign(values, descriptor.name, value);
    sources[descriptor.name] = source;
    debug("resolve %s ← %s", descriptor.name, source);
  }

  return { values: complete(values), sources: completeSources(sources) };
}

function assign<K extends OptionName>(
  target: Partial<ResolvedOptions>,
  name: K,
  value: ResolvedOptions[K],
): void {
  target[name] = value;
}

function complete(values: Partial<ResolvedOptions>): ResolvedOptions {
  return { ...OPTION_DEFAULTS, ...values };
}

function completeSources(
  sources: Partial<Record<OptionName, ValueSource>>,
): Record<OptionName, ValueSource> {
  return {
    fileLogDirectory: sources.fileLogDirectory ?? "default",
    fileLogLevel: sources.fileLogLevel ?? "default",
    skipOtlpExporter: sources.skipOtlpExporter ?? "default",
    elasticDefaults: sources.elasticDefaults ?? "default",
  };
}

export type OptionInputs = {
  /** Options set in code. */
  options?: ElasticOpenTelemetryOptions;
  /** Defaults to `process.env`. */
  env?: Environment;
  /** Structured configuration; empty when omitted. */
  configuration?: ConfigurationStore;
};

/** Builds the three readers from raw inputs and resolves them. */
export function resolveFromSources(inputs: OptionInputs = {}): ResolvedOptionSet {
  return resolveOptions(
    explicitSource(inputs.options),
    environmentSource(inputs.env),
    structuredSource(inputs.configuration ?? new MemoryConfigurationStore()),
  );
}
