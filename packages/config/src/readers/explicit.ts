import type {
  DefaultsFlag,
  ElasticOpenTelemetryOptions,
  OptionDescriptor,
  OptionName,
  PartialOptions,
  ResolvedOptions,
} from "../options";
import type { OptionSource } from "./types";

function toPartial(options: ElasticOpenTelemetryOptions): PartialOptions {
  const partial: PartialOptions = {};
  if (options.fileLogDirectory !== undefined) partial.fileLogDirectory = options.fileLogDirectory;
  if (options.fileLogLevel !== undefined) partial.fileLogLevel = options.fileLogLevel;
  if (options.skipOtlpExporter !== undefined) partial.skipOtlpExporter = options.skipOtlpExporter;
  if (options.elasticDefaults !== undefined) {
    partial.elasticDefaults = new Set<DefaultsFlag>(options.elasticDefaults);
  }
  return partial;
}

/** Options set in code. Every field that is not `undefined` is supplied as-is. */
export function explicitSource(options: ElasticOpenTelemetryOptions = {}): OptionSource {
  const values = toPartial(options);
  return {
    kind: "explicit",
    read<K extends OptionName>(descriptor: OptionDescriptor<K>): ResolvedOptions[K] | undefined {
      return values[descriptor.name];
    },
  };
}
