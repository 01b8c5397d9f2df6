export {
  describe,
  parseDefaultsFlags,
  formatDefaultsFlags,
  toPinoLevel,
  OPTION_DEFAULTS,
  STRUCTURED_NAMESPACE,
} from "./options";
export type {
  AnyOptionDescriptor,
  DefaultsFlag,
  ElasticOpenTelemetryOptions,
  FileLogLevel,
  OptionDescriptor,
  OptionName,
  OptionValueType,
  PartialOptions,
  ResolvedOptions,
} from "./options";

export {
  ConfigurationError,
  InvalidOptionValueError,
  UnknownDefaultsFlagError,
  InvalidDefaultsCombinationError,
} from "./errors";

export type { OptionSource, SourceKind } from "./readers/types";
export { environmentSource } from "./readers/environment";
export type { Environment } from "./readers/environment";
export { structuredSource } from "./readers/structured";
export { explicitSource } from "./readers/explicit";
export { readPartial } from "./readers/partial";

export { resolveOptions, resolveFromSources } from "./resolver";
export type { OptionInputs, ResolvedOptionSet, ValueSource } from "./resolver";

export type { ConfigurationStore } from "./stores/types";
export { MemoryConfigurationStore } from "./stores/memory";
export { JsonFileConfigurationStore } from "./stores/json-file";
export { EnvironmentConfigurationStore } from "./stores/environment";
export { LayeredConfigurationStore } from "./stores/layered";
