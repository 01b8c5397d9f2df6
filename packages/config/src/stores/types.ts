/**
 * Hierarchical key/value provider. Keys are `:`-separated paths
 * (e.g. `Elastic:OpenTelemetry:FileLogLevel`) and match case-insensitively.
 */
export interface ConfigurationStore {
  get(key: string): string | undefined;
}
