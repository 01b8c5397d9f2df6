export { TelemetryPipelineBuilder } from "./builder";
export type { BuilderState, TelemetryPipelineOptions, TelemetryRegistrar } from "./builder";

export { TelemetrySession, ResourceStack } from "./session";
export type { OwnedResource, SessionParts, SessionState } from "./session";

export { selectDefaults } from "./defaults";
export type { ActivationPlan, ExporterSettings } from "./defaults";

export { RegistrationRecord } from "./registration";
export type { Capability, RegistrationOrigin } from "./registration";

export { OpenTelemetrySdk } from "./sdk";
export type {
  LogsPipeline,
  MetricsPipeline,
  ProviderHandle,
  StartedProviders,
  TelemetrySdk,
  TracesPipeline,
} from "./sdk";

export {
  DEFAULT_INSTRUMENTATIONS,
  HTTP_INSTRUMENTATION,
  UNDICI_INSTRUMENTATION,
  createInstrumentation,
} from "./instrumentations";
export {
  ATTR_TELEMETRY_DISTRO_NAME,
  ATTR_TELEMETRY_DISTRO_VERSION,
  distroResource,
  enrichResource,
} from "./resource";
export { DISTRO_NAME, DISTRO_VERSION } from "./version";

export { openDiagnosticLog, diagnosticLogFileName } from "./file-log";
export type { DiagnosticLog, DiagnosticLogSettings } from "./file-log";
export { TelemetryLoggerImpl, createLogger } from "./logger";
export type { LoggerSettings } from "./logger";
export { NoopLogger, NOOP_LOGGER } from "./noop";

export {
  TelemetryError,
  PipelineAlreadyBuiltError,
  DiagnosticLogUnavailableError,
  SessionDisposedError,
} from "./errors";

export { registerTelemetry, getTelemetrySession } from "./helpers";
export { TELEMETRY_SESSION_TOKEN } from "./tokens";
export { runWithSession } from "./scope";
export { installShutdownHooks } from "./shutdown-hooks";
export type { ShutdownHookOptions } from "./shutdown-hooks";
