export type {
  Type,
  InjectionToken,
  ClassProvider,
  FactoryProvider,
  ValueProvider,
  Provider,
} from "./common";

export type { ServiceContainer } from "./container";

export type { SignalKind } from "./signal";
export { SIGNAL_KINDS } from "./signal";

export type { LogLevel, TelemetryLogger } from "./telemetry";
