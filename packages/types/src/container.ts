import type { InjectionToken, Provider } from "./common";

/** The subset of a DI container the telemetry registration relies on. */
export interface ServiceContainer {
  register<T>(token: InjectionToken, provider: Provider<T>): void;
  resolve<T>(token: InjectionToken): Promise<T>;
  has(token: InjectionToken): boolean;
  closeAll(): Promise<void>;
}
