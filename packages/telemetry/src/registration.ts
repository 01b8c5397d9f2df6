import type { SignalKind } from "@edot-node/types";

export type Capability = "exporter" | "processor" | "instrumentation" | "resource";

export type RegistrationOrigin = "caller" | "default";

/**
 * Tracks what the caller registered per signal, so that defaults are only
 * layered where the caller left a gap.
 */
export class RegistrationRecord {
  private readonly capabilities = new Map<SignalKind, Set<Capability>>();
  private readonly instrumentations = new Set<string>();

  record(signal: SignalKind, capability: Capability): void {
    let set = this.capabilities.get(signal);
    if (!set) {
      set = new Set();
      this.capabilities.set(signal, set);
    }
    set.add(capability);
  }

  recordInstrumentation(signal: SignalKind, name: string): void {
    this.record(signal, "instrumentation");
    this.instrumentations.add(name);
  }

  has(signal: SignalKind, capability: Capability): boolean {
    return this.capabilities.get(signal)?.has(capability) ?? false;
  }

  hasInstrumentation(name: string): boolean {
    return this.instrumentations.has(name);
  }

  capabilitiesOf(signal: SignalKind): readonly Capability[] {
    return [...(this.capabilities.get(signal) ?? [])];
  }
}
