import createDebug from "debug";
import type { TracerProvider, MeterProvider } from "@opentelemetry/api";
import type { LoggerProvider } from "@opentelemetry/api-logs";
import type { OptionName, ResolvedOptions, ValueSource } from "@edot-node/config";
import type { SignalKind, TelemetryLogger } from "@edot-node/types";
import type { ActivationPlan } from "./defaults";
import type { Capability } from "./registration";
import { SessionDisposedError } from "./errors";

const debug = createDebug("edot:telemetry");

/** Anything the session owns and must release. */
export interface OwnedResource {
  readonly name: string;
  release(): Promise<void> | void;
}

/**
 * Resources in acquisition order. Released in reverse; a failing release is
 * logged and the remaining ones still run.
 */
export class ResourceStack {
  private entries: OwnedResource[] = [];

  constructor(
    private readonly log: TelemetryLogger,
    private readonly warnings: TelemetryLogger,
  ) {}

  push(resource: OwnedResource): void {
    debug("acquired %s", resource.name);
    this.entries.push(resource);
  }

  get size(): number {
    return this.entries.length;
  }

  async releaseAll(): Promise<void> {
    const entries = this.entries.reverse();
    this.entries = [];
    for (const entry of entries) {
      this.log.info("Releasing telemetry resource", { resource: entry.name });
      try {
        await entry.release();
        debug("released %s", entry.name);
      } catch (err) {
        this.warnings.warn("Failed to release telemetry resource", {
          resource: entry.name,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}

export type SessionState = "active" | "disposed";

export type SessionParts = {
  options: Readonly<ResolvedOptions>;
  sources: Readonly<Record<OptionName, ValueSource>>;
  plan: ActivationPlan;
  appliedDefaults: Readonly<Record<SignalKind, readonly Capability[]>>;
  tracerProvider: TracerProvider;
  meterProvider: MeterProvider;
  loggerProvider: LoggerProvider;
  /** Whether each signal's provider became the global one. */
  globalProviders: Readonly<Record<SignalKind, boolean>>;
  diagnosticLogFile: string | null;
  resources: ResourceStack;
};

/**
 * A live telemetry pipeline. Sole owner of the providers and the diagnostic
 * log file. `dispose()` releases everything once; later and concurrent calls
 * share the same promise.
 */
export class TelemetrySession {
  private disposing: Promise<void> | null = null;

  constructor(private readonly parts: SessionParts) {}

  get state(): SessionState {
    return this.disposing ? "disposed" : "active";
  }

  get options(): Readonly<ResolvedOptions> {
    return this.parts.options;
  }

  get sources(): Readonly<Record<OptionName, ValueSource>> {
    return this.parts.sources;
  }

  get plan(): ActivationPlan {
    return this.parts.plan;
  }

  /** Default capabilities the builder added for each signal. */
  get appliedDefaults(): Readonly<Record<SignalKind, readonly Capability[]>> {
    return this.parts.appliedDefaults;
  }

  get globalProviders(): Readonly<Record<SignalKind, boolean>> {
    return this.parts.globalProviders;
  }

  get diagnosticLogFile(): string | null {
    return this.parts.diagnosticLogFile;
  }

  get tracerProvider(): TracerProvider {
    this.assertActive("the tracer provider");
    return this.parts.tracerProvider;
  }

  get meterProvider(): MeterProvider {
    this.assertActive("the meter provider");
    return this.parts.meterProvider;
  }

  get loggerProvider(): LoggerProvider {
    this.assertActive("the logger provider");
    return this.parts.loggerProvider;
  }

  dispose(): Promise<void> {
    if (!this.disposing) {
      debug("dispose: releasing %d resources", this.parts.resources.size);
      this.disposing = this.parts.resources.releaseAll();
    }
    return this.disposing;
  }

  private assertActive(what: string): void {
    if (this.disposing) throw new SessionDisposedError(what);
  }
}
