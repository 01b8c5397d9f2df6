import createDebug from "debug";
import type { Instrumentation } from "@opentelemetry/instrumentation";
import type { Resource } from "@opentelemetry/resources";
import type { SpanExporter, SpanProcessor } from "@opentelemetry/sdk-trace-base";
import type { MetricReader, PushMetricExporter } from "@opentelemetry/sdk-metrics";
import type { LogRecordExporter, LogRecordProcessor } from "@opentelemetry/sdk-logs";
import {
  describe,
  formatDefaultsFlags,
  resolveFromSources,
  type OptionInputs,
  type ResolvedOptionSet,
} from "@edot-node/config";
import { SIGNAL_KINDS, type SignalKind, type TelemetryLogger } from "@edot-node/types";
import { selectDefaults, type ActivationPlan } from "./defaults";
import { PipelineAlreadyBuiltError } from "./errors";
import { openDiagnosticLog } from "./file-log";
import { DEFAULT_INSTRUMENTATIONS } from "./instrumentations";
import { createLogger } from "./logger";
import { NOOP_LOGGER } from "./noop";
import { RegistrationRecord, type Capability, type RegistrationOrigin } from "./registration";
import { enrichResource } from "./resource";
import { OpenTelemetrySdk, type ProviderHandle, type TelemetrySdk } from "./sdk";
import { ResourceStack, TelemetrySession } from "./session";

const debug = createDebug("edot:telemetry");

export type TelemetryPipelineOptions = OptionInputs & {
  /** The SDK collaborator. Defaults to the Node.js OpenTelemetry SDK. */
  sdk?: TelemetrySdk;
  /** Receives the pipeline's warnings. Defaults to JSON on stderr. */
  logger?: TelemetryLogger;
  /** Used in the diagnostic log file name. Defaults to the entry script's name. */
  processName?: string;
};

export type BuilderState = "building" | "finalized";

/**
 * The registration surface shared by caller code and the defaults the
 * builder layers on top. Every method returns the registrar for chaining.
 */
export interface TelemetryRegistrar {
  addSpanProcessor(processor: SpanProcessor): this;
  addSpanExporter(exporter: SpanExporter): this;
  addMetricReader(reader: MetricReader): this;
  addMetricExporter(exporter: PushMetricExporter): this;
  addLogRecordProcessor(processor: LogRecordProcessor): this;
  addLogRecordExporter(exporter: LogRecordExporter): this;
  addInstrumentation(signal: SignalKind, instrumentation: Instrumentation): this;
  setResource(signal: SignalKind, resource: Resource): this;
}

/**
 * Single-use assembly of a telemetry pipeline.
 *
 * Caller registrations always win: on `build()` the opinionated defaults are
 * only added for the capabilities the caller left empty on each signal.
 */
export class TelemetryPipelineBuilder implements TelemetryRegistrar {
  private currentState: BuilderState = "building";
  private readonly record = new RegistrationRecord();
  private readonly sdk: TelemetrySdk;
  private readonly warnings: TelemetryLogger;

  private readonly spanProcessors: SpanProcessor[] = [];
  private readonly spanExporters: SpanExporter[] = [];
  private readonly metricReaders: MetricReader[] = [];
  private readonly metricExporters: PushMetricExporter[] = [];
  private readonly logProcessors: LogRecordProcessor[] = [];
  private readonly logExporters: LogRecordExporter[] = [];
  private readonly instrumentations: Instrumentation[] = [];
  private readonly resources = new Map<SignalKind, Resource>();
  private readonly applied: Record<SignalKind, Set<Capability>> = {
    traces: new Set(),
    metrics: new Set(),
    logs: new Set(),
  };

  constructor(private readonly settings: TelemetryPipelineOptions = {}) {
    this.sdk = settings.sdk ?? new OpenTelemetrySdk();
    this.warnings = settings.logger ?? createLogger();
  }

  get state(): BuilderState {
    return this.currentState;
  }

  addSpanProcessor(processor: SpanProcessor): this {
    this.assertBuilding();
    return this.register("traces", "processor", "caller", () =>
      this.spanProcessors.push(processor),
    );
  }

  addSpanExporter(exporter: SpanExporter): this {
    this.assertBuilding();
    return this.register("traces", "exporter", "caller", () => this.spanExporters.push(exporter));
  }

  /** A reader is the metrics sink, so it stands in for the exporter as well. */
  addMetricReader(reader: MetricReader): this {
    this.assertBuilding();
    return this.register("metrics", "exporter", "caller", () => this.metricReaders.push(reader));
  }

  addMetricExporter(exporter: PushMetricExporter): this {
    this.assertBuilding();
    return this.register("metrics", "exporter", "caller", () =>
      this.metricExporters.push(exporter),
    );
  }

  addLogRecordProcessor(processor: LogRecordProcessor): this {
    this.assertBuilding();
    return this.register("logs", "processor", "caller", () => this.logProcessors.push(processor));
  }

  addLogRecordExporter(exporter: LogRecordExporter): this {
    this.assertBuilding();
    return this.register("logs", "exporter", "caller", () => this.logExporters.push(exporter));
  }

  addInstrumentation(signal: SignalKind, instrumentation: Instrumentation): this {
    this.assertBuilding();
    this.record.recordInstrumentation(signal, instrumentation.instrumentationName);
    return this.register(signal, "instrumentation", "caller", () =>
      this.addUniqueInstrumentation(instrumentation.instrumentationName, () => instrumentation),
    );
  }

  setResource(signal: SignalKind, resource: Resource): this {
    this.assertBuilding();
    return this.register(signal, "resource", "caller", () => this.resources.set(signal, resource));
  }

  /**
   * Resolves the options, layers the defaults and starts the providers.
   * Configuration errors surface before anything is started; if a provider
   * fails to start, whatever was already acquired is released again.
   */
  build(): TelemetrySession {
    this.assertBuilding();
    this.currentState = "finalized";

    const resolved = resolveFromSources(this.settings);
    const { values } = resolved;
    const plan = selectDefaults(values.elasticDefaults, {
      skipOtlpExporter: values.skipOtlpExporter,
      env: this.settings.env,
    });

    const diagnostics = openDiagnosticLog(
      {
        directory: values.fileLogDirectory,
        level: values.fileLogLevel,
        processName: this.settings.processName,
      },
      this.warnings,
    );
    const log = diagnostics?.logger ?? NOOP_LOGGER;
    const owned = new ResourceStack(log, this.warnings);
    if (diagnostics) {
      owned.push({ name: "diagnostic-log", release: () => diagnostics.close() });
    }

    logResolution(log, resolved, plan);

    try {
      this.applyDefaults(plan, log);

      const tracing = this.sdk.startTracing({
        resource: this.resourceFor("traces"),
        spanProcessors: [...this.spanProcessors],
        spanExporters: [...this.spanExporters],
      });
      owned.push(tracing);

      const metering = this.sdk.startMetrics({
        resource: this.resourceFor("metrics"),
        readers: [...this.metricReaders],
        exporters: [...this.metricExporters],
      });
      owned.push(metering);

      const logging = this.sdk.startLogging({
        resource: this.resourceFor("logs"),
        processors: [...this.logProcessors],
        exporters: [...this.logExporters],
      });
      owned.push(logging);

      const disable = this.sdk.enableInstrumentations([...this.instrumentations], {
        tracerProvider: tracing.provider,
        meterProvider: metering.provider,
        loggerProvider: logging.provider,
      });
      owned.push({ name: "instrumentations", release: disable });

      // Last step: a failure above leaves nothing registered globally.
      const globalProviders: Record<SignalKind, boolean> = {
        traces: this.activate(tracing, log),
        metrics: this.activate(metering, log),
        logs: this.activate(logging, log),
      };

      log.info("Telemetry pipeline started", {
        instrumentations: this.instrumentations.map((i) => i.instrumentationName),
      });

      return new TelemetrySession({
        options: values,
        sources: resolved.sources,
        plan,
        appliedDefaults: {
          traces: [...this.applied.traces],
          metrics: [...this.applied.metrics],
          logs: [...this.applied.logs],
        },
        tracerProvider: tracing.provider,
        meterProvider: metering.provider,
        loggerProvider: logging.provider,
        globalProviders,
        diagnosticLogFile: diagnostics?.path ?? null,
        resources: owned,
      });
    } catch (err) {
      this.warnings.error("Telemetry pipeline failed to start; releasing started components", {
        error: err instanceof Error ? err.message : String(err),
      });
      void owned.releaseAll();
      throw err;
    }
  }

  private activate(handle: ProviderHandle<unknown>, log: TelemetryLogger): boolean {
    if (handle.activate()) {
      log.info("Provider registered globally", { provider: handle.name });
      return true;
    }
    this.warnings.warn(
      "A global provider is already registered; this session's provider stays local",
      { provider: handle.name },
    );
    return false;
  }

  private applyDefaults(plan: ActivationPlan, log: TelemetryLogger): void {
    const base = this.sdk.baseResource();

    for (const signal of SIGNAL_KINDS) {
      if (plan.defaults[signal]) {
        for (const name of DEFAULT_INSTRUMENTATIONS[signal]) {
          if (this.record.hasInstrumentation(name)) {
            log.debug("Default instrumentation replaced by caller", {
              signal,
              instrumentation: name,
            });
            continue;
          }
          this.register(signal, "instrumentation", "default", () =>
            this.addUniqueInstrumentation(name, () => this.sdk.createInstrumentation(name)),
          );
        }

        if (this.record.has(signal, "resource")) {
          log.debug("Caller resource kept", { signal });
        } else {
          this.register(signal, "resource", "default", () =>
            this.resources.set(signal, enrichResource(base)),
          );
        }
      }

      if (!this.resources.has(signal)) this.resources.set(signal, base);

      if (!plan.registerOtlpExporter) continue;
      if (this.record.has(signal, "exporter")) {
        log.info("OTLP exporter not added: caller registered an exporter", { signal });
        continue;
      }
      this.register(signal, "exporter", "default", () => this.addOtlpExporter(signal));
    }

    log.info("Defaults applied", {
      traces: [...this.applied.traces],
      metrics: [...this.applied.metrics],
      logs: [...this.applied.logs],
    });
  }

  private addOtlpExporter(signal: SignalKind): void {
    switch (signal) {
      case "traces":
        this.spanExporters.push(this.sdk.createOtlpSpanExporter());
        break;
      case "metrics":
        this.metricExporters.push(this.sdk.createOtlpMetricExporter());
        break;
      case "logs":
        this.logExporters.push(this.sdk.createOtlpLogExporter());
        break;
    }
  }

  private addUniqueInstrumentation(name: string, create: () => Instrumentation): void {
    if (this.instrumentations.some((i) => i.instrumentationName === name)) {
      debug("instrumentation %s already registered", name);
      return;
    }
    this.instrumentations.push(create());
  }

  private resourceFor(signal: SignalKind): Resource {
    const resource = this.resources.get(signal);
    if (!resource) {
      throw new Error(`No resource prepared for ${signal}`);
    }
    return resource;
  }

  /** The one path through which caller and default registrations flow. */
  private register(
    signal: SignalKind,
    capability: Capability,
    origin: RegistrationOrigin,
    apply: () => unknown,
  ): this {
    apply();
    if (origin === "caller") {
      this.record.record(signal, capability);
    } else {
      this.applied[signal].add(capability);
    }
    debug("register %s %s (%s)", signal, capability, origin);
    return this;
  }

  private assertBuilding(): void {
    if (this.currentState !== "building") {
      throw new PipelineAlreadyBuiltError();
    }
  }
}

function logResolution(
  log: TelemetryLogger,
  resolved: ResolvedOptionSet,
  plan: ActivationPlan,
): void {
  for (const descriptor of describe()) {
    const value = resolved.values[descriptor.name];
    log.info("Configuration option resolved", {
      option: descriptor.name,
      value: value instanceof Set ? formatDefaultsFlags(resolved.values.elasticDefaults) : value,
      source: resolved.sources[descriptor.name],
    });
  }
  log.info("Activation plan", {
    traces: plan.defaults.traces,
    metrics: plan.defaults.metrics,
    logs: plan.defaults.logs,
    registerOtlpExporter: plan.registerOtlpExporter,
    otlpEndpointConfigured: plan.otlpEndpointConfigured,
  });
}
