import createDebug from "debug";
import {
  context,
  metrics,
  propagation,
  trace,
  ProxyTracerProvider,
  type MeterProvider as ApiMeterProvider,
  type TracerProvider,
} from "@opentelemetry/api";
import { logs, type LoggerProvider as ApiLoggerProvider } from "@opentelemetry/api-logs";
import { registerInstrumentations, type Instrumentation } from "@opentelemetry/instrumentation";
import {
  defaultResource,
  detectResources,
  envDetector,
  type Resource,
} from "@opentelemetry/resources";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import {
  BatchSpanProcessor,
  type SpanExporter,
  type SpanProcessor,
} from "@opentelemetry/sdk-trace-base";
import {
  MeterProvider,
  PeriodicExportingMetricReader,
  type MetricReader,
  type PushMetricExporter,
} from "@opentelemetry/sdk-metrics";
import {
  BatchLogRecordProcessor,
  LoggerProvider,
  type LogRecordExporter,
  type LogRecordProcessor,
} from "@opentelemetry/sdk-logs";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-grpc";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-grpc";
import { OTLPLogExporter } from "@opentelemetry/exporter-logs-otlp-grpc";
import { createInstrumentation } from "./instrumentations";

const debug = createDebug("edot:telemetry:sdk");

export type TracesPipeline = {
  resource: Resource;
  spanProcessors: SpanProcessor[];
  /** Wrapped in a batch processor by the SDK. */
  spanExporters: SpanExporter[];
};

export type MetricsPipeline = {
  resource: Resource;
  readers: MetricReader[];
  /** Wrapped in a periodic reader by the SDK. */
  exporters: PushMetricExporter[];
};

export type LogsPipeline = {
  resource: Resource;
  processors: LogRecordProcessor[];
  /** Wrapped in a batch processor by the SDK. */
  exporters: LogRecordExporter[];
};

/**
 * A started provider. Starting never touches the global API; `activate()`
 * registers the provider globally and reports whether it became the global
 * one. `release()` shuts it down and clears a global only while it is still
 * this provider.
 */
export interface ProviderHandle<P> {
  readonly name: string;
  readonly provider: P;
  activate(): boolean;
  release(): Promise<void>;
}

export type StartedProviders = {
  tracerProvider: TracerProvider;
  meterProvider: ApiMeterProvider;
  loggerProvider: ApiLoggerProvider;
};

/**
 * Everything the pipeline builder needs from the OpenTelemetry SDK.
 * Exporters are created without arguments so the SDK resolves the OTLP
 * endpoint and headers from its own environment variables.
 */
export interface TelemetrySdk {
  baseResource(): Resource;
  createOtlpSpanExporter(): SpanExporter;
  createOtlpMetricExporter(): PushMetricExporter;
  createOtlpLogExporter(): LogRecordExporter;
  createInstrumentation(name: string): Instrumentation;
  startTracing(pipeline: TracesPipeline): ProviderHandle<TracerProvider>;
  startMetrics(pipeline: MetricsPipeline): ProviderHandle<ApiMeterProvider>;
  startLogging(pipeline: LogsPipeline): ProviderHandle<ApiLoggerProvider>;
  /** Enables the instrumentations; the returned function disables them again. */
  enableInstrumentations(
    instrumentations: Instrumentation[],
    providers: StartedProviders,
  ): () => void;
}

// The trace API always hands out its proxy; the registered provider is its delegate.
function isGlobalTracerProvider(provider: TracerProvider): boolean {
  const current = trace.getTracerProvider();
  return current instanceof ProxyTracerProvider && current.getDelegate() === provider;
}

/** The Node.js OpenTelemetry SDK, with each provider registered globally on activation. */
export class OpenTelemetrySdk implements TelemetrySdk {
  baseResource(): Resource {
    return defaultResource().merge(detectResources({ detectors: [envDetector] }));
  }

  createOtlpSpanExporter(): SpanExporter {
    return new OTLPTraceExporter();
  }

  createOtlpMetricExporter(): PushMetricExporter {
    return new OTLPMetricExporter();
  }

  createOtlpLogExporter(): LogRecordExporter {
    return new OTLPLogExporter();
  }

  createInstrumentation(name: string): Instrumentation {
    return createInstrumentation(name);
  }

  startTracing(pipeline: TracesPipeline): ProviderHandle<TracerProvider> {
    const provider = new NodeTracerProvider({
      resource: pipeline.resource,
      spanProcessors: [
        ...pipeline.spanProcessors,
        ...pipeline.spanExporters.map((exporter) => new BatchSpanProcessor(exporter)),
      ],
    });

    return {
      name: "tracer-provider",
      provider,
      activate: () => {
        provider.register();
        const registered = isGlobalTracerProvider(provider);
        debug("tracer provider global: %s", registered);
        return registered;
      },
      release: async () => {
        await provider.shutdown();
        if (isGlobalTracerProvider(provider)) {
          trace.disable();
          propagation.disable();
          context.disable();
        }
      },
    };
  }

  startMetrics(pipeline: MetricsPipeline): ProviderHandle<ApiMeterProvider> {
    const provider = new MeterProvider({
      resource: pipeline.resource,
      readers: [
        ...pipeline.readers,
        ...pipeline.exporters.map((exporter) => new PeriodicExportingMetricReader({ exporter })),
      ],
    });

    return {
      name: "meter-provider",
      provider,
      activate: () => {
        const registered = metrics.setGlobalMeterProvider(provider);
        debug("meter provider global: %s", registered);
        return registered;
      },
      release: async () => {
        await provider.shutdown();
        if (metrics.getMeterProvider() === provider) metrics.disable();
      },
    };
  }

  startLogging(pipeline: LogsPipeline): ProviderHandle<ApiLoggerProvider> {
    const provider = new LoggerProvider({
      resource: pipeline.resource,
      processors: [
        ...pipeline.processors,
        ...pipeline.exporters.map((exporter) => new BatchLogRecordProcessor(exporter)),
      ],
    });

    return {
      name: "logger-provider",
      provider,
      activate: () => {
        const registered = logs.setGlobalLoggerProvider(provider) === provider;
        debug("logger provider global: %s", registered);
        return registered;
      },
      release: async () => {
        await provider.shutdown();
        if (logs.getLoggerProvider() === provider) logs.disable();
      },
    };
  }

  enableInstrumentations(
    instrumentations: Instrumentation[],
    providers: StartedProviders,
  ): () => void {
    return registerInstrumentations({ instrumentations, ...providers });
  }
}
