import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import {
  InvalidDefaultsCombinationError,
  InvalidOptionValueError,
  MemoryConfigurationStore,
} from "@edot-node/config";
import { TelemetryPipelineBuilder } from "../src/builder";
import { PipelineAlreadyBuiltError } from "../src/errors";
import { HTTP_INSTRUMENTATION, UNDICI_INSTRUMENTATION } from "../src/instrumentations";
import {
  FakeSdk,
  fakeInstrumentation,
  fakeLogger,
  fakeMetricExporter,
  fakeSpanExporter,
  fakeSpanProcessor,
  type FakeLogger,
} from "./fixtures/fake-sdk";

const DISTRO_ATTRIBUTES = {
  "telemetry.distro.name": "elastic",
  "telemetry.distro.version": "0.1.0",
};

describe("TelemetryPipelineBuilder", () => {
  let sdk: FakeSdk;
  let logger: FakeLogger;

  beforeEach(() => {
    sdk = new FakeSdk();
    logger = fakeLogger();
  });

  function builder(settings: ConstructorParameters<typeof TelemetryPipelineBuilder>[0] = {}) {
    return new TelemetryPipelineBuilder({ env: {}, sdk, logger, ...settings });
  }

  describe("with nothing configured", () => {
    it("produces an active session with defaults on every signal", () => {
      const session = builder().build();

      expect(session.state).toBe("active");
      expect(session.plan.defaults).toEqual({ traces: true, metrics: true, logs: true });
      expect(session.plan.registerOtlpExporter).toBe(true);
      expect(session.diagnosticLogFile).toBeNull();
    });

    it("registers an OTLP exporter for all three signals", () => {
      builder().build();

      expect(sdk.otlpExporters.traces).toHaveLength(1);
      expect(sdk.otlpExporters.metrics).toHaveLength(1);
      expect(sdk.otlpExporters.logs).toHaveLength(1);
      expect(sdk.traces?.spanExporters).toEqual(sdk.otlpExporters.traces);
      expect(sdk.metrics?.exporters).toEqual(sdk.otlpExporters.metrics);
      expect(sdk.logs?.exporters).toEqual(sdk.otlpExporters.logs);
    });

    it("creates each default instrumentation once", () => {
      builder().build();

      expect(sdk.createdInstrumentations).toEqual([HTTP_INSTRUMENTATION, UNDICI_INSTRUMENTATION]);
      expect(sdk.enabled?.map((i) => i.instrumentationName)).toEqual([
        HTTP_INSTRUMENTATION,
        UNDICI_INSTRUMENTATION,
      ]);
    });

    it("enriches every signal's resource with the distribution attributes", () => {
      builder().build();

      const expected = { "service.name": "test-service", ...DISTRO_ATTRIBUTES };
      expect(sdk.traces?.resource.attributes).toEqual(expected);
      expect(sdk.metrics?.resource.attributes).toEqual(expected);
      expect(sdk.logs?.resource.attributes).toEqual(expected);
    });

    it("reports the defaults it applied per signal", () => {
      const session = builder().build();

      expect(session.appliedDefaults).toEqual({
        traces: ["instrumentation", "resource", "exporter"],
        metrics: ["instrumentation", "resource", "exporter"],
        logs: ["resource", "exporter"],
      });
    });

    it("reports every option as coming from its default", () => {
      const session = builder().build();

      expect(session.sources).toEqual({
        fileLogDirectory: "default",
        fileLogLevel: "default",
        skipOtlpExporter: "default",
        elasticDefaults: "default",
      });
      expect(session.options.fileLogLevel).toBe("Information");
    });

    it("hands the started providers to the instrumentations", () => {
      builder().build();

      expect(sdk.providers).toEqual({
        tracerProvider: sdk.tracerProvider,
        meterProvider: sdk.meterProvider,
        loggerProvider: sdk.loggerProvider,
      });
    });
  });

  describe("single use", () => {
    it("rejects a second build and leaves the first session active", () => {
      const b = builder();
      const session = b.build();

      expect(() => b.build()).toThrow(PipelineAlreadyBuiltError);
      expect(session.state).toBe("active");
      expect(session.tracerProvider).toBe(sdk.tracerProvider);
      expect(sdk.events.filter((e) => e === "start:traces")).toHaveLength(1);
    });

    it("rejects registrations after build", () => {
      const b = builder();
      b.build();

      expect(b.state).toBe("finalized");
      expect(() => b.addSpanExporter(fakeSpanExporter())).toThrow(PipelineAlreadyBuiltError);
      expect(() => b.setResource("logs", resourceFromAttributes({}))).toThrow(
        PipelineAlreadyBuiltError,
      );
    });
  });

  describe("caller registrations", () => {
    it("suppresses the default exporter for the caller's signal only", () => {
      const exporter = fakeSpanExporter();
      builder().addSpanExporter(exporter).build();

      expect(sdk.traces?.spanExporters).toEqual([exporter]);
      expect(sdk.otlpExporters.traces).toHaveLength(0);
      expect(sdk.otlpExporters.metrics).toHaveLength(1);
      expect(sdk.otlpExporters.logs).toHaveLength(1);
    });

    it("keeps the caller's span processors next to the default exporter", () => {
      const processor = fakeSpanProcessor();
      builder().addSpanProcessor(processor).build();

      expect(sdk.traces?.spanProcessors).toEqual([processor]);
      expect(sdk.otlpExporters.traces).toHaveLength(1);
    });

    it("treats a metric reader as the caller's metrics exporter", () => {
      const reader = new PeriodicExportingMetricReader({ exporter: fakeMetricExporter() });
      const session = builder().addMetricReader(reader).build();

      expect(sdk.metrics?.readers).toEqual([reader]);
      expect(sdk.otlpExporters.metrics).toHaveLength(0);
      expect(session.appliedDefaults.metrics).toEqual(["instrumentation", "resource"]);
    });

    it("replaces a default instrumentation of the same name", () => {
      const custom = fakeInstrumentation(HTTP_INSTRUMENTATION);
      builder().addInstrumentation("traces", custom).build();

      expect(sdk.createdInstrumentations).toEqual([UNDICI_INSTRUMENTATION]);
      expect(sdk.enabled).toHaveLength(2);
      expect(sdk.enabled?.[0]).toBe(custom);
    });

    it("keeps the caller's resource and enriches the others", () => {
      const resource = resourceFromAttributes({ "service.name": "checkout" });
      const session = builder().setResource("metrics", resource).build();

      expect(sdk.metrics?.resource).toBe(resource);
      expect(sdk.traces?.resource.attributes).toMatchObject(DISTRO_ATTRIBUTES);
      expect(session.appliedDefaults.metrics).toEqual(["instrumentation", "exporter"]);
    });

    it("returns the builder from every registration", () => {
      const b = builder();
      expect(b.addSpanExporter(fakeSpanExporter())).toBe(b);
      expect(b.addMetricExporter(fakeMetricExporter())).toBe(b);
    });
  });

  describe("configured defaults", () => {
    it("adds no instrumentation or enrichment for None but keeps the exporter", () => {
      const session = builder({ options: { elasticDefaults: ["None"] } }).build();

      expect(sdk.createdInstrumentations).toEqual([]);
      expect(sdk.enabled).toEqual([]);
      expect(sdk.traces?.resource.attributes).toEqual({ "service.name": "test-service" });
      expect(sdk.otlpExporters.traces).toHaveLength(1);
      expect(session.appliedDefaults).toEqual({
        traces: ["exporter"],
        metrics: ["exporter"],
        logs: ["exporter"],
      });
    });

    it("limits enrichment to the listed signals", () => {
      builder({ env: { ELASTIC_OTEL_DEFAULTS_ENABLED: "Traces" } }).build();

      expect(sdk.traces?.resource.attributes).toMatchObject(DISTRO_ATTRIBUTES);
      expect(sdk.metrics?.resource.attributes).toEqual({ "service.name": "test-service" });
      expect(sdk.logs?.resource.attributes).toEqual({ "service.name": "test-service" });
    });

    it("registers no OTLP exporter when the environment skips it", () => {
      const session = builder({ env: { ELASTIC_OTEL_SKIP_OTLP_EXPORTER: "true" } }).build();

      expect(sdk.otlpExporters).toEqual({ traces: [], metrics: [], logs: [] });
      expect(session.plan.registerOtlpExporter).toBe(false);
      expect(sdk.createdInstrumentations).toHaveLength(2);
    });

    it("reads options from structured configuration", () => {
      const configuration = new MemoryConfigurationStore({
        Elastic: { OpenTelemetry: { SkipOtlpExporter: true } },
      });
      const session = builder({ configuration }).build();

      expect(session.options.skipOtlpExporter).toBe(true);
      expect(session.sources.skipOtlpExporter).toBe("structured");
      expect(sdk.otlpExporters.traces).toHaveLength(0);
    });

    it("lets explicit options win over the environment", () => {
      const session = builder({
        options: { skipOtlpExporter: false },
        env: { ELASTIC_OTEL_SKIP_OTLP_EXPORTER: "true" },
      }).build();

      expect(session.sources.skipOtlpExporter).toBe("explicit");
      expect(sdk.otlpExporters.traces).toHaveLength(1);
    });
  });

  describe("failures", () => {
    it("fails on an invalid defaults combination before touching the SDK", () => {
      const b = builder({ env: { ELASTIC_OTEL_DEFAULTS_ENABLED: "None,Logs" } });

      expect(() => b.build()).toThrow(InvalidDefaultsCombinationError);
      expect(sdk.events).toEqual([]);
      expect(sdk.createdInstrumentations).toEqual([]);
      expect(b.state).toBe("finalized");
    });

    it("fails on a malformed environment value before touching the SDK", () => {
      const b = builder({ env: { ELASTIC_OTEL_SKIP_OTLP_EXPORTER: "yes" } });

      expect(() => b.build()).toThrow(InvalidOptionValueError);
      expect(sdk.events).toEqual([]);
    });

    it("releases the providers already started when a later one fails", () => {
      sdk.failOn = "metrics";

      expect(() => builder().build()).toThrow("metrics failed to start");
      expect(sdk.events).toEqual(["start:traces", "release:traces"]);
      expect(logger.error).toHaveBeenCalledWith(
        "Telemetry pipeline failed to start; releasing started components",
        { error: "metrics failed to start" },
      );
    });

    it("activates no provider when instrumentations fail to enable", () => {
      sdk.failOn = "instrumentations";

      expect(() => builder().build()).toThrow("instrumentations failed to enable");
      expect(sdk.events.filter((e) => e.startsWith("activate:"))).toEqual([]);
    });
  });

  describe("global registration", () => {
    it("activates the providers only after everything has started", () => {
      builder().build();

      expect(sdk.events).toEqual([
        "start:traces",
        "start:metrics",
        "start:logs",
        "start:instrumentations",
        "activate:traces",
        "activate:metrics",
        "activate:logs",
      ]);
    });

    it("reports every provider as global when registration succeeds", () => {
      const session = builder().build();

      expect(session.globalProviders).toEqual({ traces: true, metrics: true, logs: true });
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("warns and keeps the providers local when globals are already taken", () => {
      sdk.globalsTaken = true;

      const session = builder().build();

      expect(session.globalProviders).toEqual({ traces: false, metrics: false, logs: false });
      expect(logger.warn).toHaveBeenCalledWith(
        "A global provider is already registered; this session's provider stays local",
        { provider: "traces-provider" },
      );
      expect(logger.warn).toHaveBeenCalledTimes(3);
    });
  });

  describe("diagnostic file log", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "edot-builder-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("writes the resolution and shutdown to the log file", async () => {
      const logDir = join(dir, "logs");
      const session = builder({
        options: { fileLogDirectory: logDir, fileLogLevel: "Information" },
        processName: "test-app",
      }).build();

      expect(session.diagnosticLogFile).toMatch(
        new RegExp(`^${logDir}/test-app_\\d{8}-\\d{6}_${process.pid}\\.instrumentation\\.log$`),
      );

      await session.dispose();

      const lines = readFileSync(session.diagnosticLogFile ?? "", "utf8")
        .split("\n")
        .filter(Boolean)
        .map((l) => JSON.parse(l) as Record<string, unknown>);

      expect(lines).toContainEqual(
        expect.objectContaining({
          msg: "Configuration option resolved",
          option: "fileLogLevel",
          value: "Information",
          source: "explicit",
        }),
      );
      expect(lines).toContainEqual(
        expect.objectContaining({
          msg: "Configuration option resolved",
          option: "elasticDefaults",
          value: "All",
          source: "default",
        }),
      );
      expect(
        lines.filter((l) => l.msg === "Releasing telemetry resource").map((l) => l.resource),
      ).toEqual([
        "instrumentations",
        "logs-provider",
        "metrics-provider",
        "traces-provider",
        "diagnostic-log",
      ]);
    });

    it("builds without file logging when the directory cannot be created", () => {
      const blocker = join(dir, "blocker");
      writeFileSync(blocker, "not a directory");
      const logDir = join(blocker, "logs");

      const session = builder({ options: { fileLogDirectory: logDir } }).build();

      expect(session.state).toBe("active");
      expect(session.diagnosticLogFile).toBeNull();
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringContaining(`Diagnostic file logging disabled: cannot write to "${logDir}"`),
        expect.objectContaining({ directory: logDir }),
      );
    });

    it("does not open a file when the level is None", () => {
      const session = builder({
        options: { fileLogDirectory: join(dir, "logs"), fileLogLevel: "None" },
      }).build();

      expect(session.diagnosticLogFile).toBeNull();
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });
});
