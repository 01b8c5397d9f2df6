import { describe, it, expect } from "vitest";
import {
  DEFAULT_INSTRUMENTATIONS,
  HTTP_INSTRUMENTATION,
  UNDICI_INSTRUMENTATION,
  createInstrumentation,
} from "../src/instrumentations";

describe("DEFAULT_INSTRUMENTATIONS", () => {
  it("shares the HTTP client and server instrumentations between traces and metrics", () => {
    expect(DEFAULT_INSTRUMENTATIONS.traces).toEqual([HTTP_INSTRUMENTATION, UNDICI_INSTRUMENTATION]);
    expect(DEFAULT_INSTRUMENTATIONS.metrics).toEqual(DEFAULT_INSTRUMENTATIONS.traces);
  });

  it("has no default instrumentation for logs", () => {
    expect(DEFAULT_INSTRUMENTATIONS.logs).toEqual([]);
  });
});

describe("createInstrumentation", () => {
  it.each([HTTP_INSTRUMENTATION, UNDICI_INSTRUMENTATION])("creates %s disabled", (name) => {
    const instrumentation = createInstrumentation(name);

    expect(instrumentation.instrumentationName).toBe(name);
    expect(instrumentation.getConfig().enabled).toBe(false);
  });

  it("rejects an unknown name", () => {
    expect(() => createInstrumentation("@opentelemetry/instrumentation-fs")).toThrow(
      'No default instrumentation named "@opentelemetry/instrumentation-fs"',
    );
  });
});
