import { LogFormat } from "@logging/core/domain";
import { observabilityConfig } from "./observability.config";

describe("observabilityConfig", () => {
  const saved = { ...process.env };

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_FORMAT;
    delete process.env.METRICS_ENABLED;
    delete process.env.METRICS_COLLECT_DEFAULTS;
    delete process.env.TRACING_ENABLED;
  });

  afterEach(() => {
    process.env = { ...saved };
  });

  it("should leave process metrics out by default", () => {
    expect(observabilityConfig()).toMatchObject({
      logLevel: "info",
      logFormat: LogFormat.JSON,
      metricsEnabled: true,
      metricsCollectDefaults: false,
      tracingEnabled: true,
    });
  });

  it("should collect process metrics when asked to", () => {
    process.env.METRICS_COLLECT_DEFAULTS = "true";

    expect(observabilityConfig().metricsCollectDefaults).toBe(true);
  });
});
