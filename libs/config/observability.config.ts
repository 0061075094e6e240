import { ConfigType, registerAs } from "@nestjs/config";
import {
  isLogFormat,
  LogFormat,
  LogLevel,
  normalizeLogLevel,
} from "@logging/core/domain/log-level";
import { readBoolean, readString } from "./env.parsers";

/**
 * Switches for the three observability sinks.
 *
 * - METRICS_ENABLED: false turns every metric call into a no-op and hides /metrics
 * - TRACING_ENABLED: false skips span creation entirely
 * - LOG_LEVEL / LOG_FORMAT: threshold and renderer of the structured logger
 */
export const observabilityConfig = registerAs("observability", () => {
  const format = readString("LOG_FORMAT", LogFormat.JSON).toLowerCase();
  const logLevel: LogLevel =
    normalizeLogLevel(readString("LOG_LEVEL", "info")) ?? "info";

  return {
    logLevel,
    logFormat: isLogFormat(format) ? format : LogFormat.JSON,
    metricsEnabled: readBoolean("METRICS_ENABLED", true),
    metricsCollectDefaults: readBoolean("METRICS_COLLECT_DEFAULTS", false),
    tracingEnabled: readBoolean("TRACING_ENABLED", true),
    traceCollectorEndpoint: readString(
      "TRACE_COLLECTOR_ENDPOINT",
      "http://localhost:4318/v1/traces",
    ),
  };
});

export type ObservabilityConfig = ConfigType<typeof observabilityConfig>;
