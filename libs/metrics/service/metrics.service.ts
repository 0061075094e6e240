import { Inject, Injectable } from "@nestjs/common";
import {
  collectDefaultMetrics,
  Counter,
  Gauge,
  Histogram,
  Registry,
} from "prom-client";
import { observabilityConfig } from "@config/index";
import type { ObservabilityConfig } from "@config/index";
import {
  DOMAIN_EVENT_LABEL_NAMES,
  DomainEventLabels,
  DomainEventName,
  MetricName,
  SIZE_BUCKETS,
} from "@metrics/core/domain";
import {
  MetricsUseCase,
  RequestSample,
} from "@metrics/core/ports/in/metrics.use-case";

const DOMAIN_EVENT_METRICS: Record<
  DomainEventName,
  { name: MetricName; help: string }
> = {
  user_registration: {
    name: MetricName.USER_REGISTRATIONS,
    help: "Total number of user registrations",
  },
  login_attempt: {
    name: MetricName.LOGIN_ATTEMPTS,
    help: "Total number of login attempts",
  },
  api_call: {
    name: MetricName.API_CALLS,
    help: "Total number of API calls",
  },
  error: {
    name: MetricName.ERRORS,
    help: "Total number of errors",
  },
};

/**
 * MetricsService - prom-client implementation of MetricsUseCase.
 *
 * Owns its registry, so every application instance (and every test app)
 * exports only what it recorded itself.
 */
@Injectable()
export class MetricsService extends MetricsUseCase {
  readonly enabled: boolean;
  readonly contentType: string;
  private readonly registry = new Registry();

  private readonly requestCount: Counter<"method" | "endpoint" | "status_code">;
  private readonly requestDuration: Histogram<"method" | "endpoint">;
  private readonly requestSize: Histogram<"method" | "endpoint">;
  private readonly responseSize: Histogram<"method" | "endpoint">;
  private readonly activeRequests: Gauge;
  private readonly databaseConnections: Gauge;
  private readonly taskDuration: Histogram<"task_name">;
  private readonly domainCounters: Record<DomainEventName, Counter<string>>;

  constructor(@Inject(observabilityConfig.KEY) config: ObservabilityConfig) {
    super();
    this.enabled = config.metricsEnabled;
    this.contentType = this.registry.contentType;
    const registers = [this.registry];

    this.requestCount = new Counter({
      name: MetricName.HTTP_REQUESTS,
      help: "Total number of HTTP requests",
      labelNames: ["method", "endpoint", "status_code"],
      registers,
    });
    this.requestDuration = new Histogram({
      name: MetricName.HTTP_REQUEST_DURATION,
      help: "HTTP request duration in seconds",
      labelNames: ["method", "endpoint"],
      registers,
    });
    this.requestSize = new Histogram({
      name: MetricName.HTTP_REQUEST_SIZE,
      help: "HTTP request size in bytes",
      labelNames: ["method", "endpoint"],
      buckets: SIZE_BUCKETS,
      registers,
    });
    this.responseSize = new Histogram({
      name: MetricName.HTTP_RESPONSE_SIZE,
      help: "HTTP response size in bytes",
      labelNames: ["method", "endpoint"],
      buckets: SIZE_BUCKETS,
      registers,
    });
    this.activeRequests = new Gauge({
      name: MetricName.ACTIVE_REQUESTS,
      help: "Number of requests currently in flight",
      registers,
    });
    this.databaseConnections = new Gauge({
      name: MetricName.DATABASE_CONNECTIONS,
      help: "Number of active database connections",
      registers,
    });
    this.taskDuration = new Histogram({
      name: MetricName.TASK_DURATION,
      help: "Task execution duration in seconds",
      labelNames: ["task_name"],
      registers,
    });

    this.domainCounters = {
      user_registration: this.domainCounter("user_registration"),
      login_attempt: this.domainCounter("login_attempt"),
      api_call: this.domainCounter("api_call"),
      error: this.domainCounter("error"),
    };

    if (this.enabled && config.metricsCollectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  recordRequest(sample: RequestSample): void {
    if (!this.enabled) return;

    const labels = { method: sample.method, endpoint: sample.endpoint };
    this.requestCount.inc({
      ...labels,
      status_code: String(sample.statusCode),
    });
    this.requestDuration.observe(labels, sample.durationSeconds);

    if (sample.requestSize > 0) {
      this.requestSize.observe(labels, sample.requestSize);
    }
    if (sample.responseSize > 0) {
      this.responseSize.observe(labels, sample.responseSize);
    }
  }

  recordDomainEvent<E extends DomainEventName>(
    name: E,
    labels: DomainEventLabels[E],
  ): void {
    if (!this.enabled) return;

    const counter = this.domainCounters[name];
    if (Object.keys(labels).length === 0) {
      counter.inc();
    } else {
      counter.inc(labels);
    }
  }

  observeTaskDuration(taskName: string, seconds: number): void {
    if (!this.enabled) return;
    this.taskDuration.observe({ task_name: taskName }, seconds);
  }

  trackInFlight(delta: number): void {
    if (!this.enabled) return;
    if (delta >= 0) {
      this.activeRequests.inc(delta);
    } else {
      this.activeRequests.dec(-delta);
    }
  }

  setDatabaseConnections(count: number): void {
    if (!this.enabled) return;
    this.databaseConnections.set(count);
  }

  async exportText(): Promise<string> {
    if (!this.enabled) return "";
    return this.registry.metrics();
  }

  private domainCounter(event: DomainEventName): Counter<string> {
    const { name, help } = DOMAIN_EVENT_METRICS[event];
    return new Counter<string>({
      name,
      help,
      labelNames: [...DOMAIN_EVENT_LABEL_NAMES[event]],
      registers: [this.registry],
    });
  }
}
