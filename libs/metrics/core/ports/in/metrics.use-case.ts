import { DomainEventLabels, DomainEventName } from "@metrics/core/domain";

export interface RequestSample {
  method: string;
  endpoint: string;
  statusCode: number;
  durationSeconds: number;
  requestSize: number;
  responseSize: number;
}

/**
 * MetricsUseCase - Inbound port for recording and exporting metrics.
 * Every recording call is a no-op while metrics are disabled.
 */
export abstract class MetricsUseCase {
  abstract readonly enabled: boolean;

  abstract readonly contentType: string;

  abstract recordRequest(sample: RequestSample): void;

  abstract recordDomainEvent<E extends DomainEventName>(
    name: E,
    labels: DomainEventLabels[E],
  ): void;

  abstract observeTaskDuration(taskName: string, seconds: number): void;

  abstract trackInFlight(delta: number): void;

  abstract setDatabaseConnections(count: number): void;

  /**
   * Registry contents in the Prometheus text exposition format,
   * or "" when disabled.
   */
  abstract exportText(): Promise<string>;
}
