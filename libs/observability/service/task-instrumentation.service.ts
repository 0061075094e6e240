import { Injectable } from "@nestjs/common";
import { performance } from "perf_hooks";
import { LoggingService } from "@logging/service/logging.service";
import { MetricsUseCase } from "@metrics/core/ports/in/metrics.use-case";
import { SpanAttribute } from "@tracing/core/domain";
import { TracingUseCase } from "@tracing/core/ports/in/tracing.use-case";

/**
 * TaskInstrumentation - times a named unit of business work.
 *
 * The work runs inside a child span named after the task, and its duration
 * lands in task_duration_seconds{task_name} whether it resolves or rejects.
 * Rejections pass through unchanged.
 *
 * @example
 * return this.instrumentation.run("task_creation", () =>
 *   this.tasks.create(ownerId, input),
 * );
 */
@Injectable()
export class TaskInstrumentation {
  constructor(
    private readonly metrics: MetricsUseCase,
    private readonly tracing: TracingUseCase,
    private readonly loggingService: LoggingService,
  ) {}

  async run<T>(taskName: string, work: () => Promise<T>): Promise<T> {
    const span = this.tracing.startChildSpan(taskName, {
      [SpanAttribute.TASK_NAME]: taskName,
    });
    const startedAt = performance.now();
    let failed = false;
    let failure: unknown;

    try {
      return await this.tracing.withActiveSpan(span, work);
    } catch (error) {
      failed = true;
      failure = error;
      throw error;
    } finally {
      const durationMs = performance.now() - startedAt;
      this.metrics.observeTaskDuration(taskName, durationMs / 1000);
      this.tracing.endSpan(span, failed ? { error: failure, failed } : {});
      this.loggingService.debug("Task completed", {
        task_name: taskName,
        duration_ms: Math.round(durationMs * 1000) / 1000,
        success: !failed,
      });
    }
  }
}
