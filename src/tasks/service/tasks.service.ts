import { HttpException, Injectable, NotFoundException } from "@nestjs/common";
import { AuditAction, RequestOrigin } from "@audit/core/domain";
import { AuditRepositoryPort } from "@audit/core/ports/out/audit.repository.port";
import { DatabasePort } from "@database/core/ports/out/database.port";
import { LoggingService } from "@logging/service/logging.service";
import { MetricsUseCase } from "@metrics/core/ports/in/metrics.use-case";
import { TaskInstrumentation } from "@observability/service/task-instrumentation.service";
import {
  Task,
  TaskChanges,
  TaskPriority,
  TaskStatus,
} from "@tasks/core/domain";
import { CreateTaskDto, ListTasksQuery, UpdateTaskDto } from "@tasks/core/dtos";
import { TasksUseCase } from "@tasks/core/ports/in/tasks.use-case";
import { TasksRepositoryPort } from "@tasks/core/ports/out/tasks.repository.port";
import { User } from "@users/core/domain";

const SERVICE = "task_service";

@Injectable()
export class TasksService extends TasksUseCase {
  constructor(
    private readonly tasks: TasksRepositoryPort,
    private readonly audit: AuditRepositoryPort,
    private readonly database: DatabasePort,
    private readonly metrics: MetricsUseCase,
    private readonly instrumentation: TaskInstrumentation,
    private readonly loggingService: LoggingService,
  ) {
    super();
  }

  async create(
    owner: User,
    input: CreateTaskDto,
    origin: RequestOrigin,
  ): Promise<Task> {
    const priority = input.priority ?? TaskPriority.MEDIUM;
    this.loggingService.info("Task creation attempt", {
      user_id: owner.id,
      title: input.title,
      priority,
    });

    return this.instrumentation.run("task_creation", async () => {
      try {
        const task = await this.database.transaction(async (session) => {
          const created = await this.tasks.create(
            owner.id,
            {
              title: input.title,
              description: input.description ?? null,
              priority,
            },
            session,
          );
          await this.audit.record(
            {
              userId: owner.id,
              action: AuditAction.TASK_CREATED,
              resourceType: "task",
              resourceId: String(created.id),
              details: `Title: ${created.title}, Priority: ${created.priority}`,
              ...origin,
            },
            session,
          );
          return created;
        });

        this.metrics.recordDomainEvent("api_call", {
          service: SERVICE,
          operation: "create_task",
        });
        this.loggingService.addMetadata({ task_id: task.id });
        this.loggingService.info("Task created successfully", {
          task_id: task.id,
          user_id: owner.id,
          title: task.title,
          priority: task.priority,
        });
        return task;
      } catch (error) {
        this.reportFailure(error, "task_creation_error", "Task creation failed", {
          user_id: owner.id,
          title: input.title,
        });
        throw error;
      }
    });
  }

  async list(owner: User, query: ListTasksQuery): Promise<Task[]> {
    return this.instrumentation.run("task_list", async () => {
      try {
        const tasks = await this.tasks.findByOwner(owner.id, {
          skip: query.skip,
          limit: query.limit,
          status: query.status_filter,
        });

        this.metrics.recordDomainEvent("api_call", {
          service: SERVICE,
          operation: "list_tasks",
        });
        this.loggingService.info("Tasks retrieved successfully", {
          user_id: owner.id,
          task_count: tasks.length,
          skip: query.skip,
          limit: query.limit,
          status_filter: query.status_filter ?? null,
        });
        return tasks;
      } catch (error) {
        this.reportFailure(error, "task_list_error", "Task listing failed", {
          user_id: owner.id,
        });
        throw error;
      }
    });
  }

  async get(owner: User, taskId: number): Promise<Task> {
    try {
      const task = await this.findOwnedOrThrow(owner, taskId);
      this.metrics.recordDomainEvent("api_call", {
        service: SERVICE,
        operation: "get_task",
      });
      return task;
    } catch (error) {
      this.reportFailure(error, "task_fetch_error", "Task lookup failed", {
        user_id: owner.id,
        task_id: taskId,
      });
      throw error;
    }
  }

  async update(
    owner: User,
    taskId: number,
    input: UpdateTaskDto,
    origin: RequestOrigin,
  ): Promise<Task> {
    return this.instrumentation.run("task_update", async () => {
      try {
        const current = await this.findOwnedOrThrow(owner, taskId);
        const changes = this.changesFor(current, input);

        const task = await this.database.transaction(async (session) => {
          const updated = await this.tasks.update(
            taskId,
            owner.id,
            changes,
            session,
          );
          if (!updated) {
            throw new NotFoundException("Task not found");
          }
          await this.audit.record(
            {
              userId: owner.id,
              action: AuditAction.TASK_UPDATED,
              resourceType: "task",
              resourceId: String(updated.id),
              details: `Changed: ${changedFields(input).join(", ") || "nothing"}`,
              ...origin,
            },
            session,
          );
          return updated;
        });

        this.metrics.recordDomainEvent("api_call", {
          service: SERVICE,
          operation: "update_task",
        });
        this.loggingService.addMetadata({ task_id: task.id });
        this.loggingService.info("Task updated successfully", {
          task_id: task.id,
          user_id: owner.id,
          status: task.status,
        });
        return task;
      } catch (error) {
        this.reportFailure(error, "task_update_error", "Task update failed", {
          user_id: owner.id,
          task_id: taskId,
        });
        throw error;
      }
    });
  }

  async delete(
    owner: User,
    taskId: number,
    origin: RequestOrigin,
  ): Promise<void> {
    return this.instrumentation.run("task_deletion", async () => {
      try {
        const current = await this.findOwnedOrThrow(owner, taskId);

        await this.database.transaction(async (session) => {
          const deleted = await this.tasks.delete(taskId, owner.id, session);
          if (!deleted) {
            throw new NotFoundException("Task not found");
          }
          await this.audit.record(
            {
              userId: owner.id,
              action: AuditAction.TASK_DELETED,
              resourceType: "task",
              resourceId: String(taskId),
              details: `Title: ${current.title}`,
              ...origin,
            },
            session,
          );
        });

        this.metrics.recordDomainEvent("api_call", {
          service: SERVICE,
          operation: "delete_task",
        });
        this.loggingService.addMetadata({ task_id: taskId });
        this.loggingService.info("Task deleted successfully", {
          task_id: taskId,
          user_id: owner.id,
        });
      } catch (error) {
        this.reportFailure(error, "task_deletion_error", "Task deletion failed", {
          user_id: owner.id,
          task_id: taskId,
        });
        throw error;
      }
    });
  }

  private async findOwnedOrThrow(owner: User, taskId: number): Promise<Task> {
    const task = await this.tasks.findOwned(taskId, owner.id);
    if (!task) {
      throw new NotFoundException("Task not found");
    }
    return task;
  }

  /**
   * completed_at follows the status: stamped on entering completed,
   * cleared on leaving it.
   */
  private changesFor(current: Task, input: UpdateTaskDto): TaskChanges {
    const changes: TaskChanges = {
      title: input.title,
      description: input.description,
      status: input.status,
      priority: input.priority,
    };

    if (input.status !== undefined && input.status !== current.status) {
      if (input.status === TaskStatus.COMPLETED) {
        changes.completedAt = new Date();
      } else if (current.status === TaskStatus.COMPLETED) {
        changes.completedAt = null;
      }
    }
    return changes;
  }

  /**
   * HTTP errors are the caller's problem and already reported by the
   * request's terminal event. Anything else is logged and counted here.
   */
  private reportFailure(
    error: unknown,
    errorType: string,
    event: string,
    fields: Record<string, unknown>,
  ): void {
    if (error instanceof HttpException) return;
    this.loggingService.error(event, {
      ...fields,
      error: error instanceof Error ? error.message : String(error),
    });
    this.metrics.recordDomainEvent("error", {
      error_type: errorType,
      service: SERVICE,
    });
  }
}

function changedFields(input: UpdateTaskDto): string[] {
  const fields: (keyof UpdateTaskDto)[] = [
    "title",
    "description",
    "status",
    "priority",
  ];
  return fields.filter((field) => input[field] !== undefined);
}
