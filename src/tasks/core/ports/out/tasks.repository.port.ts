import type { DatabaseSession } from "@database/core/ports/out/database.port";
import { NewTask, Task, TaskChanges, TaskListFilter } from "@tasks/core/domain";

/**
 * TasksRepositoryPort - Outbound port for task persistence.
 * Every lookup is scoped to the owner.
 */
export abstract class TasksRepositoryPort {
  abstract create(
    ownerId: number,
    task: NewTask,
    session?: DatabaseSession,
  ): Promise<Task>;

  /**
   * Newest first.
   */
  abstract findByOwner(ownerId: number, filter: TaskListFilter): Promise<Task[]>;

  abstract findOwned(id: number, ownerId: number): Promise<Task | null>;

  abstract update(
    id: number,
    ownerId: number,
    changes: TaskChanges,
    session?: DatabaseSession,
  ): Promise<Task | null>;

  /**
   * Resolves false when no owned task matched.
   */
  abstract delete(
    id: number,
    ownerId: number,
    session?: DatabaseSession,
  ): Promise<boolean>;
}
