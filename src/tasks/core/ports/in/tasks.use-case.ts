import { RequestOrigin } from "@audit/core/domain";
import { Task } from "@tasks/core/domain";
import { CreateTaskDto, ListTasksQuery, UpdateTaskDto } from "@tasks/core/dtos";
import { User } from "@users/core/domain";

/**
 * TasksUseCase - task operations on behalf of the authenticated owner.
 * A task owned by someone else behaves as if it did not exist (404).
 */
export abstract class TasksUseCase {
  abstract create(
    owner: User,
    input: CreateTaskDto,
    origin: RequestOrigin,
  ): Promise<Task>;

  abstract list(owner: User, query: ListTasksQuery): Promise<Task[]>;

  abstract get(owner: User, taskId: number): Promise<Task>;

  abstract update(
    owner: User,
    taskId: number,
    input: UpdateTaskDto,
    origin: RequestOrigin,
  ): Promise<Task>;

  abstract delete(
    owner: User,
    taskId: number,
    origin: RequestOrigin,
  ): Promise<void>;
}
