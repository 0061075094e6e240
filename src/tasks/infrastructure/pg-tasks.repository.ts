import { Injectable } from "@nestjs/common";
import {
  DatabasePort,
  DatabaseSession,
} from "@database/core/ports/out/database.port";
import {
  NewTask,
  Task,
  TaskChanges,
  TaskListFilter,
  TaskPriority,
  TaskStatus,
} from "@tasks/core/domain";
import { TasksRepositoryPort } from "@tasks/core/ports/out/tasks.repository.port";

type TaskRow = {
  id: number;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  user_id: number;
  created_at: Date;
  updated_at: Date;
  completed_at: Date | null;
};

const TASK_COLUMNS = `id, title, description, status, priority, user_id,
  created_at, updated_at, completed_at`;

const CHANGE_COLUMNS: ReadonlyArray<[keyof TaskChanges, string]> = [
  ["title", "title"],
  ["description", "description"],
  ["status", "status"],
  ["priority", "priority"],
  ["completedAt", "completed_at"],
];

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    status: row.status,
    priority: row.priority,
    userId: row.user_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at,
  };
}

@Injectable()
export class PgTasksRepository extends TasksRepositoryPort {
  constructor(private readonly database: DatabasePort) {
    super();
  }

  async create(
    ownerId: number,
    task: NewTask,
    session?: DatabaseSession,
  ): Promise<Task> {
    const { rows } = await (session ?? this.database).query<TaskRow>(
      `INSERT INTO tasks (title, description, priority, user_id)
       VALUES ($1, $2, $3, $4)
       RETURNING ${TASK_COLUMNS}`,
      [task.title, task.description, task.priority, ownerId],
    );
    return toTask(rows[0]);
  }

  async findByOwner(ownerId: number, filter: TaskListFilter): Promise<Task[]> {
    const params: unknown[] = [ownerId];
    let where = "user_id = $1";
    if (filter.status !== undefined) {
      params.push(filter.status);
      where += ` AND status = $${params.length}`;
    }
    params.push(filter.skip, filter.limit);

    const { rows } = await this.database.query<TaskRow>(
      `SELECT ${TASK_COLUMNS} FROM tasks
       WHERE ${where}
       ORDER BY created_at DESC, id DESC
       OFFSET $${params.length - 1} LIMIT $${params.length}`,
      params,
    );
    return rows.map(toTask);
  }

  async findOwned(id: number, ownerId: number): Promise<Task | null> {
    const { rows } = await this.database.query<TaskRow>(
      `SELECT ${TASK_COLUMNS} FROM tasks WHERE id = $1 AND user_id = $2`,
      [id, ownerId],
    );
    return rows[0] ? toTask(rows[0]) : null;
  }

  async update(
    id: number,
    ownerId: number,
    changes: TaskChanges,
    session?: DatabaseSession,
  ): Promise<Task | null> {
    const params: unknown[] = [id, ownerId];
    const assignments: string[] = [];
    for (const [key, column] of CHANGE_COLUMNS) {
      const value = changes[key];
      if (value === undefined) continue;
      params.push(value);
      assignments.push(`${column} = $${params.length}`);
    }
    assignments.push("updated_at = NOW()");

    const { rows } = await (session ?? this.database).query<TaskRow>(
      `UPDATE tasks SET ${assignments.join(", ")}
       WHERE id = $1 AND user_id = $2
       RETURNING ${TASK_COLUMNS}`,
      params,
    );
    return rows[0] ? toTask(rows[0]) : null;
  }

  async delete(
    id: number,
    ownerId: number,
    session?: DatabaseSession,
  ): Promise<boolean> {
    const { rowCount } = await (session ?? this.database).query(
      "DELETE FROM tasks WHERE id = $1 AND user_id = $2",
      [id, ownerId],
    );
    return rowCount > 0;
  }
}
