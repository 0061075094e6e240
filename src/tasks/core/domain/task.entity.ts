export enum TaskStatus {
  PENDING = "pending",
  IN_PROGRESS = "in_progress",
  COMPLETED = "completed",
  FAILED = "failed",
}

export enum TaskPriority {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  URGENT = "urgent",
}

export interface Task {
  id: number;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  userId: number;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
}

export interface NewTask {
  title: string;
  description: string | null;
  priority: TaskPriority;
}

export interface TaskChanges {
  title?: string;
  description?: string | null;
  status?: TaskStatus;
  priority?: TaskPriority;
  completedAt?: Date | null;
}

export interface TaskListFilter {
  skip: number;
  limit: number;
  status?: TaskStatus;
}
