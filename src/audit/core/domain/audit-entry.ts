export enum AuditAction {
  USER_REGISTRATION = "user_registration",
  USER_LOGIN = "user_login",
  TASK_CREATED = "task_created",
  TASK_UPDATED = "task_updated",
  TASK_DELETED = "task_deleted",
}

export interface AuditEntry {
  userId: number | null;
  action: AuditAction;
  resourceType: "user" | "task";
  resourceId?: string;
  details?: string;
  ipAddress?: string;
  userAgent?: string;
}

/**
 * Where a request came from, as recorded on audit rows.
 */
export interface RequestOrigin {
  ipAddress?: string;
  userAgent?: string;
}
