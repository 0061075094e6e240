/**
 * A dependency the service cannot work without (database, collector) failed
 * or is unreachable. Reported to clients as 503 without the cause.
 */
export class InfrastructureError extends Error {
  constructor(
    message: string,
    readonly dependency: string = "database",
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "InfrastructureError";
  }
}

/**
 * A write collided with a unique constraint.
 */
export class DuplicateResourceError extends Error {
  constructor(
    message: string,
    readonly constraint?: string,
  ) {
    super(message);
    this.name = "DuplicateResourceError";
  }
}
