import { HttpException, HttpStatus } from "@nestjs/common";
import { FailureCategory, RequestFailure } from "@logging/core/domain";
import {
  DuplicateResourceError,
  InfrastructureError,
} from "@database/core/domain";

/**
 * ErrorClassifier - maps any thrown value to a status code, a stable code for
 * grouping and a failure category.
 *
 * This belongs in the presentation layer because it depends on NestJS HttpException.
 *
 * | Source                          | Status       | Category       |
 * |---------------------------------|--------------|----------------|
 * | HttpException 401 / 403         | its status   | auth           |
 * | HttpException other 4xx         | its status   | client         |
 * | http-errors 4xx (body parsing)  | its status   | client         |
 * | DuplicateResourceError          | 409          | client         |
 * | InfrastructureError             | 503          | infrastructure |
 * | HttpException 5xx, anything else| its 5xx, 500 | unexpected     |
 */
export class ErrorClassifier {
  /** Maximum message length to prevent log bloat */
  private static readonly MAX_MESSAGE_LENGTH = 200;
  private static readonly MAX_STACK_LINES = 5;
  private static readonly MAX_VALIDATION_ERRORS = 10;

  static classify(error: unknown, includeStack = false): RequestFailure {
    if (error instanceof HttpException) {
      return this.classifyHttpException(error, includeStack);
    }

    if (error instanceof InfrastructureError) {
      return {
        status: HttpStatus.SERVICE_UNAVAILABLE,
        code: "INFRASTRUCTURE_ERROR",
        message: this.truncate(error.message),
        category: FailureCategory.INFRASTRUCTURE,
        exceptionName: error.name,
        stack: this.stackOf(error, includeStack),
      };
    }

    if (error instanceof DuplicateResourceError) {
      return {
        status: HttpStatus.CONFLICT,
        code: "CONFLICT",
        message: this.truncate(error.message),
        category: FailureCategory.CLIENT,
        exceptionName: error.name,
      };
    }

    if (this.isHttpError(error)) {
      return {
        status: error.status,
        code: this.httpStatusToCode(error.status),
        message: this.truncate(
          error.expose ? error.message : "Internal server error",
        ),
        category: this.categoryOf(error.status),
        exceptionName: error.constructor.name,
      };
    }

    if (error instanceof Error) {
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        code: "INTERNAL_ERROR",
        message: this.truncate(error.message || "Unknown error"),
        category: FailureCategory.UNEXPECTED,
        exceptionName: error.constructor.name,
        stack: this.stackOf(error, includeStack),
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      code: "UNKNOWN",
      message: this.truncate(
        typeof error === "string" ? error : "Unknown error",
      ),
      category: FailureCategory.UNEXPECTED,
      exceptionName: typeof error,
    };
  }

  private static classifyHttpException(
    error: HttpException,
    includeStack: boolean,
  ): RequestFailure {
    const status = error.getStatus();
    const response = error.getResponse();

    return {
      status,
      code: this.extractCode(response, status),
      message: this.extractMessage(response, error.message),
      category: this.categoryOf(status),
      exceptionName: error.constructor.name,
      validationErrors: this.extractValidationErrors(response),
      stack:
        status >= HttpStatus.INTERNAL_SERVER_ERROR
          ? this.stackOf(error, includeStack)
          : undefined,
    };
  }

  /**
   * Errors raised by Express middleware such as the body parsers carry their
   * own status and an `expose` flag saying whether the message is safe to show.
   */
  private static isHttpError(
    error: unknown,
  ): error is Error & { status: number; expose: boolean } {
    return (
      error instanceof Error &&
      "status" in error &&
      typeof error.status === "number" &&
      error.status >= HttpStatus.BAD_REQUEST &&
      error.status < 600 &&
      "expose" in error &&
      typeof error.expose === "boolean"
    );
  }

  private static categoryOf(status: number): FailureCategory {
    if (
      status === HttpStatus.UNAUTHORIZED ||
      status === HttpStatus.FORBIDDEN
    ) {
      return FailureCategory.AUTH;
    }
    return status >= HttpStatus.INTERNAL_SERVER_ERROR
      ? FailureCategory.UNEXPECTED
      : FailureCategory.CLIENT;
  }

  /**
   * An explicit `errorCode` / `code` in the body wins over the status mapping.
   */
  private static extractCode(response: unknown, status: number): string {
    if (typeof response === "object" && response !== null) {
      const explicit =
        ("errorCode" in response ? response.errorCode : undefined) ??
        ("code" in response ? response.code : undefined);
      if (typeof explicit === "string" && explicit.length > 0) {
        return explicit;
      }
    }

    return this.httpStatusToCode(status);
  }

  /**
   * Map HTTP status code to a stable error code string.
   */
  private static httpStatusToCode(status: number): string {
    const statusMap: Record<number, string> = {
      [HttpStatus.BAD_REQUEST]: "BAD_REQUEST",
      [HttpStatus.UNAUTHORIZED]: "UNAUTHORIZED",
      [HttpStatus.FORBIDDEN]: "FORBIDDEN",
      [HttpStatus.NOT_FOUND]: "NOT_FOUND",
      [HttpStatus.CONFLICT]: "CONFLICT",
      [HttpStatus.UNPROCESSABLE_ENTITY]: "VALIDATION_ERROR",
      [HttpStatus.TOO_MANY_REQUESTS]: "RATE_LIMITED",
      [HttpStatus.INTERNAL_SERVER_ERROR]: "INTERNAL_ERROR",
      [HttpStatus.BAD_GATEWAY]: "BAD_GATEWAY",
      [HttpStatus.SERVICE_UNAVAILABLE]: "SERVICE_UNAVAILABLE",
      [HttpStatus.GATEWAY_TIMEOUT]: "GATEWAY_TIMEOUT",
    };

    return statusMap[status] ?? `HTTP_${status}`;
  }

  private static extractMessage(response: unknown, fallback: string): string {
    if (typeof response === "string") {
      return this.truncate(response);
    }

    if (typeof response === "object" && response !== null) {
      const message = "message" in response ? response.message : undefined;
      if (Array.isArray(message)) {
        // Validation errors - join first few
        const shown = message.slice(0, 3).map(String).join("; ");
        const more =
          message.length > 3 ? `... (+${message.length - 3} more)` : "";
        return this.truncate(shown + more);
      }
      if (typeof message === "string") {
        return this.truncate(message);
      }
    }

    return this.truncate(fallback);
  }

  private static extractValidationErrors(
    response: unknown,
  ): string[] | undefined {
    if (typeof response !== "object" || response === null) return undefined;

    const message = "message" in response ? response.message : undefined;
    if (!Array.isArray(message)) return undefined;

    return message.map(String).slice(0, this.MAX_VALIDATION_ERRORS);
  }

  private static stackOf(
    error: Error,
    includeStack: boolean,
  ): string | undefined {
    if (!includeStack || !error.stack) {
      return undefined;
    }

    const lines = error.stack.split("\n");
    return lines.slice(0, this.MAX_STACK_LINES + 1).join("\n");
  }

  private static truncate(message: string): string {
    if (message.length <= this.MAX_MESSAGE_LENGTH) {
      return message;
    }
    return message.slice(0, this.MAX_MESSAGE_LENGTH - 3) + "...";
  }
}
