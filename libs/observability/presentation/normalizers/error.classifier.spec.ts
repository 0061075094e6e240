import {
  BadRequestException,
  ForbiddenException,
  HttpException,
  NotFoundException,
  UnauthorizedException,
} from "@nestjs/common";
import { FailureCategory } from "@logging/core/domain";
import {
  DuplicateResourceError,
  InfrastructureError,
} from "@database/core/domain";
import { ErrorClassifier } from "./error.classifier";

class ParserError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly expose: boolean,
  ) {
    super(message);
  }
}

describe("ErrorClassifier", () => {
  it("should classify client errors with their status", () => {
    const failure = ErrorClassifier.classify(
      new NotFoundException("Task not found"),
    );

    expect(failure).toEqual({
      status: 404,
      code: "NOT_FOUND",
      message: "Task not found",
      category: FailureCategory.CLIENT,
      exceptionName: "NotFoundException",
      validationErrors: undefined,
      stack: undefined,
    });
  });

  it.each([
    [new UnauthorizedException("Could not validate credentials"), 401],
    [new ForbiddenException("Not authenticated"), 403],
  ])("should put %p in the auth category", (error, status) => {
    const failure = ErrorClassifier.classify(error);

    expect(failure.status).toBe(status);
    expect(failure.category).toBe(FailureCategory.AUTH);
  });

  it("should keep validation messages", () => {
    const failure = ErrorClassifier.classify(
      new BadRequestException([
        "email must be an email",
        "password must be longer than or equal to 8 characters",
        "username should not be empty",
        "title should not be empty",
      ]),
    );

    expect(failure.message).toBe(
      "email must be an email; password must be longer than or equal to 8 characters; username should not be empty... (+1 more)",
    );
    expect(failure.validationErrors).toHaveLength(4);
  });

  it("should prefer an explicit code from the response body", () => {
    const failure = ErrorClassifier.classify(
      new HttpException({ code: "INACTIVE_USER", message: "Inactive user" }, 400),
    );

    expect(failure.code).toBe("INACTIVE_USER");
    expect(failure.message).toBe("Inactive user");
  });

  it("should map infrastructure errors to 503", () => {
    const failure = ErrorClassifier.classify(
      new InfrastructureError("Database operation failed"),
    );

    expect(failure).toMatchObject({
      status: 503,
      code: "INFRASTRUCTURE_ERROR",
      category: FailureCategory.INFRASTRUCTURE,
      exceptionName: "InfrastructureError",
    });
  });

  it("should map leaked duplicates to 409", () => {
    const failure = ErrorClassifier.classify(
      new DuplicateResourceError("Unique constraint violated"),
    );

    expect(failure.status).toBe(409);
    expect(failure.category).toBe(FailureCategory.CLIENT);
  });

  it("should keep the status of errors raised while parsing the body", () => {
    const failure = ErrorClassifier.classify(
      new ParserError("Unexpected token n in JSON at position 1", 400, true),
    );

    expect(failure).toEqual({
      status: 400,
      code: "BAD_REQUEST",
      message: "Unexpected token n in JSON at position 1",
      category: FailureCategory.CLIENT,
      exceptionName: "ParserError",
    });
  });

  it("should hide messages of parser errors not marked as exposable", () => {
    const failure = ErrorClassifier.classify(
      new ParserError("stream encoding should not be set", 500, false),
    );

    expect(failure).toMatchObject({
      status: 500,
      code: "INTERNAL_ERROR",
      message: "Internal server error",
      category: FailureCategory.UNEXPECTED,
    });
  });

  it("should treat anything else as unexpected", () => {
    const failure = ErrorClassifier.classify(new TypeError("boom"), true);

    expect(failure).toMatchObject({
      status: 500,
      code: "INTERNAL_ERROR",
      category: FailureCategory.UNEXPECTED,
      exceptionName: "TypeError",
    });
    expect(failure.stack?.startsWith("TypeError: boom")).toBe(true);
  });

  it("should omit stacks unless asked", () => {
    expect(ErrorClassifier.classify(new Error("boom")).stack).toBeUndefined();
  });

  it("should handle thrown non-errors", () => {
    expect(ErrorClassifier.classify("plain failure")).toMatchObject({
      status: 500,
      code: "UNKNOWN",
      message: "plain failure",
      exceptionName: "string",
    });
  });
});
