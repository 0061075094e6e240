import { Test, TestingModule } from "@nestjs/testing";
import {
  FailureCategory,
  RequestContext,
  RequestOutcome,
} from "@logging/core/domain";
import { LoggerPort } from "@logging/core/ports/out/logger.port";
import { ContextService } from "./context.service";
import { LoggingService } from "./logging.service";

describe("LoggingService", () => {
  let service: LoggingService;
  let contextService: ContextService;

  const mockLogger = {
    write: jest.fn(),
    isLevelEnabled: jest.fn().mockReturnValue(true),
  };

  const init = {
    requestId: "req-42",
    method: "POST",
    path: "/api/v1/tasks",
    clientAddress: "10.0.0.1",
    userAgent: "jest",
    requestSize: 48,
  };

  const completion = (outcome: RequestOutcome, statusCode: number) => ({
    outcome,
    statusCode,
    endpoint: "/api/v1/tasks",
    durationMs: 12.34567,
    responseSize: 120,
  });

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LoggingService,
        ContextService,
        { provide: LoggerPort, useValue: mockLogger },
      ],
    }).compile();

    service = module.get<LoggingService>(LoggingService);
    contextService = module.get<ContextService>(ContextService);
  });

  it("should be defined", () => {
    expect(service).toBeDefined();
  });

  describe("initializeContext", () => {
    it("should create a fresh context from the request fields", () => {
      const context = service.initializeContext(init);

      expect(context).toBeInstanceOf(RequestContext);
      expect(context.requestId).toBe("req-42");
      expect(context.finalized).toBe(false);
      expect(context.metadata).toEqual({});
    });
  });

  describe("startRequest", () => {
    it("should emit Request started at info", () => {
      service.startRequest(service.initializeContext(init));

      expect(mockLogger.write).toHaveBeenCalledWith("info", "Request started", {
        request_id: "req-42",
        method: "POST",
        path: "/api/v1/tasks",
        client_address: "10.0.0.1",
        user_agent: "jest",
        request_size: 48,
      });
    });
  });

  describe("finalize", () => {
    it("should emit Request completed with user and metadata", () => {
      const context = service.initializeContext(init);
      contextService.run(context, () => {
        service.addUserContext({ id: "5", role: "user" });
        service.addMetadata({ task_id: 9 });
      });

      service.finalize(context, completion(RequestOutcome.COMPLETED, 201));

      expect(mockLogger.write).toHaveBeenCalledWith(
        "info",
        "Request completed",
        expect.objectContaining({
          request_id: "req-42",
          endpoint: "/api/v1/tasks",
          status_code: 201,
          duration_ms: 12.346,
          response_size: 120,
          outcome: "completed",
          user: { id: "5", role: "user" },
          metadata: { task_id: 9 },
        }),
      );
    });

    it("should log 4xx failures at warn with the failure cause", () => {
      const context = service.initializeContext(init);
      context.recordFailure(
        {
          status: 404,
          code: "NOT_FOUND",
          message: "Task not found",
          category: FailureCategory.CLIENT,
          exceptionName: "NotFoundException",
        },
        new Error("Task not found"),
      );

      service.finalize(context, completion(RequestOutcome.FAILED, 404));

      expect(mockLogger.write).toHaveBeenCalledWith(
        "warn",
        "Request failed",
        expect.objectContaining({
          status_code: 404,
          error: {
            code: "NOT_FOUND",
            message: "Task not found",
            category: "client",
            exception: "NotFoundException",
          },
        }),
      );
    });

    it("should log 5xx failures at error", () => {
      const context = service.initializeContext(init);

      service.finalize(context, completion(RequestOutcome.FAILED, 503));

      expect(mockLogger.write).toHaveBeenCalledWith(
        "error",
        "Request failed",
        expect.objectContaining({ status_code: 503 }),
      );
    });

    it("should log cancellations at warn", () => {
      const context = service.initializeContext(init);

      service.finalize(context, completion(RequestOutcome.CANCELED, 499));

      expect(mockLogger.write).toHaveBeenCalledWith(
        "warn",
        "Request canceled",
        expect.objectContaining({ status_code: 499, outcome: "canceled" }),
      );
    });
  });

  it("should ignore enrichment outside of a request", () => {
    expect(() => service.addUserContext({ id: "1", role: "user" })).not.toThrow();
    expect(contextService.getContext()).toBeUndefined();
  });
});
