import { Test, TestingModule } from "@nestjs/testing";
import { SpanStatusCode } from "@opentelemetry/api";
import express from "express";
import { Server } from "http";
import request from "supertest";
import { FailureCategory } from "@logging/core/domain";
import { LoggerPort } from "@logging/core/ports/out/logger.port";
import { ContextService } from "@logging/service/context.service";
import { LoggingService } from "@logging/service/logging.service";
import { MetricsUseCase } from "@metrics/core/ports/in/metrics.use-case";
import { TracingUseCase } from "@tracing/core/ports/in/tracing.use-case";
import { TracingService } from "@tracing/service/tracing.service";
import { RequestObservabilityMiddleware } from "./request-observability.middleware";
import { SpanCapture } from "../../../test/utils/span-capture";
import {
  testObservabilityConfig,
  testServiceConfig,
} from "../../../test/utils/observability-config";
import { waitFor } from "../../../test/utils/wait-for";

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("RequestObservabilityMiddleware", () => {
  let capture: SpanCapture;
  let contextService: ContextService;
  let server: Server;

  const mockLogger = {
    write: jest.fn(),
    isLevelEnabled: jest.fn().mockReturnValue(true),
  };

  const mockMetrics = {
    enabled: true,
    contentType: "text/plain",
    recordRequest: jest.fn(),
    recordDomainEvent: jest.fn(),
    observeTaskDuration: jest.fn(),
    trackInFlight: jest.fn(),
    setDatabaseConnections: jest.fn(),
    exportText: jest.fn(),
  };

  const eventsNamed = (event: string) =>
    mockLogger.write.mock.calls.filter((call) => call[1] === event);

  const terminalEvents = () =>
    mockLogger.write.mock.calls.filter((call) =>
      ["Request completed", "Request failed", "Request canceled"].includes(
        call[1],
      ),
    );

  beforeEach(async () => {
    jest.clearAllMocks();
    mockMetrics.recordRequest.mockReset();
    mockMetrics.enabled = true;
    capture = new SpanCapture();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RequestObservabilityMiddleware,
        LoggingService,
        ContextService,
        { provide: LoggerPort, useValue: mockLogger },
        { provide: MetricsUseCase, useValue: mockMetrics },
        {
          provide: TracingUseCase,
          useFactory: (context: ContextService) =>
            new TracingService(
              capture.provider,
              testObservabilityConfig(),
              testServiceConfig,
              context,
            ),
          inject: [ContextService],
        },
      ],
    }).compile();

    const middleware = module.get(RequestObservabilityMiddleware);
    contextService = module.get(ContextService);

    const app = express();
    app.use((req, res, next) => middleware.use(req, res, next));
    app.get("/api/v1/tasks/:id", (req, res) => {
      res.json({ id: req.params.id });
    });
    app.post(
      "/api/v1/echo",
      express.json(),
      (req, res, next) => middleware.resume(req, res, next),
      (req, res) => {
        res.json({ requestId: contextService.getContext()?.requestId });
      },
    );
    app.get("/api/v1/broken", (req, res) => {
      contextService.getContext(req)?.recordFailure(
        {
          status: 503,
          code: "INFRASTRUCTURE_ERROR",
          message: "Database operation failed",
          category: FailureCategory.INFRASTRUCTURE,
          exceptionName: "InfrastructureError",
        },
        new Error("Database operation failed"),
      );
      res.status(503).json({ statusCode: 503 });
    });
    app.get("/api/v1/slow", () => {
      // never answers; the client gives up
    });

    server = app.listen(0, "127.0.0.1");
  });

  afterEach((done) => {
    server.close(() => done());
  });

  it("should assign a fresh correlation id and keep the inbound one aside", async () => {
    const response = await request(server)
      .get("/api/v1/tasks/42")
      .set("X-Request-ID", "caller-supplied-id");

    expect(response.status).toBe(200);
    const requestId = response.headers["x-request-id"];
    expect(requestId).toMatch(UUID_PATTERN);
    expect(requestId).not.toBe("caller-supplied-id");

    const [[, , started]] = eventsNamed("Request started");
    expect(started).toMatchObject({
      request_id: requestId,
      upstream_request_id: "caller-supplied-id",
    });
  });

  it("should report a completed request once to metrics, logs and the span", async () => {
    const response = await request(server).get("/api/v1/tasks/42");
    await waitFor(() => terminalEvents().length === 1);

    expect(mockMetrics.recordRequest).toHaveBeenCalledTimes(1);
    expect(mockMetrics.recordRequest).toHaveBeenCalledWith(
      expect.objectContaining({
        method: "GET",
        endpoint: "/api/v1/tasks/:id",
        statusCode: 200,
      }),
    );
    expect(mockMetrics.trackInFlight.mock.calls).toEqual([[1], [-1]]);
    expect(mockMetrics.recordDomainEvent).not.toHaveBeenCalled();

    const [[level, , fields]] = eventsNamed("Request completed");
    expect(level).toBe("info");
    expect(fields).toMatchObject({
      request_id: response.headers["x-request-id"],
      endpoint: "/api/v1/tasks/:id",
      status_code: 200,
    });

    const [span] = capture.spans();
    expect(span.name).toBe("GET /api/v1/tasks/:id");
    expect(span.status.code).toBe(SpanStatusCode.OK);
    expect(span.attributes["request.id"]).toBe(response.headers["x-request-id"]);
  });

  it("should give every request its own id", async () => {
    const first = await request(server).get("/api/v1/tasks/1");
    const second = await request(server).get("/api/v1/tasks/1");

    expect(first.headers["x-request-id"]).not.toBe(
      second.headers["x-request-id"],
    );
  });

  it("should report recorded failures with the failure cause", async () => {
    const response = await request(server).get("/api/v1/broken");
    await waitFor(() => terminalEvents().length === 1);

    expect(response.status).toBe(503);
    expect(response.headers["x-request-id"]).toMatch(UUID_PATTERN);
    expect(mockMetrics.recordRequest).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 503 }),
    );
    expect(mockMetrics.recordDomainEvent).toHaveBeenCalledWith("error", {
      error_type: "request_error",
      service: "middleware",
    });

    const [[level, , fields]] = eventsNamed("Request failed");
    expect(level).toBe("error");
    expect(fields).toMatchObject({
      status_code: 503,
      error: { code: "INFRASTRUCTURE_ERROR", category: "infrastructure" },
    });

    const [span] = capture.spans();
    expect(span.status).toEqual({
      code: SpanStatusCode.ERROR,
      message: "Database operation failed",
    });
  });

  it("should label unmatched paths with a constant endpoint", async () => {
    await request(server).get("/api/v1/tasks/42/nothing-here");
    await waitFor(() => terminalEvents().length === 1);

    expect(mockMetrics.recordRequest).toHaveBeenCalledWith(
      expect.objectContaining({ endpoint: "unmatched", statusCode: 404 }),
    );
  });

  it("should report requests the client abandoned as canceled", async () => {
    await expect(
      request(server).get("/api/v1/slow").timeout(100),
    ).rejects.toThrow();
    await waitFor(() => terminalEvents().length === 1);

    expect(mockMetrics.recordRequest).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 499 }),
    );
    const [[level, , fields]] = eventsNamed("Request canceled");
    expect(level).toBe("warn");
    expect(fields).toMatchObject({ status_code: 499, outcome: "canceled" });

    const [span] = capture.spans();
    expect(span.status).toEqual({
      code: SpanStatusCode.ERROR,
      message: "request canceled",
    });
  });

  it("should still log and close the span when recording metrics fails", async () => {
    mockMetrics.recordRequest.mockImplementation(() => {
      throw new Error("registry unavailable");
    });

    const response = await request(server).get("/api/v1/tasks/7");
    await waitFor(() => terminalEvents().length === 1);

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ id: "7" });
    expect(eventsNamed("Request completed")).toHaveLength(1);
    expect(capture.spans()).toHaveLength(1);
    expect(mockMetrics.trackInFlight).toHaveBeenLastCalledWith(-1);
  });

  it("should skip the request sample when metrics are disabled", async () => {
    mockMetrics.enabled = false;

    const response = await request(server).get("/api/v1/broken");
    await waitFor(() => terminalEvents().length === 1);

    expect(response.status).toBe(503);
    expect(mockMetrics.recordRequest).not.toHaveBeenCalled();
    expect(mockMetrics.recordDomainEvent).not.toHaveBeenCalled();
    expect(eventsNamed("Request failed")).toHaveLength(1);
  });

  it("should restore the context scope after the body is parsed", async () => {
    const response = await request(server)
      .post("/api/v1/echo")
      .send({ title: "write report" });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      requestId: response.headers["x-request-id"],
    });
  });
});
