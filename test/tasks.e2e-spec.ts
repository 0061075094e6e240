import request from "supertest";
import { SpanStatusCode } from "@opentelemetry/api";
import { REQUEST_ID_HEADER } from "@observability";
import { registerAndLogin, terminalEventFor } from "./utils/accounts";
import { createTestApp, sampleValue, TestApp } from "./utils/test-app";
import { waitFor } from "./utils/wait-for";

describe("Tasks (e2e)", () => {
  let testApp: TestApp;
  let token: string;
  let otherToken: string;

  beforeAll(async () => {
    testApp = await createTestApp();
    token = await registerAndLogin(testApp.server, "lin@example.com", "lin");
    otherToken = await registerAndLogin(
      testApp.server,
      "kai@example.com",
      "kai",
    );
  });

  afterAll(async () => {
    await testApp.app.close();
  });

  beforeEach(() => {
    testApp.store.tasks = [];
    testApp.store.unavailable = false;
    testApp.store.unavailableTables.clear();
    testApp.logs.clear();
    testApp.spans.reset();
  });

  it("should refuse unauthenticated task creation without persisting anything", async () => {
    const response = await request(testApp.server)
      .post("/api/v1/tasks")
      .send({ title: "Sneaky" })
      .expect(403);

    const requestId: unknown = response.headers[REQUEST_ID_HEADER];
    expect(typeof requestId).toBe("string");
    if (typeof requestId !== "string") return;

    await waitFor(() => terminalEventFor(testApp.logs, requestId) !== undefined);
    expect(testApp.store.tasks).toHaveLength(0);
    expect(testApp.logs.events("Task created successfully")).toHaveLength(0);
    expect(terminalEventFor(testApp.logs, requestId)).toEqual(
      expect.objectContaining({
        event: "Request failed",
        status_code: 403,
        endpoint: "/api/v1/tasks",
      }),
    );
  });

  it("should create a task and log it under the request's correlation id", async () => {
    const response = await request(testApp.server)
      .post("/api/v1/tasks")
      .set("Authorization", `Bearer ${token}`)
      .send({ title: "Write report", description: "Quarterly" })
      .expect(201);

    expect(response.body).toEqual({
      id: expect.any(Number),
      title: "Write report",
      description: "Quarterly",
      status: "pending",
      priority: "medium",
      user_id: testApp.store.users[0].id,
      created_at: expect.any(String),
      updated_at: expect.any(String),
      completed_at: null,
    });
    expect(testApp.store.tasks).toHaveLength(1);
    expect(testApp.logs.events("Task created successfully")).toEqual([
      expect.objectContaining({
        request_id: response.headers[REQUEST_ID_HEADER],
        task_id: response.body.id,
        title: "Write report",
        priority: "medium",
      }),
    ]);
    expect(testApp.store.audit).toContainEqual(
      expect.objectContaining({
        action: "task_created",
        resourceId: String(response.body.id),
        details: "Title: Write report, Priority: medium",
      }),
    );
  });

  it("should reject an unknown priority", async () => {
    await request(testApp.server)
      .post("/api/v1/tasks")
      .set("Authorization", `Bearer ${token}`)
      .send({ title: "Write report", priority: "whenever" })
      .expect(400);

    expect(testApp.store.tasks).toHaveLength(0);
  });

  it("should list, update and delete the owner's tasks", async () => {
    const auth = `Bearer ${token}`;
    const first = await request(testApp.server)
      .post("/api/v1/tasks")
      .set("Authorization", auth)
      .send({ title: "First", priority: "low" })
      .expect(201);
    await request(testApp.server)
      .post("/api/v1/tasks")
      .set("Authorization", auth)
      .send({ title: "Second", priority: "urgent" })
      .expect(201);

    const listed = await request(testApp.server)
      .get("/api/v1/tasks")
      .query({ limit: 1 })
      .set("Authorization", auth)
      .expect(200);
    expect(listed.body).toHaveLength(1);
    expect(listed.body[0].title).toBe("Second");

    const completed = await request(testApp.server)
      .patch(`/api/v1/tasks/${first.body.id}`)
      .set("Authorization", auth)
      .send({ status: "completed" })
      .expect(200);
    expect(completed.body.status).toBe("completed");
    expect(typeof completed.body.completed_at).toBe("string");

    const filtered = await request(testApp.server)
      .get("/api/v1/tasks")
      .query({ status_filter: "completed" })
      .set("Authorization", auth)
      .expect(200);
    expect(filtered.body.map((task: { title: string }) => task.title)).toEqual([
      "First",
    ]);

    await request(testApp.server)
      .delete(`/api/v1/tasks/${first.body.id}`)
      .set("Authorization", auth)
      .expect(204);
    await request(testApp.server)
      .get(`/api/v1/tasks/${first.body.id}`)
      .set("Authorization", auth)
      .expect(404);
  });

  it("should hide another user's task", async () => {
    const created = await request(testApp.server)
      .post("/api/v1/tasks")
      .set("Authorization", `Bearer ${token}`)
      .send({ title: "Private" })
      .expect(201);

    await request(testApp.server)
      .get(`/api/v1/tasks/${created.body.id}`)
      .set("Authorization", `Bearer ${otherToken}`)
      .expect(404);
    await request(testApp.server)
      .delete(`/api/v1/tasks/${created.body.id}`)
      .set("Authorization", `Bearer ${otherToken}`)
      .expect(404);
    expect(testApp.store.tasks).toHaveLength(1);
  });

  it("should report an infrastructure failure as 503 with an error span and a 5xx sample", async () => {
    testApp.store.unavailableTables.add("tasks");

    const response = await request(testApp.server)
      .post("/api/v1/tasks")
      .set("Authorization", `Bearer ${token}`)
      .send({ title: "Doomed" })
      .expect(503);

    expect(response.body).toEqual({
      statusCode: 503,
      message: "Service temporarily unavailable",
      error: "Service Unavailable",
    });
    const requestId: unknown = response.headers[REQUEST_ID_HEADER];
    expect(typeof requestId).toBe("string");
    if (typeof requestId !== "string") return;

    await waitFor(
      () => testApp.spans.byName("POST /api/v1/tasks").length === 1,
    );
    const [span] = testApp.spans.byName("POST /api/v1/tasks");
    expect(span.status.code).toBe(SpanStatusCode.ERROR);
    expect(span.attributes["http.response.status_code"]).toBe(503);
    expect(span.attributes["request.id"]).toBe(requestId);
    expect(testApp.spans.byName("task_creation")[0].status.code).toBe(
      SpanStatusCode.ERROR,
    );

    expect(terminalEventFor(testApp.logs, requestId)).toEqual(
      expect.objectContaining({
        event: "Request failed",
        level: "error",
        status_code: 503,
        trace_id: span.spanContext().traceId,
        error: expect.objectContaining({
          code: "INFRASTRUCTURE_ERROR",
          category: "infrastructure",
        }),
      }),
    );

    const metrics = await request(testApp.server).get("/metrics").expect(200);
    expect(
      sampleValue(
        metrics.text,
        'http_requests_total{method="POST",endpoint="/api/v1/tasks",status_code="503"}',
      ),
    ).toBe(1);
    expect(
      sampleValue(
        metrics.text,
        'errors_total{error_type="task_creation_error",service="task_service"}',
      ),
    ).toBe(1);
  });
});
