import request from "supertest";
import type { Server } from "http";
import { LogCapture, LogRecord } from "./log-capture";

export const PASSWORD = "pw123456";

/**
 * Register an account and return a bearer token for it.
 */
export async function registerAndLogin(
  server: Server,
  email: string,
  username: string,
): Promise<string> {
  await request(server)
    .post("/api/v1/auth/register")
    .send({ email, username, password: PASSWORD })
    .expect(201);
  const response = await request(server)
    .post("/api/v1/auth/login")
    .send({ email, password: PASSWORD })
    .expect(200);

  const token: unknown = response.body.access_token;
  if (typeof token !== "string") {
    throw new Error("login returned no token");
  }
  return token;
}

const TERMINAL_EVENTS = new Set([
  "Request completed",
  "Request failed",
  "Request canceled",
]);

export function terminalEvents(logs: LogCapture): LogRecord[] {
  return logs
    .records()
    .filter(
      (record) =>
        typeof record.event === "string" && TERMINAL_EVENTS.has(record.event),
    );
}

/**
 * The terminal event of the request that answered with `requestId`.
 */
export function terminalEventFor(
  logs: LogCapture,
  requestId: string,
): LogRecord | undefined {
  return terminalEvents(logs).find((record) => record.request_id === requestId);
}
