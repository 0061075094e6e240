import {
  ATTR_CLIENT_ADDRESS,
  ATTR_HTTP_REQUEST_METHOD,
  ATTR_HTTP_RESPONSE_STATUS_CODE,
  ATTR_HTTP_ROUTE,
  ATTR_URL_PATH,
  ATTR_USER_AGENT_ORIGINAL,
} from "@opentelemetry/semantic-conventions";

/**
 * Span attribute names used across the service. Stable semantic convention
 * names where one exists.
 */
export const SpanAttribute = {
  HTTP_METHOD: ATTR_HTTP_REQUEST_METHOD,
  HTTP_ROUTE: ATTR_HTTP_ROUTE,
  HTTP_STATUS_CODE: ATTR_HTTP_RESPONSE_STATUS_CODE,
  URL_PATH: ATTR_URL_PATH,
  CLIENT_ADDRESS: ATTR_CLIENT_ADDRESS,
  USER_AGENT: ATTR_USER_AGENT_ORIGINAL,
  REQUEST_ID: "request.id",
  REQUEST_OUTCOME: "request.outcome",
  DEPLOYMENT_ENVIRONMENT: "deployment.environment",
  DB_SYSTEM: "db.system",
  DB_OPERATION: "db.operation",
  DB_STATEMENT: "db.statement",
  DB_ROWS_AFFECTED: "db.rows_affected",
  TASK_NAME: "task.name",
  ERROR_TYPE: "error.type",
} as const;
