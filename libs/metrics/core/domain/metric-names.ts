/**
 * Exported metric names. Label sets stay bounded: endpoints are route
 * templates, never raw paths.
 */
export const MetricName = {
  HTTP_REQUESTS: "http_requests_total",
  HTTP_REQUEST_DURATION: "http_request_duration_seconds",
  HTTP_REQUEST_SIZE: "http_request_size_bytes",
  HTTP_RESPONSE_SIZE: "http_response_size_bytes",
  ACTIVE_REQUESTS: "active_requests",
  DATABASE_CONNECTIONS: "database_connections_active",
  USER_REGISTRATIONS: "user_registrations_total",
  LOGIN_ATTEMPTS: "login_attempts_total",
  API_CALLS: "api_calls_total",
  ERRORS: "errors_total",
  TASK_DURATION: "task_duration_seconds",
} as const;

export type MetricName = (typeof MetricName)[keyof typeof MetricName];

export const SIZE_BUCKETS = [100, 1000, 10000, 100000, 1000000];

/**
 * Route of the pull endpoint. Scrapes are not counted as requests, so two
 * consecutive scrapes export the same series.
 */
export const SCRAPE_ENDPOINT = "/metrics";
