export enum RequestOutcome {
  COMPLETED = "completed",
  FAILED = "failed",
  CANCELED = "canceled",
}

/**
 * Non-standard status used for requests the client abandoned before a
 * response was written.
 */
export const CLIENT_CLOSED_REQUEST = 499;

export interface RequestCompletion {
  outcome: RequestOutcome;
  statusCode: number;
  endpoint: string;
  durationMs: number;
  responseSize: number;
}
