export type ComponentStatus = "healthy" | "unhealthy";

export interface HealthReport {
  status: ComponentStatus;
  timestamp: string;
  version: string;
  environment: string;
  database: ComponentStatus;
}

export interface ProbeResponse {
  status: "alive" | "ready";
  /** Epoch seconds */
  timestamp: number;
}
