export type DependencyStatus = "healthy" | "unhealthy" | "unknown";

export type OverallStatus = "healthy" | "degraded" | "unhealthy";

export interface HealthStatus {
  dependencies: Record<string, DependencyStatus>;
  overall: OverallStatus;
  checkedAt: string;
}
