import type { DependencyStatus, HealthStatus, OverallStatus } from "@ragline/types";

/** All healthy: healthy. None healthy: unhealthy. Otherwise degraded. */
export function aggregateHealth(dependencies: Record<string, DependencyStatus>): OverallStatus {
  const statuses = Object.values(dependencies);
  const healthy = statuses.filter((s) => s === "healthy").length;

  if (statuses.length > 0 && healthy === statuses.length) return "healthy";
  if (healthy === 0) return "unhealthy";
  return "degraded";
}

/** Runs every probe concurrently; a probe that throws counts as unhealthy. */
export async function checkDependencies(
  probes: Record<string, () => Promise<boolean>>,
  now: () => Date = () => new Date(),
): Promise<HealthStatus> {
  const entries = Object.entries(probes);
  const outcomes = await Promise.allSettled(entries.map(async ([, probe]) => probe()));

  const dependencies: Record<string, DependencyStatus> = {};
  entries.forEach(([name], i) => {
    const outcome = outcomes[i];
    dependencies[name] =
      outcome?.status === "fulfilled" && outcome.value ? "healthy" : "unhealthy";
  });

  return {
    dependencies,
    overall: aggregateHealth(dependencies),
    checkedAt: now().toISOString(),
  };
}
