import type { AggregateStats, BenchmarkRun, ErrorKind, LatencyStats } from "../types.js";

function median(sorted: number[]): number {
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

function latencyOf(elapsed: number[]): LatencyStats | null {
  if (elapsed.length === 0) return null;
  const sorted = [...elapsed].sort((a, b) => a - b);
  return {
    minMs: sorted[0],
    medianMs: median(sorted),
    maxMs: sorted[sorted.length - 1],
  };
}

/**
 * Summary statistics for one run. Pure: the same run always yields the
 * same stats.
 *
 * Failed results count toward the success-rate denominator but not
 * toward latency, which only covers successful results.
 */
export function aggregate(run: BenchmarkRun): AggregateStats {
  const total = run.results.length;
  const successes = run.results.filter((r) => r.success).length;

  const elapsed = run.results
    .filter((r) => r.success && r.elapsedMs >= 0)
    .map((r) => r.elapsedMs);
  const meanElapsedMs =
    elapsed.length > 0 ? elapsed.reduce((sum, ms) => sum + ms, 0) / elapsed.length : null;

  const failuresByKind: Record<ErrorKind, number> = { transient: 0, permanent: 0, resolution: 0, cancelled: 0 };
  for (const r of run.results) {
    if (!r.success) failuresByKind[r.error.kind]++;
  }

  return {
    total,
    successes,
    failures: total - successes,
    successRate: total === 0 ? 0 : successes / total,
    meanElapsedMs,
    latency: latencyOf(elapsed),
    failuresByKind,
    perController: run.results.map((r) => ({
      controllerType: r.controllerType,
      success: r.success,
      elapsedMs: r.elapsedMs,
      attempts: r.attempts,
      contentLength: r.content.length,
      ...(r.success ? {} : { errorKind: r.error.kind }),
    })),
  };
}
