import { performance } from "node:perf_hooks";

/** Stages timed by the pipeline. */
export type PipelineMetricOperation = "providerSearch" | "robotsCheck" | "crawlPage" | "jobPersist" | "sinkStore";

/** Upper bounds (ms, inclusive) of the latency histogram; one overflow bucket follows. */
export const LATENCY_BOUNDS_MS: readonly number[] = [50, 100, 250, 500, 1_000, 2_000, 5_000, 10_000, 20_000];

export interface OperationOutcomes {
  readonly operation: PipelineMetricOperation;
  readonly success: number;
  readonly failure: number;
}

export interface OperationStats extends OperationOutcomes {
  readonly totalMs: number;
  readonly maxMs: number;
  /** Keyed `le_<bound>ms` then `gt_<last bound>ms`, in ascending order. */
  readonly histogram: Readonly<Record<string, number>>;
}

export interface PipelineMetricsOptions {
  /** Millisecond clock; `performance.now()` by default. */
  readonly now?: () => number;
}

interface MutableStats {
  success: number;
  failure: number;
  totalMs: number;
  maxMs: number;
  readonly bins: number[];
}

export function latencyBucketLabel(index: number): string {
  const bound = LATENCY_BOUNDS_MS[index];
  if (bound !== undefined) {
    return `le_${String(bound).padStart(5, "0")}ms`;
  }
  return `gt_${LATENCY_BOUNDS_MS[LATENCY_BOUNDS_MS.length - 1] ?? 0}ms`;
}

function binIndex(durationMs: number): number {
  const index = LATENCY_BOUNDS_MS.findIndex((bound) => durationMs <= bound);
  return index === -1 ? LATENCY_BOUNDS_MS.length : index;
}

/**
 * In-process counters and latency histograms per pipeline stage. Nothing is
 * exported anywhere; callers read them back through {@link snapshot}.
 */
export class PipelineMetricsRecorder {
  private readonly now: () => number;
  private readonly stats = new Map<PipelineMetricOperation, MutableStats>();

  constructor(options: PipelineMetricsOptions = {}) {
    this.now = options.now ?? (() => performance.now());
  }

  /** Times `callback`; a rejection is counted as a failure and rethrown as is. */
  async measure<T>(operation: PipelineMetricOperation, callback: () => Promise<T>): Promise<T> {
    const startedAt = this.now();
    let succeeded = false;
    try {
      const result = await callback();
      succeeded = true;
      return result;
    } finally {
      this.observe(operation, this.now() - startedAt, succeeded);
    }
  }

  /** Records a sample for stages that report failure as a value. */
  observe(operation: PipelineMetricOperation, durationMs: number, success: boolean): void {
    let stats = this.stats.get(operation);
    if (!stats) {
      stats = { success: 0, failure: 0, totalMs: 0, maxMs: 0, bins: new Array<number>(LATENCY_BOUNDS_MS.length + 1).fill(0) };
      this.stats.set(operation, stats);
    }
    const duration = Math.max(0, durationMs);
    if (success) {
      stats.success += 1;
    } else {
      stats.failure += 1;
    }
    stats.totalMs += duration;
    stats.maxMs = Math.max(stats.maxMs, duration);
    const bin = binIndex(duration);
    stats.bins[bin] = (stats.bins[bin] ?? 0) + 1;
  }

  /** Success and failure counts, sorted by operation name. */
  outcomes(): OperationOutcomes[] {
    return this.snapshot().map(({ operation, success, failure }) => ({ operation, success, failure }));
  }

  snapshot(): OperationStats[] {
    return [...this.stats.entries()]
      .sort(([left], [right]) => left.localeCompare(right))
      .map(([operation, stats]) => ({
        operation,
        success: stats.success,
        failure: stats.failure,
        totalMs: stats.totalMs,
        maxMs: stats.maxMs,
        histogram: Object.fromEntries(stats.bins.map((count, index) => [latencyBucketLabel(index), count])),
      }));
  }

  reset(): void {
    this.stats.clear();
  }
}
