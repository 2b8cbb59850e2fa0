import { cloneJob, type CrawlJob, type CrawlJobListOptions } from "./types.js";

/** Default page size used by {@link CrawlJobStore.list}. */
export const DEFAULT_JOB_LIST_LIMIT = 50;

/** Contract implemented by concrete job store backends. */
export interface CrawlJobStore {
  /** Insert or replace the job keyed by `jobId`. */
  upsert(job: CrawlJob): Promise<void>;
  /** Retrieve a single job. Returns `null` when unknown. */
  get(jobId: string): Promise<CrawlJob | null>;
  /** Most recently created jobs first, optionally restricted to one status. */
  list(options?: CrawlJobListOptions): Promise<CrawlJob[]>;
}

/** Serialises async critical sections. */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      return await operation();
    } finally {
      release();
    }
  }
}

/**
 * Map-backed store used as the always-available cache and in tests. Callers
 * only ever see copies of the stored jobs.
 */
export class InMemoryCrawlJobStore implements CrawlJobStore {
  private readonly mutex = new AsyncMutex();
  private readonly jobs = new Map<string, CrawlJob>();

  async upsert(job: CrawlJob): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.jobs.set(job.jobId, cloneJob(job));
    });
  }

  async get(jobId: string): Promise<CrawlJob | null> {
    const job = this.jobs.get(jobId);
    return job ? cloneJob(job) : null;
  }

  async list(options: CrawlJobListOptions = {}): Promise<CrawlJob[]> {
    const limit = options.limit ?? DEFAULT_JOB_LIST_LIMIT;
    const results: CrawlJob[] = [];
    for (const job of this.jobs.values()) {
      if (options.status !== undefined && job.status !== options.status) {
        continue;
      }
      results.push(cloneJob(job));
    }
    results.sort((a, b) => b.createdAt - a.createdAt);
    return results.slice(0, Math.max(0, limit));
  }

  get size(): number {
    return this.jobs.size;
  }

  clear(): void {
    this.jobs.clear();
  }
}
