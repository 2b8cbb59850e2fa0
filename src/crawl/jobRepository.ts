import { setTimeout as delay } from "node:timers/promises";

import { describeError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { PipelineMetricsRecorder } from "../metrics.js";
import { DEFAULT_JOB_LIST_LIMIT, InMemoryCrawlJobStore, type CrawlJobStore } from "./jobStore.js";
import type { CrawlJob, CrawlJobListOptions } from "./types.js";

export interface CrawlJobRepositoryOptions {
  /** Durable backend; memory only when omitted. */
  readonly persistent?: CrawlJobStore | null;
  readonly memory?: InMemoryCrawlJobStore;
  readonly maxAttempts?: number;
  /** Base of the linear backoff between persistence attempts. */
  readonly backoffMs?: number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly logger?: StructuredLogger;
  readonly metrics?: PipelineMetricsRecorder;
}

/**
 * Cache-aside access to crawl jobs. Memory is always written and always
 * consulted when the persistent store is absent or failing.
 */
export class CrawlJobRepository {
  private readonly memory: InMemoryCrawlJobStore;
  private readonly persistent: CrawlJobStore | null;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: StructuredLogger | null;
  private readonly metrics: PipelineMetricsRecorder | null;

  constructor(options: CrawlJobRepositoryOptions = {}) {
    this.memory = options.memory ?? new InMemoryCrawlJobStore();
    this.persistent = options.persistent ?? null;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.backoffMs = options.backoffMs ?? 500;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
    this.logger = options.logger ?? null;
    this.metrics = options.metrics ?? null;
  }

  get hasPersistentStore(): boolean {
    return this.persistent !== null;
  }

  /** Returns `false` when every persistence attempt failed; memory keeps the job regardless. */
  async save(job: CrawlJob): Promise<boolean> {
    await this.memory.upsert(job);
    const persistent = this.persistent;
    if (!persistent) {
      return true;
    }

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        if (this.metrics) {
          await this.metrics.measure("jobPersist", () => persistent.upsert(job));
        } else {
          await persistent.upsert(job);
        }
        return true;
      } catch (error) {
        this.logger?.warn("crawl_job_persist_failed", {
          job_id: job.jobId,
          attempt,
          max_attempts: this.maxAttempts,
          message: describeError(error),
        });
        if (attempt < this.maxAttempts) {
          await this.sleep(this.backoffMs * attempt);
        }
      }
    }

    this.logger?.error("crawl_job_persist_exhausted", { job_id: job.jobId, status: job.status });
    return false;
  }

  async get(jobId: string): Promise<CrawlJob | null> {
    if (this.persistent) {
      try {
        const stored = await this.persistent.get(jobId);
        if (stored) {
          return stored;
        }
      } catch (error) {
        this.logger?.warn("crawl_job_load_failed", { job_id: jobId, message: describeError(error) });
      }
    }
    return this.memory.get(jobId);
  }

  async list(options: CrawlJobListOptions = {}): Promise<CrawlJob[]> {
    const normalised = { limit: options.limit ?? DEFAULT_JOB_LIST_LIMIT, status: options.status };
    if (this.persistent) {
      try {
        return await this.persistent.list(normalised);
      } catch (error) {
        this.logger?.warn("crawl_job_list_failed", { message: describeError(error) });
      }
    }
    return this.memory.list(normalised);
  }

  /** Drops the in-memory copies. */
  clearMemory(): void {
    this.memory.clear();
  }
}
