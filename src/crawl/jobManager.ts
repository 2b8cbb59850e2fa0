import { createHash } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";

import pLimit from "p-limit";
import { detect } from "tinyld";

import type { CrawlDefaults } from "../config/settings.js";
import { CrawlTimeoutError, InvalidJobTransitionError, describeError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { PipelineMetricsRecorder } from "../metrics.js";
import type { CrawlJobRepository } from "./jobRepository.js";
import type { PageCrawler, PageCrawlResult } from "./pageCrawler.js";
import type { DomainRateLimiter } from "./rateLimiter.js";
import type { RobotsPolicy } from "./robots.js";
import {
  buildCrawlJobRequest,
  extractTitleFromContent,
  isTerminalStatus,
  type CrawlJob,
  type CrawlJobListOptions,
  type CrawlJobRequest,
  type CrawlStatus,
  type JobMetadata,
} from "./types.js";

/** Edges of the job state machine. Terminal states have none. */
const ALLOWED_TRANSITIONS: Readonly<Record<CrawlStatus, readonly CrawlStatus[]>> = {
  pending: ["running", "failed", "cancelled"],
  running: ["completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

/** Politeness delay applied between pages of a {@link CrawlJobManager.crawlUrls} batch. */
const DEFAULT_BATCH_POLITENESS_MS = 2_000;
/** Characters fed to the language detector. */
const LANGUAGE_SAMPLE_CHARS = 2_000;

export function canTransition(from: CrawlStatus, to: CrawlStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(jobId: string, from: CrawlStatus, to: CrawlStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidJobTransitionError(jobId, from, to);
  }
}

/** First 12 hex chars of md5(`url_isoTimestamp`). Two jobs for one URL in the same millisecond collide. */
export function generateJobId(url: string, timestamp: number): string {
  return createHash("md5").update(`${url}_${new Date(timestamp).toISOString()}`).digest("hex").slice(0, 12);
}

/** ISO 639-1 code of the dominant language, `"unknown"` when undetectable. */
export function detectLanguage(content: string): string {
  const code = detect(content.slice(0, LANGUAGE_SAMPLE_CHARS));
  return code.length > 0 ? code : "unknown";
}

export interface CrawlJobManagerOptions {
  readonly repository: CrawlJobRepository;
  /** Without a crawler every execution fails. */
  readonly crawler?: PageCrawler | null;
  readonly rateLimiter: DomainRateLimiter;
  readonly robots?: RobotsPolicy | null;
  readonly defaults?: CrawlDefaults;
  readonly batchPolitenessDelayMs?: number;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly logger?: StructuredLogger;
  readonly metrics?: PipelineMetricsRecorder;
}

interface ActiveExecution {
  readonly controller: AbortController;
  /** Stored job, or a placeholder for an unknown id. */
  readonly loaded: Promise<CrawlJob>;
  /** `null` until the execution has claimed the job. */
  job: CrawlJob | null;
  /** Set when the job is cancelled before the execution claimed it. */
  cancellation: Promise<CrawlJob> | null;
}

interface ClaimedExecution extends ActiveExecution {
  job: CrawlJob;
}

interface FailurePatch {
  readonly error: string;
}

interface CompletionPatch {
  readonly content: string;
  readonly title: string;
  readonly metadata: JobMetadata;
  readonly processingTimeMs: number;
}

/**
 * Creates, executes and tracks single-page crawl jobs. Every state change is
 * saved through the repository before the next step runs.
 */
export class CrawlJobManager {
  private readonly repository: CrawlJobRepository;
  private readonly crawler: PageCrawler | null;
  private readonly rateLimiter: DomainRateLimiter;
  private readonly robots: RobotsPolicy | null;
  private readonly defaults: CrawlDefaults | undefined;
  private readonly batchPolitenessDelayMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: StructuredLogger | null;
  private readonly metrics: PipelineMetricsRecorder | null;
  private readonly active = new Map<string, ActiveExecution>();

  constructor(options: CrawlJobManagerOptions) {
    this.repository = options.repository;
    this.crawler = options.crawler ?? null;
    this.rateLimiter = options.rateLimiter;
    this.robots = options.robots ?? null;
    this.defaults = options.defaults;
    this.batchPolitenessDelayMs = options.batchPolitenessDelayMs ?? DEFAULT_BATCH_POLITENESS_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
    this.logger = options.logger ?? null;
    this.metrics = options.metrics ?? null;
  }

  async createJob(request: CrawlJobRequest): Promise<CrawlJob> {
    const createdAt = this.now();
    const job: CrawlJob = {
      jobId: generateJobId(request.url, createdAt),
      url: request.url,
      status: "pending",
      content: null,
      title: null,
      metadata: { ...request.metadata },
      error: null,
      createdAt,
      completedAt: null,
      processingTimeMs: null,
    };
    await this.repository.save(job);
    this.logger?.info("crawl_job_created", { job_id: job.jobId, url: job.url });
    return job;
  }

  /**
   * Runs a pending job to a terminal state. The id is reserved before the
   * job is read, so a second execution of the same id rejects and a
   * cancellation landing during the read wins.
   */
  async executeJob(jobId: string, request: CrawlJobRequest): Promise<CrawlJob> {
    const inFlight = this.active.get(jobId);
    if (inFlight) {
      throw new InvalidJobTransitionError(jobId, inFlight.job?.status ?? "pending", "running");
    }

    const execution: ActiveExecution = {
      controller: new AbortController(),
      loaded: this.repository.get(jobId).then((stored) => stored ?? this.placeholder(jobId, request.url)),
      job: null,
      cancellation: null,
    };
    this.active.set(jobId, execution);
    try {
      const initial = await execution.loaded;
      if (execution.cancellation) {
        return await execution.cancellation;
      }
      assertTransition(jobId, initial.status, "running");
      const claimed: ClaimedExecution = Object.assign(execution, { job: initial });
      return await this.runExecution(claimed, request);
    } finally {
      this.active.delete(jobId);
    }
  }

  async createAndExecuteJob(request: CrawlJobRequest): Promise<CrawlJob> {
    const job = await this.createJob(request);
    return this.executeJob(job.jobId, request);
  }

  /**
   * Moves a pending or running job to `cancelled`. A running crawl is aborted
   * and its outcome discarded. Returns `null` for unknown ids.
   */
  async cancelJob(jobId: string): Promise<CrawlJob | null> {
    const execution = this.active.get(jobId);
    if (execution && execution.job === null) {
      const cancellation = execution.cancellation ?? this.cancelBeforeClaim(jobId, execution.loaded);
      execution.cancellation = cancellation;
      return cancellation;
    }
    if (execution?.job) {
      const cancelled = this.applyTransition(execution.job, "cancelled");
      execution.job = cancelled;
      execution.controller.abort();
      await this.repository.save(cancelled);
      this.logger?.info("crawl_job_cancelled", { job_id: jobId, was_running: true });
      return cancelled;
    }

    const stored = await this.repository.get(jobId);
    if (!stored) {
      return null;
    }
    const cancelled = this.applyTransition(stored, "cancelled");
    await this.repository.save(cancelled);
    this.logger?.info("crawl_job_cancelled", { job_id: jobId, was_running: false });
    return cancelled;
  }

  private async cancelBeforeClaim(jobId: string, loaded: Promise<CrawlJob>): Promise<CrawlJob> {
    const cancelled = this.applyTransition(await loaded, "cancelled");
    await this.repository.save(cancelled);
    this.logger?.info("crawl_job_cancelled", { job_id: jobId, was_running: false });
    return cancelled;
  }

  async getJob(jobId: string): Promise<CrawlJob | null> {
    return this.repository.get(jobId);
  }

  async listJobs(options: CrawlJobListOptions = {}): Promise<CrawlJob[]> {
    return this.repository.list(options);
  }

  /**
   * Crawls a batch with at most `concurrentLimit` jobs in flight. Results
   * keep the input order; a job that throws becomes a failed `failed_<index>`
   * placeholder.
   */
  async crawlUrls(urls: readonly string[], concurrentLimit = 3): Promise<CrawlJob[]> {
    const limit = pLimit(Math.max(1, concurrentLimit));
    return Promise.all(
      urls.map((url, index) =>
        limit(async () => {
          try {
            const request = buildCrawlJobRequest(
              { url, politenessDelayMs: this.batchPolitenessDelayMs },
              this.defaults,
            );
            return await this.createAndExecuteJob(request);
          } catch (error) {
            const message = describeError(error);
            this.logger?.warn("crawl_batch_item_failed", { url, index, message });
            const at = this.now();
            const failed: CrawlJob = {
              ...this.placeholder(`failed_${index}`, url),
              status: "failed",
              error: message,
              metadata: { error: message },
              createdAt: at,
              completedAt: at,
            };
            return failed;
          }
        }),
      ),
    );
  }

  private async runExecution(execution: ClaimedExecution, request: CrawlJobRequest): Promise<CrawlJob> {
    const { jobId } = execution.job;
    const signal = execution.controller.signal;

    const crawler = this.crawler;
    if (!crawler) {
      return this.fail(execution, { error: "No page crawler configured" });
    }

    if (!this.rateLimiter.canCrawl(request.url)) {
      return this.fail(execution, { error: `Rate limited for domain: ${request.url}` });
    }

    await this.transition(execution, "running");
    if (signal.aborted) {
      return execution.job;
    }
    const startedAt = this.now();
    this.logger?.info("crawl_job_started", { job_id: jobId, url: request.url });

    try {
      if (request.respectRobotsTxt && this.robots) {
        const allowed = await this.robots.canFetch(request.url, request.userAgent);
        if (signal.aborted) {
          return execution.job;
        }
        if (!allowed) {
          return this.fail(execution, { error: "Crawling disallowed by robots.txt" });
        }
      }

      if (request.politenessDelayMs > 0) {
        await this.sleep(request.politenessDelayMs);
        if (signal.aborted) {
          return execution.job;
        }
      }

      const result = await this.crawlWithTimeout(crawler, request, signal);
      if (signal.aborted) {
        return execution.job;
      }

      if (!result.success) {
        return this.fail(execution, { error: `Crawl failed: ${result.error ?? "Unknown error"}` });
      }
      const content = result.markdown || result.html || "";
      if (content.length === 0) {
        return this.fail(execution, { error: "Crawl failed: empty content" });
      }

      const processingTimeMs = this.now() - startedAt;
      const title = result.title || extractTitleFromContent(content);
      const metadata: JobMetadata = {
        ...execution.job.metadata,
        title,
        url: request.url,
        crawled_at: new Date(this.now()).toISOString(),
        content_length: content.length,
        processing_time_ms: processingTimeMs,
        language: detectLanguage(content),
      };

      const completed = await this.complete(execution, { content, title, metadata, processingTimeMs });
      this.logger?.info("crawl_job_completed", {
        job_id: jobId,
        url: request.url,
        content_length: content.length,
        processing_time_ms: processingTimeMs,
      });
      return completed;
    } catch (error) {
      if (signal.aborted) {
        return execution.job;
      }
      if (error instanceof CrawlTimeoutError) {
        return this.fail(execution, { error: `Crawl timeout after ${request.timeoutMs}ms` });
      }
      return this.fail(execution, { error: `Crawl error: ${describeError(error)}` });
    }
  }

  private async crawlWithTimeout(
    crawler: PageCrawler,
    request: CrawlJobRequest,
    jobSignal: AbortSignal,
  ): Promise<PageCrawlResult> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    if (jobSignal.aborted) {
      controller.abort();
    }
    jobSignal.addEventListener("abort", forwardAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject before aborting: the race must settle with the timeout.
        reject(new CrawlTimeoutError(request.timeoutMs));
        controller.abort();
      }, request.timeoutMs);
    });

    const robots = request.respectRobotsTxt ? this.robots : null;
    const crawl = crawler.crawl({
      url: request.url,
      timeoutMs: request.timeoutMs,
      userAgent: request.userAgent,
      maxPages: request.maxPages,
      followLinks: request.followLinks,
      canFollow: robots ? (url) => robots.canFetch(url, request.userAgent) : undefined,
      signal: controller.signal,
    });

    try {
      return this.metrics
        ? await this.metrics.measure("crawlPage", () => Promise.race([crawl, timeout]))
        : await Promise.race([crawl, timeout]);
    } finally {
      clearTimeout(timer);
      jobSignal.removeEventListener("abort", forwardAbort);
    }
  }

  private async fail(execution: ClaimedExecution, patch: FailurePatch): Promise<CrawlJob> {
    const failed = await this.transition(execution, "failed", {
      error: patch.error,
      metadata: { ...execution.job.metadata, error: patch.error },
    });
    this.logger?.warn("crawl_job_failed", { job_id: failed.jobId, url: failed.url, error: patch.error });
    return failed;
  }

  private async complete(execution: ClaimedExecution, patch: CompletionPatch): Promise<CrawlJob> {
    return this.transition(execution, "completed", patch);
  }

  private async transition(
    execution: ClaimedExecution,
    to: CrawlStatus,
    patch: Partial<Pick<CrawlJob, "content" | "title" | "metadata" | "error" | "processingTimeMs">> = {},
  ): Promise<CrawlJob> {
    const next = this.applyTransition(execution.job, to, patch);
    execution.job = next;
    await this.repository.save(next);
    return next;
  }

  private applyTransition(
    job: CrawlJob,
    to: CrawlStatus,
    patch: Partial<Pick<CrawlJob, "content" | "title" | "metadata" | "error" | "processingTimeMs">> = {},
  ): CrawlJob {
    assertTransition(job.jobId, job.status, to);
    return {
      ...job,
      ...patch,
      status: to,
      completedAt: isTerminalStatus(to) ? this.now() : null,
    };
  }

  private placeholder(jobId: string, url: string): CrawlJob {
    return {
      jobId,
      url,
      status: "pending",
      content: null,
      title: null,
      metadata: {},
      error: null,
      createdAt: this.now(),
      completedAt: null,
      processingTimeMs: null,
    };
  }
}
