import pLimit from "p-limit";

import type { CrawlDefaults, PipelineConfig } from "../config/settings.js";
import type { CrawlJob, CrawlJobRequest } from "../crawl/types.js";
import { buildCrawlJobRequest } from "../crawl/types.js";
import type { DiscoveredResource, SourceType } from "../discovery/classifier.js";
import { describeError } from "../errors.js";
import type { ProcessingReport, ResourceProcessor, SinkReport } from "../ingest/resourceProcessor.js";
import type { SourceMetadata } from "../ingest/types.js";
import type { StructuredLogger } from "../logger.js";

/** What the coordinator needs from discovery. */
export interface ResourceDiscovery {
  discoverResources(topic: string, maxResources: number): Promise<DiscoveredResource[]>;
}

/** What the coordinator needs from the crawl layer. */
export interface CrawlExecutor {
  createAndExecuteJob(request: CrawlJobRequest): Promise<CrawlJob>;
}

export interface ResourceOutcome {
  readonly url: string;
  readonly title: string;
  readonly sourceType: SourceType;
  readonly priorityScore: number;
  readonly crawled: boolean;
  readonly processed: boolean;
  readonly contentLength: number;
  readonly jobId: string | null;
  readonly sinks: SinkReport;
  readonly errors: readonly string[];
}

export interface PipelineResult {
  readonly topic: string;
  discovered: number;
  crawled: number;
  processed: number;
  /** Completion order. */
  readonly resources: ResourceOutcome[];
  readonly errors: string[];
}

export type PipelineProgressEvent =
  | { readonly status: "discovering"; readonly message: string }
  | { readonly status: "crawling"; readonly message: string; readonly current: number; readonly total: number }
  | { readonly status: "completed"; readonly message: string; readonly results: PipelineResult };

export type ProgressListener = (event: PipelineProgressEvent) => void | Promise<void>;

export interface TopicRunOptions {
  readonly topic: string;
  readonly maxResources?: number;
  readonly maxConcurrentCrawls?: number;
  readonly extractEntities?: boolean;
  readonly onProgress?: ProgressListener;
}

export interface TopicPipelineCoordinatorOptions {
  readonly discovery: ResourceDiscovery;
  readonly crawler: CrawlExecutor;
  readonly processor: ResourceProcessor;
  readonly crawlDefaults?: CrawlDefaults;
  /** Used for run options the caller leaves out. */
  readonly defaults?: PipelineConfig;
  readonly now?: () => number;
  readonly logger?: StructuredLogger;
}

const DEFAULT_PIPELINE: PipelineConfig = { maxResources: 10, maxConcurrentCrawls: 3, extractEntities: true };

const NO_SINKS: SinkReport = Object.freeze({ vectorStored: false, entitiesExtracted: false, archived: false });

/**
 * Runs a topic end to end: discovery, bounded-concurrency crawling and sink
 * processing. Tasks return outcome records; only the coordinator touches the
 * aggregate, when each task settles.
 */
export class TopicPipelineCoordinator {
  private readonly discovery: ResourceDiscovery;
  private readonly crawler: CrawlExecutor;
  private readonly processor: ResourceProcessor;
  private readonly crawlDefaults: CrawlDefaults | undefined;
  private readonly defaults: PipelineConfig;
  private readonly now: () => number;
  private readonly logger: StructuredLogger | null;

  constructor(options: TopicPipelineCoordinatorOptions) {
    this.discovery = options.discovery;
    this.crawler = options.crawler;
    this.processor = options.processor;
    this.crawlDefaults = options.crawlDefaults;
    this.defaults = options.defaults ?? DEFAULT_PIPELINE;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? null;
  }

  async run(options: TopicRunOptions): Promise<PipelineResult> {
    const { topic, onProgress } = options;
    const maxResources = options.maxResources ?? this.defaults.maxResources;
    const maxConcurrentCrawls = Math.max(1, options.maxConcurrentCrawls ?? this.defaults.maxConcurrentCrawls);
    const extractEntities = options.extractEntities ?? this.defaults.extractEntities;

    const results: PipelineResult = { topic, discovered: 0, crawled: 0, processed: 0, resources: [], errors: [] };

    await this.emit(onProgress, { status: "discovering", message: `Searching for resources about ${topic}...` });

    let resources: DiscoveredResource[];
    try {
      resources = await this.discovery.discoverResources(topic, maxResources);
    } catch (error) {
      const message = `Topic discovery error: ${describeError(error)}`;
      this.logger?.error("topic_pipeline_discovery_failed", { topic, message });
      results.errors.push(message);
      return results;
    }

    results.discovered = resources.length;
    if (resources.length === 0) {
      results.errors.push("No resources discovered");
      this.logger?.warn("topic_pipeline_empty", { topic });
      return results;
    }
    this.logger?.info("topic_pipeline_discovered", { topic, discovered: resources.length });

    const limit = pLimit(maxConcurrentCrawls);
    const total = resources.length;

    await Promise.all(
      resources.map((resource, index) =>
        limit(async () => {
          await this.emit(onProgress, {
            status: "crawling",
            message: `Crawling ${resource.title}...`,
            current: index + 1,
            total,
          });
          return this.crawlAndProcess(resource, topic, extractEntities);
        }).then(
          (outcome) => this.fold(results, outcome),
          (error: unknown) => {
            const message = `Error processing ${resource.url}: ${describeError(error)}`;
            this.logger?.error("topic_pipeline_task_failed", { topic, url: resource.url, message });
            this.fold(results, failedOutcome(resource, message));
          },
        ),
      ),
    );

    await this.emit(onProgress, {
      status: "completed",
      message: `Processed ${results.processed} resources about ${topic}`,
      results,
    });
    this.logger?.info("topic_pipeline_completed", {
      topic,
      discovered: results.discovered,
      crawled: results.crawled,
      processed: results.processed,
      errors: results.errors.length,
    });
    return results;
  }

  /** Crawls one resource and, when the crawl completed with content, hands it to the sinks. */
  async crawlAndProcess(resource: DiscoveredResource, topic: string, extractEntities: boolean): Promise<ResourceOutcome> {
    const request = buildCrawlJobRequest(
      {
        url: resource.url,
        extractEntities,
        metadata: {
          topic,
          title: resource.title,
          source_type: resource.sourceType,
          priority_score: resource.priorityScore,
        },
      },
      this.crawlDefaults,
    );
    const job = await this.crawler.createAndExecuteJob(request);

    const base = {
      url: resource.url,
      title: resource.title,
      sourceType: resource.sourceType,
      priorityScore: resource.priorityScore,
      jobId: job.jobId,
    };

    if (job.status !== "completed" || job.content === null) {
      return {
        ...base,
        crawled: false,
        processed: false,
        contentLength: 0,
        sinks: NO_SINKS,
        errors: [job.error ?? `Crawl failed: ${job.status}`],
      };
    }

    const report = await this.processor.process(job.content, this.processingMetadata(job, resource, topic), {
      extractEntities,
    });
    return {
      ...base,
      crawled: true,
      processed: report.processed,
      contentLength: job.content.length,
      sinks: toSinkReport(report),
      errors: [...report.errors],
    };
  }

  private processingMetadata(job: CrawlJob, resource: DiscoveredResource, topic: string): SourceMetadata {
    const crawledAt = job.metadata["crawled_at"];
    return {
      source_url: resource.url,
      crawled_at: typeof crawledAt === "string" ? crawledAt : new Date(this.now()).toISOString(),
      title: job.title ?? resource.title,
      topic,
      source_type: resource.sourceType,
      priority_score: resource.priorityScore,
      job_id: job.jobId,
      language: job.metadata["language"] ?? null,
    };
  }

  private fold(results: PipelineResult, outcome: ResourceOutcome): void {
    if (outcome.crawled) {
      results.crawled += 1;
    }
    if (outcome.processed) {
      results.processed += 1;
    }
    results.resources.push(outcome);
    results.errors.push(...outcome.errors);
  }

  private async emit(listener: ProgressListener | undefined, event: PipelineProgressEvent): Promise<void> {
    if (!listener) {
      return;
    }
    try {
      await listener(event);
    } catch (error) {
      this.logger?.warn("topic_pipeline_progress_listener_failed", {
        status: event.status,
        message: describeError(error),
      });
    }
  }
}

function failedOutcome(resource: DiscoveredResource, message: string): ResourceOutcome {
  return {
    url: resource.url,
    title: resource.title,
    sourceType: resource.sourceType,
    priorityScore: resource.priorityScore,
    crawled: false,
    processed: false,
    contentLength: 0,
    jobId: null,
    sinks: NO_SINKS,
    errors: [message],
  };
}

function toSinkReport(report: ProcessingReport): SinkReport {
  return { vectorStored: report.vectorStored, entitiesExtracted: report.entitiesExtracted, archived: report.archived };
}
