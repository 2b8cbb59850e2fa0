import { createClient } from "@supabase/supabase-js";

import { collectRedactionTokens, type TopicScoutConfig } from "./config/settings.js";
import { CrawlJobManager } from "./crawl/jobManager.js";
import { CrawlJobRepository } from "./crawl/jobRepository.js";
import { TableCrawlJobStore, createSupabaseJobTable, type CrawlJobTable } from "./crawl/jobStoreTable.js";
import { HttpPageCrawler, type PageCrawler } from "./crawl/pageCrawler.js";
import { DomainRateLimiter } from "./crawl/rateLimiter.js";
import { RobotsPolicy } from "./crawl/robots.js";
import { ResourceClassifier } from "./discovery/classifier.js";
import { TopicDiscoveryEngine } from "./discovery/engine.js";
import { FileArchiveSink } from "./ingest/fileArchiveSink.js";
import { KnowledgeGraphSink, type GraphStore } from "./ingest/knowledgeGraphSink.js";
import { ResourceProcessor } from "./ingest/resourceProcessor.js";
import { VectorStoreSink, type VectorIndex } from "./ingest/vectorStoreSink.js";
import { StructuredLogger } from "./logger.js";
import { PipelineMetricsRecorder } from "./metrics.js";
import { TopicPipelineCoordinator } from "./pipeline/coordinator.js";
import type { CuratedDirectory } from "./search/curatedProvider.js";
import { SearchProviderChain } from "./search/providerChain.js";
import { createSearchProviders } from "./search/providerFactory.js";
import type { SearchProvider } from "./search/types.js";

/**
 * Collaborators that replace the defaults derived from the configuration.
 * `null` explicitly disables an optional collaborator.
 */
export interface PipelineContextOverrides {
  readonly logger?: StructuredLogger;
  readonly metrics?: PipelineMetricsRecorder;
  readonly fetchImpl?: typeof fetch;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly searchProviders?: readonly SearchProvider[];
  readonly curatedDirectory?: CuratedDirectory;
  readonly crawler?: PageCrawler | null;
  readonly jobTable?: CrawlJobTable | null;
  readonly vectorIndex?: VectorIndex | null;
  readonly graphStore?: GraphStore | null;
}

/** Everything one pipeline run needs, built once and torn down with {@link PipelineContext.dispose}. */
export interface PipelineContext {
  readonly config: TopicScoutConfig;
  readonly logger: StructuredLogger;
  readonly metrics: PipelineMetricsRecorder;
  readonly search: SearchProviderChain;
  readonly classifier: ResourceClassifier;
  readonly discovery: TopicDiscoveryEngine;
  readonly rateLimiter: DomainRateLimiter;
  readonly robots: RobotsPolicy;
  readonly jobs: CrawlJobManager;
  readonly jobRepository: CrawlJobRepository;
  readonly processor: ResourceProcessor;
  readonly coordinator: TopicPipelineCoordinator;
  dispose(): Promise<void>;
}

export interface FeatureReport {
  readonly searx: boolean;
  readonly duckduckgo: boolean;
  readonly curated: boolean;
  readonly persistentJobs: boolean;
  readonly vectorStore: boolean;
  readonly knowledgeGraph: boolean;
  readonly archive: boolean;
}

/** Reports which optional collaborators a context built from `config` would have. */
export function describeFeatures(config: TopicScoutConfig, overrides: PipelineContextOverrides = {}): FeatureReport {
  const providers = config.search.providers;
  const supabaseConfigured = config.storage.supabaseUrl !== null && config.storage.supabaseKey !== null;
  return {
    searx: providers.includes("searx") && config.search.searx.baseUrl !== null,
    duckduckgo: providers.includes("duckduckgo"),
    curated: providers.includes("curated"),
    persistentJobs: overrides.jobTable !== undefined ? overrides.jobTable !== null : supabaseConfigured,
    vectorStore: Boolean(overrides.vectorIndex),
    knowledgeGraph: Boolean(overrides.graphStore),
    archive: config.storage.archiveDir !== null,
  };
}

function resolveJobTable(config: TopicScoutConfig, override: CrawlJobTable | null | undefined): CrawlJobTable | null {
  if (override !== undefined) {
    return override;
  }
  const { supabaseUrl, supabaseKey, jobTable } = config.storage;
  if (!supabaseUrl || !supabaseKey) {
    return null;
  }
  const client = createClient(supabaseUrl, supabaseKey, { auth: { persistSession: false, autoRefreshToken: false } });
  return createSupabaseJobTable(client, jobTable);
}

export function createPipelineContext(
  config: TopicScoutConfig,
  overrides: PipelineContextOverrides = {},
): PipelineContext {
  const logger =
    overrides.logger ??
    new StructuredLogger({
      logFile: config.logging.logFile,
      minLevel: config.logging.level,
      redactSecrets: collectRedactionTokens(config),
    });
  const metrics = overrides.metrics ?? new PipelineMetricsRecorder();

  const providers =
    overrides.searchProviders ??
    createSearchProviders(config.search, {
      fetchImpl: overrides.fetchImpl,
      sleep: overrides.sleep,
      curatedDirectory: overrides.curatedDirectory,
    });
  const search = new SearchProviderChain(providers, { logger, metrics });
  const classifier = new ResourceClassifier({ logger });
  const discovery = new TopicDiscoveryEngine({
    search,
    classifier,
    logger,
    maxResultsPerQuery: config.search.maxResultsPerQuery,
    cacheEnabled: config.discovery.cacheEnabled,
  });

  const rateLimiter = new DomainRateLimiter({ minDelayMs: config.crawl.minDomainDelayMs, now: overrides.now, logger });
  const robots = new RobotsPolicy({
    fetchImpl: overrides.fetchImpl,
    now: overrides.now,
    timeoutMs: config.crawl.robotsTimeoutMs,
    logger,
    metrics,
  });
  const crawler =
    overrides.crawler !== undefined
      ? overrides.crawler
      : new HttpPageCrawler({ fetchImpl: overrides.fetchImpl, maxBytes: config.crawl.maxBytes, logger });

  const jobTable = resolveJobTable(config, overrides.jobTable);
  const jobRepository = new CrawlJobRepository({
    persistent: jobTable ? new TableCrawlJobStore(jobTable, { logger }) : null,
    maxAttempts: config.storage.persistAttempts,
    sleep: overrides.sleep,
    logger,
    metrics,
  });
  const jobs = new CrawlJobManager({
    repository: jobRepository,
    crawler,
    rateLimiter,
    robots,
    defaults: config.crawl.defaults,
    batchPolitenessDelayMs: config.crawl.batchPolitenessDelayMs,
    now: overrides.now,
    sleep: overrides.sleep,
    logger,
    metrics,
  });

  const processor = new ResourceProcessor({
    vector: overrides.vectorIndex ? new VectorStoreSink({ index: overrides.vectorIndex, logger }) : null,
    graph: overrides.graphStore ? new KnowledgeGraphSink({ graph: overrides.graphStore, logger }) : null,
    archive: config.storage.archiveDir
      ? new FileArchiveSink({ directory: config.storage.archiveDir, now: overrides.now, logger })
      : null,
    logger,
    metrics,
  });
  const coordinator = new TopicPipelineCoordinator({
    discovery,
    crawler: jobs,
    processor,
    crawlDefaults: config.crawl.defaults,
    defaults: config.pipeline,
    now: overrides.now,
    logger,
  });

  logger.info("pipeline_context_created", {
    providers: search.providerNames,
    features: describeFeatures(config, overrides),
  });

  let disposed = false;
  return {
    config,
    logger,
    metrics,
    search,
    classifier,
    discovery,
    rateLimiter,
    robots,
    jobs,
    jobRepository,
    processor,
    coordinator,
    async dispose() {
      if (disposed) {
        return;
      }
      disposed = true;
      discovery.clearCache();
      robots.clear();
      rateLimiter.reset();
      await logger.flush();
    },
  };
}

/** Builds a context, hands it to `fn` and disposes it whatever the outcome. */
export async function withPipelineContext<T>(
  config: TopicScoutConfig,
  fn: (context: PipelineContext) => Promise<T>,
  overrides: PipelineContextOverrides = {},
): Promise<T> {
  const context = createPipelineContext(config, overrides);
  try {
    return await fn(context);
  } finally {
    await context.dispose();
  }
}
