export * from "./errors.js";
export * from "./logger.js";
export * from "./metrics.js";
export * from "./config/settings.js";
export * from "./search/index.js";
export * from "./discovery/classifier.js";
export * from "./discovery/engine.js";
export * from "./crawl/types.js";
export * from "./crawl/rateLimiter.js";
export * from "./crawl/robots.js";
export * from "./crawl/pageCrawler.js";
export * from "./crawl/jobStore.js";
export * from "./crawl/jobStoreTable.js";
export * from "./crawl/jobRepository.js";
export * from "./crawl/jobManager.js";
export * from "./ingest/types.js";
export * from "./ingest/chunking.js";
export * from "./ingest/vectorStoreSink.js";
export * from "./ingest/knowledgeGraphSink.js";
export * from "./ingest/fileArchiveSink.js";
export * from "./ingest/resourceProcessor.js";
export * from "./pipeline/coordinator.js";
export * from "./context.js";
