import { performance } from "node:perf_hooks";

import { describeError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { PipelineMetricsRecorder } from "../metrics.js";
import type { ContentSink, SinkOutcome, SourceMetadata } from "./types.js";

/** Which sinks accepted the content. */
export interface SinkReport {
  readonly vectorStored: boolean;
  readonly entitiesExtracted: boolean;
  readonly archived: boolean;
}

export interface ProcessingReport extends SinkReport {
  /** At least one sink accepted the content. */
  readonly processed: boolean;
  readonly errors: readonly string[];
}

export interface ResourceProcessorOptions {
  readonly vector?: ContentSink | null;
  readonly graph?: ContentSink | null;
  readonly archive?: ContentSink | null;
  readonly logger?: StructuredLogger;
  readonly metrics?: PipelineMetricsRecorder;
}

export interface ProcessOptions {
  readonly extractEntities?: boolean;
}

/**
 * Routes crawled content to the configured sinks: vector storage, then entity
 * extraction, then the archive only when neither of the first two succeeded.
 */
export class ResourceProcessor {
  private readonly vector: ContentSink | null;
  private readonly graph: ContentSink | null;
  private readonly archive: ContentSink | null;
  private readonly logger: StructuredLogger | null;
  private readonly metrics: PipelineMetricsRecorder | null;

  constructor(options: ResourceProcessorOptions = {}) {
    this.vector = options.vector ?? null;
    this.graph = options.graph ?? null;
    this.archive = options.archive ?? null;
    this.logger = options.logger ?? null;
    this.metrics = options.metrics ?? null;
  }

  async process(content: string, metadata: SourceMetadata, options: ProcessOptions = {}): Promise<ProcessingReport> {
    const errors: string[] = [];
    let vectorStored = false;
    let entitiesExtracted = false;
    let archived = false;

    if (this.vector) {
      const outcome = await this.storeWith(this.vector, content, metadata);
      vectorStored = outcome.ok;
      if (!outcome.ok) {
        errors.push(`Vector storage error: ${outcome.error}`);
      }
    }

    if (this.graph && (options.extractEntities ?? true)) {
      const outcome = await this.storeWith(this.graph, content, metadata);
      entitiesExtracted = outcome.ok;
      if (!outcome.ok) {
        errors.push(`Entity extraction error: ${outcome.error}`);
      }
    }

    if (this.archive && !vectorStored && !entitiesExtracted) {
      const outcome = await this.storeWith(this.archive, content, metadata);
      archived = outcome.ok;
      if (!outcome.ok) {
        errors.push(`Basic storage error: ${outcome.error}`);
      }
    }

    const processed = vectorStored || entitiesExtracted || archived;
    this.logger?.debug("resource_processed", {
      source_url: metadata["source_url"] ?? null,
      vector_stored: vectorStored,
      entities_extracted: entitiesExtracted,
      archived,
      errors: errors.length,
    });
    return { vectorStored, entitiesExtracted, archived, processed, errors };
  }

  private async storeWith(sink: ContentSink, content: string, metadata: SourceMetadata): Promise<SinkOutcome> {
    const startedAt = performance.now();
    let outcome: SinkOutcome;
    try {
      outcome = await sink.store(content, metadata);
    } catch (error) {
      outcome = { ok: false, error: describeError(error) };
    }
    this.metrics?.observe("sinkStore", performance.now() - startedAt, outcome.ok);
    if (!outcome.ok) {
      this.logger?.warn("sink_store_failed", { sink: sink.name, message: outcome.error });
    }
    return outcome;
  }
}
