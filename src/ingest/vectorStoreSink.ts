import { createHash } from "node:crypto";

import { describeError, type JsonValue } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { DEFAULT_MAX_TOKENS_PER_CHUNK, buildChunks, estimateTokenUsage } from "./chunking.js";
import { metadataString, type ContentSink, type SinkOutcome, type SourceMetadata } from "./types.js";

export interface VectorChunk {
  readonly id: string;
  readonly text: string;
  readonly tokenCount: number;
  readonly metadata: Readonly<Record<string, JsonValue>>;
}

/** Embedding store the chunks are handed to. Embedding happens on its side. */
export interface VectorIndex {
  upsert(chunks: readonly VectorChunk[]): Promise<void>;
}

export interface VectorStoreSinkOptions {
  readonly index: VectorIndex;
  readonly maxTokensPerChunk?: number;
  readonly logger?: StructuredLogger;
}

/** Stable identifier for a document: its source URL when known, else its content. */
export function documentIdFor(content: string, metadata: SourceMetadata): string {
  const basis = metadataString(metadata, "source_url") ?? content;
  return createHash("sha256").update(basis).digest("hex").slice(0, 16);
}

/** Splits content into token-budgeted chunks and upserts them into a {@link VectorIndex}. */
export class VectorStoreSink implements ContentSink {
  readonly name = "vector";
  private readonly index: VectorIndex;
  private readonly maxTokensPerChunk: number;
  private readonly logger: StructuredLogger | null;

  constructor(options: VectorStoreSinkOptions) {
    this.index = options.index;
    const limit = options.maxTokensPerChunk ?? DEFAULT_MAX_TOKENS_PER_CHUNK;
    this.maxTokensPerChunk = Number.isFinite(limit) && limit > 0 ? Math.floor(limit) : DEFAULT_MAX_TOKENS_PER_CHUNK;
    this.logger = options.logger ?? null;
  }

  async store(content: string, metadata: SourceMetadata): Promise<SinkOutcome> {
    const texts = buildChunks(content, this.maxTokensPerChunk);
    if (texts.length === 0) {
      return { ok: false, error: "no content to index" };
    }

    const documentId = documentIdFor(content, metadata);
    const chunks = texts.map((text, index) => ({
      id: `doc:${documentId}:chunk:${index}`,
      text,
      tokenCount: estimateTokenUsage(text),
      metadata: { ...metadata, document_id: documentId, chunk_index: index, chunk_count: texts.length },
    }));

    try {
      await this.index.upsert(chunks);
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
    this.logger?.debug("vector_chunks_stored", { document_id: documentId, chunks: chunks.length });
    return { ok: true };
  }
}
