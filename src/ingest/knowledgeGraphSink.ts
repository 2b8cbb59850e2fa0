import { z } from "zod";

import { loadDataFile } from "../dataFiles.js";
import { describeError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { metadataString, type ContentSink, type SinkOutcome, type SourceMetadata } from "./types.js";
import { documentIdFor } from "./vectorStoreSink.js";

/** Canonical predicates emitted for ingested documents. */
export const P = Object.freeze({
  type: "rdf:type",
  title: "dc:title",
  lang: "dc:language",
  src: "dc:source",
  topic: "dc:subject",
  mentions: "topic:mentions",
} as const);

export interface KnowledgeTriple {
  readonly subject: string;
  readonly predicate: string;
  readonly object: string;
}

/** Graph backend receiving document triples. */
export interface GraphStore {
  addTriples(triples: readonly KnowledgeTriple[]): Promise<void>;
}

/** Default cap applied to the extracted mention list. */
const MAX_MENTION_TERMS = 12;

let stopWords: ReadonlySet<string> | null = null;

function loadStopWords(): ReadonlySet<string> {
  stopWords ??= new Set(loadDataFile("stop-words.json", z.array(z.string())));
  return stopWords;
}

/**
 * Most frequent terms of at least three letters seen twice or more, stop
 * words excluded. Ties resolve alphabetically.
 */
export function extractKeyTerms(texts: readonly string[], limit = MAX_MENTION_TERMS): string[] {
  const ignored = loadStopWords();
  const frequency = new Map<string, number>();

  for (const text of texts) {
    const tokens = text
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter((token) => token.length >= 3 && !ignored.has(token));
    for (const token of tokens) {
      frequency.set(token, (frequency.get(token) ?? 0) + 1);
    }
  }

  const entries = Array.from(frequency.entries()).filter(([, count]) => count >= 2);
  entries.sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  return entries.slice(0, limit).map(([token]) => token);
}

/** Builds the triples describing one document. Duplicates are dropped. */
export function buildDocumentTriples(content: string, metadata: SourceMetadata): KnowledgeTriple[] {
  const subject = `doc:${documentIdFor(content, metadata)}`;
  const title = metadataString(metadata, "title");
  const candidates: KnowledgeTriple[] = [{ subject, predicate: P.type, object: "topic:Document" }];

  const source = metadataString(metadata, "source_url");
  if (source) {
    candidates.push({ subject, predicate: P.src, object: source });
  }
  if (title) {
    candidates.push({ subject, predicate: P.title, object: title });
  }
  const language = metadataString(metadata, "language");
  if (language) {
    candidates.push({ subject, predicate: P.lang, object: language });
  }
  const topic = metadataString(metadata, "topic");
  if (topic) {
    candidates.push({ subject, predicate: P.topic, object: topic });
  }
  for (const term of extractKeyTerms(title ? [title, content] : [content])) {
    candidates.push({ subject, predicate: P.mentions, object: term });
  }

  const seen = new Set<string>();
  return candidates.filter((triple) => {
    const key = `${triple.predicate}\u0000${triple.object}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

export interface KnowledgeGraphSinkOptions {
  readonly graph: GraphStore;
  readonly logger?: StructuredLogger;
}

/** Hands document triples (type, source, title, language, mentions) to a {@link GraphStore}. */
export class KnowledgeGraphSink implements ContentSink {
  readonly name = "graph";
  private readonly graph: GraphStore;
  private readonly logger: StructuredLogger | null;

  constructor(options: KnowledgeGraphSinkOptions) {
    this.graph = options.graph;
    this.logger = options.logger ?? null;
  }

  async store(content: string, metadata: SourceMetadata): Promise<SinkOutcome> {
    const triples = buildDocumentTriples(content, metadata);
    try {
      await this.graph.addTriples(triples);
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
    this.logger?.debug("graph_triples_stored", { subject: triples[0]?.subject ?? null, triples: triples.length });
    return { ok: true };
  }
}
