import type { JsonValue } from "../errors.js";

/** Descriptive fields travelling with a piece of content (source URL, title, topic...). */
export type SourceMetadata = Readonly<Record<string, JsonValue>>;

export type SinkOutcome = { readonly ok: true } | { readonly ok: false; readonly error: string };

/** Downstream destination for crawled content. Failures resolve as `{ ok: false }`. */
export interface ContentSink {
  readonly name: string;
  store(content: string, metadata: SourceMetadata): Promise<SinkOutcome>;
}

/** Reads a non-empty string field, `null` otherwise. */
export function metadataString(metadata: SourceMetadata, key: string): string | null {
  const value = metadata[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}
