import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { describeError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { metadataString, type ContentSink, type SinkOutcome, type SourceMetadata } from "./types.js";
import { documentIdFor } from "./vectorStoreSink.js";

const MAX_NAME_LENGTH = 200;
const SUMMARY_LENGTH = 500;

/** Document written by {@link FileArchiveSink}. */
export interface ArchivedDocument {
  readonly name: string;
  readonly summary: string;
  readonly content: string;
  readonly metadata: SourceMetadata;
  readonly archivedAt: string;
}

/** `document_name`, else `source_url`, else a generic label; capped at 200 characters. */
export function archiveName(metadata: SourceMetadata): string {
  const name = metadataString(metadata, "document_name") ?? metadataString(metadata, "source_url") ?? "crawled_document";
  return name.length > MAX_NAME_LENGTH ? `${name.slice(0, MAX_NAME_LENGTH - 3)}...` : name;
}

export function summarise(content: string): string {
  return content.length > SUMMARY_LENGTH ? `${content.slice(0, SUMMARY_LENGTH)}...` : content;
}

export interface FileArchiveSinkOptions {
  readonly directory: string;
  readonly now?: () => number;
  readonly logger?: StructuredLogger;
}

/** Fallback storage: one JSON document per source under a local directory. */
export class FileArchiveSink implements ContentSink {
  readonly name = "archive";
  private readonly directory: string;
  private readonly now: () => number;
  private readonly logger: StructuredLogger | null;

  constructor(options: FileArchiveSinkOptions) {
    this.directory = options.directory;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? null;
  }

  async store(content: string, metadata: SourceMetadata): Promise<SinkOutcome> {
    const document: ArchivedDocument = {
      name: archiveName(metadata),
      summary: summarise(content),
      content,
      metadata,
      archivedAt: new Date(this.now()).toISOString(),
    };
    const target = join(this.directory, `${documentIdFor(content, metadata)}.json`);

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(target, `${JSON.stringify(document, null, 2)}\n`, "utf8");
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
    this.logger?.info("document_archived", { name: document.name, path: target });
    return { ok: true };
  }
}
