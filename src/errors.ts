import { z } from "zod";

/** JSON-compatible value carried in job metadata and error details. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | { readonly [key: string]: JsonValue }
  | readonly JsonValue[];

/** Runtime validator for {@link JsonValue}. */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

/**
 * Base class of every error raised by the pipeline. The `code` is stable and
 * safe to match on; the message is meant for humans.
 */
export class TopicScoutError extends Error {
  public readonly code: string;
  public readonly details: JsonValue | null;

  constructor(message: string, options: { code: string; details?: JsonValue | null; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "TopicScoutError";
    this.code = options.code;
    this.details = options.details ?? null;
  }
}

/** Raised when a crawl exceeds its time budget. */
export class CrawlTimeoutError extends TopicScoutError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Crawl timed out after ${timeoutMs} ms.`, { code: "E-CRAWL-TIMEOUT", details: { timeoutMs } });
    this.name = "CrawlTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Raised when a job is asked to move along an edge the state machine forbids. */
export class InvalidJobTransitionError extends TopicScoutError {
  constructor(jobId: string, from: string, to: string) {
    super(`Invalid status transition ${from} -> ${to} for job ${jobId}`, {
      code: "E-JOB-TRANSITION",
      details: { jobId, from, to },
    });
    this.name = "InvalidJobTransitionError";
  }
}

/** Raised by persistent job stores when the backing table rejects an operation. */
export class JobPersistenceError extends TopicScoutError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "E-JOB-PERSIST", cause });
    this.name = "JobPersistenceError";
  }
}

/** Extracts a printable message from anything that was thrown. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
