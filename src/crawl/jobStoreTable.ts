import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";

import { JobPersistenceError, describeError, jsonValueSchema } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { DEFAULT_JOB_LIST_LIMIT, type CrawlJobStore } from "./jobStore.js";
import { CRAWL_STATUSES, type CrawlJob, type CrawlJobListOptions, type CrawlStatus } from "./types.js";

/** Shape of one row of the `crawl_jobs` table. */
export interface CrawlJobRow {
  readonly job_id: string;
  readonly url: string;
  readonly status: CrawlStatus;
  readonly result: CrawlJobRowResult | null;
  readonly error: string | null;
  readonly created_at: string;
  readonly completed_at: string | null;
}

export interface CrawlJobRowResult {
  readonly content: string;
  readonly title: string | null;
  readonly metadata: CrawlJob["metadata"];
  readonly processing_time: number | null;
}

/**
 * Table-like collaborator the persistent store talks to. Reads return raw
 * rows; the store validates them.
 */
export interface CrawlJobTable {
  upsert(row: CrawlJobRow): Promise<void>;
  selectByJobId(jobId: string): Promise<readonly unknown[]>;
  selectRecent(limit: number, status?: CrawlStatus): Promise<readonly unknown[]>;
}

const timestampSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), "invalid timestamp");

const rowSchema = z.object({
  job_id: z.string().min(1),
  url: z.string(),
  status: z.enum(CRAWL_STATUSES),
  result: z
    .object({
      content: z.string(),
      title: z.string().nullable().optional(),
      metadata: z.record(jsonValueSchema).nullable().optional(),
      processing_time: z.number().nullable().optional(),
    })
    .nullable()
    .optional(),
  error: z.string().nullable().optional(),
  created_at: timestampSchema,
  completed_at: timestampSchema.nullable().optional(),
});

export function jobToRow(job: CrawlJob): CrawlJobRow {
  return {
    job_id: job.jobId,
    url: job.url,
    status: job.status,
    result:
      job.content !== null
        ? {
            content: job.content,
            title: job.title,
            metadata: job.metadata,
            processing_time: job.processingTimeMs,
          }
        : null,
    error: job.error,
    created_at: new Date(job.createdAt).toISOString(),
    completed_at: job.completedAt !== null ? new Date(job.completedAt).toISOString() : null,
  };
}

/** Validates a raw row and maps it back to a job. Throws on malformed rows. */
export function rowToJob(raw: unknown): CrawlJob {
  const row = rowSchema.parse(raw);
  return {
    jobId: row.job_id,
    url: row.url,
    status: row.status,
    content: row.result?.content ?? null,
    title: row.result?.title ?? null,
    metadata: { ...(row.result?.metadata ?? {}) },
    error: row.error ?? null,
    createdAt: Date.parse(row.created_at),
    completedAt: row.completed_at ? Date.parse(row.completed_at) : null,
    processingTimeMs: row.result?.processing_time ?? null,
  };
}

/** Persistent store backed by a {@link CrawlJobTable}. */
export class TableCrawlJobStore implements CrawlJobStore {
  private readonly logger: StructuredLogger | null;

  constructor(private readonly table: CrawlJobTable, options: { readonly logger?: StructuredLogger } = {}) {
    this.logger = options.logger ?? null;
  }

  async upsert(job: CrawlJob): Promise<void> {
    await this.table.upsert(jobToRow(job));
  }

  async get(jobId: string): Promise<CrawlJob | null> {
    const rows = await this.table.selectByJobId(jobId);
    const [first] = rows;
    if (first === undefined) {
      return null;
    }
    try {
      return rowToJob(first);
    } catch (error) {
      throw new JobPersistenceError(`Malformed crawl job row for ${jobId}: ${describeError(error)}`, error);
    }
  }

  async list(options: CrawlJobListOptions = {}): Promise<CrawlJob[]> {
    const rows = await this.table.selectRecent(options.limit ?? DEFAULT_JOB_LIST_LIMIT, options.status);
    const jobs: CrawlJob[] = [];
    for (const row of rows) {
      const parsed = rowSchema.safeParse(row);
      if (!parsed.success) {
        this.logger?.warn("crawl_job_row_invalid", { issues: parsed.error.issues.map((issue) => issue.message) });
        continue;
      }
      jobs.push(rowToJob(parsed.data));
    }
    return jobs;
  }
}

/** Adapts a Supabase client to the {@link CrawlJobTable} contract. */
export function createSupabaseJobTable(client: SupabaseClient, tableName = "crawl_jobs"): CrawlJobTable {
  return {
    async upsert(row) {
      const { error } = await client.from(tableName).upsert(row, { onConflict: "job_id" });
      if (error) {
        throw new JobPersistenceError(`Failed to upsert crawl job ${row.job_id}: ${error.message}`, error);
      }
    },
    async selectByJobId(jobId) {
      const { data, error } = await client.from(tableName).select("*").eq("job_id", jobId).limit(1);
      if (error) {
        throw new JobPersistenceError(`Failed to load crawl job ${jobId}: ${error.message}`, error);
      }
      return data ?? [];
    },
    async selectRecent(limit, status) {
      let query = client.from(tableName).select("*");
      if (status !== undefined) {
        query = query.eq("status", status);
      }
      const { data, error } = await query.order("created_at", { ascending: false }).limit(limit);
      if (error) {
        throw new JobPersistenceError(`Failed to list crawl jobs: ${error.message}`, error);
      }
      return data ?? [];
    },
  };
}
