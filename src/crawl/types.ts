import { z } from "zod";

import { DEFAULT_CRAWLER_USER_AGENT, type CrawlDefaults } from "../config/settings.js";
import type { JsonValue } from "../errors.js";

export const CRAWL_STATUSES = ["pending", "running", "completed", "failed", "cancelled"] as const;
export type CrawlStatus = (typeof CRAWL_STATUSES)[number];

/** Statuses a job never leaves once reached. */
export const TERMINAL_CRAWL_STATUSES: ReadonlySet<CrawlStatus> = new Set(["completed", "failed", "cancelled"]);

export function isTerminalStatus(status: CrawlStatus): boolean {
  return TERMINAL_CRAWL_STATUSES.has(status);
}

export type JobMetadata = Record<string, JsonValue>;

/** Options of a single crawl, frozen once built. */
export interface CrawlJobRequest {
  readonly url: string;
  readonly extractEntities: boolean;
  readonly politenessDelayMs: number;
  readonly maxPages: number;
  readonly followLinks: boolean;
  readonly respectRobotsTxt: boolean;
  readonly timeoutMs: number;
  readonly userAgent: string;
  readonly metadata: Readonly<JobMetadata>;
}

export type CrawlJobRequestInput = Partial<CrawlJobRequest> & { readonly url: string };

export interface CrawlJob {
  jobId: string;
  url: string;
  status: CrawlStatus;
  content: string | null;
  title: string | null;
  metadata: JobMetadata;
  error: string | null;
  /** Epoch milliseconds. */
  createdAt: number;
  completedAt: number | null;
  processingTimeMs: number | null;
}

export interface CrawlJobListOptions {
  readonly limit?: number;
  readonly status?: CrawlStatus;
}

const FALLBACK_DEFAULTS: CrawlDefaults = {
  extractEntities: true,
  politenessDelayMs: 1_000,
  maxPages: 1,
  followLinks: false,
  respectRobotsTxt: true,
  timeoutMs: 30_000,
  userAgent: DEFAULT_CRAWLER_USER_AGENT,
};

const requestInputSchema = z.object({
  url: z.string().trim().min(1, "url must not be empty"),
  extractEntities: z.boolean().optional(),
  politenessDelayMs: z.number().int().min(0).optional(),
  maxPages: z.number().int().min(1).optional(),
  followLinks: z.boolean().optional(),
  respectRobotsTxt: z.boolean().optional(),
  timeoutMs: z.number().int().positive().optional(),
  userAgent: z.string().min(1).optional(),
});

/** Validates the caller input and fills the gaps from `defaults`. */
export function buildCrawlJobRequest(
  input: CrawlJobRequestInput,
  defaults: CrawlDefaults = FALLBACK_DEFAULTS,
): CrawlJobRequest {
  const parsed = requestInputSchema.parse({
    url: input.url,
    extractEntities: input.extractEntities,
    politenessDelayMs: input.politenessDelayMs,
    maxPages: input.maxPages,
    followLinks: input.followLinks,
    respectRobotsTxt: input.respectRobotsTxt,
    timeoutMs: input.timeoutMs,
    userAgent: input.userAgent,
  });
  return Object.freeze({
    url: parsed.url,
    extractEntities: parsed.extractEntities ?? defaults.extractEntities,
    politenessDelayMs: parsed.politenessDelayMs ?? defaults.politenessDelayMs,
    maxPages: parsed.maxPages ?? defaults.maxPages,
    followLinks: parsed.followLinks ?? defaults.followLinks,
    respectRobotsTxt: parsed.respectRobotsTxt ?? defaults.respectRobotsTxt,
    timeoutMs: parsed.timeoutMs ?? defaults.timeoutMs,
    userAgent: parsed.userAgent ?? defaults.userAgent,
    metadata: Object.freeze({ ...(input.metadata ?? {}) }),
  });
}

export function cloneJob(job: CrawlJob): CrawlJob {
  return { ...job, metadata: structuredClone(job.metadata) };
}

/**
 * Best-effort title for crawled markdown: the first `# ` heading within the
 * first 10 lines, else the first short plain line within the first 5 lines.
 */
export function extractTitleFromContent(content: string): string {
  const lines = content.split("\n");

  for (const line of lines.slice(0, 10)) {
    const trimmed = line.trim();
    if (trimmed.startsWith("# ")) {
      return trimmed.slice(2).trim();
    }
  }

  for (const line of lines.slice(0, 5)) {
    const trimmed = line.trim();
    if (trimmed && !trimmed.startsWith("#") && trimmed.length < 100) {
      return trimmed;
    }
  }

  return "Untitled";
}
