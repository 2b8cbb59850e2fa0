import type { LogLevel } from "../logger.js";
import { parseCsvList, readBool, readEnum, readInt, readOptionalString, readString } from "./env.js";

/** Names of the search providers the chain knows how to build. */
export const SEARCH_PROVIDER_NAMES = ["searx", "duckduckgo", "curated"] as const;
export type SearchProviderName = (typeof SEARCH_PROVIDER_NAMES)[number];

const DEFAULT_PROVIDER_ORDER: readonly SearchProviderName[] = ["searx", "duckduckgo", "curated"];
const DEFAULT_SEARX_ENGINES = ["duckduckgo", "bing", "wikipedia", "github"] as const;
const DEFAULT_SEARX_CATEGORIES = ["general", "it"] as const;
const DEFAULT_SEARX_TIMEOUT_MS = 15_000;
const DEFAULT_DDG_TIMEOUT_MS = 10_000;
const DEFAULT_DDG_USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";
/** User agent announced by the crawler and matched against robots.txt groups. */
export const DEFAULT_CRAWLER_USER_AGENT = "TopicScout-Crawler/1.0";
/** Maximum payload accepted when fetching a page (5 MiB). */
const DEFAULT_CRAWL_MAX_BYTES = 5_000_000;

/** Configuration block dedicated to SearxNG. */
export interface SearxConfig {
  /** `null` disables the provider. */
  readonly baseUrl: string | null;
  readonly apiPath: string;
  readonly timeoutMs: number;
  readonly engines: readonly string[];
  readonly categories: readonly string[];
  readonly authToken: string | null;
  readonly maxRetries: number;
}

/** Configuration of the DuckDuckGo HTML scraper. */
export interface DuckDuckGoConfig {
  readonly endpoint: string;
  readonly timeoutMs: number;
  readonly userAgent: string;
}

export interface SearchConfig {
  /** Providers tried in order until one returns results. */
  readonly providers: readonly SearchProviderName[];
  readonly maxResultsPerQuery: number;
  readonly searx: SearxConfig;
  readonly duckduckgo: DuckDuckGoConfig;
}

export interface DiscoveryConfig {
  readonly cacheEnabled: boolean;
}

/** Defaults applied to crawl requests that omit a field. */
export interface CrawlDefaults {
  readonly extractEntities: boolean;
  readonly politenessDelayMs: number;
  readonly maxPages: number;
  readonly followLinks: boolean;
  readonly respectRobotsTxt: boolean;
  readonly timeoutMs: number;
  readonly userAgent: string;
}

export interface CrawlConfig {
  readonly defaults: CrawlDefaults;
  readonly minDomainDelayMs: number;
  readonly maxBytes: number;
  readonly robotsTimeoutMs: number;
  /** Politeness delay used by batch crawls. */
  readonly batchPolitenessDelayMs: number;
}

export interface PipelineConfig {
  readonly maxResources: number;
  readonly maxConcurrentCrawls: number;
  readonly extractEntities: boolean;
}

export interface StorageConfig {
  readonly supabaseUrl: string | null;
  readonly supabaseKey: string | null;
  readonly jobTable: string;
  /** Directory receiving basic documents; `null` disables the archive sink. */
  readonly archiveDir: string | null;
  readonly persistAttempts: number;
}

export interface LoggingConfig {
  readonly logFile: string | null;
  readonly level: LogLevel;
}

/** Aggregated runtime configuration. */
export interface TopicScoutConfig {
  readonly search: SearchConfig;
  readonly discovery: DiscoveryConfig;
  readonly crawl: CrawlConfig;
  readonly pipeline: PipelineConfig;
  readonly storage: StorageConfig;
  readonly logging: LoggingConfig;
}

function resolveProviderOrder(): SearchProviderName[] {
  const override = readOptionalString("TOPIC_SEARCH_PROVIDERS");
  if (!override) {
    return [...DEFAULT_PROVIDER_ORDER];
  }
  const order: SearchProviderName[] = [];
  for (const entry of parseCsvList(override)) {
    const match = SEARCH_PROVIDER_NAMES.find((name) => name === entry.toLowerCase());
    if (match) {
      order.push(match);
    }
  }
  return order.length > 0 ? order : [...DEFAULT_PROVIDER_ORDER];
}

function resolveList(name: string, fallback: readonly string[]): string[] {
  const override = readOptionalString(name);
  const parsed = override ? parseCsvList(override) : [];
  return parsed.length > 0 ? parsed : [...fallback];
}

/**
 * Loads the configuration from environment variables. Every value has a
 * default that works offline; invalid overrides are ignored.
 */
export function loadTopicScoutConfig(): TopicScoutConfig {
  const searxApiPath = readString("TOPIC_SEARX_API_PATH", "/search");

  return {
    search: {
      providers: resolveProviderOrder(),
      maxResultsPerQuery: readInt("TOPIC_SEARCH_MAX_RESULTS_PER_QUERY", 10, { min: 1, max: 50 }),
      searx: {
        baseUrl: readOptionalString("TOPIC_SEARX_BASE_URL") ?? null,
        apiPath: searxApiPath.startsWith("/") ? searxApiPath : `/${searxApiPath}`,
        timeoutMs: readInt("TOPIC_SEARX_TIMEOUT_MS", DEFAULT_SEARX_TIMEOUT_MS, { min: 1 }),
        engines: resolveList("TOPIC_SEARX_ENGINES", DEFAULT_SEARX_ENGINES),
        categories: resolveList("TOPIC_SEARX_CATEGORIES", DEFAULT_SEARX_CATEGORIES),
        authToken: readOptionalString("TOPIC_SEARX_AUTH_TOKEN") ?? null,
        maxRetries: readInt("TOPIC_SEARX_MAX_RETRIES", 2, { min: 0, max: 10 }),
      },
      duckduckgo: {
        endpoint: readString("TOPIC_DDG_ENDPOINT", "https://html.duckduckgo.com/html/"),
        timeoutMs: readInt("TOPIC_DDG_TIMEOUT_MS", DEFAULT_DDG_TIMEOUT_MS, { min: 1 }),
        userAgent: readString("TOPIC_DDG_UA", DEFAULT_DDG_USER_AGENT),
      },
    },
    discovery: {
      cacheEnabled: readBool("TOPIC_DISCOVERY_CACHE", true),
    },
    crawl: {
      defaults: {
        extractEntities: readBool("TOPIC_CRAWL_EXTRACT_ENTITIES", true),
        politenessDelayMs: readInt("TOPIC_CRAWL_POLITENESS_MS", 1_000, { min: 0, max: 60_000 }),
        maxPages: readInt("TOPIC_CRAWL_MAX_PAGES", 1, { min: 1, max: 100 }),
        followLinks: readBool("TOPIC_CRAWL_FOLLOW_LINKS", false),
        respectRobotsTxt: readBool("TOPIC_CRAWL_RESPECT_ROBOTS", true),
        timeoutMs: readInt("TOPIC_CRAWL_TIMEOUT_MS", 30_000, { min: 1 }),
        userAgent: readString("TOPIC_CRAWL_UA", DEFAULT_CRAWLER_USER_AGENT),
      },
      minDomainDelayMs: readInt("TOPIC_CRAWL_DOMAIN_DELAY_MS", 1_000, { min: 0, max: 60_000 }),
      maxBytes: readInt("TOPIC_CRAWL_MAX_BYTES", DEFAULT_CRAWL_MAX_BYTES, { min: 1 }),
      robotsTimeoutMs: readInt("TOPIC_CRAWL_ROBOTS_TIMEOUT_MS", 5_000, { min: 1 }),
      batchPolitenessDelayMs: readInt("TOPIC_CRAWL_BATCH_POLITENESS_MS", 2_000, { min: 0, max: 60_000 }),
    },
    pipeline: {
      maxResources: readInt("TOPIC_PIPELINE_MAX_RESOURCES", 10, { min: 1, max: 200 }),
      maxConcurrentCrawls: readInt("TOPIC_PIPELINE_CONCURRENCY", 3, { min: 1, max: 32 }),
      extractEntities: readBool("TOPIC_PIPELINE_EXTRACT_ENTITIES", true),
    },
    storage: {
      supabaseUrl: readOptionalString("SUPABASE_URL") ?? null,
      supabaseKey: readOptionalString("SUPABASE_KEY") ?? null,
      jobTable: readString("TOPIC_JOB_TABLE", "crawl_jobs"),
      archiveDir: readOptionalString("TOPIC_ARCHIVE_DIR") ?? null,
      persistAttempts: readInt("TOPIC_JOB_PERSIST_ATTEMPTS", 3, { min: 1, max: 10 }),
    },
    logging: {
      logFile: readOptionalString("TOPIC_LOG_FILE") ?? null,
      level: readEnum("TOPIC_LOG_LEVEL", ["debug", "info", "warn", "error"], "info"),
    },
  };
}

/**
 * Returns the secrets that must never reach a log line. Only non-empty values
 * are surfaced so they can be handed to the logger as-is.
 */
export function collectRedactionTokens(config: TopicScoutConfig): string[] {
  const deduped = new Set<string>();
  for (const candidate of [config.search.searx.authToken, config.storage.supabaseKey]) {
    const trimmed = candidate?.trim();
    if (trimmed) {
      deduped.add(trimmed);
    }
  }
  return [...deduped];
}
