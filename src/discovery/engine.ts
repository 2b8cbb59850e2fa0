import type { StructuredLogger } from "../logger.js";
import type { SearchResult } from "../search/types.js";
import { ResourceClassifier, type DiscoveredResource, type SourceType } from "./classifier.js";

/** Phrasings fanned out for every topic, in this order. */
const QUERY_TEMPLATES: readonly ((topic: string) => string)[] = [
  (topic) => `${topic} official documentation`,
  (topic) => `${topic} tutorial beginner guide`,
  (topic) => `${topic} getting started guide`,
  (topic) => `learn ${topic} step by step`,
  (topic) => `${topic} best practices examples`,
  (topic) => `${topic} github repository tutorial`,
];

const DEFAULT_MAX_RESOURCES = 20;
const DEFAULT_RESULTS_PER_QUERY = 10;

/** What the engine needs from the search layer. */
export interface ResourceSearch {
  search(query: string, maxResults: number): Promise<SearchResult[]>;
}

export interface TopicDiscoveryOptions {
  readonly search: ResourceSearch;
  readonly classifier?: ResourceClassifier;
  readonly logger?: StructuredLogger;
  readonly maxResultsPerQuery?: number;
  readonly cacheEnabled?: boolean;
}

export function buildQueryVariants(topic: string): string[] {
  return QUERY_TEMPLATES.map((template) => template(topic));
}

/**
 * Collapses duplicate URLs, keeping the highest score. On a tie the entry
 * seen first stays.
 */
export function deduplicateResources(resources: readonly DiscoveredResource[]): DiscoveredResource[] {
  const byUrl = new Map<string, DiscoveredResource>();
  for (const resource of resources) {
    const existing = byUrl.get(resource.url);
    if (!existing || resource.priorityScore > existing.priorityScore) {
      byUrl.set(resource.url, resource);
    }
  }
  return [...byUrl.values()];
}

/** Stable descending sort on priority. */
export function rankResources(resources: readonly DiscoveredResource[]): DiscoveredResource[] {
  return [...resources].sort((left, right) => right.priorityScore - left.priorityScore);
}

export function getResourcesByType(
  resources: readonly DiscoveredResource[],
  sourceType: SourceType,
): DiscoveredResource[] {
  return resources.filter((resource) => resource.sourceType === sourceType);
}

/**
 * Turns a topic into a ranked, deduplicated list of resources by fanning the
 * query templates out over the search chain.
 */
export class TopicDiscoveryEngine {
  private readonly search: ResourceSearch;
  private readonly classifier: ResourceClassifier;
  private readonly logger: StructuredLogger | null;
  private readonly maxResultsPerQuery: number;
  private readonly cacheEnabled: boolean;
  private readonly cache = new Map<string, readonly DiscoveredResource[]>();

  constructor(options: TopicDiscoveryOptions) {
    this.search = options.search;
    this.logger = options.logger ?? null;
    this.classifier = options.classifier ?? new ResourceClassifier({ logger: options.logger });
    this.maxResultsPerQuery = Math.max(1, options.maxResultsPerQuery ?? DEFAULT_RESULTS_PER_QUERY);
    this.cacheEnabled = options.cacheEnabled ?? true;
  }

  async discoverResources(topic: string, maxResources = DEFAULT_MAX_RESOURCES): Promise<DiscoveredResource[]> {
    const cacheKey = `${topic}:${maxResources}`;
    const cached = this.cacheEnabled ? this.cache.get(cacheKey) : undefined;
    if (cached) {
      this.logger?.debug("topic_discovery_cache_hit", { topic, max_resources: maxResources });
      return [...cached];
    }

    const queries = buildQueryVariants(topic);
    const settled = await Promise.allSettled(queries.map((query) => this.search.search(query, this.maxResultsPerQuery)));

    const candidates: DiscoveredResource[] = [];
    let failedQueries = 0;
    settled.forEach((outcome, index) => {
      if (outcome.status === "rejected") {
        failedQueries += 1;
        this.logger?.warn("topic_discovery_query_failed", {
          topic,
          query: queries[index],
          message: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
        });
        return;
      }
      for (const result of outcome.value) {
        if (!result.url || !result.title) {
          continue;
        }
        candidates.push(this.classifier.toResource(result));
      }
    });

    const ranked = rankResources(deduplicateResources(candidates)).slice(0, Math.max(0, maxResources));
    if (this.cacheEnabled) {
      this.cache.set(cacheKey, ranked);
    }

    this.logger?.info("topic_discovery_completed", {
      topic,
      queries: queries.length,
      failed_queries: failedQueries,
      candidates: candidates.length,
      returned: ranked.length,
    });
    return [...ranked];
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }
}
