import { performance } from "node:perf_hooks";

import type { StructuredLogger } from "../logger.js";
import type { PipelineMetricsRecorder } from "../metrics.js";
import { toFailure, type ProviderOutcome, type SearchProvider, type SearchResult } from "./types.js";

export interface ProviderChainOptions {
  readonly logger?: StructuredLogger;
  readonly metrics?: PipelineMetricsRecorder;
}

/**
 * Tries each provider in order and returns the first non-empty result list.
 * Results are never merged across providers. Never rejects: when every
 * provider comes back empty or failed the answer is `[]`.
 */
export async function multiProviderSearch(
  providers: readonly SearchProvider[],
  query: string,
  maxResults: number,
  options: ProviderChainOptions = {},
): Promise<SearchResult[]> {
  const { logger, metrics } = options;

  for (const provider of providers) {
    logger?.debug("search_provider_attempt", { provider: provider.name, query });
    const startedAt = performance.now();
    let outcome: ProviderOutcome;
    try {
      outcome = await provider.trySearch(query, maxResults);
    } catch (error) {
      // Providers are not supposed to reject; treat a rejection like any failure.
      outcome = toFailure(provider.name, error);
    }
    metrics?.observe("providerSearch", performance.now() - startedAt, outcome.ok);

    if (!outcome.ok) {
      logger?.warn("search_provider_failed", {
        provider: provider.name,
        query,
        code: outcome.error.code,
        status: outcome.error.status,
        message: outcome.error.message,
      });
      continue;
    }
    if (outcome.results.length === 0) {
      logger?.warn("search_provider_empty", { provider: provider.name, query });
      continue;
    }

    logger?.info("search_provider_succeeded", {
      provider: provider.name,
      query,
      count: outcome.results.length,
    });
    return [...outcome.results];
  }

  logger?.error("search_providers_exhausted", {
    query,
    providers: providers.map((provider) => provider.name),
  });
  return [];
}

/** Fixed, ordered provider list behind a single `search` call. */
export class SearchProviderChain {
  private readonly providers: readonly SearchProvider[];

  constructor(
    providers: readonly SearchProvider[],
    private readonly options: ProviderChainOptions = {},
  ) {
    this.providers = [...providers];
  }

  get providerNames(): string[] {
    return this.providers.map((provider) => provider.name);
  }

  search(query: string, maxResults: number): Promise<SearchResult[]> {
    return multiProviderSearch(this.providers, query, maxResults, this.options);
  }
}
