import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";

import type { SearxConfig } from "../config/settings.js";
import {
  SearchProviderError,
  toFailure,
  type ProviderDependencies,
  type ProviderOutcome,
  type SearchProvider,
  type SearchResult,
} from "./types.js";

const PROVIDER_NAME = "searx";

/** Single result entry as returned by SearxNG. Unknown keys are dropped. */
const searxResultSchema = z.object({
  url: z.string().url(),
  title: z.string().nullish(),
  snippet: z.string().nullish(),
  content: z.string().nullish(),
});

/** Envelope returned by SearxNG when requesting the JSON format. */
const searxResponseSchema = z
  .object({
    query: z.string().optional(),
    number_of_results: z.number().optional(),
    // Some engines fail and drop the array altogether.
    results: z.array(z.unknown()).default([]),
  })
  .passthrough();

type SearxResponse = z.infer<typeof searxResponseSchema>;

function isRetriableStatus(status: number | null): boolean {
  return status === 429 || status === 502 || status === 503 || status === 504;
}

/**
 * Queries a SearxNG instance. Timeouts, bounded retries and schema validation
 * keep failures predictable; `trySearch` folds them into outcomes.
 */
export class SearxSearchProvider implements SearchProvider {
  public readonly name = PROVIDER_NAME;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: SearxConfig,
    deps: ProviderDependencies = {},
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.sleep = deps.sleep ?? ((ms: number) => delay(ms));
  }

  async trySearch(query: string, maxResults: number): Promise<ProviderOutcome> {
    try {
      return { ok: true, results: await this.search(query, maxResults) };
    } catch (error) {
      return toFailure(PROVIDER_NAME, error);
    }
  }

  /** Executes {@link query} and throws {@link SearchProviderError} on failure. */
  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    if (!this.config.baseUrl) {
      throw new SearchProviderError("SearxNG base URL is not configured", {
        code: "E-SEARCH-UNAVAILABLE",
        provider: PROVIDER_NAME,
      });
    }
    if (query.trim().length === 0) {
      throw new SearchProviderError("Search queries must be non-empty", {
        code: "E-SEARCH-SCHEMA",
        provider: PROVIDER_NAME,
      });
    }

    const url = new URL(this.config.apiPath, this.config.baseUrl);
    url.search = new URLSearchParams({
      q: query,
      format: "json",
      categories: this.config.categories.join(","),
      engines: this.config.engines.join(","),
    }).toString();

    const headers = new Headers({ Accept: "application/json" });
    if (this.config.authToken) {
      headers.set("Authorization", `Bearer ${this.config.authToken}`);
    }

    const maxAttempts = Math.max(1, this.config.maxRetries + 1);
    for (let attempt = 1; ; attempt += 1) {
      try {
        const payload = await this.parseResponse(await this.performRequest(url, headers));
        return normaliseResults(payload).slice(0, Math.max(0, maxResults));
      } catch (error) {
        const retriable =
          error instanceof SearchProviderError && error.code === "E-SEARCH-HTTP" && isRetriableStatus(error.status);
        if (!retriable || attempt >= maxAttempts) {
          throw error;
        }
        await this.sleep(150 * attempt + Math.floor(Math.random() * 100));
      }
    }
  }

  private async performRequest(url: URL, headers: Headers): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.fetchImpl(url, { method: "GET", headers, signal: controller.signal });
      if (!response.ok) {
        throw new SearchProviderError(`SearxNG responded with HTTP ${response.status}`, {
          code: "E-SEARCH-HTTP",
          provider: PROVIDER_NAME,
          status: response.status,
        });
      }
      return response;
    } catch (error) {
      if (error instanceof SearchProviderError) {
        throw error;
      }
      const message = controller.signal.aborted
        ? "SearxNG query timed out"
        : "Failed to execute request against SearxNG";
      throw new SearchProviderError(message, { code: "E-SEARCH-NETWORK", provider: PROVIDER_NAME, cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async parseResponse(response: Response): Promise<SearxResponse> {
    const contentType = response.headers.get("content-type") ?? "";
    if (!contentType.includes("json")) {
      throw new SearchProviderError("SearxNG returned a non-JSON payload", {
        code: "E-SEARCH-SCHEMA",
        provider: PROVIDER_NAME,
        status: response.status,
      });
    }

    let parsed: unknown;
    try {
      parsed = await response.json();
    } catch (error) {
      throw new SearchProviderError("Unable to parse SearxNG JSON payload", {
        code: "E-SEARCH-SCHEMA",
        provider: PROVIDER_NAME,
        status: response.status,
        cause: error,
      });
    }

    const result = searxResponseSchema.safeParse(parsed);
    if (!result.success) {
      throw new SearchProviderError("SearxNG payload did not match the expected schema", {
        code: "E-SEARCH-SCHEMA",
        provider: PROVIDER_NAME,
        status: response.status,
        cause: result.error,
      });
    }
    return result.data;
  }
}

/** Keeps the entries that validate; a single malformed hit never sinks the page. */
function normaliseResults(payload: SearxResponse): SearchResult[] {
  const results: SearchResult[] = [];
  for (const raw of payload.results) {
    const parsed = searxResultSchema.safeParse(raw);
    if (!parsed.success) {
      continue;
    }
    results.push({
      title: parsed.data.title?.trim() ?? "",
      url: canonicalizeUrl(parsed.data.url),
      description: (parsed.data.snippet ?? parsed.data.content ?? "").trim(),
    });
  }
  return results;
}

/**
 * Removes fragments and tracking parameters, then sorts the remaining query
 * parameters so the same page found by two engines dedupes cleanly.
 */
export function canonicalizeUrl(rawUrl: string): string {
  try {
    const url = new URL(rawUrl);
    url.hash = "";
    const params = new URLSearchParams(url.search);
    const blocked = [/^utm_/i, /^fbclid$/i, /^gclid$/i, /^mc_cid$/i, /^mc_eid$/i];
    for (const key of [...params.keys()]) {
      if (blocked.some((pattern) => pattern.test(key))) {
        params.delete(key);
      }
    }
    const sortedParams = [...params.entries()].sort(([aKey, aValue], [bKey, bValue]) =>
      aKey === bKey ? aValue.localeCompare(bValue) : aKey.localeCompare(bKey),
    );
    url.search = sortedParams.length > 0 ? new URLSearchParams(sortedParams).toString() : "";
    return url.toString();
  } catch {
    return rawUrl.trim();
  }
}
