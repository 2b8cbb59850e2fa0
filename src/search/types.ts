import { TopicScoutError } from "../errors.js";

/** Stable codes carried by {@link SearchProviderError}. */
export type SearchProviderErrorCode =
  | "E-SEARCH-UNAVAILABLE"
  | "E-SEARCH-HTTP"
  | "E-SEARCH-SCHEMA"
  | "E-SEARCH-NETWORK"
  | "E-SEARCH-PARSE"
  | "E-SEARCH-UNEXPECTED";

/** Error describing why a provider could not return results. */
export class SearchProviderError extends TopicScoutError {
  public override readonly code: SearchProviderErrorCode;
  public readonly provider: string;
  public readonly status: number | null;

  constructor(
    message: string,
    options: { code: SearchProviderErrorCode; provider: string; status?: number | null; cause?: unknown },
  ) {
    super(message, {
      code: options.code,
      details: { provider: options.provider, status: options.status ?? null },
      cause: options.cause,
    });
    this.name = "SearchProviderError";
    this.code = options.code;
    this.provider = options.provider;
    this.status = options.status ?? null;
  }
}

/** Normalised search hit. Missing fields are empty strings, never `undefined`. */
export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly description: string;
}

/** Result of a single provider attempt. */
export type ProviderOutcome =
  | { readonly ok: true; readonly results: readonly SearchResult[] }
  | { readonly ok: false; readonly error: SearchProviderError };

/**
 * A named search backend. `trySearch` never rejects: failures come back as
 * `{ ok: false }` so the chain can branch on them.
 */
export interface SearchProvider {
  readonly name: string;
  trySearch(query: string, maxResults: number): Promise<ProviderOutcome>;
}

/** Injection points shared by the HTTP-backed providers. */
export interface ProviderDependencies {
  readonly fetchImpl?: typeof fetch;
  readonly sleep?: (ms: number) => Promise<void>;
}

/** Wraps an unexpected throwable into a provider failure outcome. */
export function toFailure(provider: string, error: unknown): ProviderOutcome {
  if (error instanceof SearchProviderError) {
    return { ok: false, error };
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    ok: false,
    error: new SearchProviderError(`${provider} failed unexpectedly: ${message}`, {
      code: "E-SEARCH-UNEXPECTED",
      provider,
      cause: error,
    }),
  };
}
