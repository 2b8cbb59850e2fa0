import { convert } from "html-to-text";

import type { DuckDuckGoConfig } from "../config/settings.js";
import {
  SearchProviderError,
  toFailure,
  type ProviderDependencies,
  type ProviderOutcome,
  type SearchProvider,
  type SearchResult,
} from "./types.js";

const PROVIDER_NAME = "duckduckgo";

/**
 * Matches the title anchors and snippet blocks of the HTML endpoint. Only the
 * opening tag carrying one of the two classes is matched, so the wrapping
 * result containers never swallow their children.
 */
const RESULT_ELEMENT_PATTERN =
  /<(a|div)\b([^>]*\bclass="[^"]*\b(result__a|result__snippet)\b[^"]*"[^>]*)>([\s\S]*?)<\/\1>/gi;

const HREF_PATTERN = /\bhref="([^"]*)"/i;

/** Scrapes DuckDuckGo's JavaScript-free results page. */
export class DuckDuckGoHtmlProvider implements SearchProvider {
  public readonly name = PROVIDER_NAME;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: DuckDuckGoConfig,
    deps: ProviderDependencies = {},
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
  }

  async trySearch(query: string, maxResults: number): Promise<ProviderOutcome> {
    try {
      return { ok: true, results: await this.search(query, maxResults) };
    } catch (error) {
      return toFailure(PROVIDER_NAME, error);
    }
  }

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    const url = new URL(this.config.endpoint);
    url.search = new URLSearchParams({ q: query }).toString();

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    let html: string;
    try {
      const response = await this.fetchImpl(url, {
        headers: { "User-Agent": this.config.userAgent, Accept: "text/html" },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new SearchProviderError(`DuckDuckGo responded with HTTP ${response.status}`, {
          code: "E-SEARCH-HTTP",
          provider: PROVIDER_NAME,
          status: response.status,
        });
      }
      html = await response.text();
    } catch (error) {
      if (error instanceof SearchProviderError) {
        throw error;
      }
      const message = controller.signal.aborted ? "DuckDuckGo query timed out" : "DuckDuckGo request failed";
      throw new SearchProviderError(message, { code: "E-SEARCH-NETWORK", provider: PROVIDER_NAME, cause: error });
    } finally {
      clearTimeout(timeout);
    }

    return parseDuckDuckGoHtml(html).slice(0, Math.max(0, maxResults));
  }
}

/**
 * Extracts results from the HTML endpoint markup. Each title anchor opens a
 * result; the first snippet that follows becomes its description.
 */
export function parseDuckDuckGoHtml(html: string): SearchResult[] {
  const drafts: Array<{ title: string; url: string; description: string }> = [];
  // Snippets only attach to a result opened by a resolvable anchor.
  let acceptingSnippet = false;

  for (const match of html.matchAll(RESULT_ELEMENT_PATTERN)) {
    const [, , attributes = "", kind = "", inner = ""] = match;
    if (kind.toLowerCase() === "result__a") {
      const target = resolveResultHref(HREF_PATTERN.exec(attributes)?.[1] ?? "");
      acceptingSnippet = target !== null;
      if (target) {
        drafts.push({ title: htmlToPlainText(inner), url: target, description: "" });
      }
      continue;
    }
    const current = drafts[drafts.length - 1];
    if (acceptingSnippet && current && current.description.length === 0) {
      current.description = htmlToPlainText(inner);
      acceptingSnippet = false;
    }
  }
  return drafts.filter((draft) => draft.title.length > 0);
}

/**
 * Unwraps `//duckduckgo.com/l/?uddg=<target>` redirects. Relative links and
 * sponsored redirects yield `null`.
 */
export function resolveResultHref(rawHref: string): string | null {
  const href = rawHref.replace(/&amp;/g, "&").trim();
  if (href.length === 0 || (href.startsWith("/") && !href.startsWith("//"))) {
    return null;
  }
  let parsed: URL;
  try {
    parsed = new URL(href, "https://duckduckgo.com");
  } catch {
    return null;
  }
  if (parsed.hostname.endsWith("duckduckgo.com")) {
    const target = parsed.searchParams.get("uddg");
    if (!target) {
      return null;
    }
    return /^https?:\/\//i.test(target) ? target : null;
  }
  return parsed.protocol === "http:" || parsed.protocol === "https:" ? parsed.toString() : null;
}

function htmlToPlainText(fragment: string): string {
  return convert(fragment, { wordwrap: false }).replace(/\s+/g, " ").trim();
}
