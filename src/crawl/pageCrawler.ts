import { convert } from "html-to-text";
import { TextDecoder } from "node:util";

import { CrawlTimeoutError, describeError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";

export interface PageCrawlOptions {
  readonly url: string;
  readonly timeoutMs: number;
  readonly userAgent: string;
  /** Pages fetched at most, start page included. Only read when `followLinks` is set. */
  readonly maxPages?: number;
  /** Follows same-origin links of HTML pages until `maxPages` pages were fetched. */
  readonly followLinks?: boolean;
  /** Consulted before a followed link is fetched. */
  readonly canFollow?: (url: string) => Promise<boolean>;
  /** Aborts the in-flight request when the owning job is cancelled. */
  readonly signal?: AbortSignal;
}

/** Outcome reported by a crawler. A failed crawl resolves rather than throws. */
export interface PageCrawlResult {
  readonly success: boolean;
  readonly markdown: string | null;
  readonly html: string | null;
  readonly title: string | null;
  readonly error: string | null;
  readonly statusCode: number | null;
}

/** Anything able to turn a URL into page content. */
export interface PageCrawler {
  crawl(options: PageCrawlOptions): Promise<PageCrawlResult>;
}

export interface HttpPageCrawlerOptions {
  readonly fetchImpl?: typeof fetch;
  /** Upper bound on the decoded body size. */
  readonly maxBytes?: number;
  readonly logger?: StructuredLogger;
}

const DEFAULT_MAX_BYTES = 5_000_000;

/** Error raised whenever the payload exceeds the configured byte limit. */
class PayloadTooLargeError extends Error {
  constructor(maxBytes: number) {
    super(`Payload exceeds maximum allowed size of ${maxBytes} bytes.`);
    this.name = "PayloadTooLargeError";
  }
}

function failure(error: string, statusCode: number | null): PageCrawlResult {
  return { success: false, markdown: null, html: null, title: null, error, statusCode };
}

/** Media type of a Content-Type header, without parameters. */
function sanitiseContentType(raw: string | null): string | null {
  if (!raw) {
    return null;
  }
  const trimmed = (raw.split(";")[0] ?? "").trim().toLowerCase();
  return trimmed.length > 0 ? trimmed : null;
}

/** Lowercase `charset` parameter of a Content-Type header, `utf-8` when absent. */
export function charsetOf(raw: string | null): string {
  const match = raw ? /charset\s*=\s*"?([^";\s]+)"?/i.exec(raw) : null;
  return match?.[1]?.toLowerCase() ?? "utf-8";
}

/** Decodes with the declared charset; labels unknown to `TextDecoder` fall back to UTF-8. */
function decodeBody(bytes: Uint8Array, charset: string): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch (error) {
    if (!(error instanceof RangeError)) {
      throw error;
    }
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(bytes);
}

/** Reads the response body while enforcing the maximum size constraint. */
async function readClampedBody(response: Response, maxBytes: number): Promise<Buffer> {
  const body = response.body;
  if (!body) {
    return Buffer.alloc(0);
  }

  const reader = body.getReader();
  const chunks: Buffer[] = [];
  let total = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw new PayloadTooLargeError(maxBytes);
    }
    chunks.push(Buffer.from(value));
  }

  return Buffer.concat(chunks, total);
}

/** Text of the first `<title>` element, entity-decoded and collapsed. */
export function extractHtmlTitle(html: string): string | null {
  const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
  if (!match?.[1]) {
    return null;
  }
  const text = convert(match[1], { wordwrap: false }).replace(/\s+/g, " ").trim();
  return text.length > 0 ? text : null;
}

/**
 * Absolute http(s) targets of the page's anchors that share its origin, in
 * document order, without fragments or duplicates.
 */
export function extractSameOriginLinks(html: string, pageUrl: string): string[] {
  const base = new URL(pageUrl);
  const links = new Set<string>();
  for (const match of html.matchAll(/<a\s[^>]*?href\s*=\s*["']([^"']+)["']/gi)) {
    const href = match[1];
    if (!href) {
      continue;
    }
    let target: URL;
    try {
      target = new URL(href, base);
    } catch {
      continue;
    }
    target.hash = "";
    if (target.origin === base.origin && (target.protocol === "http:" || target.protocol === "https:")) {
      links.add(target.toString());
    }
  }
  return [...links];
}

/**
 * Renders HTML as markdown-flavoured text: headings become `#`-prefixed
 * lines, links keep their text only, media and scripts are dropped.
 */
export function renderHtmlAsMarkdown(html: string): string {
  const body = /<body[^>]*>([\s\S]*)<\/body>/i.exec(html)?.[1] ?? html;
  const marked = body.replace(/<h([1-6])(\s[^>]*)?>/gi, (tag: string, level: string) => `${tag}${"#".repeat(Number(level))} `);
  const headingOptions = { uppercase: false, leadingLineBreaks: 2, trailingLineBreaks: 1 };

  const text = convert(marked, {
    wordwrap: false,
    selectors: [
      { selector: "h1", options: headingOptions },
      { selector: "h2", options: headingOptions },
      { selector: "h3", options: headingOptions },
      { selector: "h4", options: headingOptions },
      { selector: "h5", options: headingOptions },
      { selector: "h6", options: headingOptions },
      { selector: "a", options: { ignoreHref: true } },
      { selector: "img", format: "skip" },
      { selector: "svg", format: "skip" },
      { selector: "script", format: "skip" },
      { selector: "style", format: "skip" },
      { selector: "noscript", format: "skip" },
      { selector: "nav", format: "skip" },
      { selector: "footer", format: "skip" },
    ],
  });

  return text
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Crawler on top of `fetch`. Accepts HTML and plain text; any other payload,
 * a non-2xx status or an oversized body is reported as a failed crawl. With
 * `followLinks`, same-origin links are fetched breadth first and their text is
 * appended to the start page's; followed pages that fail are skipped. Running
 * out of time rejects with {@link CrawlTimeoutError}.
 */
export class HttpPageCrawler implements PageCrawler {
  private readonly fetchImpl: typeof fetch;
  private readonly maxBytes: number;
  private readonly logger: StructuredLogger | null;

  constructor(options: HttpPageCrawlerOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    this.logger = options.logger ?? null;
  }

  async crawl(options: PageCrawlOptions): Promise<PageCrawlResult> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const first = await this.fetchPage(options.url, options.userAgent, controller.signal);
      const pageBudget = options.followLinks ? Math.max(1, options.maxPages ?? 1) : 1;
      if (!first.success || first.html === null || pageBudget === 1) {
        return first;
      }
      return await this.followLinks(first, first.html, options, pageBudget, controller.signal);
    } catch (error) {
      if (timedOut) {
        throw new CrawlTimeoutError(options.timeoutMs);
      }
      if (error instanceof PayloadTooLargeError) {
        return failure(error.message, null);
      }
      this.logger?.debug("page_crawl_failed", { url: options.url, message: describeError(error) });
      return failure(describeError(error), null);
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private async followLinks(
    first: PageCrawlResult,
    firstHtml: string,
    options: PageCrawlOptions,
    pageBudget: number,
    signal: AbortSignal,
  ): Promise<PageCrawlResult> {
    const visited = new Set<string>([new URL(options.url).toString()]);
    const queue = extractSameOriginLinks(firstHtml, options.url);
    const sections = first.markdown ? [first.markdown] : [];
    let pages = 1;

    while (pages < pageBudget) {
      const next = queue.shift();
      if (next === undefined) {
        break;
      }
      if (visited.has(next)) {
        continue;
      }
      visited.add(next);
      if (options.canFollow && !(await options.canFollow(next))) {
        this.logger?.debug("page_follow_skipped", { url: next });
        continue;
      }

      try {
        const page = await this.fetchPage(next, options.userAgent, signal);
        if (!page.success) {
          this.logger?.debug("page_follow_failed", { url: next, message: page.error });
          continue;
        }
        pages += 1;
        if (page.markdown) {
          sections.push(page.markdown);
        }
        if (page.html !== null) {
          queue.push(...extractSameOriginLinks(page.html, next));
        }
      } catch (error) {
        if (signal.aborted) {
          throw error;
        }
        this.logger?.debug("page_follow_failed", { url: next, message: describeError(error) });
      }
    }

    return { ...first, markdown: sections.join("\n\n") };
  }

  /** Fetches one page. Network failures and oversized bodies throw. */
  private async fetchPage(url: string, userAgent: string, signal: AbortSignal): Promise<PageCrawlResult> {
    const response = await this.fetchImpl(url, {
      headers: {
        "user-agent": userAgent,
        accept: "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.1",
      },
      redirect: "follow",
      signal,
    });

    if (!response.ok) {
      return failure(`HTTP ${response.status}`, response.status);
    }

    const rawContentType = response.headers.get("content-type");
    const contentType = sanitiseContentType(rawContentType);
    const isHtml = contentType === null || contentType === "text/html" || contentType === "application/xhtml+xml";
    if (!isHtml && contentType !== "text/plain") {
      return failure(`Unsupported content type: ${contentType}`, response.status);
    }

    const body = decodeBody(await readClampedBody(response, this.maxBytes), charsetOf(rawContentType));
    if (!isHtml) {
      return { success: true, markdown: body, html: null, title: null, error: null, statusCode: response.status };
    }

    return {
      success: true,
      markdown: renderHtmlAsMarkdown(body),
      html: body,
      title: extractHtmlTitle(body),
      error: null,
      statusCode: response.status,
    };
  }
}
