import type { StructuredLogger } from "../logger.js";

export interface DomainRateLimiterOptions {
  /** Minimum spacing between two admitted crawls of the same host. */
  readonly minDelayMs?: number;
  readonly now?: () => number;
  readonly logger?: StructuredLogger;
}

/**
 * Per-host admission gate. A denied call does not move the host's window;
 * only admitted crawls record a timestamp. Check and record happen in one
 * synchronous step so concurrent tasks cannot interleave between them.
 */
export class DomainRateLimiter {
  private readonly minDelayMs: number;
  private readonly now: () => number;
  private readonly logger: StructuredLogger | null;
  private readonly lastAdmitted = new Map<string, number>();

  constructor(options: DomainRateLimiterOptions = {}) {
    this.minDelayMs = Math.max(0, options.minDelayMs ?? 1_000);
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? null;
  }

  canCrawl(url: string): boolean {
    let host: string;
    try {
      host = new URL(url).host.toLowerCase();
    } catch (error) {
      this.logger?.warn("crawl_rate_limit_unparseable_url", {
        url,
        message: error instanceof Error ? error.message : String(error),
      });
      return true;
    }

    const now = this.now();
    const previous = this.lastAdmitted.get(host);
    if (previous !== undefined && now - previous < this.minDelayMs) {
      this.logger?.info("crawl_rate_limited", { host, wait_ms: this.minDelayMs - (now - previous) });
      return false;
    }
    this.lastAdmitted.set(host, now);
    return true;
  }

  reset(): void {
    this.lastAdmitted.clear();
  }
}
