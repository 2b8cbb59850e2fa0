import type { StructuredLogger } from "../logger.js";
import type { PipelineMetricsRecorder } from "../metrics.js";

/** Maximum size (characters) of a robots.txt payload considered. */
const MAX_ROBOTS_TXT_CHARS = 64_000;
/** TTL (ms) applied to cached robots.txt rules. */
const ROBOTS_CACHE_TTL_MS = 10 * 60 * 1000;

interface RobotsPattern {
  readonly raw: string;
  readonly regex: RegExp;
}

interface RobotsRuleset {
  readonly allows: readonly RobotsPattern[];
  readonly disallows: readonly RobotsPattern[];
}

/** Parsed groups of one robots.txt, keyed by lowercase agent token. */
export type RobotsGroups = ReadonlyMap<string, RobotsRuleset>;

interface RobotsCacheEntry {
  readonly expiresAt: number;
  /** `null` when the file was unavailable: everything is allowed. */
  readonly groups: RobotsGroups | null;
}

export interface RobotsPolicyOptions {
  readonly fetchImpl?: typeof fetch;
  readonly now?: () => number;
  readonly timeoutMs?: number;
  readonly logger?: StructuredLogger;
  readonly metrics?: PipelineMetricsRecorder;
}

/**
 * robots.txt gate for the crawler. Only `User-agent`, `Allow` and `Disallow`
 * are understood, with `*` wildcards and `$` anchors. A 401, 403 or 5xx answer
 * disallows the whole origin; other HTTP errors, timeouts and network
 * failures allow the crawl.
 */
export class RobotsPolicy {
  private readonly cache = new Map<string, RobotsCacheEntry>();
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly timeoutMs: number;
  private readonly logger: StructuredLogger | null;
  private readonly metrics: PipelineMetricsRecorder | null;

  constructor(options: RobotsPolicyOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.logger = options.logger ?? null;
    this.metrics = options.metrics ?? null;
  }

  async canFetch(url: string, userAgent: string): Promise<boolean> {
    let target: URL;
    try {
      target = new URL(url);
    } catch {
      return true;
    }

    const origin = target.origin;
    const currentTime = this.now();
    const cached = this.cache.get(origin);
    let groups: RobotsGroups | null;
    if (cached && cached.expiresAt > currentTime) {
      groups = cached.groups;
    } else {
      groups = this.metrics
        ? await this.metrics.measure("robotsCheck", () => this.fetchGroups(target, userAgent))
        : await this.fetchGroups(target, userAgent);
      this.cache.set(origin, { expiresAt: currentTime + ROBOTS_CACHE_TTL_MS, groups });
    }

    const rules = groups ? selectRuleset(groups, userAgent) : null;
    if (!rules) {
      return true;
    }
    return resolveDecision(`${target.pathname}${target.search}`, rules) !== "disallow";
  }

  /** Forgets every cached robots.txt. */
  clear(): void {
    this.cache.clear();
  }

  private async fetchGroups(target: URL, userAgent: string): Promise<RobotsGroups | null> {
    const robotsUrl = new URL("/robots.txt", target.origin);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(robotsUrl, {
        headers: { "user-agent": userAgent, accept: "text/plain, text/*;q=0.8, */*;q=0.1" },
        signal: controller.signal,
      });
      if (response.status === 401 || response.status === 403 || response.status >= 500) {
        this.logger?.warn("robots_access_denied", { url: robotsUrl.href, status: response.status });
        return DISALLOW_ALL;
      }
      if (!response.ok) {
        this.logger?.debug("robots_unavailable", { url: robotsUrl.href, status: response.status });
        return null;
      }
      const text = await response.text();
      return parseRobots(text.length > MAX_ROBOTS_TXT_CHARS ? text.slice(0, MAX_ROBOTS_TXT_CHARS) : text);
    } catch (error) {
      this.logger?.warn("robots_fetch_failed", {
        url: robotsUrl.href,
        reason: controller.signal.aborted ? "timeout" : "network",
        message: error instanceof Error ? error.message : String(error),
      });
      return null;
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** Parses robots.txt into allow/disallow groups keyed by lowercase agent. */
export function parseRobots(content: string): RobotsGroups {
  let activeAgents: string[] = [];
  let lastDirective: "user-agent" | "rule" | null = null;
  const rulesByAgent = new Map<string, { allows: string[]; disallows: string[] }>();

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, "").trim();
    const separatorIndex = line.indexOf(":");
    if (separatorIndex === -1) {
      continue;
    }

    const directive = line.slice(0, separatorIndex).trim().toLowerCase();
    const value = line.slice(separatorIndex + 1).trim();

    if (directive === "user-agent") {
      const agent = value.toLowerCase();
      if (!rulesByAgent.has(agent)) {
        rulesByAgent.set(agent, { allows: [], disallows: [] });
      }
      // Consecutive User-agent lines share the group that follows them.
      activeAgents = lastDirective === "user-agent" ? [...new Set([...activeAgents, agent])] : [agent];
      lastDirective = "user-agent";
      continue;
    }

    if (directive !== "allow" && directive !== "disallow") {
      continue;
    }
    lastDirective = "rule";
    if (value.length === 0) {
      continue;
    }
    if (activeAgents.length === 0) {
      activeAgents = ["*"];
      if (!rulesByAgent.has("*")) {
        rulesByAgent.set("*", { allows: [], disallows: [] });
      }
    }
    for (const agent of activeAgents) {
      const bucket = rulesByAgent.get(agent);
      if (bucket) {
        (directive === "allow" ? bucket.allows : bucket.disallows).push(value);
      }
    }
  }

  const groups = new Map<string, RobotsRuleset>();
  for (const [agent, bucket] of rulesByAgent) {
    groups.set(agent, {
      allows: bucket.allows.map(compilePattern),
      disallows: bucket.disallows.map(compilePattern),
    });
  }
  return groups;
}

/**
 * Picks the first group whose agent occurs in the product token
 * (`Name-Crawler/1.0` → `name-crawler`, matched by `name`), then `*`.
 */
function selectRuleset(groups: RobotsGroups, userAgent: string): RobotsRuleset | null {
  const lower = userAgent.trim().toLowerCase();
  const token = lower.split("/")[0]?.trim() ?? lower;
  for (const [agent, rules] of groups) {
    if (agent !== "*" && agent.length > 0 && token.includes(agent)) {
      return rules;
    }
  }
  return groups.get("*") ?? null;
}

/** Longest matching pattern wins; on equal length `disallow` wins. */
function resolveDecision(path: string, rules: RobotsRuleset): "allow" | "disallow" | null {
  let best: { type: "allow" | "disallow"; length: number } | null = null;

  for (const pattern of rules.disallows) {
    if (pattern.regex.test(path) && (!best || pattern.raw.length > best.length)) {
      best = { type: "disallow", length: pattern.raw.length };
    }
  }
  for (const pattern of rules.allows) {
    if (pattern.regex.test(path) && (!best || pattern.raw.length > best.length)) {
      best = { type: "allow", length: pattern.raw.length };
    }
  }

  return best?.type ?? null;
}

const DISALLOW_ALL: RobotsGroups = new Map([["*", { allows: [], disallows: [compilePattern("/")] }]]);

function compilePattern(pattern: string): RobotsPattern {
  const hasEndAnchor = pattern.endsWith("$");
  const body = hasEndAnchor ? pattern.slice(0, -1) : pattern;
  const escaped = body.replace(/[-/\\^$+?.()|[\]{}]/g, "\\$&");
  const regex = new RegExp(`^${escaped.replace(/\*/g, ".*")}${hasEndAnchor ? "$" : ""}`);
  return { raw: pattern, regex };
}
