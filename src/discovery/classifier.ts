import { z } from "zod";

import { loadDataFile } from "../dataFiles.js";
import type { StructuredLogger } from "../logger.js";
import type { SearchResult } from "../search/types.js";

/** Coarse origin of a resource, from most to least authoritative. */
export const SOURCE_TYPES = ["official_docs", "educational", "github", "blog", "other"] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

/** A ranked search hit. Frozen once built. */
export interface DiscoveredResource {
  readonly url: string;
  readonly title: string;
  readonly description: string;
  readonly sourceType: SourceType;
  readonly priorityScore: number;
}

/** Host fragments per classified source type. */
export type SourceDomainLists = Readonly<Record<Exclude<SourceType, "other">, readonly string[]>>;

/** Lists are tested in this order; the first hit wins. */
const CLASSIFICATION_ORDER = ["official_docs", "educational", "blog", "github"] as const;

const SOURCE_BONUS: Readonly<Record<SourceType, number>> = {
  official_docs: 0.4,
  educational: 0.3,
  github: 0.2,
  blog: 0.15,
  other: 0,
};

const QUALITY_KEYWORDS = [
  "official",
  "documentation",
  "guide",
  "tutorial",
  "introduction",
  "getting started",
  "learn",
  "course",
  "reference",
  "handbook",
  "comprehensive",
  "complete",
  "beginner",
  "fundamentals",
] as const;

const SPAM_INDICATORS = ["?ref=", "affiliate", "ad.", "ads.", "popup"] as const;

const BASE_SCORE = 0.5;
const KEYWORD_WEIGHT = 0.02;
const KEYWORD_CAP = 0.1;
const LONG_URL_THRESHOLD = 150;
const LONG_URL_PENALTY = 0.1;
const SPAM_PENALTY = 0.3;

const sourceDomainsSchema = z.object({
  official_docs: z.array(z.string()),
  educational: z.array(z.string()),
  blog: z.array(z.string()),
  github: z.array(z.string()),
});

let defaultDomains: SourceDomainLists | null = null;

/** Lazily loads `data/source-domains.json`. */
export function loadSourceDomains(): SourceDomainLists {
  defaultDomains ??= loadDataFile("source-domains.json", sourceDomainsSchema);
  return defaultDomains;
}

/** Host without a leading `www.`, lowercased. Throws on unparseable input. */
function normaliseHost(url: string): string {
  return new URL(url).host.toLowerCase().replace(/^www\./, "");
}

/**
 * Maps a URL to its source type by substring match of the host against the
 * domain lists. Unparseable URLs are `other`.
 */
export function classifySource(url: string, domains: SourceDomainLists = loadSourceDomains()): SourceType {
  let host: string;
  try {
    host = normaliseHost(url);
  } catch {
    return "other";
  }
  for (const type of CLASSIFICATION_ORDER) {
    if (domains[type].some((fragment) => host.includes(fragment))) {
      return type;
    }
  }
  return "other";
}

export interface ScoreInput {
  readonly url: string;
  readonly title: string;
  readonly description: string;
  readonly sourceType: SourceType;
}

/** Number of non-empty path segments, with the root counting as one. */
function pathDepth(url: string): number | null {
  try {
    return new URL(url).pathname.replace(/^\/+|\/+$/g, "").split("/").length;
  } catch {
    return null;
  }
}

/**
 * Heuristic priority in [0, 1]. The adjustments apply in a fixed order:
 * source bonus, path depth, quality keywords, URL length, spam markers, clamp.
 */
export function scoreResource(input: ScoreInput): number {
  let score = BASE_SCORE;

  score += SOURCE_BONUS[input.sourceType];

  const depth = pathDepth(input.url);
  if (depth !== null) {
    if (depth <= 2) {
      score += 0.1;
    } else if (depth <= 4) {
      score += 0.05;
    }
  }

  const text = `${input.title} ${input.description}`.toLowerCase();
  const matches = QUALITY_KEYWORDS.filter((keyword) => text.includes(keyword)).length;
  score += Math.min(matches * KEYWORD_WEIGHT, KEYWORD_CAP);

  if (input.url.length > LONG_URL_THRESHOLD) {
    score -= LONG_URL_PENALTY;
  }

  const lowerUrl = input.url.toLowerCase();
  if (SPAM_INDICATORS.some((indicator) => lowerUrl.includes(indicator))) {
    score -= SPAM_PENALTY;
  }

  return Math.max(0, Math.min(1, score));
}

export interface ResourceClassifierOptions {
  readonly domains?: SourceDomainLists;
  readonly logger?: StructuredLogger;
}

/** Bundles classification and scoring behind one injectable object. */
export class ResourceClassifier {
  private readonly domains: SourceDomainLists;
  private readonly logger: StructuredLogger | null;

  constructor(options: ResourceClassifierOptions = {}) {
    this.domains = options.domains ?? loadSourceDomains();
    this.logger = options.logger ?? null;
  }

  classify(url: string): SourceType {
    if (!URL.canParse(url)) {
      this.logger?.warn("resource_url_unparseable", { url });
      return "other";
    }
    return classifySource(url, this.domains);
  }

  score(input: ScoreInput): number {
    return scoreResource(input);
  }

  /** Turns a raw hit into a frozen {@link DiscoveredResource}. */
  toResource(result: SearchResult): DiscoveredResource {
    const sourceType = this.classify(result.url);
    const priorityScore = this.score({ ...result, sourceType });
    return Object.freeze({
      url: result.url,
      title: result.title,
      description: result.description,
      sourceType,
      priorityScore,
    });
  }
}
