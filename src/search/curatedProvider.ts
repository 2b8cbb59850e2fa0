import { z } from "zod";

import { loadDataFile } from "../dataFiles.js";
import type { ProviderOutcome, SearchProvider, SearchResult } from "./types.js";

const curatedSourcesSchema = z.record(
  z.array(z.object({ title: z.string(), url: z.string().url(), description: z.string() })),
);

/** Topic keyword → hand-picked learning sources. */
export type CuratedDirectory = Readonly<Record<string, readonly SearchResult[]>>;

let defaultDirectory: CuratedDirectory | null = null;

/** Lazily loads `data/curated-sources.json`. */
export function loadCuratedDirectory(): CuratedDirectory {
  defaultDirectory ??= loadDataFile("curated-sources.json", curatedSourcesSchema);
  return defaultDirectory;
}

/**
 * Offline last resort. Uses the first word of the query as the topic and
 * returns the curated entries whose key contains it or is contained in it,
 * falling back to generic W3Schools and MDN pointers.
 */
export class CuratedDirectoryProvider implements SearchProvider {
  public readonly name = "curated";
  private readonly directory: CuratedDirectory;

  constructor(directory?: CuratedDirectory) {
    this.directory = directory ?? loadCuratedDirectory();
  }

  async trySearch(query: string, maxResults: number): Promise<ProviderOutcome> {
    return { ok: true, results: this.search(query, maxResults) };
  }

  search(query: string, maxResults: number): SearchResult[] {
    const limit = Math.max(0, maxResults);
    const topic = query.toLowerCase().split(/\s+/).find((word) => word.length > 0);
    if (!topic) {
      return [];
    }

    const results: SearchResult[] = [];
    for (const [key, sources] of Object.entries(this.directory)) {
      if (key.includes(topic) || topic.includes(key)) {
        results.push(...sources.slice(0, limit));
      }
    }

    if (results.length === 0) {
      const label = titleCase(topic);
      results.push(
        {
          title: `${label} on W3Schools`,
          url: `https://www.w3schools.com/${topic}/`,
          description: `W3Schools ${topic} tutorial`,
        },
        {
          title: `${label} on MDN`,
          url: `https://developer.mozilla.org/en-US/search?q=${encodeURIComponent(topic)}`,
          description: `MDN resources for ${topic}`,
        },
      );
    }

    return results.slice(0, limit);
  }
}

/** Capitalises every run of letters: `node.js` → `Node.Js`. */
function titleCase(value: string): string {
  return value.replace(/[a-z]+/gi, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}
