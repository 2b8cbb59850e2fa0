import type { SearchConfig, SearchProviderName } from "../config/settings.js";
import { CuratedDirectoryProvider, type CuratedDirectory } from "./curatedProvider.js";
import { DuckDuckGoHtmlProvider } from "./duckduckgoProvider.js";
import { SearxSearchProvider } from "./searxProvider.js";
import type { ProviderDependencies, SearchProvider } from "./types.js";

export interface ProviderFactoryDependencies extends ProviderDependencies {
  readonly curatedDirectory?: CuratedDirectory;
}

/**
 * Instantiates the configured providers in priority order. Searx is skipped
 * when no base URL is configured.
 */
export function createSearchProviders(
  config: SearchConfig,
  deps: ProviderFactoryDependencies = {},
): SearchProvider[] {
  const providers: SearchProvider[] = [];
  for (const name of config.providers) {
    const provider = buildProvider(name, config, deps);
    if (provider) {
      providers.push(provider);
    }
  }
  return providers;
}

function buildProvider(
  name: SearchProviderName,
  config: SearchConfig,
  deps: ProviderFactoryDependencies,
): SearchProvider | null {
  switch (name) {
    case "searx":
      return config.searx.baseUrl ? new SearxSearchProvider(config.searx, deps) : null;
    case "duckduckgo":
      return new DuckDuckGoHtmlProvider(config.duckduckgo, deps);
    case "curated":
      return new CuratedDirectoryProvider(deps.curatedDirectory);
  }
}
