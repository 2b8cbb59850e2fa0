export * from "./types.js";
export { SearxSearchProvider, canonicalizeUrl } from "./searxProvider.js";
export { DuckDuckGoHtmlProvider, parseDuckDuckGoHtml, resolveResultHref } from "./duckduckgoProvider.js";
export { CuratedDirectoryProvider, loadCuratedDirectory, type CuratedDirectory } from "./curatedProvider.js";
export { SearchProviderChain, multiProviderSearch, type ProviderChainOptions } from "./providerChain.js";
export { createSearchProviders, type ProviderFactoryDependencies } from "./providerFactory.js";
