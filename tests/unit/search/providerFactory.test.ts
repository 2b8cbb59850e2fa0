import { expect } from "chai";

import type { SearchConfig } from "../../../src/config/settings.js";
import { createSearchProviders } from "../../../src/search/providerFactory.js";

const CONFIG: SearchConfig = {
  providers: ["searx", "duckduckgo", "curated"],
  maxResultsPerQuery: 10,
  searx: {
    baseUrl: null,
    apiPath: "/search",
    timeoutMs: 1_000,
    engines: [],
    categories: [],
    authToken: null,
    maxRetries: 0,
  },
  duckduckgo: { endpoint: "https://html.duckduckgo.com/html/", timeoutMs: 1_000, userAgent: "TestBrowser/1.0" },
};

describe("createSearchProviders", () => {
  it("skips searx without a base URL", () => {
    expect(createSearchProviders(CONFIG, { curatedDirectory: {} }).map((provider) => provider.name)).to.deep.equal([
      "duckduckgo",
      "curated",
    ]);
  });

  it("follows the configured order", () => {
    const providers = createSearchProviders(
      { ...CONFIG, providers: ["curated", "searx"], searx: { ...CONFIG.searx, baseUrl: "http://searx.local" } },
      { curatedDirectory: {} },
    );

    expect(providers.map((provider) => provider.name)).to.deep.equal(["curated", "searx"]);
  });
});
