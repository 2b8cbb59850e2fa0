import { expect } from "chai";

import { CuratedDirectoryProvider, loadCuratedDirectory } from "../../../src/search/curatedProvider.js";

describe("CuratedDirectoryProvider", () => {
  it("loads the bundled directory", () => {
    const directory = loadCuratedDirectory();

    expect(directory["docker"]?.map((entry) => entry.url)).to.deep.equal([
      "https://docs.docker.com/",
      "https://docs.docker.com/get-started/",
    ]);
  });

  it("matches on the first word of the query", async () => {
    const provider = new CuratedDirectoryProvider();

    const outcome = await provider.trySearch("Docker official documentation", 10);

    expect(outcome.ok ? outcome.results.map((result) => result.title) : null).to.deep.equal([
      "Docker Docs",
      "Docker Get Started",
    ]);
  });

  it("matches keys containing the topic", () => {
    const provider = new CuratedDirectoryProvider({
      javascript: [{ title: "JS Guide", url: "https://js.example/", description: "" }],
      rust: [{ title: "Rust Book", url: "https://rust.example/", description: "" }],
    });

    expect(provider.search("java tutorial", 10).map((result) => result.title)).to.deep.equal(["JS Guide"]);
  });

  it("falls back to generic pointers for unknown topics", () => {
    const provider = new CuratedDirectoryProvider({});

    expect(provider.search("elixir getting started", 10)).to.deep.equal([
      {
        title: "Elixir on W3Schools",
        url: "https://www.w3schools.com/elixir/",
        description: "W3Schools elixir tutorial",
      },
      {
        title: "Elixir on MDN",
        url: "https://developer.mozilla.org/en-US/search?q=elixir",
        description: "MDN resources for elixir",
      },
    ]);
  });

  it("honours maxResults and blank queries", () => {
    const provider = new CuratedDirectoryProvider({});

    expect(provider.search("elixir", 1)).to.have.length(1);
    expect(provider.search("   ", 10)).to.deep.equal([]);
  });
});
