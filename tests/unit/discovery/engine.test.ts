import { expect } from "chai";
import sinon from "sinon";

import type { DiscoveredResource } from "../../../src/discovery/classifier.js";
import {
  TopicDiscoveryEngine,
  buildQueryVariants,
  deduplicateResources,
  getResourcesByType,
  rankResources,
} from "../../../src/discovery/engine.js";
import type { SearchResult } from "../../../src/search/types.js";
import { RecordingLogger } from "../../helpers/recordingLogger.js";

function resource(url: string, priorityScore: number, title = url): DiscoveredResource {
  return { url, title, description: "", sourceType: "other", priorityScore };
}

const DOCS: SearchResult = { title: "Docker Docs", url: "https://docs.docker.com/", description: "" };
const BLOG: SearchResult = { title: "Docker blog post", url: "https://medium.com/@a/docker", description: "" };
const NOTES: SearchResult = { title: "Docker notes", url: "https://example.org/docker", description: "" };

/** Returns the docs page for the documentation query and the rest for every other phrasing. */
function createSearch(): sinon.SinonStub<[string, number], Promise<SearchResult[]>> {
  return sinon.stub<[string, number], Promise<SearchResult[]>>().callsFake(async (query) =>
    query.endsWith("official documentation") ? [DOCS] : [BLOG, { title: "Untitled", url: "", description: "" }, NOTES],
  );
}

describe("buildQueryVariants", () => {
  it("produces the six phrasings in order", () => {
    expect(buildQueryVariants("docker")).to.deep.equal([
      "docker official documentation",
      "docker tutorial beginner guide",
      "docker getting started guide",
      "learn docker step by step",
      "docker best practices examples",
      "docker github repository tutorial",
    ]);
  });
});

describe("deduplicateResources", () => {
  it("keeps the highest score per URL", () => {
    const deduped = deduplicateResources([
      resource("https://a.example/", 0.3, "low"),
      resource("https://b.example/", 0.5),
      resource("https://a.example/", 0.8, "high"),
    ]);

    expect(deduped.map((entry) => [entry.url, entry.title])).to.deep.equal([
      ["https://a.example/", "high"],
      ["https://b.example/", "https://b.example/"],
    ]);
  });

  it("keeps the first entry on a tie", () => {
    const deduped = deduplicateResources([resource("https://a.example/", 0.5, "first"), resource("https://a.example/", 0.5, "second")]);

    expect(deduped.map((entry) => entry.title)).to.deep.equal(["first"]);
  });
});

describe("rankResources", () => {
  it("sorts by descending priority without mutating the input", () => {
    const input = [resource("https://a/", 0.4), resource("https://b/", 0.9), resource("https://c/", 0.7)];

    expect(rankResources(input).map((entry) => entry.priorityScore)).to.deep.equal([0.9, 0.7, 0.4]);
    expect(input.map((entry) => entry.priorityScore)).to.deep.equal([0.4, 0.9, 0.7]);
  });
});

describe("getResourcesByType", () => {
  it("filters by source type", () => {
    const docs: DiscoveredResource = { ...resource("https://docs/", 1), sourceType: "official_docs" };

    expect(getResourcesByType([docs, resource("https://x/", 0.2)], "official_docs")).to.deep.equal([docs]);
  });
});

describe("TopicDiscoveryEngine", () => {
  it("fans out, filters, dedupes and ranks", async () => {
    const search = createSearch();
    const logger = new RecordingLogger();
    const engine = new TopicDiscoveryEngine({ search: { search }, logger, maxResultsPerQuery: 7 });

    const resources = await engine.discoverResources("docker", 10);

    expect(resources.map((entry) => entry.url)).to.deep.equal([
      "https://docs.docker.com/",
      "https://medium.com/@a/docker",
      "https://example.org/docker",
    ]);
    expect(resources.map((entry) => entry.sourceType)).to.deep.equal(["official_docs", "blog", "other"]);
    expect(search.callCount).to.equal(6);
    expect(search.alwaysCalledWith(sinon.match.string, 7)).to.equal(true);
    expect(logger.find("topic_discovery_completed")?.payload).to.deep.equal({
      topic: "docker",
      queries: 6,
      failed_queries: 0,
      candidates: 11,
      returned: 3,
    });
  });

  it("truncates to maxResources", async () => {
    const engine = new TopicDiscoveryEngine({ search: { search: createSearch() } });

    const resources = await engine.discoverResources("docker", 2);

    expect(resources.map((entry) => entry.url)).to.deep.equal(["https://docs.docker.com/", "https://medium.com/@a/docker"]);
  });

  it("serves repeated calls from the cache until cleared", async () => {
    const search = createSearch();
    const engine = new TopicDiscoveryEngine({ search: { search } });

    const first = await engine.discoverResources("docker", 5);
    const second = await engine.discoverResources("docker", 5);

    expect(second).to.deep.equal(first);
    expect(search.callCount).to.equal(6);
    expect(engine.cacheSize).to.equal(1);

    await engine.discoverResources("docker", 3);
    expect(search.callCount).to.equal(12);

    engine.clearCache();
    await engine.discoverResources("docker", 5);
    expect(search.callCount).to.equal(18);
  });

  it("bypasses the cache when disabled", async () => {
    const search = createSearch();
    const engine = new TopicDiscoveryEngine({ search: { search }, cacheEnabled: false });

    await engine.discoverResources("docker", 5);
    await engine.discoverResources("docker", 5);

    expect(search.callCount).to.equal(12);
    expect(engine.cacheSize).to.equal(0);
  });

  it("excludes failed queries and keeps the rest", async () => {
    const logger = new RecordingLogger();
    const search = sinon.stub<[string, number], Promise<SearchResult[]>>().callsFake(async (query) => {
      if (query.startsWith("learn")) {
        throw new Error("search backend down");
      }
      return [NOTES];
    });
    const engine = new TopicDiscoveryEngine({ search: { search }, logger });

    const resources = await engine.discoverResources("docker");

    expect(resources.map((entry) => entry.url)).to.deep.equal(["https://example.org/docker"]);
    expect(logger.find("topic_discovery_query_failed")?.payload).to.deep.equal({
      topic: "docker",
      query: "learn docker step by step",
      message: "search backend down",
    });
  });
});
