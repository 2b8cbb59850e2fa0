import { expect } from "chai";
import sinon from "sinon";

import { loadTopicScoutConfig } from "../../src/config/settings.js";
import { createPipelineContext, describeFeatures, withPipelineContext } from "../../src/context.js";
import type { ProviderOutcome, SearchProvider } from "../../src/search/types.js";
import { StubCrawler } from "../helpers/crawler.js";
import { EnvSandbox } from "../helpers/env.js";
import { FakeCrawlJobTable } from "../helpers/fakeTable.js";
import { createFetchStub, textResponse } from "../helpers/http.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

class EmptyProvider implements SearchProvider {
  readonly name = "fixture";

  async trySearch(): Promise<ProviderOutcome> {
    return { ok: true, results: [] };
  }
}

class GuideProvider implements SearchProvider {
  readonly name = "guides";

  async trySearch(): Promise<ProviderOutcome> {
    return {
      ok: true,
      results: [1, 2, 3, 4].map((index) => ({
        title: `Container guide ${index}`,
        url: `https://site${index}.example/guide`,
        description: "Containers from scratch",
      })),
    };
  }
}

describe("pipeline context", () => {
  const env = new EnvSandbox();

  beforeEach(() => env.install());
  afterEach(() => env.restore());

  it("describes the features of the default configuration", () => {
    expect(describeFeatures(loadTopicScoutConfig())).to.deep.equal({
      searx: false,
      duckduckgo: true,
      curated: true,
      persistentJobs: false,
      vectorStore: false,
      knowledgeGraph: false,
      archive: false,
    });
  });

  it("lets overrides win over the configured storage", () => {
    env.set({
      TOPIC_SEARX_BASE_URL: "https://searx.internal",
      SUPABASE_URL: "https://db.example",
      SUPABASE_KEY: "test-secret",
      TOPIC_ARCHIVE_DIR: "/tmp/topic-scout-archive",
      TOPIC_SEARCH_PROVIDERS: "searx,curated",
    });
    const config = loadTopicScoutConfig();

    expect(describeFeatures(config)).to.deep.include({ searx: true, duckduckgo: false, persistentJobs: true, archive: true });
    expect(
      describeFeatures(config, { jobTable: null, vectorIndex: { upsert: async () => undefined } }),
    ).to.deep.include({ persistentJobs: false, vectorStore: true, knowledgeGraph: false });
  });

  it("wires the overrides into the collaborators", () => {
    const logger = new RecordingLogger();
    const context = createPipelineContext(loadTopicScoutConfig(), {
      logger,
      searchProviders: [new EmptyProvider()],
      crawler: new StubCrawler(),
      jobTable: new FakeCrawlJobTable(),
    });

    expect(context.logger).to.equal(logger);
    expect(context.search.providerNames).to.deep.equal(["fixture"]);
    expect(context.jobRepository.hasPersistentStore).to.equal(true);
    expect(logger.find("pipeline_context_created")?.payload).to.deep.equal({
      providers: ["fixture"],
      features: {
        searx: false,
        duckduckgo: true,
        curated: true,
        persistentJobs: true,
        vectorStore: false,
        knowledgeGraph: false,
        archive: false,
      },
    });
  });

  it("builds the configured providers when none are injected", () => {
    env.set({ TOPIC_SEARCH_PROVIDERS: "duckduckgo,curated" });

    const context = createPipelineContext(loadTopicScoutConfig(), { logger: new RecordingLogger(), jobTable: null });

    expect(context.search.providerNames).to.deep.equal(["duckduckgo", "curated"]);
    expect(context.jobRepository.hasPersistentStore).to.equal(false);
  });

  it("runs the coordinator with the configured pipeline limits", async () => {
    env.set({ TOPIC_PIPELINE_MAX_RESOURCES: "2" });
    const crawler = new StubCrawler();
    const context = createPipelineContext(loadTopicScoutConfig(), {
      logger: new RecordingLogger(),
      searchProviders: [new GuideProvider()],
      crawler,
      fetchImpl: createFetchStub().callsFake(async () => textResponse("missing", 404)),
      sleep: async () => undefined,
      jobTable: null,
    });

    const result = await context.coordinator.run({ topic: "docker" });
    await context.dispose();

    expect(result.discovered).to.equal(2);
    expect(result.crawled).to.equal(2);
    expect(crawler.calls).to.have.length(2);
  });

  it("disposes once", async () => {
    const logger = new RecordingLogger();
    const flush = sinon.spy(logger, "flush");
    const context = createPipelineContext(loadTopicScoutConfig(), { logger, searchProviders: [new EmptyProvider()] });

    await context.dispose();
    await context.dispose();

    expect(flush.callCount).to.equal(1);
  });

  it("disposes the context when the callback throws", async () => {
    const logger = new RecordingLogger();
    const flush = sinon.spy(logger, "flush");

    let caught: unknown = null;
    try {
      await withPipelineContext(
        loadTopicScoutConfig(),
        async () => {
          throw new Error("run aborted");
        },
        { logger, searchProviders: [new EmptyProvider()] },
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(Error);
    expect(flush.callCount).to.equal(1);
  });
});
