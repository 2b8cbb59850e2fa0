import { expect } from "chai";
import sinon from "sinon";

import { CrawlJobManager, canTransition, generateJobId } from "../../../src/crawl/jobManager.js";
import { CrawlJobRepository } from "../../../src/crawl/jobRepository.js";
import { DomainRateLimiter } from "../../../src/crawl/rateLimiter.js";
import { RobotsPolicy } from "../../../src/crawl/robots.js";
import { buildCrawlJobRequest, type CrawlJobRequestInput } from "../../../src/crawl/types.js";
import { CrawlTimeoutError, InvalidJobTransitionError } from "../../../src/errors.js";
import { StubCrawler, hangUntilAborted, pageResult } from "../../helpers/crawler.js";
import { createFetchStub, textResponse } from "../../helpers/http.js";
import { RecordingLogger } from "../../helpers/recordingLogger.js";

const START = Date.UTC(2024, 0, 1, 12, 0, 0);

function setup(options: { crawler?: StubCrawler | null; robots?: RobotsPolicy } = {}) {
  const clock = { now: START };
  const now = () => clock.now;
  const sleep = sinon.stub<[number], Promise<void>>().resolves();
  const logger = new RecordingLogger();
  const repository = new CrawlJobRepository();
  const crawler = options.crawler === undefined ? new StubCrawler() : options.crawler;
  const manager = new CrawlJobManager({
    repository,
    crawler,
    rateLimiter: new DomainRateLimiter({ minDelayMs: 1_000, now }),
    robots: options.robots ?? null,
    now,
    sleep,
    logger,
  });
  return { clock, sleep, logger, repository, manager };
}

function request(input: CrawlJobRequestInput) {
  return buildCrawlJobRequest({ respectRobotsTxt: false, ...input });
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

async function waitUntil(condition: () => boolean): Promise<void> {
  for (let turn = 0; turn < 100 && !condition(); turn += 1) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  expect(condition()).to.equal(true);
}

describe("job state machine", () => {
  it("only allows forward edges out of non-terminal states", () => {
    expect(canTransition("pending", "running")).to.equal(true);
    expect(canTransition("pending", "completed")).to.equal(false);
    expect(canTransition("running", "cancelled")).to.equal(true);
    expect(canTransition("completed", "failed")).to.equal(false);
    expect(canTransition("cancelled", "running")).to.equal(false);
  });

  it("derives twelve hex characters from the url and creation time", () => {
    const id = generateJobId("https://docs.example/", START);

    expect(id).to.match(/^[0-9a-f]{12}$/);
    expect(generateJobId("https://docs.example/", START)).to.equal(id);
    expect(generateJobId("https://docs.example/", START + 1)).to.not.equal(id);
  });
});

describe("CrawlJobManager", () => {
  it("creates pending jobs in the repository", async () => {
    const { manager, repository } = setup();

    const job = await manager.createJob(request({ url: "https://docs.example/", metadata: { topic: "docker" } }));

    expect(job.jobId).to.equal(generateJobId("https://docs.example/", START));
    expect(job.status).to.equal("pending");
    expect(job.metadata).to.deep.equal({ topic: "docker" });
    expect((await repository.get(job.jobId))?.status).to.equal("pending");
  });

  it("completes a crawl with title, timing and metadata", async () => {
    const crawler = new StubCrawler(async () => {
      context.clock.now += 250;
      return pageResult();
    });
    const context = setup({ crawler });

    const job = await context.manager.createAndExecuteJob(request({ url: "https://docs.example/get-started" }));

    expect(job.status).to.equal("completed");
    expect(job.title).to.equal("Docker");
    expect(job.content).to.equal("# Docker\nContainers package an application with its dependencies.");
    expect(job.processingTimeMs).to.equal(250);
    expect(job.completedAt).to.equal(START + 250);
    expect(job.error).to.equal(null);
    expect(job.metadata.url).to.equal("https://docs.example/get-started");
    expect(job.metadata.crawled_at).to.equal(new Date(START + 250).toISOString());
    expect(job.metadata.content_length).to.equal(job.content?.length);
    expect(job.metadata.processing_time_ms).to.equal(250);
    expect(job.metadata.language).to.be.a("string");
    expect(context.sleep.calledOnceWithExactly(1_000)).to.equal(true);
    expect(crawler.calls[0]?.timeoutMs).to.equal(30_000);
    expect(context.logger.messages("info")).to.include("crawl_job_completed");
  });

  it("prefers the title reported by the crawler", async () => {
    const { manager } = setup({ crawler: new StubCrawler(async () => pageResult({ title: "Get Started" })) });

    const job = await manager.createAndExecuteJob(request({ url: "https://docs.example/" }));

    expect(job.title).to.equal("Get Started");
  });

  it("fails without a configured crawler", async () => {
    const { manager } = setup({ crawler: null });

    const job = await manager.createAndExecuteJob(request({ url: "https://docs.example/" }));

    expect(job.status).to.equal("failed");
    expect(job.error).to.equal("No page crawler configured");
    expect(job.metadata.error).to.equal("No page crawler configured");
  });

  it("fails a second crawl of the same host inside the rate window", async () => {
    const { manager, logger } = setup();

    const first = await manager.createAndExecuteJob(request({ url: "https://docs.example/a" }));
    const second = await manager.createAndExecuteJob(request({ url: "https://docs.example/b" }));

    expect(first.status).to.equal("completed");
    expect(second.status).to.equal("failed");
    expect(second.error).to.equal("Rate limited for domain: https://docs.example/b");
    expect(logger.find("crawl_job_failed")?.payload).to.deep.equal({
      job_id: second.jobId,
      url: "https://docs.example/b",
      error: "Rate limited for domain: https://docs.example/b",
    });
  });

  it("honours robots.txt before sleeping or crawling", async () => {
    const fetchImpl = createFetchStub().callsFake(async () => textResponse("User-agent: *\nDisallow: /"));
    const crawler = new StubCrawler();
    const { manager, sleep } = setup({ crawler, robots: new RobotsPolicy({ fetchImpl }) });

    const job = await manager.createAndExecuteJob(
      buildCrawlJobRequest({ url: "https://docs.example/private", respectRobotsTxt: true }),
    );

    expect(job.status).to.equal("failed");
    expect(job.error).to.equal("Crawling disallowed by robots.txt");
    expect(sleep.called).to.equal(false);
    expect(crawler.calls).to.have.length(0);
  });

  it("hands page limits and a robots gate for followed links to the crawler", async () => {
    const fetchImpl = createFetchStub().callsFake(async () => textResponse("User-agent: *\nDisallow: /private"));
    const crawler = new StubCrawler();
    const { manager } = setup({ crawler, robots: new RobotsPolicy({ fetchImpl }) });

    await manager.createAndExecuteJob(
      buildCrawlJobRequest({ url: "https://docs.example/guide", respectRobotsTxt: true, followLinks: true, maxPages: 4 }),
    );

    const options = crawler.calls[0];
    expect(options?.maxPages).to.equal(4);
    expect(options?.followLinks).to.equal(true);
    expect(await options?.canFollow?.("https://docs.example/private/notes")).to.equal(false);
    expect(await options?.canFollow?.("https://docs.example/guide/next")).to.equal(true);
  });

  it("reports unsuccessful crawls", async () => {
    const responses = [
      pageResult({ success: false, markdown: null, error: "HTTP 500", statusCode: 500 }),
      pageResult({ success: false, markdown: null }),
      pageResult({ markdown: "", html: null }),
    ];
    const { manager } = setup({
      crawler: new StubCrawler(async () => responses.shift() ?? pageResult()),
    });

    const errors: Array<string | null> = [];
    for (const host of ["a", "b", "c"]) {
      const job = await manager.createAndExecuteJob(request({ url: `https://${host}.example/` }));
      expect(job.status).to.equal("failed");
      errors.push(job.error);
    }

    expect(errors).to.deep.equal(["Crawl failed: HTTP 500", "Crawl failed: Unknown error", "Crawl failed: empty content"]);
  });

  it("falls back to html when no markdown is produced", async () => {
    const { manager } = setup({
      crawler: new StubCrawler(async () => pageResult({ markdown: null, html: "Plain page heading\nbody" })),
    });

    const job = await manager.createAndExecuteJob(request({ url: "https://docs.example/" }));

    expect(job.content).to.equal("Plain page heading\nbody");
    expect(job.title).to.equal("Plain page heading");
  });

  it("times out a crawl that never answers", async () => {
    const { manager } = setup({ crawler: new StubCrawler(hangUntilAborted) });

    const job = await manager.createAndExecuteJob(request({ url: "https://docs.example/", timeoutMs: 20 }));

    expect(job.status).to.equal("failed");
    expect(job.error).to.equal("Crawl timeout after 20ms");
  });

  it("maps crawler timeouts and errors to failure messages", async () => {
    const failures: Error[] = [new CrawlTimeoutError(5_000), new Error("socket hang up")];
    const { manager } = setup({
      crawler: new StubCrawler(async () => {
        throw failures.shift() ?? new Error("unexpected call");
      }),
    });

    const timedOut = await manager.createAndExecuteJob(request({ url: "https://a.example/", timeoutMs: 5_000 }));
    const errored = await manager.createAndExecuteJob(request({ url: "https://b.example/" }));

    expect(timedOut.error).to.equal("Crawl timeout after 5000ms");
    expect(errored.error).to.equal("Crawl error: socket hang up");
  });

  it("refuses to execute a job twice", async () => {
    const { manager } = setup();
    const crawlRequest = request({ url: "https://docs.example/" });
    const job = await manager.createAndExecuteJob(crawlRequest);

    const error = await rejectionOf(manager.executeJob(job.jobId, crawlRequest));

    expect(error).to.be.instanceOf(InvalidJobTransitionError);
  });

  it("runs one crawl when the same job is executed concurrently", async () => {
    const crawler = new StubCrawler();
    const { manager } = setup({ crawler });
    const crawlRequest = request({ url: "https://docs.example/" });
    const job = await manager.createJob(crawlRequest);

    const [first, second] = await Promise.allSettled([
      manager.executeJob(job.jobId, crawlRequest),
      manager.executeJob(job.jobId, crawlRequest),
    ]);

    expect(first.status).to.equal("fulfilled");
    expect(first.status === "fulfilled" ? first.value.status : null).to.equal("completed");
    expect(second.status).to.equal("rejected");
    expect(second.status === "rejected" ? second.reason : null).to.be.instanceOf(InvalidJobTransitionError);
    expect(crawler.calls).to.have.length(1);
  });

  it("executes an unknown id as a fresh job for the request url", async () => {
    const { manager } = setup();

    const job = await manager.executeJob("adhoc", request({ url: "https://docs.example/adhoc" }));

    expect(job.jobId).to.equal("adhoc");
    expect(job.url).to.equal("https://docs.example/adhoc");
    expect(job.status).to.equal("completed");
    expect((await manager.getJob("adhoc"))?.status).to.equal("completed");
  });

  describe("cancelJob", () => {
    it("cancels a pending job", async () => {
      const { manager } = setup();
      const job = await manager.createJob(request({ url: "https://docs.example/" }));

      const cancelled = await manager.cancelJob(job.jobId);

      expect(cancelled?.status).to.equal("cancelled");
      expect(cancelled?.completedAt).to.equal(START);
    });

    it("aborts a running crawl and keeps the cancelled state", async () => {
      const crawler = new StubCrawler(hangUntilAborted);
      const { manager } = setup({ crawler });
      const crawlRequest = request({ url: "https://docs.example/" });
      const job = await manager.createJob(crawlRequest);

      const execution = manager.executeJob(job.jobId, crawlRequest);
      await waitUntil(() => crawler.calls.length === 1);
      const cancelled = await manager.cancelJob(job.jobId);
      const finished = await execution;

      expect(cancelled?.status).to.equal("cancelled");
      expect(crawler.calls[0]?.signal?.aborted).to.equal(true);
      expect(finished.status).to.equal("cancelled");
      expect(finished.content).to.equal(null);
      expect((await manager.getJob(job.jobId))?.status).to.equal("cancelled");
    });

    it("keeps a job cancelled while its execution is still loading it", async () => {
      const crawler = new StubCrawler();
      const { manager } = setup({ crawler });
      const crawlRequest = request({ url: "https://docs.example/" });
      const job = await manager.createJob(crawlRequest);

      const execution = manager.executeJob(job.jobId, crawlRequest);
      const cancelled = await manager.cancelJob(job.jobId);
      const finished = await execution;

      expect(cancelled?.status).to.equal("cancelled");
      expect(finished.status).to.equal("cancelled");
      expect(crawler.calls).to.have.length(0);
      expect((await manager.getJob(job.jobId))?.status).to.equal("cancelled");
    });

    it("returns null for unknown ids", async () => {
      const { manager } = setup();

      expect(await manager.cancelJob("missing")).to.equal(null);
    });

    it("rejects cancelling a finished job", async () => {
      const { manager } = setup();
      const job = await manager.createAndExecuteJob(request({ url: "https://docs.example/" }));

      const error = await rejectionOf(manager.cancelJob(job.jobId));

      expect(error).to.be.instanceOf(InvalidJobTransitionError);
      expect((await manager.getJob(job.jobId))?.status).to.equal("completed");
    });
  });

  describe("crawlUrls", () => {
    it("keeps input order, bounds concurrency and isolates failures", async () => {
      const crawler = new StubCrawler(async () => {
        await new Promise<void>((resolve) => setImmediate(resolve));
        return pageResult();
      });
      const { manager, sleep, logger } = setup({ crawler });
      const urls = ["https://a.example/", "", "https://b.example/", "https://c.example/", "https://d.example/"];

      const jobs = await manager.crawlUrls(urls, 2);

      expect(jobs.map((job) => job.url)).to.deep.equal(urls);
      expect(jobs.map((job) => job.status)).to.deep.equal(["completed", "failed", "completed", "completed", "completed"]);
      expect(jobs[1]?.jobId).to.equal("failed_1");
      expect(jobs[1]?.completedAt).to.equal(START);
      expect(crawler.calls).to.have.length(4);
      expect(crawler.maxInFlight).to.be.at.most(2);
      expect(sleep.getCalls().map((call) => call.args[0])).to.deep.equal([2_000, 2_000, 2_000, 2_000]);
      expect(logger.find("crawl_batch_item_failed")?.payload).to.include({ url: "", index: 1 });
    });

    it("exposes the crawled jobs through getJob and listJobs", async () => {
      const { manager } = setup();

      const jobs = await manager.crawlUrls(["https://a.example/", "https://b.example/"]);
      const completed = await manager.listJobs({ status: "completed" });

      expect(completed.map((job) => job.jobId).sort()).to.deep.equal(jobs.map((job) => job.jobId).sort());
      expect((await manager.getJob(jobs[0]?.jobId ?? ""))?.url).to.equal("https://a.example/");
      expect(await manager.listJobs({ status: "failed" })).to.deep.equal([]);
    });
  });
});
