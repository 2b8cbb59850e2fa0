import { expect } from "chai";

import { AsyncMutex, InMemoryCrawlJobStore } from "../../../src/crawl/jobStore.js";
import { makeJob } from "../../helpers/jobs.js";

describe("InMemoryCrawlJobStore", () => {
  it("returns copies of stored jobs", async () => {
    const store = new InMemoryCrawlJobStore();
    const job = makeJob({ metadata: { topic: "docker" } });
    await store.upsert(job);
    job.metadata["topic"] = "mutated";

    const loaded = await store.get("job-1");
    expect(loaded?.metadata).to.deep.equal({ topic: "docker" });

    if (loaded) {
      loaded.status = "failed";
    }
    expect((await store.get("job-1"))?.status).to.equal("pending");
  });

  it("returns null for unknown jobs", async () => {
    expect(await new InMemoryCrawlJobStore().get("missing")).to.equal(null);
  });

  it("lists newest first with status filter and limit", async () => {
    const store = new InMemoryCrawlJobStore();
    await store.upsert(makeJob({ jobId: "a", createdAt: 1, status: "completed" }));
    await store.upsert(makeJob({ jobId: "b", createdAt: 3, status: "failed" }));
    await store.upsert(makeJob({ jobId: "c", createdAt: 2, status: "completed" }));

    expect((await store.list()).map((job) => job.jobId)).to.deep.equal(["b", "c", "a"]);
    expect((await store.list({ status: "completed" })).map((job) => job.jobId)).to.deep.equal(["c", "a"]);
    expect((await store.list({ limit: 1 })).map((job) => job.jobId)).to.deep.equal(["b"]);
  });

  it("replaces jobs on upsert", async () => {
    const store = new InMemoryCrawlJobStore();
    await store.upsert(makeJob());
    await store.upsert(makeJob({ status: "running" }));

    expect(store.size).to.equal(1);
    expect((await store.get("job-1"))?.status).to.equal("running");
    store.clear();
    expect(store.size).to.equal(0);
  });
});

describe("AsyncMutex", () => {
  it("runs critical sections one at a time in call order", async () => {
    const mutex = new AsyncMutex();
    const trace: string[] = [];
    const section = (name: string, ticks: number) =>
      mutex.runExclusive(async () => {
        trace.push(`${name}:start`);
        for (let tick = 0; tick < ticks; tick += 1) {
          await Promise.resolve();
        }
        trace.push(`${name}:end`);
      });

    await Promise.all([section("a", 3), section("b", 0), section("c", 1)]);

    expect(trace).to.deep.equal(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("releases the lock when a section throws", async () => {
    const mutex = new AsyncMutex();

    const failed = mutex.runExclusive(() => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive(() => "ok");

    try {
      await failed;
      expect.fail("first section should reject");
    } catch (error) {
      expect(error).to.be.instanceOf(Error).with.property("message", "boom");
    }
    expect(await next).to.equal("ok");
  });
});
