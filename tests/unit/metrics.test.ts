import { expect } from "chai";

import { PipelineMetricsRecorder, latencyBucketLabel } from "../../src/metrics.js";

describe("PipelineMetricsRecorder", () => {
  it("counts successes and failures per operation", async () => {
    let clock = 0;
    const metrics = new PipelineMetricsRecorder({ now: () => clock });

    await metrics.measure("crawlPage", async () => {
      clock += 120;
      return "ok";
    });
    try {
      await metrics.measure("crawlPage", async () => {
        clock += 30_000;
        throw new Error("boom");
      });
      expect.fail("measure should rethrow");
    } catch (error) {
      expect(error).to.be.instanceOf(Error).with.property("message", "boom");
    }
    metrics.observe("sinkStore", 10, false);

    expect(metrics.outcomes()).to.deep.equal([
      { operation: "crawlPage", success: 1, failure: 1 },
      { operation: "sinkStore", success: 0, failure: 1 },
    ]);
    const crawl = metrics.snapshot().find((entry) => entry.operation === "crawlPage");
    expect(crawl?.totalMs).to.equal(30_120);
    expect(crawl?.maxMs).to.equal(30_000);
    const filled = Object.entries(crawl?.histogram ?? {}).filter(([, count]) => count > 0);
    expect(filled).to.deep.equal([
      ["le_00250ms", 1],
      ["gt_20000ms", 1],
    ]);
  });

  it("labels buckets in ascending order", () => {
    expect(latencyBucketLabel(0)).to.equal("le_00050ms");
    expect(latencyBucketLabel(8)).to.equal("le_20000ms");
    expect(latencyBucketLabel(9)).to.equal("gt_20000ms");
  });

  it("forgets everything on reset", () => {
    const metrics = new PipelineMetricsRecorder();
    metrics.observe("robotsCheck", 5, true);
    metrics.reset();

    expect(metrics.snapshot()).to.deep.equal([]);
  });
});
