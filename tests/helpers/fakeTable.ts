import type { CrawlJobRow, CrawlJobTable } from "../../src/crawl/jobStoreTable.js";
import type { CrawlStatus } from "../../src/crawl/types.js";

/**
 * In-process stand-in for the `crawl_jobs` table. Rows are stored as plain
 * objects; `failNext` makes the next N calls reject.
 */
export class FakeCrawlJobTable implements CrawlJobTable {
  readonly rows = new Map<string, unknown>();
  readonly calls: string[] = [];
  failNext = 0;

  async upsert(row: CrawlJobRow): Promise<void> {
    this.track("upsert");
    this.rows.set(row.job_id, structuredClone(row));
  }

  async selectByJobId(jobId: string): Promise<readonly unknown[]> {
    this.track("selectByJobId");
    const row = this.rows.get(jobId);
    return row === undefined ? [] : [structuredClone(row)];
  }

  async selectRecent(limit: number, status?: CrawlStatus): Promise<readonly unknown[]> {
    this.track("selectRecent");
    const rows = [...this.rows.values()].filter((row) => status === undefined || readField(row, "status") === status);
    rows.sort((a, b) => String(readField(b, "created_at")).localeCompare(String(readField(a, "created_at"))));
    return rows.slice(0, limit).map((row) => structuredClone(row));
  }

  private track(call: string): void {
    this.calls.push(call);
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new Error(`table unavailable during ${call}`);
    }
  }
}

function readField(row: unknown, key: string): unknown {
  return typeof row === "object" && row !== null && key in row ? Reflect.get(row, key) : undefined;
}
