import { afterEach, describe, expect, it, vi } from "vitest";
import { JobSourceAggregator, type JobSource } from "../src/lib/aggregator.js";
import { BulkJobSource } from "../src/lib/bulk.js";
import { CategoryJobSource } from "../src/lib/category-source.js";
import { DedupIndex } from "../src/lib/dedup.js";
import type { JobRecord, SourceReport } from "../src/lib/types.js";
import { collect, failedPage, ListExtractor, listPage, ScriptedFetcher } from "./fakes.js";

function bulk(name: string, lines: string[], dedup: DedupIndex): BulkJobSource {
  return new BulkJobSource({ name, lines: () => lines, dedup });
}

function failingSource(dedup: DedupIndex): JobSource {
  return {
    name: "broken",
    kind: "bulk-file",
    async *records(): AsyncGenerator<JobRecord, void, undefined> {
      dedup.claim("https://site.example/x");
      yield { url: "https://site.example/x", sourceKind: "bulk-file", discoveryOrder: dedup.size() };
      throw new Error("disk on fire");
    },
    report(): SourceReport {
      return {
        source: "broken",
        kind: "bulk-file",
        outcome: "cancelled",
        emitted: 1,
        skippedExisting: 0,
        skippedDuplicate: 0,
        skippedInvalid: 0,
      };
    },
  };
}

describe("JobSourceAggregator", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drains sources in registration order with run-wide dedup", async () => {
    const dedup = new DedupIndex();
    const second = bulk("second", ["https://site.example/b", "https://site.example/c"], dedup);
    const aggregator = new JobSourceAggregator()
      .register(bulk("first", ["https://site.example/a", "https://site.example/b"], dedup))
      .register(second);

    const records = await collect(aggregator.records());

    expect(aggregator.size).toBe(2);
    expect(records.map((record) => [record.url, record.discoveryOrder])).toEqual([
      ["https://site.example/a", 1],
      ["https://site.example/b", 2],
      ["https://site.example/c", 3],
    ]);
    expect(second.report().skippedDuplicate).toBe(1);
    expect(aggregator.reports().map((report) => report.outcome)).toEqual(["completed", "completed"]);
  });

  it("isolates a failing source and moves on", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const dedup = new DedupIndex();
    const aggregator = new JobSourceAggregator()
      .register(failingSource(dedup))
      .register(bulk("after", ["https://site.example/x", "https://site.example/y"], dedup));

    const records = await collect(aggregator.records());

    expect(records.map((record) => record.url)).toEqual([
      "https://site.example/x",
      "https://site.example/y",
    ]);
    expect(aggregator.reports()[0]).toMatchObject({
      source: "broken",
      outcome: "source-error",
      error: "disk on fire",
    });
    expect(aggregator.reports()[1]).toMatchObject({ outcome: "completed", skippedDuplicate: 1 });
    expect(error).toHaveBeenCalledWith("Aggregator: source broken failed: disk on fire");
  });

  it("reports halted categories as fetch failures", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const dedup = new DedupIndex();
    const fetcher = new ScriptedFetcher(
      new Map([
        ["https://site.example/c/1/1", listPage(["https://site.example/a"])],
        ["https://site.example/c/1/2", failedPage(403)],
      ])
    );
    const category = new CategoryJobSource({
      category: {
        slug: "news",
        displayName: "News",
        categoryId: 1,
        timelineUrlTemplate: "https://site.example/c/{categoryId}/{page}",
      },
      policy: {
        maxEmptyPages: 2,
        httpFailureMode: "halt",
        duplicateDetection: { enabled: false, fingerprintSize: 0 },
        emptyDefinition: "post-dedupe-count",
      },
      fetcher,
      extractor: new ListExtractor(),
      dedup,
    });
    const aggregator = new JobSourceAggregator()
      .register(category)
      .register(bulk("bulk", ["https://site.example/a"], dedup));

    const records = await collect(aggregator.records());

    expect(records.map((record) => record.sourceKind)).toEqual(["category-timeline"]);
    expect(aggregator.hasFetchFailures()).toBe(true);
    expect(aggregator.reports()).toEqual([
      {
        source: "category:news",
        kind: "category-timeline",
        outcome: "fetch-failure",
        emitted: 1,
        skippedExisting: 0,
        skippedDuplicate: 0,
        skippedInvalid: 0,
        pagesVisited: 2,
      },
      {
        source: "bulk",
        kind: "bulk-file",
        outcome: "completed",
        emitted: 0,
        skippedExisting: 0,
        skippedDuplicate: 1,
        skippedInvalid: 0,
      },
    ]);
  });

  it("starts no source once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const dedup = new DedupIndex();
    const aggregator = new JobSourceAggregator().register(
      bulk("first", ["https://site.example/a"], dedup)
    );

    const records = await collect(aggregator.records(controller.signal));

    expect(records).toEqual([]);
    expect(aggregator.reports()[0].outcome).toBe("cancelled");
    expect(aggregator.hasFetchFailures()).toBe(false);
  });
});
