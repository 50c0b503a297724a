import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BulkJobSource, parseBulkLine } from "../src/lib/bulk.js";
import { DedupIndex } from "../src/lib/dedup.js";
import { SourceError } from "../src/lib/errors.js";
import { collect } from "./fakes.js";

describe("parseBulkLine", () => {
  it("treats whitespace-only lines as blank", () => {
    expect(parseBulkLine("")).toEqual({ kind: "blank" });
    expect(parseBulkLine("   \t")).toEqual({ kind: "blank" });
  });

  it("accepts bare URLs", () => {
    expect(parseBulkLine(" http://site.example/a/ ")).toEqual({
      kind: "entry",
      entry: { url: "https://site.example/a" },
    });
    expect(parseBulkLine("site.example/a")).toEqual({
      kind: "invalid",
      reason: "not an absolute http(s) URL",
    });
  });

  it("reads NDJSON objects", () => {
    const line = JSON.stringify({
      url: "http://site.example/b",
      lastmod: "2024-05-01",
      sitemap_url: "https://site.example/sitemap.xml",
      image_url: "http://site.example/i.jpg",
    });

    expect(parseBulkLine(line)).toEqual({
      kind: "entry",
      entry: {
        url: "https://site.example/b",
        lastModified: "2024-05-01T00:00:00.000Z",
        sitemapUrl: "https://site.example/sitemap.xml",
        imageUrl: "https://site.example/i.jpg",
      },
    });
  });

  it("drops optional fields it cannot use", () => {
    const parsed = parseBulkLine('{"url": "https://site.example/c", "lastmod": "soon", "image_url": 3}');
    expect(parsed).toEqual({ kind: "entry", entry: { url: "https://site.example/c" } });
  });

  it("explains invalid lines", () => {
    expect(parseBulkLine("{oops")).toEqual({ kind: "invalid", reason: "invalid JSON" });
    expect(parseBulkLine('{"link": "https://site.example/d"}')).toEqual({
      kind: "invalid",
      reason: "missing 'url'",
    });
    expect(parseBulkLine('{"url": "mailto:desk@site.example"}')).toEqual({
      kind: "invalid",
      reason: "unusable url 'mailto:desk@site.example'",
    });
  });
});

describe("BulkJobSource", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("emits each new URL once and counts every line", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const source = new BulkJobSource({
      name: "bulk:test",
      lines: () => [
        "https://site.example/a",
        "",
        "https://site.example/a",
        "oops",
        "https://site.example/old",
        '{"url": "https://site.example/b", "lastmod": "2024-05-01"}',
      ],
      dedup: new DedupIndex(["https://site.example/old"]),
    });

    expect(source.report().outcome).toBe("cancelled");

    const records = await collect(source.records());

    expect(records).toEqual([
      { url: "https://site.example/a", sourceKind: "bulk-file", discoveryOrder: 1 },
      {
        url: "https://site.example/b",
        sourceKind: "bulk-file",
        lastModified: "2024-05-01T00:00:00.000Z",
        discoveryOrder: 2,
      },
    ]);
    expect(source.stats).toEqual({
      total: 6,
      emitted: 2,
      skippedExisting: 1,
      skippedInvalid: 1,
      skippedDuplicate: 1,
    });
    expect(source.report()).toEqual({
      source: "bulk:test",
      kind: "bulk-file",
      outcome: "completed",
      emitted: 2,
      skippedExisting: 1,
      skippedDuplicate: 1,
      skippedInvalid: 1,
    });
    expect(warn).toHaveBeenCalledWith("bulk:test: skipping line 4: not an absolute http(s) URL");
  });

  it("stops reading once cancelled", async () => {
    const controller = new AbortController();
    const source = new BulkJobSource({
      name: "bulk:test",
      lines: () => ["https://site.example/a", "https://site.example/b"],
      dedup: new DedupIndex(),
    });

    const urls: string[] = [];
    for await (const record of source.records(controller.signal)) {
      urls.push(record.url);
      controller.abort();
    }

    expect(urls).toEqual(["https://site.example/a"]);
    expect(source.stats.total).toBe(1);
    expect(source.report().outcome).toBe("cancelled");
  });

  describe("fromFile", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "bulk-test-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("reads the file line by line", async () => {
      const path = join(dir, "jobs.ndjson");
      await writeFile(
        path,
        'https://site.example/a\r\n{"url": "https://site.example/b"}\n\nhttps://site.example/a\n',
        "utf-8"
      );
      const source = BulkJobSource.fromFile(path, new DedupIndex());

      const records = await collect(source.records());

      expect(source.name).toBe(`bulk:${path}`);
      expect(records.map((record) => record.url)).toEqual([
        "https://site.example/a",
        "https://site.example/b",
      ]);
      expect(source.stats).toMatchObject({ total: 4, emitted: 2, skippedDuplicate: 1 });
    });

    it("fails on a missing file", async () => {
      const path = join(dir, "missing.ndjson");
      const source = BulkJobSource.fromFile(path, new DedupIndex());

      await expect(collect(source.records())).rejects.toThrow(
        new SourceError(`Jobs file '${path}' does not exist`)
      );
    });
  });
});
