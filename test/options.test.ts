import { describe, expect, it } from "vitest";
import {
  createRunSchema,
  DEFAULT_OPTIONS,
  normalizeRunOptions,
  parseCategorySlugs,
} from "../src/lib/options.js";

describe("options", () => {
  it("normalizeRunOptions fills defaults", () => {
    expect(normalizeRunOptions()).toEqual(DEFAULT_OPTIONS);
    expect("maxPages" in normalizeRunOptions()).toBe(false);
  });

  it("normalizeRunOptions overrides defaults", () => {
    const out = normalizeRunOptions({
      categories: "Politics, economy",
      resume: true,
      maxPages: null,
      maxEmptyPages: 4,
    });
    expect(out.categories).toEqual(["politics", "economy"]);
    expect(out.resume).toBe(true);
    expect(out.maxPages).toBeNull();
    expect(out.maxEmptyPages).toBe(4);
    // untouched defaults remain
    expect(out.bulkFile).toBe(DEFAULT_OPTIONS.bulkFile);
    expect(out.useSitemap).toBe(false);
  });

  it("an explicit sitemap URL turns the sitemap on", () => {
    const out = normalizeRunOptions({ sitemapUrl: "https://site.example/sitemap.xml" });
    expect(out.sitemapUrl).toBe("https://site.example/sitemap.xml");
    expect(out.useSitemap).toBe(true);

    expect(
      normalizeRunOptions({ sitemapUrl: "https://site.example/sitemap.xml", useSitemap: false })
        .useSitemap
    ).toBe(false);
  });

  it("parseCategorySlugs trims, lower-cases and dedupes in order", () => {
    expect(parseCategorySlugs(" Politics, economy,POLITICS,, ")).toEqual(["politics", "economy"]);
    expect(parseCategorySlugs(["world,Law", "law"])).toEqual(["world", "law"]);
    expect(parseCategorySlugs(undefined)).toEqual([]);
    expect(parseCategorySlugs("")).toEqual([]);
  });

  it("createRunSchema validates run requests", () => {
    const parsed = createRunSchema.parse({ site: " harbor-daily ", maxPages: 0 });
    expect(parsed).toEqual({ site: "harbor-daily", maxPages: 0 });

    expect(createRunSchema.safeParse({ site: "harbor-daily", maxPages: -1 }).success).toBe(false);
    expect(createRunSchema.safeParse({ site: "harbor-daily", maxSitemapUrls: 0 }).success).toBe(
      false
    );
    expect(createRunSchema.safeParse({ site: "harbor-daily", sitemapUrl: "nope" }).success).toBe(
      false
    );
    expect(createRunSchema.safeParse({ site: "" }).success).toBe(false);
  });
});
