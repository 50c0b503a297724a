import { describe, expect, it } from "vitest";
import { selectArticleLinks } from "../src/lib/crawl.js";

describe("crawl", () => {
  it("keeps only article links on the page's host or its aliases", () => {
    const out = selectArticleLinks({
      pageUrl: "https://site.example/news?page=2",
      candidates: [
        "/2024/a.html",
        "https://other.example/2024/b.html",
        "mailto:desk@site.example",
        "/2024/a.html#comments",
        "https://cdn.site.example/2024/c.html",
        "/news?page=2",
        "/about",
        "http://[bad",
      ],
      articlePattern: /\/\d{4}\//,
      allowedHosts: ["CDN.site.example"],
    });

    expect(out).toEqual([
      "https://site.example/2024/a.html",
      "https://cdn.site.example/2024/c.html",
    ]);
  });

  it("without a pattern keeps every same-site link", () => {
    const out = selectArticleLinks({
      pageUrl: "https://site.example/news",
      candidates: ["/about", "/news#top", "/contact"],
    });

    expect(out).toEqual(["https://site.example/about", "https://site.example/contact"]);
  });
});
