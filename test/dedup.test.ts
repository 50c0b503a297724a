import { describe, expect, it } from "vitest";
import { claimUrl, DedupIndex } from "../src/lib/dedup.js";

describe("DedupIndex", () => {
  it("claims each URL once and remembers the claim order", () => {
    const index = new DedupIndex();

    expect(index.claim("https://site.example/a")).toBe(true);
    expect(index.claim("https://site.example/b")).toBe(true);
    expect(index.claim("https://site.example/a")).toBe(false);

    expect(index.orderOf("https://site.example/a")).toBe(1);
    expect(index.orderOf("https://site.example/b")).toBe(2);
    expect(index.orderOf("https://site.example/c")).toBeUndefined();
    expect(index.size()).toBe(2);
  });

  it("treats persisted URLs as already known", () => {
    const index = new DedupIndex(["https://site.example/old"]);

    expect(index.contains("https://site.example/old")).toBe(true);
    expect(index.isPersisted("https://site.example/old")).toBe(true);
    expect(index.claim("https://site.example/old")).toBe(false);
    expect(index.size()).toBe(0);
    expect(index.persistedSize()).toBe(1);
  });

  it("claimUrl tells existing from duplicate", () => {
    const index = new DedupIndex(["https://site.example/old"]);

    expect(claimUrl(index, "https://site.example/new")).toBe("claimed");
    expect(claimUrl(index, "https://site.example/new")).toBe("duplicate");
    expect(claimUrl(index, "https://site.example/old")).toBe("existing");
  });
});
