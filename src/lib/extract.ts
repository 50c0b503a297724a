import * as cheerio from "cheerio";
import { selectArticleLinks } from "./crawl.js";
import type { PageExtractorPort } from "./ports.js";

const LINK_ATTRIBUTES = ["href", "data-link", "data-url"] as const;

export interface AnchorLinkExtractorOptions {
  articlePattern?: RegExp;
  allowedHosts?: readonly string[];
}

/**
 * Load-more timelines answer with `{"html": "..."}` instead of a document;
 * unwrap that, pass everything else through.
 */
export function unwrapHtmlPayload(body: string): string {
  const trimmed = body.trim();
  if (!trimmed.startsWith("{")) return body;

  let payload: unknown;
  try {
    payload = JSON.parse(trimmed);
  } catch {
    return body;
  }

  if (typeof payload === "object" && payload !== null && "html" in payload) {
    const html = payload.html;
    if (typeof html === "string") return html;
  }
  return body;
}

/** Generic listing-page extractor: every anchor link that looks like an article. */
export class AnchorLinkExtractor implements PageExtractorPort {
  constructor(private readonly options: AnchorLinkExtractorOptions = {}) {}

  extract(body: string, pageUrl: string): string[] {
    const $ = cheerio.load(unwrapHtmlPayload(body));
    const raw: string[] = [];

    $("a").each((_, el) => {
      const anchor = $(el);
      for (const attribute of LINK_ATTRIBUTES) {
        const value = anchor.attr(attribute)?.trim();
        if (!value) continue;
        if (/^(?:mailto|tel|javascript):/i.test(value)) continue;
        raw.push(value);
      }
    });

    return selectArticleLinks({
      pageUrl,
      candidates: raw,
      articlePattern: this.options.articlePattern,
      allowedHosts: this.options.allowedHosts,
    });
  }
}

export interface JsonFieldExtractorOptions extends AnchorLinkExtractorOptions {
  /** Key whose string values are article links, at any depth. */
  urlField?: string;
}

/** Extractor for paged JSON APIs: collects every `urlField` string, in document order. */
export class JsonFieldExtractor implements PageExtractorPort {
  private readonly urlField: string;

  constructor(private readonly options: JsonFieldExtractorOptions = {}) {
    this.urlField = options.urlField ?? "url";
  }

  extract(body: string, pageUrl: string): string[] {
    const trimmed = body.trim();
    if (!trimmed) return [];

    const payload: unknown = JSON.parse(trimmed);
    const raw: string[] = [];
    this.collect(payload, raw);

    return selectArticleLinks({
      pageUrl,
      candidates: raw,
      articlePattern: this.options.articlePattern,
      allowedHosts: this.options.allowedHosts,
    });
  }

  private collect(value: unknown, out: string[]): void {
    if (Array.isArray(value)) {
      for (const item of value) this.collect(item, out);
      return;
    }
    if (typeof value !== "object" || value === null) return;

    for (const [key, child] of Object.entries(value)) {
      if (key === this.urlField && typeof child === "string") {
        out.push(child);
      } else {
        this.collect(child, out);
      }
    }
  }
}
