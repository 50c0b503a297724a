import type { JobSource } from "./aggregator.js";
import { claimUrl, type DedupIndex } from "./dedup.js";
import { SourceError } from "./errors.js";
import type { PageFetchPort } from "./ports.js";
import {
  extractSitemapEntriesFromXml,
  extractSitemapUrlsFromRobotsTxt,
} from "./sitemap.js";
import { toIsoTimestamp } from "./time.js";
import type { JobRecord, SourceReport } from "./types.js";
import { normalizeUrl } from "./url.js";

export interface SitemapJobSourceOptions {
  /** A sitemap index, a plain sitemap, or a robots.txt listing sitemaps. */
  rootUrl: string;
  fetcher: PageFetchPort;
  dedup: DedupIndex;
  /** Stop after emitting this many records. */
  maxUrls?: number;
}

/**
 * Walks a sitemap index breadth-first and emits every `<url>` entry through
 * the run's DedupIndex. Entries keep their order within each sitemap. A
 * child sitemap that cannot be fetched is logged and skipped; an unreachable
 * root ends the source with an error.
 */
export class SitemapJobSource implements JobSource {
  readonly kind = "sitemap" as const;
  private emitted = 0;
  private skippedExisting = 0;
  private skippedDuplicate = 0;
  private skippedInvalid = 0;
  private sitemapsVisited = 0;
  private outcome: SourceReport["outcome"] = "cancelled";

  constructor(private readonly options: SitemapJobSourceOptions) {}

  get name(): string {
    return `sitemap:${this.options.rootUrl}`;
  }

  async *records(signal?: AbortSignal): AsyncGenerator<JobRecord, void, undefined> {
    const { fetcher, dedup, maxUrls } = this.options;
    const queue = await this.initialQueue();
    const queued = new Set(queue);

    while (queue.length > 0) {
      if (signal?.aborted) {
        console.log(`${this.name}: cancelled with ${queue.length} sitemaps left`);
        return;
      }

      const sitemapUrl = queue.shift();
      if (sitemapUrl === undefined) break;

      const outcome = await fetcher.fetch(sitemapUrl);
      this.sitemapsVisited += 1;
      if (!outcome.ok) {
        if (this.sitemapsVisited === 1 && queued.size === 1) {
          throw new SourceError(`Root sitemap ${sitemapUrl} could not be fetched (${outcome.kind})`);
        }
        console.warn(`${this.name}: skipping ${sitemapUrl}: ${outcome.kind}`);
        continue;
      }

      const { childSitemaps, entries } = extractSitemapEntriesFromXml(outcome.body);
      if (childSitemaps.length > 0) {
        console.log(`${this.name}: found sitemap index with ${childSitemaps.length} sitemaps`);
        for (const child of childSitemaps) {
          const resolved = normalizeUrl(child, sitemapUrl);
          if (resolved === null || queued.has(resolved)) continue;
          queued.add(resolved);
          queue.push(resolved);
        }
        continue;
      }

      for (const entry of entries) {
        const url = normalizeUrl(entry.loc, sitemapUrl);
        if (url === null) {
          this.skippedInvalid += 1;
          continue;
        }

        const claim = claimUrl(dedup, url);
        if (claim === "existing") {
          this.skippedExisting += 1;
          continue;
        }
        if (claim === "duplicate") {
          this.skippedDuplicate += 1;
          continue;
        }

        this.emitted += 1;
        yield {
          url,
          sourceKind: this.kind,
          lastModified: toIsoTimestamp(entry.lastmod),
          discoveryOrder: dedup.orderOf(url) ?? dedup.size(),
          sitemapUrl,
          imageUrl: entry.imageLoc ? normalizeUrl(entry.imageLoc, url) ?? undefined : undefined,
        };

        if (maxUrls !== undefined && this.emitted >= maxUrls) {
          console.log(`${this.name}: reached the cap of ${maxUrls} URLs`);
          this.outcome = "completed";
          return;
        }
      }
    }

    this.outcome = "completed";
    console.log(
      `${this.name}: visited ${this.sitemapsVisited} sitemaps, emitted ${this.emitted} URLs`
    );
  }

  report(): SourceReport {
    return {
      source: this.name,
      kind: this.kind,
      outcome: this.outcome,
      emitted: this.emitted,
      skippedExisting: this.skippedExisting,
      skippedDuplicate: this.skippedDuplicate,
      skippedInvalid: this.skippedInvalid,
      pagesVisited: this.sitemapsVisited,
    };
  }

  private async initialQueue(): Promise<string[]> {
    const { rootUrl, fetcher } = this.options;
    if (!/\/robots\.txt$/i.test(new URL(rootUrl).pathname)) return [rootUrl];

    const outcome = await fetcher.fetch(rootUrl);
    if (!outcome.ok) {
      throw new SourceError(`robots.txt ${rootUrl} could not be fetched (${outcome.kind})`);
    }

    const sitemaps = extractSitemapUrlsFromRobotsTxt(outcome.body);
    if (sitemaps.length === 0) {
      throw new SourceError(`robots.txt ${rootUrl} lists no sitemaps`);
    }
    return sitemaps;
  }
}
