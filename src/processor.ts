import { JobSourceAggregator } from "./lib/aggregator.js";
import { BulkJobSource } from "./lib/bulk.js";
import { buildCategorySources } from "./lib/category-source.js";
import { DedupIndex } from "./lib/dedup.js";
import { errorMessage } from "./lib/errors.js";
import { AnchorLinkExtractor, JsonFieldExtractor } from "./lib/extract.js";
import type { NormalizedRunOptions } from "./lib/options.js";
import { resolvePolicy } from "./lib/policy.js";
import type { PageExtractorPort, PageFetchPort, PersistedUrlPort } from "./lib/ports.js";
import {
  compilePattern,
  getSiteDefinition,
  SiteCategoryCatalog,
  type SiteDefinition,
} from "./lib/sites.js";
import { SitemapJobSource } from "./lib/sitemap-source.js";
import type { JobRecord } from "./lib/types.js";
import type { RunReport } from "./db/schema.js";

export interface RunInput {
  id: string;
  site: string;
  options: NormalizedRunOptions;
}

export interface RunCallbacks {
  onRunning: () => Promise<void>;
  /** Receives records in discovery order, in batches. */
  onBatch: (records: JobRecord[]) => Promise<void>;
  onCompleted: (report: RunReport, cancelled: boolean) => Promise<void>;
  onFailed: (error: string) => Promise<void>;
}

export interface RunEnvironment {
  sites: readonly SiteDefinition[];
  createFetcher: (userAgent?: string) => PageFetchPort;
  persistedUrls: (site: string) => PersistedUrlPort;
  pageDelayMs?: number;
  pageJitterMs?: number;
  batchSize?: number;
}

const DEFAULT_BATCH_SIZE = 100;

/**
 * Builds every source of a run: one traversal per selected category, then
 * the bulk file and the sitemap when asked for. Catalog and policy problems
 * fail the run before any page is fetched.
 */
export async function buildAggregator(
  run: RunInput,
  env: RunEnvironment
): Promise<{ aggregator: JobSourceAggregator; dedup: DedupIndex }> {
  const { options } = run;
  const site = getSiteDefinition(env.sites, run.site);
  const policy = resolvePolicy(site.variant, {
    maxPages: options.maxPages,
    maxEmptyPages: options.maxEmptyPages,
  });
  const categories = await new SiteCategoryCatalog(site, options.categories).load();

  let persisted: Set<string> = new Set();
  if (options.resume) {
    persisted = await env.persistedUrls(site.slug).loadExisting();
    console.log(`Run ${run.id}: loaded ${persisted.size} existing URLs for resume mode (site=${site.slug})`);
  }

  const dedup = new DedupIndex(persisted);
  const fetcher = env.createFetcher(site.userAgent);
  const extractor = buildExtractor(site);

  const aggregator = new JobSourceAggregator();
  for (const source of buildCategorySources(categories, {
    policy,
    fetcher,
    extractor,
    dedup,
    pageDelayMs: env.pageDelayMs,
    pageJitterMs: env.pageJitterMs,
  })) {
    aggregator.register(source);
  }

  if (options.bulkFile) {
    aggregator.register(BulkJobSource.fromFile(options.bulkFile, dedup));
  }

  const sitemapUrl = options.sitemapUrl ?? (options.useSitemap ? site.sitemapUrl : undefined);
  if (sitemapUrl) {
    aggregator.register(
      new SitemapJobSource({
        rootUrl: sitemapUrl,
        fetcher,
        dedup,
        maxUrls: options.maxSitemapUrls ?? undefined,
      })
    );
  }

  console.log(
    `Run ${run.id}: ${aggregator.size} sources for site ${site.slug} (variant ${site.variant})`
  );
  return { aggregator, dedup };
}

export function buildExtractor(site: SiteDefinition): PageExtractorPort {
  const articlePattern = site.articlePattern
    ? compilePattern(site.articlePattern, site.slug)
    : undefined;

  if (site.extractor === "json") {
    return new JsonFieldExtractor({
      articlePattern,
      allowedHosts: site.allowedHosts,
      urlField: site.jsonUrlField,
    });
  }
  return new AnchorLinkExtractor({ articlePattern, allowedHosts: site.allowedHosts });
}

export async function processRun(
  run: RunInput,
  env: RunEnvironment,
  callbacks: RunCallbacks,
  signal?: AbortSignal
): Promise<void> {
  try {
    await callbacks.onRunning();
    const { aggregator, dedup } = await buildAggregator(run, env);

    const batchSize = Math.max(1, env.batchSize ?? DEFAULT_BATCH_SIZE);
    let batch: JobRecord[] = [];
    let emitted = 0;

    for await (const record of aggregator.records(signal)) {
      batch.push(record);
      emitted += 1;
      if (batch.length >= batchSize) {
        await callbacks.onBatch(batch);
        batch = [];
      }
    }
    if (batch.length > 0) await callbacks.onBatch(batch);

    const report: RunReport = {
      emitted,
      persistedSnapshot: dedup.persistedSize(),
      hasFetchFailures: aggregator.hasFetchFailures(),
      sources: aggregator.reports(),
    };
    // A cancel that lands after the last source finished does not undo the run.
    const cancelled = report.sources.some((source) => source.outcome === "cancelled");

    console.log(
      `Run ${run.id} ${cancelled ? "cancelled" : "completed"}: ${emitted} URLs from ${report.sources.length} sources` +
        (report.hasFetchFailures ? " (some categories halted on fetch failures)" : "")
    );
    await callbacks.onCompleted(report, cancelled);
  } catch (error) {
    console.error(`Run ${run.id} failed:`, error);
    await callbacks.onFailed(errorMessage(error));
  }
}
