import { claimUrl, type DedupIndex } from "./dedup.js";
import { ExtractionError, errorMessage } from "./errors.js";
import { classifyTermination, validatePolicy } from "./policy.js";
import type { FetchOutcome, PageExtractorPort, PageFetchPort } from "./ports.js";
import { jitter, sleep } from "./time.js";
import { TraversalState } from "./traversal-state.js";
import type {
  CategoryDefinition,
  JobRecord,
  SourceKind,
  TerminationPolicy,
  TraversalReport,
} from "./types.js";
import { normalizeUrl } from "./url.js";

export interface TraversalPorts {
  fetcher: PageFetchPort;
  extractor: PageExtractorPort;
  dedup: DedupIndex;
}

export interface TraversalRunOptions {
  /** Checked at every page boundary. Records already yielded stay valid. */
  signal?: AbortSignal;
  /** Pause before every page after the first. */
  pageDelayMs?: number;
  pageJitterMs?: number;
  onReport?: (report: TraversalReport) => void;
}

export interface PageTarget {
  url: string;
  kind: Extract<SourceKind, "landing-page" | "category-timeline">;
}

/**
 * Page 1 is the landing URL when the category has one; every other page
 * comes from the timeline template. Null when the category has no address
 * for the requested page.
 */
export function buildPageTarget(category: CategoryDefinition, page: number): PageTarget | null {
  if (page === 1 && category.landingUrl) {
    return { url: category.landingUrl, kind: "landing-page" };
  }

  const template = category.timelineUrlTemplate;
  if (!template) return null;

  const url = template
    .replaceAll("{categoryId}", encodeURIComponent(String(category.categoryId)))
    .replaceAll("{page}", String(page));
  return { url, kind: "category-timeline" };
}

/**
 * Drives the pagination of one category. The termination checks run in a
 * fixed order per page: fetch failure, loop fingerprint (before anything is
 * emitted), dedup and emission, empty-page guard, page ceiling.
 */
export class CategoryTraversalEngine {
  private lastReport: TraversalReport | null = null;

  constructor(private readonly ports: TraversalPorts) {}

  /** Report of the most recently finished traversal. */
  get report(): TraversalReport | null {
    return this.lastReport;
  }

  async *run(
    category: CategoryDefinition,
    policy: TerminationPolicy,
    options: TraversalRunOptions = {}
  ): AsyncGenerator<JobRecord, TraversalReport, undefined> {
    validatePolicy(policy);

    const { dedup } = this.ports;
    const label = `[category ${category.slug}]`;
    const state = new TraversalState();
    const counters = {
      pagesVisited: 0,
      emitted: 0,
      skippedExisting: 0,
      skippedDuplicate: 0,
      skippedInvalid: 0,
    };
    let report: TraversalReport = {
      category: category.slug,
      ...counters,
      terminationReason: "cancelled",
    };

    try {
      while (!state.terminated) {
        if (options.signal?.aborted) {
          state.terminate("cancelled");
          break;
        }

        const target = buildPageTarget(category, state.currentPage);
        if (target === null) {
          state.terminate("catalog-exhausted");
          break;
        }

        if (state.currentPage > 1) {
          const delay = (options.pageDelayMs ?? 0) + jitter(options.pageJitterMs ?? 0);
          await sleep(delay, options.signal);
          if (options.signal?.aborted) {
            state.terminate("cancelled");
            break;
          }
        }

        state.enter("fetching");
        const outcome = await this.fetchPage(target.url);
        counters.pagesVisited += 1;

        let emittedCount = 0;

        if (!outcome.ok) {
          const status = outcome.statusCode ? ` (status ${outcome.statusCode})` : "";
          if (policy.httpFailureMode === "halt") {
            console.warn(
              `${label} Page ${state.currentPage} fetch failed: ${outcome.kind}${status}; halting ${target.url}`
            );
            state.terminate("fetch-failure");
            break;
          }
          console.warn(
            `${label} Page ${state.currentPage} fetch failed: ${outcome.kind}${status}; counting as empty`
          );
        } else {
          state.enter("extracting");
          const candidates = await this.extractCandidates(outcome.body, target.url, label);

          state.enter("evaluating");
          if (policy.duplicateDetection.enabled) {
            const fingerprint = candidates.slice(0, policy.duplicateDetection.fingerprintSize);
            if (state.checkFingerprint(fingerprint)) {
              console.log(
                `${label} Page ${state.currentPage} repeats the previous page; stopping pagination`
              );
              state.terminate("duplicate-pagination");
              break;
            }
          }

          state.enter("emitting");
          let fresh = 0;
          for (const candidate of candidates) {
            const url = normalizeUrl(candidate);
            if (url === null) {
              counters.skippedInvalid += 1;
              continue;
            }

            const claim = claimUrl(dedup, url);
            if (claim === "existing") {
              counters.skippedExisting += 1;
              continue;
            }
            if (claim === "duplicate") {
              counters.skippedDuplicate += 1;
              continue;
            }

            fresh += 1;
            counters.emitted += 1;
            yield {
              url,
              originCategory: category.slug,
              sourceKind: target.kind,
              discoveryOrder: dedup.orderOf(url) ?? dedup.size(),
            };
          }

          emittedCount =
            policy.emptyDefinition === "post-dedupe-count" ? fresh : candidates.length;
        }

        state.enter("evaluating");
        state.recordPageYield(emittedCount);

        if (
          policy.maxEmptyPages !== undefined &&
          state.consecutiveEmptyPages >= policy.maxEmptyPages
        ) {
          state.terminate("empty-page-limit");
          break;
        }

        state.currentPage += 1;
        if (policy.maxPages !== undefined && state.currentPage > policy.maxPages) {
          state.terminate("max-pages-reached");
        }
      }
    } finally {
      // The consumer stopped pulling before a termination condition was met.
      if (!state.terminated) state.terminate("cancelled");

      report = {
        category: category.slug,
        ...counters,
        terminationReason: state.terminationReason ?? "cancelled",
      };
      this.lastReport = report;

      console.log(
        `${label} Finished after ${report.pagesVisited} pages: ${report.emitted} emitted, ` +
          `${report.skippedExisting} existing, ${report.skippedDuplicate} duplicate, ` +
          `${report.skippedInvalid} invalid (${report.terminationReason}, ${classifyTermination(report.terminationReason)})`
      );
      options.onReport?.(report);
    }

    return report;
  }

  private async fetchPage(url: string): Promise<FetchOutcome> {
    try {
      return await this.ports.fetcher.fetch(url);
    } catch (error) {
      return { ok: false, kind: "network", message: errorMessage(error) };
    }
  }

  private async extractCandidates(body: string, pageUrl: string, label: string): Promise<string[]> {
    try {
      return await this.ports.extractor.extract(body, pageUrl);
    } catch (error) {
      const failure = new ExtractionError(pageUrl, errorMessage(error), { cause: error });
      console.warn(`${label} ${failure.name} on ${pageUrl}: ${failure.message}`);
      return [];
    }
  }
}
