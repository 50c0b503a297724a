import type { JobSource } from "./aggregator.js";
import type { DedupIndex } from "./dedup.js";
import type { PageExtractorPort, PageFetchPort } from "./ports.js";
import { CategoryTraversalEngine } from "./traversal.js";
import type {
  CategoryDefinition,
  JobRecord,
  SourceReport,
  TerminationPolicy,
  TraversalReport,
} from "./types.js";

export interface CategorySourceOptions {
  category: CategoryDefinition;
  policy: TerminationPolicy;
  fetcher: PageFetchPort;
  extractor: PageExtractorPort;
  dedup: DedupIndex;
  pageDelayMs?: number;
  pageJitterMs?: number;
}

/** One category traversal, exposed to the aggregator as a source. */
export class CategoryJobSource implements JobSource {
  readonly kind = "category-timeline" as const;
  private readonly engine: CategoryTraversalEngine;
  private traversal: TraversalReport | null = null;

  constructor(private readonly options: CategorySourceOptions) {
    this.engine = new CategoryTraversalEngine({
      fetcher: options.fetcher,
      extractor: options.extractor,
      dedup: options.dedup,
    });
  }

  get name(): string {
    return `category:${this.options.category.slug}`;
  }

  records(signal?: AbortSignal): AsyncIterable<JobRecord> {
    const { category, policy, pageDelayMs, pageJitterMs } = this.options;
    return this.engine.run(category, policy, {
      signal,
      pageDelayMs,
      pageJitterMs,
      onReport: (report) => {
        this.traversal = report;
      },
    });
  }

  report(): SourceReport {
    const traversal = this.traversal;
    if (traversal === null) {
      return {
        source: this.name,
        kind: this.kind,
        outcome: "cancelled",
        emitted: 0,
        skippedExisting: 0,
        skippedDuplicate: 0,
        skippedInvalid: 0,
        pagesVisited: 0,
      };
    }

    return {
      source: this.name,
      kind: this.kind,
      outcome: traversal.terminationReason,
      emitted: traversal.emitted,
      skippedExisting: traversal.skippedExisting,
      skippedDuplicate: traversal.skippedDuplicate,
      skippedInvalid: traversal.skippedInvalid,
      pagesVisited: traversal.pagesVisited,
    };
  }
}

export function buildCategorySources(
  categories: readonly CategoryDefinition[],
  shared: Omit<CategorySourceOptions, "category">
): CategoryJobSource[] {
  return categories.map((category) => new CategoryJobSource({ ...shared, category }));
}
