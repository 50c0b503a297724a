export type SourceKind =
  | "category-timeline"
  | "landing-page"
  | "bulk-file"
  | "sitemap";

export interface JobRecord {
  /** Absolute URL, normalized with {@link normalizeUrl}. Unique per run. */
  url: string;
  originCategory?: string;
  sourceKind: SourceKind;
  /** ISO-8601 timestamp, when the source knows one. */
  lastModified?: string;
  /** 1-based claim position in the run's DedupIndex. */
  discoveryOrder: number;
  sitemapUrl?: string;
  imageUrl?: string;
}

export interface CategoryDefinition {
  readonly slug: string;
  readonly displayName: string;
  readonly categoryId: string | number;
  readonly landingUrl?: string;
  /**
   * Timeline URL with a `{page}` placeholder and, optionally, a
   * `{categoryId}` placeholder.
   */
  readonly timelineUrlTemplate?: string;
}

export type HttpFailureMode = "halt" | "tolerate-as-empty";

export type EmptyDefinition = "post-dedupe-count" | "raw-extracted-count";

export interface DuplicateDetection {
  enabled: boolean;
  fingerprintSize: number;
}

export interface TerminationPolicy {
  /** Absent means unbounded. `0` still fetches the first page. */
  maxPages?: number;
  /** Absent disables the guard. */
  maxEmptyPages?: number;
  httpFailureMode: HttpFailureMode;
  duplicateDetection: DuplicateDetection;
  emptyDefinition: EmptyDefinition;
}

export type PolicyVariant =
  | "timeline-strict"
  | "timeline-loop-sensitive"
  | "timeline-tolerant"
  | "api-paged"
  | "timeline-most-loop-sensitive";

export type TerminationReason =
  | "fetch-failure"
  | "duplicate-pagination"
  | "empty-page-limit"
  | "max-pages-reached"
  | "catalog-exhausted"
  | "cancelled";

export type TraversalPhase =
  | "fetching"
  | "extracting"
  | "evaluating"
  | "emitting"
  | "terminated";

export interface TraversalReport {
  category: string;
  pagesVisited: number;
  emitted: number;
  skippedExisting: number;
  skippedDuplicate: number;
  skippedInvalid: number;
  terminationReason: TerminationReason;
}

export interface BulkSourceStats {
  total: number;
  emitted: number;
  skippedExisting: number;
  skippedInvalid: number;
  skippedDuplicate: number;
}

export type SourceOutcome = TerminationReason | "completed" | "source-error";

export interface SourceReport {
  source: string;
  kind: SourceKind;
  outcome: SourceOutcome;
  emitted: number;
  skippedExisting: number;
  skippedDuplicate: number;
  skippedInvalid: number;
  pagesVisited?: number;
  error?: string;
}

export interface RunOptions {
  /**
   * Category slugs to traverse, as a list or a comma-separated string.
   * Empty means every category of the site.
   */
  categories?: string | string[];
  /**
   * Skip URLs already stored for the site by earlier runs.
   */
  resume?: boolean;
  /**
   * Per-category page ceiling. Omit for the site's default, null for no limit.
   */
  maxPages?: number | null;
  /**
   * Consecutive empty pages before a category stops. Omit for the site's
   * default, null to disable the guard.
   */
  maxEmptyPages?: number | null;
  /**
   * Line-oriented file of pre-generated candidates (NDJSON or bare URLs).
   */
  bulkFile?: string | null;
  /**
   * Sitemap index (or robots.txt) to walk after the categories.
   */
  sitemapUrl?: string | null;
  /**
   * Walk the site's configured sitemap even when no sitemapUrl is given.
   */
  useSitemap?: boolean;
  /**
   * Cap on records taken from the sitemap.
   */
  maxSitemapUrls?: number | null;
}
