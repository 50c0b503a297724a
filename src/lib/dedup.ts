/**
 * Run-scoped claim set shared by every source of a run.
 *
 * `persisted` is the snapshot of already-ingested URLs (only populated in
 * resume mode). Claims made during the run are kept in insertion order so
 * the claim position doubles as the record's discovery order.
 *
 * `claim` is a synchronous check-and-set: sources interleaving on the event
 * loop cannot both claim the same URL.
 */
export class DedupIndex {
  private readonly persisted: ReadonlySet<string>;
  private readonly seenThisRun = new Map<string, number>();

  constructor(persistedUrls: Iterable<string> = []) {
    this.persisted = new Set(persistedUrls);
  }

  contains(url: string): boolean {
    return this.persisted.has(url) || this.seenThisRun.has(url);
  }

  isPersisted(url: string): boolean {
    return this.persisted.has(url);
  }

  /** True iff the URL was not known before this call. */
  claim(url: string): boolean {
    if (this.contains(url)) return false;
    this.seenThisRun.set(url, this.seenThisRun.size + 1);
    return true;
  }

  orderOf(url: string): number | undefined {
    return this.seenThisRun.get(url);
  }

  /** Number of URLs claimed during this run. */
  size(): number {
    return this.seenThisRun.size;
  }

  persistedSize(): number {
    return this.persisted.size;
  }
}

export type ClaimOutcome = "claimed" | "existing" | "duplicate";

export function claimUrl(index: DedupIndex, url: string): ClaimOutcome {
  if (index.claim(url)) return "claimed";
  return index.isPersisted(url) ? "existing" : "duplicate";
}
