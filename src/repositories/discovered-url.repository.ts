import { eq } from "drizzle-orm";
import { db } from "../db/index.js";
import { discoveredUrls, type NewDiscoveredUrl } from "../db/schema.js";
import type { PersistedUrlPort } from "../lib/ports.js";
import type { JobRecord } from "../lib/types.js";

export async function loadExistingUrls(site: string): Promise<Set<string>> {
  const rows = await db
    .select({ url: discoveredUrls.url })
    .from(discoveredUrls)
    .where(eq(discoveredUrls.site, site));
  return new Set(rows.map((row) => row.url));
}

/** Inserts a batch; URLs stored by an earlier run are left untouched. */
export async function insertDiscovered(
  site: string,
  runId: string,
  records: readonly JobRecord[]
): Promise<number> {
  if (records.length === 0) return 0;

  const rows: NewDiscoveredUrl[] = records.map((record) => ({
    url: record.url,
    site,
    runId,
    originCategory: record.originCategory ?? null,
    sourceKind: record.sourceKind,
    lastModified: record.lastModified ? new Date(record.lastModified) : null,
    sitemapUrl: record.sitemapUrl ?? null,
    imageUrl: record.imageUrl ?? null,
    discoveryOrder: record.discoveryOrder,
  }));

  const inserted = await db
    .insert(discoveredUrls)
    .values(rows)
    .onConflictDoNothing({ target: discoveredUrls.url })
    .returning({ url: discoveredUrls.url });
  return inserted.length;
}

export function persistedUrlsFor(site: string): PersistedUrlPort {
  return {
    loadExisting: () => loadExistingUrls(site),
  };
}
