import { createReadStream } from "node:fs";
import { access } from "node:fs/promises";
import { createInterface } from "node:readline";
import type { JobSource } from "./aggregator.js";
import { claimUrl, type DedupIndex } from "./dedup.js";
import { SourceError } from "./errors.js";
import { toIsoTimestamp } from "./time.js";
import type { BulkSourceStats, JobRecord, SourceReport } from "./types.js";
import { normalizeUrl } from "./url.js";

export interface BulkEntry {
  url: string;
  lastModified?: string;
  sitemapUrl?: string;
  imageUrl?: string;
}

export type BulkLine =
  | { kind: "blank" }
  | { kind: "entry"; entry: BulkEntry }
  | { kind: "invalid"; reason: string };

/**
 * A line is either an NDJSON object (`url`, `lastmod`, `sitemap_url`,
 * `image_url`) or a bare absolute URL.
 */
export function parseBulkLine(raw: string): BulkLine {
  const line = raw.trim();
  if (!line) return { kind: "blank" };

  if (!line.startsWith("{")) {
    const url = normalizeUrl(line);
    return url === null
      ? { kind: "invalid", reason: "not an absolute http(s) URL" }
      : { kind: "entry", entry: { url } };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(line);
  } catch {
    return { kind: "invalid", reason: "invalid JSON" };
  }

  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    return { kind: "invalid", reason: "not a JSON object" };
  }

  const fields = new Map<string, unknown>(Object.entries(payload));
  const rawUrl = fields.get("url");
  if (typeof rawUrl !== "string" || !rawUrl) {
    return { kind: "invalid", reason: "missing 'url'" };
  }

  const url = normalizeUrl(rawUrl);
  if (url === null) return { kind: "invalid", reason: `unusable url '${rawUrl}'` };

  const text = (key: string): string | undefined => {
    const value = fields.get(key);
    return typeof value === "string" && value ? value : undefined;
  };

  const imageUrl = text("image_url");
  return {
    kind: "entry",
    entry: {
      url,
      lastModified: toIsoTimestamp(text("lastmod")),
      sitemapUrl: text("sitemap_url"),
      imageUrl: imageUrl ? normalizeUrl(imageUrl) ?? undefined : undefined,
    },
  };
}

export async function* readLines(path: string): AsyncGenerator<string, void, undefined> {
  try {
    await access(path);
  } catch (error) {
    throw new SourceError(`Jobs file '${path}' does not exist`, { cause: error });
  }

  const stream = createReadStream(path, { encoding: "utf-8" });
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  try {
    for await (const line of lines) yield line;
  } finally {
    lines.close();
    stream.destroy();
  }
}

export interface BulkJobSourceOptions {
  name: string;
  lines: () => AsyncIterable<string> | Iterable<string>;
  dedup: DedupIndex;
}

export class BulkJobSource implements JobSource {
  readonly kind = "bulk-file" as const;
  readonly stats: BulkSourceStats = {
    total: 0,
    emitted: 0,
    skippedExisting: 0,
    skippedInvalid: 0,
    skippedDuplicate: 0,
  };
  private outcome: SourceReport["outcome"] = "cancelled";

  constructor(private readonly options: BulkJobSourceOptions) {}

  static fromFile(path: string, dedup: DedupIndex): BulkJobSource {
    return new BulkJobSource({ name: `bulk:${path}`, lines: () => readLines(path), dedup });
  }

  get name(): string {
    return this.options.name;
  }

  async *records(signal?: AbortSignal): AsyncGenerator<JobRecord, void, undefined> {
    const { dedup } = this.options;
    let lineNumber = 0;

    for await (const raw of this.options.lines()) {
      if (signal?.aborted) {
        console.log(`${this.name}: cancelled after line ${lineNumber}`);
        return;
      }

      lineNumber += 1;
      this.stats.total += 1;

      const parsed = parseBulkLine(raw);
      if (parsed.kind === "blank") continue;
      if (parsed.kind === "invalid") {
        this.stats.skippedInvalid += 1;
        console.warn(`${this.name}: skipping line ${lineNumber}: ${parsed.reason}`);
        continue;
      }

      const { entry } = parsed;
      const claim = claimUrl(dedup, entry.url);
      if (claim === "existing") {
        this.stats.skippedExisting += 1;
        continue;
      }
      if (claim === "duplicate") {
        this.stats.skippedDuplicate += 1;
        continue;
      }

      this.stats.emitted += 1;
      yield {
        url: entry.url,
        sourceKind: this.kind,
        lastModified: entry.lastModified,
        discoveryOrder: dedup.orderOf(entry.url) ?? dedup.size(),
        sitemapUrl: entry.sitemapUrl,
        imageUrl: entry.imageUrl,
      };
    }

    this.outcome = "completed";
    console.log(
      `${this.name}: read ${this.stats.total} lines, emitted ${this.stats.emitted}, ` +
        `skipped ${this.stats.skippedExisting} existing, ${this.stats.skippedDuplicate} duplicate, ` +
        `${this.stats.skippedInvalid} invalid`
    );
  }

  report(): SourceReport {
    return {
      source: this.name,
      kind: this.kind,
      outcome: this.outcome,
      emitted: this.stats.emitted,
      skippedExisting: this.stats.skippedExisting,
      skippedDuplicate: this.stats.skippedDuplicate,
      skippedInvalid: this.stats.skippedInvalid,
    };
  }
}
