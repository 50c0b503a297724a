import type { FetchOutcome, PageExtractorPort, PageFetchPort } from "../src/lib/ports.js";

/** Answers from a fixed url → outcome table; unknown URLs are a 404. */
export class ScriptedFetcher implements PageFetchPort {
  readonly calls: string[] = [];

  constructor(private readonly responses: ReadonlyMap<string, FetchOutcome>) {}

  async fetch(url: string): Promise<FetchOutcome> {
    this.calls.push(url);
    return this.responses.get(url) ?? { ok: false, kind: "http-status", statusCode: 404 };
  }
}

/** Page bodies are JSON arrays of candidate URLs. */
export class ListExtractor implements PageExtractorPort {
  extract(body: string): string[] {
    const payload: unknown = JSON.parse(body);
    if (!Array.isArray(payload)) return [];
    return payload.filter((value): value is string => typeof value === "string");
  }
}

export function listPage(urls: readonly string[]): FetchOutcome {
  return { ok: true, body: JSON.stringify(urls), statusCode: 200 };
}

export function failedPage(statusCode = 503): FetchOutcome {
  return { ok: false, kind: "http-status", statusCode };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

export async function drain<T, R>(
  generator: AsyncGenerator<T, R, undefined>
): Promise<{ items: T[]; result: R }> {
  const items: T[] = [];
  while (true) {
    const next = await generator.next();
    if (next.done) return { items, result: next.value };
    items.push(next.value);
  }
}
