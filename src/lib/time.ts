/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const wake = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", wake);
      resolve();
    };
    const timer = setTimeout(wake, ms);
    signal?.addEventListener("abort", wake, { once: true });
  });
}

export function jitter(maxMs: number): number {
  if (maxMs <= 0) return 0;
  return Math.floor(Math.random() * (maxMs + 1));
}

/** Exponential backoff for retry `attempt` (1-based), capped at `capMs`. */
export function backoffDelay(attempt: number, baseMs: number, capMs = 30000): number {
  if (baseMs <= 0 || attempt <= 0) return 0;
  return Math.min(capMs, baseMs * 2 ** (attempt - 1));
}

/** ISO-8601 form of a sitemap/bulk-file timestamp, or undefined when unparsable. */
export function toIsoTimestamp(value: string | null | undefined): string | undefined {
  const text = value?.trim();
  if (!text) return undefined;
  const parsed = new Date(text);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed.toISOString();
}
