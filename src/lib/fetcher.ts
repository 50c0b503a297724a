import { errorMessage } from "./errors.js";
import { isRetryableStatus, isSuccessStatus, isTextualContentType } from "./http.js";
import type { FetchOutcome, PageFetchPort } from "./ports.js";
import { backoffDelay, jitter, sleep } from "./time.js";

export const DEFAULT_USER_AGENT = "category-discovery/1.0";

export interface HttpPageFetcherOptions {
  userAgent?: string;
  timeoutMs?: number;
  /** Extra attempts after the first one. */
  maxRetries?: number;
  baseDelayMs?: number;
  /** Swappable for tests. */
  fetchImpl?: typeof fetch;
}

/**
 * PageFetchPort over the global fetch. Retries throttling, 5xx and network
 * errors with exponential backoff plus jitter; everything else is returned
 * to the caller as a single failure.
 */
export class HttpPageFetcher implements PageFetchPort {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.maxRetries = Math.max(0, options.maxRetries ?? 2);
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? 500);
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetch(url: string): Promise<FetchOutcome> {
    let attempt = 0;

    while (true) {
      const outcome = await this.attempt(url);
      if (outcome.ok || !this.shouldRetry(outcome) || attempt >= this.maxRetries) {
        return outcome;
      }

      attempt += 1;
      const delay = backoffDelay(attempt, this.baseDelayMs) + jitter(this.baseDelayMs);
      console.warn(
        `Attempt ${attempt}/${this.maxRetries + 1} failed for ${url}: ${outcome.kind}` +
          `${outcome.statusCode ? ` ${outcome.statusCode}` : ""}; retrying in ${delay}ms`
      );
      await sleep(delay);
    }
  }

  private shouldRetry(outcome: Extract<FetchOutcome, { ok: false }>): boolean {
    switch (outcome.kind) {
      case "network":
      case "timeout":
        return true;
      case "http-status":
        return outcome.statusCode !== undefined && isRetryableStatus(outcome.statusCode);
      case "unsupported-content":
        return false;
    }
  }

  private async attempt(url: string): Promise<FetchOutcome> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        redirect: "follow",
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: {
          "User-Agent": this.userAgent,
          Accept:
            "text/html,application/xhtml+xml,application/xml;q=0.9,application/json;q=0.8,*/*;q=0.5",
          "Accept-Language": "en-US,en;q=0.9",
        },
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === "TimeoutError";
      return { ok: false, kind: timedOut ? "timeout" : "network", message: errorMessage(error) };
    }

    if (!isSuccessStatus(response.status)) {
      await response.body?.cancel();
      return { ok: false, kind: "http-status", statusCode: response.status };
    }

    const contentType = response.headers.get("content-type");
    if (!isTextualContentType(contentType)) {
      await response.body?.cancel();
      return {
        ok: false,
        kind: "unsupported-content",
        statusCode: response.status,
        message: `Unsupported content type '${contentType}'`,
      };
    }

    try {
      return { ok: true, body: await response.text(), statusCode: response.status };
    } catch (error) {
      return { ok: false, kind: "network", statusCode: response.status, message: errorMessage(error) };
    }
  }
}
