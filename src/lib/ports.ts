import type { CategoryDefinition } from "./types.js";

export type FetchFailureKind =
  | "http-status"
  | "network"
  | "timeout"
  | "unsupported-content";

export type FetchOutcome =
  | { ok: true; body: string; statusCode?: number }
  | { ok: false; kind: FetchFailureKind; statusCode?: number; message?: string };

/** One attempt per call as far as the caller is concerned; retries stay inside. */
export interface PageFetchPort {
  fetch(url: string): Promise<FetchOutcome>;
}

/** Ordered absolute candidate URLs found in a listing page body. */
export interface PageExtractorPort {
  extract(body: string, pageUrl: string): string[] | Promise<string[]>;
}

export interface CategoryCatalogPort {
  load(): Promise<CategoryDefinition[]>;
}

export interface PersistedUrlPort {
  loadExisting(): Promise<Set<string>>;
}
