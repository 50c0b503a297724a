import { z } from "zod";
import type { RunOptions } from "./types.js";

export interface NormalizedRunOptions {
  categories: string[];
  resume: boolean;
  /** `undefined` keeps the variant default, `null` removes the limit. */
  maxPages?: number | null;
  maxEmptyPages?: number | null;
  bulkFile: string | null;
  /** Overrides the site's own sitemap URL when set. */
  sitemapUrl: string | null;
  useSitemap: boolean;
  maxSitemapUrls: number | null;
}

export const DEFAULT_OPTIONS: NormalizedRunOptions = {
  categories: [],
  resume: false,
  bulkFile: null,
  sitemapUrl: null,
  useSitemap: false,
  maxSitemapUrls: null,
};

/** Comma-separated slugs, trimmed, lower-cased, de-duplicated, order kept. */
export function parseCategorySlugs(raw: string | readonly string[] | undefined): string[] {
  if (!raw) return [];
  const parts = typeof raw === "string" ? raw.split(",") : raw.flatMap((part) => part.split(","));

  const selected: string[] = [];
  for (const part of parts) {
    const slug = part.trim().toLowerCase();
    if (!slug || selected.includes(slug)) continue;
    selected.push(slug);
  }
  return selected;
}

export function normalizeRunOptions(options?: RunOptions): NormalizedRunOptions {
  const normalized: NormalizedRunOptions = {
    ...DEFAULT_OPTIONS,
    categories: parseCategorySlugs(options?.categories),
    resume: options?.resume ?? DEFAULT_OPTIONS.resume,
    bulkFile: options?.bulkFile ?? DEFAULT_OPTIONS.bulkFile,
    sitemapUrl: options?.sitemapUrl ?? DEFAULT_OPTIONS.sitemapUrl,
    useSitemap: options?.useSitemap ?? Boolean(options?.sitemapUrl),
    maxSitemapUrls: options?.maxSitemapUrls ?? DEFAULT_OPTIONS.maxSitemapUrls,
  };
  if (options?.maxPages !== undefined) normalized.maxPages = options.maxPages;
  if (options?.maxEmptyPages !== undefined) normalized.maxEmptyPages = options.maxEmptyPages;
  return normalized;
}

const limit = z.number().int().min(0).nullable().optional();

export const createRunSchema = z.object({
  site: z.string().trim().min(1),
  categories: z.union([z.string(), z.array(z.string())]).optional(),
  resume: z.boolean().optional(),
  maxPages: limit,
  maxEmptyPages: limit,
  bulkFile: z.string().min(1).nullable().optional(),
  sitemapUrl: z.string().url().nullable().optional(),
  useSitemap: z.boolean().optional(),
  maxSitemapUrls: z.number().int().positive().nullable().optional(),
});
