import { readFile } from "node:fs/promises";
import { z } from "zod";
import { CatalogError, errorMessage } from "./errors.js";
import { POLICY_VARIANTS } from "./policy.js";
import type { CategoryCatalogPort } from "./ports.js";
import type { CategoryDefinition } from "./types.js";

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "must be an http(s) URL");

const categorySchema = z
  .object({
    slug: z.string().trim().toLowerCase().min(1),
    displayName: z.string().min(1),
    categoryId: z.union([z.string().min(1), z.number().int()]),
    landingUrl: httpUrl.optional(),
    timelineUrlTemplate: z
      .string()
      .refine((value) => value.includes("{page}"), "must contain a {page} placeholder")
      .refine(
        (value) => /^https?:\/\//i.test(value),
        "must be an http(s) URL template"
      )
      .optional(),
  })
  .refine((category) => category.landingUrl || category.timelineUrlTemplate, {
    message: "needs a landingUrl or a timelineUrlTemplate",
  });

const siteSchema = z.object({
  slug: z.string().trim().toLowerCase().min(1),
  variant: z.enum(POLICY_VARIANTS),
  articlePattern: z.string().min(1).optional(),
  extractor: z.enum(["anchors", "json"]).default("anchors"),
  jsonUrlField: z.string().min(1).default("url"),
  allowedHosts: z.array(z.string().min(1)).default([]),
  userAgent: z.string().min(1).optional(),
  sitemapUrl: httpUrl.optional(),
  categories: z.array(categorySchema).min(1),
});

const sitesFileSchema = z.object({
  sites: z.array(siteSchema).min(1),
});

export type SiteDefinition = z.infer<typeof siteSchema>;

export function parseSites(input: unknown): SiteDefinition[] {
  const result = sitesFileSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new CatalogError(`Invalid sites file: ${issues}`);
  }

  const sites = result.data.sites;
  assertUnique(sites.map((site) => site.slug), "site");
  for (const site of sites) {
    assertUnique(site.categories.map((category) => category.slug), `category in site ${site.slug}`);
    if (site.articlePattern) compilePattern(site.articlePattern, site.slug);
  }
  return sites;
}

export async function loadSitesFile(path: string): Promise<SiteDefinition[]> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    throw new CatalogError(`Cannot read sites file ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new CatalogError(`Sites file ${path} is not valid JSON`, { cause: error });
  }

  return parseSites(json);
}

export function getSiteDefinition(sites: readonly SiteDefinition[], slug: string): SiteDefinition {
  const site = sites.find((candidate) => candidate.slug === slug.trim().toLowerCase());
  if (!site) {
    const known = sites.map((candidate) => candidate.slug).sort().join(", ");
    throw new CatalogError(`Unknown site '${slug}' (known: ${known})`);
  }
  return site;
}

export function compilePattern(pattern: string, siteSlug: string): RegExp {
  try {
    return new RegExp(pattern, "i");
  } catch (error) {
    throw new CatalogError(`Site ${siteSlug} has an invalid articlePattern: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * The categories of one site, optionally narrowed to `selectedSlugs` (kept
 * in the caller's order). An unknown selected slug is a CatalogError.
 */
export class SiteCategoryCatalog implements CategoryCatalogPort {
  constructor(
    private readonly site: SiteDefinition,
    private readonly selectedSlugs: readonly string[] = []
  ) {}

  async load(): Promise<CategoryDefinition[]> {
    const bySlug = new Map(this.site.categories.map((category) => [category.slug, category]));

    const chosen =
      this.selectedSlugs.length === 0
        ? this.site.categories
        : this.selectedSlugs.map((slug) => {
            const category = bySlug.get(slug);
            if (!category) {
              throw new CatalogError(`Unknown category '${slug}' for site ${this.site.slug}`);
            }
            return category;
          });

    return chosen.map((category) => Object.freeze({ ...category }));
  }
}

function assertUnique(values: readonly string[], what: string): void {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) throw new CatalogError(`Duplicate ${what} slug '${value}'`);
    seen.add(value);
  }
}
