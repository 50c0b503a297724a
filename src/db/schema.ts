import {
  pgSchema,
  uuid,
  text,
  integer,
  timestamp,
  jsonb,
  index,
} from "drizzle-orm/pg-core";
import type { NormalizedRunOptions } from "../lib/options.js";
import type { SourceKind, SourceReport } from "../lib/types.js";

export const discoverySchema = pgSchema("discovery");

export type RunStatus = "pending" | "running" | "completed" | "cancelled" | "failed";

export interface RunReport {
  emitted: number;
  persistedSnapshot: number;
  hasFetchFailures: boolean;
  sources: SourceReport[];
}

export const runs = discoverySchema.table("runs", {
  id: uuid("id").primaryKey().defaultRandom(),
  site: text("site").notNull(),
  status: text("status").$type<RunStatus>().notNull().default("pending"),
  options: jsonb("options").$type<NormalizedRunOptions>().notNull(),
  report: jsonb("report").$type<RunReport>(),
  error: text("error"),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
  completedAt: timestamp("completed_at", { withTimezone: true }),
});

export const discoveredUrls = discoverySchema.table(
  "discovered_urls",
  {
    url: text("url").primaryKey(),
    site: text("site").notNull(),
    originCategory: text("origin_category"),
    sourceKind: text("source_kind").$type<SourceKind>().notNull(),
    lastModified: timestamp("last_modified", { withTimezone: true }),
    sitemapUrl: text("sitemap_url"),
    imageUrl: text("image_url"),
    discoveryOrder: integer("discovery_order").notNull(),
    runId: uuid("run_id")
      .notNull()
      .references(() => runs.id),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    siteIdx: index("discovered_urls_site_idx").on(table.site),
  })
);

export type Run = typeof runs.$inferSelect;
export type NewRun = typeof runs.$inferInsert;
export type DiscoveredUrl = typeof discoveredUrls.$inferSelect;
export type NewDiscoveredUrl = typeof discoveredUrls.$inferInsert;
