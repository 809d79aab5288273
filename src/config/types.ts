import { z } from "zod";

const featureTable = z.record(z.string(), z.unknown());

/**
 * Shape of site.toml after it has been merged over the defaults.
 * Table keys keep their site.toml spelling so templates see the same names.
 */
export const configSchema = z.object({
  site: z
    .object({
      title: z.string(),
      subtitle: z.string(),
      base_url: z.string(),
      url: z.string(),
      language: z.string(),
      timezone: z.string(),
    })
    .passthrough(),
  paths: z.object({
    content_dir: z.string().min(1),
    posts_dir: z.string().min(1),
    pages_dir: z.string().min(1),
    templates_dir: z.string().min(1),
    static_dir: z.string().min(1),
    output_dir: z.string().min(1),
  }),
  build: z.object({
    posts_per_page: z.number().int().positive(),
    include_drafts: z.boolean(),
    feed_max_items: z.number().int().positive(),
  }),
  author: z
    .object({
      name: z.string(),
      email: z.string(),
    })
    .passthrough(),
  search: featureTable,
  sitemap: featureTable,
  feeds: featureTable,
});

export type RawConfig = z.infer<typeof configSchema>;

export type SiteSection = RawConfig["site"];
export type BuildSection = RawConfig["build"];
export type AuthorSection = RawConfig["author"];
export type FeatureTable = z.infer<typeof featureTable>;

export interface SitePaths {
  siteRoot: string;
  contentDir: string;
  postsDir: string;
  pagesDir: string;
  templatesDir: string;
  staticDir: string;
  outputDir: string;
}

export interface Config {
  site: SiteSection;
  build: BuildSection;
  author: AuthorSection;
  paths: SitePaths;
  /** Raw [search] table, resolved by the search builder */
  search: FeatureTable;
  /** Raw [sitemap] table */
  sitemap: FeatureTable;
  /** Raw [feeds] table, including [feeds.summary] */
  feeds: FeatureTable;
}
