import { join } from "node:path";
import type { Config } from "../config/types";
import { discoverContent } from "../content/discovery";
import type { Page, Post } from "../content/types";
import { generateFeeds } from "../feeds/feeds";
import { resolveFeedSettings, type FeedSettings } from "../feeds/settings";
import { TemplateRenderer, type TemplateContext, type TemplateName } from "../render/templates";
import { SearchAssetsBuilder } from "../search/assets";
import { resolveSitemapSettings, type SitemapSettings } from "../sitemap/settings";
import { generateSitemap, type SitemapEntry } from "../sitemap/sitemap";
import { buildNavItems } from "./navigation";
import { paginate } from "./pagination";
import { outputFileForUrl } from "./paths";
import { createProgressReporter, Stage, type ProgressCallback, type ProgressReporter } from "./progress";
import { copyStaticTree } from "./static";
import { buildTagBuckets, slugifyTag, tagUrl, type TagBucket } from "./tags";

export const TAGS_URL = "/tags/";
export const LEGACY_FEED_FILE = "feed.xml";
export const STATIC_OUTPUT_DIR = "static";

export interface BuildOptions {
  onProgress?: ProgressCallback;
}

export interface BuildResult {
  posts: number;
  pages: number;
  tags: number;
  /** Files rendered from templates */
  renderedFiles: number;
  staticCopied: boolean;
}

interface FeatureSettings {
  search: SearchAssetsBuilder | null;
  sitemap: SitemapSettings | null;
  feeds: FeedSettings | null;
}

/**
 * Every feature setting is checked before anything is written
 */
function resolveFeatures(config: Config): FeatureSettings {
  return {
    search: SearchAssetsBuilder.fromConfig(config),
    sitemap: resolveSitemapSettings(config.sitemap, config.site.url),
    feeds: resolveFeedSettings(config.feeds, config.site.url),
  };
}

function newestDate(posts: Post[]): Date | null {
  return posts.reduce<Date | null>(
    (newest, post) => (newest === null || post.date > newest ? post.date : newest),
    null,
  );
}

function sortByDateDesc(posts: Post[]): Post[] {
  return [...posts].sort((a, b) => b.date.getTime() - a.date.getTime());
}

/**
 * Writes template output and keeps the running progress count
 */
class SiteWriter {
  private rendered = 0;

  constructor(
    private readonly renderer: TemplateRenderer,
    private readonly outputDir: string,
    private readonly report: ProgressReporter,
    private readonly total: number,
  ) {}

  get count(): number {
    return this.rendered;
  }

  async page(name: TemplateName, url: string, context: TemplateContext): Promise<void> {
    await this.file(name, outputFileForUrl(this.outputDir, url), context);
  }

  async file(name: TemplateName, target: string, context: TemplateContext): Promise<void> {
    await this.renderer.renderToFile(name, context, target);
    this.step(`Rendered ${name}`);
  }

  step(message: string): void {
    this.rendered++;
    this.report(Stage.RENDERING_TEMPLATES, this.rendered, this.total, message);
  }
}

/**
 * Render the whole site into config.paths.outputDir
 */
export async function buildSite(config: Config, options: BuildOptions = {}): Promise<BuildResult> {
  const report = createProgressReporter(options.onProgress);
  const { outputDir } = config.paths;
  const features = resolveFeatures(config);

  report(Stage.DISCOVERING_CONTENT, 0, 1, "Discovering content");
  const discovered = await discoverContent(config);
  const posts = sortByDateDesc(
    config.build.include_drafts ? discovered.posts : discovered.posts.filter((post) => !post.draft),
  );
  const pages: Page[] = discovered.pages;
  report(Stage.DISCOVERING_CONTENT, 1, 1, `Found ${posts.length} posts and ${pages.length} pages`);

  const tagBuckets = buildTagBuckets(posts);
  const indexPages = paginate(posts, config.build.posts_per_page);

  const renderer = new TemplateRenderer(config.paths.templatesDir);

  const searchUrl = features.search ? features.search.pageUrl : null;
  const baseContext: TemplateContext = {
    site: config.site,
    author: config.author,
    nav_items: buildNavItems(pages, searchUrl),
    search_enabled: features.search !== null,
    search_url: searchUrl,
    feed_links: {
      rss_url: features.feeds?.rssHref ?? null,
      atom_url: features.feeds?.atomHref ?? null,
    },
  };

  const total =
    indexPages.length +
    posts.length +
    pages.length +
    1 +
    tagBuckets.length +
    1 +
    (features.search ? 1 : 0);
  const writer = new SiteWriter(renderer, outputDir, report, total);
  const sitemapEntries: SitemapEntry[] = [];
  const include = {
    index: features.sitemap?.includeIndex ?? false,
    posts: features.sitemap?.includePosts ?? false,
    pages: features.sitemap?.includePages ?? false,
    tags: features.sitemap?.includeTags ?? false,
  };

  report(Stage.RENDERING_TEMPLATES, 0, total, "Rendering templates");

  for (const indexPage of indexPages) {
    await writer.page("index.html", indexPage.url, {
      ...baseContext,
      posts: indexPage.items,
      pagination: indexPage.pagination,
    });
    if (include.index) {
      sitemapEntries.push({ path: indexPage.url, lastmod: newestDate(indexPage.items) });
    }
  }

  for (const post of posts) {
    const postTags = post.tags
      .map((name) => ({ name, slug: slugifyTag(name) }))
      .filter((tag) => tag.slug !== "")
      .map((tag) => ({ name: tag.name, url: tagUrl(tag.slug) }));
    await writer.page("post.html", post.url, { ...baseContext, post, post_tags: postTags });
    if (include.posts) {
      sitemapEntries.push({ path: post.url, lastmod: post.date });
    }
  }

  for (const page of pages) {
    await writer.page("page.html", page.url, { ...baseContext, page });
    if (include.pages) {
      sitemapEntries.push({ path: page.url, lastmod: page.date });
    }
  }

  await renderTagPages(writer, baseContext, tagBuckets);
  if (include.tags) {
    sitemapEntries.push({ path: TAGS_URL, lastmod: newestDate(posts) });
    for (const bucket of tagBuckets) {
      sitemapEntries.push({ path: bucket.url, lastmod: newestDate(bucket.posts) });
    }
  }

  await writer.file("feed.xml", join(outputDir, LEGACY_FEED_FILE), {
    ...baseContext,
    posts: posts.slice(0, config.build.feed_max_items),
  });

  if (features.search) {
    await features.search.buildAssets(posts, pages, renderer, baseContext);
    writer.step("Rendered search.html");
    if (include.pages) {
      sitemapEntries.push({ path: features.search.pageUrl });
    }
  }

  report(Stage.COPYING_STATIC, 0, 1, "Copying static files");
  const staticCopied = await copyStaticTree(config.paths.staticDir, join(outputDir, STATIC_OUTPUT_DIR));
  report(Stage.COPYING_STATIC, 1, 1, staticCopied ? "Copied static files" : "No static directory");

  if (features.sitemap) {
    await generateSitemap(sitemapEntries, join(outputDir, features.sitemap.output), {
      siteUrl: features.sitemap.siteUrl,
      excludePatterns: features.sitemap.excludePatterns,
    });
  }

  if (features.feeds) {
    await generateFeeds(outputDir, {
      settings: features.feeds,
      posts,
      pages,
      site: config.site,
      author: config.author,
    });
  }

  report(Stage.DONE, 1, 1, "Build complete");

  return {
    posts: posts.length,
    pages: pages.length,
    tags: tagBuckets.length,
    renderedFiles: writer.count,
    staticCopied,
  };
}

async function renderTagPages(
  writer: SiteWriter,
  baseContext: TemplateContext,
  buckets: TagBucket[],
): Promise<void> {
  await writer.page("tags.html", TAGS_URL, {
    ...baseContext,
    tags: buckets.map((bucket) => ({
      name: bucket.name,
      slug: bucket.slug,
      url: bucket.url,
      count: bucket.posts.length,
    })),
  });

  for (const bucket of buckets) {
    await writer.page("tag.html", bucket.url, {
      ...baseContext,
      tag: { name: bucket.name, slug: bucket.slug, url: bucket.url },
      posts: bucket.posts,
    });
  }
}
