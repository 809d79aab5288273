import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  pageUrlFromPath,
  relativePathToUrl,
  sanitizeRelativePath,
} from "../build/paths";
import type { Config } from "../config/types";
import { formatIsoDate } from "../content/dates";
import type { Page, Post } from "../content/types";
import { SearchConfigError } from "../errors";
import type { TemplateContext, TemplateRenderer } from "../render/templates";
import { collapseWhitespace, htmlToText } from "../render/text";
import { getSearchClientScript } from "./client";
import {
  SEARCH_INDEX_VERSION,
  resolveSearchSettings,
  type SearchSettings,
} from "./settings";
import {
  buildTermsIndex,
  collectTokenWeights,
  serializeTermsIndex,
  type DocumentRecord,
  type SearchDocument,
} from "./terms";

export const DEFAULT_SEARCH_OUTPUT_DIR = "assets/search";
export const DEFAULT_SEARCH_PAGE_PATH = "search/index.html";
export const EXCERPT_LENGTH = 200;

export const SEARCH_DOCS_FILE = "search_docs.json";
export const SEARCH_TERMS_FILE = "search_terms.json";
export const SEARCH_BUNDLE_FILE = "search.js";

export interface SearchDocsPayload {
  version: number;
  generated_at: string;
  doc_count: number;
  docs: SearchDocument[];
}

/**
 * Collapse whitespace and cut to `limit` characters, ending in "..."
 */
export function normalizeExcerpt(text: string, limit: number): string {
  const cleaned = collapseWhitespace(text);
  if (cleaned.length <= limit) {
    return cleaned;
  }
  const trimmed = cleaned.slice(0, limit).trimEnd();
  return trimmed.endsWith("...") ? trimmed : `${trimmed}...`;
}

function generatedAt(now: Date): string {
  return now.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function comparePages(a: Page, b: Page): number {
  if (a.slug !== b.slug) return a.slug < b.slug ? -1 : 1;
  const aTitle = a.title.toLowerCase();
  const bTitle = b.title.toLowerCase();
  return aTitle < bTitle ? -1 : aTitle > bTitle ? 1 : 0;
}

/**
 * Writes the search index files and the search page.
 * Only constructed when search is enabled.
 */
export class SearchAssetsBuilder {
  readonly outputSubpath: string;
  readonly pageSubpath: string;
  readonly assetsBaseUrl: string;
  readonly pageUrl: string;
  readonly settings: SearchSettings;
  private outputDir: string;

  constructor(config: Config) {
    const table = config.search;
    if (table.enabled !== true) {
      throw new SearchConfigError("SearchAssetsBuilder requires search.enabled = true");
    }

    this.outputSubpath = sanitizeRelativePath(table.output_dir, {
      fallback: DEFAULT_SEARCH_OUTPUT_DIR,
      label: "search.output_dir",
      createError: (message) => new SearchConfigError(message),
    });
    this.pageSubpath = sanitizeRelativePath(table.page_path, {
      fallback: DEFAULT_SEARCH_PAGE_PATH,
      label: "search.page_path",
      createError: (message) => new SearchConfigError(message),
    });
    this.assetsBaseUrl = relativePathToUrl(this.outputSubpath);
    this.pageUrl = pageUrlFromPath(this.pageSubpath);
    this.settings = resolveSearchSettings(table);
    this.outputDir = config.paths.outputDir;
  }

  /**
   * Build from config when search is enabled, otherwise null
   */
  static fromConfig(config: Config): SearchAssetsBuilder | null {
    return config.search.enabled === true ? new SearchAssetsBuilder(config) : null;
  }

  async buildAssets(
    posts: Post[],
    pages: Page[],
    renderer: TemplateRenderer,
    baseContext: TemplateContext,
    now: Date = new Date(),
  ): Promise<void> {
    const assetsDir = join(this.outputDir, this.outputSubpath);
    await mkdir(assetsDir, { recursive: true });

    const records = this.collectDocuments(posts, pages);
    const docsPayload: SearchDocsPayload = {
      version: SEARCH_INDEX_VERSION,
      generated_at: generatedAt(now),
      doc_count: records.length,
      docs: records.map((record) => record.document),
    };
    const terms = buildTermsIndex(records, this.settings);

    await writeFile(join(assetsDir, SEARCH_DOCS_FILE), JSON.stringify(docsPayload), "utf-8");
    await writeFile(join(assetsDir, SEARCH_TERMS_FILE), serializeTermsIndex(terms), "utf-8");
    await writeFile(join(assetsDir, SEARCH_BUNDLE_FILE), getSearchClientScript(), "utf-8");

    await renderer.renderToFile(
      "search.html",
      {
        ...baseContext,
        search_assets_base: this.assetsBaseUrl,
        search_bundle_path: `${this.assetsBaseUrl}/${SEARCH_BUNDLE_FILE}`,
        search_min_token_len: this.settings.minTokenLen,
      },
      join(this.outputDir, this.pageSubpath),
    );
  }

  /**
   * Posts in the order given, then pages by (slug, title), numbered from 0
   */
  collectDocuments(posts: Post[], pages: Page[]): DocumentRecord[] {
    const records: DocumentRecord[] = [];

    for (const post of posts) {
      const bodyText = htmlToText(post.contentHtml);
      const { weights, bodyTokenCount } = collectTokenWeights(
        post.title,
        post.tags,
        bodyText,
        this.settings,
      );
      records.push({
        document: {
          id: records.length,
          url: post.url,
          title: post.title,
          tags: post.tags,
          date: formatIsoDate(post.date),
          excerpt: normalizeExcerpt(htmlToText(post.summary || bodyText), EXCERPT_LENGTH),
        },
        tokenWeights: weights,
        bodyTokenCount,
      });
    }

    for (const page of [...pages].sort(comparePages)) {
      const bodyText = htmlToText(page.contentHtml);
      const { weights, bodyTokenCount } = collectTokenWeights(page.title, [], bodyText, this.settings);
      records.push({
        document: {
          id: records.length,
          url: page.url,
          title: page.title,
          tags: [],
          date: null,
          excerpt: normalizeExcerpt(bodyText, EXCERPT_LENGTH),
        },
        tokenWeights: weights,
        bodyTokenCount,
      });
    }

    return records;
  }
}
