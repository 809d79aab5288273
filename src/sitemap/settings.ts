import { sanitizeRelativePath } from "../build/paths";
import type { FeatureTable } from "../config/types";
import { SitemapConfigError } from "../errors";
import { globToRegExp } from "./glob";

export const DEFAULT_SITEMAP_OUTPUT = "sitemap.xml";

export interface SitemapSettings {
  /** Relative to the output directory */
  output: string;
  /** Base URL without trailing slash */
  siteUrl: string;
  includeIndex: boolean;
  includePosts: boolean;
  includePages: boolean;
  includeTags: boolean;
  excludePatterns: string[];
}

/**
 * Trim the base URL and drop trailing slashes
 */
export function normalizeSiteUrl(raw: string): string {
  const text = raw.trim();
  if (!text) {
    throw new SitemapConfigError("site.url is required for sitemap generation");
  }
  const normalized = text.replace(/\/+$/, "");
  if (!normalized) {
    throw new SitemapConfigError("site.url must not be the root path");
  }
  if (/^[a-z][a-z0-9+.-]*:$/i.test(normalized)) {
    throw new SitemapConfigError(`site.url must include a host: ${text}`);
  }
  return normalized;
}

/**
 * Exclude patterns, trimmed, with empty entries dropped.
 * Patterns that do not compile raise SitemapConfigError.
 */
export function normalizeExcludePatterns(raw: unknown): string[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new SitemapConfigError("sitemap.exclude_paths must be a list of strings");
  }

  const patterns: string[] = [];
  for (const pattern of raw) {
    if (pattern === null || pattern === undefined) continue;
    if (typeof pattern !== "string") {
      throw new SitemapConfigError("sitemap.exclude_paths must be a list of strings");
    }
    const text = pattern.trim();
    if (text) {
      globToRegExp(text);
      patterns.push(text);
    }
  }
  return patterns;
}

/**
 * Read the [sitemap] table; null when the sitemap is disabled
 */
export function resolveSitemapSettings(
  table: FeatureTable,
  siteUrl: string,
): SitemapSettings | null {
  if (table.enabled !== true) {
    return null;
  }

  return {
    output: sanitizeRelativePath(table.output, {
      fallback: DEFAULT_SITEMAP_OUTPUT,
      label: "sitemap.output",
      createError: (message) => new SitemapConfigError(message),
    }),
    siteUrl: normalizeSiteUrl(siteUrl),
    includeIndex: Boolean(table.include_index ?? true),
    includePosts: Boolean(table.include_posts ?? true),
    includePages: Boolean(table.include_pages ?? true),
    includeTags: Boolean(table.include_tags ?? true),
    excludePatterns: normalizeExcludePatterns(table.exclude_paths),
  };
}
