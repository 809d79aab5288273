import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { formatIsoDate } from "../content/dates";
import { escapeXml } from "../render/text";
import { matchesGlob } from "./glob";
import { normalizeExcludePatterns, normalizeSiteUrl } from "./settings";

export const SITEMAP_NAMESPACE = "http://www.sitemaps.org/schemas/sitemap/0.9";

export interface SitemapEntry {
  /** Site-relative path such as "/posts/hello/" */
  path: string;
  lastmod?: Date | null;
}

export interface SitemapOptions {
  /** Absolute base URL, e.g. "https://example.com" */
  siteUrl: string;
  excludePatterns?: string[];
}

/** "posts\\a//b" -> "/posts/a/b" */
export function normalizeSitemapPath(raw: string): string {
  const path = raw.trim().replace(/\\/g, "/");
  if (!path) {
    return "/";
  }
  return `/${path.replace(/^\/+/, "")}`.replace(/\/{2,}/g, "/");
}

/**
 * One entry per path; a later duplicate only replaces an entry without lastmod
 */
export function deduplicateEntries(entries: Iterable<SitemapEntry>): SitemapEntry[] {
  const byPath = new Map<string, SitemapEntry>();
  for (const entry of entries) {
    const path = normalizeSitemapPath(entry.path);
    const lastmod = entry.lastmod ?? null;
    const existing = byPath.get(path);
    if (!existing || (!existing.lastmod && lastmod)) {
      byPath.set(path, { path, lastmod });
    }
  }
  return [...byPath.values()];
}

export function isExcluded(path: string, patterns: string[]): boolean {
  const relative = path.replace(/^\/+/, "");
  return patterns.some((pattern) => matchesGlob(relative, pattern.replace(/^\/+/, "")));
}

function absoluteUrl(base: string, path: string): string {
  return path === "/" ? `${base}/` : `${base}${path}`;
}

/**
 * Render a sitemaps.org urlset, sorted by absolute URL
 */
export function renderSitemapXml(entries: Iterable<SitemapEntry>, options: SitemapOptions): string {
  const base = normalizeSiteUrl(options.siteUrl);
  const patterns = normalizeExcludePatterns(options.excludePatterns);

  const urls = deduplicateEntries(entries)
    .filter((entry) => !isExcluded(entry.path, patterns))
    .map((entry) => ({
      loc: absoluteUrl(base, entry.path),
      lastmod: entry.lastmod ? formatIsoDate(entry.lastmod) : null,
    }))
    .sort((a, b) => (a.loc < b.loc ? -1 : a.loc > b.loc ? 1 : 0));

  const body = urls
    .map(
      (url) =>
        `  <url>\n    <loc>${escapeXml(url.loc)}</loc>${
          url.lastmod ? `\n    <lastmod>${url.lastmod}</lastmod>` : ""
        }\n  </url>\n`,
    )
    .join("");

  return `<?xml version="1.0" encoding="utf-8"?>\n<urlset xmlns="${SITEMAP_NAMESPACE}">\n${body}</urlset>\n`;
}

export async function generateSitemap(
  entries: Iterable<SitemapEntry>,
  outputPath: string,
  options: SitemapOptions,
): Promise<void> {
  const xml = renderSitemapXml(entries, options);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, xml, "utf-8");
}
