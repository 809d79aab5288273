import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { AuthorSection, SiteSection } from "../config/types";
import type { Page, Post } from "../content/types";
import { escapeXml, stripHtml, truncate } from "../render/text";
import type { FeedSettings } from "./settings";

export const ATOM_NAMESPACE = "http://www.w3.org/2005/Atom";
const DEFAULT_TITLE = "Pressmark Site";
const EPOCH = new Date(0);

export interface FeedEntry {
  title: string;
  /** Absolute */
  url: string;
  guid: string;
  summary: string | null;
  published: Date;
  updated: Date | null;
}

export interface FeedSources {
  settings: FeedSettings;
  posts: Post[];
  pages: Page[];
  site: SiteSection;
  author: AuthorSection;
}

/** Fri, 05 Jan 2024 00:00:00 GMT */
export function formatRfc2822(date: Date): string {
  return date.toUTCString();
}

/** 2024-01-05T00:00:00Z */
export function formatRfc3339(date: Date): string {
  return date.toISOString().replace(/\.000Z$/, "Z");
}

function postSummary(post: Post, settings: FeedSettings): string | null {
  const summary =
    settings.summaryMode === "excerpt"
      ? post.summary.trim()
      : stripHtml(post.contentHtml) || post.summary.trim();
  return summary ? truncate(summary, settings.summaryMaxChars) : null;
}

function pageSummary(page: Page, settings: FeedSettings): string | null {
  return page.contentHtml ? truncate(stripHtml(page.contentHtml), settings.summaryMaxChars) : null;
}

function compareEntries(a: FeedEntry, b: FeedEntry): number {
  const byDate = b.published.getTime() - a.published.getTime();
  if (byDate !== 0) return byDate;
  return a.url < b.url ? 1 : a.url > b.url ? -1 : 0;
}

/**
 * Posts (and dated pages when enabled), newest first, cut to maxItems
 */
export function collectFeedEntries(
  settings: FeedSettings,
  posts: Post[],
  pages: Page[],
): FeedEntry[] {
  const entries: FeedEntry[] = [];
  const absolute = (url: string) => `${settings.siteUrl}${url}`;

  if (settings.includePosts) {
    for (const post of posts) {
      if (post.draft && !settings.includeDrafts) continue;
      if (settings.includeTags.size > 0 && !post.tags.some((tag) => settings.includeTags.has(tag))) {
        continue;
      }
      const url = absolute(post.url);
      entries.push({
        title: post.title,
        url,
        guid: url,
        summary: postSummary(post, settings),
        published: post.date,
        updated: post.date,
      });
    }
  }

  if (settings.includePages) {
    for (const page of pages) {
      if (!page.date) continue;
      const url = absolute(page.url);
      entries.push({
        title: page.title,
        url,
        guid: url,
        summary: pageSummary(page, settings),
        published: page.date,
        updated: page.date,
      });
    }
  }

  entries.sort(compareEntries);
  return entries.slice(0, settings.maxItems);
}

function siteTitle(site: SiteSection): string {
  return site.title || DEFAULT_TITLE;
}

export function renderRss(
  entries: FeedEntry[],
  settings: FeedSettings,
  site: SiteSection,
  author: AuthorSection,
): string {
  const title = siteTitle(site);
  const lines = [
    `<?xml version="1.0" encoding="utf-8"?>`,
    `<rss version="2.0">`,
    `  <channel>`,
    `    <title>${escapeXml(title)}</title>`,
    `    <description>${escapeXml(site.subtitle || title)}</description>`,
    `    <link>${escapeXml(settings.siteUrl)}</link>`,
    `    <language>${escapeXml(site.language || "en")}</language>`,
  ];

  if (author.email) {
    const editor = `${author.email} (${author.name || title})`;
    lines.push(`    <managingEditor>${escapeXml(editor)}</managingEditor>`);
  }

  for (const entry of entries) {
    lines.push(
      `    <item>`,
      `      <title>${escapeXml(entry.title)}</title>`,
      `      <link>${escapeXml(entry.url)}</link>`,
      `      <guid>${escapeXml(entry.guid)}</guid>`,
      `      <pubDate>${formatRfc2822(entry.published)}</pubDate>`,
    );
    if (entry.summary) {
      lines.push(`      <description>${escapeXml(entry.summary)}</description>`);
    }
    lines.push(`    </item>`);
  }

  lines.push(`  </channel>`, `</rss>`);
  return `${lines.join("\n")}\n`;
}

export function renderAtom(
  entries: FeedEntry[],
  settings: FeedSettings,
  site: SiteSection,
  author: AuthorSection,
): string {
  const title = siteTitle(site);
  const newest = entries[0];
  const updated = newest ? (newest.updated ?? newest.published) : EPOCH;

  const lines = [
    `<?xml version="1.0" encoding="utf-8"?>`,
    `<feed xmlns="${ATOM_NAMESPACE}" xml:lang="${escapeXml(site.language || "en")}">`,
    `  <title>${escapeXml(title)}</title>`,
    `  <subtitle>${escapeXml(site.subtitle || title)}</subtitle>`,
    `  <id>${escapeXml(settings.siteUrl)}</id>`,
    `  <updated>${formatRfc3339(updated)}</updated>`,
    `  <link rel="alternate" href="${escapeXml(settings.siteUrl)}" />`,
  ];

  if (settings.atomHref) {
    lines.push(`  <link rel="self" href="${escapeXml(`${settings.siteUrl}${settings.atomHref}`)}" />`);
  }

  if (author.name) {
    lines.push(`  <author>`, `    <name>${escapeXml(author.name)}</name>`);
    if (author.email) {
      lines.push(`    <email>${escapeXml(author.email)}</email>`);
    }
    lines.push(`  </author>`);
  }

  for (const entry of entries) {
    lines.push(
      `  <entry>`,
      `    <title>${escapeXml(entry.title)}</title>`,
      `    <id>${escapeXml(entry.guid)}</id>`,
      `    <link href="${escapeXml(entry.url)}" />`,
      `    <published>${formatRfc3339(entry.published)}</published>`,
      `    <updated>${formatRfc3339(entry.updated ?? entry.published)}</updated>`,
    );
    if (entry.summary) {
      lines.push(`    <summary type="html">${escapeXml(entry.summary)}</summary>`);
    }
    lines.push(`  </entry>`);
  }

  lines.push(`</feed>`);
  return `${lines.join("\n")}\n`;
}

async function writeFeed(target: string, xml: string): Promise<void> {
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, xml, "utf-8");
}

/**
 * Write rss.xml and/or atom.xml into `outputDir`
 */
export async function generateFeeds(outputDir: string, sources: FeedSources): Promise<FeedEntry[]> {
  const { settings, posts, pages, site, author } = sources;
  const entries = collectFeedEntries(settings, posts, pages);

  if (settings.rssOutput !== null) {
    await writeFeed(join(outputDir, settings.rssOutput), renderRss(entries, settings, site, author));
  }
  if (settings.atomOutput !== null) {
    await writeFeed(join(outputDir, settings.atomOutput), renderAtom(entries, settings, site, author));
  }

  return entries;
}
