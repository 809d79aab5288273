import { readdir } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import type { Config } from "../config/types";
import { ContentError } from "../errors";
import { renderMarkdown } from "../render/markdown";
import { parseIsoDate } from "./dates";
import { readFrontMatter } from "./frontmatter";
import type { DiscoveredContent, Frontmatter, Page, Post } from "./types";

export const SUMMARY_LENGTH = 200;
export const DEFAULT_NAV_ORDER = 1000;

/**
 * Markdown files directly inside `dir`, in filename order
 */
async function listMarkdownFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === ".md")
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}

/**
 * Normalize the `tags` front matter value into a list of strings
 */
export function normalizeTags(raw: unknown, sourcePath: string): string[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (typeof raw === "string") {
    return [raw];
  }
  if (Array.isArray(raw)) {
    return raw.map((tag) => String(tag));
  }
  throw new ContentError(
    `Invalid 'tags' value in front matter for ${sourcePath}: ${JSON.stringify(raw)}`,
    sourcePath,
  );
}

function requireTitle(data: Frontmatter, kind: "post" | "page", sourcePath: string): string {
  const title = data.title;
  if (title === undefined || title === null || title === "" || title === false) {
    throw new ContentError(`Missing required 'title' in ${kind} front matter: ${sourcePath}`, sourcePath);
  }
  return String(title);
}

function parseDateField(raw: unknown, kind: "post" | "page", sourcePath: string): Date {
  const date = parseIsoDate(raw);
  if (!date) {
    throw new ContentError(
      `Invalid 'date' value in ${kind} front matter for ${sourcePath}: ${JSON.stringify(raw)}`,
      sourcePath,
    );
  }
  return date;
}

function slugFor(data: Frontmatter, filePath: string): string {
  const slug = data.slug;
  if (slug === undefined || slug === null || slug === "") {
    return basename(filePath, extname(filePath));
  }
  return String(slug);
}

function optionalString(value: unknown): string | null {
  return value === undefined || value === null ? null : String(value);
}

/**
 * Integer nav order; anything unparsable falls back to the default
 */
export function parseNavOrder(raw: unknown): number {
  if (typeof raw === "number" && Number.isInteger(raw)) {
    return raw;
  }
  if (typeof raw === "string" && /^\s*[+-]?\d+\s*$/.test(raw)) {
    return parseInt(raw, 10);
  }
  return DEFAULT_NAV_ORDER;
}

async function loadPost(filePath: string): Promise<Post> {
  const { data, body } = await readFrontMatter(filePath);
  const contentHtml = await renderMarkdown(body);

  const title = requireTitle(data, "post", filePath);
  if (data.date === undefined || data.date === null || data.date === "") {
    throw new ContentError(`Missing required 'date' in post front matter: ${filePath}`, filePath);
  }
  const date = parseDateField(data.date, "post", filePath);
  const slug = slugFor(data, filePath);

  const summary =
    data.summary === undefined || data.summary === null
      ? Array.from(body).slice(0, SUMMARY_LENGTH).join("").trim()
      : String(data.summary);

  return {
    title,
    date,
    slug,
    tags: normalizeTags(data.tags, filePath),
    draft: Boolean(data.draft ?? false),
    summary,
    coverImage: optionalString(data.cover_image),
    coverAlt: optionalString(data.cover_alt),
    contentHtml,
    sourcePath: filePath,
    url: `/posts/${slug}/`,
  };
}

async function loadPage(filePath: string): Promise<Page> {
  const { data, body } = await readFrontMatter(filePath);
  const contentHtml = await renderMarkdown(body);

  const title = requireTitle(data, "page", filePath);
  const slug = slugFor(data, filePath);
  const date =
    data.date === undefined || data.date === null || data.date === ""
      ? null
      : parseDateField(data.date, "page", filePath);

  return {
    title,
    slug,
    contentHtml,
    sourcePath: filePath,
    url: `/${slug}/`,
    date,
    showInNav: Boolean(data.show_in_nav ?? false),
    navTitle: optionalString(data.nav_title),
    navOrder: parseNavOrder(data.nav_order),
  };
}

/**
 * Read every post and page of the site. No sorting or filtering happens here.
 */
export async function discoverContent(config: Config): Promise<DiscoveredContent> {
  const posts: Post[] = [];
  const pages: Page[] = [];

  for (const filePath of await listMarkdownFiles(config.paths.postsDir)) {
    posts.push(await loadPost(filePath));
  }

  for (const filePath of await listMarkdownFiles(config.paths.pagesDir)) {
    pages.push(await loadPage(filePath));
  }

  return { posts, pages };
}
