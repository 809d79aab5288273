import { relativePathToUrl, sanitizeRelativePath } from "../build/paths";
import { isTable } from "../config/merge";
import type { FeatureTable } from "../config/types";
import { FeedConfigError } from "../errors";

export const DEFAULT_RSS_OUTPUT = "rss.xml";
export const DEFAULT_ATOM_OUTPUT = "atom.xml";

const SUMMARY_MODES = ["excerpt", "text"] as const;

export type SummaryMode = (typeof SUMMARY_MODES)[number];

function isSummaryMode(value: string): value is SummaryMode {
  return SUMMARY_MODES.some((mode) => mode === value);
}

export interface FeedSettings {
  /** Output-relative file paths, null when that format is disabled */
  rssOutput: string | null;
  atomOutput: string | null;
  /** Site-relative links such as "/rss.xml" */
  rssHref: string | null;
  atomHref: string | null;
  maxItems: number;
  includePosts: boolean;
  includePages: boolean;
  includeDrafts: boolean;
  /** Empty means every tag */
  includeTags: Set<string>;
  summaryMode: SummaryMode;
  summaryMaxChars: number;
  /** Base URL without trailing slash */
  siteUrl: string;
}

function positiveInteger(raw: unknown, label: string): number {
  let value: number;
  if (typeof raw === "number" && Number.isFinite(raw)) {
    value = Math.trunc(raw);
  } else if (typeof raw === "string" && /^\s*[+-]?\d+\s*$/.test(raw)) {
    value = parseInt(raw, 10);
  } else {
    throw new FeedConfigError(`${label} must be an integer`);
  }
  if (value <= 0) {
    throw new FeedConfigError(`${label} must be greater than zero`);
  }
  return value;
}

function outputPath(raw: unknown, fallback: string, label: string): string {
  return sanitizeRelativePath(raw, {
    fallback,
    label,
    createError: (message) => new FeedConfigError(message),
  });
}

/**
 * Validate the [feeds] table; null when feeds are disabled
 */
export function resolveFeedSettings(table: FeatureTable, siteUrl: string): FeedSettings | null {
  if (!table.enabled) {
    return null;
  }

  const baseUrl = siteUrl.trim().replace(/\/+$/, "");
  if (!baseUrl) {
    throw new FeedConfigError("feeds.enabled = true requires site.url to be set");
  }

  const rssEnabled = Boolean(table.rss_enabled ?? true);
  const atomEnabled = Boolean(table.atom_enabled ?? true);
  if (!rssEnabled && !atomEnabled) {
    throw new FeedConfigError(
      "At least one of feeds.rss_enabled or feeds.atom_enabled must be true",
    );
  }

  const rssOutput = rssEnabled ? outputPath(table.rss_output, DEFAULT_RSS_OUTPUT, "feeds.rss_output") : null;
  const atomOutput = atomEnabled
    ? outputPath(table.atom_output, DEFAULT_ATOM_OUTPUT, "feeds.atom_output")
    : null;

  const rawTags = table.include_tags ?? [];
  if (!Array.isArray(rawTags)) {
    throw new FeedConfigError("feeds.include_tags must be a list of strings");
  }

  const summary = table.summary ?? {};
  if (!isTable(summary)) {
    throw new FeedConfigError("feeds.summary must be a table");
  }
  const summaryMode = String(summary.mode ?? "excerpt").trim().toLowerCase();
  if (!isSummaryMode(summaryMode)) {
    throw new FeedConfigError("feeds.summary.mode must be 'excerpt' or 'text'");
  }

  return {
    rssOutput,
    atomOutput,
    rssHref: rssOutput === null ? null : relativePathToUrl(rssOutput),
    atomHref: atomOutput === null ? null : relativePathToUrl(atomOutput),
    maxItems: positiveInteger(table.max_items ?? 20, "feeds.max_items"),
    includePosts: Boolean(table.include_posts ?? true),
    includePages: Boolean(table.include_pages ?? false),
    includeDrafts: Boolean(table.include_drafts ?? false),
    includeTags: new Set(rawTags.map((tag) => String(tag))),
    summaryMode,
    summaryMaxChars: positiveInteger(summary.max_chars ?? 240, "feeds.summary.max_chars"),
    siteUrl: baseUrl,
  };
}
