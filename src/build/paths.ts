import { join } from "node:path";
import type { FeatureConfigError } from "../errors";

export interface RelativePathOptions {
  /** Used when the value is missing or empty */
  fallback: string;
  /** Config key named in error messages, e.g. "search.output_dir" */
  label: string;
  createError: (message: string) => FeatureConfigError;
}

/**
 * Normalize a configured output path so it stays inside the output directory.
 * Returns a forward-slash relative path such as "assets/search".
 */
export function sanitizeRelativePath(raw: unknown, options: RelativePathOptions): string {
  const { fallback, label, createError } = options;

  if (raw === undefined || raw === null) {
    return fallback;
  }
  if (typeof raw !== "string") {
    throw createError(`${label} must be a string`);
  }

  const text = raw.trim().replace(/\\/g, "/");
  if (!text) {
    return fallback;
  }
  if (text.startsWith("/") || /^[a-z]:\//i.test(text)) {
    throw createError(`${label} must be relative to the output directory`);
  }

  const segments = text.split("/").filter((segment) => segment !== "" && segment !== ".");
  if (segments.includes("..")) {
    throw createError(`${label} cannot traverse outside the output directory`);
  }

  return segments.length > 0 ? segments.join("/") : fallback;
}

/** "assets/search" -> "/assets/search" */
export function relativePathToUrl(relativePath: string): string {
  return `/${relativePath}`;
}

/** "search/index.html" -> "/search/" */
export function pageUrlFromPath(relativePath: string): string {
  const url = relativePathToUrl(relativePath);
  return url.endsWith("/index.html") ? url.slice(0, -"index.html".length) : url;
}

/**
 * File that serves a directory-style URL: "/page/2/" -> <outputDir>/page/2/index.html
 */
export function outputFileForUrl(outputDir: string, url: string): string {
  return join(outputDir, ...url.split("/").filter(Boolean), "index.html");
}
