import { load } from "cheerio";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

/**
 * Escape text for XML element content and attribute values
 */
export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Decode every HTML entity, named or numeric. Unknown references stay as written.
 */
export function decodeEntities(value: string): string {
  return load(value, null, false).text();
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Replace every tag with a space and collapse whitespace.
 * Entities are left as they are.
 */
export function htmlToText(html: string): string {
  return collapseWhitespace(html.replace(/<[^>]+>/g, " "));
}

/**
 * Remove tags, decode entities and collapse whitespace
 */
export function stripHtml(html: string): string {
  return collapseWhitespace(decodeEntities(html.replace(/<[^>]+>/g, "")));
}

/**
 * Cut to `maxChars` characters including a trailing "..."
 */
export function truncate(value: string, maxChars: number): string {
  if (value.length <= maxChars) {
    return value;
  }
  return `${value.slice(0, Math.max(0, maxChars - 3)).trimEnd()}...`;
}
