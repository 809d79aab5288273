import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { parseIsoDate } from "../content/dates";
import { SitemapConfigError } from "../errors";
import { globToRegExp, matchesGlob } from "./glob";
import { normalizeSiteUrl, resolveSitemapSettings } from "./settings";
import {
  deduplicateEntries,
  generateSitemap,
  isExcluded,
  normalizeSitemapPath,
  renderSitemapXml,
} from "./sitemap";

describe("matchesGlob", () => {
  it("lets * cross slashes", () => {
    expect(matchesGlob("tags/rust/", "tags/*")).toBe(true);
    expect(matchesGlob("posts/a/", "tags/*")).toBe(false);
  });

  it("supports ? and bracket classes", () => {
    expect(matchesGlob("page/2/", "page/?/")).toBe(true);
    expect(matchesGlob("page/2/", "page/[0-9]/")).toBe(true);
    expect(matchesGlob("page/2/", "page/[!0-9]/")).toBe(false);
  });

  it("treats regex characters literally", () => {
    expect(matchesGlob("a.b", "a.b")).toBe(true);
    expect(matchesGlob("axb", "a.b")).toBe(false);
    expect(globToRegExp("[unclosed").test("[unclosed")).toBe(true);
  });

  it("raises SitemapConfigError for classes that do not compile", () => {
    expect(() => globToRegExp("page/[z-a]/")).toThrow(SitemapConfigError);
    expect(() => globToRegExp("page/[z-a]/")).toThrow("Invalid sitemap exclude pattern: page/[z-a]/");
  });
});

describe("normalizeSiteUrl", () => {
  it("trims whitespace and trailing slashes", () => {
    expect(normalizeSiteUrl("  https://example.test/// ")).toBe("https://example.test");
  });

  it("rejects empty, root-only and scheme-only values", () => {
    expect(() => normalizeSiteUrl("  ")).toThrow(SitemapConfigError);
    expect(() => normalizeSiteUrl("/")).toThrow("site.url must not be the root path");
    expect(() => normalizeSiteUrl("https://")).toThrow(SitemapConfigError);
  });
});

describe("resolveSitemapSettings", () => {
  it("returns null when disabled", () => {
    expect(resolveSitemapSettings({ enabled: false }, "")).toBeNull();
  });

  it("validates output and exclude patterns", () => {
    expect(resolveSitemapSettings({ enabled: true, exclude_paths: [" tags/* ", ""] }, "https://example.test"))
      .toEqual({
        output: "sitemap.xml",
        siteUrl: "https://example.test",
        includeIndex: true,
        includePosts: true,
        includePages: true,
        includeTags: true,
        excludePatterns: ["tags/*"],
      });
    expect(() => resolveSitemapSettings({ enabled: true, exclude_paths: [1] }, "https://example.test"))
      .toThrow("sitemap.exclude_paths must be a list of strings");
    expect(() => resolveSitemapSettings({ enabled: true, output: "/sitemap.xml" }, "https://example.test"))
      .toThrow(SitemapConfigError);
    expect(() => resolveSitemapSettings({ enabled: true, exclude_paths: ["[z-a]"] }, "https://example.test"))
      .toThrow("Invalid sitemap exclude pattern: [z-a]");
  });
});

describe("sitemap entries", () => {
  it("normalizes paths", () => {
    expect(normalizeSitemapPath("posts\\a//b/")).toBe("/posts/a/b/");
    expect(normalizeSitemapPath("")).toBe("/");
    expect(normalizeSitemapPath("///x")).toBe("/x");
  });

  it("keeps the first entry unless a later one adds lastmod", () => {
    const date = new Date("2024-01-01T00:00:00Z");
    expect(
      deduplicateEntries([
        { path: "/a/" },
        { path: "a/", lastmod: date },
        { path: "/a/", lastmod: new Date("2025-01-01T00:00:00Z") },
      ]),
    ).toEqual([{ path: "/a/", lastmod: date }]);
  });

  it("matches exclusions without the leading slash", () => {
    expect(isExcluded("/tags/web/", ["/tags/*"])).toBe(true);
    expect(isExcluded("/about/", ["tags/*"])).toBe(false);
  });
});

describe("renderSitemapXml", () => {
  it("writes sorted absolute URLs with optional lastmod", () => {
    const xml = renderSitemapXml(
      [
        { path: "/posts/b/", lastmod: new Date("2024-01-05T10:00:00Z") },
        { path: "/" },
        { path: "/tags/web/" },
        { path: "/about/" },
      ],
      { siteUrl: "https://example.test/", excludePatterns: ["tags/*"] },
    );

    expect(xml).toBe(
      [
        '<?xml version="1.0" encoding="utf-8"?>',
        '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
        "  <url>",
        "    <loc>https://example.test/</loc>",
        "  </url>",
        "  <url>",
        "    <loc>https://example.test/about/</loc>",
        "  </url>",
        "  <url>",
        "    <loc>https://example.test/posts/b/</loc>",
        "    <lastmod>2024-01-05</lastmod>",
        "  </url>",
        "</urlset>",
        "",
      ].join("\n"),
    );
  });

  it("escapes URLs", () => {
    expect(renderSitemapXml([{ path: "/a&b/" }], { siteUrl: "https://example.test" })).toContain(
      "<loc>https://example.test/a&amp;b/</loc>",
    );
  });

  it("writes lastmod as the calendar day of the date's own offset", () => {
    const lastmod = parseIsoDate("2025-01-02T01:00:00+05:00");
    expect(renderSitemapXml([{ path: "/posts/late/", lastmod }], { siteUrl: "https://example.test" })).toContain(
      "<lastmod>2025-01-02</lastmod>",
    );
  });
});

describe("generateSitemap", () => {
  it("creates parent directories", async () => {
    const dir = await mkdtemp(join(tmpdir(), "pressmark-sitemap-"));
    try {
      const target = join(dir, "nested", "sitemap.xml");
      await generateSitemap([{ path: "/" }], target, { siteUrl: "https://example.test" });
      expect(await readFile(target, "utf-8")).toContain("<loc>https://example.test/</loc>");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
