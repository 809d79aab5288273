import { rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  ConfigFileNotFoundError,
  ConfigParseError,
  ConfigValidationError,
  MissingDirectoryError,
  SiteRootNotFoundError,
} from "../errors";
import { createSiteFixture, type SiteFixture } from "../test/site-fixture";
import { loadConfig } from "./load";

describe("loadConfig", () => {
  let site: SiteFixture | undefined;

  afterEach(async () => {
    await site?.cleanup();
    site = undefined;
  });

  it("merges site.toml over the defaults and resolves paths", async () => {
    site = await createSiteFixture({
      config: `[site]
title = "Notebook"

[build]
posts_per_page = 3
`,
    });

    const config = await loadConfig(site.root);

    expect(config.site.title).toBe("Notebook");
    expect(config.site.language).toBe("en");
    expect(config.build).toEqual({ posts_per_page: 3, include_drafts: false, feed_max_items: 20 });
    expect(config.paths.postsDir).toBe(join(site.root, "content", "posts"));
    expect(config.paths.outputDir).toBe(join(site.root, "output"));
    expect(config.search.enabled).toBe(false);
    expect(config.feeds.summary).toEqual({ mode: "excerpt", max_chars: 240 });
  });

  it("keeps extra keys in the site and author tables", async () => {
    site = await createSiteFixture({
      config: `[site]
title = "Extras"
tagline = "kept"

[author]
name = "Test Author"
twitter = "@placeholder"
`,
    });

    const config = await loadConfig(site.root);
    expect(config.site.tagline).toBe("kept");
    expect(config.author.twitter).toBe("@placeholder");
  });

  it("creates the static and output directories", async () => {
    site = await createSiteFixture();
    const config = await loadConfig(site.root);

    expect((await stat(config.paths.staticDir)).isDirectory()).toBe(true);
    expect((await stat(config.paths.outputDir)).isDirectory()).toBe(true);
  });

  it("rejects a missing site root", async () => {
    await expect(loadConfig("/nonexistent/pressmark-site")).rejects.toBeInstanceOf(SiteRootNotFoundError);
  });

  it("rejects a site without site.toml", async () => {
    site = await createSiteFixture();
    await rm(join(site.root, "site.toml"));
    await expect(loadConfig(site.root)).rejects.toBeInstanceOf(ConfigFileNotFoundError);
  });

  it("wraps TOML syntax errors", async () => {
    site = await createSiteFixture({ config: "[site\ntitle = 1\n" });
    const error = await loadConfig(site.root).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigParseError);
    expect(error).toHaveProperty("path", join(site.root, "site.toml"));
  });

  it("names the offending key when validation fails", async () => {
    site = await createSiteFixture({ config: "[build]\nposts_per_page = 0\n" });
    await expect(loadConfig(site.root)).rejects.toThrow(ConfigValidationError);
    await expect(loadConfig(site.root)).rejects.toThrow(/build\.posts_per_page/);
  });

  it("names the missing required directory", async () => {
    site = await createSiteFixture();
    const pagesDir = join(site.root, "content", "pages");
    await rm(pagesDir, { recursive: true });

    const error = await loadConfig(site.root).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(MissingDirectoryError);
    expect(error).toHaveProperty("message", `Required directory does not exist: ${pagesDir}`);
  });
});
