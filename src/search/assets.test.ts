import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig } from "../config/load";
import type { Config } from "../config/types";
import { SearchConfigError } from "../errors";
import { TemplateRenderer } from "../render/templates";
import { makePage, makePost } from "../test/factories";
import { createSiteFixture, FIXTURE_CONFIG, type SiteFixture } from "../test/site-fixture";
import { normalizeExcerpt, SearchAssetsBuilder } from "./assets";

describe("normalizeExcerpt", () => {
  it("collapses whitespace", () => {
    expect(normalizeExcerpt("  two\n\nlines  ", 200)).toBe("two lines");
  });

  it("cuts long text and marks the cut", () => {
    expect(normalizeExcerpt(`${"a".repeat(9)} bbbb`, 10)).toBe("aaaaaaaaa...");
    expect(normalizeExcerpt("x".repeat(12), 10)).toBe(`${"x".repeat(10)}...`);
  });
});

describe("SearchAssetsBuilder", () => {
  let site: SiteFixture | undefined;

  afterEach(async () => {
    await site?.cleanup();
    site = undefined;
  });

  async function configWith(searchTable: string): Promise<Config> {
    site = await createSiteFixture({ config: `${FIXTURE_CONFIG}\n[search]\n${searchTable}\n` });
    return loadConfig(site.root);
  }

  const post = makePost({
    slug: "hello",
    title: "Hello Search",
    date: new Date("2024-01-05T00:00:00Z"),
    tags: ["web"],
    summary: "Short <b>intro</b>",
    contentHtml: "<p>Body text about search</p>",
  });
  const pages = [
    makePage({ slug: "zeta", title: "Zeta", contentHtml: "<p>Zeta page</p>" }),
    makePage({ slug: "about", title: "About", contentHtml: "<p>About &amp; more</p>" }),
  ];

  it("is only available when search is enabled", async () => {
    const config = await configWith("enabled = false");
    expect(SearchAssetsBuilder.fromConfig(config)).toBeNull();
    expect(() => new SearchAssetsBuilder(config)).toThrow(SearchConfigError);
  });

  it("rejects output paths outside the output directory", async () => {
    const config = await configWith('enabled = true\noutput_dir = "../elsewhere"');
    expect(() => SearchAssetsBuilder.fromConfig(config)).toThrow(
      "search.output_dir cannot traverse outside the output directory",
    );
  });

  it("derives URLs from the configured paths", async () => {
    const builder = new SearchAssetsBuilder(
      await configWith('enabled = true\noutput_dir = "find/assets"\npage_path = "find/index.html"'),
    );
    expect(builder.assetsBaseUrl).toBe("/find/assets");
    expect(builder.pageUrl).toBe("/find/");
  });

  it("numbers posts first, then pages by slug", async () => {
    const builder = new SearchAssetsBuilder(await configWith("enabled = true"));
    const docs = builder.collectDocuments([post], pages).map((record) => record.document);

    expect(docs).toEqual([
      {
        id: 0,
        url: "/posts/hello/",
        title: "Hello Search",
        tags: ["web"],
        date: "2024-01-05",
        excerpt: "Short intro",
      },
      { id: 1, url: "/about/", title: "About", tags: [], date: null, excerpt: "About &amp; more" },
      { id: 2, url: "/zeta/", title: "Zeta", tags: [], date: null, excerpt: "Zeta page" },
    ]);
  });

  it("writes the index files, the bundle and the search page", async () => {
    const config = await configWith("enabled = true");
    const builder = new SearchAssetsBuilder(config);
    const renderer = new TemplateRenderer(config.paths.templatesDir);
    const assetsDir = join(config.paths.outputDir, "assets", "search");

    await builder.buildAssets([post], pages, renderer, {}, new Date("2024-02-01T08:00:00.123Z"));

    const docs = JSON.parse(await readFile(join(assetsDir, "search_docs.json"), "utf-8"));
    expect(docs.version).toBe(1);
    expect(docs.generated_at).toBe("2024-02-01T08:00:00Z");
    expect(docs.doc_count).toBe(3);

    const terms = JSON.parse(await readFile(join(assetsDir, "search_terms.json"), "utf-8"));
    expect(Object.keys(terms)).toContain("search");
    expect(terms.search.map(([docId]: [number, number]) => docId)).toEqual([0]);

    const bundle = await readFile(join(assetsDir, "search.js"), "utf-8");
    expect(bundle).toContain("window.__PRESSMARK_SEARCH__");

    const page = await readFile(join(config.paths.outputDir, "search", "index.html"), "utf-8");
    expect(page).toContain('assetsBase: "/assets/search", minTokenLength: 2');
    expect(page).toContain('<script src="/assets/search/search.js"></script>');
  });
});
