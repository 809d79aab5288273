import type { Table } from "./merge";

export const CONFIG_FILENAME = "site.toml";

/**
 * Built-in configuration; site.toml is merged over it
 */
export function defaultConfig(): Table {
  return {
    site: {
      title: "My Site",
      subtitle: "",
      base_url: "",
      url: "",
      language: "en",
      timezone: "UTC",
    },
    paths: {
      content_dir: "content",
      posts_dir: "content/posts",
      pages_dir: "content/pages",
      templates_dir: "templates",
      static_dir: "static",
      output_dir: "output",
    },
    build: {
      posts_per_page: 10,
      include_drafts: false,
      feed_max_items: 20,
    },
    author: {
      name: "",
      email: "",
    },
    search: {
      enabled: false,
      output_dir: "assets/search",
      page_path: "search/index.html",
      max_terms_per_doc: 300,
      min_token_len: 2,
      drop_df_ratio: 0.7,
      drop_df_min: 0,
      weight_body: 1.0,
      weight_title: 8.0,
      weight_tags: 6.0,
      normalize_by_doc_len: true,
    },
    sitemap: {
      enabled: false,
      output: "sitemap.xml",
      include_tags: true,
      include_pages: true,
      include_posts: true,
      include_index: true,
      exclude_paths: [],
    },
    feeds: {
      enabled: false,
      rss_enabled: true,
      atom_enabled: true,
      rss_output: "rss.xml",
      atom_output: "atom.xml",
      max_items: 20,
      include_drafts: false,
      include_pages: false,
      include_posts: true,
      include_tags: [],
      summary: {
        mode: "excerpt",
        max_chars: 240,
      },
    },
  };
}
