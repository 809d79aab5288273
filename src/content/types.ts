export interface Frontmatter {
  title?: unknown;
  date?: unknown;
  slug?: unknown;
  tags?: unknown;
  [key: string]: unknown;
}

export interface ParsedContent {
  /** Parsed front matter, empty when the file has none */
  data: Frontmatter;
  /** Markdown body without the front matter block */
  body: string;
}

export interface Post {
  title: string;
  date: Date;
  /** URL segment, from front matter or the filename */
  slug: string;
  tags: string[];
  draft: boolean;
  /** Explicit summary, or the start of the raw body */
  summary: string;
  coverImage: string | null;
  coverAlt: string | null;
  contentHtml: string;
  sourcePath: string;
  /** e.g. /posts/hello-world/ */
  url: string;
}

export interface Page {
  title: string;
  slug: string;
  contentHtml: string;
  sourcePath: string;
  /** e.g. /about/ */
  url: string;
  date: Date | null;
  showInNav: boolean;
  navTitle: string | null;
  navOrder: number;
}

export interface DiscoveredContent {
  posts: Post[];
  pages: Page[];
}
