import type { Post } from "../content/types";

export interface TagBucket {
  /** Display name, as first seen */
  name: string;
  slug: string;
  url: string;
  posts: Post[];
}

/**
 * Lowercase, spaces to hyphens, drop everything outside [a-z0-9_-]
 */
export function slugifyTag(tag: string): string {
  return tag
    .toLowerCase()
    .replace(/ /g, "-")
    .replace(/[^a-z0-9_-]/g, "");
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function tagUrl(slug: string): string {
  return `/tags/${slug}/`;
}

/**
 * Group posts by tag slug. Posts keep the order they are given in.
 * Tags that slugify to the same value share one bucket, named after the
 * first spelling seen; tags with an empty slug are left out.
 */
export function buildTagBuckets(posts: Post[]): TagBucket[] {
  const buckets = new Map<string, TagBucket>();

  for (const post of posts) {
    for (const tag of post.tags) {
      const slug = slugifyTag(tag);
      if (!slug) continue;

      let bucket = buckets.get(slug);
      if (!bucket) {
        bucket = { name: tag, slug, url: tagUrl(slug), posts: [] };
        buckets.set(slug, bucket);
      }
      if (!bucket.posts.includes(post)) {
        bucket.posts.push(post);
      }
    }
  }

  return [...buckets.values()].sort(
    (a, b) => compareStrings(a.name.toLowerCase(), b.name.toLowerCase()) || compareStrings(a.slug, b.slug),
  );
}
