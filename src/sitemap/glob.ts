import { SitemapConfigError } from "../errors";

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

/**
 * Translate a shell-style pattern to a RegExp anchored at both ends.
 * `*` and `?` also match "/", so "tags/*" covers every tag page.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = "";
  let i = 0;

  while (i < pattern.length) {
    const c = pattern[i];
    i++;

    if (c === "*") {
      source += ".*";
    } else if (c === "?") {
      source += ".";
    } else if (c === "[") {
      let j = i;
      if (pattern[j] === "!" || pattern[j] === "^") j++;
      if (pattern[j] === "]") j++;
      while (j < pattern.length && pattern[j] !== "]") j++;

      if (j >= pattern.length) {
        // Unclosed bracket matches itself
        source += "\\[";
      } else {
        let body = pattern.slice(i, j).replace(/\\/g, "\\\\");
        if (body.startsWith("!")) {
          body = `^${body.slice(1)}`;
        } else if (body.startsWith("^")) {
          body = `\\${body}`;
        }
        source += `[${body}]`;
        i = j + 1;
      }
    } else {
      source += c.replace(REGEX_SPECIAL, "\\$&");
    }
  }

  try {
    return new RegExp(`^${source}$`, "s");
  } catch (e) {
    throw new SitemapConfigError(`Invalid sitemap exclude pattern: ${pattern}`, { cause: e });
  }
}

export function matchesGlob(value: string, pattern: string): boolean {
  return globToRegExp(pattern).test(value);
}
