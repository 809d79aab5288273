import { readFile } from "node:fs/promises";
import matter from "gray-matter";
import { parse as parseToml } from "smol-toml";
import { isTable } from "../config/merge";
import { ContentError } from "../errors";
import type { ParsedContent } from "./types";

export const FENCE = "+++";

const MATTER_OPTIONS = {
  delimiters: FENCE,
  language: "toml",
  engines: {
    toml: (input: string): object => parseToml(input.replace(/\r\n?/g, "\n")),
  },
};

/**
 * Split a content file into TOML front matter and Markdown body.
 *
 * Files whose first line is not exactly `+++`, or that never close the
 * block, are treated as plain Markdown with no metadata.
 */
export function parseFrontMatter(text: string, sourcePath: string): ParsedContent {
  const firstLine = text.split("\n", 1)[0].replace(/\r$/, "");
  if (firstLine !== FENCE || text.indexOf(`\n${FENCE}`, FENCE.length) === -1) {
    return { data: {}, body: text };
  }

  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(text, MATTER_OPTIONS);
  } catch (e) {
    const detail = e instanceof Error ? `: ${e.message}` : "";
    throw new ContentError(`Invalid TOML front matter in ${sourcePath}${detail}`, sourcePath, {
      cause: e,
    });
  }

  const data: unknown = parsed.data;
  let body = parsed.content;
  if (body.startsWith("\r\n")) {
    body = body.slice(2);
  } else if (body.startsWith("\n")) {
    body = body.slice(1);
  }

  return { data: isTable(data) ? data : {}, body };
}

export async function readFrontMatter(filePath: string): Promise<ParsedContent> {
  const raw = await readFile(filePath, "utf-8");
  return parseFrontMatter(raw, filePath);
}
