import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import nunjucks, { type Environment } from "nunjucks";
import { formatIsoDate, parseIsoDate } from "../content/dates";
import { TemplateError } from "../errors";

export type TemplateContext = Record<string, unknown>;

export type TemplateName =
  | "base.html"
  | "index.html"
  | "post.html"
  | "page.html"
  | "tags.html"
  | "tag.html"
  | "feed.xml"
  | "search.html";

function asDate(value: unknown): Date | null {
  if (typeof value === "number") {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return parseIsoDate(value);
}

/**
 * Renders the site's templates. Output is autoescaped.
 */
export class TemplateRenderer {
  readonly templatesDir: string;
  private env: Environment;

  constructor(templatesDir: string) {
    this.templatesDir = templatesDir;
    this.env = new nunjucks.Environment(
      new nunjucks.FileSystemLoader(templatesDir, { noCache: true }),
      { autoescape: true },
    );

    this.env.addFilter("isodate", (value: unknown) => {
      const date = asDate(value);
      return date ? formatIsoDate(date) : "";
    });
    this.env.addFilter("rfc2822", (value: unknown) => {
      const date = asDate(value);
      return date ? date.toUTCString() : "";
    });
  }

  render(name: TemplateName, context: TemplateContext): string {
    try {
      return this.env.render(name, context);
    } catch (e) {
      throw new TemplateError(name, { cause: e });
    }
  }

  /**
   * Render `name` and write it to `target`, creating parent directories
   */
  async renderToFile(name: TemplateName, context: TemplateContext, target: string): Promise<void> {
    const html = this.render(name, context);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, html, "utf-8");
  }
}
