import { describe, expect, it } from "vitest";
import { renderMarkdown } from "./markdown";

describe("renderMarkdown", () => {
  it("renders paragraphs and inline markup", async () => {
    expect(await renderMarkdown("Some **bold** text")).toBe("<p>Some <strong>bold</strong> text</p>\n");
  });

  it("adds ids to headings below the first level", async () => {
    const html = await renderMarkdown("# Title\n\n## Getting Started\n");
    expect(html).toBe('<h1>Title</h1>\n<h2 id="getting-started">Getting Started</h2>\n');
  });

  it("highlights fenced code blocks", async () => {
    const html = await renderMarkdown("```ts\nconst answer = 42;\n```\n");
    expect(html).toContain('class="shiki shiki-themes github-light github-dark"');
    expect(html).not.toContain("<!--code-block-");
  });

  it("leaves comments that look like code placeholders alone", async () => {
    const html = await renderMarkdown("<!--code-block-0-->\n\n```ts\nconst answer = 42;\n```\n");
    expect(html.startsWith("<!--code-block-0-->")).toBe(true);
    expect(html.match(/class="shiki /g)).toHaveLength(1);
  });

  it("renders unknown languages as plain text", async () => {
    const html = await renderMarkdown("```klingon\nqapla\n```\n");
    expect(html).toContain("<pre");
    expect(html).toContain("qapla");
  });

  it("supports GitHub tables", async () => {
    const html = await renderMarkdown("| a | b |\n|---|---|\n| 1 | 2 |\n");
    expect(html).toContain("<table>");
    expect(html).toContain("<td>1</td>");
  });
});
