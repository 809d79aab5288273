import { randomBytes } from "node:crypto";
import { Marked, type Tokens } from "marked";
import { highlightCode } from "./highlight";

interface PendingCodeBlock {
  placeholder: string;
  code: string;
  lang: string;
}

/**
 * Generate a slug from heading text for anchor links
 */
function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/<[^>]+>/g, "")
    .replace(/[^\w\s-]/g, "")
    .trim()
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-");
}

/**
 * Create a Marked instance whose code blocks are collected into `codeBlocks`
 * as placeholders, to be highlighted once parsing is done. `nonce` keeps the
 * placeholders from matching text already in the document.
 */
function createMarkdownRenderer(codeBlocks: PendingCodeBlock[], nonce: string): Marked {
  const marked = new Marked({ async: false, gfm: true });

  marked.use({
    renderer: {
      code({ text, lang }: Tokens.Code): string {
        const language = (lang ?? "").trim().split(/\s+/)[0] || "plaintext";
        const placeholder = `<!--code-block-${nonce}-${codeBlocks.length}-->`;
        codeBlocks.push({ placeholder, code: text, lang: language });
        return placeholder;
      },

      // Headings get ids so sections can be linked to
      heading({ tokens, depth }: Tokens.Heading): string {
        const text = this.parser.parseInline(tokens);
        const slug = slugify(text);

        if (depth === 1 || !slug) {
          return `<h${depth}>${text}</h${depth}>\n`;
        }

        return `<h${depth} id="${slug}">${text}</h${depth}>\n`;
      },
    },
  });

  return marked;
}

/**
 * Render a Markdown body to HTML
 */
export async function renderMarkdown(markdown: string): Promise<string> {
  const codeBlocks: PendingCodeBlock[] = [];
  const marked = createMarkdownRenderer(codeBlocks, randomBytes(8).toString("hex"));
  let html = await marked.parse(markdown);

  for (const block of codeBlocks) {
    const highlighted = await highlightCode(block.code, block.lang);
    html = html.replace(block.placeholder, () => highlighted);
  }

  return html;
}
