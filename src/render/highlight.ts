import { bundledLanguages, createHighlighter, type BundledLanguage, type Highlighter } from "shiki";
import { escapeHtml } from "./text";

const THEMES = { light: "github-light", dark: "github-dark" } as const;

/** Loaded up front; any other bundled grammar loads on first use */
const PRELOADED_LANGUAGES: BundledLanguage[] = [
  "markdown",
  "toml",
  "html",
  "css",
  "javascript",
  "typescript",
  "json",
  "bash",
  "python",
];

const PLAIN_TEXT = "text";

let highlighterPromise: Promise<Highlighter> | null = null;

/**
 * Shared Shiki instance, created on first use
 */
export function getHighlighter(): Promise<Highlighter> {
  if (!highlighterPromise) {
    highlighterPromise = createHighlighter({
      themes: Object.values(THEMES),
      langs: PRELOADED_LANGUAGES,
    });
  }
  return highlighterPromise;
}

function isBundledLanguage(name: string): name is BundledLanguage {
  return Object.hasOwn(bundledLanguages, name);
}

async function resolveLanguage(highlighter: Highlighter, lang: string): Promise<string> {
  const name = lang.toLowerCase();
  if (highlighter.getLoadedLanguages().includes(name)) {
    return name;
  }
  if (!isBundledLanguage(name)) {
    return PLAIN_TEXT;
  }
  await highlighter.loadLanguage(name);
  return name;
}

/**
 * Highlight a fenced code block with light and dark themes.
 * Languages Shiki does not know render as plain text.
 */
export async function highlightCode(code: string, lang: string): Promise<string> {
  const highlighter = await getHighlighter();

  try {
    return highlighter.codeToHtml(code, {
      lang: await resolveLanguage(highlighter, lang),
      themes: THEMES,
    });
  } catch {
    // Grammar failures fall back to an unhighlighted block
    return `<pre><code class="language-${escapeHtml(lang)}">${escapeHtml(code)}</code></pre>`;
  }
}
