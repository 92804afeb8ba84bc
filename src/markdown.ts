import path from "node:path";
import hljs from "highlight.js";
import { marked } from "marked";
import { buildPageHtml, escapeHtml } from "./page-template.js";

const PLAIN_LANGUAGE = "plaintext";

const LANGUAGE_ALIASES: Record<string, string> = {
  console: "bash",
  shell: "bash",
  sh: "bash",
  shellsession: "bash",
  zsh: "bash",
  text: PLAIN_LANGUAGE,
  plain: PLAIN_LANGUAGE,
  plaintext: PLAIN_LANGUAGE,
  txt: PLAIN_LANGUAGE,
  js: "javascript",
  ts: "typescript",
  yml: "yaml",
  md: "markdown",
  roff: PLAIN_LANGUAGE,
  troff: PLAIN_LANGUAGE,
};

marked.setOptions({
  gfm: true,
  breaks: false,
});

/**
 * Renders a Markdown man page (the ronn/pandoc style of writing one) to the
 * HTML fragment shown in the preview.
 */
export function renderMarkdown(markdown: string): string {
  const renderer = new marked.Renderer();
  const slugCounts = new Map<string, number>();

  renderer.heading = ({ tokens, depth, text }) => {
    const slug = createSlug(text, slugCounts);
    const content = renderer.parser.parseInline(tokens);
    return `<h${depth} id="${slug}">${content}</h${depth}>\n`;
  };

  renderer.code = ({ text, lang }) => {
    const language =
      typeof lang === "string" && lang.trim().length > 0
        ? normalizeLanguage(lang.trim())
        : undefined;
    const { value, language: detected } = highlightCode(
      normalizeNewlines(text),
      language,
    );
    const languageClass = detected ? ` language-${detected}` : "";
    return `<pre><code class="hljs${languageClass}">${value}</code></pre>\n`;
  };

  return marked.parse(markdown, { async: false, renderer }) as string;
}

export function renderMarkdownPage(markdown: string, filePath: string): string {
  return buildPageHtml({
    title: escapeHtml(path.basename(filePath)),
    element: "article",
    body: renderMarkdown(markdown),
  });
}

function createSlug(source: string, counts: Map<string, number>): string {
  const base = source
    .toLowerCase()
    .trim()
    .replace(/[\s]+/g, "-")
    .replace(/[^a-z0-9-_]/g, "")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");

  const fallback = base || "section";
  const seen = counts.get(fallback) ?? 0;
  counts.set(fallback, seen + 1);
  return seen === 0 ? fallback : `${fallback}-${seen}`;
}

function highlightCode(
  code: string,
  language?: string,
): { value: string; language?: string } {
  if (!language || language === PLAIN_LANGUAGE) {
    return { value: escapeHtml(code), language };
  }

  if (!hljs.getLanguage(language)) {
    return { value: escapeHtml(code) };
  }

  try {
    return {
      value: hljs.highlight(code, { language }).value,
      language,
    };
  } catch (error) {
    console.warn(`Failed to highlight code block (${language}):`, error);
    return { value: escapeHtml(code), language };
  }
}

function normalizeLanguage(language: string): string {
  const lower = language.toLowerCase();
  return LANGUAGE_ALIASES[lower] ?? lower;
}

function normalizeNewlines(value: string): string {
  return value.replace(/\r\n/g, "\n");
}
