import fs from "node:fs/promises";
import path from "node:path";
import { type RunManOptions, renderManPage } from "./man-page.js";
import { renderMarkdownPage } from "./markdown.js";

const MARKDOWN_EXTENSIONS = new Set([".md", ".markdown", ".ronn"]);

export function isMarkdownSource(sourcePath: string): boolean {
  return MARKDOWN_EXTENSIONS.has(path.extname(sourcePath).toLowerCase());
}

/** Renders a man page source, Markdown or roff, to a complete preview page. */
export async function renderSource(
  sourcePath: string,
  options: RunManOptions = {},
): Promise<string> {
  if (isMarkdownSource(sourcePath)) {
    const markdown = await fs.readFile(sourcePath, "utf8");
    return renderMarkdownPage(markdown, sourcePath);
  }
  return renderManPage(sourcePath, options);
}

/**
 * Replaces `filePath` in one rename so the server never reads a half-written
 * page.
 */
export async function writePage(filePath: string, html: string): Promise<void> {
  const staging = `${filePath}.tmp`;
  await fs.writeFile(staging, html, "utf8");
  await fs.rename(staging, filePath);
}
