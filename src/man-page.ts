import { spawn } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import { buildPageHtml } from "./page-template.js";

export const DEFAULT_COLUMNS = 120;

export interface RunManOptions {
  columns?: number;
  /** Defaults to `man`; overridable so the pipeline can run without man(1). */
  command?: string;
}

/**
 * Formats a man page source with man(1) and returns what it printed on stdout.
 * Formatting is kept so bold and underlined runs survive as overstrikes.
 */
export async function runMan(
  manfile: string,
  options: RunManOptions = {},
): Promise<string> {
  let resolved: string;
  try {
    resolved = await fs.realpath(manfile);
  } catch {
    throw new Error(`Cannot resolve ${manfile}.`);
  }

  const command = options.command ?? "man";
  const columns = options.columns ?? DEFAULT_COLUMNS;

  return new Promise((resolve, reject) => {
    const child = spawn(command, ["-P", "cat", resolved], {
      stdio: ["ignore", "pipe", "inherit"],
      env: {
        ...process.env,
        COLUMNS: String(columns),
        MANWIDTH: String(columns),
        MAN_KEEP_FORMATTING: "1",
      },
    });

    const chunks: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });

    child.once("error", (error: NodeJS.ErrnoException) => {
      reject(
        new Error(
          error.code === "ENOENT"
            ? `${command}(1) not found.`
            : `Unknown error occurred when calling ${command}(1): ${error.message}`,
        ),
      );
    });

    child.once("close", (code) => {
      if (code !== 0) {
        reject(new Error(`Call to ${command}(1) failed.`));
        return;
      }
      resolve(Buffer.concat(chunks).toString("utf8"));
    });
  });
}

/**
 * Converts the overstrike markup of formatted man output to HTML.
 *
 * `X BS X` marks a bold X and `_ BS X` an underlined X. `_ BS _` is read as
 * underlined while an underlined run is open and as bold otherwise, the way
 * less(1) shows it. Runs of blank lines collapse to one.
 */
export function overstrikeToHtml(text: string): string {
  let html = "";
  let inBold = false;
  let inItalic = false;

  const closeTags = (): void => {
    if (inBold) {
      html += "</b>";
      inBold = false;
    }
    if (inItalic) {
      html += "</u>";
      inItalic = false;
    }
  };

  let i = 0;
  while (i < text.length) {
    let ch = text.charAt(i);

    if (ch === "\n" && text.charAt(i + 1) === "\n") {
      closeTags();
      html += "\n\n";
      i += 2;
      while (text.charAt(i) === "\n") {
        i += 1;
      }
      continue;
    }

    let bold = false;
    let italic = false;
    if (text.charAt(i + 1) === "\b" && i + 2 < text.length) {
      bold = ch === text.charAt(i + 2);
      italic = ch === "_";
      if (bold && italic) {
        if (inItalic) {
          bold = false;
        } else {
          italic = false;
        }
      }
    }

    if (inBold && !bold) {
      html += "</b>";
      inBold = false;
    }
    if (inItalic && !italic) {
      html += "</u>";
      inItalic = false;
    }
    if (bold) {
      if (!inBold) {
        html += "<b>";
        inBold = true;
      }
      i += 2;
    }
    if (italic) {
      if (!inItalic) {
        html += "<u>";
        inItalic = true;
      }
      ch = text.charAt(i + 2);
      i += 2;
    }

    html += escapeChar(ch);
    i += 1;
  }

  closeTags();
  return html;
}

/** Title markup for a source file: every character as a numeric entity. */
export function titleFor(filePath: string): string {
  const name = path.basename(filePath);
  if (name.length === 0) {
    return "Man page";
  }
  return Array.from(name, (char) => `&#${char.codePointAt(0) ?? 0};`).join("");
}

export function manToHtml(manOutput: string, filePath: string): string {
  return buildPageHtml({
    title: titleFor(filePath),
    element: "pre",
    body: overstrikeToHtml(manOutput),
  });
}

export async function renderManPage(
  manfile: string,
  options: RunManOptions = {},
): Promise<string> {
  return manToHtml(await runMan(manfile, options), manfile);
}

function escapeChar(ch: string): string {
  switch (ch) {
    case "&": {
      return "&amp;";
    }
    case "<": {
      return "&lt;";
    }
    case ">": {
      return "&gt;";
    }
    default: {
      return ch;
    }
  }
}
