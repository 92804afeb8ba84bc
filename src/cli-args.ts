import { createRequire } from "node:module";
import { DEFAULT_COLUMNS } from "./man-page.js";

const require = createRequire(import.meta.url);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const PREVIEW_HELP = `Preview man page as you edit.

Usage:
    manpreview [options] manfile

Options:
    -h, --help
        Print help text and exit.
    -V, --version
        Print version info and exit.
    -w, --width, --columns=WIDTH
        Width of output, i.e., the COLUMNS environment variable passed to
        man(1). Defaults to ${DEFAULT_COLUMNS}.
    --no-open
        Do not open the preview in a browser.

Sources ending in .md are rendered as Markdown instead of with man(1).
`;

export const SERVER_HELP = `Serve an HTML file and push updates to open tabs.

Usage:
    manpreview-server file

Send SIGUSR2 to the process to push the current content to every open tab;
SIGINT or SIGTERM shuts the server down.
`;

export type PreviewCommand =
  | { kind: "help" }
  | { kind: "version" }
  | {
      kind: "run";
      file: string;
      columns: number;
      open: boolean;
      warnings: string[];
    };

export type ServerCommand = { kind: "help" } | { kind: "run"; file: string };

export function parsePreviewArgs(argv: readonly string[]): PreviewCommand {
  let columns = DEFAULT_COLUMNS;
  let open = true;
  let index = 0;

  while (index < argv.length) {
    const arg = argv[index] ?? "";
    const [flag, inlineValue] = splitInlineValue(arg);

    if (flag === "-h" || flag === "--help") {
      return { kind: "help" };
    }
    if (flag === "-V" || flag === "--version") {
      return { kind: "version" };
    }
    if (flag === "-w" || flag === "--width" || flag === "--columns") {
      let value = inlineValue;
      if (value === undefined) {
        index += 1;
        value = argv[index];
      }
      if (value === undefined) {
        throw new UsageError(`Missing width after ${flag}.`);
      }
      columns = parseUnsigned(value);
    } else if (flag === "--no-open") {
      open = false;
    } else if (flag === "--") {
      index += 1;
      break;
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new UsageError(`Unknown option ${arg}.`);
    } else {
      break;
    }
    index += 1;
  }

  const positionals = argv.slice(index);
  const [file] = positionals;
  if (file === undefined) {
    throw new UsageError("Missing man page source file.");
  }

  const warnings =
    positionals.length > 1 ? ["Extraneous arguments ignored."] : [];
  return { kind: "run", file, columns, open, warnings };
}

export function parseServerArgs(argv: readonly string[]): ServerCommand {
  const positionals: string[] = [];
  let optionsEnded = false;

  for (const arg of argv) {
    if (!optionsEnded && (arg === "-h" || arg === "--help")) {
      return { kind: "help" };
    }
    if (!optionsEnded && arg === "--") {
      optionsEnded = true;
      continue;
    }
    if (!optionsEnded && arg.startsWith("-") && arg !== "-") {
      throw new UsageError(`Unknown option ${arg}.`);
    }
    positionals.push(arg);
  }

  const [file, ...rest] = positionals;
  if (file === undefined) {
    throw new UsageError("Missing the file to serve.");
  }
  if (rest.length > 0) {
    throw new UsageError(`Unrecognized arguments: ${rest.join(" ")}.`);
  }
  return { kind: "run", file };
}

function splitInlineValue(arg: string): [string, string | undefined] {
  if (!arg.startsWith("--")) {
    return [arg, undefined];
  }
  const equals = arg.indexOf("=");
  if (equals === -1) {
    return [arg, undefined];
  }
  return [arg.slice(0, equals), arg.slice(equals + 1)];
}

function parseUnsigned(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`Invalid width ${value}.`);
  }
  return Number.parseInt(value, 10);
}

export function packageVersion(): string {
  const manifest: unknown = require("../package.json");
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "unknown";
}
