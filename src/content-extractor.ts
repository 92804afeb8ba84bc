import fs from "node:fs/promises";

export interface FragmentMarkers {
  start: string;
  end: string;
}

/** The element whose body the client swaps in on every update. */
export const FRAGMENT_MARKERS: readonly FragmentMarkers[] = [
  { start: '<pre id="manpage">', end: "</pre>" },
  { start: '<article id="manpage">', end: "</article>" },
];

export type ContentExtractor = (filePath: string) => Promise<string>;

/**
 * Returns the lines between the first start marker line and its end marker
 * line, exclusive of both. The markers must stand alone on their lines. An
 * unterminated fragment runs to the end of the file.
 *
 * Resolves to `""` when the file cannot be read or holds no fragment.
 */
export const extractFragment: ContentExtractor = async (filePath) => {
  let source: string;
  try {
    source = await fs.readFile(filePath, "utf8");
  } catch {
    return "";
  }
  return sliceFragment(source);
};

export function sliceFragment(
  source: string,
  markers: readonly FragmentMarkers[] = FRAGMENT_MARKERS,
): string {
  const lines = source.split(/(?<=\n)/);
  let active: FragmentMarkers | undefined;
  let content = "";

  for (const line of lines) {
    const text = line.endsWith("\n") ? line.slice(0, -1) : line;
    if (!active) {
      active = markers.find((marker) => marker.start === text);
      continue;
    }
    if (text === active.end) {
      break;
    }
    content += line;
  }

  return content;
}
