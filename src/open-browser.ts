import { spawn } from "node:child_process";
import process from "node:process";

export interface BrowserCommand {
  command: string;
  args: string[];
}

export function browserCommand(
  url: string,
  platform: NodeJS.Platform = process.platform,
): BrowserCommand {
  switch (platform) {
    case "darwin": {
      return { command: "open", args: [url] };
    }
    case "win32": {
      return { command: "cmd", args: ["/c", "start", "", url] };
    }
    default: {
      return { command: "xdg-open", args: [url] };
    }
  }
}

/** Opens `url` in a new tab; rejects when the launcher is missing or fails. */
export function openInBrowser(url: string): Promise<void> {
  const { command, args } = browserCommand(url);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: "ignore" });

    child.once("error", (error) => {
      reject(new Error(`Failed to open ${url} in your browser: ${error.message}`));
    });

    child.once("exit", (code) => {
      if (code !== null && code !== 0) {
        reject(
          new Error(`Failed to open ${url} in your browser (${command} exited ${code}).`),
        );
        return;
      }
      resolve();
    });
  });
}
