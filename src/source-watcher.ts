import fs from "node:fs";
import path from "node:path";
import { errorMessage, type Logger, silentLogger } from "./logger.js";

export const DEBOUNCE_MS = 75;

export interface SourceWatcherOptions {
  filePath: string;
  /** Modification time of the source when it was last rendered. */
  initialMtimeMs: number;
  onChange: () => Promise<void>;
  debounceMs?: number;
  logger?: Logger;
}

export interface SourceWatcher {
  /** Re-checks the source now; runs `onChange` if its mtime advanced. */
  check(): Promise<void>;
  close(): void;
}

/**
 * Watches the directory holding the source, since editors that save by
 * renaming replace the watched inode. Events for other files are ignored and
 * bursts are debounced into one mtime check.
 */
export function watchSource(options: SourceWatcherOptions): SourceWatcher {
  const logger = options.logger ?? silentLogger;
  const fileName = path.basename(options.filePath);
  const debounceMs = options.debounceMs ?? DEBOUNCE_MS;
  let lastMtimeMs = options.initialMtimeMs;
  let debounceTimer: NodeJS.Timeout | undefined;
  let running: Promise<void> = Promise.resolve();
  let closed = false;

  const check = async (): Promise<void> => {
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.promises.stat(options.filePath)).mtimeMs;
    } catch (error) {
      logger.warn(`Failed to stat ${options.filePath}: ${errorMessage(error)}`);
      return;
    }
    if (mtimeMs <= lastMtimeMs) {
      return;
    }
    lastMtimeMs = mtimeMs;
    logger.info("Change detected.");
    try {
      await options.onChange();
    } catch (error) {
      logger.warn(`Failed to render ${options.filePath}: ${errorMessage(error)}`);
    }
  };

  const queueCheck = (): Promise<void> => {
    running = running.then(check);
    return running;
  };

  const watcher = fs.watch(
    path.dirname(options.filePath),
    { persistent: true },
    (_event, changed) => {
      if (closed || (changed && path.basename(changed) !== fileName)) {
        return;
      }
      if (debounceTimer) {
        clearTimeout(debounceTimer);
      }
      debounceTimer = setTimeout(() => {
        debounceTimer = undefined;
        void queueCheck();
      }, debounceMs);
    },
  );

  watcher.on("error", (error) => {
    logger.warn(`Watcher error: ${errorMessage(error)}`);
  });

  return {
    check: queueCheck,
    close() {
      closed = true;
      if (debounceTimer) {
        clearTimeout(debounceTimer);
        debounceTimer = undefined;
      }
      watcher.close();
    },
  };
}
