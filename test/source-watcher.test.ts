import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Logger } from "../src/logger.js";
import { type SourceWatcher, watchSource } from "../src/source-watcher.js";

describe("watchSource", () => {
  let dir: string;
  let source: string;
  let watcher: SourceWatcher | undefined;
  let logger: Logger;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "manpreview-watch-"));
    source = path.join(dir, "tool.1");
    await fs.writeFile(source, ".TH TOOL 1\n");
    logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  });

  afterEach(async () => {
    watcher?.close();
    watcher = undefined;
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("re-renders once when the modification time advances", async () => {
    const { mtimeMs } = await fs.stat(source);
    const onChange = vi.fn(async () => {});
    watcher = watchSource({
      filePath: source,
      initialMtimeMs: mtimeMs - 1000,
      onChange,
      logger,
      debounceMs: 60_000,
    });

    await watcher.check();
    await watcher.check();

    expect(onChange).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith("Change detected.");
  });

  it("ignores checks while the source is unchanged", async () => {
    const { mtimeMs } = await fs.stat(source);
    const onChange = vi.fn(async () => {});
    watcher = watchSource({
      filePath: source,
      initialMtimeMs: mtimeMs,
      onChange,
      logger,
      debounceMs: 60_000,
    });

    await watcher.check();

    expect(onChange).not.toHaveBeenCalled();
  });

  it("warns instead of failing when the source disappears", async () => {
    const onChange = vi.fn(async () => {});
    watcher = watchSource({
      filePath: source,
      initialMtimeMs: 0,
      onChange,
      logger,
      debounceMs: 60_000,
    });
    await fs.rm(source);

    await watcher.check();

    expect(onChange).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("keeps watching when a render fails", async () => {
    watcher = watchSource({
      filePath: source,
      initialMtimeMs: 0,
      onChange: async () => {
        throw new Error("man exploded");
      },
      logger,
      debounceMs: 60_000,
    });

    await watcher.check();

    expect(logger.warn).toHaveBeenCalledWith(
      `Failed to render ${source}: man exploded`,
    );
  });
});
