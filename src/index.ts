#!/usr/bin/env node
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import process from "node:process";
import {
  PREVIEW_HELP,
  packageVersion,
  parsePreviewArgs,
  UsageError,
} from "./cli-args.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { openInBrowser } from "./open-browser.js";
import { renderSource, writePage } from "./render.js";
import { watchSource } from "./source-watcher.js";
import { startSupervisor } from "./supervisor.js";

const logger = createConsoleLogger();

async function main(): Promise<number> {
  const command = parsePreviewArgs(process.argv.slice(2));
  if (command.kind === "help") {
    console.error(PREVIEW_HELP);
    return 0;
  }
  if (command.kind === "version") {
    console.error(`manpreview ${packageVersion()}`);
    return 0;
  }
  for (const warning of command.warnings) {
    logger.warn(warning);
  }

  const sourcePath = path.resolve(process.cwd(), command.file);
  const initialMtimeMs = await statSource(sourcePath);
  const render = () => renderSource(sourcePath, { columns: command.columns });

  const workDir = await fs.promises.mkdtemp(
    path.join(os.tmpdir(), "manpreview-"),
  );
  const pagePath = path.join(workDir, `${path.basename(sourcePath)}.html`);

  let failed = false;

  try {
    await writePage(pagePath, await render());

    const supervisor = await startSupervisor({
      filePath: pagePath,
      logger,
      openBrowser: command.open ? openInBrowser : false,
    });

    const watcher = watchSource({
      filePath: sourcePath,
      initialMtimeMs,
      logger,
      onChange: async () => {
        await writePage(pagePath, await render());
        supervisor.coordinator.requestUpdate();
      },
    });

    process.on("uncaughtException", (error) => {
      logger.error(`Uncaught exception: ${errorMessage(error)}`);
      failed = true;
      void supervisor.shutdown();
    });

    logger.info(`Watching ${sourcePath}`);
    await supervisor.closed;
    watcher.close();
  } finally {
    await fs.promises.rm(workDir, { recursive: true, force: true });
  }

  return failed ? 1 : 0;
}

async function statSource(filePath: string): Promise<number> {
  try {
    const stat = await fs.promises.stat(filePath);
    if (!stat.isFile()) {
      throw new Error("Path is not a file");
    }
    return stat.mtimeMs;
  } catch (error) {
    throw new Error(`Failed to stat ${filePath}: ${errorMessage(error)}`);
  }
}

try {
  process.exit(await main());
} catch (error) {
  if (error instanceof UsageError) {
    console.error(`Error: ${error.message}\n`);
    console.error(PREVIEW_HELP);
  } else {
    logger.error(errorMessage(error));
  }
  process.exit(1);
}
