#!/usr/bin/env node
import path from "node:path";
import process from "node:process";
import { parseServerArgs, SERVER_HELP, UsageError } from "./cli-args.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { startSupervisor } from "./supervisor.js";

const logger = createConsoleLogger();

async function main(): Promise<void> {
  const command = parseServerArgs(process.argv.slice(2));
  if (command.kind === "help") {
    console.error(SERVER_HELP);
    return;
  }

  const supervisor = await startSupervisor({
    filePath: path.resolve(process.cwd(), command.file),
    logger,
  });
  await supervisor.closed;
}

try {
  await main();
  process.exit(0);
} catch (error) {
  if (error instanceof UsageError) {
    console.error(`Error: ${error.message}\n`);
    console.error(SERVER_HELP);
  } else {
    logger.error(errorMessage(error));
  }
  process.exit(1);
}
