import type { ContentExtractor } from "./content-extractor.js";
import { EventCoordinator } from "./event-coordinator.js";
import { errorMessage, type Logger, silentLogger } from "./logger.js";
import { openInBrowser } from "./open-browser.js";
import { createPreviewServer, type PreviewServer } from "./preview-server.js";
import { installSignalBridge, type SignalSource } from "./signal-bridge.js";

export interface SupervisorOptions {
  /** The HTML file to serve. */
  filePath: string;
  coordinator?: EventCoordinator;
  extract?: ContentExtractor;
  logger?: Logger;
  /** Launches the browser on the preview URL; `false` skips it. */
  openBrowser?: false | ((url: string) => Promise<void>);
  signalSource?: SignalSource;
  host?: string;
  port?: number;
}

export interface Supervisor {
  url: string;
  coordinator: EventCoordinator;
  server: PreviewServer;
  /** Stops the server; safe to call more than once. */
  shutdown(): Promise<void>;
  /** Settles once the listener and every session are gone. */
  closed: Promise<void>;
}

/**
 * Starts the preview server with its signal bridge in place. A listen failure
 * rejects; everything after that is logged rather than thrown.
 */
export async function startSupervisor(
  options: SupervisorOptions,
): Promise<Supervisor> {
  const logger = options.logger ?? silentLogger;
  const coordinator = options.coordinator ?? new EventCoordinator();

  const server = await createPreviewServer({
    filePath: options.filePath,
    coordinator,
    extract: options.extract,
    host: options.host,
    port: options.port,
    logger,
  });

  let markClosed: () => void = () => {};
  const closed = new Promise<void>((resolve) => {
    markClosed = resolve;
  });

  let stopping: Promise<void> | undefined;
  const shutdown = (): Promise<void> => {
    stopping ??= server
      .close()
      .catch((error) => {
        logger.error(`Failed to close preview server: ${errorMessage(error)}`);
      })
      .finally(() => {
        bridge.dispose();
        markClosed();
      });
    return stopping;
  };

  const bridge = installSignalBridge({
    coordinator,
    source: options.signalSource,
    logger,
    onShutdown: () => {
      void shutdown();
    },
  });

  logger.info(`HTTP server listening on ${server.url}`);

  const open = options.openBrowser ?? openInBrowser;
  if (open) {
    try {
      await open(server.url);
    } catch (error) {
      logger.warn(errorMessage(error));
    }
  }

  return {
    url: server.url,
    coordinator,
    server,
    shutdown,
    closed,
  };
}
