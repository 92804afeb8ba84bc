import type { EventCoordinator } from "./event-coordinator.js";
import { type Logger, silentLogger } from "./logger.js";

/** SIGUSR1 belongs to the Node.js inspector, so updates ride on SIGUSR2. */
export const UPDATE_SIGNALS: readonly NodeJS.Signals[] = ["SIGUSR2"];
export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = [
  "SIGINT",
  "SIGTERM",
];

/** The part of `process` the bridge listens on. */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface SignalBridgeOptions {
  coordinator: EventCoordinator;
  /** Stops the listener; called once, after sessions were told to shut down. */
  onShutdown: () => void;
  source?: SignalSource;
  updateSignals?: readonly NodeJS.Signals[];
  shutdownSignals?: readonly NodeJS.Signals[];
  logger?: Logger;
}

export interface SignalBridge {
  dispose(): void;
}

export function installSignalBridge(options: SignalBridgeOptions): SignalBridge {
  const { coordinator } = options;
  const source: SignalSource = options.source ?? process;
  const logger = options.logger ?? silentLogger;
  let shutdownStarted = false;

  const onUpdate = (): void => {
    logger.info("Updating content...");
    coordinator.requestUpdate();
  };

  const onShutdownSignal = (): void => {
    coordinator.requestShutdown();
    if (shutdownStarted) {
      return;
    }
    shutdownStarted = true;
    logger.info("Shutting down HTTP server...");
    options.onShutdown();
  };

  const updateSignals = options.updateSignals ?? UPDATE_SIGNALS;
  const shutdownSignals = options.shutdownSignals ?? SHUTDOWN_SIGNALS;

  for (const signal of updateSignals) {
    source.on(signal, onUpdate);
  }
  for (const signal of shutdownSignals) {
    source.on(signal, onShutdownSignal);
  }

  return {
    dispose() {
      for (const signal of updateSignals) {
        source.off(signal, onUpdate);
      }
      for (const signal of shutdownSignals) {
        source.off(signal, onShutdownSignal);
      }
    },
  };
}
