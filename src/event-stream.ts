import type { ServerResponse } from "node:http";
import type {
  EventCoordinator,
  WakeObservation,
} from "./event-coordinator.js";
import { errorMessage, type Logger, silentLogger } from "./logger.js";

export const BYE_FRAME = "event: bye\ndata: {}\n\n";

export type SessionEnd = "shutdown" | "disconnected";

/** The writable end of one `/events` connection. */
export interface EventSink {
  readonly closed: boolean;
  /** Resolves `false` when the frame could not be written. */
  send(frame: string): Promise<boolean>;
  end(): void;
  /** Registers a disconnect listener; returns a function that removes it. */
  onClose(listener: () => void): () => void;
}

export interface EventStreamOptions {
  coordinator: EventCoordinator;
  sink: EventSink;
  extract: () => Promise<string>;
  logger?: Logger;
}

export function formatUpdateFrame(content: string): string {
  return `event: update\ndata: {"content": ${JSON.stringify(content)}}\n\n`;
}

/**
 * Runs the notification loop of one streaming session until the server shuts
 * down or the peer goes away.
 */
export async function runEventStream(
  options: EventStreamOptions,
): Promise<SessionEnd> {
  const { coordinator, sink, extract } = options;
  const logger = options.logger ?? silentLogger;
  const subscription = coordinator.subscribe();
  const detach = sink.onClose(() => {
    subscription.close();
  });

  try {
    for (;;) {
      await subscription.waitForWakeup();
      if (sink.closed) {
        return "disconnected";
      }

      const observation = await coordinator.withGuard(() =>
        subscription.observeAndClear(),
      );
      const end = await deliverPending(observation, sink, extract);
      if (end) {
        return end;
      }
    }
  } catch (error) {
    logger.error(`Event stream failed: ${errorMessage(error)}`);
    return "disconnected";
  } finally {
    detach();
    subscription.close();
    sink.end();
  }
}

/** Writes go to this session's own connection, outside the guard. */
async function deliverPending(
  { updateDue, shutdownDue }: WakeObservation,
  sink: EventSink,
  extract: () => Promise<string>,
): Promise<SessionEnd | undefined> {
  let disconnected = false;

  if (updateDue) {
    const content = await extract();
    disconnected = !(await sink.send(formatUpdateFrame(content)));
  }

  if (shutdownDue) {
    await sink.send(BYE_FRAME);
    return "shutdown";
  }

  return disconnected || sink.closed ? "disconnected" : undefined;
}

export function createResponseSink(res: ServerResponse): EventSink {
  let closed = false;
  const listeners = new Set<() => void>();
  // A write to a peer that stopped reading never calls back; closing settles it.
  const pendingWrites = new Set<(written: boolean) => void>();

  const markClosed = (): void => {
    if (closed) {
      return;
    }
    closed = true;
    for (const settle of pendingWrites) {
      settle(false);
    }
    pendingWrites.clear();
    for (const listener of listeners) {
      listener();
    }
    listeners.clear();
  };

  res.on("close", markClosed);
  res.on("error", markClosed);

  return {
    get closed() {
      return closed || res.destroyed;
    },
    send(frame) {
      if (closed || res.destroyed || res.writableEnded) {
        return Promise.resolve(false);
      }
      return new Promise((resolve) => {
        const settle = (written: boolean): void => {
          pendingWrites.delete(settle);
          resolve(written);
        };
        pendingWrites.add(settle);
        res.write(frame, (error) => {
          if (error) {
            markClosed();
            settle(false);
            return;
          }
          settle(true);
        });
      });
    },
    end() {
      if (!res.writableEnded && !res.destroyed) {
        res.end();
      }
    },
    onClose(listener) {
      if (closed) {
        listener();
        return () => {};
      }
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
