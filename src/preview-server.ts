import fs, { type FileHandle } from "node:fs/promises";
import type { ServerResponse } from "node:http";
import http from "node:http";
import { extractFragment, type ContentExtractor } from "./content-extractor.js";
import type { EventCoordinator } from "./event-coordinator.js";
import {
  createResponseSink,
  runEventStream,
  type SessionEnd,
} from "./event-stream.js";
import {
  errorMessage,
  formatRequestLine,
  type Logger,
  silentLogger,
} from "./logger.js";

export interface PreviewServer {
  url: string;
  port: number;
  sessionCount(): number;
  /** Tells every session to say goodbye, then stops the listener. */
  close(): Promise<void>;
}

export interface CreatePreviewServerOptions {
  filePath: string;
  coordinator: EventCoordinator;
  extract?: ContentExtractor;
  host?: string;
  port?: number;
  logger?: Logger;
  /** How long `close()` waits for sessions before dropping their sockets. */
  shutdownGraceMs?: number;
}

const DEFAULT_HOST = "127.0.0.1";

export const SHUTDOWN_GRACE_MS = 5_000;

const EVENT_STREAM_HEADERS = {
  "content-type": "text/event-stream",
  "cache-control": "no-cache, no-store, must-revalidate",
  connection: "close",
  "x-accel-buffering": "no",
};

export async function createPreviewServer(
  options: CreatePreviewServerOptions,
): Promise<PreviewServer> {
  const { filePath, coordinator } = options;
  const extract = options.extract ?? extractFragment;
  const logger = options.logger ?? silentLogger;
  const host = options.host ?? DEFAULT_HOST;
  const shutdownGraceMs = options.shutdownGraceMs ?? SHUTDOWN_GRACE_MS;
  const sessions = new Set<Promise<SessionEnd>>();

  const server = http.createServer((req, res) => {
    res.on("finish", () => {
      logger.info(
        formatRequestLine(req.method, req.url, req.httpVersion, res.statusCode),
      );
    });

    if (!req.url) {
      sendStatus(res, 400);
      return;
    }

    if (req.method !== "GET" && req.method !== "HEAD") {
      sendStatus(res, 501);
      return;
    }

    const requestPath = stripQuery(req.url);

    if (requestPath === "/") {
      void serveFile(res, filePath).catch((error) => {
        logger.error(`Failed to serve ${filePath}: ${errorMessage(error)}`);
        res.destroy();
      });
      return;
    }

    if (requestPath === "/events") {
      if (req.method === "HEAD") {
        res.writeHead(200, EVENT_STREAM_HEADERS);
        res.end();
        return;
      }
      openEventStream(res);
      return;
    }

    sendStatus(res, 404);
  });

  const openEventStream = (res: ServerResponse): void => {
    res.writeHead(200, EVENT_STREAM_HEADERS);
    res.flushHeaders();

    const session = runEventStream({
      coordinator,
      sink: createResponseSink(res),
      extract: () => extract(filePath),
      logger,
    });
    sessions.add(session);
    void session.finally(() => {
      sessions.delete(session);
    });
  };

  const port: number = await new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port ?? 0, host, () => {
      server.off("error", reject);
      const address = server.address();
      if (address && typeof address === "object") {
        resolve(address.port);
      } else {
        reject(new Error("Unable to determine server port"));
      }
    });
  });

  server.on("error", (error) => {
    logger.error(`HTTP server error: ${errorMessage(error)}`);
  });

  let closing: Promise<void> | undefined;

  const shutdown = async (): Promise<void> => {
    coordinator.requestShutdown();
    const closed = new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    if (!(await settlesWithin(Promise.all(sessions), shutdownGraceMs))) {
      logger.warn("Sessions not responding, force closing connections...");
      server.closeAllConnections();
      await Promise.all(sessions);
    }
    server.closeIdleConnections();
    await closed;
  };

  const close = (): Promise<void> => {
    closing ??= shutdown();
    return closing;
  };

  return {
    url: `http://${host}:${port}/`,
    port,
    sessionCount: () => sessions.size,
    close,
  };
}

/** Request targets are matched as sent; `//events` is not `/events`. */
function stripQuery(target: string): string {
  const query = target.indexOf("?");
  return query === -1 ? target : target.slice(0, query);
}

function settlesWithin(task: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    const done = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    void task.then(done, done);
  });
}

async function serveFile(
  res: ServerResponse,
  filePath: string,
): Promise<void> {
  const target = await readTarget(filePath);
  if (!target) {
    res.writeHead(200, {
      "content-type": "text/html",
      "content-length": "0",
    });
    res.end();
    return;
  }

  res.writeHead(200, {
    "content-type": "text/html",
    "content-length": String(target.body.byteLength),
    "last-modified": target.modifiedAt.toUTCString(),
  });
  res.end(target.body);
}

async function readTarget(
  filePath: string,
): Promise<{ body: Buffer; modifiedAt: Date } | undefined> {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, "r");
  } catch {
    return undefined;
  }
  try {
    const stat = await handle.stat();
    const body = await handle.readFile();
    return { body, modifiedAt: stat.mtime };
  } catch {
    return undefined;
  } finally {
    await handle.close();
  }
}

function sendStatus(res: ServerResponse, status: number): void {
  const message = http.STATUS_CODES[status] ?? "Error";
  res.writeHead(status, { "content-type": "text/plain; charset=utf-8" });
  res.end(`${status} ${message}\n`);
}
