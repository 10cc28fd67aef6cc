// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Purpose:
 * - Starting/stopping an HTTP server is a **single concern**: bind, harden
 *   socket timeouts, log where it landed (port 0 in tests), and shut down cleanly.
 * - Higher-level bootstraps (env load, logger init, app assembly) call this;
 *   this file never loads envs or mutates global state beyond signal handlers.
 *
 * Notes:
 * - Uses `process.once` for SIGINT/SIGTERM so multiple calls don’t multiply handlers.
 * - Exposes `stop()` for test harnesses and orderly shutdowns.
 * - headersTimeout > keepAliveTimeout.
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  /** Allow 0 in tests to get an ephemeral port. */
  port: number;
  host?: string;
  serviceName: string;
  logger: Logger;
  /** Runs after the server has closed, before the process exits. */
  onShutdown?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  /** Resolves with the bound port once the server is listening. */
  listening: Promise<number>;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const { app, port, host, serviceName, logger, onShutdown } = opts;

  const server = host ? app.listen(port, host) : app.listen(port);

  const listening = new Promise<number>((resolve) => {
    server.once("listening", () => {
      const addr = server.address();
      const boundPort = addr && typeof addr === "object" ? addr.port : port;
      logger.info({ service: serviceName, port: boundPort }, "service listening");
      resolve(boundPort);
    });
  });

  // Socket hardening
  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
    process.exit(1);
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    stop()
      .then(() => onShutdown?.())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err, service: serviceName }, "shutdown failed");
          process.exit(1);
        }
      );
    // Fail-safe in case close hangs
    setTimeout(() => process.exit(1), 10_000).unref();
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return { server, listening, stop };
}
