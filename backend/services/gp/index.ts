// backend/services/gp/index.ts
/**
 * Start-up: load env (bootstrap), init logs, assemble the app (which opens
 * the shared connection when enabled), then start HTTP.
 * Any startup failure is fatal: log it and exit(1).
 */

import { loadedEnvFiles } from "./src/bootstrap";
import "./src/log.init";

import { createApp } from "./src/app";
import { readSettings, SERVICE_NAME } from "./src/config";
import { StartupError } from "../shared/src/errors/StartupError";
import { logger } from "../shared/src/utils/logger";
import { startHttpService } from "../shared/src/bootstrap/startHttpService";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start(): Promise<void> {
  logger.debug({ envFiles: loadedEnvFiles }, "env loaded");

  const { app, config, connection } = await createApp(readSettings());

  const svc = startHttpService({
    app,
    port: config.httpPort,
    serviceName: SERVICE_NAME,
    logger,
    onShutdown: connection ? () => connection.close() : undefined,
  });
  await svc.listening;
}

start().catch((err: unknown) => {
  logger.error(
    { err, code: StartupError.is(err) ? err.code : undefined },
    `failed to start ${SERVICE_NAME} service`
  );
  process.exit(1);
});
