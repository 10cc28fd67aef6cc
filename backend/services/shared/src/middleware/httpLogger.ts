// backend/services/shared/src/middleware/httpLogger.ts

/**
 * Purpose:
 * - Consistent, structured access logs: every line carries `service` and
 *   `reqId`.
 *
 * Order:
 * - Mount this immediately after `requestIdMiddleware` so `req.id` is already
 *   populated.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health probes and favicons are not logged.
 */

import pinoHttp, { type HttpLogger } from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { logger as rootLogger } from "../utils/logger";
import { headerRequestId } from "./requestId";

const QUIET_PATHS = new Set([
  "/health",
  "/health/live",
  "/health/ready",
  "/healthz",
  "/readyz",
  "/favicon.ico",
]);

export function makeHttpLogger(serviceName: string): HttpLogger {
  const logger = rootLogger.child({ service: serviceName });

  return pinoHttp({
    logger,

    // Reuse req.id from requestIdMiddleware; otherwise headers; else mint.
    genReqId: (req, res) => {
      if (typeof req.id === "string" && req.id) return req.id;
      const id = headerRequestId(req.headers) ?? randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },

    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
