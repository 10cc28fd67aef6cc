// backend/services/shared/src/middleware/requestId.ts

/**
 * Purpose:
 * - Every inbound request carries a stable correlation key so that access
 *   logs and error bodies can be tied together.
 *
 * Notes:
 * - Order matters. This must run **before** the http logger.
 * - Never overwrites a caller-supplied ID. A UUID is minted only if the
 *   request lacks all recognized headers.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 *   The response always echoes `x-request-id`.
 */

import type { IncomingHttpHeaders } from "node:http";
import type { Request, RequestHandler } from "express";
import { randomUUID } from "node:crypto";

export const REQUEST_ID_HEADERS = [
  "x-request-id",
  "x-correlation-id",
  "x-amzn-trace-id",
] as const;

/** First non-empty correlation header, if any. */
export function headerRequestId(
  headers: IncomingHttpHeaders
): string | undefined {
  for (const name of REQUEST_ID_HEADERS) {
    const raw = headers[name];
    const v = Array.isArray(raw) ? raw[0] : raw;
    if (v && v.trim()) return v.trim();
  }
  return undefined;
}

/** The id assigned by requestIdMiddleware, when it has run. */
export function requestIdOf(req: Request): string | undefined {
  return typeof req.id === "string" && req.id ? req.id : undefined;
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = headerRequestId(req.headers) ?? randomUUID();
    req.id = id;
    res.setHeader("x-request-id", id);
    next();
  };
}
