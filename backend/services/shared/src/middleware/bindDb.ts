// backend/services/shared/src/middleware/bindDb.ts
/**
 * Purpose:
 * - Request binder: exposes one sub-database of the shared connection on
 *   every request as `req.db`, before any route handler runs.
 *
 * Invariants:
 * - The connection is injected here once; nothing is looked up per request.
 * - Only mounted when a connection exists. Handlers never see a
 *   missing-but-expected `req.db`.
 * - Additive only: sets one field, never closes or replaces the connection.
 */

import type { RequestHandler } from "express";
import type { SharedConnection } from "../db/SharedConnection";

export function bindDb(conn: SharedConnection, dbName: string): RequestHandler {
  return (req, _res, next) => {
    req.db = conn.db(dbName);
    next();
  };
}
