// backend/services/shared/src/health.ts

/**
 * Purpose:
 * - Liveness and readiness endpoints with stable URLs and a compact shape.
 * - Liveness answers “is the process up?” (no dependencies).
 * - Readiness answers “can this instance take traffic?” (fast, bounded checks).
 *
 * Exposes:
 *   GET /health         -> liveness
 *   GET /health/live    -> liveness
 *   GET /health/ready   -> readiness
 *   GET /healthz        -> k8s-style liveness
 *   GET /readyz         -> k8s-style readiness
 */

import express, { type Request, type Response, type Router } from "express";
import { requestIdOf } from "./middleware/requestId";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

export type HealthRouterOptions = {
  service: string;
  env?: string;
  version?: string;
  readiness?: ReadinessFn;
};

export const HEALTH_PATHS = [
  "/health",
  "/health/live",
  "/health/ready",
  "/healthz",
  "/readyz",
] as const;

export function createHealthRouter(opts: HealthRouterOptions): Router {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
    version: opts.version,
  };

  const liveness = (req: Request, res: Response) => {
    res.json({ ...base, ok: true, requestId: requestIdOf(req) });
  };

  const readiness = async (req: Request, res: Response) => {
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({ ...base, ok: true, requestId: requestIdOf(req), ...details });
    } catch (err) {
      // 503 = not ready; include safe error text only.
      res.status(503).json({
        ...base,
        ok: false,
        requestId: requestIdOf(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/health/ready", readiness);
  router.get("/healthz", liveness);
  router.get("/readyz", readiness);

  return router;
}
