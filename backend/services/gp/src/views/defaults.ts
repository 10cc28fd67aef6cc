// backend/services/gp/src/views/defaults.ts
/**
 * Purpose:
 * - Views mounted when the caller supplies none for a route.
 * - home/docs/about describe the service; GP endpoints answer 501 until a
 *   computation handler is registered for them.
 */

import type { RequestHandler } from "express";
import { sendProblem } from "../../../shared/src/middleware/problemJson";
import type { GpRouteName, RouteTable } from "../routes/routeTable";

export type ViewMap = Partial<Record<GpRouteName, RequestHandler>>;

export type ViewContext = {
  serviceName: string;
  version: string;
  routes: RouteTable<GpRouteName>;
  databaseEnabled: boolean;
};

export function notImplemented(name: GpRouteName): RequestHandler {
  return (req, res) => {
    sendProblem(req, res, {
      type: "about:blank",
      title: "Not Implemented",
      status: 501,
      code: "NOT_IMPLEMENTED",
      detail: `No handler is registered for route "${name}".`,
    });
  };
}

export function defaultViews(
  ctx: ViewContext
): Record<GpRouteName, RequestHandler> {
  const { serviceName, version, routes, databaseEnabled } = ctx;

  return {
    home: (_req, res) => {
      res.json({ service: serviceName, routes: routes.entries });
    },
    docs: (_req, res) => {
      res.json({
        service: serviceName,
        endpoints: routes.entries.filter((r) => r.path.startsWith("/gp/")),
      });
    },
    about: (_req, res) => {
      res.json({
        service: serviceName,
        version,
        database: databaseEnabled ? "enabled" : "disabled",
      });
    },
    gp_ei: notImplemented("gp_ei"),
    gp_ei_pretty: notImplemented("gp_ei_pretty"),
    gp_mean_var: notImplemented("gp_mean_var"),
    gp_mean_var_pretty: notImplemented("gp_mean_var_pretty"),
    gp_next_points_epi: notImplemented("gp_next_points_epi"),
    gp_next_points_epi_pretty: notImplemented("gp_next_points_epi_pretty"),
  };
}
