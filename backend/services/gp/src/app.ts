// backend/services/gp/src/app.ts
/**
 * Purpose:
 * - Application assembler. Runs once at process start:
 *   config → route table → views → (use_mongo) shared connection → pipeline.
 * - Pipeline: requestId → httpLogger → (db) bindDb → health → /static →
 *   named routes → 404 → error.
 *
 * Invariants:
 * - The only I/O is the connection factory. Route and view problems are
 *   detected before it runs.
 * - Any throw aborts assembly; no partially built app is returned.
 * - The connection reaches the binder by closure, never through settings.
 */

import express, { type Express, type RequestHandler } from "express";
import { createSharedConnection } from "../../shared/src/db/createSharedConnection";
import type { SharedConnection } from "../../shared/src/db/SharedConnection";
import type { IDbFactory } from "../../shared/src/db/types";
import { StartupError } from "../../shared/src/errors/StartupError";
import { createHealthRouter, HEALTH_PATHS } from "../../shared/src/health";
import { bindDb } from "../../shared/src/middleware/bindDb";
import { makeHttpLogger } from "../../shared/src/middleware/httpLogger";
import {
  errorProblemJson,
  notFoundProblemJson,
} from "../../shared/src/middleware/problemJson";
import { requestIdMiddleware } from "../../shared/src/middleware/requestId";
import { parseConfig, SERVICE_NAME, type GpConfig, type Settings } from "./config";
import {
  createRouteTable,
  type GpRouteName,
  type RouteTable,
} from "./routes/routeTable";
import { defaultViews, type ViewMap } from "./views/defaults";

export const STATIC_PREFIX = "/static";

export type CreateAppOptions = {
  serviceName?: string;
  version?: string;
  /** Driver factory for the shared connection (tests pass a fake). */
  dbFactory?: IDbFactory;
  /** Handlers by route name; unnamed routes keep their default view. */
  views?: ViewMap;
};

export type AssembledApp = {
  app: Express;
  config: GpConfig;
  routes: RouteTable<GpRouteName>;
  connection?: SharedConnection;
};

function resolveViews(
  routes: RouteTable<GpRouteName>,
  defaults: Record<GpRouteName, RequestHandler>,
  supplied: ViewMap
): Record<GpRouteName, RequestHandler> {
  const views = { ...defaults };
  for (const [name, view] of Object.entries(supplied)) {
    if (!routes.has(name)) {
      throw new StartupError(
        "CONFIG_INVALID",
        `view supplied for unknown route "${name}"`
      );
    }
    if (view) views[name] = view;
  }
  return views;
}

export async function createApp(
  settings: Settings,
  options: CreateAppOptions = {}
): Promise<AssembledApp> {
  const serviceName = options.serviceName ?? SERVICE_NAME;
  const version = options.version ?? process.env.npm_package_version ?? "dev";

  const config = parseConfig(settings);
  const routes = createRouteTable();
  const views = resolveViews(
    routes,
    defaultViews({
      serviceName,
      version,
      routes,
      databaseEnabled: config.mongo.enabled,
    }),
    options.views ?? {}
  );

  const connection = config.mongo.enabled
    ? await createSharedConnection(
        {
          enabled: true,
          url: config.mongo.url,
          port: config.mongo.port,
          displayable: config.debugToolbar,
        },
        options.dbFactory
      )
    : undefined;

  const app = express();
  app.set("case sensitive routing", true);
  app.set("strict routing", true);
  app.disable("x-powered-by");

  // ── Transport & telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));

  // ── Request binder (only when a connection exists) ─────────────────────────
  if (connection && config.mongo.enabled) {
    app.use(bindDb(connection, config.mongo.dbName));
  }

  // ── Health (public) ─────────────────────────────────────────────────────────
  app.use(
    createHealthRouter({
      service: serviceName,
      version,
      readiness: async () => {
        if (!connection) return { mongo: "disabled" };
        await connection.ping();
        return { mongo: "ok" };
      },
    })
  );

  // ── Static assets ───────────────────────────────────────────────────────────
  app.use(STATIC_PREFIX, express.static(config.staticDir));

  // ── Body parsers + named routes ─────────────────────────────────────────────
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  const router = express.Router({ caseSensitive: true, strict: true });
  for (const entry of routes.entries) {
    router.route(entry.path).get(views[entry.name]).post(views[entry.name]);
  }
  app.use(router);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(notFoundProblemJson(["/gp", "/docs", "/about", ...HEALTH_PATHS]));
  app.use(errorProblemJson());

  return { app, config, routes, connection };
}
