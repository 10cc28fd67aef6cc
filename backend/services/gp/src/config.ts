// backend/services/gp/src/config.ts

/**
 * Purpose:
 * - Map env vars onto the service's flat settings (read once, frozen).
 * - Validate settings into a typed GpConfig. Anything missing or malformed
 *   throws StartupError before the app is assembled.
 *
 * Notes:
 * - No defaults for database keys: when `use_mongo` is "true", url, port and
 *   db_name must all be present.
 * - The debug toolbar is detected from the `includes` list only.
 */

import path from "node:path";
import { z } from "zod";
import { findRepoRoot } from "../../shared/src/env";
import { StartupError } from "../../shared/src/errors/StartupError";

export const SERVICE_NAME = "gp" as const;

export type Settings = Readonly<Record<string, string>>;

/** settings key → env var */
export const SETTINGS_ENV = {
  use_mongo: "GP_USE_MONGO",
  "mongodb.url": "GP_MONGODB_URL",
  "mongodb.port": "GP_MONGODB_PORT",
  "mongodb.db_name": "GP_MONGODB_DB_NAME",
  includes: "GP_INCLUDES",
  static_dir: "GP_STATIC_DIR",
  "http.port": "GP_PORT",
} as const;

export type SettingKey = keyof typeof SETTINGS_ENV;

export const DEBUG_TOOLBAR_MARKER = "debugtoolbar";
export const DEFAULT_HTTP_PORT = 6543;
export const SERVICE_DIR = "backend/services/gp";

/** Repo-relative: the same directory from src/ and from dist/. */
export function serviceRootFrom(dir: string): string {
  return path.join(findRepoRoot(dir), SERVICE_DIR);
}

export const DEFAULT_STATIC_DIR = path.join(
  serviceRootFrom(__dirname),
  "static"
);

export function readSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const out: Record<string, string> = {};
  for (const [key, name] of Object.entries(SETTINGS_ENV)) {
    const v = env[name];
    if (v !== undefined) out[key] = v;
  }
  return Object.freeze(out);
}

export type MongoConfig =
  | { enabled: false }
  | { enabled: true; url: string; port: number; dbName: string };

export type GpConfig = {
  httpPort: number;
  staticDir: string;
  debugToolbar: boolean;
  mongo: MongoConfig;
};

const portString = (min: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, "must be an integer")
    .transform(Number)
    .refine((n) => n >= min && n <= 65535, `must be in ${min}..65535`);

const ConfigSchema = z.object({
  httpPort: portString(0),
  staticDir: z.string().trim().min(1, "must not be empty"),
  debugToolbar: z.boolean(),
  mongo: z.discriminatedUnion("enabled", [
    z.object({ enabled: z.literal(false) }),
    z.object({
      enabled: z.literal(true),
      url: z.string().trim().min(1, "must not be empty"),
      port: portString(1),
      dbName: z.string().trim().min(1, "must not be empty"),
    }),
  ]),
});

/** schema path → settings key, for error messages */
const PATH_TO_SETTING: Record<string, SettingKey> = {
  httpPort: "http.port",
  staticDir: "static_dir",
  "mongo.url": "mongodb.url",
  "mongo.port": "mongodb.port",
  "mongo.dbName": "mongodb.db_name",
};

export function splitIncludes(raw: string | undefined): string[] {
  return (raw ?? "").split(/[\s,]+/).filter(Boolean);
}

export function parseConfig(settings: Settings): GpConfig {
  const useMongo = settings.use_mongo;
  if (useMongo === undefined) {
    throw new StartupError(
      "CONFIG_MISSING",
      `setting "use_mongo" is required (env ${SETTINGS_ENV.use_mongo})`
    );
  }

  const parsed = ConfigSchema.safeParse({
    httpPort: settings["http.port"] ?? String(DEFAULT_HTTP_PORT),
    staticDir: settings.static_dir ?? DEFAULT_STATIC_DIR,
    debugToolbar: splitIncludes(settings.includes).includes(
      DEBUG_TOOLBAR_MARKER
    ),
    mongo:
      useMongo === "true"
        ? {
            enabled: true,
            url: settings["mongodb.url"],
            port: settings["mongodb.port"],
            dbName: settings["mongodb.db_name"],
          }
        : { enabled: false },
  });

  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  const key = PATH_TO_SETTING[issue.path.join(".")] ?? issue.path.join(".");
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
    throw new StartupError(
      "CONFIG_MISSING",
      `setting "${key}" is required when use_mongo is "true"`
    );
  }
  throw new StartupError("CONFIG_INVALID", `setting "${key}" ${issue.message}`);
}
