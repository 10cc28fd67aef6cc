// backend/services/shared/src/utils/logger.ts
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger (authoritative)
 *
 * ❗️Each service MUST call `initLogger(SERVICE_NAME)` at bootstrap
 *    BEFORE creating any request loggers (e.g., pino-http).
 *
 * Usage:
 *   import { initLogger } from "../../shared/src/utils/logger";
 *   initLogger(SERVICE_NAME);
 *
 * Env:
 * - LOG_LEVEL (optional) fatal|error|warn|info|debug|trace|silent [default: info]
 */

const validLevels = new Set<string>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

export function resolveLogLevel(raw: string | undefined): LevelWithSilent {
  const v = (raw ?? "info").trim().toLowerCase() || "info";
  if (!isLevel(v)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return v;
}

// NOTE: Avoid stamping "service":"unknown". Start with NO base.service.
//       After initLogger(), we recreate the logger with base.service set.
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): Logger {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({
    ...pinoOptions,
    level: resolveLogLevel(process.env.LOG_LEVEL),
    base: { service: SERVICE_NAME },
  });
  return logger;
}

export function currentServiceName(): string {
  return SERVICE_NAME || "uninitialized";
}

/** Optional: set level dynamically (e.g., in tests) */
export function setLogLevel(level: string): void {
  logger.level = resolveLogLevel(level);
}
