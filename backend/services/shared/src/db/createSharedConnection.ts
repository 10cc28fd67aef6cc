// backend/services/shared/src/db/createSharedConnection.ts
/**
 * Purpose:
 * - Connection Factory: settings in, one SharedConnection (or nothing) out.
 *
 * Notes:
 * - Disabled → returns undefined without touching the driver.
 * - Connect failures are fatal. They surface as StartupError
 *   ("DB_CONNECT_FAILED") with the driver error as `cause`; no retry.
 */

import { StartupError } from "../errors/StartupError";
import { logger } from "../utils/logger";
import { MongoDbFactory } from "./mongo/MongoDbFactory";
import { redactMongoUri, resolveMongoTarget } from "./mongo/mongoUri";
import {
  DisplayableMongoConnection,
  MongoConnection,
  type SharedConnection,
} from "./SharedConnection";
import type { IDbFactory } from "./types";

export type ConnectionFactoryOptions =
  | { enabled: false }
  | {
      enabled: true;
      url: string;
      port: number;
      /** Pick the variant that can render itself for the debug toolbar. */
      displayable?: boolean;
    };

export async function createSharedConnection(
  opts: ConnectionFactoryOptions,
  factory: IDbFactory = new MongoDbFactory()
): Promise<SharedConnection | undefined> {
  if (!opts.enabled) return undefined;

  const target = resolveMongoTarget(opts.url, opts.port);
  const Variant = opts.displayable ? DisplayableMongoConnection : MongoConnection;

  let conn: SharedConnection;
  try {
    const client = await factory.connect({ uri: target.uri });
    conn = new Variant(client, target);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new StartupError(
      "DB_CONNECT_FAILED",
      `could not connect to ${redactMongoUri(target.uri)}: ${msg}`,
      { cause: err }
    );
  }

  logger.info(
    {
      component: "mongodb",
      uri: conn.uri,
      displayable: Boolean(opts.displayable),
    },
    "[MongoDB] Connected"
  );
  return conn;
}
