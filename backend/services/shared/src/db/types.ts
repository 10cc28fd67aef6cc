// backend/services/shared/src/db/types.ts
/**
 * Purpose:
 * - Seam between the connection layer and the driver so services (and tests)
 *   can swap how a client gets connected.
 */

import type { MongoClient } from "mongodb";

export interface IDbConnectionInfo {
  /** Fully resolved connection string (host and port included). */
  uri: string;
}

export interface IDbFactory {
  /**
   * Return a connected client. Rejects if the server cannot be reached or
   * refuses the credentials.
   */
  connect(info: IDbConnectionInfo): Promise<MongoClient>;
}
