// backend/services/shared/src/types/express.d.ts

import type { Db } from "mongodb";

/**
 * Global Express request augmentation used by all services.
 * - db: sub-database of the shared connection, set by the request binder
 *   (absent when the service runs without a database)
 */
declare global {
  namespace Express {
    interface Request {
      db?: Db;
    }
  }
}

export {};
