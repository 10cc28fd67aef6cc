// backend/services/gp/src/bootstrap.ts
/**
 * Purpose:
 * - Load envs via the shared cascade (repo → service). Side-effect module:
 *   import it first from index.ts, before anything reads process.env.
 * - The service layer is resolved from the repo root, so a build under
 *   dist/ still reads backend/services/gp/.env*.
 */

import { loadEnvCascadeForService } from "../../shared/src/env";
import { serviceRootFrom } from "./config";

export const loadedEnvFiles = loadEnvCascadeForService(
  serviceRootFrom(__dirname)
);
