// backend/services/gp/src/log.init.ts
import { initLogger } from "../../shared/src/utils/logger";
import { SERVICE_NAME } from "./config";

/**
 * Side-effect module: initializes the shared logger with this service's name.
 * After this runs, every `logger` import is tagged with { service: "gp" }.
 */
initLogger(SERVICE_NAME);
