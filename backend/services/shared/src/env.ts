// backend/services/shared/src/env.ts

/**
 * Purpose:
 * - Deterministic environment loading for every service with strict precedence:
 *   repo root → service root. Later wins.
 * - Per NODE_ENV, try these at each layer:
 *   dev:        .env.dev → .env
 *   test:       .env.test
 *   production: .env (optional; prefer injected env)
 *
 * Notes:
 * - Only the env cascade lives here. Each service maps env vars onto its own
 *   settings and validates them.
 * - Values already present in process.env are never overwritten by files.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

/** Walk up to the nearest directory holding a package.json. */
export function findRepoRoot(start: string): string {
  let dir = path.resolve(start);
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(start);
    dir = parent;
  }
}

/** Load a single env file if it exists; expand; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath });
  if (parsed.error) {
    throw new Error(
      `Failed to load env file: ${absPath}: ${String(parsed.error)}`
    );
  }
  dotenvExpand.expand(parsed);
  return true;
}

export function envFilesForMode(mode: string): string[] {
  switch (mode) {
    case "dev":
    case "development":
      return [".env.dev", ".env"];
    case "test":
      return [".env.test"];
    default:
      return [".env"];
  }
}

/**
 * Cascading loader for a service.
 * Accepts the service root or its src/ directory.
 * Returns the files that were actually loaded, in load order.
 */
export function loadEnvCascadeForService(
  serviceRootAbs: string,
  opts: { requireFiles?: boolean } = {}
): string[] {
  const mode = (process.env.NODE_ENV || "development").trim();

  const servicePath = path.resolve(serviceRootAbs);
  const serviceRoot =
    path.basename(servicePath) === "src"
      ? path.dirname(servicePath)
      : servicePath;
  const repoRoot = findRepoRoot(serviceRoot);

  const layers = repoRoot === serviceRoot ? [repoRoot] : [repoRoot, serviceRoot];
  const candidates: string[] = [];
  for (const dir of layers) {
    for (const name of envFilesForMode(mode)) {
      candidates.push(path.join(dir, name));
    }
  }

  const loaded = candidates.filter((p) => loadIfExists(p));

  if (!loaded.length && opts.requireFiles) {
    throw new Error(
      `No env files found for mode="${mode}". Looked in:\n` +
        candidates.map((p) => `  - ${p}`).join("\n")
    );
  }
  return loaded;
}
