// backend/services/shared/src/db/mongo/mongoUri.ts
/**
 * Purpose:
 * - Turn the (url, port) pair from settings into one connection string.
 *
 * Rules:
 * - A bare host gets the `mongodb://` scheme.
 * - The port is appended only to a single host that names none.
 * - `mongodb+srv://` and multi-host seed lists are left as written.
 */

import { StartupError } from "../../errors/StartupError";

export type MongoTarget = {
  uri: string;
  host: string;
  port: number;
};

const SCHEME_RE = /^([a-z][a-z0-9+.-]*):\/\//i;

function splitHostPort(host: string): { name: string; port?: number } {
  // [v6]:port
  if (host.startsWith("[")) {
    const close = host.indexOf("]");
    const name = host.slice(0, close + 1);
    const rest = host.slice(close + 1);
    return rest.startsWith(":") ? { name, port: Number(rest.slice(1)) } : { name };
  }
  const colon = host.lastIndexOf(":");
  if (colon === -1) return { name: host };
  return { name: host.slice(0, colon), port: Number(host.slice(colon + 1)) };
}

export function resolveMongoTarget(url: string, port: number): MongoTarget {
  const trimmed = url.trim();
  const m = SCHEME_RE.exec(trimmed);
  const scheme = m ? m[1].toLowerCase() : "mongodb";
  const rest = m ? trimmed.slice(m[0].length) : trimmed;

  if (scheme !== "mongodb" && scheme !== "mongodb+srv") {
    throw new StartupError(
      "CONFIG_INVALID",
      `unsupported mongodb url scheme "${scheme}"`
    );
  }

  const cut = rest.search(/[/?]/);
  const authority = cut === -1 ? rest : rest.slice(0, cut);
  const tail = cut === -1 ? "" : rest.slice(cut);
  const at = authority.lastIndexOf("@");
  const credentials = at === -1 ? "" : authority.slice(0, at + 1);
  const hosts = authority.slice(at + 1);

  if (!hosts) {
    throw new StartupError("CONFIG_INVALID", "mongodb url names no host");
  }

  if (scheme === "mongodb+srv" || hosts.includes(",")) {
    return { uri: `${scheme}://${authority}${tail}`, host: hosts, port };
  }

  const { name, port: explicit } = splitHostPort(hosts);
  if (explicit !== undefined) {
    if (!Number.isInteger(explicit) || explicit < 1 || explicit > 65535) {
      throw new StartupError(
        "CONFIG_INVALID",
        `mongodb url has an invalid port "${hosts}"`
      );
    }
    return { uri: `${scheme}://${authority}${tail}`, host: name, port: explicit };
  }

  return {
    uri: `${scheme}://${credentials}${name}:${port}${tail}`,
    host: name,
    port,
  };
}

/** Never log credentials. Only the userinfo of the authority is masked. */
export function redactMongoUri(uri: string): string {
  return uri.replace(/^([a-z][a-z0-9+.-]*:\/\/)[^/?#]*@/i, "$1***:***@");
}
