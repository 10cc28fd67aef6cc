// backend/services/shared/src/db/SharedConnection.ts
/**
 * Purpose:
 * - The one process-wide database connection, borrowed by every request.
 * - Two variants behind one interface, picked once at startup:
 *   - MongoConnection            (plain)
 *   - DisplayableMongoConnection (adds render() for the debug toolbar)
 *
 * Invariants:
 * - Never mutated after construction; Db handles are created once per name
 *   and reused, so every request sees the same handle instance.
 * - render() changes display only. Reads and writes are identical across
 *   variants.
 */

import type { Db, MongoClient } from "mongodb";
import type { MongoTarget } from "./mongo/mongoUri";
import { redactMongoUri } from "./mongo/mongoUri";

export interface SharedConnection {
  readonly host: string;
  readonly port: number;
  /** Connection string with credentials redacted. */
  readonly uri: string;
  readonly client: MongoClient;
  /** Handle to a logical sub-database. */
  db(name: string): Db;
  ping(): Promise<void>;
  close(): Promise<void>;
  toString(): string;
  /** Present on the displayable variant only. */
  render?(): string;
}

export type DisplayableConnection = SharedConnection & { render(): string };

export function isDisplayable(
  conn: SharedConnection
): conn is DisplayableConnection {
  return typeof conn.render === "function";
}

export class MongoConnection implements SharedConnection {
  public readonly host: string;
  public readonly port: number;
  public readonly uri: string;
  public readonly client: MongoClient;
  private readonly dbs = new Map<string, Db>();

  constructor(client: MongoClient, target: MongoTarget) {
    this.client = client;
    this.host = target.host;
    this.port = target.port;
    this.uri = redactMongoUri(target.uri);
  }

  public db(name: string): Db {
    const hit = this.dbs.get(name);
    if (hit) return hit;
    const db = this.client.db(name);
    this.dbs.set(name, db);
    return db;
  }

  public async ping(): Promise<void> {
    await this.client.db("admin").command({ ping: 1 });
  }

  public async close(): Promise<void> {
    await this.client.close();
  }

  public toString(): string {
    return this.uri;
  }
}

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export class DisplayableMongoConnection extends MongoConnection {
  public render(): string {
    return `MongoDB: <b>${escapeHtml(this.toString())}</b>`;
  }
}
