// backend/services/shared/src/db/mongo/MongoDbFactory.ts
/**
 * Purpose:
 * - MongoDB-specific factory implementing IDbFactory.
 */

import { MongoClient, type MongoClientOptions } from "mongodb";
import type { IDbConnectionInfo, IDbFactory } from "../types";

export const DEFAULT_MONGO_CLIENT_OPTIONS: MongoClientOptions = {
  serverSelectionTimeoutMS: 2000,
};

export class MongoDbFactory implements IDbFactory {
  private readonly options: MongoClientOptions;

  constructor(options: MongoClientOptions = DEFAULT_MONGO_CLIENT_OPTIONS) {
    this.options = options;
  }

  public async connect(info: IDbConnectionInfo): Promise<MongoClient> {
    const client = new MongoClient(info.uri, this.options);
    await client.connect();
    return client;
  }
}
