// backend/services/shared/test/bindDb.spec.ts
import { describe, it, expect } from "vitest";
import express from "express";
import request from "supertest";
import { MongoClient } from "mongodb";
import { bindDb } from "../src/middleware/bindDb";
import { MongoConnection } from "../src/db/SharedConnection";
import { resolveMongoTarget } from "../src/db/mongo/mongoUri";

function makeConnection(): MongoConnection {
  const target = resolveMongoTarget("mongodb://h", 27017);
  return new MongoConnection(new MongoClient(target.uri), target);
}

describe("bindDb", () => {
  it("sets req.db to the named sub-database before the handler runs", async () => {
    const conn = makeConnection();
    const app = express();
    app.use(bindDb(conn, "moe"));
    app.get("/", (req, res) => {
      res.json({
        name: req.db?.databaseName,
        shared: req.db === conn.db("moe"),
      });
    });

    const res = await request(app).get("/").expect(200);
    expect(res.body).toEqual({ name: "moe", shared: true });
  });

  it("hands every request the same handle", async () => {
    const conn = makeConnection();
    const seen: unknown[] = [];
    const app = express();
    app.use(bindDb(conn, "moe"));
    app.get("/", (req, res) => {
      seen.push(req.db);
      res.end();
    });

    await request(app).get("/");
    await request(app).get("/");
    await request(app).get("/");

    expect(seen).toHaveLength(3);
    expect(new Set(seen).size).toBe(1);
  });
});
