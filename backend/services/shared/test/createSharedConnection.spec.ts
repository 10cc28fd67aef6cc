// backend/services/shared/test/createSharedConnection.spec.ts
import { describe, it, expect } from "vitest";
import { MongoClient } from "mongodb";
import { createSharedConnection } from "../src/db/createSharedConnection";
import {
  DisplayableMongoConnection,
  MongoConnection,
  isDisplayable,
} from "../src/db/SharedConnection";
import { StartupError } from "../src/errors/StartupError";
import { FakeDbFactory } from "../src/testing/FakeDbFactory";

describe("FakeDbFactory", () => {
  it("hands back an unconnected MongoClient for the requested uri", async () => {
    const factory = new FakeDbFactory();
    const client = await factory.connect({ uri: "mongodb://h:27017" });
    expect(client).toBeInstanceOf(MongoClient);
    expect(factory.calls).toEqual([{ uri: "mongodb://h:27017" }]);
  });

  it("rejects with the configured error", async () => {
    const boom = new Error("refused");
    await expect(
      new FakeDbFactory({ failWith: boom }).connect({ uri: "mongodb://h:1" })
    ).rejects.toBe(boom);
  });
});

describe("createSharedConnection", () => {
  it("creates nothing and never touches the driver when disabled", async () => {
    const factory = new FakeDbFactory();
    const conn = await createSharedConnection({ enabled: false }, factory);
    expect(conn).toBeUndefined();
    expect(factory.calls).toHaveLength(0);
  });

  it("connects once to the resolved host and port", async () => {
    const factory = new FakeDbFactory();
    const conn = await createSharedConnection(
      { enabled: true, url: "mongodb://h", port: 27017 },
      factory
    );

    expect(factory.calls).toEqual([{ uri: "mongodb://h:27017" }]);
    expect(conn).toBeInstanceOf(MongoConnection);
    expect(conn?.host).toBe("h");
    expect(conn?.port).toBe(27017);
    expect(conn?.toString()).toBe("mongodb://h:27017");
  });

  it("keeps the host in its identity when the query holds an @", async () => {
    const conn = await createSharedConnection(
      { enabled: true, url: "mongodb://h/moe?appName=ops@gp", port: 27017 },
      new FakeDbFactory()
    );
    expect(conn?.uri).toBe("mongodb://h:27017/moe?appName=ops@gp");
  });

  it("plain variant carries no render capability", async () => {
    const conn = await createSharedConnection(
      { enabled: true, url: "mongodb://h", port: 27017, displayable: false },
      new FakeDbFactory()
    );
    expect(conn).toBeDefined();
    if (!conn) return;
    expect(conn.render).toBeUndefined();
    expect("render" in conn).toBe(false);
    expect(isDisplayable(conn)).toBe(false);
  });

  it("displayable variant renders its identity for the debug toolbar", async () => {
    const conn = await createSharedConnection(
      { enabled: true, url: "mongodb://h", port: 27017, displayable: true },
      new FakeDbFactory()
    );
    expect(conn).toBeInstanceOf(DisplayableMongoConnection);
    if (!conn || !isDisplayable(conn)) throw new Error("expected displayable");

    expect(conn.render()).toBe("MongoDB: <b>mongodb://h:27017</b>");
    expect(conn.render()).toContain("MongoDB:");
  });

  it("never renders credentials", async () => {
    const conn = await createSharedConnection(
      {
        enabled: true,
        url: "mongodb://reader:test-secret@h",
        port: 27017,
        displayable: true,
      },
      new FakeDbFactory()
    );
    if (!conn || !isDisplayable(conn)) throw new Error("expected displayable");
    expect(conn.uri).toBe("mongodb://***:***@h:27017");
    expect(conn.render()).toBe("MongoDB: <b>mongodb://***:***@h:27017</b>");
  });

  it("hands out one Db handle per name", async () => {
    const conn = await createSharedConnection(
      { enabled: true, url: "mongodb://h", port: 27017 },
      new FakeDbFactory()
    );
    if (!conn) throw new Error("expected connection");

    const a = conn.db("moe");
    expect(conn.db("moe")).toBe(a);
    expect(a.databaseName).toBe("moe");
    expect(conn.db("other")).not.toBe(a);
  });

  it("turns a connect failure into a fatal StartupError", async () => {
    const cause = new Error("connection refused");
    const factory = new FakeDbFactory({ failWith: cause });

    const err = await createSharedConnection(
      { enabled: true, url: "mongodb://reader:test-secret@h", port: 27017 },
      factory
    ).then(
      () => undefined,
      (e: unknown) => e
    );

    expect(StartupError.is(err)).toBe(true);
    if (!StartupError.is(err)) return;
    expect(err.code).toBe("DB_CONNECT_FAILED");
    expect(err.message).toBe(
      "DB_CONNECT_FAILED: could not connect to mongodb://***:***@h:27017: connection refused"
    );
    expect(err.cause).toBe(cause);
    expect(factory.calls).toHaveLength(1);
  });
});
