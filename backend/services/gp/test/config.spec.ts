// backend/services/gp/test/config.spec.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, afterEach } from "vitest";
import {
  DEFAULT_STATIC_DIR,
  SERVICE_DIR,
  parseConfig,
  readSettings,
  serviceRootFrom,
  splitIncludes,
  type Settings,
} from "../src/config";
import { loadEnvCascadeForService } from "../../shared/src/env";
import { StartupError } from "../../shared/src/errors/StartupError";

const ENABLED: Settings = {
  use_mongo: "true",
  "mongodb.url": "mongodb://h",
  "mongodb.port": "27017",
  "mongodb.db_name": "moe",
};

function failure(settings: Settings): { code: string; message: string } {
  try {
    parseConfig(settings);
  } catch (err) {
    if (StartupError.is(err)) return { code: err.code, message: err.message };
    throw err;
  }
  throw new Error("expected parseConfig to throw");
}

describe("readSettings", () => {
  it("maps known env vars onto settings keys and skips the rest", () => {
    const settings = readSettings({
      GP_USE_MONGO: "true",
      GP_MONGODB_URL: "mongodb://h",
      GP_INCLUDES: "debugtoolbar",
      UNRELATED: "x",
    });
    expect(settings).toEqual({
      use_mongo: "true",
      "mongodb.url": "mongodb://h",
      includes: "debugtoolbar",
    });
    expect(Object.isFrozen(settings)).toBe(true);
  });
});

describe("parseConfig", () => {
  it("builds the enabled database config", () => {
    expect(parseConfig(ENABLED)).toEqual({
      httpPort: 6543,
      staticDir: DEFAULT_STATIC_DIR,
      debugToolbar: false,
      mongo: { enabled: true, url: "mongodb://h", port: 27017, dbName: "moe" },
    });
  });

  it.each(["false", "TRUE", "yes", "1", ""])(
    "use_mongo=%j disables the database",
    (flag) => {
      const cfg = parseConfig({ use_mongo: flag });
      expect(cfg.mongo).toEqual({ enabled: false });
    }
  );

  it("requires use_mongo", () => {
    expect(failure({})).toEqual({
      code: "CONFIG_MISSING",
      message:
        'CONFIG_MISSING: setting "use_mongo" is required (env GP_USE_MONGO)',
    });
  });

  it("requires every database key once enabled", () => {
    const { "mongodb.db_name": _omit, ...rest } = ENABLED;
    expect(failure(rest)).toEqual({
      code: "CONFIG_MISSING",
      message:
        'CONFIG_MISSING: setting "mongodb.db_name" is required when use_mongo is "true"',
    });
  });

  it("rejects a non-numeric or out-of-range port", () => {
    expect(failure({ ...ENABLED, "mongodb.port": "abc" })).toEqual({
      code: "CONFIG_INVALID",
      message: 'CONFIG_INVALID: setting "mongodb.port" must be an integer',
    });
    expect(failure({ ...ENABLED, "mongodb.port": "70000" })).toEqual({
      code: "CONFIG_INVALID",
      message: 'CONFIG_INVALID: setting "mongodb.port" must be in 1..65535',
    });
  });

  it("accepts port 0 for the http listener", () => {
    expect(parseConfig({ ...ENABLED, "http.port": "0" }).httpPort).toBe(0);
  });

  it("detects the debug toolbar from the includes list only", () => {
    expect(
      parseConfig({ ...ENABLED, includes: "tm, debugtoolbar" }).debugToolbar
    ).toBe(true);
    expect(
      parseConfig({ ...ENABLED, includes: "debugtoolbarx" }).debugToolbar
    ).toBe(false);
    expect(
      parseConfig({ ...ENABLED, "mongodb.db_name": "debugtoolbar" })
        .debugToolbar
    ).toBe(false);
  });
});

describe("splitIncludes", () => {
  it("splits on whitespace and commas", () => {
    expect(splitIncludes(" a,b  c\n d ")).toEqual(["a", "b", "c", "d"]);
    expect(splitIncludes(undefined)).toEqual([]);
  });
});

describe("serviceRootFrom", () => {
  let tmp: string | undefined;

  afterEach(() => {
    delete process.env.GP_CONFIG_SPEC_FROM_FILE;
    if (tmp) fs.rmSync(tmp, { recursive: true, force: true });
    tmp = undefined;
  });

  it("resolves the source service dir from a dist build", () => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "gp-root-"));
    fs.writeFileSync(path.join(tmp, "package.json"), "{}");
    const distSrc = path.join(tmp, "dist", SERVICE_DIR, "src");
    fs.mkdirSync(distSrc, { recursive: true });
    const serviceDir = path.join(tmp, SERVICE_DIR);
    fs.mkdirSync(serviceDir, { recursive: true });
    fs.writeFileSync(
      path.join(serviceDir, ".env.test"),
      "GP_CONFIG_SPEC_FROM_FILE=service\n"
    );

    expect(serviceRootFrom(distSrc)).toBe(serviceDir);
    expect(loadEnvCascadeForService(serviceRootFrom(distSrc))).toEqual([
      path.join(serviceDir, ".env.test"),
    ]);
    expect(process.env.GP_CONFIG_SPEC_FROM_FILE).toBe("service");
  });

  it("anchors the default static dir on the repo", () => {
    expect(DEFAULT_STATIC_DIR).toBe(
      path.join(serviceRootFrom(__dirname), "static")
    );
    expect(fs.existsSync(path.join(DEFAULT_STATIC_DIR, "robots.txt"))).toBe(true);
  });
});
