// backend/services/shared/test/logger.spec.ts
import { describe, it, expect } from "vitest";
import {
  currentServiceName,
  initLogger,
  logger,
  resolveLogLevel,
  setLogLevel,
} from "../src/utils/logger";

describe("shared logger", () => {
  it("defaults to info and normalizes case and whitespace", () => {
    expect(resolveLogLevel(undefined)).toBe("info");
    expect(resolveLogLevel("")).toBe("info");
    expect(resolveLogLevel(" DEBUG ")).toBe("debug");
  });

  it("rejects unknown levels", () => {
    expect(() => resolveLogLevel("loud")).toThrow('Invalid LOG_LEVEL: "loud"');
  });

  it("requires a service name", () => {
    expect(() => initLogger("  ")).toThrow("initLogger requires serviceName");
  });

  it("stamps the service name once initialized", () => {
    const l = initLogger("gp-test");
    expect(currentServiceName()).toBe("gp-test");
    expect(l.bindings()).toEqual({ service: "gp-test" });
    expect(logger).toBe(l);
  });

  it("can change level at runtime", () => {
    initLogger("gp-test");
    setLogLevel("warn");
    expect(logger.level).toBe("warn");
    expect(() => setLogLevel("chatty")).toThrow();
  });
});
