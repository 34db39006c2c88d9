import { describe, expect, it } from "vitest";
import { getEnv, toViewerConfig } from "../src/env.js";

describe("env", () => {
  it("applies defaults", () => {
    const env = getEnv({});
    expect(env.PORT).toBe(8787);
    expect(env.LOG_CAPACITY).toBe(3000);
    expect(env.LOG_CONSOLE).toBe(true);
    expect(toViewerConfig(env)).toEqual({
      defaultMinLevel: "trace",
      defaultRefreshIntervalMs: 1000,
      minRefreshIntervalMs: 200,
      maxPendingFrames: 64,
      maxBufferedBytes: 1_048_576,
      idleTimeoutMs: 60_000,
      maxSendFailures: 3,
    });
  });

  it("coerces values and raises the default refresh to the minimum", () => {
    const env = getEnv({
      LOG_CAPACITY: "50",
      LOG_CONSOLE: "off",
      VIEWER_MIN_LEVEL: "warn",
      VIEWER_REFRESH_MS: "100",
      VIEWER_MIN_REFRESH_MS: "250",
    });
    const config = toViewerConfig(env);
    expect(env.LOG_CAPACITY).toBe(50);
    expect(env.LOG_CONSOLE).toBe(false);
    expect(config.defaultMinLevel).toBe("warn");
    expect(config.defaultRefreshIntervalMs).toBe(250);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("rejects invalid values", () => {
    expect(() => getEnv({ LOG_CAPACITY: "0" })).toThrow();
    expect(() => getEnv({ VIEWER_MIN_LEVEL: "verbose" })).toThrow();
  });
});
