import { describe, expect, it } from "vitest";
import type { ViewerConfig } from "../src/env.js";
import { parseClientMessage, parseConnectParams, toWireRecord } from "../src/ws/protocol.js";

const config: ViewerConfig = {
  defaultMinLevel: "info",
  defaultRefreshIntervalMs: 1000,
  minRefreshIntervalMs: 200,
  maxPendingFrames: 64,
  maxBufferedBytes: 1_048_576,
  idleTimeoutMs: 60_000,
  maxSendFailures: 3,
};

describe("viewer protocol", () => {
  it("fills connect defaults from config", () => {
    expect(parseConnectParams(new URLSearchParams(""), config)).toEqual({
      minLevel: "info",
      refreshIntervalMs: 1000,
      cursor: 0,
    });
  });

  it("clamps a too small refresh interval and reads the cursor", () => {
    expect(parseConnectParams(new URLSearchParams("minLevel=error&refreshIntervalMs=20&cursor=17"), config)).toEqual({
      minLevel: "error",
      refreshIntervalMs: 200,
      cursor: 17,
    });
  });

  it("rejects unknown levels and malformed numbers", () => {
    expect(parseConnectParams(new URLSearchParams("minLevel=fatal"), config)).toBeNull();
    expect(parseConnectParams(new URLSearchParams("refreshIntervalMs=soon"), config)).toBeNull();
    expect(parseConnectParams(new URLSearchParams("cursor=-1"), config)).toBeNull();
  });

  it("parses client messages", () => {
    expect(parseClientMessage('{"type":"ping"}')).toEqual({ type: "ping" });
    expect(parseClientMessage('{"type":"filter","minLevel":"debug"}')).toEqual({ type: "filter", minLevel: "debug" });
    expect(parseClientMessage('{"type":"refresh","refreshIntervalMs":300}')).toEqual({
      type: "refresh",
      refreshIntervalMs: 300,
    });
  });

  it("returns null for protocol violations", () => {
    expect(parseClientMessage("ping")).toBeNull();
    expect(parseClientMessage('{"type":"subscribe"}')).toBeNull();
    expect(parseClientMessage('{"type":"refresh","refreshIntervalMs":"fast"}')).toBeNull();
  });

  it("serializes records with a numeric epoch timestamp", () => {
    expect(toWireRecord({ sequence: 9, timestamp: 1_700_000_000_123, level: "warn", message: "hot", scope: "cpu" })).toEqual({
      level: "warn",
      timestamp: 1_700_000_000_123,
      message: "hot",
      sequence: 9,
      scope: "cpu",
    });
  });
});
