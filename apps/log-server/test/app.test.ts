import request from "supertest";
import { describe, expect, it, beforeEach } from "vitest";
import { getEnv } from "../src/env.js";
import { createLogger } from "../src/logging/logger.js";
import { Publisher } from "../src/logging/publisher.js";
import { createApp, type Services } from "../src/app.js";

describe("log-server api", () => {
  let services: Services;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    const publisher = new Publisher({ capacity: 50, now: () => 1_700_000_000_000 });
    services = {
      env: getEnv({ PORT: "8787", HOST: "127.0.0.1", LOG_CONSOLE: "false" }),
      publisher,
      log: createLogger(publisher, "http"),
      getViewerCount: () => 2,
    };
    app = createApp(services);
  });

  it("reports health with buffer stats", async () => {
    services.publisher.publish("info", "hello");
    const res = await request(app).get("/healthz");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      ok: true,
      viewers: 2,
      buffer: { size: 1, capacity: 50, evicted: 0, lastSequence: 1 },
    });
  });

  it("lists records newest first with filters", async () => {
    services.publisher.publish("debug", "cache miss", { scope: "cache" });
    services.publisher.publish("warn", "slow request", { scope: "http" });
    services.publisher.publish("error", "db down", { scope: "db" });

    const res = await request(app).get("/api/logs").query({ minLevel: "warn" });
    expect(res.status).toBe(200);
    expect(res.body.total).toBe(2);
    expect(res.body.page).toBe(1);
    expect(res.body.pageSize).toBe(50);
    expect(res.body.items).toEqual([
      { sequence: 3, timestamp: 1_700_000_000_000, level: "error", message: "db down", scope: "db" },
      { sequence: 2, timestamp: 1_700_000_000_000, level: "warn", message: "slow request", scope: "http" },
    ]);

    const scoped = await request(app).get("/api/logs").query({ scope: "cache" });
    expect(scoped.body.items.map((r: { message: string }) => r.message)).toEqual(["cache miss"]);
  });

  it("rejects an unknown level", async () => {
    const res = await request(app).get("/api/logs").query({ minLevel: "fatal" });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("VALIDATION_ERROR");
  });

  it("returns a record by sequence or 404", async () => {
    services.publisher.publish("info", "first");
    const found = await request(app).get("/api/logs/1");
    expect(found.status).toBe(200);
    expect(found.body.record.message).toBe("first");

    const missing = await request(app).get("/api/logs/99");
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: "NOT_FOUND" });
  });

  it("clears the buffer and logs the clear", async () => {
    services.publisher.publish("info", "a");
    services.publisher.publish("info", "b");
    const res = await request(app).post("/api/logs/clear");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, cleared: 2 });
    expect(services.publisher.tail(10).map((r) => r.message)).toEqual(["log buffer cleared (2 records)"]);
    expect(services.publisher.lastSequence).toBe(3);
  });

  it("answers unknown routes with 404", async () => {
    const res = await request(app).get("/api/nope");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "NOT_FOUND" });
  });
});
