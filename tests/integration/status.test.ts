import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { build } from "../../src/server.js";
import { SERVICE_NAME, SERVICE_VERSION } from "../../src/version.js";

describe("GET /healthz and /v1/status", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    vi.stubEnv("RENDER_STRATEGY", "");
    vi.stubEnv("BUFFER_STORE", "");
    vi.stubEnv("BUFFER_MAX_ENTRIES", "");
    vi.stubEnv("BUFFER_TTL_MS", "");
    app = await build();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    vi.unstubAllEnvs();
  });

  it("reports service, version, strategy and store", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      render_strategy: "REDIRECT_TO_BUFFER",
      buffer_store: "memory",
    });
  });

  it("counts respond outcomes and reports store stats", async () => {
    await app.inject({ method: "GET", url: "/legacy" });

    const res = await app.inject({ method: "GET", url: "/v1/status" });
    expect(res.statusCode).toBe(200);

    const body = res.json();
    expect(body.service).toBe(SERVICE_NAME);
    expect(body.rendering).toEqual({
      strategy: "REDIRECT_TO_BUFFER",
      redirect_stateless_pages: true,
      pages: ["home", "counter", "hello", "legacy"],
      outcomes: { buffered: 0, write: 0, redirect: 1, buffer_and_redirect: 0, preempted: 1 },
    });
    expect(body.buffer_store).toEqual({ kind: "memory", size: 0, capacity: 1000, ttlMs: 60000 });
    expect(body.sessions.size).toBe(0);
    expect(body.requests.total).toBeGreaterThanOrEqual(3);
  });
});
