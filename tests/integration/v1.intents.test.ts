import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { build } from "../../src/server.js";
import { _resetConfigCache } from "../../src/config/index.js";
import { IntentOrchestrator } from "../../src/orchestrator/intent-orchestrator.js";
import { SERVICE_NAME, SERVICE_VERSION } from "../../src/version.js";

const NOW = 1_700_000_000_000;

function rulesOnlyOrchestrator(): IntentOrchestrator {
  return new IntentOrchestrator({ assetsPath: "./does-not-exist", runtime: null, clock: () => NOW });
}

describe("intent routes", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await build({ orchestrator: rulesOnlyOrchestrator() });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  describe("POST /v1/intents/parse", () => {
    it("returns the intent record with JSON-encoded parameters", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/intents/parse",
        payload: { text: "add subtle blur" },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        action: "add_effect",
        target: "blur",
        parameters: '{"intensity":0.3}',
        confidence: 0.7,
        timestamp: NOW,
      });
    });

    it("answers empty text with a low-confidence unknown", async () => {
      const res = await app.inject({ method: "POST", url: "/v1/intents/parse", payload: { text: "" } });

      expect(res.statusCode).toBe(200);
      expect(res.json().action).toBe("unknown");
      expect(res.json().confidence).toBe(0.2);
    });

    it("rejects a body without text", async () => {
      const res = await app.inject({ method: "POST", url: "/v1/intents/parse", payload: { text: 42 } });

      expect(res.statusCode).toBe(400);
      const body = res.json();
      expect(body.schema).toBe("error.v1");
      expect(body.code).toBe("BAD_INPUT");
      expect(body.message).toBe("Validation failed");
      expect(body.request_id).toBe(res.headers["x-request-id"]);
    });

    it("rejects malformed JSON through the error handler", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/intents/parse",
        headers: { "content-type": "application/json" },
        payload: "{",
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().code).toBe("BAD_INPUT");
    });
  });

  describe("GET /v1/intents/history", () => {
    it("lists parsed intents oldest first", async () => {
      await app.inject({ method: "POST", url: "/v1/intents/parse", payload: { text: "help" } });

      const res = await app.inject({ method: "GET", url: "/v1/intents/history" });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.schema).toBe("intent-history.v1");
      expect(body.items.at(-1)).toEqual({
        action: "help",
        target: "",
        parameters: "{}",
        confidence: 0.95,
        timestamp: NOW,
      });
    });
  });

  describe("GET /healthz", () => {
    it("reports identity and mock mode", async () => {
      const res = await app.inject({ method: "GET", url: "/healthz" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        ok: true,
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        mode: "mock",
        initialized: true,
        grammar: false,
      });
    });
  });

  describe("request ids", () => {
    it("echoes an incoming X-Request-Id", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/healthz",
        headers: { "x-request-id": "req-test-123" },
      });
      expect(res.headers["x-request-id"]).toBe("req-test-123");
    });

    it("generates one when absent", async () => {
      const res = await app.inject({ method: "GET", url: "/healthz" });
      expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
    });
  });
});

describe("input length limit", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    vi.stubEnv("MAX_INPUT_CHARS", "10");
    _resetConfigCache();
    app = await build({ orchestrator: rulesOnlyOrchestrator() });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    vi.unstubAllEnvs();
  });

  it("rejects text over MAX_INPUT_CHARS", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/intents/parse",
      payload: { text: "make it look dreamy" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe("BAD_INPUT");
  });
});

describe("rate limiting", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    vi.stubEnv("GLOBAL_RATE_LIMIT_RPM", "2");
    _resetConfigCache();
    app = await build({ orchestrator: rulesOnlyOrchestrator() });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    vi.unstubAllEnvs();
  });

  it("returns RATE_LIMITED once the per-minute budget is spent", async () => {
    await app.inject({ method: "GET", url: "/healthz" });
    await app.inject({ method: "GET", url: "/healthz" });
    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.statusCode).toBe(429);
    expect(res.json().code).toBe("RATE_LIMITED");
  });
});
