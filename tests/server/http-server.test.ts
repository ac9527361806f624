import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

vi.mock("../../src/logger.js", () => ({
  logger: {
    child: () => ({
      info: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
}));

import { Orchestrator } from "../../src/orchestrator.js";
import { buildOrchestratorConfig, parseConfig } from "../../src/config.js";
import { Authenticator, requestScope } from "../../src/auth/authenticator.js";
import { errorResponse } from "../../src/server/http-server.js";
import { DeferredError, NotFoundError, RateLimitedError, StaleRequestError } from "../../src/errors.js";
import type { Scorer } from "../../src/types.js";
import { FakeRuntime } from "../helpers/fake-runtime.js";

const SECRET = "test-secret-for-api";

interface CallOptions {
  sign?: boolean;
  secret?: string;
  now?: () => number;
  headers?: Record<string, string>;
}

interface CallResult {
  status: number;
  retryAfter: string | null;
  body: unknown;
}

describe("errorResponse", () => {
  it("maps the error taxonomy onto status codes", () => {
    expect(errorResponse(new NotFoundError("session", "s1"), 5).status).toBe(404);
    expect(errorResponse(new StaleRequestError(40_000, 30_000), 5)).toMatchObject({
      status: 401,
      body: { outcome: "rejected", code: "StaleRequest" },
    });
    expect(errorResponse(new DeferredError("later"), 5)).toEqual({
      status: 503,
      body: { error: "later", code: "Deferred" },
      headers: { "Retry-After": "5" },
    });
    expect(errorResponse(new RateLimitedError(42), 5)).toEqual({
      status: 429,
      body: { error: "Too many requests; retry in 42s", code: "RateLimited" },
      headers: { "Retry-After": "42" },
    });
    expect(errorResponse(new Error("secret detail"), 5)).toEqual({
      status: 500,
      body: { error: "Internal server error" },
    });
  });
});

describe("OrchestratorServer", () => {
  let dir: string;
  let orchestrator: Orchestrator;
  let baseUrl: string;

  async function call(method: "GET" | "POST", route: string, body?: unknown, opts: CallOptions = {}): Promise<CallResult> {
    const raw = body === undefined ? "" : typeof body === "string" ? body : JSON.stringify(body);
    const signer = new Authenticator(
      { secret: opts.secret ?? SECRET, maxSkewMs: 30_000, signatureHeader: "x-signature", timestampHeader: "x-timestamp" },
      opts.now,
    );
    const scope = route === "/escalate" ? undefined : requestScope(method, route);
    const headers: Record<string, string> = { ...(opts.sign === false ? {} : signer.sign(raw, scope)), ...opts.headers };
    const response = await fetch(`${baseUrl}${route}`, { method, headers, body: raw || undefined });
    const json: unknown = await response.json();
    return { status: response.status, retryAfter: response.headers.get("retry-after"), body: json };
  }

  beforeAll(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "server-"));
    const config = buildOrchestratorConfig(
      parseConfig({
        server: { host: "127.0.0.1", port: 0, body_limit_bytes: 1024 },
        rate_limit: { max_requests: 20, trust_forwarded_for: true },
        auth: { secret: SECRET },
        tiers: [
          { tier: 1, name: "tier1", image: "units/tier1:test", min_size: 1, target_size: 4, max_size: 6 },
          { tier: 2, name: "tier2", image: "units/tier2:test", min_size: 0, target_size: 1, max_size: 2 },
        ],
        pool: { reconcile_interval_ms: 60_000 },
        escalation: { allocation_retries: 0, allocation_retry_delay_ms: 0 },
        routing: { path: path.join(dir, "routes.json"), debounce_ms: 10 },
        audit: { path: path.join(dir, "decisions.jsonl") },
      }),
    );
    const scorer: Scorer = { score: async () => ({ score: 0, indicators: [] }) };
    orchestrator = new Orchestrator(config, { runtime: new FakeRuntime(), scorer });
    await orchestrator.start();
    baseUrl = `http://127.0.0.1:${orchestrator.server.port}`;
    await vi.waitFor(() => {
      expect(orchestrator.pool.tierStatus(1).healthy).toBe(4);
      expect(orchestrator.pool.tierStatus(2).healthy).toBe(1);
    });
  });

  afterAll(async () => {
    await orchestrator.stop();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("authentication", () => {
    it("serves /healthz without a signature", async () => {
      const res = await call("GET", "/healthz", undefined, { sign: false });
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ status: "healthy", version: "0.1.0", poolsHealthy: true });
    });

    it("rejects unsigned requests", async () => {
      const res = await call("POST", "/escalate", { sourceAddress: "10.1.1.1", currentTier: 1 }, { sign: false });
      expect(res.status).toBe(401);
      expect(res.body).toEqual({
        outcome: "rejected",
        error: "Missing signature or timestamp header",
        code: "BadSignature",
      });
    });

    it("rejects a signature made with the wrong key", async () => {
      const res = await call("POST", "/escalate", { sourceAddress: "10.1.1.1", currentTier: 1 }, { secret: "another-test-secret" });
      expect(res.status).toBe(401);
      expect(res.body).toMatchObject({ outcome: "rejected", code: "BadSignature" });
    });

    it("rejects a signature replayed against another route", async () => {
      const signer = new Authenticator({ secret: SECRET, maxSkewMs: 30_000, signatureHeader: "x-signature", timestampHeader: "x-timestamp" });
      const headers = signer.sign("", requestScope("GET", "/pools"));

      const pools = await fetch(`${baseUrl}/pools`, { headers });
      const replayed = await fetch(`${baseUrl}/admin/tiers/1/recycle`, { method: "POST", headers });

      expect(pools.status).toBe(200);
      expect(replayed.status).toBe(401);
      expect(await replayed.json()).toEqual({ outcome: "rejected", error: "Request signature is missing or invalid", code: "BadSignature" });
    });

    it("rejects a stale timestamp", async () => {
      const res = await call("POST", "/escalate", { sourceAddress: "10.1.1.1", currentTier: 1 }, { now: () => Date.now() - 120_000 });
      expect(res.status).toBe(401);
      expect(res.body).toMatchObject({ outcome: "rejected", code: "StaleRequest" });
    });
  });

  describe("POST /escalate", () => {
    it("returns the decision for a signed request", async () => {
      const res = await call("POST", "/escalate", { sessionId: "s-hold", sourceAddress: "10.1.1.1", currentTier: 1, score: 3 });
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        sessionId: "s-hold",
        outcome: "hold",
        fromTier: 1,
        targetTier: 1,
        unitId: orchestrator.sessions.get("s-hold").units.get(1),
      });
    });

    it("escalates, then defers with Retry-After once tier 2 is full", async () => {
      const first = await call("POST", "/escalate", { sessionId: "s-a", sourceAddress: "10.1.1.2", currentTier: 1, score: 9 });
      const second = await call("POST", "/escalate", { sessionId: "s-b", sourceAddress: "10.1.1.3", currentTier: 1, score: 9 });

      expect(first.status).toBe(200);
      expect(first.body).toMatchObject({ outcome: "escalate", targetTier: 2 });
      expect(second.status).toBe(200);
      expect(second.retryAfter).toBe("60");
      expect(second.body).toMatchObject({
        outcome: "deferred",
        reason: "score 9 >= threshold 7; tier 2 pool exhausted after 1 attempts",
      });
    });

    it("answers 409 for a tier jump", async () => {
      const res = await call("POST", "/escalate", { sessionId: "s-jump", sourceAddress: "10.1.1.4", currentTier: 0, targetTier: 2 });
      expect(res.status).toBe(409);
      expect(res.body).toMatchObject({ code: "InvalidTransition" });
    });

    it("answers 400 with issues for an invalid body", async () => {
      const res = await call("POST", "/escalate", { sourceAddress: "10.1.1.5", currentTier: -1 });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: "Invalid escalation request",
        code: "ValidationError",
        issues: ["currentTier: Number must be greater than or equal to 0"],
      });
    });

    it("answers 400 for malformed JSON", async () => {
      const res = await call("POST", "/escalate", "{nope");
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: "Request body is not valid JSON" });
    });

    it("answers 413 for an oversized body", async () => {
      const res = await call("POST", "/escalate", { sourceAddress: "x".repeat(2000), currentTier: 1 });
      expect(res.status).toBe(413);
    });
  });

  describe("sessions", () => {
    it("shows one session", async () => {
      await call("POST", "/escalate", { sessionId: "s-view", sourceAddress: "10.1.2.1", currentTier: 1, score: 4 });
      const res = await call("GET", "/sessions/s-view");
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id: "s-view", state: "active", currentTier: 1, lastScore: 4, escalationCount: 0 });
    });

    it("answers 404 for an unknown session", async () => {
      const res = await call("GET", "/sessions/missing");
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "session 'missing' not found", code: "NotFound" });
    });

    it("answers 400 for a malformed path segment", async () => {
      const res = await call("GET", "/sessions/%E0%A4%A");
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "Malformed path segment '%E0%A4%A'", code: "ValidationError", issues: [] });
    });

    it("lists active sessions", async () => {
      const res = await call("GET", "/sessions?state=active&limit=500");
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ count: orchestrator.sessions.list({ state: "active", limit: 500 }).length });
    });

    it("rejects an invalid list query", async () => {
      expect((await call("GET", "/sessions?limit=0")).status).toBe(400);
    });

    it("returns the audited decisions of a session", async () => {
      await call("POST", "/escalate", { sessionId: "s-audit", sourceAddress: "10.1.2.2", currentTier: 1, score: 1 });
      const res = await call("GET", "/sessions/s-audit/decisions");
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ sessionId: "s-audit", decisions: [{ outcome: "hold", score: 1 }] });
    });

    it("releases a session", async () => {
      await call("POST", "/escalate", { sessionId: "s-rel", sourceAddress: "10.1.2.3", currentTier: 1, score: 2 });
      const res = await call("POST", "/sessions/s-rel/release", { reason: "done" });
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ outcome: "deescalate", targetTier: 0, reason: "done", unitId: null });
      expect(orchestrator.sessions.get("s-rel").state).toBe("terminated");
    });
  });

  describe("pools and admin", () => {
    it("reports pool status", async () => {
      const res = await call("GET", "/pools");
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ tiers: [{ tier: 1, target: 4 }, { tier: 2, target: 1 }] });
    });

    it("answers 404 for an unknown tier", async () => {
      expect((await call("GET", "/pools/9")).status).toBe(404);
      expect((await call("POST", "/admin/tiers/9/recycle", {})).status).toBe(404);
    });

    it("recycles a unit", async () => {
      const idle = orchestrator.pool.units(1).find((u) => u.state === "healthy" && u.assignedSession === null);
      if (!idle) throw new Error("expected an idle unit");

      const res = await call("POST", `/admin/units/${idle.id}/recycle`, { force: false });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ unitId: idle.id, recycled: true });
      expect(orchestrator.pool.unit(idle.id)?.state).toBe("terminated");
      expect((await call("POST", "/admin/units/ghost/recycle", {})).status).toBe(404);
    });

    it("resizes a tier", async () => {
      const res = await call("POST", "/admin/tiers/2/size", { max: 3 });
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ tier: 2, minSize: 0, targetSize: 1, maxSize: 3 });
      expect((await call("POST", "/admin/tiers/2/size", {})).status).toBe(400);
    });
  });

  describe("routes", () => {
    it("returns the live routing table", async () => {
      const res = await call("GET", "/routes");
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ entries: orchestrator.publisher.snapshot() });
    });

    it("publishes on demand", async () => {
      const res = await call("POST", "/admin/routes/publish");
      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        path: path.join(dir, "routes.json"),
        entries: orchestrator.publisher.snapshot().length,
      });
    });

    it("distinguishes unknown paths from wrong methods", async () => {
      expect(await call("GET", "/nope")).toMatchObject({ status: 404, body: { error: "Not found" } });
      expect(await call("GET", "/escalate")).toMatchObject({ status: 405, body: { error: "Method GET not allowed" } });
    });
  });

  describe("rate limiting", () => {
    it("answers 429 once a client exhausts its window on /escalate", async () => {
      const body = { sourceAddress: "10.1.3.1", currentTier: 1 };
      const client = { "x-forwarded-for": "198.51.100.7, 10.0.0.1" };
      for (let i = 0; i < 20; i++) {
        expect((await call("POST", "/escalate", body, { sign: false, headers: client })).status).toBe(401);
      }

      const limited = await call("POST", "/escalate", body, { headers: client });
      expect(limited.status).toBe(429);
      expect(limited.body).toMatchObject({ code: "RateLimited" });
      expect(Number(limited.retryAfter)).toBeGreaterThanOrEqual(1);
      expect(Number(limited.retryAfter)).toBeLessThanOrEqual(60);

      const other = await call("POST", "/escalate", body, { sign: false, headers: { "x-forwarded-for": "198.51.100.8" } });
      expect(other.status).toBe(401);
      expect((await call("GET", "/pools", undefined, { headers: client })).status).toBe(200);
    });
  });

  describe("GET /metrics", () => {
    it("serves the Prometheus registry without a signature", async () => {
      const response = await fetch(`${baseUrl}/metrics`);
      const text = await response.text();

      expect(response.status).toBe(200);
      expect(response.headers.get("content-type")).toMatch(/^text\/plain/);
      expect(text).toContain('orchestrator_decisions_total{outcome="escalate",from_tier="1",to_tier="2"} 1\n');
      expect(text).toContain('orchestrator_http_requests_total{method="GET",route="/sessions/:id",status="404"} 1\n');
      expect(text).toContain('orchestrator_pool_units{tier="2",state="healthy"}');
      expect(text).toMatch(/^orchestrator_active_sessions \d+$/m);
    });
  });
});
