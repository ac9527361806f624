/**
 * HTTP surface of the orchestrator: escalation, sessions, pool status and the
 * operator endpoints. Every route except `/healthz` and `/metrics` requires an
 * HMAC-signed request; `/escalate` signs its body, the rest also sign their
 * method and path. `/escalate` is rate limited per client. Errors map onto
 * status codes by their taxonomy code.
 */

import * as http from "node:http";
import { z } from "zod";
import type { DecisionLog } from "../audit/decision-log.js";
import { requestScope, type Authenticator } from "../auth/authenticator.js";
import type { EscalationEngine } from "../escalation/engine.js";
import {
  NotFoundError,
  OrchestratorError,
  RateLimitedError,
  ValidationError,
  errorMessage,
  isOrchestratorError,
} from "../errors.js";
import { logger } from "../logger.js";
import { poolsHealthy, type OrchestratorMetrics } from "../metrics.js";
import type { PoolManager } from "../pool/pool-manager.js";
import type { RoutingPublisher } from "../routing/publisher.js";
import type { SessionStore } from "../sessions/session-store.js";
import type { Session } from "../types.js";
import { RateLimiter, type RateLimitOptions } from "./rate-limiter.js";

export interface ServerOptions {
  host: string;
  port: number;
  bodyLimitBytes: number;
  version: string;
  /** Seconds suggested to callers of a deferred or backpressured request. */
  retryAfterSeconds: number;
  rateLimit: RateLimitOptions;
  /** Key rate limits by the first X-Forwarded-For address when present. */
  trustForwardedFor: boolean;
}

export interface ServerDeps {
  authenticator: Authenticator;
  engine: EscalationEngine;
  pool: PoolManager;
  sessions: SessionStore;
  audit: DecisionLog;
  publisher: RoutingPublisher;
  metrics: OrchestratorMetrics;
}

export interface HttpResult {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
  /** Sent as is instead of JSON-encoding `body`; headers must carry its Content-Type. */
  text?: string;
}

interface RouteContext {
  params: string[];
  body: unknown;
  query: URLSearchParams;
}

/** `body` signs the body only; `request` also signs method and path. */
type RouteAuth = "none" | "body" | "request";

interface Route {
  method: "GET" | "POST";
  /** Route label for metrics. */
  name: string;
  pattern: RegExp;
  auth: RouteAuth;
  rateLimited?: boolean;
  handle: (ctx: RouteContext) => Promise<HttpResult> | HttpResult;
}

class BodyTooLargeError extends OrchestratorError {
  constructor(limit: number) {
    super("ValidationError", `Request body exceeds ${limit} bytes`);
  }
}

const RecycleBodySchema = z.object({ force: z.boolean().default(false) }).strict();

const SizeBodySchema = z
  .object({
    min: z.number().int().min(0).optional(),
    target: z.number().int().min(0).optional(),
    max: z.number().int().min(1).optional(),
  })
  .strict()
  .refine((b) => b.min !== undefined || b.target !== undefined || b.max !== undefined, {
    message: "at least one of min, target, max is required",
  });

const ReleaseBodySchema = z.object({ reason: z.string().min(1).max(200).optional() }).strict();

const SessionQuerySchema = z.object({
  state: z.enum(["active", "terminated"]).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

/** Map a thrown value onto the HTTP response the caller sees. */
export function errorResponse(err: unknown, retryAfterSeconds: number): HttpResult {
  if (err instanceof BodyTooLargeError) {
    return { status: 413, body: { error: err.message, code: err.code } };
  }
  if (!isOrchestratorError(err)) {
    return { status: 500, body: { error: "Internal server error" } };
  }
  switch (err.code) {
    case "BadSignature":
    case "StaleRequest":
      return { status: 401, body: { outcome: "rejected", error: err.message, code: err.code } };
    case "ValidationError":
      return {
        status: 400,
        body: { error: err.message, code: err.code, issues: err instanceof ValidationError ? err.issues : [] },
      };
    case "NotFound":
      return { status: 404, body: { error: err.message, code: err.code } };
    case "InvalidTransition":
      return { status: 409, body: { error: err.message, code: err.code } };
    case "RateLimited":
      return {
        status: 429,
        body: { error: err.message, code: err.code },
        headers: {
          "Retry-After": String(err instanceof RateLimitedError ? err.retryAfterSeconds : retryAfterSeconds),
        },
      };
    case "PoolExhausted":
    case "Deferred":
      return {
        status: 503,
        body: { error: err.message, code: err.code },
        headers: { "Retry-After": String(retryAfterSeconds) },
      };
    default:
      return { status: 500, body: { error: "Internal server error", code: err.code } };
  }
}

export class OrchestratorServer {
  private readonly log = logger.child({ component: "http-server" });
  private server: http.Server | null = null;
  private readonly options: ServerOptions;
  private readonly deps: ServerDeps;
  private readonly routes: Route[];
  private readonly limiter: RateLimiter;
  private readonly startedAt = Date.now();

  constructor(options: ServerOptions, deps: ServerDeps) {
    this.options = options;
    this.deps = deps;
    this.routes = this.buildRoutes();
    this.limiter = new RateLimiter(options.rateLimit);
  }

  async start(): Promise<void> {
    const { port, host } = this.options;
    this.server = http.createServer((req, res) => {
      this.handleHttp(req, res).catch((err: unknown) => {
        this.log.error({ err, url: req.url }, "unhandled request failure");
        if (!res.headersSent) this.send(res, { status: 500, body: { error: "Internal server error" } });
        else res.end();
      });
    });
    const server = this.server;
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        this.log.info({ port: this.port, host }, "orchestrator API listening");
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    this.log.info("orchestrator API stopped");
  }

  /** Bound port (useful when listening on port 0). */
  get port(): number {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : this.options.port;
  }

  private async handleHttp(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    const done = this.deps.metrics.startRequest(method);
    const { route, result } = await this.dispatch(req, url, method);
    this.send(res, result);
    done(route, result.status);
  }

  private async dispatch(req: http.IncomingMessage, url: URL, method: string): Promise<{ route: string; result: HttpResult }> {
    let matched: { route: Route; params: string[] } | null = null;
    let known: Route | null = null;
    for (const route of this.routes) {
      const m = route.pattern.exec(url.pathname);
      if (!m) continue;
      if (!known) known = route;
      if (route.method === method) {
        matched = { route, params: m.slice(1) };
        break;
      }
    }
    if (!matched) {
      return known
        ? { route: known.name, result: { status: 405, body: { error: `Method ${method} not allowed` } } }
        : { route: "unmatched", result: { status: 404, body: { error: "Not found" } } };
    }

    const { route } = matched;
    let result: HttpResult;
    try {
      const raw = await this.readBody(req);
      if (route.rateLimited && this.limiter.enabled) {
        const verdict = this.limiter.consume(this.clientKey(req));
        if (!verdict.allowed) throw new RateLimitedError(verdict.retryAfterSeconds);
      }
      if (route.auth !== "none") {
        this.deps.authenticator.verify({
          signature: header(req, this.deps.authenticator.signatureHeader),
          timestamp: header(req, this.deps.authenticator.timestampHeader),
          body: raw,
          scope: route.auth === "request" ? requestScope(method, `${url.pathname}${url.search}`) : undefined,
        });
      }
      result = await route.handle({
        params: matched.params.map(decodeParam),
        body: parseJson(raw),
        query: url.searchParams,
      });
    } catch (err: unknown) {
      result = errorResponse(err, this.options.retryAfterSeconds);
      if (result.status >= 500 && result.status !== 503) {
        this.log.error({ err, method, path: url.pathname }, "request failed");
      } else {
        this.log.warn({ method, path: url.pathname, status: result.status, error: errorMessage(err) }, "request rejected");
      }
    }
    return { route: route.name, result };
  }

  /** Rate limit key: the socket peer, or the first forwarded address when trusted. */
  private clientKey(req: http.IncomingMessage): string {
    if (this.options.trustForwardedFor) {
      const forwarded = header(req, "x-forwarded-for")?.split(",")[0]?.trim();
      if (forwarded) return forwarded;
    }
    return req.socket.remoteAddress ?? "unknown";
  }

  private send(res: http.ServerResponse, result: HttpResult): void {
    res.writeHead(result.status, { "Content-Type": "application/json", ...result.headers });
    res.end(result.text ?? JSON.stringify(result.body));
  }

  private readBody(req: http.IncomingMessage): Promise<string> {
    const limit = this.options.bodyLimitBytes;
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let rejected = false;
      req.on("data", (chunk: Buffer) => {
        if (rejected) return;
        size += chunk.length;
        if (size > limit) {
          rejected = true;
          reject(new BodyTooLargeError(limit));
          return;
        }
        chunks.push(chunk);
      });
      req.on("end", () => {
        if (!rejected) resolve(Buffer.concat(chunks).toString("utf-8"));
      });
      req.on("error", reject);
    });
  }

  // --- Routes ---

  private buildRoutes(): Route[] {
    const { engine, pool, sessions, audit, publisher, metrics } = this.deps;
    return [
      {
        method: "GET",
        name: "/healthz",
        pattern: /^\/healthz$/,
        auth: "none",
        handle: () => this.health(),
      },
      {
        method: "GET",
        name: "/metrics",
        pattern: /^\/metrics$/,
        auth: "none",
        handle: async () => ({
          status: 200,
          body: null,
          text: await metrics.render(),
          headers: { "Content-Type": metrics.contentType },
        }),
      },
      {
        method: "POST",
        name: "/escalate",
        pattern: /^\/escalate$/,
        auth: "body",
        rateLimited: true,
        handle: async ({ body }) => {
          const decision = await engine.decide(body);
          return {
            status: 200,
            body: decision,
            headers: decision.outcome === "deferred" ? { "Retry-After": String(this.options.retryAfterSeconds) } : undefined,
          };
        },
      },
      {
        method: "GET",
        name: "/sessions",
        pattern: /^\/sessions$/,
        auth: "request",
        handle: ({ query }) => {
          const filter = parseWith(SessionQuerySchema, Object.fromEntries(query), "Invalid session query");
          const list = sessions.list(filter).map((s) => this.sessionView(s));
          return { status: 200, body: { sessions: list, count: list.length } };
        },
      },
      {
        method: "GET",
        name: "/sessions/:id",
        pattern: /^\/sessions\/([^/]+)$/,
        auth: "request",
        handle: ({ params }) => ({ status: 200, body: this.sessionView(sessions.get(param(params, 0))) }),
      },
      {
        method: "GET",
        name: "/sessions/:id/decisions",
        pattern: /^\/sessions\/([^/]+)\/decisions$/,
        auth: "request",
        handle: async ({ params }) => {
          const id = param(params, 0);
          const decisions = await audit.readAll(id);
          if (decisions.length === 0 && !sessions.find(id)) throw new NotFoundError("session", id);
          return { status: 200, body: { sessionId: id, decisions } };
        },
      },
      {
        method: "POST",
        name: "/sessions/:id/release",
        pattern: /^\/sessions\/([^/]+)\/release$/,
        auth: "request",
        handle: async ({ params, body }) => {
          const { reason } = parseWith(ReleaseBodySchema, body ?? {}, "Invalid release body");
          const decision = await engine.releaseSession(param(params, 0), reason);
          return { status: 200, body: decision };
        },
      },
      {
        method: "GET",
        name: "/pools",
        pattern: /^\/pools$/,
        auth: "request",
        handle: () => ({ status: 200, body: pool.status(sessions.activeCount()) }),
      },
      {
        method: "GET",
        name: "/pools/:tier",
        pattern: /^\/pools\/(\d+)$/,
        auth: "request",
        handle: ({ params }) => ({ status: 200, body: pool.tierStatus(Number(param(params, 0))) }),
      },
      {
        method: "POST",
        name: "/admin/units/:id/recycle",
        pattern: /^\/admin\/units\/([^/]+)\/recycle$/,
        auth: "request",
        handle: async ({ params, body }) => {
          const { force } = parseWith(RecycleBodySchema, body ?? {}, "Invalid recycle body");
          const unitId = param(params, 0);
          const recycled = await pool.recycle(unitId, { force, reason: "operator recycle" });
          return { status: 200, body: { unitId, recycled } };
        },
      },
      {
        method: "POST",
        name: "/admin/tiers/:tier/recycle",
        pattern: /^\/admin\/tiers\/(\d+)\/recycle$/,
        auth: "request",
        handle: async ({ params, body }) => {
          const { force } = parseWith(RecycleBodySchema, body ?? {}, "Invalid recycle body");
          const tier = Number(param(params, 0));
          const recycled = await pool.recycleTier(tier, { force, reason: "operator tier recycle" });
          return { status: 200, body: { tier, recycled } };
        },
      },
      {
        method: "POST",
        name: "/admin/tiers/:tier/size",
        pattern: /^\/admin\/tiers\/(\d+)\/size$/,
        auth: "request",
        handle: async ({ params, body }) => {
          const change = parseWith(SizeBodySchema, body ?? {}, "Invalid size body");
          const policy = await pool.resize(Number(param(params, 0)), change);
          return { status: 200, body: policy };
        },
      },
      {
        method: "GET",
        name: "/routes",
        pattern: /^\/routes$/,
        auth: "request",
        handle: () => ({
          status: 200,
          body: {
            entries: publisher.snapshot(),
            publishedAt: publisher.published?.at ?? null,
            pending: publisher.pending,
          },
        }),
      },
      {
        method: "POST",
        name: "/admin/routes/publish",
        pattern: /^\/admin\/routes\/publish$/,
        auth: "request",
        handle: async () => {
          const entries = await publisher.publishNow();
          return { status: 200, body: { path: publisher.path, entries: entries.length } };
        },
      },
    ];
  }

  private health(): HttpResult {
    const status = this.deps.pool.status(this.deps.sessions.activeCount());
    const healthy = poolsHealthy(status.tiers);
    const floorTiers = status.tiers.filter((t) => t.min > 0);
    const allDown = floorTiers.length > 0 && floorTiers.every((t) => t.exhausted);
    return {
      status: allDown ? 503 : 200,
      body: {
        status: allDown ? "unhealthy" : healthy ? "healthy" : "degraded",
        version: this.options.version,
        uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
        poolsHealthy: healthy,
      },
    };
  }

  private sessionView(session: Session): Record<string, unknown> {
    const unitId = this.deps.sessions.currentUnit(session);
    const unit = unitId === null ? undefined : this.deps.pool.unit(unitId);
    return {
      id: session.id,
      sourceAddress: session.sourceAddress,
      state: session.state,
      currentTier: session.currentTier,
      unitId,
      unitAddress: unit?.address ?? null,
      lastScore: session.lastScore,
      escalationCount: session.escalationCount,
      createdAt: session.createdAt.toISOString(),
      lastActivity: session.lastActivity.toISOString(),
      expiresAt: this.deps.sessions.expiresAt(session).toISOString(),
    };
  }
}

function header(req: http.IncomingMessage, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

function parseJson(raw: string): unknown {
  if (!raw.trim()) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError("Request body is not valid JSON");
  }
}

function decodeParam(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    throw new ValidationError(`Malformed path segment '${value}'`);
  }
}

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, message: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(message, result.error.issues.map((i) => `${i.path.join(".") || "(body)"}: ${i.message}`));
  }
  return result.data;
}

function param(params: string[], index: number): string {
  const value = params[index];
  if (value === undefined) throw new ValidationError("Missing path parameter");
  return value;
}
