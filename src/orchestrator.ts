/**
 * Composition root: wires the registry, pool, health loop, engine, routing
 * publisher, metrics and HTTP server, and owns their start/stop order.
 */

import { DecisionLog } from "./audit/decision-log.js";
import { Authenticator } from "./auth/authenticator.js";
import type { OrchestratorConfig } from "./config.js";
import { EscalationEngine } from "./escalation/engine.js";
import { EscalationPolicy } from "./escalation/policy.js";
import { OrchestratorEventBus } from "./events.js";
import { HealthReconciler } from "./health/health-reconciler.js";
import { logger } from "./logger.js";
import { OrchestratorMetrics, describeAlerts } from "./metrics.js";
import { PoolManager } from "./pool/pool-manager.js";
import { UnitRegistry } from "./registry/unit-registry.js";
import { RoutingPublisher } from "./routing/publisher.js";
import { DockerRuntime } from "./runtime/docker-runtime.js";
import { HttpScorer } from "./scorer/http-scorer.js";
import { OrchestratorServer } from "./server/http-server.js";
import { SessionStore } from "./sessions/session-store.js";
import type { Scorer, UnitRuntime } from "./types.js";
import { TaskTracker } from "./utils/async.js";

export const VERSION = "0.1.0";

/** Collaborators replaced in tests or alternative deployments. */
export interface OrchestratorOverrides {
  runtime?: UnitRuntime;
  scorer?: Scorer;
}

export class Orchestrator {
  private readonly log = logger.child({ component: "orchestrator" });
  readonly events = new OrchestratorEventBus();
  readonly registry: UnitRegistry;
  readonly pool: PoolManager;
  readonly health: HealthReconciler;
  readonly sessions: SessionStore;
  readonly audit: DecisionLog;
  readonly engine: EscalationEngine;
  readonly publisher: RoutingPublisher;
  readonly authenticator: Authenticator;
  readonly metrics: OrchestratorMetrics;
  readonly server: OrchestratorServer;

  private readonly config: OrchestratorConfig;
  private readonly tasks = new TaskTracker(this.log);
  private sweepTimer: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(config: OrchestratorConfig, overrides: OrchestratorOverrides = {}) {
    this.config = config;
    const runtime = overrides.runtime ?? new DockerRuntime(config.runtime);
    const scorer = overrides.scorer ?? new HttpScorer({ url: config.scorer.url, scoreMax: config.scorer.scoreMax });

    this.registry = new UnitRegistry(this.events);
    this.pool = new PoolManager(this.registry, runtime, this.events, config.tiers, config.pool);
    this.health = new HealthReconciler(this.pool, runtime, config.health);
    this.sessions = new SessionStore(config.sessions.ttlMs);
    this.audit = new DecisionLog(config.audit.path);
    this.engine = new EscalationEngine(
      {
        pool: this.pool,
        sessions: this.sessions,
        scorer,
        policy: new EscalationPolicy(config.policy),
        audit: this.audit,
        events: this.events,
      },
      config.engine,
    );
    this.publisher = new RoutingPublisher(this.registry, this.events, config.routing);
    this.authenticator = new Authenticator(config.auth);
    this.metrics = new OrchestratorMetrics(this.events, () => this.pool.status(this.sessions.activeCount()));
    this.server = new OrchestratorServer(
      {
        ...config.server,
        version: VERSION,
        retryAfterSeconds: Math.max(1, Math.ceil(config.pool.reconcileIntervalMs / 1000)),
      },
      {
        authenticator: this.authenticator,
        engine: this.engine,
        pool: this.pool,
        sessions: this.sessions,
        audit: this.audit,
        publisher: this.publisher,
        metrics: this.metrics,
      },
    );

    this.events.onTyped("tier:exhausted", ({ tier }) => {
      this.log.warn({ tier, alerts: describeAlerts(this.pool.status(this.sessions.activeCount())) }, "tier has no healthy units");
    });
    this.events.onTyped("tier:creation-degraded", ({ tier, failures }) => {
      this.log.error({ tier, failures }, "tier degraded: unit creation keeps failing");
    });
  }

  /** Start background loops first, then accept requests. */
  async start(): Promise<void> {
    this.publisher.start();
    this.metrics.start();
    this.engine.start();
    this.pool.start();
    this.health.start();
    this.sweepTimer = setInterval(() => {
      if (this.sweeping) return;
      this.tasks.track(this.sweepSessions(), "session sweep");
    }, this.config.sessions.sweepIntervalMs);
    this.sweepTimer.unref();
    await this.server.start();
    this.log.info({ tiers: this.config.tiers.length, version: VERSION }, "orchestrator started");
  }

  /** Stop accepting requests, stop the loops, then publish the final routing table. */
  async stop(): Promise<void> {
    await this.server.stop();
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await this.tasks.drain();
    await this.health.stop();
    await this.engine.stop();
    await this.pool.stop();
    await this.publisher.stop();
    this.metrics.stop();
    this.log.info("orchestrator stopped");
  }

  /** Expire idle sessions through the normal release path. */
  async sweepSessions(now: number = Date.now()): Promise<number> {
    this.sweeping = true;
    try {
      return await this.engine.expireIdle(now);
    } finally {
      this.sweeping = false;
    }
  }
}
