/**
 * Escalation Engine: turns an authenticated escalation request into a decision.
 *
 * Requests for the same session run one at a time; different sessions run
 * concurrently. A repeat of the same request within the duplicate window
 * returns the stored decision, so a retried or doubled request never
 * allocates a second unit. A request made from a tier the session has
 * already left is held. Units are bound only once a decision is reached.
 */

import { createHash, randomUUID } from "node:crypto";
import type { DecisionLog } from "../audit/decision-log.js";
import {
  InvalidTransitionError,
  ScorerUnavailableError,
  ValidationError,
  errorMessage,
  isOrchestratorError,
} from "../errors.js";
import type { OrchestratorEvents, OrchestratorEventBus } from "../events.js";
import { logger } from "../logger.js";
import type { PoolManager } from "../pool/pool-manager.js";
import type { SessionStore } from "../sessions/session-store.js";
import {
  EscalationRequestSchema,
  type DecisionOutcome,
  type EscalationDecision,
  type ParsedEscalationRequest,
  type Scorer,
  type Session,
  type UnitView,
} from "../types.js";
import { TaskTracker, sleep, withTimeout } from "../utils/async.js";
import type { EscalationPolicy } from "./policy.js";

export interface EngineOptions {
  scorerTimeoutMs: number;
  scoreMax: number;
  /** Extra allocation attempts before an exhausted escalation is deferred. */
  allocationRetries: number;
  allocationRetryDelayMs: number;
  duplicateWindowMs: number;
}

export interface EngineDeps {
  pool: PoolManager;
  sessions: SessionStore;
  scorer: Scorer;
  policy: EscalationPolicy;
  audit: DecisionLog;
  events: OrchestratorEventBus;
}

interface RecentDecision {
  fingerprint: string;
  decision: EscalationDecision;
  at: number;
}

interface Draft {
  outcome: DecisionOutcome;
  fromTier: number;
  targetTier: number;
  reason: string;
  score: number | null;
  indicators: string[];
  unit?: UnitView | null;
}

type Move =
  | { moved: true; unit: UnitView }
  | { moved: false; reason: string };

const noop = (): void => undefined;

export class EscalationEngine {
  private readonly log = logger.child({ component: "escalation" });
  private readonly pool: PoolManager;
  private readonly sessions: SessionStore;
  private readonly scorer: Scorer;
  private readonly policy: EscalationPolicy;
  private readonly audit: DecisionLog;
  private readonly events: OrchestratorEventBus;
  private readonly options: EngineOptions;
  private readonly queues = new Map<string, Promise<void>>();
  private readonly recent = new Map<string, RecentDecision>();
  private readonly tasks = new TaskTracker(this.log);
  private readonly onEvicted = (payload: OrchestratorEvents["unit:evicted"]): void => {
    this.handleEviction(payload);
  };

  constructor(deps: EngineDeps, options: EngineOptions) {
    this.pool = deps.pool;
    this.sessions = deps.sessions;
    this.scorer = deps.scorer;
    this.policy = deps.policy;
    this.audit = deps.audit;
    this.events = deps.events;
    this.options = options;
  }

  start(): void {
    this.events.onTyped("unit:evicted", this.onEvicted);
  }

  async stop(): Promise<void> {
    this.events.offTyped("unit:evicted", this.onEvicted);
    await this.tasks.drain();
  }

  /**
   * Decide on an escalation request. Throws ValidationError for a malformed
   * request and InvalidTransition for a tier jump; every other condition is
   * expressed as the decision outcome. `input` is validated against
   * {@link EscalationRequestSchema}, so raw request bodies can be passed in.
   */
  async decide(input: unknown): Promise<EscalationDecision> {
    const parsed = EscalationRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        "Invalid escalation request",
        parsed.error.issues.map((i) => `${i.path.join(".") || "(body)"}: ${i.message}`),
      );
    }
    const request = parsed.data;
    const sessionId = request.sessionId ?? randomUUID();
    return this.serialize(sessionId, () => this.decideLocked(sessionId, request));
  }

  /**
   * Release the session's unit through the pool release path and terminate
   * the session (de-escalation to tier 0).
   */
  async releaseSession(sessionId: string, reason = "released by operator"): Promise<EscalationDecision> {
    return this.serialize(sessionId, async () => {
      const session = this.sessions.get(sessionId);
      return this.releaseLocked(session, reason, null);
    });
  }

  /** Release every session idle past its TTL. Returns how many expired. */
  async expireIdle(now: number = Date.now()): Promise<number> {
    const expired = this.sessions.expired(now);
    const results = await Promise.allSettled(
      expired.map((s) => this.releaseSession(s.id, "session expired after inactivity")),
    );
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        this.log.error({ err: result.reason, sessionId: expired[i]?.id }, "failed to expire session");
      }
    });
    for (const [id, entry] of this.recent) {
      if (now - entry.at > this.options.duplicateWindowMs) this.recent.delete(id);
    }
    const pruned = this.sessions.prune(now);
    if (expired.length > 0 || pruned > 0) {
      this.log.info({ expired: expired.length, pruned }, "session sweep finished");
    }
    return expired.length;
  }

  // --- Decision flow ---

  private async decideLocked(sessionId: string, request: ParsedEscalationRequest): Promise<EscalationDecision> {
    const fingerprint = fingerprintOf(sessionId, request);
    const cached = this.recent.get(sessionId);
    if (cached && cached.fingerprint === fingerprint && Date.now() - cached.at <= this.options.duplicateWindowMs) {
      this.log.info({ sessionId, decisionId: cached.decision.id }, "duplicate request, returning stored decision");
      const session = this.sessions.find(sessionId);
      if (session?.state === "active") this.sessions.touch(sessionId);
      return cached.decision;
    }

    const maxTier = this.pool.maxTier();
    const known = this.sessions.find(sessionId);
    if ((!known || known.state !== "active") && request.currentTier > maxTier) {
      throw new ValidationError(`currentTier ${request.currentTier} exceeds the highest tier ${maxTier}`);
    }
    const { session, created } = this.sessions.getOrCreate(sessionId, request.sourceAddress, request.currentTier);
    this.sessions.touch(sessionId);
    if (created) this.log.info({ sessionId, tier: session.currentTier, source: request.sourceAddress }, "session created");
    const fromTier = session.currentTier;
    const target = request.targetTier;
    if (!created && request.currentTier !== fromTier) {
      this.log.debug({ sessionId, claimed: request.currentTier, actual: fromTier }, "request tier differs from session tier");
      if (target === undefined && request.currentTier < fromTier) {
        // the tier this request asks for has already been reached
        return this.hold(session, fingerprint, {
          outcome: "hold",
          fromTier,
          targetTier: fromTier,
          reason: `session already at tier ${fromTier}; request was made at tier ${request.currentTier}`,
          score: null,
          indicators: request.indicators,
        });
      }
    }

    if (target !== undefined) {
      if (target === fromTier) {
        return this.hold(session, fingerprint, {
          outcome: "hold",
          fromTier,
          targetTier: fromTier,
          reason: `session already at tier ${fromTier}`,
          score: null,
          indicators: request.indicators,
        });
      }
      if (target > fromTier + 1) {
        throw new InvalidTransitionError(
          `cannot move session '${sessionId}' from tier ${fromTier} to ${target}; escalation advances one tier at a time`,
        );
      }
      if (target < fromTier) {
        const reason = `de-escalation to tier ${target} requested`;
        if (target === 0) return this.releaseLocked(session, reason, fingerprint);
        return this.move(session, fingerprint, target, "deescalate", reason, null, request.indicators);
      }
    }

    let score: number;
    let indicators: string[];
    try {
      ({ score, indicators } = await this.obtainScore(session, request));
    } catch (err: unknown) {
      if (!isOrchestratorError(err, "ScorerUnavailable")) throw err;
      this.log.warn({ sessionId, err: errorMessage(err) }, "scorer unavailable, holding");
      return this.finish(session, fingerprint, {
        outcome: "hold",
        fromTier,
        targetTier: fromTier,
        reason: "scorer unavailable",
        score: null,
        indicators: request.indicators,
      });
    }

    const effective = this.policy.effectiveScore(score, indicators);
    const verdict = this.policy.evaluate({ score: effective, currentTier: fromTier, maxTier });

    switch (verdict.kind) {
      case "escalate":
        return this.move(session, fingerprint, verdict.targetTier, "escalate", verdict.reason, effective, indicators);
      case "deescalate":
        if (target !== undefined) {
          return this.hold(session, fingerprint, {
            outcome: "hold",
            fromTier,
            targetTier: fromTier,
            reason: `${verdict.reason}; escalation to tier ${target} not warranted`,
            score: effective,
            indicators,
          });
        }
        return this.move(session, fingerprint, verdict.targetTier, "deescalate", verdict.reason, effective, indicators);
      case "deny":
      case "hold":
        return this.hold(session, fingerprint, {
          outcome: verdict.kind,
          fromTier,
          targetTier: verdict.targetTier,
          reason: verdict.reason,
          score: effective,
          indicators,
        });
    }
  }

  /** Inline score hints win over the scorer; the scorer call is bounded by a timeout. */
  private async obtainScore(
    session: Session,
    request: ParsedEscalationRequest,
  ): Promise<{ score: number; indicators: string[] }> {
    if (request.score !== undefined) {
      if (request.score < 0 || request.score > this.options.scoreMax) {
        throw new ValidationError(`score ${request.score} is outside 0..${this.options.scoreMax}`);
      }
      return { score: request.score, indicators: request.indicators };
    }

    const controller = new AbortController();
    try {
      const result = await withTimeout(
        this.scorer.score(
          {
            sessionId: session.id,
            sourceAddress: session.sourceAddress,
            currentTier: session.currentTier,
            indicators: request.indicators,
          },
          controller.signal,
        ),
        this.options.scorerTimeoutMs,
        () => new ScorerUnavailableError(`scorer timed out after ${this.options.scorerTimeoutMs}ms`),
      );
      return {
        score: result.score,
        indicators: [...new Set([...request.indicators, ...result.indicators])],
      };
    } catch (err: unknown) {
      controller.abort();
      if (isOrchestratorError(err)) throw err;
      throw new ScorerUnavailableError(`scorer failed: ${errorMessage(err)}`, err);
    }
  }

  /**
   * Move the session to `target`: allocate there first, then release the
   * previous unit. Exhaustion after the bounded retries becomes `deferred`.
   */
  private async move(
    session: Session,
    fingerprint: string,
    target: number,
    outcome: "escalate" | "deescalate",
    reason: string,
    score: number | null,
    indicators: string[],
  ): Promise<EscalationDecision> {
    const fromTier = session.currentTier;
    const result = await this.allocateWithRetry(session.id, target);
    if (!result.moved) {
      return this.hold(session, fingerprint, {
        outcome: "deferred",
        fromTier,
        targetTier: target,
        reason: `${reason}; ${result.reason}`,
        score,
        indicators,
      });
    }

    const previous = this.sessions.unbind(session.id, fromTier);
    this.sessions.bind(session.id, target, result.unit.id);
    if (previous !== null) await this.releaseUnit(previous, session.id);
    return this.finish(session, fingerprint, {
      outcome,
      fromTier,
      targetTier: target,
      reason,
      score,
      indicators,
      unit: result.unit,
    });
  }

  private async allocateWithRetry(sessionId: string, tier: number): Promise<Move> {
    for (let attempt = 0; ; attempt++) {
      try {
        return { moved: true, unit: await this.pool.allocate(tier, sessionId) };
      } catch (err: unknown) {
        if (!isOrchestratorError(err, "PoolExhausted")) throw err;
        if (attempt >= this.options.allocationRetries) {
          this.log.warn({ sessionId, tier, attempts: attempt + 1 }, "tier exhausted, deferring");
          return { moved: false, reason: `tier ${tier} pool exhausted after ${attempt + 1} attempts` };
        }
        await sleep(this.options.allocationRetryDelayMs * (attempt + 1));
      }
    }
  }

  private async releaseLocked(
    session: Session,
    reason: string,
    fingerprint: string | null,
  ): Promise<EscalationDecision> {
    const fromTier = session.currentTier;
    if (session.state === "terminated") {
      return this.finish(session, fingerprint, {
        outcome: "deescalate",
        fromTier,
        targetTier: 0,
        reason: "session already released",
        score: null,
        indicators: [],
        unit: null,
      });
    }
    for (const tier of [...session.units.keys()]) {
      const unitId = this.sessions.unbind(session.id, tier);
      if (unitId !== null) await this.releaseUnit(unitId, session.id);
    }
    const decision = await this.finish(session, fingerprint, {
      outcome: "deescalate",
      fromTier,
      targetTier: 0,
      reason,
      score: null,
      indicators: [],
      unit: null,
    });
    this.sessions.terminate(session.id);
    if (fingerprint === null) this.recent.delete(session.id);
    this.log.info({ sessionId: session.id, reason }, "session released");
    return decision;
  }

  /** Bind a unit at the session's current tier when it has none (first contact or after eviction). */
  private async ensureBinding(session: Session): Promise<void> {
    const tier = session.currentTier;
    if (session.state !== "active" || tier < 1 || session.units.has(tier)) return;
    try {
      const unit = await this.pool.allocate(tier, session.id);
      this.sessions.bind(session.id, tier, unit.id);
      this.log.info({ sessionId: session.id, tier, unitId: unit.id }, "session bound");
    } catch (err: unknown) {
      if (!isOrchestratorError(err, "PoolExhausted")) throw err;
      this.log.warn({ sessionId: session.id, tier }, "no unit to bind session to yet");
    }
  }

  /** Finish a decision that leaves the session where it is, bound at its current tier. */
  private async hold(session: Session, fingerprint: string, draft: Draft): Promise<EscalationDecision> {
    await this.ensureBinding(session);
    return this.finish(session, fingerprint, draft);
  }

  private async releaseUnit(unitId: string, sessionId: string): Promise<void> {
    try {
      await this.pool.release(unitId, sessionId);
    } catch (err: unknown) {
      if (!isOrchestratorError(err, "NotFound")) throw err;
      this.log.debug({ unitId, sessionId }, "unit already gone at release");
    }
  }

  private async finish(session: Session, fingerprint: string | null, draft: Draft): Promise<EscalationDecision> {
    const unit = draft.unit === undefined ? this.currentUnit(session) : draft.unit;
    const decision: EscalationDecision = {
      id: randomUUID(),
      sessionId: session.id,
      outcome: draft.outcome,
      fromTier: draft.fromTier,
      targetTier: draft.targetTier,
      unitId: unit?.id ?? null,
      unitAddress: unit?.address ?? null,
      reason: draft.reason,
      score: draft.score,
      indicators: draft.indicators,
      decidedAt: new Date(),
    };
    this.sessions.recordDecision(session.id, decision);
    await this.audit.append(decision);
    if (fingerprint !== null) {
      this.recent.set(session.id, { fingerprint, decision, at: Date.now() });
    }
    this.events.emitTyped("decision:recorded", { decision });
    this.log.info(
      {
        sessionId: session.id,
        decisionId: decision.id,
        outcome: decision.outcome,
        fromTier: decision.fromTier,
        targetTier: decision.targetTier,
        unitId: decision.unitId,
      },
      "escalation decision",
    );
    return decision;
  }

  private currentUnit(session: Session): UnitView | null {
    const unitId = this.sessions.currentUnit(session);
    return unitId === null ? null : this.pool.unit(unitId) ?? null;
  }

  private handleEviction({ unit, sessionId, reason }: OrchestratorEvents["unit:evicted"]): void {
    const owner = this.sessions.unbindUnit(unit.id);
    if (owner === null) return;
    this.log.warn({ sessionId, unitId: unit.id, reason }, "session lost its unit, rebinding");
    this.tasks.track(
      this.serialize(sessionId, async () => {
        const session = this.sessions.find(sessionId);
        if (session) await this.ensureBinding(session);
      }),
      `rebind session ${sessionId}`,
    );
  }

  /** Chain `fn` behind any work already queued for `key`. */
  private serialize<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail: Promise<void> = run.then(noop, noop).then(() => {
      if (this.queues.get(key) === tail) this.queues.delete(key);
    });
    this.queues.set(key, tail);
    return run;
  }
}

function fingerprintOf(sessionId: string, request: ParsedEscalationRequest): string {
  const canonical = JSON.stringify([
    sessionId,
    request.sourceAddress,
    request.currentTier,
    request.targetTier ?? null,
    request.score ?? null,
    [...request.indicators].sort(),
  ]);
  return createHash("sha256").update(canonical).digest("hex");
}
