/**
 * In-memory session records, owned by the escalation engine.
 */

import { NotFoundError } from "../errors.js";
import type { EscalationDecision, Session, SessionState } from "../types.js";

export interface SessionListFilter {
  state?: SessionState;
  limit?: number;
}

export const DEFAULT_SESSION_LIST_LIMIT = 100;

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly byUnit = new Map<string, string>();
  private readonly ttlMs: number;

  constructor(ttlMs: number) {
    this.ttlMs = ttlMs;
  }

  /**
   * Return the active session with `id`, creating it at `tier` on first contact.
   * A terminated session with the same id is replaced by a fresh one.
   */
  getOrCreate(id: string, sourceAddress: string, tier: number): { session: Session; created: boolean } {
    const existing = this.sessions.get(id);
    if (existing && existing.state === "active") return { session: existing, created: false };
    const now = new Date();
    const session: Session = {
      id,
      sourceAddress,
      currentTier: tier,
      state: "active",
      units: new Map(),
      history: [],
      lastScore: null,
      escalationCount: 0,
      createdAt: now,
      lastActivity: now,
    };
    this.sessions.set(id, session);
    return { session, created: true };
  }

  get(id: string): Session {
    const session = this.sessions.get(id);
    if (!session) throw new NotFoundError("session", id);
    return session;
  }

  find(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  touch(id: string, at: Date = new Date()): void {
    this.get(id).lastActivity = at;
  }

  /** Most recently active first. */
  list(filter: SessionListFilter = {}): Session[] {
    const limit = filter.limit ?? DEFAULT_SESSION_LIST_LIMIT;
    return [...this.sessions.values()]
      .filter((s) => filter.state === undefined || s.state === filter.state)
      .sort((a, b) => b.lastActivity.getTime() - a.lastActivity.getTime())
      .slice(0, limit);
  }

  bind(id: string, tier: number, unitId: string): void {
    const session = this.get(id);
    session.units.set(tier, unitId);
    this.byUnit.set(unitId, id);
  }

  /** Drop the binding at `tier`; returns the unit that was bound. */
  unbind(id: string, tier: number): string | null {
    const session = this.get(id);
    const unitId = session.units.get(tier);
    if (unitId === undefined) return null;
    session.units.delete(tier);
    if (this.byUnit.get(unitId) === id) this.byUnit.delete(unitId);
    return unitId;
  }

  /** Drop whichever binding points at `unitId`; returns the owning session id. */
  unbindUnit(unitId: string): string | null {
    const id = this.byUnit.get(unitId);
    if (id === undefined) return null;
    this.byUnit.delete(unitId);
    const session = this.sessions.get(id);
    if (session) {
      for (const [tier, bound] of session.units) {
        if (bound === unitId) session.units.delete(tier);
      }
    }
    return id;
  }

  /** The unit bound at the session's current tier, if any. */
  currentUnit(session: Session): string | null {
    return session.units.get(session.currentTier) ?? null;
  }

  recordDecision(id: string, decision: EscalationDecision): void {
    const session = this.get(id);
    session.history.push({
      decisionId: decision.id,
      at: decision.decidedAt,
      fromTier: decision.fromTier,
      toTier: decision.targetTier,
      outcome: decision.outcome,
      unitId: decision.unitId,
      reason: decision.reason,
    });
    if (decision.score !== null) session.lastScore = decision.score;
    if (decision.outcome === "escalate") session.escalationCount++;
    if (decision.outcome === "escalate" || decision.outcome === "deescalate") {
      session.currentTier = decision.targetTier;
    }
    session.lastActivity = decision.decidedAt;
  }

  terminate(id: string): void {
    const session = this.get(id);
    for (const unitId of session.units.values()) {
      if (this.byUnit.get(unitId) === id) this.byUnit.delete(unitId);
    }
    session.units.clear();
    session.state = "terminated";
  }

  /** Active sessions whose inactivity exceeded the TTL at `now`. */
  expired(now: number = Date.now()): Session[] {
    return [...this.sessions.values()].filter(
      (s) => s.state === "active" && now - s.lastActivity.getTime() > this.ttlMs,
    );
  }

  /** Forget terminated sessions idle for longer than the TTL. Returns how many were dropped. */
  prune(now: number = Date.now()): number {
    let dropped = 0;
    for (const [id, session] of this.sessions) {
      if (session.state === "terminated" && now - session.lastActivity.getTime() > this.ttlMs) {
        this.sessions.delete(id);
        dropped++;
      }
    }
    return dropped;
  }

  expiresAt(session: Session): Date {
    return new Date(session.lastActivity.getTime() + this.ttlMs);
  }

  activeCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.state === "active") count++;
    }
    return count;
  }
}
