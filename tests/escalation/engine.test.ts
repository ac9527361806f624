import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
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

import { EscalationEngine } from "../../src/escalation/engine.js";
import { EscalationPolicy } from "../../src/escalation/policy.js";
import { DecisionLog } from "../../src/audit/decision-log.js";
import { PoolManager } from "../../src/pool/pool-manager.js";
import { UnitRegistry } from "../../src/registry/unit-registry.js";
import { SessionStore } from "../../src/sessions/session-store.js";
import { OrchestratorEventBus } from "../../src/events.js";
import { InvalidTransitionError, NotFoundError, ValidationError } from "../../src/errors.js";
import type { ScoreRequest, ScoreResult, Scorer } from "../../src/types.js";
import { FakeRuntime, POOL_OPTIONS, makePolicy } from "../helpers/fake-runtime.js";

class StubScorer implements Scorer {
  result: ScoreResult = { score: 0, indicators: [] };
  hang = false;
  readonly calls: ScoreRequest[] = [];

  score(request: ScoreRequest, signal: AbortSignal): Promise<ScoreResult> {
    this.calls.push(request);
    if (!this.hang) return Promise.resolve(this.result);
    return new Promise((_resolve, reject) => {
      signal.addEventListener("abort", () => reject(new Error("aborted")));
    });
  }
}

describe("EscalationEngine", () => {
  let dir: string;
  let pool: PoolManager;
  let sessions: SessionStore;
  let scorer: StubScorer;
  let audit: DecisionLog;
  let engine: EscalationEngine;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "engine-"));
    const bus = new OrchestratorEventBus();
    pool = new PoolManager(
      new UnitRegistry(bus),
      new FakeRuntime(),
      bus,
      [makePolicy(), makePolicy({ tier: 2, name: "tier2", minSize: 0, targetSize: 1, maxSize: 2 })],
      POOL_OPTIONS,
    );
    sessions = new SessionStore(1_000);
    scorer = new StubScorer();
    audit = new DecisionLog(path.join(dir, "decisions.jsonl"));
    engine = new EscalationEngine(
      {
        pool,
        sessions,
        scorer,
        policy: new EscalationPolicy({
          escalateThreshold: 7,
          tierThresholds: {},
          benignThreshold: 2,
          benignAction: "hold",
          indicatorWeights: { "brute-force": 1 },
          scoreMax: 10,
        }),
        audit,
        events: bus,
      },
      { scorerTimeoutMs: 50, scoreMax: 10, allocationRetries: 1, allocationRetryDelayMs: 5, duplicateWindowMs: 60_000 },
    );
    engine.start();
    await pool.reconcileTier(1);
  });

  afterEach(async () => {
    await engine.stop();
    await pool.stop();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("binds a new session and holds below the threshold", async () => {
    const decision = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, score: 3 });

    expect(decision).toMatchObject({
      sessionId: "s1",
      outcome: "hold",
      fromTier: 1,
      targetTier: 1,
      reason: "score 3 below threshold 7",
      score: 3,
    });
    expect(decision.unitId).toBe(sessions.get("s1").units.get(1));
    expect(pool.unit(decision.unitId ?? "")?.assignedSession).toBe("s1");
    expect(scorer.calls).toHaveLength(0);
  });

  it("escalates one tier, allocating before releasing the old unit", async () => {
    await pool.reconcileTier(2);
    const first = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, score: 3 });
    const decision = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, score: 8 });

    expect(decision).toMatchObject({ outcome: "escalate", fromTier: 1, targetTier: 2, reason: "score 8 >= threshold 7" });
    expect(pool.unit(decision.unitId ?? "")?.tier).toBe(2);
    expect(pool.unit(first.unitId ?? "")?.assignedSession).toBeNull();
    const session = sessions.get("s1");
    expect(session.currentTier).toBe(2);
    expect(session.escalationCount).toBe(1);
    expect([...session.units.entries()]).toEqual([[2, decision.unitId]]);
  });

  it("uses the scorer when no inline score is given", async () => {
    await pool.reconcileTier(2);
    scorer.result = { score: 6, indicators: ["brute-force"] };

    const decision = await engine.decide({
      sessionId: "s1",
      sourceAddress: "10.1.1.1",
      currentTier: 1,
      indicators: ["port-scan"],
    });

    expect(scorer.calls[0]).toEqual({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, indicators: ["port-scan"] });
    expect(decision.outcome).toBe("escalate");
    expect(decision.score).toBe(7);
    expect(decision.indicators).toEqual(["port-scan", "brute-force"]);
  });

  it("holds when the scorer times out", async () => {
    scorer.hang = true;
    const decision = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1 });

    expect(decision).toMatchObject({ outcome: "hold", targetTier: 1, reason: "scorer unavailable", score: null });
    expect(decision.unitId).toBeNull();
    expect(sessions.get("s1").currentTier).toBe(1);
    expect(pool.tierStatus(1).inUse).toBe(0);
  });

  it("holds a repeated request made from a tier the session has left", async () => {
    await pool.reconcileTier(2);
    const escalated = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, score: 8 });
    const repeated = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, score: 9 });

    expect(escalated).toMatchObject({ outcome: "escalate", targetTier: 2 });
    expect(repeated).toMatchObject({
      outcome: "hold",
      fromTier: 2,
      targetTier: 2,
      reason: "session already at tier 2; request was made at tier 1",
      unitId: escalated.unitId,
    });
    expect(sessions.get("s1").currentTier).toBe(2);
    expect(pool.tierStatus(2).inUse).toBe(1);
  });

  it("denies escalation at the highest tier", async () => {
    await pool.reconcileTier(2);
    const decision = await engine.decide({ sessionId: "s2", sourceAddress: "10.1.1.2", currentTier: 2, score: 9 });
    expect(decision).toMatchObject({
      outcome: "deny",
      targetTier: 2,
      reason: "score 9 >= 7 but tier 2 is the highest tier",
    });
  });

  it("defers when the target tier stays exhausted", async () => {
    const decision = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, score: 8 });

    expect(decision).toMatchObject({
      outcome: "deferred",
      fromTier: 1,
      targetTier: 2,
      reason: "score 8 >= threshold 7; tier 2 pool exhausted after 2 attempts",
    });
    expect(decision.unitId).toBe(sessions.get("s1").units.get(1));
    expect(sessions.get("s1").currentTier).toBe(1);
  });

  it("returns the stored decision for a duplicate request", async () => {
    await pool.reconcileTier(2);
    const request = { sessionId: "dup", sourceAddress: "10.1.1.3", currentTier: 1, score: 8 };

    const [a, b] = await Promise.all([engine.decide(request), engine.decide(request)]);

    expect(a.id).toBe(b.id);
    expect(pool.tierStatus(2).inUse).toBe(1);
    expect(sessions.get("dup").history).toHaveLength(1);
  });

  it("refuses to skip a tier", async () => {
    await expect(
      engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 0, targetTier: 2, score: 9 }),
    ).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("holds when the session is already at the requested tier", async () => {
    const decision = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, targetTier: 1 });
    expect(decision).toMatchObject({ outcome: "hold", reason: "session already at tier 1", score: null });
  });

  it("moves down one tier on request", async () => {
    await pool.reconcileTier(2);
    await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 2, score: 3 });

    const decision = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 2, targetTier: 1 });

    expect(decision).toMatchObject({ outcome: "deescalate", fromTier: 2, targetTier: 1, reason: "de-escalation to tier 1 requested" });
    expect(pool.unit(decision.unitId ?? "")?.tier).toBe(1);
    expect(pool.tierStatus(2).inUse).toBe(0);
  });

  it("releases the session when tier 0 is requested", async () => {
    const bound = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, score: 3 });
    const decision = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, targetTier: 0 });

    expect(decision).toMatchObject({ outcome: "deescalate", targetTier: 0, unitId: null });
    expect(sessions.get("s1").state).toBe("terminated");
    expect(pool.unit(bound.unitId ?? "")?.assignedSession).toBeNull();
  });

  it("validates requests", async () => {
    await expect(engine.decide({ currentTier: "one" })).rejects.toBeInstanceOf(ValidationError);
    await expect(engine.decide({ sourceAddress: "10.1.1.1", currentTier: 5 })).rejects.toThrow(
      "currentTier 5 exceeds the highest tier 2",
    );
    await expect(engine.decide({ sourceAddress: "10.1.1.1", currentTier: 1, score: 11 })).rejects.toThrow(
      "score 11 is outside 0..10",
    );
  });

  it("reports field paths in validation issues", async () => {
    let caught: unknown;
    try {
      await engine.decide({ sourceAddress: "", currentTier: 1 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ issues: ["sourceAddress: String must contain at least 1 character(s)"] });
  });

  it("assigns a session id when none is given", async () => {
    const decision = await engine.decide({ sourceAddress: "10.1.1.1", currentTier: 0, score: 1 });
    expect(decision.sessionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(decision.unitId).toBeNull();
  });

  it("releases sessions on operator request and audits the decision", async () => {
    await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, score: 3 });
    const decision = await engine.releaseSession("s1");

    expect(decision).toMatchObject({ outcome: "deescalate", targetTier: 0, reason: "released by operator" });
    expect((await audit.readAll("s1")).map((d) => d.outcome)).toEqual(["hold", "deescalate"]);
    await expect(engine.releaseSession("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("expires idle sessions through the release path", async () => {
    const bound = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, score: 3 });

    expect(await engine.expireIdle(Date.now() + 5_000)).toBe(1);
    expect(sessions.get("s1").state).toBe("terminated");
    expect(pool.unit(bound.unitId ?? "")?.assignedSession).toBeNull();
    expect(sessions.get("s1").history.at(-1)?.reason).toBe("session expired after inactivity");
  });

  it("rebinds a session whose unit was evicted", async () => {
    const bound = await engine.decide({ sessionId: "s1", sourceAddress: "10.1.1.1", currentTier: 1, score: 3 });
    const lost = bound.unitId ?? "";

    await pool.recycle(lost, { force: true, reason: "operator" });
    await engine.stop();

    const replacement = sessions.get("s1").units.get(1);
    expect(replacement).toBeDefined();
    expect(replacement).not.toBe(lost);
    expect(pool.unit(replacement ?? "")?.assignedSession).toBe("s1");
  });
});
