/**
 * Pool Manager: per-tier sizing policy, allocation, release and recycling.
 *
 * Every mutation of a tier runs through that tier's single-slot limiter, so
 * allocations, releases, recycles and reconciliation of one tier are strictly
 * ordered while different tiers proceed in parallel. Critical sections never
 * await I/O: unit creation and destruction run outside the limiter.
 */

import { randomUUID } from "node:crypto";
import pLimit, { type LimitFunction } from "p-limit";
import type { OrchestratorEventBus } from "../events.js";
import {
  CreationFailedError,
  NotFoundError,
  PoolExhaustedError,
  ValidationError,
  errorMessage,
} from "../errors.js";
import { logger } from "../logger.js";
import { countUnits, percent } from "../metrics.js";
import { compareIds, type UnitRegistry } from "../registry/unit-registry.js";
import type {
  PoolStatus,
  TierPolicy,
  TierStatus,
  UnitRuntime,
  UnitState,
  UnitView,
} from "../types.js";
import { TaskTracker, withTimeout } from "../utils/async.js";

export interface PoolOptions {
  reconcileIntervalMs: number;
  createTimeoutMs: number;
  createBackoffBaseMs: number;
  createBackoffMaxMs: number;
  /** Consecutive creation failures before the tier is reported creation-degraded. */
  degradedAfterFailures: number;
  /** How long a bound unit may keep serving after a graceful recycle. */
  drainGraceMs: number;
  /** How long terminated units stay listed before removal. */
  terminatedRetentionMs: number;
}

export interface RecycleOptions {
  /** Evict a bound session immediately instead of draining with grace. */
  force?: boolean;
  reason?: string;
}

export interface SizeChange {
  min?: number;
  target?: number;
  max?: number;
}

/** Classified outcome of one liveness probe. */
export type ProbeVerdict = "ok" | "slow" | "failed" | "unreachable";

interface TierRuntime {
  policy: TierPolicy;
  limit: LimitFunction;
  exhausted: boolean;
  creationFailures: number;
  nextCreateAt: number;
  creationDegraded: boolean;
}

export class PoolManager {
  private readonly log = logger.child({ component: "pool-manager" });
  private readonly registry: UnitRegistry;
  private readonly runtime: UnitRuntime;
  private readonly events: OrchestratorEventBus;
  private readonly options: PoolOptions;
  private readonly tiers = new Map<number, TierRuntime>();
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly tasks = new TaskTracker(this.log);
  private reconcileTimer: NodeJS.Timeout | null = null;
  private reconciling = false;

  constructor(
    registry: UnitRegistry,
    runtime: UnitRuntime,
    events: OrchestratorEventBus,
    policies: readonly TierPolicy[],
    options: PoolOptions,
  ) {
    this.registry = registry;
    this.runtime = runtime;
    this.events = events;
    this.options = options;
    for (const policy of policies) {
      assertSizes(policy.minSize, policy.targetSize, policy.maxSize);
      this.tiers.set(policy.tier, {
        policy: { ...policy },
        limit: pLimit(1),
        exhausted: false,
        creationFailures: 0,
        nextCreateAt: 0,
        creationDegraded: false,
      });
    }
  }

  // --- Tier policy ---

  tierPolicies(): TierPolicy[] {
    return [...this.tiers.values()]
      .map((t) => ({ ...t.policy }))
      .sort((a, b) => a.tier - b.tier);
  }

  getPolicy(tier: number): TierPolicy {
    return { ...this.tier(tier).policy };
  }

  hasTier(tier: number): boolean {
    return this.tiers.has(tier);
  }

  maxTier(): number {
    return Math.max(0, ...this.tiers.keys());
  }

  /** Force a pool-size change; reconciliation converges on the new target. */
  async resize(tier: number, change: SizeChange): Promise<TierPolicy> {
    const state = this.tier(tier);
    const updated = await state.limit(async () => {
      const minSize = change.min ?? state.policy.minSize;
      const targetSize = change.target ?? state.policy.targetSize;
      const maxSize = change.max ?? state.policy.maxSize;
      assertSizes(minSize, targetSize, maxSize);
      state.policy = { ...state.policy, minSize, targetSize, maxSize };
      this.log.info({ tier, minSize, targetSize, maxSize }, "tier resized");
      return { ...state.policy };
    });
    this.tasks.track(this.reconcileTier(tier), `reconcile tier ${tier} after resize`);
    return updated;
  }

  // --- Allocation ---

  /**
   * Bind the longest-idle healthy unit of `tier` to `sessionId`.
   * Throws {@link PoolExhaustedError} when no unit is eligible.
   */
  async allocate(tier: number, sessionId: string): Promise<UnitView> {
    const state = this.tier(tier);
    return state.limit(async () => {
      const chosen = this.registry
        .list(tier, ["healthy"])
        .filter((u) => u.assignedSession === null && !u.recycleRequested)
        .sort(byIdleAge)[0];
      if (!chosen) {
        this.log.warn({ tier, sessionId }, "no eligible unit for allocation");
        throw new PoolExhaustedError(tier);
      }
      const unit = this.registry.assign(chosen.id, sessionId);
      this.log.info({ tier, sessionId, unitId: unit.id }, "unit allocated");
      return unit;
    });
  }

  /**
   * Clear a unit's session binding. A unit that was draining for a recycle is
   * terminated instead of returning to the pool. When `expectedSession` is
   * given the release only applies if the unit is still bound to it.
   */
  async release(unitId: string, expectedSession?: string): Promise<boolean> {
    const unit = this.registry.get(unitId);
    return this.tier(unit.tier).limit(async () => {
      const current = this.registry.find(unitId);
      if (!current || current.assignedSession === null) return false;
      if (expectedSession !== undefined && current.assignedSession !== expectedSession) {
        return false;
      }
      this.registry.unassign(unitId, "released");
      this.log.info({ unitId, sessionId: current.assignedSession }, "unit released");
      if (current.state === "draining") {
        this.terminateLocked(unitId, "released while draining");
      }
      return true;
    });
  }

  // --- Recycling ---

  /**
   * Replace a unit with a fresh one. Returns false when there was nothing to
   * do (already terminated or removed).
   */
  async recycle(unitId: string, options: RecycleOptions = {}): Promise<boolean> {
    const unit = this.registry.find(unitId);
    if (!unit) {
      if (this.registry.wasRemoved(unitId)) return false;
      throw new NotFoundError("unit", unitId);
    }
    const recycled = await this.tier(unit.tier).limit(async () => this.recycleLocked(unitId, options));
    if (recycled) {
      this.tasks.track(this.reconcileTier(unit.tier), `replace unit ${unitId}`);
    }
    return recycled;
  }

  /** Recycle every live unit of a tier. Returns how many were recycled. */
  async recycleTier(tier: number, options: RecycleOptions = {}): Promise<number> {
    const count = await this.tier(tier).limit(async () => {
      let recycled = 0;
      for (const unit of this.registry.list(tier)) {
        if (this.recycleLocked(unit.id, options)) recycled++;
      }
      return recycled;
    });
    this.log.info({ tier, count }, "tier recycled");
    this.tasks.track(this.reconcileTier(tier), `replace units of tier ${tier}`);
    return count;
  }

  /**
   * Apply a health probe verdict. Failed probes are only counted until
   * `failureThreshold` consecutive failures (or an unreachable unit) make the
   * unit unhealthy, so a single failure never takes a bound unit out of the
   * routing table. Slow probes degrade the unit; unhealthy units are recycled
   * at once.
   */
  async applyProbe(unitId: string, verdict: ProbeVerdict, failureThreshold: number): Promise<UnitState | null> {
    const unit = this.registry.find(unitId);
    if (!unit) return null;
    const outcome = await this.tier(unit.tier).limit(async () => {
      const current = this.registry.find(unitId);
      if (!current) return { state: null, recycled: false };
      if (current.state !== "healthy" && current.state !== "degraded") {
        return { state: current.state, recycled: false };
      }
      const passed = verdict === "ok" || verdict === "slow";
      const failures = this.registry.recordProbe(unitId, passed);
      let state: UnitState = current.state;

      if (verdict === "ok") {
        if (state === "degraded") state = this.registry.transition(unitId, "recover").state;
      } else if (verdict === "slow") {
        if (state === "healthy") state = this.registry.transition(unitId, "degrade").state;
      } else if (verdict === "unreachable" || failures >= failureThreshold) {
        state = this.registry.transition(unitId, "fail").state;
      }

      if (state !== current.state) {
        this.log.warn({ unitId, from: current.state, to: state, verdict, failures }, "unit health changed");
      }
      if (state === "unhealthy") {
        this.recycleLocked(unitId, { force: true, reason: `health check failed (${verdict})` });
        return { state, recycled: true };
      }
      return { state, recycled: false };
    });
    if (outcome.recycled) {
      this.tasks.track(this.reconcileTier(unit.tier), `replace unhealthy unit ${unitId}`);
    }
    return outcome.state;
  }

  // --- Reconciliation ---

  start(): void {
    if (this.reconcileTimer) return;
    this.tasks.track(this.reconcile(), "initial reconcile");
    this.reconcileTimer = setInterval(() => {
      if (this.reconciling) return;
      this.tasks.track(this.reconcile(), "reconcile");
    }, this.options.reconcileIntervalMs);
    this.reconcileTimer.unref();
  }

  async stop(): Promise<void> {
    if (this.reconcileTimer) {
      clearInterval(this.reconcileTimer);
      this.reconcileTimer = null;
    }
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    await this.tasks.drain();
  }

  /** Reconcile every tier concurrently. Tier failures are logged, never thrown. */
  async reconcile(): Promise<void> {
    this.reconciling = true;
    try {
      const tiers = [...this.tiers.keys()];
      const results = await Promise.allSettled(tiers.map((tier) => this.reconcileTier(tier)));
      results.forEach((result, i) => {
        if (result.status === "rejected") {
          this.log.error({ err: result.reason, tier: tiers[i] }, "tier reconciliation failed");
        }
      });
    } finally {
      this.reconciling = false;
    }
  }

  /**
   * Converge one tier on its target size: provision the deficit (bounded by
   * max size and the creation backoff), drain idle surplus, and track whether
   * the tier is exhausted.
   */
  async reconcileTier(tier: number): Promise<void> {
    const state = this.tier(tier);
    const toCreate = await state.limit(async () => {
      const { minSize, targetSize, maxSize } = state.policy;
      const counts = countUnits(this.registry.list(tier));
      const live = counts.healthy + counts.degraded + counts.provisioning;

      const exhausted = counts.healthy === 0 && minSize > 0;
      if (exhausted !== state.exhausted) {
        state.exhausted = exhausted;
        if (exhausted) {
          this.log.warn({ tier }, "tier exhausted");
          this.events.emitTyped("tier:exhausted", { tier });
        } else {
          this.log.info({ tier }, "tier recovered");
          this.events.emitTyped("tier:recovered", { tier });
        }
      }

      const surplus = Math.max(live - targetSize, counts.total - maxSize);
      if (surplus > 0) {
        const idle = this.registry
          .list(tier, ["healthy"])
          .filter((u) => u.assignedSession === null && !u.recycleRequested)
          .sort(byIdleAge)
          .slice(0, surplus);
        for (const unit of idle) this.recycleLocked(unit.id, { reason: "scale down" });
        if (idle.length > 0) this.log.info({ tier, drained: idle.length }, "surplus units drained");
        return [];
      }

      const deficit = targetSize - live;
      if (deficit <= 0) return [];
      if (Date.now() < state.nextCreateAt) {
        this.log.debug({ tier, retryAt: new Date(state.nextCreateAt).toISOString() }, "unit creation backing off");
        return [];
      }
      const count = Math.min(deficit, maxSize - counts.total);
      const ids: string[] = [];
      for (let i = 0; i < count; i++) {
        const unit = this.registry.register({ id: newUnitId(state.policy), tier });
        ids.push(unit.id);
      }
      if (ids.length > 0) this.log.info({ tier, count: ids.length, deficit }, "provisioning units");
      return ids;
    });
    await Promise.all(toCreate.map((id) => this.provisionUnit(id, tier)));
  }

  // --- Status ---

  tierStatus(tier: number): TierStatus {
    const state = this.tier(tier);
    const counts = countUnits(this.registry.list(tier));
    return {
      tier,
      name: state.policy.name,
      min: state.policy.minSize,
      target: state.policy.targetSize,
      max: state.policy.maxSize,
      ...counts,
      exhausted: counts.healthy === 0 && state.policy.minSize > 0,
      creationDegraded: state.creationDegraded,
      utilization: percent(counts.inUse, counts.total),
    };
  }

  status(totalSessions: number): PoolStatus {
    const tiers = this.tierPolicies().map((p) => this.tierStatus(p.tier));
    return {
      tiers,
      totalUnits: tiers.reduce((sum, t) => sum + t.total, 0),
      totalSessions,
    };
  }

  units(tier?: number): UnitView[] {
    return this.registry.list(tier);
  }

  unit(unitId: string): UnitView | undefined {
    return this.registry.find(unitId);
  }

  // --- Internals (callers hold the tier limiter) ---

  private recycleLocked(unitId: string, options: RecycleOptions): boolean {
    const unit = this.registry.find(unitId);
    if (!unit || unit.state === "terminated") return false;
    const reason = options.reason ?? "recycle requested";
    const force = options.force ?? false;
    const bound = unit.assignedSession !== null;

    switch (unit.state) {
      case "provisioning":
        // creation is in flight; the unit is aborted as soon as it completes
        this.registry.markForRecycle(unitId);
        return true;
      case "draining":
        if (bound && !force) return true;
        break;
      case "healthy":
        if (bound && !force) {
          this.registry.markForRecycle(unitId);
          this.registry.transition(unitId, "drain");
          this.scheduleGraceExpiry(unitId);
          this.log.info({ unitId, sessionId: unit.assignedSession, reason }, "unit draining with grace");
          return true;
        }
        this.registry.transition(unitId, "drain");
        break;
      case "degraded":
        this.registry.transition(unitId, "fail");
        this.registry.transition(unitId, "drain");
        break;
      case "unhealthy":
        this.registry.transition(unitId, "drain");
        break;
    }

    if (bound) this.registry.unassign(unitId, "evicted", reason);
    this.terminateLocked(unitId, reason);
    return true;
  }

  private terminateLocked(unitId: string, reason: string): void {
    const unit = this.registry.transition(unitId, "terminate");
    this.log.info({ unitId, tier: unit.tier, reason }, "unit terminated");
    if (unit.handle) {
      this.tasks.track(this.runtime.destroy(unit.handle), `destroy unit ${unitId}`);
    }
    this.scheduleRemoval(unitId);
  }

  private async provisionUnit(unitId: string, tier: number): Promise<void> {
    const state = this.tier(tier);
    const creation = this.runtime.create(unitId, state.policy);
    try {
      const created = await withTimeout(
        creation,
        this.options.createTimeoutMs,
        () => new CreationFailedError(tier, `creation of unit ${unitId} timed out after ${this.options.createTimeoutMs}ms`),
      );
      await state.limit(async () => {
        this.registry.attachHandle(unitId, created);
        if (this.registry.get(unitId).recycleRequested) {
          this.registry.transition(unitId, "abort");
          this.tasks.track(this.runtime.destroy(created.handle), `destroy aborted unit ${unitId}`);
          this.scheduleRemoval(unitId);
          return;
        }
        this.registry.transition(unitId, "provisioned");
        state.creationFailures = 0;
        state.nextCreateAt = 0;
        if (state.creationDegraded) {
          state.creationDegraded = false;
          this.log.info({ tier }, "unit creation recovered");
        }
        this.log.info({ unitId, tier, address: created.address }, "unit provisioned");
      });
    } catch (err: unknown) {
      // a creation that finishes after its timeout must not leak the unit
      this.tasks.track(
        creation.then((late) => this.runtime.destroy(late.handle), () => undefined),
        `discard late unit ${unitId}`,
      );
      await state.limit(async () => {
        this.registry.transition(unitId, "abort");
        this.scheduleRemoval(unitId);
        state.creationFailures++;
        const delay = Math.min(
          this.options.createBackoffBaseMs * 2 ** (state.creationFailures - 1),
          this.options.createBackoffMaxMs,
        );
        state.nextCreateAt = Date.now() + delay;
        this.log.error(
          { err: errorMessage(err), unitId, tier, failures: state.creationFailures, retryInMs: delay },
          "unit creation failed",
        );
        if (state.creationFailures >= this.options.degradedAfterFailures && !state.creationDegraded) {
          state.creationDegraded = true;
          this.events.emitTyped("tier:creation-degraded", { tier, failures: state.creationFailures });
          this.log.error({ tier, failures: state.creationFailures }, "tier degraded: unit creation keeps failing");
        }
      });
    }
  }

  private scheduleRemoval(unitId: string): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      if (this.registry.find(unitId)?.state === "terminated") {
        this.registry.remove(unitId);
      }
    }, this.options.terminatedRetentionMs);
    timer.unref();
    this.timers.add(timer);
  }

  private scheduleGraceExpiry(unitId: string): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.tasks.track(
        this.recycle(unitId, { force: true, reason: "drain grace expired" }),
        `expire drain grace of ${unitId}`,
      );
    }, this.options.drainGraceMs);
    timer.unref();
    this.timers.add(timer);
  }

  private tier(tier: number): TierRuntime {
    const state = this.tiers.get(tier);
    if (!state) throw new NotFoundError("tier", tier);
    return state;
  }
}

function assertSizes(min: number, target: number, max: number): void {
  if (!(min >= 0 && min <= target && target <= max && max >= 1)) {
    throw new ValidationError(`tier sizes must satisfy 0 <= min <= target <= max and max >= 1 (got ${min}/${target}/${max})`);
  }
}

/** Oldest idle first, ties broken by unit id. */
function byIdleAge(a: UnitView, b: UnitView): number {
  return a.idleSince.getTime() - b.idleSince.getTime() || compareIds(a.id, b.id);
}

function newUnitId(policy: TierPolicy): string {
  return `${policy.name}-${randomUUID().slice(0, 8)}`;
}
