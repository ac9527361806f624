/**
 * Unit Registry: identity, tier and lifecycle state of every execution unit.
 *
 * The registry is the only place unit records are mutated. Every change is
 * announced on the event bus so the pool manager and the routing publisher can
 * react. Callers receive read-only snapshots, never the live records.
 */

import type { OrchestratorEventBus } from "../events.js";
import { InvalidTransitionError, NotFoundError } from "../errors.js";
import type { Unit, UnitEvent, UnitHandle, UnitState, UnitView } from "../types.js";

const TRANSITIONS: Record<UnitState, Partial<Record<UnitEvent, UnitState>>> = {
  provisioning: { provisioned: "healthy", abort: "terminated" },
  healthy: { degrade: "degraded", fail: "unhealthy", drain: "draining" },
  degraded: { recover: "healthy", fail: "unhealthy" },
  unhealthy: { drain: "draining" },
  draining: { terminate: "terminated" },
  terminated: {},
};

/** Remembered ids of removed units, so late recycle requests stay no-ops. */
const MAX_TOMBSTONES = 10_000;

/** Target state for `event` from `state`, or null when the event is illegal. */
export function nextState(state: UnitState, event: UnitEvent): UnitState | null {
  return TRANSITIONS[state][event] ?? null;
}

export interface NewUnit {
  id: string;
  tier: number;
}

export class UnitRegistry {
  private readonly units = new Map<string, Unit>();
  private readonly tombstones = new Set<string>();
  private readonly events: OrchestratorEventBus;

  constructor(events: OrchestratorEventBus) {
    this.events = events;
  }

  /** Register a new unit in the `provisioning` state. */
  register(input: NewUnit): UnitView {
    if (this.units.has(input.id)) {
      throw new InvalidTransitionError(`unit '${input.id}' is already registered`);
    }
    const now = new Date();
    const unit: Unit = {
      id: input.id,
      tier: input.tier,
      state: "provisioning",
      handle: null,
      address: null,
      createdAt: now,
      lastHealthCheck: null,
      assignedSession: null,
      idleSince: now,
      recycleRequested: false,
      consecutiveFailures: 0,
    };
    this.units.set(unit.id, unit);
    const view = snapshot(unit);
    this.events.emitTyped("unit:registered", { unit: view });
    return view;
  }

  get(id: string): UnitView {
    return snapshot(this.record(id));
  }

  find(id: string): UnitView | undefined {
    const unit = this.units.get(id);
    return unit ? snapshot(unit) : undefined;
  }

  /** True when the unit existed and has since been removed after termination. */
  wasRemoved(id: string): boolean {
    return this.tombstones.has(id);
  }

  /** Units of `tier` (all tiers when omitted), optionally filtered by state, oldest first. */
  list(tier?: number, states?: readonly UnitState[]): UnitView[] {
    const out: UnitView[] = [];
    for (const unit of this.units.values()) {
      if (tier !== undefined && unit.tier !== tier) continue;
      if (states && !states.includes(unit.state)) continue;
      out.push(snapshot(unit));
    }
    return out.sort(
      (a, b) => a.createdAt.getTime() - b.createdAt.getTime() || compareIds(a.id, b.id),
    );
  }

  transition(id: string, event: UnitEvent): UnitView {
    const unit = this.record(id);
    const from = unit.state;
    const to = nextState(from, event);
    if (!to) {
      throw new InvalidTransitionError(`unit '${id}' cannot '${event}' while ${from}`);
    }
    unit.state = to;
    const view = snapshot(unit);
    this.events.emitTyped("unit:state", { unit: view, from, to, event });
    return view;
  }

  /** Record the runtime handle and network address once creation succeeded. */
  attachHandle(id: string, created: UnitHandle): UnitView {
    const unit = this.record(id);
    unit.handle = created.handle;
    unit.address = created.address;
    return snapshot(unit);
  }

  /** Bind a healthy, unbound unit to a session. */
  assign(id: string, sessionId: string): UnitView {
    const unit = this.record(id);
    if (unit.state !== "healthy") {
      throw new InvalidTransitionError(`unit '${id}' is ${unit.state} and cannot be assigned`);
    }
    if (unit.assignedSession !== null) {
      throw new InvalidTransitionError(
        `unit '${id}' is already assigned to session '${unit.assignedSession}'`,
      );
    }
    unit.assignedSession = sessionId;
    const view = snapshot(unit);
    this.events.emitTyped("unit:assigned", { unit: view, sessionId });
    return view;
  }

  /**
   * Clear the unit's session binding. `evicted` marks a release the session did
   * not ask for (failure or forced recycle) so session owners can rebind.
   * Returns the session that was bound, or null.
   */
  unassign(id: string, mode: "released" | "evicted" = "released", reason = "released"): string | null {
    const unit = this.record(id);
    const sessionId = unit.assignedSession;
    if (sessionId === null) return null;
    unit.assignedSession = null;
    unit.idleSince = new Date();
    const view = snapshot(unit);
    if (mode === "evicted") {
      this.events.emitTyped("unit:evicted", { unit: view, sessionId, reason });
    } else {
      this.events.emitTyped("unit:released", { unit: view, sessionId });
    }
    return sessionId;
  }

  markForRecycle(id: string): UnitView {
    const unit = this.record(id);
    unit.recycleRequested = true;
    return snapshot(unit);
  }

  /** Store a probe outcome; returns the consecutive failure count after it. */
  recordProbe(id: string, ok: boolean): number {
    const unit = this.record(id);
    unit.lastHealthCheck = new Date();
    unit.consecutiveFailures = ok ? 0 : unit.consecutiveFailures + 1;
    return unit.consecutiveFailures;
  }

  /** Drop a terminated unit from the registry. */
  remove(id: string): void {
    const unit = this.record(id);
    if (unit.state !== "terminated") {
      throw new InvalidTransitionError(`unit '${id}' is ${unit.state}; only terminated units can be removed`);
    }
    this.units.delete(id);
    this.tombstones.add(id);
    if (this.tombstones.size > MAX_TOMBSTONES) {
      const oldest = this.tombstones.values().next();
      if (!oldest.done) this.tombstones.delete(oldest.value);
    }
    this.events.emitTyped("unit:removed", { unitId: id, tier: unit.tier });
  }

  get size(): number {
    return this.units.size;
  }

  private record(id: string): Unit {
    const unit = this.units.get(id);
    if (!unit) throw new NotFoundError("unit", id);
    return unit;
  }
}

function snapshot(unit: Unit): UnitView {
  return { ...unit };
}

export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
