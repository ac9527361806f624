import { compareIds } from "../registry/unit-registry.js";
import type { RoutingEntry, UnitState, UnitView } from "../types.js";

/** States a unit may be in while traffic is still routed to it. */
export const ROUTABLE_STATES: readonly UnitState[] = ["healthy", "draining"];

export function isRoutable(unit: UnitView): boolean {
  return unit.assignedSession !== null && unit.address !== null && ROUTABLE_STATES.includes(unit.state);
}

/**
 * Derive the routing table from unit assignments. While a session is moving
 * between tiers it briefly holds two units; the higher tier wins.
 * Entries are sorted by session id.
 */
export function buildRoutingTable(units: readonly UnitView[]): RoutingEntry[] {
  const bySession = new Map<string, RoutingEntry>();
  for (const unit of units) {
    if (!isRoutable(unit) || unit.assignedSession === null || unit.address === null) continue;
    const existing = bySession.get(unit.assignedSession);
    if (existing && existing.tier >= unit.tier) continue;
    bySession.set(unit.assignedSession, {
      sessionId: unit.assignedSession,
      unitId: unit.id,
      tier: unit.tier,
      address: unit.address,
    });
  }
  return [...bySession.values()].sort((a, b) => compareIds(a.sessionId, b.sessionId));
}
