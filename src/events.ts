// Typed event system connecting the registry and pool manager to their observers.

import { EventEmitter } from "node:events";
import type { EscalationDecision, UnitEvent, UnitState, UnitView } from "./types.js";

export interface OrchestratorEvents {
  "unit:registered": { unit: UnitView };
  "unit:state": { unit: UnitView; from: UnitState; to: UnitState; event: UnitEvent };
  "unit:assigned": { unit: UnitView; sessionId: string };
  "unit:released": { unit: UnitView; sessionId: string };
  /** A bound unit lost its session without the session asking for it (failure or forced recycle). */
  "unit:evicted": { unit: UnitView; sessionId: string; reason: string };
  "unit:removed": { unitId: string; tier: number };
  "tier:exhausted": { tier: number };
  "tier:recovered": { tier: number };
  "tier:creation-degraded": { tier: number; failures: number };
  "routing:published": { path: string; entries: number };
  "decision:recorded": { decision: EscalationDecision };
}

type EventKey = keyof OrchestratorEvents;

/**
 * Type-safe event bus for component notifications.
 *
 * Wraps Node's EventEmitter with typed `emitTyped` / `onTyped` methods
 * so callers get compile-time safety on event names and payloads.
 */
export class OrchestratorEventBus extends EventEmitter {
  /** Emit an event with a type-checked payload. */
  emitTyped<K extends EventKey>(event: K, payload: OrchestratorEvents[K]): void {
    this.emit(event, payload);
  }

  /** Subscribe to an event with a type-checked listener. */
  onTyped<K extends EventKey>(event: K, listener: (payload: OrchestratorEvents[K]) => void): this {
    return this.on(event, listener as (...args: unknown[]) => void);
  }

  /** Remove a listener registered with {@link onTyped}. */
  offTyped<K extends EventKey>(event: K, listener: (payload: OrchestratorEvents[K]) => void): this {
    return this.off(event, listener as (...args: unknown[]) => void);
  }
}
