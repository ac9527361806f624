// Shared type definitions for the tier orchestrator

import { z } from "zod";

// --- Units ---

export type UnitState =
  | "provisioning"
  | "healthy"
  | "degraded"
  | "unhealthy"
  | "draining"
  | "terminated";

/** Lifecycle events accepted by {@link UnitRegistry.transition}. */
export type UnitEvent =
  | "provisioned"
  | "degrade"
  | "recover"
  | "fail"
  | "drain"
  | "terminate"
  | "abort";

export interface Unit {
  id: string;
  tier: number;
  state: UnitState;
  /** Runtime handle (container id) once creation succeeded. */
  handle: string | null;
  /** `host:port` the traffic layer forwards to. */
  address: string | null;
  createdAt: Date;
  lastHealthCheck: Date | null;
  assignedSession: string | null;
  /** When the unit last became free; drives oldest-idle-first allocation. */
  idleSince: Date;
  /** Set by a graceful recycle of a bound unit; the unit terminates on release. */
  recycleRequested: boolean;
  consecutiveFailures: number;
}

export type UnitView = Readonly<Unit>;

// --- Tiers ---

export interface TierPolicy {
  tier: number;
  name: string;
  image: string;
  port: number;
  env: Record<string, string>;
  minSize: number;
  targetSize: number;
  maxSize: number;
}

export interface TierStatus {
  tier: number;
  name: string;
  min: number;
  target: number;
  max: number;
  available: number;
  inUse: number;
  total: number;
  healthy: number;
  degraded: number;
  provisioning: number;
  unhealthy: number;
  draining: number;
  exhausted: boolean;
  creationDegraded: boolean;
  /** Percentage of live units bound to a session. */
  utilization: number;
}

export interface PoolStatus {
  tiers: TierStatus[];
  totalUnits: number;
  totalSessions: number;
}

// --- Sessions ---

export type SessionState = "active" | "terminated";

export type DecisionOutcome = "escalate" | "hold" | "deny" | "deferred" | "deescalate";

export interface EscalationEvent {
  decisionId: string;
  at: Date;
  fromTier: number;
  toTier: number;
  outcome: DecisionOutcome;
  unitId: string | null;
  reason: string;
}

export interface Session {
  id: string;
  sourceAddress: string;
  currentTier: number;
  state: SessionState;
  /** Live unit bindings keyed by tier. */
  units: Map<number, string>;
  history: EscalationEvent[];
  lastScore: number | null;
  escalationCount: number;
  createdAt: Date;
  lastActivity: Date;
}

// --- Escalation ---

export const EscalationRequestSchema = z.object({
  sessionId: z.string().min(1).max(128).regex(/^[A-Za-z0-9._:-]+$/).optional(),
  sourceAddress: z.string().min(1).max(255),
  currentTier: z.number().int().min(0),
  targetTier: z.number().int().min(0).optional(),
  score: z.number().finite().optional(),
  indicators: z.array(z.string().min(1).max(128)).max(64).default([]),
});

export type EscalationRequest = z.input<typeof EscalationRequestSchema>;
export type ParsedEscalationRequest = z.output<typeof EscalationRequestSchema>;

export interface EscalationDecision {
  id: string;
  sessionId: string;
  outcome: DecisionOutcome;
  fromTier: number;
  targetTier: number;
  unitId: string | null;
  unitAddress: string | null;
  reason: string;
  score: number | null;
  indicators: string[];
  decidedAt: Date;
}

// --- Routing ---

export interface RoutingEntry {
  sessionId: string;
  unitId: string;
  tier: number;
  address: string;
}

// --- Collaborators ---

/** Handle returned by the unit runtime after a successful create. */
export interface UnitHandle {
  handle: string;
  address: string;
}

export interface ProbeResult {
  ok: boolean;
  latencyMs: number;
  /** The unit could not be reached at all (hard failure). */
  unreachable: boolean;
}

/** Container/process runtime that owns the actual execution units. */
export interface UnitRuntime {
  create(unitId: string, tier: TierPolicy): Promise<UnitHandle>;
  destroy(handle: string): Promise<void>;
  probe(address: string, timeoutMs: number): Promise<ProbeResult>;
}

export interface ScoreRequest {
  sessionId: string;
  sourceAddress: string;
  currentTier: number;
  indicators: string[];
}

export interface ScoreResult {
  score: number;
  indicators: string[];
}

/** External threat scorer; treated as unreliable. */
export interface Scorer {
  score(request: ScoreRequest, signal: AbortSignal): Promise<ScoreResult>;
}
