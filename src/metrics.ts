import { Counter, Gauge, Histogram, Registry } from "prom-client";
import type { OrchestratorEventBus, OrchestratorEvents } from "./events.js";
import type { PoolStatus, TierStatus, UnitView } from "./types.js";

/**
 * Calculates a rounded integer percentage.
 * @param part - The numerator value
 * @param total - The denominator value
 * @returns Rounded percentage (0–100). Returns 0 when total is 0.
 */
export function percent(part: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((part / total) * 100);
}

/**
 * Formats a duration in milliseconds into a human-readable string.
 * @param ms - Duration in milliseconds
 * @returns Formatted string (e.g. '500ms', '5s', '2m', '2m 30s')
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  if (seconds === 0) return `${minutes}m`;
  return `${minutes}m ${seconds}s`;
}

export interface TierCounts {
  available: number;
  inUse: number;
  total: number;
  healthy: number;
  degraded: number;
  provisioning: number;
  unhealthy: number;
  draining: number;
}

/**
 * Counts a tier's units by state. Terminated units are excluded from every
 * count; `available` means healthy, unbound and not marked for recycling.
 */
export function countUnits(units: readonly UnitView[]): TierCounts {
  const counts: TierCounts = {
    available: 0,
    inUse: 0,
    total: 0,
    healthy: 0,
    degraded: 0,
    provisioning: 0,
    unhealthy: 0,
    draining: 0,
  };
  for (const unit of units) {
    if (unit.state === "terminated") continue;
    counts.total++;
    if (unit.assignedSession !== null) counts.inUse++;
    switch (unit.state) {
      case "healthy":
        counts.healthy++;
        if (unit.assignedSession === null && !unit.recycleRequested) counts.available++;
        break;
      case "degraded":
        counts.degraded++;
        break;
      case "provisioning":
        counts.provisioning++;
        break;
      case "unhealthy":
        counts.unhealthy++;
        break;
      case "draining":
        counts.draining++;
        break;
    }
  }
  return counts;
}

/**
 * Returns the tiers that currently need attention, worst first.
 * @returns Comma-separated string (e.g. 'tier 2 exhausted, tier 3 creation degraded'),
 *          or an empty string when every tier is fine.
 */
export function describeAlerts(status: PoolStatus): string {
  const alerts: string[] = [];
  for (const tier of status.tiers) {
    if (tier.exhausted) alerts.push(`tier ${tier.tier} exhausted`);
  }
  for (const tier of status.tiers) {
    if (tier.creationDegraded) alerts.push(`tier ${tier.tier} creation degraded`);
  }
  return alerts.join(", ");
}

/** True when no tier is exhausted or failing to create units. */
export function poolsHealthy(tiers: readonly TierStatus[]): boolean {
  return tiers.every((t) => !t.exhausted && !t.creationDegraded);
}

// --- Prometheus exposition ---

/** Unit gauge label and the tier count it reports. */
const UNIT_GAUGES = [
  ["available", "available"],
  ["in_use", "inUse"],
  ["healthy", "healthy"],
  ["degraded", "degraded"],
  ["provisioning", "provisioning"],
  ["unhealthy", "unhealthy"],
  ["draining", "draining"],
] as const satisfies readonly (readonly [string, keyof TierCounts])[];

/** Ends a request timer once its route and status are known. */
export type RequestTimer = (route: string, status: number) => void;

/**
 * Prometheus registry for one orchestrator. Request and decision counters
 * accumulate as traffic arrives; pool and session gauges are read from
 * `status` whenever the registry is rendered.
 */
export class OrchestratorMetrics {
  readonly registry = new Registry();
  private readonly events: OrchestratorEventBus;
  private readonly status: () => PoolStatus;

  private readonly requests = new Counter({
    name: "orchestrator_http_requests_total",
    help: "HTTP requests by method, route and status",
    labelNames: ["method", "route", "status"] as const,
    registers: [this.registry],
  });
  private readonly latency = new Histogram({
    name: "orchestrator_http_request_duration_seconds",
    help: "HTTP request latency in seconds",
    labelNames: ["method", "route"] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [this.registry],
  });
  private readonly decisions = new Counter({
    name: "orchestrator_decisions_total",
    help: "Escalation decisions by outcome and tier",
    labelNames: ["outcome", "from_tier", "to_tier"] as const,
    registers: [this.registry],
  });
  private readonly activeSessions = new Gauge({
    name: "orchestrator_active_sessions",
    help: "Sessions currently active",
    registers: [this.registry],
  });
  private readonly units = new Gauge({
    name: "orchestrator_pool_units",
    help: "Pool units by tier and state",
    labelNames: ["tier", "state"] as const,
    registers: [this.registry],
  });
  private readonly exhausted = new Gauge({
    name: "orchestrator_tier_exhausted",
    help: "1 while a tier has no unit to hand out",
    labelNames: ["tier"] as const,
    registers: [this.registry],
  });
  private readonly creationDegraded = new Gauge({
    name: "orchestrator_tier_creation_degraded",
    help: "1 while a tier keeps failing to create units",
    labelNames: ["tier"] as const,
    registers: [this.registry],
  });

  private readonly onDecision = ({ decision }: OrchestratorEvents["decision:recorded"]): void => {
    this.decisions.inc({ outcome: decision.outcome, from_tier: decision.fromTier, to_tier: decision.targetTier });
  };

  constructor(events: OrchestratorEventBus, status: () => PoolStatus) {
    this.events = events;
    this.status = status;
  }

  start(): void {
    this.events.onTyped("decision:recorded", this.onDecision);
  }

  stop(): void {
    this.events.offTyped("decision:recorded", this.onDecision);
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  startRequest(method: string): RequestTimer {
    const end = this.latency.startTimer({ method });
    return (route, status) => {
      end({ route });
      this.requests.inc({ method, route, status });
    };
  }

  /** Refresh the pool gauges and render the registry in text format. */
  async render(): Promise<string> {
    const status = this.status();
    this.units.reset();
    this.exhausted.reset();
    this.creationDegraded.reset();
    for (const tier of status.tiers) {
      for (const [state, key] of UNIT_GAUGES) this.units.set({ tier: tier.tier, state }, tier[key]);
      this.exhausted.set({ tier: tier.tier }, tier.exhausted ? 1 : 0);
      this.creationDegraded.set({ tier: tier.tier }, tier.creationDegraded ? 1 : 0);
    }
    this.activeSessions.set(status.totalSessions);
    return this.registry.metrics();
  }
}
