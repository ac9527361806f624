import type { ProbeResult, TierPolicy, UnitHandle, UnitRuntime } from "../../src/types.js";
import type { PoolOptions } from "../../src/pool/pool-manager.js";

/** In-process unit runtime: addresses are made up, probes answer from a table. */
export class FakeRuntime implements UnitRuntime {
  readonly created: string[] = [];
  readonly destroyed: string[] = [];
  /** Probe results keyed by unit address; unknown addresses answer ok. */
  readonly probes = new Map<string, ProbeResult>();
  failCreate = false;
  private counter = 0;

  async create(unitId: string, tier: TierPolicy): Promise<UnitHandle> {
    if (this.failCreate) throw new Error(`cannot start ${tier.image}`);
    this.counter++;
    this.created.push(unitId);
    return { handle: `ctr-${unitId}`, address: `10.0.${tier.tier}.${this.counter}:${tier.port}` };
  }

  async destroy(handle: string): Promise<void> {
    this.destroyed.push(handle);
  }

  async probe(address: string): Promise<ProbeResult> {
    return this.probes.get(address) ?? { ok: true, latencyMs: 5, unreachable: false };
  }
}

export function makePolicy(overrides: Partial<TierPolicy> = {}): TierPolicy {
  return {
    tier: 1,
    name: "tier1",
    image: "units/tier1:test",
    port: 8080,
    env: {},
    minSize: 1,
    targetSize: 2,
    maxSize: 3,
    ...overrides,
  };
}

export const POOL_OPTIONS: PoolOptions = {
  reconcileIntervalMs: 60_000,
  createTimeoutMs: 1_000,
  createBackoffBaseMs: 0,
  createBackoffMaxMs: 0,
  degradedAfterFailures: 3,
  drainGraceMs: 60_000,
  terminatedRetentionMs: 60_000,
};
