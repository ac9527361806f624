import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

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

import { HealthReconciler, classifyProbe, type HealthOptions } from "../../src/health/health-reconciler.js";
import { PoolManager } from "../../src/pool/pool-manager.js";
import { UnitRegistry } from "../../src/registry/unit-registry.js";
import { OrchestratorEventBus } from "../../src/events.js";
import { FakeRuntime, POOL_OPTIONS, makePolicy } from "../helpers/fake-runtime.js";

const HEALTH: HealthOptions = {
  intervalMs: 60_000,
  probeTimeoutMs: 200,
  failureThreshold: 3,
  concurrency: 4,
  degradedLatencyMs: 100,
};

describe("classifyProbe", () => {
  it("classifies probe results", () => {
    expect(classifyProbe({ ok: true, latencyMs: 10, unreachable: false }, 100)).toBe("ok");
    expect(classifyProbe({ ok: true, latencyMs: 150, unreachable: false }, 100)).toBe("slow");
    expect(classifyProbe({ ok: false, latencyMs: 10, unreachable: false }, 100)).toBe("failed");
    expect(classifyProbe({ ok: false, latencyMs: 0, unreachable: true }, 100)).toBe("unreachable");
  });
});

describe("HealthReconciler", () => {
  let runtime: FakeRuntime;
  let pool: PoolManager;
  let health: HealthReconciler;

  beforeEach(async () => {
    const bus = new OrchestratorEventBus();
    runtime = new FakeRuntime();
    pool = new PoolManager(new UnitRegistry(bus), runtime, bus, [makePolicy()], POOL_OPTIONS);
    health = new HealthReconciler(pool, runtime, HEALTH);
    await pool.reconcileTier(1);
  });

  afterEach(async () => {
    await health.stop();
    await pool.stop();
  });

  it("probes every healthy unit", async () => {
    const round = await health.runOnce();
    expect(round).toEqual({ probed: 2, failed: 0, recycled: 0 });
  });

  it("recycles a unit after three failed rounds", async () => {
    const [sick] = pool.units(1);
    if (!sick?.address) throw new Error("expected a unit with an address");
    runtime.probes.set(sick.address, { ok: false, latencyMs: 3, unreachable: false });

    expect(await health.runOnce()).toEqual({ probed: 2, failed: 1, recycled: 0 });
    expect(pool.unit(sick.id)).toMatchObject({ state: "healthy", consecutiveFailures: 1 });
    await health.runOnce();
    const third = await health.runOnce();

    expect(third).toEqual({ probed: 2, failed: 1, recycled: 1 });
    expect(pool.unit(sick.id)?.state).toBe("terminated");
  });

  it("counts a throwing probe as a failure", async () => {
    vi.spyOn(runtime, "probe").mockRejectedValue(new Error("connection reset"));
    const round = await health.runOnce();
    expect(round.failed).toBe(2);
    for (const unit of pool.units(1)) {
      expect(unit.consecutiveFailures).toBe(1);
    }
  });
});
