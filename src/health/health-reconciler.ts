/**
 * Health Reconciler: periodic liveness probing of healthy and degraded units.
 *
 * Probes fan out with bounded concurrency and a per-probe timeout. Verdicts are
 * handed to the pool manager, which owns every resulting state change.
 */

import pLimit from "p-limit";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { PoolManager, ProbeVerdict } from "../pool/pool-manager.js";
import type { ProbeResult, UnitRuntime, UnitView } from "../types.js";
import { TaskTracker, withTimeout } from "../utils/async.js";

export interface HealthOptions {
  intervalMs: number;
  probeTimeoutMs: number;
  /** Consecutive failed probes that make a unit unhealthy. */
  failureThreshold: number;
  concurrency: number;
  /** Probes slower than this mark a healthy unit degraded. */
  degradedLatencyMs: number;
}

export interface HealthRound {
  probed: number;
  failed: number;
  recycled: number;
}

/** Map a probe result onto the verdict the pool manager understands. */
export function classifyProbe(result: ProbeResult, degradedLatencyMs: number): ProbeVerdict {
  if (result.unreachable) return "unreachable";
  if (!result.ok) return "failed";
  return result.latencyMs > degradedLatencyMs ? "slow" : "ok";
}

export class HealthReconciler {
  private readonly log = logger.child({ component: "health" });
  private readonly pool: PoolManager;
  private readonly runtime: UnitRuntime;
  private readonly options: HealthOptions;
  private readonly tasks = new TaskTracker(this.log);
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(pool: PoolManager, runtime: UnitRuntime, options: HealthOptions) {
    this.pool = pool;
    this.runtime = runtime;
    this.options = options;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.running) {
        this.log.warn("previous health round still running, skipping");
        return;
      }
      this.tasks.track(this.runOnce(), "health round");
    }, this.options.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.tasks.drain();
  }

  /** Probe every healthy or degraded unit once. */
  async runOnce(): Promise<HealthRound> {
    this.running = true;
    try {
      const limit = pLimit(this.options.concurrency);
      const targets = this.pool
        .units()
        .filter((u) => (u.state === "healthy" || u.state === "degraded") && u.address !== null);
      const states = await Promise.all(targets.map((unit) => limit(() => this.probeUnit(unit))));
      const round: HealthRound = {
        probed: targets.length,
        failed: states.filter((s) => s.verdict === "failed" || s.verdict === "unreachable").length,
        recycled: states.filter((s) => s.state === "unhealthy").length,
      };
      if (round.failed > 0) this.log.info(round, "health round finished with failures");
      else this.log.debug(round, "health round finished");
      return round;
    } finally {
      this.running = false;
    }
  }

  private async probeUnit(unit: UnitView): Promise<{ verdict: ProbeVerdict; state: string | null }> {
    let verdict: ProbeVerdict;
    if (unit.address === null) {
      verdict = "unreachable";
    } else {
      try {
        const result = await withTimeout(
          this.runtime.probe(unit.address, this.options.probeTimeoutMs),
          // the runtime enforces the timeout too; this is the backstop
          this.options.probeTimeoutMs + 500,
          () => new Error(`probe of ${unit.id} timed out`),
        );
        verdict = classifyProbe(result, this.options.degradedLatencyMs);
      } catch (err: unknown) {
        this.log.warn({ unitId: unit.id, err: errorMessage(err) }, "probe error");
        verdict = "failed";
      }
    }
    if (verdict !== "ok") this.log.warn({ unitId: unit.id, tier: unit.tier, verdict }, "probe did not pass");
    const state = await this.pool.applyProbe(unit.id, verdict, this.options.failureThreshold);
    return { verdict, state };
  }
}
