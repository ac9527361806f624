/**
 * Routing Publisher: single writer of the session→unit routing artifact.
 *
 * Membership changes mark the table dirty and schedule a coalesced publish:
 * each change pushes the publish back by `debounceMs`, but never past
 * `maxDelayMs` after the first unpublished change. A session losing its unit,
 * or a published unit leaving a routable state, publishes immediately. Every
 * publish renders the latest state.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import pLimit from "p-limit";
import { errorMessage } from "../errors.js";
import type { OrchestratorEvents, OrchestratorEventBus } from "../events.js";
import { logger } from "../logger.js";
import type { UnitRegistry } from "../registry/unit-registry.js";
import type { RoutingEntry } from "../types.js";
import { TaskTracker } from "../utils/async.js";
import {
  renderArtifact,
  validateNginxMap,
  writeAtomic,
  type ArtifactFormat,
  type NginxMapOptions,
} from "./artifact.js";
import { ROUTABLE_STATES, buildRoutingTable } from "./routing-table.js";

const execFileAsync = promisify(execFile);

const RELOAD_TIMEOUT_MS = 10_000;

export interface PublisherOptions {
  path: string;
  format: ArtifactFormat;
  debounceMs: number;
  maxDelayMs: number;
  /** argv run after each successful publish, e.g. `["nginx", "-s", "reload"]`. Empty disables. */
  reloadCommand: string[];
  nginx: NginxMapOptions;
}

export interface PublishedTable {
  at: Date;
  entries: RoutingEntry[];
}

export class RoutingPublisher {
  private readonly log = logger.child({ component: "routing" });
  private readonly registry: UnitRegistry;
  private readonly events: OrchestratorEventBus;
  private readonly options: PublisherOptions;
  private readonly limit = pLimit(1);
  private readonly tasks = new TaskTracker(this.log);
  private timer: NodeJS.Timeout | null = null;
  private dirty = false;
  private firstDirtyAt: number | null = null;
  private lastPublished: PublishedTable | null = null;
  private started = false;

  private readonly onMembership = (): void => this.markDirty();
  private readonly onEvicted = (): void => this.publishSoon();
  private readonly onState = ({ unit, from, to }: OrchestratorEvents["unit:state"]): void => {
    const was = ROUTABLE_STATES.includes(from);
    const is = ROUTABLE_STATES.includes(to);
    // a unit released while draining is unbound by now but may still be published
    if (was && !is && (unit.assignedSession !== null || this.isPublished(unit.id))) this.publishSoon();
    else if (unit.assignedSession !== null && was !== is) this.markDirty();
  };

  constructor(registry: UnitRegistry, events: OrchestratorEventBus, options: PublisherOptions) {
    this.registry = registry;
    this.events = events;
    this.options = options;
  }

  get path(): string {
    return this.options.path;
  }

  get published(): PublishedTable | null {
    return this.lastPublished;
  }

  get pending(): boolean {
    return this.dirty;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.events.onTyped("unit:assigned", this.onMembership);
    this.events.onTyped("unit:released", this.onMembership);
    this.events.onTyped("unit:evicted", this.onEvicted);
    this.events.onTyped("unit:state", this.onState);
    this.markDirty();
  }

  /** Unsubscribe and publish the final state. */
  async stop(): Promise<void> {
    if (this.started) {
      this.started = false;
      this.events.offTyped("unit:assigned", this.onMembership);
      this.events.offTyped("unit:released", this.onMembership);
      this.events.offTyped("unit:evicted", this.onEvicted);
      this.events.offTyped("unit:state", this.onState);
    }
    this.clearTimer();
    await this.tasks.drain();
    try {
      await this.publishNow();
    } catch (err: unknown) {
      this.log.error({ err }, "final routing publication failed");
    }
  }

  /** The authoritative in-memory table, derived from current assignments. */
  snapshot(): RoutingEntry[] {
    return buildRoutingTable(this.registry.list());
  }

  markDirty(): void {
    this.dirty = true;
    const now = Date.now();
    if (this.firstDirtyAt === null) this.firstDirtyAt = now;
    this.clearTimer();
    const wait = Math.max(0, Math.min(this.options.debounceMs, this.firstDirtyAt + this.options.maxDelayMs - now));
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tasks.track(this.flush(), "publish routing table");
    }, wait);
  }

  /** Publish if anything changed since the last publication. */
  async flush(): Promise<RoutingEntry[] | null> {
    if (!this.dirty) return null;
    return this.publishNow();
  }

  /** Render and atomically replace the artifact with the current table. */
  async publishNow(): Promise<RoutingEntry[]> {
    return this.limit(async () => {
      this.clearTimer();
      this.dirty = false;
      this.firstDirtyAt = null;
      const entries = this.snapshot();
      const at = new Date();
      try {
        const content = renderArtifact(this.options.format, entries, at, this.options.nginx);
        writeAtomic(
          this.options.path,
          content,
          this.options.format === "nginx-map" ? validateNginxMap : undefined,
        );
      } catch (err: unknown) {
        if (this.started) this.markDirty();
        else this.dirty = true;
        this.log.error({ err: errorMessage(err), path: this.options.path }, "routing publication failed");
        throw err;
      }
      this.lastPublished = { at, entries };
      this.log.info({ path: this.options.path, entries: entries.length }, "routing table published");
      this.events.emitTyped("routing:published", { path: this.options.path, entries: entries.length });
      await this.reload();
      return entries;
    });
  }

  private isPublished(unitId: string): boolean {
    return this.lastPublished?.entries.some((e) => e.unitId === unitId) ?? false;
  }

  private publishSoon(): void {
    this.dirty = true;
    this.clearTimer();
    this.tasks.track(this.flush(), "publish routing table after eviction");
  }

  private async reload(): Promise<void> {
    const [command, ...args] = this.options.reloadCommand;
    if (command === undefined) return;
    try {
      await execFileAsync(command, args, { timeout: RELOAD_TIMEOUT_MS });
      this.log.debug({ command }, "traffic layer reloaded");
    } catch (err: unknown) {
      this.log.warn({ err: errorMessage(err), command }, "traffic layer reload failed");
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
