import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";
import { CreationFailedError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { ProbeResult, TierPolicy, UnitHandle, UnitRuntime } from "../types.js";

const execFile = promisify(execFileCb);

export type CommandRunner = (file: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

export interface DockerRuntimeOptions {
  /** docker CLI binary. */
  binary: string;
  /** Network the units join; empty for the default bridge. */
  network: string;
  /** Path probed on each unit, e.g. `/health`. */
  healthPath: string;
  /** Label namespace, e.g. `tier-orchestrator` gives `tier-orchestrator.tier`. */
  labelPrefix: string;
}

const COMMAND_TIMEOUT_MS = 60_000;

const runCommand: CommandRunner = (file, args) =>
  execFile(file, args, { encoding: "utf8", timeout: COMMAND_TIMEOUT_MS, maxBuffer: 1024 * 1024 });

/**
 * Unit runtime backed by the docker CLI. Each unit is one detached container
 * named after the unit id.
 */
export class DockerRuntime implements UnitRuntime {
  private readonly options: DockerRuntimeOptions;
  private readonly run: CommandRunner;
  private readonly log = logger.child({ component: "docker" });

  constructor(options: DockerRuntimeOptions, run: CommandRunner = runCommand) {
    this.options = options;
    this.run = run;
  }

  async create(unitId: string, tier: TierPolicy): Promise<UnitHandle> {
    const { binary, network, labelPrefix } = this.options;
    const args = [
      "run",
      "-d",
      "--name",
      unitId,
      "--label",
      `${labelPrefix}.tier=${tier.tier}`,
      "--label",
      `${labelPrefix}.unit=${unitId}`,
    ];
    if (network) args.push("--network", network);
    for (const [key, value] of Object.entries(tier.env)) args.push("-e", `${key}=${value}`);
    args.push(tier.image);

    let handle: string;
    try {
      const { stdout } = await this.run(binary, args);
      handle = stdout.trim();
    } catch (err: unknown) {
      throw new CreationFailedError(tier.tier, `docker run failed for ${unitId}: ${errorMessage(err)}`, err);
    }
    if (!handle) {
      throw new CreationFailedError(tier.tier, `docker run returned no container id for ${unitId}`);
    }

    try {
      const ip = await this.inspectAddress(handle);
      this.log.debug({ unitId, handle, ip }, "container started");
      return { handle, address: `${ip}:${tier.port}` };
    } catch (err: unknown) {
      // never leave an unaddressable container behind
      await this.destroy(handle).catch((cleanupErr: unknown) => {
        this.log.warn({ handle, err: errorMessage(cleanupErr) }, "cleanup after failed inspect failed");
      });
      throw new CreationFailedError(tier.tier, `could not resolve address of ${unitId}: ${errorMessage(err)}`, err);
    }
  }

  async destroy(handle: string): Promise<void> {
    try {
      await this.run(this.options.binary, ["rm", "-f", handle]);
      this.log.debug({ handle }, "container removed");
    } catch (err: unknown) {
      if (errorMessage(err).includes("No such container")) return;
      throw err;
    }
  }

  async probe(address: string, timeoutMs: number): Promise<ProbeResult> {
    const started = Date.now();
    try {
      const response = await fetch(`http://${address}${this.options.healthPath}`, {
        signal: AbortSignal.timeout(timeoutMs),
      });
      await response.arrayBuffer();
      return { ok: response.ok, latencyMs: Date.now() - started, unreachable: false };
    } catch (err: unknown) {
      const timedOut = err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
      return { ok: false, latencyMs: Date.now() - started, unreachable: !timedOut };
    }
  }

  private async inspectAddress(handle: string): Promise<string> {
    const format = "{{range .NetworkSettings.Networks}}{{.IPAddress}} {{end}}";
    const { stdout } = await this.run(this.options.binary, ["inspect", "-f", format, handle]);
    const ip = stdout.split(/\s+/).find((part) => part.length > 0);
    if (!ip) throw new Error("container has no IP address");
    return ip;
  }
}
