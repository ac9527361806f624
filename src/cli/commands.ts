/**
 * CLI command definitions: every command registered on the Commander program.
 *
 * Commands that change pool or routing state talk to the running orchestrator
 * over its signed admin API instead of touching state themselves.
 */

import * as path from "node:path";
import type { Command } from "commander";
import { z } from "zod";
import { requestScope } from "../auth/authenticator.js";
import { buildOrchestratorConfig, DEFAULT_CONFIG_PATH } from "../config.js";
import { logger, redirectLogToFile, setLogLevel } from "../logger.js";
import { describeAlerts, formatDuration } from "../metrics.js";
import { Orchestrator } from "../orchestrator.js";
import { readRoutingTable } from "../routing/artifact.js";
import type { RoutingEntry } from "../types.js";
import {
  authenticatorFor,
  loadConfigFromOpts,
  parseSize,
  parseTier,
  signedRequest,
} from "./helpers.js";
import { initProject } from "./init.js";

interface GlobalOptions {
  config?: string;
}

const TierStatusSchema = z.object({
  tier: z.number(),
  name: z.string(),
  min: z.number(),
  target: z.number(),
  max: z.number(),
  available: z.number(),
  inUse: z.number(),
  total: z.number(),
  healthy: z.number(),
  degraded: z.number(),
  provisioning: z.number(),
  unhealthy: z.number(),
  draining: z.number(),
  exhausted: z.boolean(),
  creationDegraded: z.boolean(),
  utilization: z.number(),
});

const PoolStatusSchema = z.object({
  tiers: z.array(TierStatusSchema),
  totalUnits: z.number(),
  totalSessions: z.number(),
});

const HealthSchema = z.object({
  status: z.enum(["healthy", "degraded", "unhealthy"]),
  version: z.string(),
  uptimeSeconds: z.number(),
});

const RoutesSchema = z.object({
  entries: z.array(
    z.object({ sessionId: z.string(), unitId: z.string(), tier: z.number(), address: z.string() }),
  ),
  publishedAt: z.string().nullable(),
  pending: z.boolean(),
});

/** Register all CLI commands on the given Commander program. */
export function registerCommands(program: Command): void {
  registerServe(program);
  registerStatus(program);
  registerRecycle(program);
  registerResize(program);
  registerRoutes(program);
  registerSign(program);
  registerInit(program);
  registerValidateConfig(program);
}

function configPath(program: Command): string | undefined {
  return program.opts<GlobalOptions>().config;
}

function fail(what: string, err: unknown): never {
  logger.error({ err }, `${what} failed`);
  console.error(`❌ ${what} failed:`, err instanceof Error ? err.message : err);
  process.exit(1);
}

// --- serve ---
function registerServe(program: Command): void {
  program
    .command("serve")
    .description("Start the orchestrator (API, pool reconciliation, health probing, routing publication)")
    .option("--log-file <path>", "Write logs to a file instead of stdout")
    .action(async (opts: { logFile?: string }) => {
      try {
        const file = loadConfigFromOpts(configPath(program));
        if (opts.logFile) redirectLogToFile(opts.logFile);
        setLogLevel(file.logging.level);

        const orchestrator = new Orchestrator(buildOrchestratorConfig(file));
        await orchestrator.start();
        console.log(`✅ Orchestrator listening on ${file.server.host}:${orchestrator.server.port}`);

        let stopping = false;
        const shutdown = (signal: string): void => {
          if (stopping) return;
          stopping = true;
          logger.info({ signal }, "Shutting down");
          orchestrator.stop().then(
            () => process.exit(0),
            (err: unknown) => {
              logger.error({ err }, "Shutdown failed");
              process.exit(1);
            },
          );
        };
        process.on("SIGINT", () => shutdown("SIGINT"));
        process.on("SIGTERM", () => shutdown("SIGTERM"));
      } catch (err: unknown) {
        fail("Orchestrator start", err);
      }
    });
}

// --- status ---
function registerStatus(program: Command): void {
  program
    .command("status")
    .description("Show per-tier pool status of the running orchestrator")
    .option("--url <url>", "Orchestrator base URL (default: from config)")
    .action(async (opts: { url?: string }) => {
      try {
        const config = loadConfigFromOpts(configPath(program));
        const status = PoolStatusSchema.parse(await signedRequest(config, { method: "GET", path: "/pools", url: opts.url }));
        // /healthz answers 503 once every tier with a floor is exhausted
        const health = await signedRequest(config, { method: "GET", path: "/healthz", url: opts.url }).then(
          (body) => HealthSchema.parse(body),
          (err: unknown) => {
            logger.warn({ err }, "health check failed");
            return null;
          },
        );
        console.log(
          health
            ? `\n🩺 ${health.status}, v${health.version}, up ${formatDuration(health.uptimeSeconds * 1000)}`
            : "\n🩺 unhealthy",
        );
        console.log(`📊 Pools: ${status.totalUnits} units, ${status.totalSessions} active sessions`);
        console.log("─".repeat(40));
        for (const t of status.tiers) {
          const flags = [t.exhausted ? "EXHAUSTED" : "", t.creationDegraded ? "CREATION DEGRADED" : ""].filter(Boolean);
          console.log(
            `  Tier ${t.tier} (${t.name}): ${t.available} available, ${t.inUse} in use, ${t.total} total` +
              ` [min ${t.min} / target ${t.target} / max ${t.max}] ${t.utilization}% utilized` +
              (flags.length > 0 ? `  ⚠️  ${flags.join(", ")}` : ""),
          );
          console.log(
            `    healthy ${t.healthy}, degraded ${t.degraded}, provisioning ${t.provisioning},` +
              ` unhealthy ${t.unhealthy}, draining ${t.draining}`,
          );
        }
        const alerts = describeAlerts(status);
        if (alerts) console.log(`\n⚠️  ${alerts}`);
      } catch (err: unknown) {
        fail("Status", err);
      }
    });
}

// --- recycle ---
function registerRecycle(program: Command): void {
  program
    .command("recycle")
    .description("Recycle one unit or every unit of a tier")
    .option("--unit <id>", "Unit id to recycle")
    .option("--tier <number>", "Tier to recycle", parseTier)
    .option("--force", "Evict bound sessions immediately instead of draining", false)
    .option("--url <url>", "Orchestrator base URL (default: from config)")
    .action(async (opts: { unit?: string; tier?: number; force: boolean; url?: string }) => {
      try {
        if ((opts.unit === undefined) === (opts.tier === undefined)) {
          throw new Error("Specify exactly one of --unit or --tier");
        }
        const config = loadConfigFromOpts(configPath(program));
        const requestPath = opts.unit !== undefined
          ? `/admin/units/${encodeURIComponent(opts.unit)}/recycle`
          : `/admin/tiers/${opts.tier}/recycle`;
        const result = await signedRequest(config, {
          method: "POST",
          path: requestPath,
          body: { force: opts.force },
          url: opts.url,
        });
        console.log("✅ Recycle requested:", JSON.stringify(result));
      } catch (err: unknown) {
        fail("Recycle", err);
      }
    });
}

// --- resize ---
function registerResize(program: Command): void {
  program
    .command("resize")
    .description("Change a tier's pool size")
    .requiredOption("--tier <number>", "Tier to resize", parseTier)
    .option("--min <number>", "Minimum size", parseSize)
    .option("--target <number>", "Target size", parseSize)
    .option("--max <number>", "Maximum size", parseSize)
    .option("--url <url>", "Orchestrator base URL (default: from config)")
    .action(async (opts: { tier: number; min?: number; target?: number; max?: number; url?: string }) => {
      try {
        if (opts.min === undefined && opts.target === undefined && opts.max === undefined) {
          throw new Error("Specify at least one of --min, --target, --max");
        }
        const config = loadConfigFromOpts(configPath(program));
        const policy = await signedRequest(config, {
          method: "POST",
          path: `/admin/tiers/${opts.tier}/size`,
          body: { min: opts.min, target: opts.target, max: opts.max },
          url: opts.url,
        });
        console.log(`✅ Tier ${opts.tier} resized:`, JSON.stringify(policy));
      } catch (err: unknown) {
        fail("Resize", err);
      }
    });
}

// --- routes ---
function registerRoutes(program: Command): void {
  program
    .command("routes")
    .description("Dump the routing table (from the server, or from a published artifact)")
    .option("--file <path>", "Read a published routing artifact instead of asking the server")
    .option("--url <url>", "Orchestrator base URL (default: from config)")
    .action(async (opts: { file?: string; url?: string }) => {
      try {
        let entries: RoutingEntry[];
        let header: string;
        if (opts.file) {
          const artifact = readRoutingTable(opts.file);
          entries = artifact.entries;
          header = `${opts.file} (generated ${artifact.generatedAt.toISOString()})`;
        } else {
          const config = loadConfigFromOpts(configPath(program));
          const routes = RoutesSchema.parse(await signedRequest(config, { method: "GET", path: "/routes", url: opts.url }));
          entries = routes.entries;
          header = `live table (published ${routes.publishedAt ?? "never"}${routes.pending ? ", changes pending" : ""})`;
        }
        console.log(`\n🧭 Routes: ${header}`);
        console.log("─".repeat(40));
        if (entries.length === 0) console.log("  (no sessions routed)");
        for (const e of entries) {
          console.log(`  ${e.sessionId} → ${e.address}  (unit ${e.unitId}, tier ${e.tier})`);
        }
      } catch (err: unknown) {
        fail("Routes", err);
      }
    });
}

// --- sign ---
function registerSign(program: Command): void {
  program
    .command("sign")
    .description("Print authentication headers for a request body")
    .option("--body <json>", "Exact request body to sign", "")
    .option("--path <path>", "Request path with query; binds the signature to it (every route but /escalate)")
    .option("--method <method>", "Request method used with --path", "POST")
    .action((opts: { body: string; path?: string; method: string }) => {
      try {
        const config = loadConfigFromOpts(configPath(program));
        const scope = opts.path === undefined ? undefined : requestScope(opts.method, opts.path);
        const headers = authenticatorFor(config).sign(opts.body, scope);
        for (const [name, value] of Object.entries(headers)) {
          console.log(`${name}: ${value}`);
        }
      } catch (err: unknown) {
        fail("Sign", err);
      }
    });
}

// --- init ---
function registerInit(program: Command): void {
  program
    .command("init")
    .description("Scaffold a starter orchestrator.config.yaml")
    .option("--dir <path>", "Target directory", ".")
    .option("--force", "Overwrite an existing config file", false)
    .action((opts: { dir: string; force: boolean }) => {
      try {
        const result = initProject({ targetPath: path.resolve(opts.dir), force: opts.force });
        for (const file of result.created) console.log(`  ✅ created ${file}`);
        for (const file of result.skipped) console.log(`  ⏭️  skipped ${file} (exists; use --force)`);
      } catch (err: unknown) {
        fail("Init", err);
      }
    });
}

// --- validate-config ---
function registerValidateConfig(program: Command): void {
  program
    .command("validate-config")
    .description("Load and validate the config file")
    .action(() => {
      try {
        const file = loadConfigFromOpts(configPath(program));
        const config = buildOrchestratorConfig(file);
        console.log(`✅ ${path.resolve(configPath(program) ?? DEFAULT_CONFIG_PATH)} is valid`);
        for (const t of config.tiers) {
          console.log(`  Tier ${t.tier} (${t.name}): ${t.image} min ${t.minSize} / target ${t.targetSize} / max ${t.maxSize}`);
        }
        console.log(`  Routing: ${config.routing.format} → ${config.routing.path}`);
      } catch (err: unknown) {
        fail("Config validation", err);
      }
    });
}
