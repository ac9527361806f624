// Config loader: parse orchestrator.config.yaml with Zod validation

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { EngineOptions } from "./escalation/engine.js";
import type { PolicyOptions } from "./escalation/policy.js";
import type { HealthOptions } from "./health/health-reconciler.js";
import type { PoolOptions } from "./pool/pool-manager.js";
import type { PublisherOptions } from "./routing/publisher.js";
import type { DockerRuntimeOptions } from "./runtime/docker-runtime.js";
import type { RateLimitOptions } from "./server/rate-limiter.js";
import type { TierPolicy } from "./types.js";

export const DEFAULT_CONFIG_PATH = "orchestrator.config.yaml";

// --- Zod Schemas ---

const ServerSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  port: z.number().int().min(0).max(65535).default(8700),
  body_limit_bytes: z.number().int().min(1024).default(65536),
});

const RateLimitSchema = z.object({
  /** Requests per client and window on `/escalate`; 0 turns limiting off. */
  max_requests: z.number().int().min(0).default(100),
  window_ms: z.number().int().min(1000).default(60000),
  /** Key clients by the first X-Forwarded-For address instead of the socket peer. */
  trust_forwarded_for: z.boolean().default(false),
});

const AuthSchema = z.object({
  secret: z.string().min(16, "auth.secret must be at least 16 characters"),
  max_skew_ms: z.number().int().min(1000).default(30000),
  signature_header: z.string().min(1).default("x-signature"),
  timestamp_header: z.string().min(1).default("x-timestamp"),
});

const TierSchema = z.object({
  tier: z.number().int().min(1),
  name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, "tier names are lowercase letters, digits, - and _"),
  image: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(8080),
  min_size: z.number().int().min(0),
  target_size: z.number().int().min(0),
  max_size: z.number().int().min(1),
  env: z.record(z.string(), z.string()).default({}),
});

const PoolSchema = z.object({
  reconcile_interval_ms: z.number().int().min(100).default(5000),
  create_timeout_ms: z.number().int().min(100).default(30000),
  create_backoff_base_ms: z.number().int().min(1).default(1000),
  create_backoff_max_ms: z.number().int().min(1).default(60000),
  degraded_after_failures: z.number().int().min(1).default(3),
  drain_grace_ms: z.number().int().min(0).default(30000),
  terminated_retention_ms: z.number().int().min(0).default(60000),
});

const HealthSchema = z.object({
  interval_ms: z.number().int().min(100).default(10000),
  probe_timeout_ms: z.number().int().min(10).default(2000),
  failure_threshold: z.number().int().min(1).default(3),
  concurrency: z.number().int().min(1).max(256).default(16),
  degraded_latency_ms: z.number().int().min(1).default(1000),
});

const ScorerSchema = z.object({
  url: z.string().url().default("http://127.0.0.1:8701"),
  timeout_ms: z.number().int().min(10).default(2000),
  score_max: z.number().positive().default(10),
});

const PolicySchema = z.object({
  escalate_threshold: z.number().min(0).default(7),
  tier_thresholds: z.record(z.string().regex(/^\d+$/), z.number().min(0)).default({}),
  benign_threshold: z.number().min(0).default(2),
  benign_action: z.enum(["hold", "deescalate"]).default("hold"),
  indicator_weights: z.record(z.string(), z.number()).default({}),
});

const EscalationSchema = z.object({
  allocation_retries: z.number().int().min(0).max(10).default(2),
  allocation_retry_delay_ms: z.number().int().min(0).default(250),
  duplicate_window_ms: z.number().int().min(0).default(5000),
});

const SessionsSchema = z.object({
  ttl_ms: z.number().int().min(1000).default(3600000),
  sweep_interval_ms: z.number().int().min(100).default(60000),
});

const RoutingSchema = z.object({
  path: z.string().min(1).default("routing/routes.json"),
  format: z.enum(["json", "nginx-map"]).default("json"),
  debounce_ms: z.number().int().min(0).default(250),
  max_delay_ms: z.number().int().min(0).default(2000),
  reload_command: z.array(z.string().min(1)).default([]),
  map_variable: z.string().regex(/^\$\w+$/, "map_variable must be an nginx variable such as $cookie_session").default("$cookie_session"),
  default_upstream: z.string().min(1).default("tier1_pool"),
});

const RuntimeSchema = z.object({
  docker_binary: z.string().min(1).default("docker"),
  network: z.string().default(""),
  health_path: z.string().startsWith("/").default("/health"),
  label_prefix: z.string().min(1).default("tier-orchestrator"),
});

const AuditSchema = z.object({
  path: z.string().min(1).default("audit/decisions.jsonl"),
});

const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const ConfigFileSchema = z
  .object({
    server: ServerSchema.default({}),
    rate_limit: RateLimitSchema.default({}),
    auth: AuthSchema,
    tiers: z.array(TierSchema).min(1),
    pool: PoolSchema.default({}),
    health: HealthSchema.default({}),
    scorer: ScorerSchema.default({}),
    policy: PolicySchema.default({}),
    escalation: EscalationSchema.default({}),
    sessions: SessionsSchema.default({}),
    routing: RoutingSchema.default({}),
    runtime: RuntimeSchema.default({}),
    audit: AuditSchema.default({}),
    logging: LoggingSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<number>();
    config.tiers.forEach((tier, i) => {
      if (seen.has(tier.tier)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["tiers", i, "tier"], message: `duplicate tier ${tier.tier}` });
      }
      seen.add(tier.tier);
      if (!(tier.min_size <= tier.target_size && tier.target_size <= tier.max_size)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tiers", i],
          message: `tier ${tier.tier} must satisfy min_size <= target_size <= max_size`,
        });
      }
    });
    for (let n = 1; n <= config.tiers.length; n++) {
      if (!seen.has(n)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["tiers"], message: `tiers must be numbered 1..${config.tiers.length}; tier ${n} is missing` });
      }
    }
    if (config.policy.benign_threshold >= config.policy.escalate_threshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["policy", "benign_threshold"],
        message: "benign_threshold must be below escalate_threshold",
      });
    }
    if (config.policy.escalate_threshold > config.scorer.score_max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["policy", "escalate_threshold"],
        message: `escalate_threshold must not exceed scorer.score_max (${config.scorer.score_max})`,
      });
    }
    if (config.pool.create_backoff_base_ms > config.pool.create_backoff_max_ms) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pool", "create_backoff_base_ms"],
        message: "create_backoff_base_ms must not exceed create_backoff_max_ms",
      });
    }
  });

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// --- Environment variable substitution ---

/** Replace `${VAR}` placeholders with values from process.env */
export function substituteEnvVars(text: string): string {
  return text.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      return "";
    }
    return value;
  });
}

// --- Loader ---

/** Validate an already-parsed config document. */
export function parseConfig(document: unknown): ConfigFile {
  const result = ConfigFileSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ValidationError(`Invalid configuration:\n  ${issues.join("\n  ")}`, issues);
  }
  return result.data;
}

/**
 * Load and validate orchestrator.config.yaml.
 * @param configPath – absolute or relative path to YAML config file.
 *   Defaults to `orchestrator.config.yaml` in the current working directory.
 */
export function loadConfig(configPath?: string): ConfigFile {
  const resolvedPath = path.resolve(configPath ?? DEFAULT_CONFIG_PATH);

  if (!fs.existsSync(resolvedPath)) {
    throw new Error(`Config file not found: ${resolvedPath}`);
  }

  const raw = fs.readFileSync(resolvedPath, "utf-8");
  const substituted = substituteEnvVars(raw);
  const parsed: unknown = parseYaml(substituted, { customTags: [] });

  return parseConfig(parsed);
}

// --- Component options ---

export interface OrchestratorConfig {
  server: {
    host: string;
    port: number;
    bodyLimitBytes: number;
    rateLimit: RateLimitOptions;
    trustForwardedFor: boolean;
  };
  auth: { secret: string; maxSkewMs: number; signatureHeader: string; timestampHeader: string };
  tiers: TierPolicy[];
  pool: PoolOptions;
  health: HealthOptions;
  scorer: { url: string; timeoutMs: number; scoreMax: number };
  policy: PolicyOptions;
  engine: EngineOptions;
  sessions: { ttlMs: number; sweepIntervalMs: number };
  routing: PublisherOptions;
  runtime: DockerRuntimeOptions;
  audit: { path: string };
  logging: { level: ConfigFile["logging"]["level"] };
}

/** Translate the snake_case file into the options each component takes. */
export function buildOrchestratorConfig(config: ConfigFile): OrchestratorConfig {
  const tierThresholds: Record<number, number> = {};
  for (const [tier, threshold] of Object.entries(config.policy.tier_thresholds)) {
    tierThresholds[Number(tier)] = threshold;
  }
  return {
    server: {
      host: config.server.host,
      port: config.server.port,
      bodyLimitBytes: config.server.body_limit_bytes,
      rateLimit: { maxRequests: config.rate_limit.max_requests, windowMs: config.rate_limit.window_ms },
      trustForwardedFor: config.rate_limit.trust_forwarded_for,
    },
    auth: {
      secret: config.auth.secret,
      maxSkewMs: config.auth.max_skew_ms,
      signatureHeader: config.auth.signature_header,
      timestampHeader: config.auth.timestamp_header,
    },
    tiers: [...config.tiers]
      .sort((a, b) => a.tier - b.tier)
      .map((t) => ({
        tier: t.tier,
        name: t.name,
        image: t.image,
        port: t.port,
        env: t.env,
        minSize: t.min_size,
        targetSize: t.target_size,
        maxSize: t.max_size,
      })),
    pool: {
      reconcileIntervalMs: config.pool.reconcile_interval_ms,
      createTimeoutMs: config.pool.create_timeout_ms,
      createBackoffBaseMs: config.pool.create_backoff_base_ms,
      createBackoffMaxMs: config.pool.create_backoff_max_ms,
      degradedAfterFailures: config.pool.degraded_after_failures,
      drainGraceMs: config.pool.drain_grace_ms,
      terminatedRetentionMs: config.pool.terminated_retention_ms,
    },
    health: {
      intervalMs: config.health.interval_ms,
      probeTimeoutMs: config.health.probe_timeout_ms,
      failureThreshold: config.health.failure_threshold,
      concurrency: config.health.concurrency,
      degradedLatencyMs: config.health.degraded_latency_ms,
    },
    scorer: {
      url: config.scorer.url,
      timeoutMs: config.scorer.timeout_ms,
      scoreMax: config.scorer.score_max,
    },
    policy: {
      escalateThreshold: config.policy.escalate_threshold,
      tierThresholds,
      benignThreshold: config.policy.benign_threshold,
      benignAction: config.policy.benign_action,
      indicatorWeights: config.policy.indicator_weights,
      scoreMax: config.scorer.score_max,
    },
    engine: {
      scorerTimeoutMs: config.scorer.timeout_ms,
      scoreMax: config.scorer.score_max,
      allocationRetries: config.escalation.allocation_retries,
      allocationRetryDelayMs: config.escalation.allocation_retry_delay_ms,
      duplicateWindowMs: config.escalation.duplicate_window_ms,
    },
    sessions: {
      ttlMs: config.sessions.ttl_ms,
      sweepIntervalMs: config.sessions.sweep_interval_ms,
    },
    routing: {
      path: config.routing.path,
      format: config.routing.format,
      debounceMs: config.routing.debounce_ms,
      maxDelayMs: config.routing.max_delay_ms,
      reloadCommand: config.routing.reload_command,
      nginx: {
        variable: config.routing.map_variable,
        defaultUpstream: config.routing.default_upstream,
      },
    },
    runtime: {
      binary: config.runtime.docker_binary,
      network: config.runtime.network,
      healthPath: config.runtime.health_path,
      labelPrefix: config.runtime.label_prefix,
    },
    audit: { path: config.audit.path },
    logging: { level: config.logging.level },
  };
}
