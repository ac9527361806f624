/**
 * Init: scaffolds a starter orchestrator.config.yaml into a target directory.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { DEFAULT_CONFIG_PATH } from "../config.js";
import { logger } from "../logger.js";

const log = logger.child({ component: "init" });

export interface InitOptions {
  targetPath: string;
  force?: boolean;
}

export interface InitResult {
  created: string[];
  skipped: string[];
  configPath: string | null;
}

export const MINIMAL_CONFIG = `# Tier orchestrator configuration
# Values of the form \${VAR} are read from the environment.

server:
  host: "0.0.0.0"
  port: 8700

auth:
  # shared HMAC secret, at least 16 characters
  secret: "\${ORCHESTRATOR_SECRET}"
  max_skew_ms: 30000

tiers:
  - tier: 1
    name: "tier1"
    image: "units/tier1:latest"
    port: 8080
    min_size: 1
    target_size: 2
    max_size: 4
  - tier: 2
    name: "tier2"
    image: "units/tier2:latest"
    port: 8080
    min_size: 0
    target_size: 1
    max_size: 2

scorer:
  url: "http://127.0.0.1:8701"
  timeout_ms: 2000
  score_max: 10

policy:
  escalate_threshold: 7
  benign_threshold: 2
  benign_action: "hold"

routing:
  path: "routing/routes.json"
  format: "json"
  # reload_command: ["nginx", "-s", "reload"]

logging:
  level: "info"
`;

/** Write the starter config unless one exists (or `force` is set). */
export function initProject(options: InitOptions): InitResult {
  const { targetPath, force = false } = options;
  const result: InitResult = { created: [], skipped: [], configPath: null };

  fs.mkdirSync(targetPath, { recursive: true });
  const configPath = path.join(targetPath, DEFAULT_CONFIG_PATH);
  if (!fs.existsSync(configPath) || force) {
    fs.writeFileSync(configPath, MINIMAL_CONFIG, "utf-8");
    result.created.push(configPath);
    result.configPath = configPath;
    log.info({ configPath }, "Created config file");
  } else {
    result.skipped.push(configPath);
    log.info({ configPath }, "Config file already exists, skipping");
  }

  return result;
}
