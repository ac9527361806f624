#!/usr/bin/env node
// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.

/**
 * Tier orchestrator CLI: tiered unit pools, escalation decisions and routing publication.
 *
 * Usage:
 *   tier-orchestrator serve [--log-file <path>]
 *   tier-orchestrator status
 *   tier-orchestrator recycle --unit <id> | --tier <N> [--force]
 *   tier-orchestrator resize --tier <N> [--min <n>] [--target <n>] [--max <n>]
 *   tier-orchestrator routes [--file <path>]
 *   tier-orchestrator sign --body <json>
 *   tier-orchestrator init [--force]
 *   tier-orchestrator validate-config
 */

import { Command } from "commander";
import { registerCommands } from "./cli/commands.js";
import { VERSION } from "./orchestrator.js";

const program = new Command();

program
  .name("tier-orchestrator")
  .description("Tiered execution-unit pools with signed escalation decisions")
  .version(VERSION)
  .option("--config <path>", "Path to config file (default: orchestrator.config.yaml)");

registerCommands(program);

await program.parseAsync();
