/**
 * Routing artifact rendering, atomic writing and reading back.
 *
 * Two formats: a JSON document, and an nginx `map` block for the traffic
 * layer to include. Both are written to a temporary file, fsynced, validated
 * and renamed over the target so readers never see a partial table.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { RoutingEntry } from "../types.js";

export const ARTIFACT_VERSION = "1";

export type ArtifactFormat = "json" | "nginx-map";

export interface NginxMapOptions {
  /** nginx variable the map keys on, e.g. `$cookie_session`. */
  variable: string;
  defaultUpstream: string;
}

export interface RoutingArtifact {
  generatedAt: Date;
  entries: RoutingEntry[];
}

const RoutingEntrySchema = z.object({
  sessionId: z.string().min(1),
  unitId: z.string().min(1),
  tier: z.number().int().min(0),
  address: z.string().min(1),
});

const JsonArtifactSchema = z.object({
  version: z.literal(ARTIFACT_VERSION),
  generatedAt: z.string().refine((s) => !isNaN(new Date(s).getTime()), {
    message: "generatedAt must be a valid ISO date string",
  }),
  entries: z.array(RoutingEntrySchema),
});

const SAFE_VALUE = /^[^"\\\s;{}]+$/;

// --- Rendering ---

export function renderJson(entries: readonly RoutingEntry[], generatedAt: Date): string {
  return JSON.stringify(
    { version: ARTIFACT_VERSION, generatedAt: generatedAt.toISOString(), entries },
    null,
    2,
  ) + "\n";
}

export function renderNginxMap(
  entries: readonly RoutingEntry[],
  generatedAt: Date,
  options: NginxMapOptions,
): string {
  for (const value of [options.defaultUpstream, ...entries.flatMap((e) => [e.sessionId, e.address, e.unitId])]) {
    if (!SAFE_VALUE.test(value)) {
      throw new ValidationError(`Value '${value}' cannot be written into an nginx map`);
    }
  }
  const lines = [
    "# Tier orchestrator session routing map",
    "# Generated automatically; changes will be overwritten.",
    `# Generated: ${generatedAt.toISOString()}`,
    `# Entries: ${entries.length}`,
    "",
    `map ${options.variable} $tier_upstream {`,
    `    default "${options.defaultUpstream}";`,
  ];
  for (const entry of entries) {
    lines.push("", `    # unit=${entry.unitId} tier=${entry.tier}`, `    "${entry.sessionId}" "${entry.address}";`);
  }
  lines.push("}", "");
  return lines.join("\n");
}

/** Structural check of a rendered map: one map directive, balanced braces. */
export function validateNginxMap(content: string): string[] {
  const problems: string[] = [];
  if (!/^map\s+\$\S+\s+\$\S+\s*\{/m.test(content)) {
    problems.push("missing map directive");
  }
  let depth = 0;
  for (const ch of content.replace(/#.*$/gm, "")) {
    if (ch === "{") depth++;
    if (ch === "}") depth--;
    if (depth < 0) break;
  }
  if (depth !== 0) problems.push("unbalanced braces");
  return problems;
}

export function renderArtifact(
  format: ArtifactFormat,
  entries: readonly RoutingEntry[],
  generatedAt: Date,
  nginx: NginxMapOptions,
): string {
  return format === "json" ? renderJson(entries, generatedAt) : renderNginxMap(entries, generatedAt, nginx);
}

// --- Writing ---

/**
 * Write `content` to `filePath` through a fsynced temporary file and a rename.
 * `validate` runs against the temporary file; problems abort the write.
 */
export function writeAtomic(
  filePath: string,
  content: string,
  validate?: (written: string) => string[],
): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = filePath + ".tmp";
  fs.writeFileSync(tmpPath, content, "utf-8");
  const fd = fs.openSync(tmpPath, "r");
  fs.fsyncSync(fd);
  fs.closeSync(fd);
  if (validate) {
    const problems = validate(fs.readFileSync(tmpPath, "utf-8"));
    if (problems.length > 0) {
      fs.rmSync(tmpPath, { force: true });
      throw new ValidationError(`Routing artifact failed validation: ${problems.join(", ")}`, problems);
    }
  }
  fs.renameSync(tmpPath, filePath);
}

// --- Reading ---

export function parseJsonArtifact(raw: string): RoutingArtifact {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ValidationError(`Routing artifact is not valid JSON: ${String(err)}`);
  }
  const result = JsonArtifactSchema.safeParse(json);
  if (!result.success) {
    throw new ValidationError(
      "Routing artifact failed validation",
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return { generatedAt: new Date(result.data.generatedAt), entries: result.data.entries };
}

export function parseNginxMap(raw: string): RoutingArtifact {
  const problems = validateNginxMap(raw);
  if (problems.length > 0) {
    throw new ValidationError(`Routing map is malformed: ${problems.join(", ")}`, problems);
  }
  const generated = /^# Generated: (\S+)$/m.exec(raw);
  const entries: RoutingEntry[] = [];
  let pending: { unitId: string; tier: number } | null = null;
  for (const line of raw.split("\n")) {
    const meta = /^\s*# unit=(\S+) tier=(\d+)\s*$/.exec(line);
    if (meta?.[1] !== undefined && meta[2] !== undefined) {
      pending = { unitId: meta[1], tier: Number(meta[2]) };
      continue;
    }
    const entry = /^\s*"([^"]+)"\s+"([^"]+)";\s*$/.exec(line);
    if (entry?.[1] !== undefined && entry[2] !== undefined) {
      entries.push({
        sessionId: entry[1],
        address: entry[2],
        unitId: pending?.unitId ?? "",
        tier: pending?.tier ?? 0,
      });
      pending = null;
    }
  }
  return { generatedAt: generated?.[1] ? new Date(generated[1]) : new Date(0), entries };
}

/** Read a published routing artifact in either format. */
export function readRoutingTable(filePath: string): RoutingArtifact {
  const raw = fs.readFileSync(filePath, "utf-8");
  return raw.trimStart().startsWith("{") ? parseJsonArtifact(raw) : parseNginxMap(raw);
}
