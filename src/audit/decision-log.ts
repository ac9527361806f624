import * as fs from "node:fs";
import * as path from "node:path";
import pLimit from "p-limit";
import { z } from "zod";
import { logger } from "../logger.js";
import type { EscalationDecision } from "../types.js";

const DecisionRecordSchema = z.object({
  id: z.string(),
  sessionId: z.string(),
  outcome: z.enum(["escalate", "hold", "deny", "deferred", "deescalate"]),
  fromTier: z.number(),
  targetTier: z.number(),
  unitId: z.string().nullable(),
  unitAddress: z.string().nullable(),
  reason: z.string(),
  score: z.number().nullable(),
  indicators: z.array(z.string()),
  decidedAt: z.string().refine((s) => !isNaN(new Date(s).getTime()), {
    message: "decidedAt must be a valid ISO date string",
  }),
});

/**
 * Append-only decision audit in JSON Lines. Appends are serialized so lines
 * never interleave; a failed append is logged and does not fail the decision.
 */
export class DecisionLog {
  private readonly log = logger.child({ component: "audit" });
  private readonly filePath: string;
  private readonly limit = pLimit(1);
  private dirReady = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  get path(): string {
    return this.filePath;
  }

  async append(decision: EscalationDecision): Promise<void> {
    const line = JSON.stringify({ ...decision, decidedAt: decision.decidedAt.toISOString() }) + "\n";
    await this.limit(async () => {
      try {
        if (!this.dirReady) {
          await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
          this.dirReady = true;
        }
        await fs.promises.appendFile(this.filePath, line, "utf-8");
      } catch (err: unknown) {
        this.log.error({ err, filePath: this.filePath, decisionId: decision.id }, "Failed to append decision record");
      }
    });
  }

  /** Read back recorded decisions, optionally for one session. Malformed lines are skipped. */
  async readAll(sessionId?: string): Promise<EscalationDecision[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, "utf-8");
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    const decisions: EscalationDecision[] = [];
    for (const line of raw.split("\n")) {
      if (!line.trim()) continue;
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch (err: unknown) {
        this.log.warn({ filePath: this.filePath, error: String(err) }, "Skipping unparseable audit line");
        continue;
      }
      const parsed = DecisionRecordSchema.safeParse(json);
      if (!parsed.success) {
        this.log.warn({ filePath: this.filePath, issues: parsed.error.issues }, "Skipping invalid audit record");
        continue;
      }
      if (sessionId !== undefined && parsed.data.sessionId !== sessionId) continue;
      decisions.push({ ...parsed.data, decidedAt: new Date(parsed.data.decidedAt) });
    }
    return decisions;
  }
}
