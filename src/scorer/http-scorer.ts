/**
 * HTTP client for the external threat scorer. Any failure (network, status,
 * malformed or out-of-range response) surfaces as ScorerUnavailable.
 */

import { z } from "zod";
import { ScorerUnavailableError, errorMessage } from "../errors.js";
import type { ScoreRequest, ScoreResult, Scorer } from "../types.js";

export interface HttpScorerOptions {
  url: string;
  scoreMax: number;
}

const ScoreResponseSchema = z.object({
  score: z.number().finite(),
  indicators: z.array(z.string()).default([]),
});

export class HttpScorer implements Scorer {
  private readonly endpoint: string;
  private readonly scoreMax: number;

  constructor(options: HttpScorerOptions) {
    this.endpoint = `${options.url.replace(/\/+$/, "")}/score`;
    this.scoreMax = options.scoreMax;
  }

  async score(request: ScoreRequest, signal: AbortSignal): Promise<ScoreResult> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(request),
        signal,
      });
    } catch (err: unknown) {
      throw new ScorerUnavailableError(`scorer request failed: ${errorMessage(err)}`, err);
    }
    if (!response.ok) {
      throw new ScorerUnavailableError(`scorer responded with HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err: unknown) {
      throw new ScorerUnavailableError("scorer returned a non-JSON body", err);
    }
    const parsed = ScoreResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ScorerUnavailableError(`scorer returned an invalid body: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    if (parsed.data.score < 0 || parsed.data.score > this.scoreMax) {
      throw new ScorerUnavailableError(`scorer returned score ${parsed.data.score} outside 0..${this.scoreMax}`);
    }
    return parsed.data;
  }
}
