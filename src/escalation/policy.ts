/**
 * Escalation policy: configurable score thresholds and indicator weights.
 * Pure functions over a score; no I/O.
 */

export type BenignAction = "hold" | "deescalate";

export interface PolicyOptions {
  escalateThreshold: number;
  /** Per-target-tier overrides of the escalate threshold. */
  tierThresholds: Record<number, number>;
  benignThreshold: number;
  benignAction: BenignAction;
  /** Added to the score for each matching indicator. */
  indicatorWeights: Record<string, number>;
  scoreMax: number;
}

export type PolicyVerdict =
  | { kind: "escalate"; targetTier: number; reason: string }
  | { kind: "deny"; targetTier: number; reason: string }
  | { kind: "hold"; targetTier: number; reason: string }
  | { kind: "deescalate"; targetTier: number; reason: string };

export interface PolicyInput {
  score: number;
  currentTier: number;
  maxTier: number;
}

export class EscalationPolicy {
  private readonly options: PolicyOptions;

  constructor(options: PolicyOptions) {
    this.options = options;
  }

  /** Score after indicator weights, clamped to `0..scoreMax`. */
  effectiveScore(score: number, indicators: readonly string[]): number {
    let total = score;
    for (const indicator of new Set(indicators)) {
      total += this.options.indicatorWeights[indicator] ?? 0;
    }
    return Math.min(Math.max(total, 0), this.options.scoreMax);
  }

  thresholdFor(targetTier: number): number {
    return this.options.tierThresholds[targetTier] ?? this.options.escalateThreshold;
  }

  /** Escalation never skips a tier: the only candidate target is `currentTier + 1`. */
  evaluate(input: PolicyInput): PolicyVerdict {
    const { score, currentTier, maxTier } = input;
    const next = currentTier + 1;
    const threshold = this.thresholdFor(next);

    if (score >= threshold) {
      if (next > maxTier) {
        return { kind: "deny", targetTier: currentTier, reason: `score ${score} >= ${threshold} but tier ${currentTier} is the highest tier` };
      }
      return { kind: "escalate", targetTier: next, reason: `score ${score} >= threshold ${threshold}` };
    }
    if (score <= this.options.benignThreshold && currentTier > 1) {
      if (this.options.benignAction === "deescalate") {
        return { kind: "deescalate", targetTier: currentTier - 1, reason: `benign score ${score} <= ${this.options.benignThreshold}` };
      }
      return { kind: "hold", targetTier: currentTier, reason: `benign score ${score}; policy holds tier` };
    }
    return { kind: "hold", targetTier: currentTier, reason: `score ${score} below threshold ${threshold}` };
  }
}
