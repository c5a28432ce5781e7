import type { CandidateAction } from "../risk/types.js";
import type { Strategy, StrategyContext } from "./types.js";

export interface ScoreThresholds {
  readonly minScore: number;
  readonly minConfidence: number;
  readonly exitScore: number;
  readonly exitConfidence: number;
}

/**
 * Opens long positions in candidates above the entry thresholds and closes
 * held symbols whose signal has weakened below the exit thresholds.
 *
 * The Kelly fraction treats score as the win probability and the
 * take-profit/stop-loss ratio as the payoff, halved.
 */
export class ScoreThresholdStrategy implements Strategy {
  readonly name = "score_threshold";

  constructor(private readonly thresholds: ScoreThresholds) {}

  evaluate(context: StrategyContext): CandidateAction[] {
    const actions: CandidateAction[] = [];
    const { minScore, minConfidence, exitScore, exitConfidence } = this.thresholds;

    for (const candidate of context.candidates) {
      const held = context.positions.get(candidate.symbol);

      if (held) {
        if (candidate.score < exitScore || candidate.confidence < exitConfidence) {
          actions.push({
            kind: "close",
            symbol: candidate.symbol,
            side: held.quantity > 0 ? "sell" : "buy",
            quantity: Math.abs(held.quantity),
            trigger: "signal",
            reason: `signal weakened (score ${candidate.score}, confidence ${candidate.confidence})`,
          });
        }
        continue;
      }

      if (candidate.score < minScore || candidate.confidence < minConfidence) continue;
      const price = context.prices.get(candidate.symbol);
      if (price === undefined || price <= 0) continue;

      const kelly = this.kellyFraction(candidate.score, context);
      actions.push({
        kind: "open",
        symbol: candidate.symbol,
        side: "buy",
        quantity: Math.floor((context.maxPositionSize * context.equity) / price),
        kellyFraction: Math.max(0, kelly),
        trigger: "signal",
        reason: `score ${candidate.score}, confidence ${candidate.confidence}`,
      });
    }

    return actions;
  }

  private kellyFraction(score: number, context: StrategyContext): number {
    const p = Math.min(Math.max(score / 100, 0), 1);
    const b = context.takeProfitPct / context.stopLossPct;
    return (p - (1 - p) / b) / 2;
  }
}
