import type { BacktestSummary, Position, ScoredCandidate } from "../core/types.js";
import type { CandidateAction } from "../risk/types.js";

export type BacktestStrategyName = "momentum" | "mean_reversion";

/** What a strategy may see of one account. It never sees RiskState. */
export interface StrategyContext {
  readonly accountId: string;
  readonly equity: number;
  readonly maxPositionSize: number;
  readonly stopLossPct: number;
  readonly takeProfitPct: number;
  readonly positions: ReadonlyMap<string, Readonly<Position>>;
  readonly candidates: readonly ScoredCandidate[];
  readonly prices: ReadonlyMap<string, number>;
  readonly now: Date;
}

export interface Strategy {
  readonly name: string;
  evaluate(context: StrategyContext): CandidateAction[];
}

export interface Backtester {
  run(strategy: BacktestStrategyName, symbols: readonly string[]): Promise<BacktestSummary>;
}
