import type { BacktestSummary } from "../core/types.js";
import { sharpeRatio } from "../risk/performance.js";
import { log } from "../utils/logger.js";
import type { Backtester, BacktestStrategyName } from "./types.js";

const SMA_WINDOW = 20;
const MOMENTUM_WINDOW = 5;

export type CloseLoader = (symbol: string, days: number) => Promise<number[]>;

export interface BacktesterOptions {
  lookbackDays: number;
  stopLossPct: number;
  takeProfitPct: number;
}

interface ExitRule {
  maxHoldDays: number;
  stopLossPct: number;
  takeProfitPct: number | null;
  /** Exit once price recovers to this level. */
  target: number | null;
}

interface EntrySignal {
  index: number;
  rule: ExitRule;
}

function sma(closes: readonly number[], end: number, window: number): number {
  let sum = 0;
  for (let i = end - window + 1; i <= end; i++) sum += closes[i];
  return sum / window;
}

/**
 * Replays simple entry rules over daily closes. Each symbol contributes at
 * most one trade: the first entry signal after the SMA warm-up, held until
 * its exit rule fires.
 */
export class ClosePriceBacktester implements Backtester {
  constructor(
    private readonly loadCloses: CloseLoader,
    private readonly options: BacktesterOptions
  ) {}

  async run(strategy: BacktestStrategyName, symbols: readonly string[]): Promise<BacktestSummary> {
    const returns: number[] = [];

    for (const symbol of symbols) {
      const closes = await this.loadCloses(symbol, this.options.lookbackDays);
      if (closes.length <= SMA_WINDOW) continue;

      const trade = this.simulate(strategy, closes);
      if (trade !== null) returns.push(trade);
    }

    const wins = returns.filter((r) => r > 0).length;
    const summary: BacktestSummary = {
      strategy,
      symbols: [...symbols],
      totalReturnPct: returns.length > 0 ? (returns.reduce((s, r) => s + r, 0) / returns.length) * 100 : 0,
      trades: returns.length,
      winRate: returns.length > 0 ? wins / returns.length : 0,
      sharpe: sharpeRatio(returns),
    };
    log(
      `Backtest ${strategy}: ${summary.trades} trade(s), ${summary.totalReturnPct.toFixed(2)}% avg return over ${symbols.length} symbol(s)`
    );
    return summary;
  }

  /** Return of the single simulated trade, or null when no entry fired. */
  simulate(strategy: BacktestStrategyName, closes: readonly number[]): number | null {
    const entry = this.findEntry(strategy, closes);
    if (!entry) return null;

    const entryPrice = closes[entry.index];
    const { rule } = entry;
    const last = Math.min(entry.index + rule.maxHoldDays, closes.length - 1);
    if (last === entry.index) return null;

    for (let j = entry.index + 1; j <= last; j++) {
      const ret = closes[j] / entryPrice - 1;
      const stop = ret <= -rule.stopLossPct;
      const profit = rule.takeProfitPct !== null && ret >= rule.takeProfitPct;
      const target = rule.target !== null && closes[j] > rule.target;
      if (stop || profit || target || j === last) return ret;
    }
    return null;
  }

  private findEntry(strategy: BacktestStrategyName, closes: readonly number[]): EntrySignal | null {
    for (let i = SMA_WINDOW - 1; i < closes.length - 1; i++) {
      const average = sma(closes, i, SMA_WINDOW);
      switch (strategy) {
        case "momentum":
          if (i >= MOMENTUM_WINDOW && closes[i] > average && closes[i] > closes[i - MOMENTUM_WINDOW]) {
            return {
              index: i,
              rule: {
                maxHoldDays: 5,
                stopLossPct: this.options.stopLossPct,
                takeProfitPct: this.options.takeProfitPct,
                target: null,
              },
            };
          }
          break;
        case "mean_reversion":
          if (closes[i] < average * 0.95) {
            return {
              index: i,
              rule: { maxHoldDays: 9, stopLossPct: 0.08, takeProfitPct: null, target: average },
            };
          }
          break;
      }
    }
    return null;
  }
}
