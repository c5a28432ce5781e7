/**
 * Risk-adjusted performance from an equity series (one point per completed
 * cycle). Returns are per-point; ratios are annualised over 252 periods.
 */

const PERIODS_PER_YEAR = 252;

export interface PerformanceSummary {
  sharpe: number;
  sortino: number;
  /** Historical 95% VaR as a positive fraction of equity. */
  var95: number;
  /** Largest peak-to-trough decline as a fraction of the peak. */
  maxDrawdown: number;
  samples: number;
}

export function returnsFromEquity(series: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < series.length; i++) {
    const prev = series[i - 1];
    if (prev > 0) returns.push(series[i] / prev - 1);
  }
  return returns;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function sharpeRatio(returns: readonly number[]): number {
  if (returns.length < 2) return 0;
  const avg = mean(returns);
  const variance = returns.reduce((sum, r) => sum + (r - avg) ** 2, 0) / (returns.length - 1);
  const std = Math.sqrt(variance);
  return std > 0 ? (avg / std) * Math.sqrt(PERIODS_PER_YEAR) : 0;
}

export function sortinoRatio(returns: readonly number[]): number {
  if (returns.length < 2) return 0;
  const downside = Math.sqrt(mean(returns.map((r) => Math.min(r, 0) ** 2)));
  return downside > 0 ? (mean(returns) / downside) * Math.sqrt(PERIODS_PER_YEAR) : 0;
}

export function valueAtRisk95(returns: readonly number[]): number {
  if (returns.length === 0) return 0;
  const sorted = [...returns].sort((a, b) => a - b);
  const cutoff = sorted[Math.floor(sorted.length * 0.05)];
  return Math.max(0, -cutoff);
}

export function maxDrawdown(series: readonly number[]): number {
  let peak = -Infinity;
  let worst = 0;
  for (const value of series) {
    if (value > peak) peak = value;
    if (peak > 0) worst = Math.max(worst, (peak - value) / peak);
  }
  return worst;
}

export function summarizePerformance(series: readonly number[]): PerformanceSummary {
  const returns = returnsFromEquity(series);
  return {
    sharpe: sharpeRatio(returns),
    sortino: sortinoRatio(returns),
    var95: valueAtRisk95(returns),
    maxDrawdown: maxDrawdown(series),
    samples: series.length,
  };
}
