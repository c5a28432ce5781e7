import type { AccountView } from "../core/types.js";

/** Operator-facing shape of one account, shared by the HTTP route and the MCP tool. */
export function summarizeAccount(account: AccountView) {
  const breaker = account.risk.breaker;
  return {
    id: account.id,
    label: account.label,
    equity: account.equity.toFixed(2),
    cash: account.cash.toFixed(2),
    starting_equity: account.startingEquity.toFixed(2),
    daily_pnl: account.dailyPnl.toFixed(2),
    exposure_pct: (account.exposurePct * 100).toFixed(1),
    positions: account.positions.length,
    largest_position: account.largestPosition || null,
    largest_position_pct: (account.largestPositionPct * 100).toFixed(1),
    trades_today: account.risk.tradesToday,
    day_trades_today: account.risk.dayTradesToday,
    consecutive_losses: account.risk.consecutiveLosses,
    circuit_breaker:
      breaker.status === "OPEN"
        ? {
            status: "OPEN",
            cause: breaker.cause,
            reason: breaker.reason,
            tripped_at: breaker.trippedAt.toISOString(),
          }
        : { status: "CLOSED" },
    last_refreshed_at: account.lastRefreshedAt?.toISOString() ?? null,
  };
}
