/**
 * Circuit Breaker: per-account kill switch.
 *
 * Triggers:
 *   - Daily realized loss beyond the account's daily loss limit
 *   - Equity drawdown from start-of-day equity beyond max daily loss
 *   - N consecutive losing trades
 *
 * OPEN is a latch. Only a session reset or a manual reset closes it again.
 */

import type { AccountRiskConfig } from "../utils/config.js";
import { log, logWarn } from "../utils/logger.js";
import type { BreakerState, BreakerTrip, RiskState, TripCause } from "./types.js";

export function freshRiskState(sessionDate: string | null = null): RiskState {
  return {
    sessionDate,
    tradesToday: 0,
    dayTradesToday: 0,
    consecutiveLosses: 0,
    dailyRealizedPnl: 0,
    consecutiveFailedCycles: 0,
    breaker: { status: "CLOSED" },
  };
}

export function isOpen(breaker: BreakerState): boolean {
  switch (breaker.status) {
    case "OPEN":
      return true;
    case "CLOSED":
      return false;
  }
}

/**
 * Latch the breaker OPEN. Returns the trip, or null when it was already open.
 */
export function tripBreaker(
  accountId: string,
  state: RiskState,
  cause: TripCause,
  reason: string,
  now: Date
): BreakerTrip | null {
  if (isOpen(state.breaker)) return null;

  state.breaker = { status: "OPEN", cause, reason, trippedAt: now };
  logWarn(`CIRCUIT BREAKER TRIPPED [${accountId}]: ${reason}`);
  return { accountId, cause, reason, trippedAt: now };
}

export function closeBreaker(accountId: string, state: RiskState, why: string): void {
  if (!isOpen(state.breaker)) return;
  state.breaker = { status: "CLOSED" };
  log(`Circuit breaker reset [${accountId}]: ${why}`);
}

export interface BreakerInputs {
  equity: number;
  startOfDayEquity: number | null;
}

/**
 * Decide whether the account's session results call for a halt. Pure: the
 * caller latches the result with tripBreaker.
 */
export function checkCircuitBreaker(
  state: RiskState,
  config: AccountRiskConfig,
  inputs: BreakerInputs
): { cause: TripCause; reason: string } | null {
  if (!config.circuitBreakerEnabled) return null;

  const lossLimit = config.dailyLossLimit * inputs.equity;
  if (inputs.equity > 0 && state.dailyRealizedPnl <= -lossLimit) {
    return {
      cause: "daily_loss",
      reason:
        `Daily realized P&L $${state.dailyRealizedPnl.toFixed(2)} breaches limit ` +
        `-$${lossLimit.toFixed(2)} (${(config.dailyLossLimit * 100).toFixed(1)}% of equity)`,
    };
  }

  if (state.consecutiveLosses >= config.maxConsecutiveLosses) {
    return {
      cause: "consecutive_losses",
      reason: `${state.consecutiveLosses} consecutive losing trades`,
    };
  }

  if (inputs.startOfDayEquity !== null && inputs.startOfDayEquity > 0) {
    const drawdown = (inputs.startOfDayEquity - inputs.equity) / inputs.startOfDayEquity;
    if (drawdown >= config.maxDailyLoss) {
      return {
        cause: "equity_drawdown",
        reason:
          `Equity down ${(drawdown * 100).toFixed(1)}% from start of day, ` +
          `max daily loss ${(config.maxDailyLoss * 100).toFixed(1)}%`,
      };
    }
  }

  return null;
}

export function recordTradeResult(accountId: string, state: RiskState, realizedPnl: number): void {
  state.dailyRealizedPnl += realizedPnl;
  if (realizedPnl >= 0) {
    state.consecutiveLosses = 0;
    return;
  }
  state.consecutiveLosses++;
  if (state.consecutiveLosses >= 3) {
    logWarn(`[${accountId}] ${state.consecutiveLosses} consecutive losses`);
  }
}
