/**
 * Risk Engine: admission control between strategy intent and the broker.
 *
 * admit() runs before every order submission, first failure wins:
 * 1. Circuit breaker OPEN        -> REJECT "account halted"
 * 2. Day-trade count            -> REJECT "PDT limit"
 * 3. Risk-reducing close/resize -> ALLOW (never blocked by size or exposure)
 * 4. Position size vs equity    -> clamp, REJECT "below minimum size" at zero
 * 5. Total exposure vs equity   -> REJECT "exposure limit"
 *
 * The engine owns every account's RiskState. It reads and writes only the
 * state of the account it was handed, except in evaluatePortfolio(), which
 * runs only when account isolation is switched off.
 */

import type { Account, Position } from "../core/types.js";
import { sessionDateOf } from "../market/timezone.js";
import { log } from "../utils/logger.js";
import {
  checkCircuitBreaker,
  closeBreaker,
  freshRiskState,
  isOpen,
  recordTradeResult,
  tripBreaker,
} from "./circuit-breaker.js";
import { DailyPnLTracker } from "./daily-tracker.js";
import { positionValue, summarizePortfolioRisk, unrealizedReturn } from "./portfolio-risk.js";
import type {
  AdmissionDecision,
  BreakerTrip,
  CandidateAction,
  OrderSide,
  RiskState,
  TripCause,
} from "./types.js";

const EPSILON = 1e-9;

export type TripListener = (trip: BreakerTrip) => void;

function reject(code: Extract<AdmissionDecision, { verdict: "REJECT" }>["code"], reason: string): AdmissionDecision {
  return { verdict: "REJECT", code, reason };
}

function signedDelta(side: OrderSide, quantity: number): number {
  return side === "buy" ? quantity : -quantity;
}

export class RiskEngine {
  private readonly states = new Map<string, RiskState>();
  private readonly trackers = new Map<string, DailyPnLTracker>();
  private readonly listeners: TripListener[] = [];

  constructor(accountIds: Iterable<string>) {
    for (const id of accountIds) {
      this.states.set(id, freshRiskState());
      this.trackers.set(id, new DailyPnLTracker(id));
    }
  }

  onTrip(listener: TripListener): void {
    this.listeners.push(listener);
  }

  /** Read-only copy of an account's risk bookkeeping. */
  getState(accountId: string): Readonly<RiskState> {
    return { ...this.stateFor(accountId) };
  }

  isHalted(accountId: string): boolean {
    return isOpen(this.stateFor(accountId).breaker);
  }

  startOfDayEquity(accountId: string): number | null {
    return this.trackerFor(accountId).getStartOfDayEquity();
  }

  dailyPnl(accountId: string, sessionDate: string, equity: number): number {
    return this.trackerFor(accountId).getDailyPnL(sessionDate, equity);
  }

  admit(account: Account, action: CandidateAction, price: number | undefined): AdmissionDecision {
    const state = this.stateFor(account.id);
    const limits = account.risk;

    // 1. Circuit breaker
    if (isOpen(state.breaker)) {
      return reject("ACCOUNT_HALTED", "account halted");
    }

    if (price === undefined || !(price > 0)) {
      return reject("NO_PRICE", `no current price for ${action.symbol}`);
    }

    const position = account.positions.get(action.symbol);
    const currentQty = position?.quantity ?? 0;
    const reducing = currentQty !== 0 && Math.sign(signedDelta(action.side, 1)) !== Math.sign(currentQty);

    if (action.kind === "close" && !reducing) {
      return reject("INVALID_ACTION", `no ${action.side === "sell" ? "long" : "short"} position in ${action.symbol} to close`);
    }

    if (reducing && position) {
      const quantity = action.kind === "close"
        ? Math.abs(currentQty)
        : Math.min(Math.floor(action.quantity), Math.abs(currentQty));
      if (quantity <= 0) {
        return reject("INVALID_ACTION", `non-positive quantity for ${action.symbol}`);
      }

      // 2. PDT
      if (this.completesDayTrade(state, position) && state.dayTradesToday + 1 > limits.maxDayTrades) {
        return reject("PDT_LIMIT", "PDT limit");
      }

      // 3. Risk-reducing actions are never blocked by size or exposure.
      return {
        verdict: "ALLOW",
        quantity,
        notional: quantity * price,
        clamped: false,
        riskReducing: true,
        note: this.describeExit(action, position, price, limits.stopLossPct, limits.takeProfitPct),
      };
    }

    const equity = account.equity;
    if (!(equity > 0)) {
      return reject("EXPOSURE_LIMIT", "exposure limit");
    }

    let requested: number;
    if (limits.kellyEnabled && action.kellyFraction !== undefined) {
      requested = this.kellyQuantity(account, action.kellyFraction, price);
    } else {
      requested = Math.floor(action.quantity);
    }
    if (requested <= 0) {
      return reject("BELOW_MINIMUM_SIZE", "below minimum size");
    }

    // 4. Position size
    const maxNotional = limits.maxPositionSize * equity;
    const existingShares = Math.abs(currentQty);
    let quantity = requested;
    let clamped = false;
    if ((existingShares + quantity) * price > maxNotional + EPSILON) {
      const maxShares = Math.floor(maxNotional / price + EPSILON);
      quantity = maxShares - existingShares;
      clamped = true;
      if (quantity <= 0) {
        return reject("BELOW_MINIMUM_SIZE", "below minimum size");
      }
    }

    // 5. Total exposure
    const exposure = summarizePortfolioRisk(account.positions.values(), equity).totalExposure;
    const before = position ? positionValue(position) : 0;
    const after = (existingShares + quantity) * price;
    const projected = exposure - before + after;
    if (projected / equity > limits.maxTotalExposure + EPSILON) {
      return reject(
        "EXPOSURE_LIMIT",
        "exposure limit"
      );
    }

    return {
      verdict: "ALLOW",
      quantity,
      notional: quantity * price,
      clamped,
      riskReducing: false,
      note: clamped ? `clamped ${requested} -> ${quantity} shares by max position size` : undefined,
    };
  }

  /**
   * Full close during an emergency stop. The only admission that does not
   * consult the breaker, which is already OPEN by then.
   */
  admitLiquidation(account: Account, symbol: string, price: number | undefined): AdmissionDecision {
    const position = account.positions.get(symbol);
    if (!position) {
      return reject("INVALID_ACTION", `no position in ${symbol} to liquidate`);
    }
    const reference = price !== undefined && price > 0 ? price : position.currentPrice;
    if (!(reference > 0)) {
      return reject("NO_PRICE", `no current price for ${symbol}`);
    }
    const quantity = Math.abs(position.quantity);
    return {
      verdict: "ALLOW",
      quantity,
      notional: quantity * reference,
      clamped: false,
      riskReducing: true,
      note: "liquidation",
    };
  }

  /**
   * Kelly target: riskMultiplier x kellyFraction x equity, clamped to
   * [0, maxPositionSize x equity]. The fraction itself comes from the strategy.
   */
  kellyQuantity(account: Account, kellyFraction: number, price: number): number {
    const limits = account.risk;
    const multiplier = limits.aggressiveSizingEnabled ? limits.riskMultiplier : Math.min(1, limits.riskMultiplier);
    const target = multiplier * kellyFraction * account.equity;
    const bounded = Math.min(Math.max(target, 0), limits.maxPositionSize * account.equity);
    return Math.floor(bounded / price + EPSILON);
  }

  /** Close actions for every position past its stop-loss or take-profit. */
  protectiveExits(account: Account): CandidateAction[] {
    const exits: CandidateAction[] = [];
    for (const position of account.positions.values()) {
      const ret = unrealizedReturn(position);
      const side: OrderSide = position.quantity > 0 ? "sell" : "buy";
      const pct = (ret * 100).toFixed(1);
      if (ret <= -account.risk.stopLossPct) {
        exits.push({
          kind: "close",
          symbol: position.symbol,
          side,
          quantity: Math.abs(position.quantity),
          trigger: "stop_loss",
          reason: `STOP_LOSS (${pct}%)`,
        });
      } else if (ret >= account.risk.takeProfitPct) {
        exits.push({
          kind: "close",
          symbol: position.symbol,
          side,
          quantity: Math.abs(position.quantity),
          trigger: "take_profit",
          reason: `TAKE_PROFIT (${pct}%)`,
        });
      }
    }
    return exits;
  }

  /**
   * Book an accepted order: trade counts, realized P&L, loss streak, and the
   * account's local position set so later admissions in the same cycle see it.
   */
  recordFill(account: Account, side: OrderSide, symbol: string, quantity: number, price: number, now: Date): number {
    const state = this.stateFor(account.id);
    state.tradesToday++;

    const position = account.positions.get(symbol);
    const delta = signedDelta(side, quantity);
    let realized = 0;

    if (!position) {
      account.positions.set(symbol, {
        symbol,
        quantity: delta,
        entryPrice: price,
        currentPrice: price,
        openedAt: now,
      });
    } else if (Math.sign(delta) === Math.sign(position.quantity)) {
      const total = position.quantity + delta;
      position.entryPrice =
        (position.entryPrice * Math.abs(position.quantity) + price * quantity) / Math.abs(total);
      position.quantity = total;
      position.currentPrice = price;
    } else {
      const closed = Math.min(quantity, Math.abs(position.quantity));
      const direction = position.quantity > 0 ? 1 : -1;
      realized = (price - position.entryPrice) * closed * direction;
      if (this.completesDayTrade(state, position)) state.dayTradesToday++;
      recordTradeResult(account.id, state, realized);

      const remaining = position.quantity + direction * -closed;
      if (remaining === 0) {
        account.positions.delete(symbol);
      } else {
        position.quantity = remaining;
        position.currentPrice = price;
      }
    }

    account.cash -= delta * price;
    return realized;
  }

  /**
   * Once per cycle per account: latch the breaker if session results breach
   * the account's limits.
   */
  evaluateBreaker(account: Account, now: Date): BreakerTrip | null {
    const state = this.stateFor(account.id);
    if (isOpen(state.breaker)) return null;

    const verdict = checkCircuitBreaker(state, account.risk, {
      equity: account.equity,
      startOfDayEquity: this.trackerFor(account.id).getStartOfDayEquity(),
    });
    if (!verdict) return null;
    return this.trip(account.id, verdict.cause, verdict.reason, now);
  }

  /**
   * Track fully-failed cycles. Reaching the account's limit is a systemic
   * event and trips the breaker whether or not loss breakers are enabled.
   */
  recordCycleOutcome(account: Account, failed: boolean, now: Date): BreakerTrip | null {
    const state = this.stateFor(account.id);
    if (!failed) {
      state.consecutiveFailedCycles = 0;
      return null;
    }
    state.consecutiveFailedCycles++;
    if (state.consecutiveFailedCycles >= account.risk.maxFailedCycles) {
      return this.trip(
        account.id,
        "systemic",
        `${state.consecutiveFailedCycles} consecutive failed cycles`,
        now
      );
    }
    return null;
  }

  /**
   * Portfolio-wide loss check across accounts. Only called when account
   * isolation is disabled.
   */
  evaluatePortfolio(accounts: readonly Account[], maxDailyLoss: number, now: Date): BreakerTrip[] {
    let realized = 0;
    let equity = 0;
    for (const account of accounts) {
      realized += this.stateFor(account.id).dailyRealizedPnl;
      equity += account.equity;
    }
    if (equity <= 0 || realized > -maxDailyLoss * equity) return [];

    const reason = `Portfolio realized P&L $${realized.toFixed(2)} breaches ${(maxDailyLoss * 100).toFixed(1)}% of combined equity`;
    return this.tripMany(accounts.map((a) => a.id), "portfolio_loss", reason, now);
  }

  haltAll(reason: string, now: Date): BreakerTrip[] {
    return this.tripMany([...this.states.keys()], "emergency_stop", reason, now);
  }

  /**
   * New trading session: clear counters and close breakers for every
   * account. Returns the accounts whose breaker was open.
   */
  resetSession(sessionDate: string): string[] {
    const reopened: string[] = [];
    for (const [id, state] of this.states) {
      if (state.sessionDate === sessionDate) continue;
      const wasOpen = isOpen(state.breaker);
      this.states.set(id, freshRiskState(sessionDate));
      if (wasOpen) reopened.push(id);
      log(`[${id}] Session ${sessionDate} started${wasOpen ? ", circuit breaker reset" : ""}`);
    }
    return reopened;
  }

  manualReset(accountId: string): boolean {
    const state = this.stateFor(accountId);
    if (!isOpen(state.breaker)) return false;
    state.consecutiveLosses = 0;
    state.consecutiveFailedCycles = 0;
    closeBreaker(accountId, state, "manual override");
    return true;
  }

  private trip(accountId: string, cause: TripCause, reason: string, now: Date): BreakerTrip | null {
    const trip = tripBreaker(accountId, this.stateFor(accountId), cause, reason, now);
    if (trip) {
      for (const listener of this.listeners) listener(trip);
    }
    return trip;
  }

  private tripMany(ids: readonly string[], cause: TripCause, reason: string, now: Date): BreakerTrip[] {
    const trips: BreakerTrip[] = [];
    for (const id of ids) {
      const trip = this.trip(id, cause, reason, now);
      if (trip) trips.push(trip);
    }
    return trips;
  }

  private completesDayTrade(state: RiskState, position: Position): boolean {
    return state.sessionDate !== null && sessionDateOf(position.openedAt) === state.sessionDate;
  }

  private describeExit(
    action: CandidateAction,
    position: Position,
    price: number,
    stopLossPct: number,
    takeProfitPct: number
  ): string {
    const ret = unrealizedReturn({ ...position, currentPrice: price });
    switch (action.trigger) {
      case "stop_loss":
        return ret <= -stopLossPct ? "stop-loss exit" : "stop-loss exit (threshold not reached at reference price)";
      case "take_profit":
        return ret >= takeProfitPct ? "take-profit exit" : "take-profit exit (threshold not reached at reference price)";
      case "liquidation":
        return "liquidation";
      case "signal":
        return "risk-reducing exit";
    }
  }

  private stateFor(accountId: string): RiskState {
    const state = this.states.get(accountId);
    if (!state) throw new Error(`Unknown account ${accountId}`);
    return state;
  }

  private trackerFor(accountId: string): DailyPnLTracker {
    const tracker = this.trackers.get(accountId);
    if (!tracker) throw new Error(`Unknown account ${accountId}`);
    return tracker;
  }
}
