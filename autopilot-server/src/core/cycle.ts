/**
 * Per-cycle work: one trading step per account, or one backtesting pass.
 *
 * A trading step refreshes the account, consults its breaker, evaluates
 * protective exits and strategy actions, admits each through the risk
 * engine and submits what is allowed. Any failure stays inside the step.
 */

import type { CycleCandidateCache } from "../adapters/candidates.js";
import type { GuardedCalls } from "../adapters/guarded.js";
import type { NotificationGate } from "../adapters/notifier.js";
import type { BrokerAdapter, OrderRequest, PersistenceAdapter } from "../adapters/types.js";
import type { RiskEngine } from "../risk/engine.js";
import type { CandidateAction, OrderSide, RejectCode } from "../risk/types.js";
import type { Backtester, BacktestStrategyName, Strategy } from "../strategy/types.js";
import { describeError, log, logError, logWarn } from "../utils/logger.js";
import type { AccountRegistry } from "./account-registry.js";
import type { Account, AccountCycleOutcome, BacktestSummary, OrderRecord, ScoredCandidate } from "./types.js";

/** Backtests above this average return are announced. */
const NOTABLE_BACKTEST_RETURN_PCT = 5;

export interface CycleRunnerDeps {
  broker: BrokerAdapter;
  calls: GuardedCalls;
  candidates: CycleCandidateCache;
  strategy: Strategy;
  backtester: Backtester;
  riskEngine: RiskEngine;
  registry: AccountRegistry;
  persistence: PersistenceAdapter;
  alerts: NotificationGate;
  backtest: {
    readonly strategies: readonly BacktestStrategyName[];
    readonly maxSymbols: number;
  };
  /** Prefix for client order ids; unique per process run. */
  orderPrefix: string;
  now?: () => Date;
}

export interface StepContext {
  readonly sequence: number;
  readonly sessionDate: string;
  readonly isCancelled: () => boolean;
}

export interface BacktestPass {
  readonly summaries: BacktestSummary[];
  readonly errors: string[];
}

interface StepTally {
  attempted: number;
  filled: number;
  submitted: number;
  rejected: number;
  errors: string[];
}

export class CycleRunner {
  /** Orders accepted but not reported filled, per account, this session. */
  private readonly openOrders = new Map<string, Set<string>>();
  private readonly now: () => Date;
  private orderCounter = 0;

  constructor(private readonly deps: CycleRunnerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async tradeAccount(account: Account, ctx: StepContext): Promise<AccountCycleOutcome> {
    const { broker, calls, riskEngine, registry } = this.deps;
    const tally: StepTally = { attempted: 0, filled: 0, submitted: 0, rejected: 0, errors: [] };
    const finish = (skipped: string | null, failed = false): AccountCycleOutcome => ({
      accountId: account.id,
      ordersAttempted: tally.attempted,
      ordersFilled: tally.filled,
      ordersSubmitted: tally.submitted,
      ordersRejected: tally.rejected,
      errors: tally.errors,
      skipped,
      failed,
      equity: failed ? null : account.equity,
    });

    // (a) refresh
    let prices: Map<string, number>;
    let candidates: ScoredCandidate[] = [];
    try {
      const [snapshot, positions] = await Promise.all([
        calls.run("broker", `[${account.id}] account`, () => broker.getAccountSnapshot(account.id)),
        calls.run("broker", `[${account.id}] positions`, () => broker.getPositions(account.id)),
      ]);
      try {
        candidates = await this.loadCandidates(ctx.sequence);
      } catch (error) {
        tally.errors.push(`candidates: ${describeError(error)}`);
      }
      const symbols = [...new Set([...positions.map((p) => p.symbol), ...candidates.map((c) => c.symbol)])];
      prices = await calls.run("market_data", `[${account.id}] prices`, () => broker.getPrices(symbols));
      registry.applyRefresh(account, snapshot, positions, prices, this.now());
    } catch (error) {
      logError(`[${account.id}] Refresh failed`, error);
      tally.errors.push(`refresh: ${describeError(error)}`);
      return finish(null, true);
    }
    riskEngine.dailyPnl(account.id, ctx.sessionDate, account.equity);

    // (b) breaker
    if (riskEngine.isHalted(account.id)) {
      return finish("account halted");
    }
    if (ctx.isCancelled()) return finish("emergency stop");

    // (c) candidate actions, protective exits first
    const exits = riskEngine.protectiveExits(account);
    const exiting = new Set(exits.map((e) => e.symbol));
    const proposed = this.deps.strategy
      .evaluate({
        accountId: account.id,
        equity: account.equity,
        maxPositionSize: account.risk.maxPositionSize,
        stopLossPct: account.risk.stopLossPct,
        takeProfitPct: account.risk.takeProfitPct,
        positions: account.positions,
        candidates,
        prices,
        now: this.now(),
      })
      .filter((action) => !exiting.has(action.symbol));

    // (d) admission, (e) submission
    let opened = 0;
    let skipped: string | null = null;
    for (const action of [...exits, ...proposed]) {
      if (ctx.isCancelled()) {
        skipped = "emergency stop";
        break;
      }
      const price = prices.get(action.symbol);
      const decision = riskEngine.admit(account, action, price);
      tally.attempted++;

      if (decision.verdict === "REJECT") {
        tally.rejected++;
        log(`[${account.id}] REJECT ${action.side} ${action.symbol}: ${decision.reason}`);
        this.recordOrder(account.id, null, action, action.quantity, price ?? 0, "rejected", decision.reason, decision.code);
        continue;
      }

      if (!decision.riskReducing) {
        if (opened >= account.risk.maxOrdersPerCycle) {
          tally.attempted--;
          log(`[${account.id}] Order cap reached, skipping ${action.symbol}`);
          continue;
        }
        opened++;
      }
      if (decision.note) log(`[${account.id}] ${action.symbol}: ${decision.note}`);

      // price is defined: admission rejects NO_PRICE otherwise
      await this.submit(account, action, decision.quantity, price ?? 0, ctx.sequence, tally);
    }

    // (f) breaker evaluation for the next cycle
    riskEngine.evaluateBreaker(account, this.now());
    return finish(skipped);
  }

  async runBacktests(sequence: number, isCancelled: () => boolean): Promise<BacktestPass> {
    const summaries: BacktestSummary[] = [];
    const errors: string[] = [];

    let candidates: ScoredCandidate[];
    try {
      candidates = await this.loadCandidates(sequence);
    } catch (error) {
      errors.push(`candidates: ${describeError(error)}`);
      return { summaries, errors };
    }

    const symbols = candidates.slice(0, this.deps.backtest.maxSymbols).map((c) => c.symbol);
    if (symbols.length === 0) {
      log("No qualified stocks for backtesting");
      return { summaries, errors };
    }

    for (const strategy of this.deps.backtest.strategies) {
      if (isCancelled()) break;
      try {
        const summary = await this.deps.backtester.run(strategy, symbols);
        summaries.push(summary);
        this.deps.persistence.recordBacktest(sequence, summary);
      } catch (error) {
        logError(`Backtest ${strategy} failed`, error);
        errors.push(`backtest ${strategy}: ${describeError(error)}`);
      }
    }

    const best = summaries.reduce<BacktestSummary | null>(
      (top, s) => (top === null || s.totalReturnPct > top.totalReturnPct ? s : top),
      null
    );
    if (best) {
      log(`Best strategy: ${best.strategy} (${best.totalReturnPct.toFixed(2)}% return)`);
      if (best.totalReturnPct > NOTABLE_BACKTEST_RETURN_PCT) {
        this.deps.alerts.send(
          "backtest:best",
          "info",
          `Backtest results\nBest: ${best.strategy}\nReturn: ${best.totalReturnPct.toFixed(2)}%\nTickers: ${symbols.slice(0, 3).join(", ")}`
        );
      }
    }
    return { summaries, errors };
  }

  /** Cancel every order this session left accepted but unfilled. Returns how many were cancelled. */
  async cancelOpenOrders(): Promise<number> {
    let cancelled = 0;
    for (const [accountId, orderIds] of this.openOrders) {
      for (const orderId of orderIds) {
        try {
          await this.deps.calls.once("broker", `[${accountId}] cancel ${orderId}`, () =>
            this.deps.broker.cancelOrder(accountId, orderId)
          );
          cancelled++;
        } catch (error) {
          logWarn(`[${accountId}] Cancel ${orderId} failed: ${describeError(error)}`);
        }
      }
      orderIds.clear();
    }
    return cancelled;
  }

  /**
   * Close every position in the account at market. Runs only during an
   * emergency stop, after the breaker is already OPEN.
   */
  async liquidate(account: Account, sequence: number): Promise<string[]> {
    const { broker, calls, registry, riskEngine } = this.deps;
    const tally: StepTally = { attempted: 0, filled: 0, submitted: 0, rejected: 0, errors: [] };

    try {
      const [snapshot, positions] = await Promise.all([
        calls.run("broker", `[${account.id}] account`, () => broker.getAccountSnapshot(account.id)),
        calls.run("broker", `[${account.id}] positions`, () => broker.getPositions(account.id)),
      ]);
      const prices = await calls.run("market_data", `[${account.id}] prices`, () =>
        broker.getPrices(positions.map((p) => p.symbol))
      );
      registry.applyRefresh(account, snapshot, positions, prices, this.now());
    } catch (error) {
      logError(`[${account.id}] Liquidation refresh failed`, error);
      return [`liquidation refresh: ${describeError(error)}`];
    }

    for (const position of [...account.positions.values()]) {
      const action: CandidateAction = {
        kind: "close",
        symbol: position.symbol,
        side: position.quantity > 0 ? "sell" : "buy",
        quantity: Math.abs(position.quantity),
        trigger: "liquidation",
        reason: "emergency liquidation",
      };
      const decision = riskEngine.admitLiquidation(account, position.symbol, position.currentPrice);
      if (decision.verdict === "REJECT") {
        tally.errors.push(`liquidation ${position.symbol}: ${decision.reason}`);
        continue;
      }
      await this.submit(account, action, decision.quantity, position.currentPrice, sequence, tally);
    }
    log(`[${account.id}] Liquidation submitted ${tally.filled + tally.submitted} close order(s)`);
    return tally.errors;
  }

  /** Forget unfilled orders from an earlier session; day orders have expired. */
  startSession(): void {
    this.openOrders.clear();
  }

  private loadCandidates(sequence: number): Promise<ScoredCandidate[]> {
    // At most one load per cycle, so no retry here.
    return this.deps.calls.once("candidates", "candidates", () =>
      this.deps.candidates.forCycle(sequence, this.now())
    );
  }

  private async submit(
    account: Account,
    action: CandidateAction,
    quantity: number,
    price: number,
    sequence: number,
    tally: StepTally
  ): Promise<void> {
    const order: OrderRequest = {
      symbol: action.symbol,
      side: action.side,
      quantity,
      type: "market",
      timeInForce: "day",
      clientOrderId: `${this.deps.orderPrefix}-${account.id}-${sequence}-${++this.orderCounter}`,
    };

    try {
      const ack = await this.deps.calls.once("broker", `[${account.id}] submit ${action.symbol}`, () =>
        this.deps.broker.submitOrder(account.id, order)
      );
      switch (ack.status) {
        case "rejected":
          tally.rejected++;
          logWarn(`[${account.id}] Broker rejected ${action.side} ${quantity} ${action.symbol}`);
          this.recordOrder(account.id, ack.orderId, action, quantity, price, "rejected", "broker rejected");
          break;
        case "filled": {
          const filledQty = ack.filledQuantity > 0 ? ack.filledQuantity : quantity;
          const fillPrice = ack.filledAvgPrice ?? price;
          this.book(account, action.side, action.symbol, filledQty, fillPrice);
          tally.filled++;
          this.recordOrder(account.id, ack.orderId, action, filledQty, fillPrice, "filled", action.reason);
          break;
        }
        case "accepted":
          this.book(account, action.side, action.symbol, quantity, price);
          tally.submitted++;
          this.trackOpenOrder(account.id, ack.orderId);
          this.recordOrder(account.id, ack.orderId, action, quantity, price, "submitted", action.reason);
          break;
      }
    } catch (error) {
      logError(`[${account.id}] Order ${action.side} ${quantity} ${action.symbol} failed`, error);
      tally.errors.push(`order ${action.symbol}: ${describeError(error)}`);
      this.recordOrder(account.id, null, action, quantity, price, "failed", describeError(error));
    }
  }

  private book(account: Account, side: OrderSide, symbol: string, quantity: number, price: number): void {
    const realized = this.deps.riskEngine.recordFill(account, side, symbol, quantity, price, this.now());
    log(
      `[${account.id}] ${side.toUpperCase()} ${quantity} ${symbol} @ $${price.toFixed(2)}` +
        (realized !== 0 ? ` realized $${realized.toFixed(2)}` : "")
    );
  }

  private trackOpenOrder(accountId: string, orderId: string): void {
    const ids = this.openOrders.get(accountId) ?? new Set<string>();
    ids.add(orderId);
    this.openOrders.set(accountId, ids);
  }

  private recordOrder(
    accountId: string,
    orderId: string | null,
    action: CandidateAction,
    quantity: number,
    price: number,
    status: OrderRecord["status"],
    reason: string,
    rejectCode?: RejectCode
  ): void {
    this.deps.persistence.recordOrder({
      accountId,
      orderId,
      symbol: action.symbol,
      side: action.side,
      quantity,
      price,
      status,
      reason,
      rejectCode,
      at: this.now(),
    });
  }
}
