import type { AccountRiskConfig } from "../utils/config.js";
import type { BreakerState, OrderSide, RejectCode, RiskState } from "../risk/types.js";

export type Mode = "TRADING" | "BACKTESTING";

export interface Position {
  readonly symbol: string;
  /** Signed: positive long, negative short. Never zero. */
  quantity: number;
  entryPrice: number;
  currentPrice: number;
  openedAt: Date;
}

export interface Account {
  readonly id: string;
  readonly label: string;
  readonly startingEquity: number;
  equity: number;
  cash: number;
  positions: Map<string, Position>;
  readonly risk: AccountRiskConfig;
  lastRefreshedAt: Date | null;
}

export interface ScoredCandidate {
  readonly symbol: string;
  readonly score: number;
  readonly confidence: number;
}

export interface OrderRecord {
  readonly accountId: string;
  readonly orderId: string | null;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly quantity: number;
  readonly price: number;
  readonly status: "filled" | "submitted" | "rejected" | "failed";
  readonly reason: string;
  readonly rejectCode?: RejectCode;
  readonly at: Date;
}

export interface AccountCycleOutcome {
  readonly accountId: string;
  readonly ordersAttempted: number;
  readonly ordersFilled: number;
  readonly ordersSubmitted: number;
  readonly ordersRejected: number;
  readonly errors: readonly string[];
  readonly skipped: string | null;
  /** Equity after the cycle's refresh; null when the refresh failed. */
  readonly equity: number | null;
  /** True when the account step could not complete at all. */
  readonly failed: boolean;
}

export interface BacktestSummary {
  readonly strategy: string;
  readonly symbols: readonly string[];
  readonly totalReturnPct: number;
  readonly trades: number;
  readonly winRate: number;
  readonly sharpe: number;
}

export interface CycleResult {
  readonly sequence: number;
  readonly mode: Mode;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly durationMs: number;
  readonly accounts: readonly AccountCycleOutcome[];
  readonly backtests: readonly BacktestSummary[];
  readonly errors: readonly string[];
  readonly cancelled: boolean;
}

export type StopActor = "dashboard" | "operator" | "circuit_breaker" | "signal";

export interface EmergencyStopRequest {
  readonly reason: string;
  readonly actor: StopActor;
  readonly requestedAt: Date;
}

/** What the control surface sees of one account after a completed cycle. */
export interface AccountView {
  readonly id: string;
  readonly label: string;
  readonly equity: number;
  readonly cash: number;
  readonly startingEquity: number;
  readonly exposure: number;
  readonly exposurePct: number;
  /** Symbol of the largest position by market value; empty when flat. */
  readonly largestPosition: string;
  readonly largestPositionPct: number;
  readonly positions: readonly Readonly<Position>[];
  readonly risk: Readonly<Omit<RiskState, "breaker">> & { readonly breaker: BreakerState };
  readonly dailyPnl: number;
  readonly lastRefreshedAt: Date | null;
}
