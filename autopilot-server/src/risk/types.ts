export type TripCause =
  | "daily_loss"
  | "equity_drawdown"
  | "consecutive_losses"
  | "systemic"
  | "portfolio_loss"
  | "emergency_stop";

export type BreakerState =
  | { readonly status: "CLOSED" }
  | {
      readonly status: "OPEN";
      readonly cause: TripCause;
      readonly reason: string;
      readonly trippedAt: Date;
    };

export interface RiskState {
  sessionDate: string | null;
  tradesToday: number;
  dayTradesToday: number;
  consecutiveLosses: number;
  dailyRealizedPnl: number;
  consecutiveFailedCycles: number;
  breaker: BreakerState;
}

export type ActionKind = "open" | "close" | "resize";
export type OrderSide = "buy" | "sell";
export type ActionTrigger = "stop_loss" | "take_profit" | "signal" | "liquidation";

/** A strategy's (or the core's) request to change one position. */
export interface CandidateAction {
  readonly kind: ActionKind;
  readonly symbol: string;
  readonly side: OrderSide;
  /** Shares requested. Ignored for Kelly-sized opens. */
  readonly quantity: number;
  readonly kellyFraction?: number;
  readonly trigger: ActionTrigger;
  readonly reason: string;
}

export type RejectCode =
  | "ACCOUNT_HALTED"
  | "PDT_LIMIT"
  | "BELOW_MINIMUM_SIZE"
  | "EXPOSURE_LIMIT"
  | "NO_PRICE"
  | "INVALID_ACTION";

export type AdmissionDecision =
  | {
      readonly verdict: "ALLOW";
      readonly quantity: number;
      readonly notional: number;
      readonly clamped: boolean;
      readonly riskReducing: boolean;
      readonly note?: string;
    }
  | {
      readonly verdict: "REJECT";
      readonly code: RejectCode;
      readonly reason: string;
    };

export interface BreakerTrip {
  readonly accountId: string;
  readonly cause: TripCause;
  readonly reason: string;
  readonly trippedAt: Date;
}
