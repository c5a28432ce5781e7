/**
 * Capability interfaces the control core consumes. Implementations live
 * beside this file; tests substitute in-process fakes.
 */

import type { BacktestSummary, CycleResult, OrderRecord, ScoredCandidate } from "../core/types.js";
import type { BreakerTrip, OrderSide } from "../risk/types.js";

export interface AccountSnapshot {
  readonly equity: number;
  readonly cash: number;
  readonly buyingPower: number;
  readonly status: string;
}

export interface BrokerPosition {
  readonly symbol: string;
  /** Signed: negative for shorts. */
  readonly quantity: number;
  readonly entryPrice: number;
  readonly currentPrice: number;
}

export interface OrderRequest {
  readonly symbol: string;
  readonly side: OrderSide;
  readonly quantity: number;
  readonly type: "market";
  readonly timeInForce: "day";
  readonly clientOrderId: string;
}

export type OrderStatus = "filled" | "accepted" | "rejected";

export interface OrderAck {
  readonly orderId: string;
  readonly status: OrderStatus;
  readonly filledQuantity: number;
  readonly filledAvgPrice: number | null;
}

export interface BrokerAdapter {
  getAccountSnapshot(accountId: string): Promise<AccountSnapshot>;
  getPositions(accountId: string): Promise<BrokerPosition[]>;
  getPrices(symbols: readonly string[]): Promise<Map<string, number>>;
  submitOrder(accountId: string, order: OrderRequest): Promise<OrderAck>;
  cancelOrder(accountId: string, orderId: string): Promise<void>;
  /** Oldest first. */
  getDailyCloses(symbol: string, days: number): Promise<number[]>;
}

export interface CandidateSource {
  getQualifiedCandidates(): Promise<ScoredCandidate[]>;
}

export type BreakerEvent =
  | ({ readonly type: "trip" } & BreakerTrip)
  | { readonly type: "reset"; readonly accountId: string; readonly reason: string; readonly at: Date };

export interface PersistenceAdapter {
  recordCycle(result: CycleResult): void;
  recordOrder(order: OrderRecord): void;
  recordCircuitBreakerEvent(event: BreakerEvent): void;
  recordBacktest(sequence: number, summary: BacktestSummary): void;
  /** Write what is buffered. Never rejects; failed records stay buffered. */
  flush(): Promise<void>;
  pending(): number;
}

export type Severity = "info" | "warning" | "critical";

export interface Notifier {
  notify(severity: Severity, message: string): Promise<void>;
}
