import type { AccountSnapshot, BrokerPosition } from "../adapters/types.js";
import { summarizePortfolioRisk } from "../risk/portfolio-risk.js";
import type { RiskState } from "../risk/types.js";
import type { AccountConfig } from "../utils/config.js";
import type { Account, AccountView, Position } from "./types.js";

/** Positions reported by the broker that this process did not open. */
export const UNKNOWN_OPEN_TIME = new Date(0);

/**
 * Every managed account, keyed by id. Owned by the scheduler; the risk
 * engine receives one account at a time.
 */
export class AccountRegistry {
  private readonly accounts = new Map<string, Account>();

  constructor(configs: readonly AccountConfig[]) {
    for (const config of configs) {
      this.accounts.set(config.id, {
        id: config.id,
        label: config.label,
        startingEquity: config.startingEquity,
        equity: config.startingEquity,
        cash: config.startingEquity,
        positions: new Map(),
        risk: config.risk,
        lastRefreshedAt: null,
      });
    }
  }

  ids(): string[] {
    return [...this.accounts.keys()];
  }

  all(): Account[] {
    return [...this.accounts.values()];
  }

  has(id: string): boolean {
    return this.accounts.has(id);
  }

  get(id: string): Account {
    const account = this.accounts.get(id);
    if (!account) throw new Error(`Unknown account ${id}`);
    return account;
  }

  /**
   * Replace the account's balances and positions with the broker's view.
   * Opening times survive for symbols already held so day trades stay
   * countable.
   */
  applyRefresh(
    account: Account,
    snapshot: AccountSnapshot,
    positions: readonly BrokerPosition[],
    prices: ReadonlyMap<string, number>,
    now: Date
  ): void {
    const next = new Map<string, Position>();
    for (const p of positions) {
      if (p.quantity === 0) continue;
      const known = account.positions.get(p.symbol);
      next.set(p.symbol, {
        symbol: p.symbol,
        quantity: p.quantity,
        entryPrice: p.entryPrice,
        currentPrice: prices.get(p.symbol) ?? p.currentPrice,
        openedAt: known?.openedAt ?? UNKNOWN_OPEN_TIME,
      });
    }
    account.equity = snapshot.equity;
    account.cash = snapshot.cash;
    account.positions = next;
    account.lastRefreshedAt = now;
  }
}

/** Detached copy of an account for publication. */
export function buildAccountView(account: Account, risk: Readonly<RiskState>, dailyPnl: number): AccountView {
  const summary = summarizePortfolioRisk(account.positions.values(), account.equity);
  return {
    id: account.id,
    label: account.label,
    equity: account.equity,
    cash: account.cash,
    startingEquity: account.startingEquity,
    exposure: summary.totalExposure,
    exposurePct: summary.exposurePct,
    largestPosition: summary.largestPosition,
    largestPositionPct: summary.largestPositionPct,
    positions: [...account.positions.values()].map((p) => ({ ...p, openedAt: new Date(p.openedAt.getTime()) })),
    risk: { ...risk },
    dailyPnl,
    lastRefreshedAt: account.lastRefreshedAt,
  };
}
