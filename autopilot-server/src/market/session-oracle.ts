/**
 * Market-Session Oracle.
 *
 * isMarketOpen / nextBoundary are pure functions of `now` over the last
 * loaded calendar window. A date the window does not cover is treated as
 * CLOSED, so a calendar outage sends the scheduler to backtesting rather
 * than trading on guesses.
 */

import { describeError, logWarn, log } from "../utils/logger.js";
import type { CalendarSource, TradingSession } from "./calendar.js";
import { addDays, sessionDateOf } from "./timezone.js";

export interface MarketSessionOracle {
  isMarketOpen(now: Date): boolean;
  nextBoundary(now: Date): Date;
}

/** An oracle whose calendar window is reloaded by its owner. */
export interface RefreshableOracle extends MarketSessionOracle {
  needsRefresh(now: Date): boolean;
  refresh(now: Date): Promise<void>;
}

interface CalendarWindow {
  readonly from: string;
  readonly to: string;
  readonly sessions: ReadonlyMap<string, TradingSession>;
  readonly loadedOn: string;
}

export interface OracleOptions {
  lookaheadDays: number;
  /** Used as the next boundary when the window cannot name one. */
  recheckMs: number;
}

export class CalendarSessionOracle implements RefreshableOracle {
  private window: CalendarWindow | null = null;

  constructor(
    private readonly source: CalendarSource,
    private readonly options: OracleOptions
  ) {}

  get sourceName(): string {
    return this.source.name;
  }

  needsRefresh(now: Date): boolean {
    return this.window === null || this.window.loadedOn !== sessionDateOf(now);
  }

  /**
   * Reload the window around `now`. On failure the previous window is kept;
   * the error is rethrown so the caller can record the outage.
   */
  async refresh(now: Date): Promise<void> {
    const today = sessionDateOf(now);
    const from = addDays(today, -1);
    const to = addDays(today, this.options.lookaheadDays);
    try {
      const sessions = await this.source.load(from, to);
      const byDate = new Map<string, TradingSession>();
      for (const session of sessions) byDate.set(session.date, session);
      this.window = { from, to, sessions: byDate, loadedOn: today };
      log(`Market calendar loaded from ${this.source.name}: ${byDate.size} sessions ${from}..${to}`);
    } catch (error) {
      logWarn(`Market calendar refresh from ${this.source.name} failed: ${describeError(error)}`);
      throw error;
    }
  }

  covers(now: Date): boolean {
    if (!this.window) return false;
    const date = sessionDateOf(now);
    return date >= this.window.from && date <= this.window.to;
  }

  isMarketOpen(now: Date): boolean {
    if (!this.window || !this.covers(now)) return false;
    const session = this.window.sessions.get(sessionDateOf(now));
    if (!session) return false;
    const t = now.getTime();
    return t >= session.open.getTime() && t < session.close.getTime();
  }

  nextBoundary(now: Date): Date {
    const fallback = new Date(now.getTime() + this.options.recheckMs);
    if (!this.window || !this.covers(now)) return fallback;

    const t = now.getTime();
    const ordered = [...this.window.sessions.values()].sort((a, b) => a.open.getTime() - b.open.getTime());
    for (const session of ordered) {
      if (t < session.open.getTime()) return session.open;
      if (t < session.close.getTime()) return session.close;
    }
    return fallback;
  }
}
