import { log } from "../utils/logger.js";

/**
 * Start-of-day equity for one account, keyed by exchange session date.
 */
export class DailyPnLTracker {
  private startOfDayEquity: number | null = null;
  private tradingDate: string | null = null;

  constructor(private readonly accountId: string) {}

  recordStartOfDay(sessionDate: string, equity: number): void {
    if (this.tradingDate !== sessionDate) {
      this.tradingDate = sessionDate;
      this.startOfDayEquity = equity;
      log(`[${this.accountId}] Start of day equity recorded: $${equity.toFixed(2)}`);
    }
  }

  getDailyPnL(sessionDate: string, currentEquity: number): number {
    if (this.startOfDayEquity === null || this.tradingDate !== sessionDate) {
      this.recordStartOfDay(sessionDate, currentEquity);
      return 0;
    }
    return currentEquity - this.startOfDayEquity;
  }

  getStartOfDayEquity(): number | null {
    return this.startOfDayEquity;
  }
}
