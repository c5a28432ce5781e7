/**
 * Portfolio-level exposure summary for one account.
 */

import type { Position } from "../core/types.js";

export interface PortfolioRiskSummary {
  totalExposure: number;
  exposurePct: number;
  numPositions: number;
  largestPosition: string;
  largestPositionPct: number;
}

export function positionValue(position: Pick<Position, "quantity" | "currentPrice">): number {
  return Math.abs(position.quantity * position.currentPrice);
}

export function summarizePortfolioRisk(
  positions: Iterable<Position>,
  equity: number
): PortfolioRiskSummary {
  let totalExposure = 0;
  let numPositions = 0;
  let largestSymbol = "";
  let largestValue = 0;

  for (const pos of positions) {
    const value = positionValue(pos);
    totalExposure += value;
    numPositions++;
    if (value > largestValue) {
      largestValue = value;
      largestSymbol = pos.symbol;
    }
  }

  return {
    totalExposure,
    exposurePct: equity > 0 ? totalExposure / equity : 0,
    numPositions,
    largestPosition: largestSymbol,
    largestPositionPct: equity > 0 ? largestValue / equity : 0,
  };
}

/** Unrealized return of a position as a fraction of entry; sign-aware for shorts. */
export function unrealizedReturn(position: Pick<Position, "quantity" | "entryPrice" | "currentPrice">): number {
  if (position.entryPrice <= 0) return 0;
  const direction = position.quantity > 0 ? 1 : -1;
  return ((position.currentPrice - position.entryPrice) / position.entryPrice) * direction;
}
