import cron from "node-cron";
import { EXCHANGE_TIME_ZONE } from "../market/timezone.js";

export interface TickTask {
  stop(): void;
}

/** Starts a recurring task on a cron expression. */
export type TickScheduler = (expression: string, onTick: () => void) => TickTask;

export const cronTicks: TickScheduler = (expression, onTick) =>
  cron.schedule(expression, onTick, { timezone: EXCHANGE_TIME_ZONE });

/**
 * Six-field cron expression that fires roughly every `ms`, rounded to whole
 * seconds below a minute, whole minutes below an hour, whole hours above.
 */
export function everyExpression(ms: number): string {
  const seconds = Math.max(1, Math.round(ms / 1000));
  if (seconds < 60) return `*/${seconds} * * * * *`;
  const minutes = Math.round(seconds / 60);
  if (minutes < 60) return `0 */${minutes} * * * *`;
  return `0 0 */${Math.min(23, Math.round(minutes / 60))} * * *`;
}
