/**
 * Health & Control Surface.
 *
 * Reads come from the snapshot the scheduler publishes after each cycle and
 * from recorded adapter outcomes; nothing here calls an adapter or touches
 * Account/RiskState. The only commands are an emergency stop and a queued
 * breaker reset, both applied by the scheduler.
 */

import type { CycleCandidateCache } from "../adapters/candidates.js";
import type { ConnectivityEntry, ConnectivityTracker } from "../adapters/connectivity.js";
import type { EmergencyStopQueue } from "../core/emergency.js";
import type { CycleBuffer, SnapshotStore } from "../core/snapshot.js";
import { describeState } from "../core/state.js";
import type { AccountView, EmergencyStopRequest, ScoredCandidate, StopActor } from "../core/types.js";
import { sessionDateOf } from "../market/timezone.js";
import { isOpen } from "../risk/circuit-breaker.js";
import { summarizePerformance } from "../risk/performance.js";
import type { AppConfig } from "../utils/config.js";
import type { AdapterName } from "../utils/errors.js";

export type HealthStatus = "STARTING" | "OPERATIONAL" | "DEGRADED" | "EMERGENCY_STOP" | "STOPPED";

export interface HealthReport {
  status: HealthStatus;
  uptimeSeconds: number;
  scheduler: string;
  mode: string | null;
  /** Outcome of the most recent call per adapter; null before the first call. */
  connectivity: Record<AdapterName, boolean | null>;
  adapters: Partial<Record<AdapterName, ConnectivityEntry>>;
  lastCycleAt: Date | null;
  lastCycleSequence: number | null;
  openBreakers: string[];
  emergencyStop: EmergencyStopRequest | null;
}

export interface AccountMetrics {
  accountId: string;
  label: string;
  equity: number;
  dailyPnl: number;
  openPositions: number;
  exposurePct: number;
  tradesToday: number;
  dayTradesToday: number;
  consecutiveLosses: number;
  breaker: "OPEN" | "CLOSED";
  sharpe: number;
  sortino: number;
  var95: number;
  maxDrawdown: number;
}

export interface MetricsReport {
  asOfSequence: number;
  publishedAt: Date;
  accounts: AccountMetrics[];
  cycles: { recorded: number; lastDurationMs: number | null; lastErrors: number };
}

export type Grade = "A" | "B" | "C" | "D" | "F";

export interface AccountReport {
  accountId: string;
  label: string;
  equity: number;
  dailyPnl: number;
  dailyPnlPct: number;
  totalExposure: number;
  exposurePct: number;
  positions: number;
  tradesToday: number;
  errors: number;
  breaker: "OPEN" | "CLOSED";
  grade: Grade;
}

export interface DailyReport {
  date: string;
  status: HealthStatus;
  uptimeHours: number;
  cyclesToday: number;
  backtestsToday: number;
  accounts: AccountReport[];
}

export interface EmergencyStopAck {
  acknowledged: true;
  /** False when a stop was already pending; the call changed nothing. */
  accepted: boolean;
  request: EmergencyStopRequest;
}

export interface BreakerResetAck {
  accountId: string;
  accepted: boolean;
  message: string;
}

export interface BreakerResetTarget {
  requestBreakerReset(accountId: string): boolean;
}

export interface ControlSurfaceDeps {
  config: AppConfig;
  snapshots: SnapshotStore;
  cycles: CycleBuffer;
  connectivity: ConnectivityTracker;
  emergency: EmergencyStopQueue;
  resets: BreakerResetTarget;
  candidates: CycleCandidateCache;
  startedAt: Date;
  now?: () => Date;
}

/**
 * Letter grade for one account's day: P&L percentage, activity and error
 * count, with an open breaker failing the day outright.
 */
export function gradeDay(pnlPct: number, trades: number, errors: number, halted: boolean): Grade {
  if (halted) return "F";
  if (pnlPct > 2 && trades >= 3 && errors === 0) return "A";
  if (pnlPct > 1 && trades >= 2 && errors <= 1) return "B";
  if (pnlPct > 0 && trades >= 1 && errors <= 2) return "C";
  if (pnlPct > -2 && errors <= 3) return "D";
  return "F";
}

export class ControlSurface {
  private readonly now: () => Date;

  constructor(private readonly deps: ControlSurfaceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  getHealth(): HealthReport {
    const snapshot = this.deps.snapshots.get();
    const adapters = this.deps.connectivity.snapshot();
    const emergency = this.deps.emergency.active();

    const connectivity: Record<AdapterName, boolean | null> = {
      broker: adapters.broker?.ok ?? null,
      market_data: adapters.market_data?.ok ?? null,
      persistence: adapters.persistence?.ok ?? null,
      notifier: adapters.notifier?.ok ?? null,
      calendar: adapters.calendar?.ok ?? null,
      candidates: adapters.candidates?.ok ?? null,
    };
    const openBreakers = snapshot.accounts.filter((a) => isOpen(a.risk.breaker)).map((a) => a.id);

    let status: HealthStatus;
    if (snapshot.state.phase === "STOPPED") {
      status = "STOPPED";
    } else if (emergency) {
      status = "EMERGENCY_STOP";
    } else if (snapshot.lastCycle === null) {
      status = "STARTING";
    } else if (Object.values(connectivity).includes(false) || openBreakers.length > 0) {
      status = "DEGRADED";
    } else {
      status = "OPERATIONAL";
    }

    return {
      status,
      uptimeSeconds: Math.floor((this.now().getTime() - this.deps.startedAt.getTime()) / 1000),
      scheduler: describeState(snapshot.state),
      mode: snapshot.mode,
      connectivity,
      adapters,
      lastCycleAt: snapshot.lastCycle?.finishedAt ?? null,
      lastCycleSequence: snapshot.lastCycle?.sequence ?? null,
      openBreakers,
      emergencyStop: emergency,
    };
  }

  getMetrics(): MetricsReport {
    // Buffer and snapshot are updated in the same synchronous step.
    const snapshot = this.deps.snapshots.get();
    const cycles = this.deps.cycles.all();
    const last = cycles.length > 0 ? cycles[cycles.length - 1] : null;

    return {
      asOfSequence: snapshot.sequence,
      publishedAt: snapshot.publishedAt,
      accounts: snapshot.accounts.map((account) => {
        const series: number[] = [];
        for (const cycle of cycles) {
          for (const outcome of cycle.accounts) {
            if (outcome.accountId === account.id && outcome.equity !== null) series.push(outcome.equity);
          }
        }
        const performance = summarizePerformance(series);
        return {
          accountId: account.id,
          label: account.label,
          equity: account.equity,
          dailyPnl: account.dailyPnl,
          openPositions: account.positions.length,
          exposurePct: account.exposurePct,
          tradesToday: account.risk.tradesToday,
          dayTradesToday: account.risk.dayTradesToday,
          consecutiveLosses: account.risk.consecutiveLosses,
          breaker: account.risk.breaker.status,
          sharpe: performance.sharpe,
          sortino: performance.sortino,
          var95: performance.var95,
          maxDrawdown: performance.maxDrawdown,
        };
      }),
      cycles: {
        recorded: cycles.length,
        lastDurationMs: last?.durationMs ?? null,
        lastErrors: last ? last.errors.length + last.accounts.reduce((n, a) => n + a.errors.length, 0) : 0,
      },
    };
  }

  /** Account views as of the last completed cycle. */
  listAccounts(): readonly AccountView[] {
    return this.deps.snapshots.get().accounts;
  }

  getConfig(): AppConfig {
    return this.deps.config;
  }

  listCandidates(): { candidates: readonly ScoredCandidate[]; refreshedAt: Date | null } {
    return this.deps.candidates.last();
  }

  triggerEmergencyStop(reason: string, actor: StopActor): EmergencyStopAck {
    const { accepted, request } = this.deps.emergency.request(reason, actor, this.now());
    return { acknowledged: true, accepted, request };
  }

  requestBreakerReset(accountId: string): BreakerResetAck {
    if (this.deps.emergency.active()) {
      return { accountId, accepted: false, message: "emergency stop in force" };
    }
    const accepted = this.deps.resets.requestBreakerReset(accountId);
    return {
      accountId,
      accepted,
      message: accepted ? "reset queued for the next cycle" : `unknown account ${accountId}`,
    };
  }

  getDailyReport(): DailyReport {
    const now = this.now();
    const today = sessionDateOf(now);
    const snapshot = this.deps.snapshots.get();
    const todays = this.deps.cycles.all().filter((c) => sessionDateOf(c.startedAt) === today);
    const status = this.getHealth().status;

    return {
      date: today,
      status,
      uptimeHours: (now.getTime() - this.deps.startedAt.getTime()) / 3_600_000,
      cyclesToday: todays.length,
      backtestsToday: todays.reduce((n, c) => n + c.backtests.length, 0),
      accounts: snapshot.accounts.map((account) => {
        let errors = 0;
        for (const cycle of todays) {
          for (const outcome of cycle.accounts) {
            if (outcome.accountId === account.id) errors += outcome.errors.length;
          }
        }
        return this.accountReport(account, errors);
      }),
    };
  }

  private accountReport(account: AccountView, errors: number): AccountReport {
    const startOfDay = account.equity - account.dailyPnl;
    const dailyPnlPct = startOfDay > 0 ? (account.dailyPnl / startOfDay) * 100 : 0;
    const halted = isOpen(account.risk.breaker);
    return {
      accountId: account.id,
      label: account.label,
      equity: account.equity,
      dailyPnl: account.dailyPnl,
      dailyPnlPct,
      totalExposure: account.exposure,
      exposurePct: account.exposurePct,
      positions: account.positions.length,
      tradesToday: account.risk.tradesToday,
      errors,
      breaker: account.risk.breaker.status,
      grade: gradeDay(dailyPnlPct, account.risk.tradesToday, errors, halted),
    };
  }
}
