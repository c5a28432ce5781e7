/**
 * Mode Scheduler: the control loop that owns process lifetime.
 *
 * Each cycle starts with a boundary check: TRADING while the market is
 * open, BACKTESTING otherwise. Cycles are strictly sequential; a mode
 * switch only takes effect at the start of the next cycle. Between cycles
 * two cron tasks tick: one starts the next cycle once it is due, the other
 * runs the connectivity health check. Account, Position
 * and RiskState are mutated only from inside a cycle, and the control
 * surface reads the snapshot published once the cycle has been recorded.
 */

import type { ConnectivityTracker } from "../adapters/connectivity.js";
import type { NotificationGate } from "../adapters/notifier.js";
import type { PersistenceAdapter } from "../adapters/types.js";
import type { RefreshableOracle } from "../market/session-oracle.js";
import { sessionDateOf } from "../market/timezone.js";
import type { RiskEngine } from "../risk/engine.js";
import type { BreakerTrip } from "../risk/types.js";
import type { SchedulerConfig } from "../utils/config.js";
import { describeError, log, logError, logWarn } from "../utils/logger.js";
import { buildAccountView, type AccountRegistry } from "./account-registry.js";
import type { CycleRunner, StepContext } from "./cycle.js";
import type { EmergencyStopQueue } from "./emergency.js";
import type { CycleBuffer, SnapshotStore } from "./snapshot.js";
import { describeState, isRunning, transition, type SchedulerState } from "./state.js";
import { cronTicks, everyExpression, type TickScheduler, type TickTask } from "./ticker.js";
import type { Account, AccountCycleOutcome, AccountView, CycleResult, EmergencyStopRequest, Mode } from "./types.js";

export interface SchedulerDeps {
  config: SchedulerConfig;
  oracle: RefreshableOracle;
  runner: CycleRunner;
  registry: AccountRegistry;
  riskEngine: RiskEngine;
  persistence: PersistenceAdapter;
  alerts: NotificationGate;
  connectivity: ConnectivityTracker;
  emergency: EmergencyStopQueue;
  snapshots: SnapshotStore;
  cycles: CycleBuffer;
  /** Connectivity check run on the health tick while idle. */
  healthCheck?: () => Promise<void>;
  now?: () => Date;
  ticks?: TickScheduler;
}

export class ModeScheduler {
  private state: SchedulerState = { phase: "STARTING" };
  private sequence = 0;
  private sessionDate: string | null = null;
  private shutdownReason: string | null = null;
  private tasks: TickTask[] = [];
  private inCycle: Promise<void> | null = null;
  private checking: Promise<void> | null = null;
  private nextCycleAt: number | null = null;
  private onStopped: (() => void) | null = null;
  private flushing: Promise<void> = Promise.resolve();
  private readonly resetRequests = new Set<string>();
  private readonly now: () => Date;
  private readonly ticks: TickScheduler;

  constructor(private readonly deps: SchedulerDeps) {
    this.now = deps.now ?? (() => new Date());
    this.ticks = deps.ticks ?? cronTicks;

    deps.riskEngine.onTrip((trip) => this.onTrip(trip));
    deps.emergency.onRequest((request) => this.onEmergencyRequest(request));
  }

  getState(): SchedulerState {
    return this.state;
  }

  /** Run cycles until stopped. Resolves with the final state; never rejects on a cycle error. */
  async run(): Promise<SchedulerState> {
    log("Scheduler started");
    await this.cycle();
    if (isRunning(this.state)) {
      await new Promise<void>((resolve) => {
        this.onStopped = resolve;
        this.startTicks();
      });
    }
    log(`Scheduler exited: ${describeState(this.state)}`);
    return this.state;
  }

  /** One boundary check and one cycle. Returns null when the scheduler is stopping or stopped. */
  async runOnce(): Promise<CycleResult | null> {
    if (await this.handleStop()) return null;

    const startedAt = this.now();
    const sequence = ++this.sequence;
    const errors: string[] = [];

    const calendarError = await this.refreshCalendar(startedAt);
    if (calendarError) errors.push(calendarError);

    const mode: Mode = this.deps.oracle.isMarketOpen(startedAt) ? "TRADING" : "BACKTESTING";
    this.enterMode(mode);
    this.applyResetRequests(startedAt);

    let accounts: AccountCycleOutcome[] = [];
    let backtests: CycleResult["backtests"] = [];
    if (mode === "TRADING") {
      accounts = await this.tradingCycle(sequence, startedAt);
    } else {
      const pass = await this.deps.runner.runBacktests(sequence, () => this.stopPending());
      backtests = pass.summaries;
      errors.push(...pass.errors);
    }

    const finishedAt = this.now();
    const result: CycleResult = {
      sequence,
      mode,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      accounts,
      backtests,
      errors,
      cancelled: this.stopPending(),
    };
    this.record(result);
    log(
      `Cycle ${sequence} ${mode} finished in ${result.durationMs}ms` +
        (errors.length > 0 ? ` with ${errors.length} error(s)` : "")
    );

    await this.handleStop();
    return result;
  }

  /**
   * Graceful shutdown: halt every account now, stop after the in-flight
   * cycle. Does not cancel orders or liquidate.
   */
  requestShutdown(reason: string): void {
    if (this.shutdownReason !== null) return;
    this.shutdownReason = reason;
    log(`Shutdown requested: ${reason}`);
    this.deps.riskEngine.haltAll(`Shutdown: ${reason}`, this.now());
    this.wakeUp();
  }

  /** Queue a manual breaker reset, applied at the start of the next cycle. */
  requestBreakerReset(accountId: string): boolean {
    if (!this.deps.registry.has(accountId)) return false;
    this.resetRequests.add(accountId);
    log(`[${accountId}] Manual circuit breaker reset queued`);
    return true;
  }

  pendingResets(): string[] {
    return [...this.resetRequests];
  }

  private async tradingCycle(sequence: number, startedAt: Date): Promise<AccountCycleOutcome[]> {
    const { riskEngine, registry, runner, config } = this.deps;
    const sessionDate = sessionDateOf(startedAt);
    if (this.sessionDate !== sessionDate) {
      for (const accountId of riskEngine.resetSession(sessionDate)) {
        this.deps.persistence.recordCircuitBreakerEvent({
          type: "reset",
          accountId,
          reason: `new session ${sessionDate}`,
          at: startedAt,
        });
      }
      runner.startSession();
      this.sessionDate = sessionDate;
    }

    const accounts = registry.all();
    const ctx: StepContext = { sequence, sessionDate, isCancelled: () => this.stopPending() };
    const outcomes = await Promise.all(accounts.map((account) => this.accountStep(account, ctx)));

    const now = this.now();
    for (const [i, account] of accounts.entries()) {
      riskEngine.recordCycleOutcome(account, outcomes[i].failed, now);
    }
    if (!config.accountIsolation) {
      riskEngine.evaluatePortfolio(accounts, config.maxDailyLoss, now);
    }
    return outcomes;
  }

  private async accountStep(account: Account, ctx: StepContext): Promise<AccountCycleOutcome> {
    try {
      return await this.deps.runner.tradeAccount(account, ctx);
    } catch (error) {
      logError(`[${account.id}] Account step failed`, error);
      return {
        accountId: account.id,
        ordersAttempted: 0,
        ordersFilled: 0,
        ordersSubmitted: 0,
        ordersRejected: 0,
        errors: [describeError(error)],
        skipped: null,
        failed: true,
        equity: null,
      };
    }
  }

  private async refreshCalendar(now: Date): Promise<string | null> {
    const { oracle, connectivity } = this.deps;
    if (!oracle.needsRefresh(now)) return null;
    try {
      await connectivity.track("calendar", () => oracle.refresh(now));
      return null;
    } catch (error) {
      return `calendar: ${describeError(error)}`;
    }
  }

  private enterMode(mode: Mode): void {
    const previous = this.state.phase === "RUNNING" ? this.state.mode : null;
    if (previous === mode) return;
    this.state = transition(this.state, { type: "enter", mode });
    log(previous ? `Mode switch: ${previous} -> ${mode}` : `Entering ${mode} mode`);
  }

  private applyResetRequests(at: Date): void {
    for (const accountId of this.resetRequests) {
      if (this.deps.riskEngine.manualReset(accountId)) {
        this.deps.persistence.recordCircuitBreakerEvent({ type: "reset", accountId, reason: "manual override", at });
        this.deps.alerts.send(`breaker-reset:${accountId}`, "info", `Circuit breaker reset [${accountId}] by operator`);
      }
    }
    this.resetRequests.clear();
  }

  private record(result: CycleResult): void {
    this.deps.cycles.push(result);
    this.deps.persistence.recordCycle(result);
    this.flushing = this.deps.persistence.flush();
    this.publish(result);
  }

  private publish(lastCycle: CycleResult | null): void {
    const previous = this.deps.snapshots.get();
    this.deps.snapshots.publish({
      sequence: lastCycle?.sequence ?? previous.sequence,
      publishedAt: this.now(),
      state: this.state,
      mode: this.state.phase === "RUNNING" ? this.state.mode : previous.mode,
      accounts: this.accountViews(),
      lastCycle: lastCycle ?? previous.lastCycle,
    });
  }

  private accountViews(): AccountView[] {
    const { registry, riskEngine } = this.deps;
    return registry.all().map((account) => {
      const startOfDay = riskEngine.startOfDayEquity(account.id);
      return buildAccountView(
        account,
        riskEngine.getState(account.id),
        startOfDay === null ? 0 : account.equity - startOfDay
      );
    });
  }

  /** Returns true when the scheduler is no longer running. */
  private async handleStop(): Promise<boolean> {
    const request = this.deps.emergency.take();
    if (request && isRunning(this.state)) {
      await this.emergencyStop(request);
    } else if (this.shutdownReason !== null && isRunning(this.state)) {
      this.setState(transition(this.state, { type: "stop", reason: this.shutdownReason }));
      await this.finish();
    }
    return !isRunning(this.state);
  }

  private async emergencyStop(request: EmergencyStopRequest): Promise<void> {
    this.setState(transition(this.state, { type: "stop", reason: `emergency stop: ${request.reason}` }));
    this.deps.riskEngine.haltAll(`Emergency stop: ${request.reason}`, this.now());
    this.deps.alerts.send(
      "emergency-stop",
      "critical",
      `EMERGENCY STOP\nReason: ${request.reason}\nActor: ${request.actor}`
    );

    const cancelled = await this.deps.runner.cancelOpenOrders();
    if (cancelled > 0) log(`Cancelled ${cancelled} open order(s)`);

    if (this.deps.config.liquidateOnEmergencyStop) {
      for (const account of this.deps.registry.all()) {
        const errors = await this.deps.runner.liquidate(account, this.sequence);
        for (const error of errors) logWarn(`[${account.id}] ${error}`);
      }
    }
    await this.finish();
  }

  private async finish(): Promise<void> {
    await this.flushing;
    await this.deps.persistence.flush();
    const pending = this.deps.persistence.pending();
    if (pending > 0) logWarn(`${pending} audit record(s) could not be persisted before stop`);
    await this.deps.alerts.drain();
    this.setState(transition(this.state, { type: "stopped" }));
  }

  private setState(next: SchedulerState): void {
    this.state = next;
    log(`Scheduler ${describeState(next)}`);
    this.publish(null);
  }

  private startTicks(): void {
    const { config } = this.deps;
    const cycleEvery = Math.min(config.tradingIntervalMs, config.backtestIntervalMs, 60_000);
    this.tasks = [
      this.ticks(everyExpression(cycleEvery), () => this.tick()),
      this.ticks(everyExpression(config.healthCheckIntervalMs), () => this.healthTick()),
    ];
    if (this.stopPending()) this.tick();
  }

  private stopTicks(): void {
    for (const task of this.tasks) task.stop();
    this.tasks = [];
    const stopped = this.onStopped;
    this.onStopped = null;
    stopped?.();
  }

  /** Starts the next cycle when one is due or a stop is waiting to be handled. */
  private tick(): void {
    if (this.inCycle !== null) return;
    if (!this.stopPending() && !this.cycleDue()) return;
    this.inCycle = this.cycle().finally(() => {
      this.inCycle = null;
      if (!isRunning(this.state)) {
        this.stopTicks();
      } else if (this.stopPending()) {
        this.tick();
      }
    });
  }

  private cycleDue(): boolean {
    return this.nextCycleAt === null || this.now().getTime() >= this.nextCycleAt;
  }

  private async cycle(): Promise<void> {
    try {
      const result = await this.runOnce();
      if (result) this.planNext(result);
    } catch (error) {
      logError("Cycle failed", error);
    }
  }

  private planNext(result: CycleResult): void {
    const { config, oracle } = this.deps;
    const interval = result.mode === "TRADING" ? config.tradingIntervalMs : config.backtestIntervalMs;
    this.nextCycleAt = Math.min(
      result.startedAt.getTime() + interval,
      oracle.nextBoundary(result.finishedAt).getTime()
    );
  }

  private healthTick(): void {
    const { healthCheck } = this.deps;
    if (!healthCheck || this.checking !== null || this.inCycle !== null) return;
    if (!isRunning(this.state) || this.stopPending()) return;
    this.checking = healthCheck()
      .catch((error: unknown) => logWarn(`Health check failed: ${describeError(error)}`))
      .finally(() => {
        this.checking = null;
      });
  }

  private onTrip(trip: BreakerTrip): void {
    this.deps.persistence.recordCircuitBreakerEvent({ type: "trip", ...trip });
    // Emergency halts are announced once by the stop itself.
    if (trip.cause === "emergency_stop") return;
    this.deps.alerts.send(
      `breaker:${trip.accountId}`,
      "critical",
      `CIRCUIT BREAKER [${trip.accountId}]\nCause: ${trip.cause}\n${trip.reason}`
    );
  }

  private onEmergencyRequest(request: EmergencyStopRequest): void {
    this.deps.riskEngine.haltAll(`Emergency stop: ${request.reason}`, request.requestedAt);
    this.wakeUp();
  }

  private stopPending(): boolean {
    return this.deps.emergency.active() !== null || this.shutdownReason !== null;
  }

  private wakeUp(): void {
    if (this.tasks.length > 0) this.tick();
  }
}
