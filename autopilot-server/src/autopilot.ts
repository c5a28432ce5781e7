/**
 * Wires configuration into live components. Everything is constructed
 * here and passed explicitly; there are no module-level singletons.
 */

import { CycleCandidateCache, FileCandidateSource, HttpCandidateSource } from "./adapters/candidates.js";
import { AlpacaBrokerAdapter } from "./adapters/alpaca-broker.js";
import { ConnectivityTracker } from "./adapters/connectivity.js";
import { GuardedCalls } from "./adapters/guarded.js";
import { LogNotifier, NotificationGate, SlackNotifier } from "./adapters/notifier.js";
import { BufferedPersistence, JsonlPersistenceSink } from "./adapters/persistence.js";
import type { CandidateSource, Notifier } from "./adapters/types.js";
import { ControlSurface } from "./control/surface.js";
import { AccountRegistry, buildAccountView } from "./core/account-registry.js";
import { CycleRunner } from "./core/cycle.js";
import { EmergencyStopQueue } from "./core/emergency.js";
import { ModeScheduler } from "./core/scheduler.js";
import { CycleBuffer, SnapshotStore } from "./core/snapshot.js";
import {
  AlpacaCalendarSource,
  RegularHoursCalendarSource,
  loadHolidayTable,
  type CalendarSource,
} from "./market/calendar.js";
import { CalendarSessionOracle } from "./market/session-oracle.js";
import { RiskEngine } from "./risk/engine.js";
import { ClosePriceBacktester } from "./strategy/backtester.js";
import { ScoreThresholdStrategy } from "./strategy/score-threshold.js";
import { createAlpacaClient, type AlpacaRestClient } from "./utils/alpaca-client.js";
import type { AlpacaCredentials, AppConfig, Env } from "./utils/config.js";
import { ConfigError } from "./utils/errors.js";
import { log } from "./utils/logger.js";
import { withRetry, withTimeout } from "./utils/retry.js";

export interface Autopilot {
  readonly scheduler: ModeScheduler;
  readonly surface: ControlSurface;
  readonly alerts: NotificationGate;
  readonly persistence: BufferedPersistence;
}

export function createAutopilot(
  config: AppConfig,
  credentials: ReadonlyMap<string, AlpacaCredentials>,
  env: Env = process.env
): Autopilot {
  const startedAt = new Date();
  const { scheduler: schedule } = config;

  const clients = new Map<string, AlpacaRestClient>();
  for (const account of config.accounts) {
    const creds = credentials.get(account.id);
    if (!creds) throw new ConfigError("missing credentials", `accounts.${account.id}`);
    clients.set(account.id, createAlpacaClient(account.id, creds));
  }
  const [firstAccount] = config.accounts;
  const dataClient = clients.get(firstAccount.id);
  if (!dataClient) throw new ConfigError("no account to read market data with", "accounts");

  const broker = new AlpacaBrokerAdapter(clients, dataClient);
  const connectivity = new ConnectivityTracker();
  const calls = new GuardedCalls(connectivity, { timeoutMs: schedule.adapterTimeoutMs, retry: schedule.retry });

  const calendarSource: CalendarSource =
    config.calendar.source === "alpaca"
      ? new AlpacaCalendarSource(dataClient)
      : new RegularHoursCalendarSource(loadHolidayTable());
  const oracle = new CalendarSessionOracle(
    {
      name: calendarSource.name,
      load: (from, to) =>
        withRetry(
          () => withTimeout(calendarSource.load(from, to), schedule.adapterTimeoutMs, "calendar", "calendar"),
          schedule.retry,
          "calendar",
          "calendar"
        ),
    },
    { lookaheadDays: config.calendar.lookaheadDays, recheckMs: schedule.boundaryRecheckMs }
  );

  const candidateSource: CandidateSource =
    config.candidates.source === "file"
      ? new FileCandidateSource(config.candidates.path)
      : new HttpCandidateSource(config.candidates.url, schedule.adapterTimeoutMs);
  const candidates = new CycleCandidateCache(candidateSource);

  const persistence = new BufferedPersistence(new JsonlPersistenceSink(config.persistence.directory), {
    maxBuffered: config.persistence.maxBufferedRecords,
    timeoutMs: schedule.adapterTimeoutMs,
    retry: schedule.retry,
    connectivity,
  });

  const webhook = env.SLACK_WEBHOOK_URL;
  const notifier: Notifier = webhook ? new SlackNotifier(webhook, schedule.adapterTimeoutMs) : new LogNotifier();
  const alerts = new NotificationGate(notifier, config.monitoring.notificationCooldownMs, undefined, connectivity);
  log(`Notifications via ${webhook ? "Slack" : "log"}, cooldown ${config.monitoring.notificationCooldownMs / 1000}s`);

  const registry = new AccountRegistry(config.accounts);
  const riskEngine = new RiskEngine(registry.ids());
  const limits = firstAccount.risk;

  const runner = new CycleRunner({
    broker,
    calls,
    candidates,
    strategy: new ScoreThresholdStrategy(config.strategy),
    backtester: new ClosePriceBacktester(
      (symbol, days) => calls.run("market_data", `bars ${symbol}`, () => broker.getDailyCloses(symbol, days)),
      {
        lookbackDays: config.backtest.lookbackDays,
        stopLossPct: limits.stopLossPct,
        takeProfitPct: limits.takeProfitPct,
      }
    ),
    riskEngine,
    registry,
    persistence,
    alerts,
    backtest: config.backtest,
    orderPrefix: `ap${startedAt.getTime().toString(36)}`,
  });

  const emergency = new EmergencyStopQueue();
  const snapshots = new SnapshotStore({
    sequence: 0,
    publishedAt: startedAt,
    state: { phase: "STARTING" },
    mode: null,
    accounts: registry.all().map((account) => buildAccountView(account, riskEngine.getState(account.id), 0)),
    lastCycle: null,
  });
  const cycles = new CycleBuffer(schedule.metricsBufferSize);

  const scheduler = new ModeScheduler({
    config: schedule,
    oracle,
    runner,
    registry,
    riskEngine,
    persistence,
    alerts,
    connectivity,
    emergency,
    snapshots,
    cycles,
    healthCheck: async () => {
      await calls.run("broker", "health check", () => broker.getAccountSnapshot(firstAccount.id));
    },
  });

  const surface = new ControlSurface({
    config,
    snapshots,
    cycles,
    connectivity,
    emergency,
    resets: scheduler,
    candidates,
    startedAt,
  });

  return { scheduler, surface, alerts, persistence };
}
