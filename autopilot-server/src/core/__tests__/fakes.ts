import { CycleCandidateCache } from "../../adapters/candidates.js";
import { ConnectivityTracker } from "../../adapters/connectivity.js";
import { GuardedCalls } from "../../adapters/guarded.js";
import { NotificationGate } from "../../adapters/notifier.js";
import type {
  AccountSnapshot,
  BreakerEvent,
  BrokerAdapter,
  BrokerPosition,
  CandidateSource,
  Notifier,
  OrderAck,
  OrderRequest,
  PersistenceAdapter,
  Severity,
} from "../../adapters/types.js";
import { ControlSurface } from "../../control/surface.js";
import type { RefreshableOracle } from "../../market/session-oracle.js";
import { RiskEngine } from "../../risk/engine.js";
import type { Backtester, BacktestStrategyName, Strategy, StrategyContext } from "../../strategy/types.js";
import type { CandidateAction } from "../../risk/types.js";
import { parseConfig, type AccountRiskConfig, type AppConfig } from "../../utils/config.js";
import { AccountRegistry, buildAccountView } from "../account-registry.js";
import { CycleRunner } from "../cycle.js";
import { EmergencyStopQueue } from "../emergency.js";
import { ModeScheduler } from "../scheduler.js";
import { CycleBuffer, SnapshotStore } from "../snapshot.js";
import type { TickScheduler } from "../ticker.js";
import type { Account, BacktestSummary, CycleResult, OrderRecord, ScoredCandidate } from "../types.js";

/** Tuesday 2026-03-10, 11:00 in New York. */
export const TRADING_NOON = new Date("2026-03-10T15:00:00Z");

export function riskConfig(overrides: Partial<AccountRiskConfig> = {}): AccountRiskConfig {
  return {
    maxPositionSize: 0.15,
    maxTotalExposure: 0.75,
    stopLossPct: 0.05,
    takeProfitPct: 0.1,
    maxDayTrades: 3,
    maxOrdersPerCycle: 2,
    dailyLossLimit: 0.03,
    maxDailyLoss: 0.03,
    riskMultiplier: 1,
    aggressiveSizingEnabled: false,
    kellyEnabled: false,
    maxConsecutiveLosses: 5,
    circuitBreakerEnabled: true,
    maxFailedCycles: 3,
    ...overrides,
  };
}

export function makeAccount(overrides: Partial<Account> = {}): Account {
  return {
    id: "ACC1",
    label: "Account 1",
    startingEquity: 30_000,
    equity: 30_000,
    cash: 30_000,
    positions: new Map(),
    risk: riskConfig(),
    lastRefreshedAt: null,
    ...overrides,
  };
}

export class ManualClock {
  private t: number;

  constructor(start: Date = TRADING_NOON) {
    this.t = start.getTime();
  }

  now = (): Date => new Date(this.t);

  advance(ms: number): void {
    this.t += ms;
  }
}

/** Cron tasks that only fire when the test says so. */
export class ManualTicks {
  readonly tasks: { expression: string; onTick: () => void; stopped: boolean }[] = [];

  schedule: TickScheduler = (expression, onTick) => {
    const task = { expression, onTick, stopped: false };
    this.tasks.push(task);
    return {
      stop: () => {
        task.stopped = true;
      },
    };
  };

  fire(index: number): void {
    const task = this.tasks[index];
    if (task && !task.stopped) task.onTick();
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

interface FakeAccountState {
  snapshot: AccountSnapshot;
  positions: BrokerPosition[];
}

export class FakeBroker implements BrokerAdapter {
  readonly accounts = new Map<string, FakeAccountState>();
  readonly prices = new Map<string, number>();
  readonly orders: { accountId: string; order: OrderRequest }[] = [];
  readonly cancelled: string[] = [];
  /** Accounts whose reads never answer. */
  readonly hanging = new Set<string>();
  /** Resolves before getPositions answers, when set. */
  gate: Promise<void> | null = null;
  ackStatus: OrderAck["status"] = "filled";
  private nextId = 0;

  setAccount(accountId: string, equity: number, positions: BrokerPosition[] = []): void {
    this.accounts.set(accountId, {
      snapshot: { equity, cash: equity, buyingPower: equity, status: "ACTIVE" },
      positions,
    });
  }

  async getAccountSnapshot(accountId: string): Promise<AccountSnapshot> {
    if (this.hanging.has(accountId)) return new Promise<AccountSnapshot>(() => undefined);
    return this.stateFor(accountId).snapshot;
  }

  async getPositions(accountId: string): Promise<BrokerPosition[]> {
    if (this.hanging.has(accountId)) return new Promise<BrokerPosition[]>(() => undefined);
    if (this.gate) await this.gate;
    return this.stateFor(accountId).positions.map((p) => ({ ...p }));
  }

  async getPrices(symbols: readonly string[]): Promise<Map<string, number>> {
    const found = new Map<string, number>();
    for (const symbol of symbols) {
      const price = this.prices.get(symbol);
      if (price !== undefined) found.set(symbol, price);
    }
    return found;
  }

  async submitOrder(accountId: string, order: OrderRequest): Promise<OrderAck> {
    this.orders.push({ accountId, order });
    const price = this.prices.get(order.symbol) ?? 0;
    const filled = this.ackStatus === "filled";
    return {
      orderId: `order-${++this.nextId}`,
      status: this.ackStatus,
      filledQuantity: filled ? order.quantity : 0,
      filledAvgPrice: filled ? price : null,
    };
  }

  async cancelOrder(_accountId: string, orderId: string): Promise<void> {
    this.cancelled.push(orderId);
  }

  async getDailyCloses(): Promise<number[]> {
    return [];
  }

  private stateFor(accountId: string): FakeAccountState {
    const state = this.accounts.get(accountId);
    if (!state) throw new Error(`no fake account ${accountId}`);
    return state;
  }
}

export class MemoryPersistence implements PersistenceAdapter {
  readonly cycles: CycleResult[] = [];
  readonly orders: OrderRecord[] = [];
  readonly breakerEvents: BreakerEvent[] = [];
  readonly backtests: BacktestSummary[] = [];
  flushes = 0;

  recordCycle(result: CycleResult): void {
    this.cycles.push(result);
  }

  recordOrder(order: OrderRecord): void {
    this.orders.push(order);
  }

  recordCircuitBreakerEvent(event: BreakerEvent): void {
    this.breakerEvents.push(event);
  }

  recordBacktest(_sequence: number, summary: BacktestSummary): void {
    this.backtests.push(summary);
  }

  async flush(): Promise<void> {
    this.flushes++;
  }

  pending(): number {
    return 0;
  }
}

export class RecordingNotifier implements Notifier {
  readonly sent: { severity: Severity; message: string }[] = [];

  async notify(severity: Severity, message: string): Promise<void> {
    this.sent.push({ severity, message });
  }
}

export class FakeOracle implements RefreshableOracle {
  open = true;

  needsRefresh(): boolean {
    return false;
  }

  async refresh(): Promise<void> {}

  isMarketOpen(): boolean {
    return this.open;
  }

  nextBoundary(now: Date): Date {
    return new Date(now.getTime() + 60 * 60_000);
  }
}

export class StaticCandidates implements CandidateSource {
  loads = 0;

  constructor(public list: ScoredCandidate[] = []) {}

  async getQualifiedCandidates(): Promise<ScoredCandidate[]> {
    this.loads++;
    return [...this.list];
  }
}

/** Emits whatever actions the test queues for an account. */
export class ScriptedStrategy implements Strategy {
  readonly name = "scripted";
  readonly queued = new Map<string, CandidateAction[]>();

  evaluate(context: StrategyContext): CandidateAction[] {
    const actions = this.queued.get(context.accountId) ?? [];
    this.queued.delete(context.accountId);
    return actions;
  }
}

export class FakeBacktester implements Backtester {
  readonly runs: { strategy: BacktestStrategyName; symbols: readonly string[] }[] = [];

  async run(strategy: BacktestStrategyName, symbols: readonly string[]): Promise<BacktestSummary> {
    this.runs.push({ strategy, symbols });
    return { strategy, symbols: [...symbols], totalReturnPct: strategy === "momentum" ? 6 : 1, trades: 2, winRate: 0.5, sharpe: 1 };
  }
}

export interface ConfigSections {
  trading?: Record<string, unknown>;
  risk_management?: Record<string, unknown>;
  emergency_conditions?: Record<string, unknown>;
}

export function testConfig(accountIds: readonly string[] = ["ACC1", "ACC2"], sections: ConfigSections = {}): AppConfig {
  return parseConfig(
    {
      accounts: accountIds.map((id) => ({
        id,
        credentials_env: id.toUpperCase(),
        starting_equity: 30_000,
      })),
      candidates: { source: "file", path: "unused.json" },
      trading: sections.trading ?? {},
      risk_management: { kelly_enabled: false, ...sections.risk_management },
      emergency_conditions: sections.emergency_conditions ?? {},
      scheduler: { adapter_timeout_ms: 20, retry_attempts: 2, retry_base_delay_ms: 0, retry_max_delay_ms: 0 },
    },
    { PAPER_TRADING: "true" }
  );
}

export interface Harness {
  config: AppConfig;
  clock: ManualClock;
  ticks: ManualTicks;
  healthChecks: { count: number };
  broker: FakeBroker;
  oracle: FakeOracle;
  candidates: StaticCandidates;
  strategy: ScriptedStrategy;
  backtester: FakeBacktester;
  persistence: MemoryPersistence;
  notifier: RecordingNotifier;
  connectivity: ConnectivityTracker;
  registry: AccountRegistry;
  riskEngine: RiskEngine;
  emergency: EmergencyStopQueue;
  snapshots: SnapshotStore;
  cycles: CycleBuffer;
  scheduler: ModeScheduler;
  surface: ControlSurface;
}

export function buildHarness(config: AppConfig = testConfig()): Harness {
  const clock = new ManualClock();
  const ticks = new ManualTicks();
  const healthChecks = { count: 0 };
  const broker = new FakeBroker();
  for (const account of config.accounts) broker.setAccount(account.id, account.startingEquity);

  const oracle = new FakeOracle();
  const candidates = new StaticCandidates();
  const strategy = new ScriptedStrategy();
  const backtester = new FakeBacktester();
  const persistence = new MemoryPersistence();
  const notifier = new RecordingNotifier();
  const connectivity = new ConnectivityTracker(clock.now);
  const calls = new GuardedCalls(connectivity, {
    timeoutMs: config.scheduler.adapterTimeoutMs,
    retry: config.scheduler.retry,
    wait: async () => undefined,
  });
  const alerts = new NotificationGate(notifier, config.monitoring.notificationCooldownMs, clock.now, connectivity);
  const registry = new AccountRegistry(config.accounts);
  const riskEngine = new RiskEngine(registry.ids());
  const cache = new CycleCandidateCache(candidates);

  const runner = new CycleRunner({
    broker,
    calls,
    candidates: cache,
    strategy,
    backtester,
    riskEngine,
    registry,
    persistence,
    alerts,
    backtest: config.backtest,
    orderPrefix: "test",
    now: clock.now,
  });

  const emergency = new EmergencyStopQueue();
  const snapshots = new SnapshotStore({
    sequence: 0,
    publishedAt: clock.now(),
    state: { phase: "STARTING" },
    mode: null,
    accounts: registry.all().map((a) => buildAccountView(a, riskEngine.getState(a.id), 0)),
    lastCycle: null,
  });
  const cycles = new CycleBuffer(config.scheduler.metricsBufferSize);

  const scheduler = new ModeScheduler({
    config: config.scheduler,
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
    now: clock.now,
    ticks: ticks.schedule,
    healthCheck: async () => {
      healthChecks.count++;
    },
  });

  const surface = new ControlSurface({
    config,
    snapshots,
    cycles,
    connectivity,
    emergency,
    resets: scheduler,
    candidates: cache,
    startedAt: clock.now(),
    now: clock.now,
  });

  return {
    config,
    clock,
    ticks,
    healthChecks,
    broker,
    oracle,
    candidates,
    strategy,
    backtester,
    persistence,
    notifier,
    connectivity,
    registry,
    riskEngine,
    emergency,
    snapshots,
    cycles,
    scheduler,
    surface,
  };
}
