/**
 * Configuration: a JSON file validated once at startup, plus per-account
 * credentials from the environment. Unknown keys, wrong types and missing
 * credentials are fatal. The result is deep-frozen and handed to each
 * component explicitly.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const fraction = z.number().gt(0).max(1);

const accountSchema = z
  .object({
    id: z.string().regex(/^[A-Za-z0-9_-]+$/, "letters, digits, '-' and '_' only"),
    label: z.string().min(1).optional(),
    credentials_env: z.string().regex(/^[A-Z0-9_]+$/, "upper-case env suffix"),
    paper: z.boolean().optional(),
    starting_equity: z.number().positive(),
    max_position_size: fraction.default(0.15),
    aggressive_sizing_enabled: z.boolean().default(false),
    risk_multiplier: z.number().positive().max(3).default(1),
    daily_loss_limit: fraction.optional(),
  })
  .strict();

const tradingSchema = z
  .object({
    max_total_exposure: fraction.default(0.75),
    stop_loss_pct: fraction.default(0.05),
    take_profit_pct: fraction.default(0.1),
    max_day_trades: z.number().int().min(0).default(3),
    max_orders_per_cycle: z.number().int().positive().default(2),
  })
  .strict();

const riskManagementSchema = z
  .object({
    max_daily_loss: fraction.default(0.03),
    kelly_enabled: z.boolean().default(true),
    account_isolation: z.boolean().default(true),
  })
  .strict();

const emergencySchema = z
  .object({
    max_consecutive_losses: z.number().int().positive().default(5),
    daily_loss_limit: fraction.default(0.03),
    circuit_breaker_enabled: z.boolean().default(true),
    max_failed_cycles: z.number().int().positive().default(3),
    liquidate_on_emergency_stop: z.boolean().default(false),
  })
  .strict();

const schedulerSchema = z
  .object({
    trading_interval_minutes: z.number().positive().default(5),
    backtest_interval_minutes: z.number().positive().default(30),
    adapter_timeout_ms: z.number().int().positive().default(10_000),
    retry_attempts: z.number().int().min(1).max(10).default(3),
    retry_base_delay_ms: z.number().int().min(0).default(500),
    retry_max_delay_ms: z.number().int().min(0).default(8_000),
    metrics_buffer_size: z.number().int().positive().default(500),
    boundary_recheck_minutes: z.number().positive().default(60),
  })
  .strict();

const monitoringSchema = z
  .object({
    health_check_interval_seconds: z.number().positive().default(60),
    notification_cooldown_seconds: z.number().min(0).default(900),
    http_enabled: z.boolean().default(true),
    http_port: z.number().int().min(0).max(65535).default(8080),
    http_host: z.string().default("127.0.0.1"),
    mcp_stdio_enabled: z.boolean().default(false),
  })
  .strict();

const candidatesSchema = z.discriminatedUnion("source", [
  z.object({ source: z.literal("file"), path: z.string().min(1) }).strict(),
  z.object({ source: z.literal("http"), url: z.string().url() }).strict(),
]);

const strategySchema = z
  .object({
    min_score: z.number().default(70),
    min_confidence: z.number().default(8),
    exit_score: z.number().default(60),
    exit_confidence: z.number().default(6),
  })
  .strict();

const backtestSchema = z
  .object({
    strategies: z.array(z.enum(["momentum", "mean_reversion"])).default(["momentum", "mean_reversion"]),
    lookback_days: z.number().int().min(5).default(30),
    max_symbols: z.number().int().positive().default(5),
  })
  .strict();

const persistenceSchema = z
  .object({
    directory: z.string().min(1).default("logs/autopilot"),
    max_buffered_records: z.number().int().positive().default(5_000),
  })
  .strict();

const calendarSchema = z
  .object({
    source: z.enum(["alpaca", "regular_hours"]).default("alpaca"),
    lookahead_days: z.number().int().min(1).max(60).default(14),
  })
  .strict();

export const configFileSchema = z
  .object({
    accounts: z.array(accountSchema).min(1),
    trading: tradingSchema.default({}),
    risk_management: riskManagementSchema.default({}),
    emergency_conditions: emergencySchema.default({}),
    scheduler: schedulerSchema.default({}),
    monitoring: monitoringSchema.default({}),
    candidates: candidatesSchema,
    strategy: strategySchema.default({}),
    backtest: backtestSchema.default({}),
    persistence: persistenceSchema.default({}),
    market_calendar: calendarSchema.default({}),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Risk limits resolved for one account; globals merged with per-account overrides. */
export interface AccountRiskConfig {
  readonly maxPositionSize: number;
  readonly maxTotalExposure: number;
  readonly stopLossPct: number;
  readonly takeProfitPct: number;
  readonly maxDayTrades: number;
  readonly maxOrdersPerCycle: number;
  readonly dailyLossLimit: number;
  readonly maxDailyLoss: number;
  readonly riskMultiplier: number;
  readonly aggressiveSizingEnabled: boolean;
  readonly kellyEnabled: boolean;
  readonly maxConsecutiveLosses: number;
  readonly circuitBreakerEnabled: boolean;
  readonly maxFailedCycles: number;
}

export interface AccountConfig {
  readonly id: string;
  readonly label: string;
  readonly credentialsEnv: string;
  readonly paper: boolean;
  readonly startingEquity: number;
  readonly risk: AccountRiskConfig;
}

export interface SchedulerConfig {
  readonly tradingIntervalMs: number;
  readonly backtestIntervalMs: number;
  readonly adapterTimeoutMs: number;
  readonly retry: { readonly attempts: number; readonly baseDelayMs: number; readonly maxDelayMs: number };
  readonly metricsBufferSize: number;
  readonly boundaryRecheckMs: number;
  readonly healthCheckIntervalMs: number;
  readonly liquidateOnEmergencyStop: boolean;
  readonly accountIsolation: boolean;
  readonly maxDailyLoss: number;
}

export interface AppConfig {
  readonly accounts: readonly AccountConfig[];
  readonly scheduler: SchedulerConfig;
  readonly monitoring: {
    readonly notificationCooldownMs: number;
    readonly httpEnabled: boolean;
    readonly httpPort: number;
    readonly httpHost: string;
    readonly mcpStdioEnabled: boolean;
  };
  readonly candidates: { readonly source: "file"; readonly path: string } | { readonly source: "http"; readonly url: string };
  readonly strategy: {
    readonly minScore: number;
    readonly minConfidence: number;
    readonly exitScore: number;
    readonly exitConfidence: number;
  };
  readonly backtest: {
    readonly strategies: readonly ("momentum" | "mean_reversion")[];
    readonly lookbackDays: number;
    readonly maxSymbols: number;
  };
  readonly persistence: { readonly directory: string; readonly maxBufferedRecords: number };
  readonly calendar: { readonly source: "alpaca" | "regular_hours"; readonly lookaheadDays: number };
}

export interface AlpacaCredentials {
  readonly keyId: string;
  readonly secretKey: string;
  readonly paper: boolean;
}

export type Env = Readonly<Record<string, string | undefined>>;

export function isPaperTrading(env: Env = process.env): boolean {
  return (env.PAPER_TRADING || "true").toLowerCase() === "true";
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Validate a parsed config document and resolve it into AppConfig.
 */
export function parseConfig(raw: unknown, env: Env = process.env): AppConfig {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConfigError(issue.message, path);
  }
  const file = result.data;

  const ids = new Set<string>();
  for (const account of file.accounts) {
    if (ids.has(account.id)) {
      throw new ConfigError(`duplicate account id "${account.id}"`, "accounts");
    }
    ids.add(account.id);
  }

  const defaultPaper = isPaperTrading(env);
  const accounts: AccountConfig[] = file.accounts.map((account) => ({
    id: account.id,
    label: account.label ?? account.id,
    credentialsEnv: account.credentials_env,
    paper: account.paper ?? defaultPaper,
    startingEquity: account.starting_equity,
    risk: {
      maxPositionSize: account.max_position_size,
      maxTotalExposure: file.trading.max_total_exposure,
      stopLossPct: file.trading.stop_loss_pct,
      takeProfitPct: file.trading.take_profit_pct,
      maxDayTrades: file.trading.max_day_trades,
      maxOrdersPerCycle: file.trading.max_orders_per_cycle,
      dailyLossLimit: account.daily_loss_limit ?? file.emergency_conditions.daily_loss_limit,
      maxDailyLoss: file.risk_management.max_daily_loss,
      riskMultiplier: account.risk_multiplier,
      aggressiveSizingEnabled: account.aggressive_sizing_enabled,
      kellyEnabled: file.risk_management.kelly_enabled,
      maxConsecutiveLosses: file.emergency_conditions.max_consecutive_losses,
      circuitBreakerEnabled: file.emergency_conditions.circuit_breaker_enabled,
      maxFailedCycles: file.emergency_conditions.max_failed_cycles,
    },
  }));

  const config: AppConfig = {
    accounts,
    scheduler: {
      tradingIntervalMs: file.scheduler.trading_interval_minutes * 60_000,
      backtestIntervalMs: file.scheduler.backtest_interval_minutes * 60_000,
      adapterTimeoutMs: file.scheduler.adapter_timeout_ms,
      retry: {
        attempts: file.scheduler.retry_attempts,
        baseDelayMs: file.scheduler.retry_base_delay_ms,
        maxDelayMs: file.scheduler.retry_max_delay_ms,
      },
      metricsBufferSize: file.scheduler.metrics_buffer_size,
      boundaryRecheckMs: file.scheduler.boundary_recheck_minutes * 60_000,
      healthCheckIntervalMs: file.monitoring.health_check_interval_seconds * 1000,
      liquidateOnEmergencyStop: file.emergency_conditions.liquidate_on_emergency_stop,
      accountIsolation: file.risk_management.account_isolation,
      maxDailyLoss: file.risk_management.max_daily_loss,
    },
    monitoring: {
      notificationCooldownMs: file.monitoring.notification_cooldown_seconds * 1000,
      httpEnabled: file.monitoring.http_enabled,
      httpPort: file.monitoring.http_port,
      httpHost: file.monitoring.http_host,
      mcpStdioEnabled: file.monitoring.mcp_stdio_enabled,
    },
    candidates: file.candidates,
    strategy: {
      minScore: file.strategy.min_score,
      minConfidence: file.strategy.min_confidence,
      exitScore: file.strategy.exit_score,
      exitConfidence: file.strategy.exit_confidence,
    },
    backtest: {
      strategies: file.backtest.strategies,
      lookbackDays: file.backtest.lookback_days,
      maxSymbols: file.backtest.max_symbols,
    },
    persistence: {
      directory: file.persistence.directory,
      maxBufferedRecords: file.persistence.max_buffered_records,
    },
    calendar: {
      source: file.market_calendar.source,
      lookaheadDays: file.market_calendar.lookahead_days,
    },
  };

  return deepFreeze(config);
}

/**
 * Resolve Alpaca credentials for every configured account. A missing key is
 * fatal: the process must not start with an account it cannot manage.
 */
export function resolveCredentials(
  config: AppConfig,
  env: Env = process.env
): ReadonlyMap<string, AlpacaCredentials> {
  const credentials = new Map<string, AlpacaCredentials>();
  for (const account of config.accounts) {
    const keyVar = `ALPACA_API_KEY_ID_${account.credentialsEnv}`;
    const secretVar = `ALPACA_API_SECRET_KEY_${account.credentialsEnv}`;
    const keyId = env[keyVar];
    const secretKey = env[secretVar];
    if (!keyId || !secretKey) {
      throw new ConfigError(
        `${keyVar} and ${secretVar} must be set`,
        `accounts.${account.id}`
      );
    }
    credentials.set(account.id, { keyId, secretKey, paper: account.paper });
  }
  return credentials;
}

export function loadConfig(path: string, env: Env = process.env): AppConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigError(
      `cannot read config file: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }

  return parseConfig(raw, env);
}
