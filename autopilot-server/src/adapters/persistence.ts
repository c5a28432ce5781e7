/**
 * Audit persistence. Records are queued synchronously so the order path
 * never waits on storage; flush() writes them in batches with bounded
 * retries. A record leaves the queue only once the sink acknowledges it, so
 * a retry writes only what is still unacknowledged.
 */

import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import type { BacktestSummary, CycleResult, OrderRecord } from "../core/types.js";
import { sessionDateOf } from "../market/timezone.js";
import { AdapterError, AdapterErrorCode } from "../utils/errors.js";
import { logError, logWarn } from "../utils/logger.js";
import { withRetry, withTimeout, type RetryPolicy, type Sleep, sleep } from "../utils/retry.js";
import type { ConnectivityTracker } from "./connectivity.js";
import type { BreakerEvent, PersistenceAdapter } from "./types.js";

export type RecordKind = "cycle" | "order" | "circuit_breaker" | "backtest";

export interface PersistedRecord {
  readonly kind: RecordKind;
  readonly at: Date;
  readonly payload: unknown;
}

export type WriteAcknowledger = (written: readonly PersistedRecord[]) => void;

export interface PersistenceSink {
  /** Calls `onWritten` for each part of `records` as soon as it is durable. */
  write(records: readonly PersistedRecord[], onWritten: WriteAcknowledger): Promise<void>;
}

/**
 * One JSON object per line, one file per record kind per session date.
 */
export class JsonlPersistenceSink implements PersistenceSink {
  private ready: Promise<string | undefined> | null = null;

  constructor(private readonly directory: string) {}

  async write(records: readonly PersistedRecord[], onWritten: WriteAcknowledger): Promise<void> {
    if (!this.ready) this.ready = mkdir(this.directory, { recursive: true });
    await this.ready;

    const files = new Map<string, { lines: string[]; records: PersistedRecord[] }>();
    for (const record of records) {
      const file = path.join(this.directory, `${record.kind}-${sessionDateOf(record.at)}.jsonl`);
      const group = files.get(file) ?? { lines: [], records: [] };
      group.lines.push(JSON.stringify({ kind: record.kind, at: record.at.toISOString(), ...toObject(record.payload) }));
      group.records.push(record);
      files.set(file, group);
    }

    for (const [file, group] of files) {
      await appendFile(file, group.lines.join("\n") + "\n", "utf8");
      onWritten(group.records);
    }
  }
}

function toObject(payload: unknown): Record<string, unknown> {
  return typeof payload === "object" && payload !== null && !Array.isArray(payload)
    ? { ...payload }
    : { value: payload };
}

export interface BufferedPersistenceOptions {
  maxBuffered: number;
  timeoutMs: number;
  retry: RetryPolicy;
  connectivity?: ConnectivityTracker;
  now?: () => Date;
  wait?: Sleep;
}

export class BufferedPersistence implements PersistenceAdapter {
  private buffer: PersistedRecord[] = [];
  private flushing: Promise<void> | null = null;
  private inFlight: Promise<void> | null = null;
  private dropped = 0;
  private readonly now: () => Date;

  constructor(
    private readonly sink: PersistenceSink,
    private readonly options: BufferedPersistenceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  recordCycle(result: CycleResult): void {
    this.enqueue("cycle", result);
  }

  recordOrder(order: OrderRecord): void {
    this.enqueue("order", order);
  }

  recordCircuitBreakerEvent(event: BreakerEvent): void {
    this.enqueue("circuit_breaker", event);
  }

  recordBacktest(sequence: number, summary: BacktestSummary): void {
    this.enqueue("backtest", { sequence, ...summary });
  }

  pending(): number {
    return this.buffer.length;
  }

  droppedCount(): number {
    return this.dropped;
  }

  flush(): Promise<void> {
    if (!this.flushing) {
      this.flushing = this.writeBuffered().finally(() => {
        this.flushing = null;
      });
    }
    return this.flushing;
  }

  private enqueue(kind: RecordKind, payload: unknown): void {
    this.buffer.push({ kind, at: this.now(), payload });
    const overflow = this.buffer.length - this.options.maxBuffered;
    if (overflow > 0) {
      this.buffer.splice(0, overflow);
      this.dropped += overflow;
      logWarn(`Persistence buffer full, dropped ${overflow} oldest record(s)`);
    }
  }

  private async writeBuffered(): Promise<void> {
    if (this.buffer.length === 0) return;
    const batch = this.buffer.slice();
    const { connectivity } = this.options;

    try {
      await withRetry(
        () => this.writeRemaining(batch),
        this.options.retry,
        "persistence",
        "persistence write",
        this.options.wait ?? sleep
      );
      connectivity?.success("persistence");
    } catch (error) {
      connectivity?.failure("persistence", error);
      logError(`Persistence flush failed, ${this.buffer.length} record(s) kept`, error);
    }
  }

  /** One attempt: the part of `batch` still queued, never while an earlier write may land. */
  private writeRemaining(batch: readonly PersistedRecord[]): Promise<void> {
    if (this.inFlight) {
      return Promise.reject(
        new AdapterError({
          adapter: "persistence",
          code: AdapterErrorCode.UNAVAILABLE,
          message: "previous persistence write still running",
        })
      );
    }

    const queued = new Set(this.buffer);
    const remaining = batch.filter((record) => queued.has(record));
    if (remaining.length === 0) return Promise.resolve();

    const write = this.sink.write(remaining, (written) => this.acknowledge(written));
    this.inFlight = write.then(
      () => {
        this.acknowledge(remaining);
        this.inFlight = null;
      },
      () => {
        this.inFlight = null;
      }
    );
    return withTimeout(write, this.options.timeoutMs, "persistence", "persistence write");
  }

  // Records queued since the batch was taken stay.
  private acknowledge(written: readonly PersistedRecord[]): void {
    const done = new Set(written);
    this.buffer = this.buffer.filter((record) => !done.has(record));
  }
}
