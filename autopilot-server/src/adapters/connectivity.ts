import type { AdapterName } from "../utils/errors.js";

export interface ConnectivityEntry {
  readonly ok: boolean;
  readonly at: Date;
  readonly error?: string;
}

/**
 * Outcome of the most recent call to each adapter. Health reads come from
 * here instead of probing on the read path.
 */
export class ConnectivityTracker {
  private readonly entries = new Map<AdapterName, ConnectivityEntry>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  success(adapter: AdapterName): void {
    this.entries.set(adapter, { ok: true, at: this.now() });
  }

  failure(adapter: AdapterName, error: unknown): void {
    this.entries.set(adapter, {
      ok: false,
      at: this.now(),
      error: error instanceof Error ? error.message : String(error),
    });
  }

  /** Run `call` and record its outcome; the result or error passes through. */
  async track<T>(adapter: AdapterName, call: () => Promise<T>): Promise<T> {
    try {
      const result = await call();
      this.success(adapter);
      return result;
    } catch (error) {
      this.failure(adapter, error);
      throw error;
    }
  }

  get(adapter: AdapterName): ConnectivityEntry | undefined {
    return this.entries.get(adapter);
  }

  /** Adapters whose last outcome is older than `maxAgeMs`, or never recorded. */
  stale(adapters: readonly AdapterName[], maxAgeMs: number): AdapterName[] {
    const cutoff = this.now().getTime() - maxAgeMs;
    return adapters.filter((name) => {
      const entry = this.entries.get(name);
      return !entry || entry.at.getTime() < cutoff;
    });
  }

  snapshot(): Readonly<Partial<Record<AdapterName, ConnectivityEntry>>> {
    return Object.freeze(Object.fromEntries(this.entries));
  }
}
