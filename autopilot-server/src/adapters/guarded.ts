import type { AdapterName } from "../utils/errors.js";
import { sleep, withRetry, withTimeout, type RetryPolicy, type Sleep } from "../utils/retry.js";
import type { ConnectivityTracker } from "./connectivity.js";

export interface GuardOptions {
  timeoutMs: number;
  retry: RetryPolicy;
  wait?: Sleep;
}

/**
 * Every adapter call the control loop makes goes through here: a deadline
 * per attempt, bounded backoff for transient failures, and the outcome
 * recorded for health reads.
 */
export class GuardedCalls {
  constructor(
    private readonly connectivity: ConnectivityTracker,
    private readonly options: GuardOptions
  ) {}

  run<T>(adapter: AdapterName, label: string, fn: () => Promise<T>): Promise<T> {
    return this.connectivity.track(adapter, () =>
      withRetry(
        () => withTimeout(fn(), this.options.timeoutMs, adapter, label),
        this.options.retry,
        adapter,
        label,
        this.options.wait ?? sleep
      )
    );
  }

  /** Single attempt under a deadline. Used for calls that must not repeat, such as order submission. */
  once<T>(adapter: AdapterName, label: string, fn: () => Promise<T>): Promise<T> {
    return this.connectivity.track(adapter, () => withTimeout(fn(), this.options.timeoutMs, adapter, label));
  }
}
