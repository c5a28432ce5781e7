import type { SchedulerState } from "./state.js";
import type { AccountView, CycleResult, Mode } from "./types.js";

/** Everything the control surface may read, as of one completed cycle. */
export interface SystemSnapshot {
  readonly sequence: number;
  readonly publishedAt: Date;
  readonly state: SchedulerState;
  readonly mode: Mode | null;
  readonly accounts: readonly AccountView[];
  readonly lastCycle: CycleResult | null;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !(value instanceof Date) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Holds the latest published snapshot. Publishing swaps the reference, so a
 * reader holds either the old snapshot or the new one, never a mix.
 */
export class SnapshotStore {
  private current: SystemSnapshot;

  constructor(initial: SystemSnapshot) {
    this.current = deepFreeze(initial);
  }

  get(): SystemSnapshot {
    return this.current;
  }

  publish(next: SystemSnapshot): void {
    this.current = deepFreeze(next);
  }
}

/** The last `capacity` cycle results, oldest first. */
export class CycleBuffer {
  private readonly results: CycleResult[] = [];

  constructor(private readonly capacity: number) {}

  push(result: CycleResult): void {
    this.results.push(deepFreeze(result));
    if (this.results.length > this.capacity) {
      this.results.splice(0, this.results.length - this.capacity);
    }
  }

  all(): readonly CycleResult[] {
    return [...this.results];
  }

  latest(): CycleResult | null {
    return this.results.length > 0 ? this.results[this.results.length - 1] : null;
  }

  get size(): number {
    return this.results.length;
  }
}
