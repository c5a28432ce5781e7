import type { Mode } from "./types.js";

export type SchedulerState =
  | { readonly phase: "STARTING" }
  | { readonly phase: "RUNNING"; readonly mode: Mode }
  | { readonly phase: "STOPPING"; readonly reason: string }
  | { readonly phase: "STOPPED"; readonly reason: string };

export type SchedulerEvent =
  | { readonly type: "enter"; readonly mode: Mode }
  | { readonly type: "stop"; readonly reason: string }
  | { readonly type: "stopped" };

export class InvalidTransitionError extends Error {
  constructor(state: SchedulerState, event: SchedulerEvent) {
    super(`Invalid scheduler transition: ${describeState(state)} on ${event.type}`);
    this.name = "InvalidTransitionError";
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}

/**
 * STARTING -> RUNNING(mode) <-> RUNNING(other mode) -> STOPPING -> STOPPED.
 * A stop from STARTING goes straight to STOPPING. Repeating a stop while
 * stopping keeps the first reason.
 */
export function transition(state: SchedulerState, event: SchedulerEvent): SchedulerState {
  switch (state.phase) {
    case "STARTING":
    case "RUNNING":
      switch (event.type) {
        case "enter":
          return { phase: "RUNNING", mode: event.mode };
        case "stop":
          return { phase: "STOPPING", reason: event.reason };
        case "stopped":
          throw new InvalidTransitionError(state, event);
        default:
          return assertNever(event);
      }
    case "STOPPING":
      switch (event.type) {
        case "stop":
          return state;
        case "stopped":
          return { phase: "STOPPED", reason: state.reason };
        case "enter":
          throw new InvalidTransitionError(state, event);
        default:
          return assertNever(event);
      }
    case "STOPPED":
      if (event.type === "stop") return state;
      throw new InvalidTransitionError(state, event);
    default:
      return assertNever(state);
  }
}

export function describeState(state: SchedulerState): string {
  return state.phase === "RUNNING" ? `RUNNING(${state.mode})` : state.phase;
}

export function isRunning(state: SchedulerState): boolean {
  return state.phase === "STARTING" || state.phase === "RUNNING";
}
