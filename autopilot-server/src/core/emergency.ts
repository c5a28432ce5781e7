import { logWarn } from "../utils/logger.js";
import type { EmergencyStopRequest, StopActor } from "./types.js";

export type StopListener = (request: EmergencyStopRequest) => void;

export interface StopAck {
  /** False when a stop was already pending or consumed; the call was a no-op. */
  readonly accepted: boolean;
  readonly request: EmergencyStopRequest;
}

/**
 * Single-slot emergency stop. The first request wins and is handed to the
 * scheduler exactly once; later requests acknowledge the one in force.
 */
export class EmergencyStopQueue {
  private current: EmergencyStopRequest | null = null;
  private taken = false;
  private readonly listeners: StopListener[] = [];

  onRequest(listener: StopListener): void {
    this.listeners.push(listener);
  }

  request(reason: string, actor: StopActor, now: Date = new Date()): StopAck {
    if (this.current) {
      return { accepted: false, request: this.current };
    }
    const request: EmergencyStopRequest = Object.freeze({ reason, actor, requestedAt: now });
    this.current = request;
    logWarn(`EMERGENCY STOP requested by ${actor}: ${reason}`);
    for (const listener of this.listeners) listener(request);
    return { accepted: true, request };
  }

  /** Returns the request once; null afterwards or when none is pending. */
  take(): EmergencyStopRequest | null {
    if (!this.current || this.taken) return null;
    this.taken = true;
    return this.current;
  }

  active(): EmergencyStopRequest | null {
    return this.current;
  }
}
