import axios, { type AxiosInstance } from "axios";
import { AdapterError, AdapterErrorCode, toAdapterError } from "../utils/errors.js";
import { log, logError, logWarn } from "../utils/logger.js";
import type { ConnectivityTracker } from "./connectivity.js";
import type { Notifier, Severity } from "./types.js";

const SEVERITY_PREFIX: Record<Severity, string> = {
  info: ":information_source:",
  warning: ":warning:",
  critical: ":rotating_light:",
};

/**
 * Posts to a Slack incoming webhook. A 429 surfaces as RATE_LIMITED so the
 * gate's caller sees it in connectivity, never as a retry loop.
 */
export class SlackNotifier implements Notifier {
  private readonly http: AxiosInstance;

  constructor(webhookUrl: string, timeoutMs: number) {
    this.http = axios.create({ baseURL: webhookUrl, timeout: timeoutMs });
  }

  async notify(severity: Severity, message: string): Promise<void> {
    try {
      await this.http.post("", {
        text: `${SEVERITY_PREFIX[severity]} *Market Autopilot*\n${message}`,
        username: "Market Autopilot",
      });
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 429) {
        throw new AdapterError({
          adapter: "notifier",
          code: AdapterErrorCode.RATE_LIMITED,
          message: "Slack rate limited the webhook",
          status: 429,
          cause: error,
        });
      }
      throw toAdapterError("notifier", error);
    }
  }
}

/** Used when no webhook is configured. */
export class LogNotifier implements Notifier {
  async notify(severity: Severity, message: string): Promise<void> {
    const line = `[notify:${severity}] ${message}`;
    if (severity === "info") log(line);
    else logWarn(line);
  }
}

/**
 * Per-key cooldown in front of a Notifier. Keys are independent, so an
 * alert for one account never suppresses a different account's alert.
 * Delivery is fire-and-forget and never awaited on the order path.
 */
export class NotificationGate {
  private readonly lastSent = new Map<string, number>();
  private readonly inflight = new Set<Promise<void>>();

  constructor(
    private readonly notifier: Notifier,
    private readonly cooldownMs: number,
    private readonly now: () => Date = () => new Date(),
    private readonly connectivity?: ConnectivityTracker
  ) {}

  /** Returns false when the key is still cooling down. */
  send(key: string, severity: Severity, message: string): boolean {
    const at = this.now().getTime();
    const last = this.lastSent.get(key);
    if (last !== undefined && at - last < this.cooldownMs) {
      return false;
    }
    this.lastSent.set(key, at);

    const delivery = this.notifier
      .notify(severity, message)
      .then(() => this.connectivity?.success("notifier"))
      .catch((error: unknown) => {
        this.connectivity?.failure("notifier", error);
        logError(`Notification "${key}" failed`, error);
      })
      .finally(() => {
        this.inflight.delete(delivery);
      });
    this.inflight.add(delivery);
    return true;
  }

  /** Wait for deliveries already handed to the notifier. */
  async drain(): Promise<void> {
    await Promise.all([...this.inflight]);
  }
}
