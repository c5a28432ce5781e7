/**
 * Error taxonomy.
 *
 * ConfigError is the only error allowed to stop the process, and only at
 * startup. Everything an adapter throws is mapped to an AdapterError so the
 * retry layer can tell transient failures from final ones.
 */

export class ConfigError extends Error {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
    this.path = path;
  }
}

export type AdapterName =
  | "broker"
  | "market_data"
  | "persistence"
  | "notifier"
  | "calendar"
  | "candidates";

export enum AdapterErrorCode {
  TIMEOUT = "TIMEOUT",
  RATE_LIMITED = "RATE_LIMITED",
  NETWORK = "NETWORK",
  UNAVAILABLE = "UNAVAILABLE",
  REJECTED = "REJECTED",
  NOT_FOUND = "NOT_FOUND",
  UNKNOWN = "UNKNOWN",
}

const RETRYABLE_CODES: ReadonlySet<AdapterErrorCode> = new Set([
  AdapterErrorCode.TIMEOUT,
  AdapterErrorCode.RATE_LIMITED,
  AdapterErrorCode.NETWORK,
  AdapterErrorCode.UNAVAILABLE,
]);

export function isRetryableCode(code: AdapterErrorCode): boolean {
  return RETRYABLE_CODES.has(code);
}

export interface AdapterErrorDetail {
  readonly adapter: AdapterName;
  readonly code: AdapterErrorCode;
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}

export class AdapterError extends Error {
  readonly adapter: AdapterName;
  readonly code: AdapterErrorCode;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(detail: AdapterErrorDetail) {
    super(detail.message, { cause: detail.cause });
    this.name = "AdapterError";
    this.adapter = detail.adapter;
    this.code = detail.code;
    this.status = detail.status;
    this.retryable = isRetryableCode(detail.code);
  }

  toJSON(): { adapter: AdapterName; code: AdapterErrorCode; message: string; status?: number } {
    return {
      adapter: this.adapter,
      code: this.code,
      message: this.message,
      status: this.status,
    };
  }
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if (
    "response" in error &&
    typeof error.response === "object" &&
    error.response !== null &&
    "status" in error.response &&
    typeof error.response.status === "number"
  ) {
    return error.response.status;
  }
  return undefined;
}

function codeFromStatus(status: number): AdapterErrorCode {
  if (status === 429) return AdapterErrorCode.RATE_LIMITED;
  if (status === 404) return AdapterErrorCode.NOT_FOUND;
  if (status === 408 || status === 504) return AdapterErrorCode.TIMEOUT;
  if (status >= 500) return AdapterErrorCode.UNAVAILABLE;
  if (status >= 400) return AdapterErrorCode.REJECTED;
  return AdapterErrorCode.UNKNOWN;
}

/**
 * Map any thrown value to an AdapterError.
 */
export function toAdapterError(adapter: AdapterName, error: unknown): AdapterError {
  if (error instanceof AdapterError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const status = readStatus(error);

  let code: AdapterErrorCode;
  if (status !== undefined) {
    code = codeFromStatus(status);
  } else if (/ETIMEDOUT|timed out|timeout/i.test(message)) {
    code = AdapterErrorCode.TIMEOUT;
  } else if (/ECONNRESET|ECONNREFUSED|EAI_AGAIN|ENOTFOUND|socket hang up/i.test(message)) {
    code = AdapterErrorCode.NETWORK;
  } else {
    code = AdapterErrorCode.UNKNOWN;
  }

  return new AdapterError({ adapter, code, message, status, cause: error });
}
