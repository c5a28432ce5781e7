/**
 * stderr-only logger.
 * stdout belongs to the MCP stdio transport when it is enabled, so every
 * line goes to stderr.
 */

const PREFIX = "[autopilot]";

export function log(message: string): void {
  console.error(`${PREFIX} ${message}`);
}

export function logError(message: string, error?: unknown): void {
  if (error === undefined) {
    console.error(`${PREFIX} ERROR: ${message}`);
    return;
  }
  console.error(`${PREFIX} ERROR: ${message}: ${describeError(error)}`);
}

export function logWarn(message: string): void {
  console.error(`${PREFIX} WARN: ${message}`);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
