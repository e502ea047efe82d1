import { setTimeout as delay } from "node:timers/promises";

export { createLoopback, type Loopback, type LoopbackPeer } from "./loopback.ts";
export { createFrameLedger, type FrameLedger } from "./frame-ledger.ts";

// ============================================================================
// Waiting Helpers
// ============================================================================

export interface WaitForOptions {
  /** Give up after this many ms (default: 2000) */
  timeout?: number;
  /** Re-check every this many ms (default: 5) */
  interval?: number;
}

/**
 * Poll `predicate` until it returns true.
 *
 * @example
 * await waitFor(() => client.stats().bufferedResponses === 2);
 */
export async function waitFor(
  predicate: () => boolean,
  options: WaitForOptions = {}
): Promise<void> {
  const timeout = options.timeout ?? 2000;
  const interval = options.interval ?? 5;
  const deadline = Date.now() + timeout;

  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeout}ms`);
    }
    await delay(interval);
  }
}

/**
 * Collects what a client logs, by level.
 */
export interface CapturedLogger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  entries: Array<{ level: "debug" | "info" | "warn" | "error"; args: unknown[] }>;
  messages(level: "debug" | "info" | "warn" | "error"): string[];
}

export function createCapturedLogger(): CapturedLogger {
  const entries: CapturedLogger["entries"] = [];
  return {
    debug: (...args) => entries.push({ level: "debug", args }),
    info: (...args) => entries.push({ level: "info", args }),
    warn: (...args) => entries.push({ level: "warn", args }),
    error: (...args) => entries.push({ level: "error", args }),
    entries,
    messages: (level) =>
      entries
        .filter((entry) => entry.level === level)
        .map((entry) => String(entry.args[0])),
  };
}
