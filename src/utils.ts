/**
 * sqlwarden utilities
 */

import { GatewayError } from "./errors.js";

/**
 * Wrap a promise with a timeout. Rejects with a `timeout` GatewayError.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  message = "Operation timed out"
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new GatewayError("timeout", message, { durationMs: ms })), ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Format duration in ms to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1) return "<1ms";
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

/**
 * Truncate string with ellipsis
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + "...";
}

/**
 * Check if a name matches any pattern, exactly or with `*` wildcards.
 * Case-insensitive.
 */
export function matchesPattern(name: string, patterns: readonly string[]): boolean {
  const lowerName = name.toLowerCase();

  for (const pattern of patterns) {
    const lowerPattern = pattern.toLowerCase();

    if (lowerName === lowerPattern) return true;

    if (lowerPattern.includes("*")) {
      const escaped = lowerPattern
        .split("*")
        .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
        .join(".*");
      if (new RegExp("^" + escaped + "$").test(lowerName)) return true;
    }
  }

  return false;
}

/**
 * Log to stderr (stdout carries MCP JSON-RPC).
 */
export function log(message: string): void {
  console.error(`[sqlwarden] ${message}`);
}
