/**
 * Debug Logging
 *
 * Diagnostics go to the console only while `debug` is enabled in the
 * configuration (`SEQLIST_DEBUG=1`, a `seqlist` config file, or
 * `config.set({ debug: true })`). Everything else in seqlist is silent.
 */

import { config } from "./config.js";

/**
 * Check whether debug logging is enabled.
 */
export function isDebugEnabled(): boolean {
  return config.has("debug");
}

/**
 * Format a debug line as `<prefix>[<scope>] <message>`.
 */
export function formatDebugLine(scope: string, message: string): string {
  const prefix = config.get("log.prefix");
  return `${typeof prefix === "string" ? prefix : ""}[${scope}] ${message}`;
}

/**
 * Write a debug line when debug logging is enabled.
 *
 * @param scope - Short name of the emitting module, e.g. `"list"`
 */
export function debugLog(scope: string, message: string): void {
  if (!isDebugEnabled()) return;
  console.log(formatDebugLine(scope, message));
}
