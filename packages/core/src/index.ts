/**
 * Core module exports for @seqlist/core
 *
 * This package provides:
 * - Configuration (defaults, config files, SEQLIST_* environment variables)
 * - Debug logging gated by configuration
 * - Runtime safety primitives (invariant, unreachable)
 */

// Configuration System
export {
  config,
  defineConfig,
  loadConfigFromEnv,
  type SeqlistConfig,
  type LogConfig,
} from "./config.js";

// Debug Logging
export { debugLog, formatDebugLine, isDebugEnabled } from "./debug.js";

// Runtime Safety Primitives
export { invariant, unreachable } from "./safety.js";
