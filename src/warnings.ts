// ─── Warning Sinks ──────────────────────────────────────────────────────────
//
// Recoverable decode problems are routed to a sink instead of the console.
// Pick one of these or pass any object with a warn() method.
// ─────────────────────────────────────────────────────────────────────────────

import type { DecodeWarning, WarningSink } from "./types.js";

// ─── Console Sink ───────────────────────────────────────────────────────────

/**
 * Print each warning to stderr, keeping stdout free for the host's output.
 */
export function createConsoleWarningSink(prefix = "midiseq"): WarningSink {
  return {
    warn(warning) {
      console.error(`${prefix}: ${warning.location}: ${warning.message}`);
    },
  };
}

// ─── Silent Sink ────────────────────────────────────────────────────────────

/** Drops everything. The default when no sink is given. */
export function createSilentWarningSink(): WarningSink {
  return {
    warn() {},
  };
}

// ─── Recording Sink (testing) ───────────────────────────────────────────────

/**
 * Collects warnings for later inspection.
 * Use: `const sink = createRecordingWarningSink(); ... sink.warnings`
 */
export function createRecordingWarningSink(): WarningSink & { warnings: DecodeWarning[] } {
  const warnings: DecodeWarning[] = [];

  return {
    warnings,
    warn(warning) {
      warnings.push(warning);
    },
  };
}
