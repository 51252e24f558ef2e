/**
 * Diagnostics
 *
 * Runtime reporting for the library's own warnings and debug traces, written
 * through a console sink with a `[outcome-kit/<scope>]` prefix:
 *
 * ```
 * [outcome-kit/gen] WARN: genWeighted: label "timeout" has weight -1
 * ```
 *
 * `diagnostics.level` gates error/warn/info; debug output additionally needs
 * `debug` to be enabled. Tests swap the sink with `setDiagnosticSink()`.
 */

import { config } from "./config.js";
import type { DiagnosticLevel } from "./config.js";

// ============================================================================
// Types
// ============================================================================

export type Severity = "error" | "warn" | "info" | "debug";

export interface Diagnostic {
  readonly severity: Severity;
  /** Subsystem that produced the message, e.g. "gen" or "testing" */
  readonly scope: string;
  readonly message: string;
}

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export interface Reporter {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

// ============================================================================
// Sink
// ============================================================================

export function formatDiagnostic({
  severity,
  scope,
  message,
}: Diagnostic): string {
  return `[outcome-kit/${scope}] ${severity.toUpperCase()}: ${message}`;
}

const consoleSink: DiagnosticSink = (diagnostic) => {
  const line = formatDiagnostic(diagnostic);
  switch (diagnostic.severity) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "info":
      console.info(line);
      break;
    case "debug":
      console.debug(line);
      break;
  }
};

let sink: DiagnosticSink = consoleSink;

/**
 * Route diagnostics somewhere other than the console. Passing `undefined`
 * restores the console sink.
 */
export function setDiagnosticSink(next: DiagnosticSink | undefined): void {
  sink = next ?? consoleSink;
}

// ============================================================================
// Reporting
// ============================================================================

const RANK: Record<Exclude<DiagnosticLevel, "off">, number> = {
  error: 0,
  warn: 1,
  info: 2,
};

export function isEnabled(severity: Severity): boolean {
  if (severity === "debug") return config.get("debug");
  const level = config.get("diagnostics.level");
  return level !== "off" && RANK[severity] <= RANK[level];
}

export function report(
  severity: Severity,
  scope: string,
  message: string,
): void {
  if (isEnabled(severity)) {
    sink({ severity, scope, message });
  }
}

/**
 * Bind a scope once for a module's reporting.
 *
 * @example
 * ```typescript
 * const log = createReporter("gen");
 * log.warn("all weights are zero");
 * ```
 */
export function createReporter(scope: string): Reporter {
  return {
    error: (message) => report("error", scope, message),
    warn: (message) => report("warn", scope, message),
    info: (message) => report("info", scope, message),
    debug: (message) => report("debug", scope, message),
  };
}
