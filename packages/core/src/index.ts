/**
 * @outcome-kit/core
 *
 * Shared infrastructure for the outcome-kit packages: configuration,
 * diagnostics reporting and the misuse error hierarchy.
 */

export { config } from "./config.js";
export type {
  ConfigPath,
  ConfigValues,
  DiagnosticLevel,
  OutcomeKitConfig,
  WeightPolicy,
} from "./config.js";

export {
  createReporter,
  formatDiagnostic,
  isEnabled,
  report,
  setDiagnosticSink,
} from "./diagnostics.js";
export type {
  Diagnostic,
  DiagnosticSink,
  Reporter,
  Severity,
} from "./diagnostics.js";

export {
  ConfigError,
  InvalidWeightError,
  OutcomeMisuseError,
  ReservedLabelError,
  TableError,
  UndeclaredLabelError,
} from "./errors.js";
export type { MisuseKind } from "./errors.js";
