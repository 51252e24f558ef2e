/**
 * Misuse Error Types
 *
 * Failures that belong to the domain are payload data inside an outcome and
 * are never thrown. The classes here cover the other kind: a caller handing
 * the library something its types would have rejected, such as a dynamic
 * reserved label or a malformed generator table.
 */

export type MisuseKind =
  | "reserved-label"
  | "undeclared-label"
  | "table"
  | "invalid-weight"
  | "config";

/**
 * Base class for all misuse errors.
 */
export class OutcomeMisuseError extends Error {
  constructor(
    message: string,
    public readonly kind: MisuseKind,
  ) {
    super(message);
    this.name = "OutcomeMisuseError";
  }
}

/**
 * Thrown when the success label is used where a failure label is expected.
 */
export class ReservedLabelError extends OutcomeMisuseError {
  constructor(
    public readonly operation: string,
    public readonly label: string,
  ) {
    super(
      `${operation}: "${label}" is reserved for success and cannot name a failure`,
      "reserved-label",
    );
    this.name = "ReservedLabelError";
  }
}

/**
 * Thrown when a value carries a label that a handler or instance table does
 * not declare.
 */
export class UndeclaredLabelError extends OutcomeMisuseError {
  constructor(
    public readonly operation: string,
    public readonly label: string,
  ) {
    super(`${operation}: no entry for label "${label}"`, "undeclared-label");
    this.name = "UndeclaredLabelError";
  }
}

/**
 * Thrown when a per-label table is missing the success entry or holds an
 * entry of the wrong shape.
 */
export class TableError extends OutcomeMisuseError {
  constructor(
    public readonly operation: string,
    detail: string,
  ) {
    super(`${operation}: ${detail}`, "table");
    this.name = "TableError";
  }
}

/**
 * Thrown by weighted generation when a weight is negative, not finite, or all
 * weights are zero.
 */
export class InvalidWeightError extends OutcomeMisuseError {
  constructor(
    public readonly operation: string,
    detail: string,
  ) {
    super(`${operation}: ${detail}`, "invalid-weight");
    this.name = "InvalidWeightError";
  }
}

/**
 * Thrown when a configuration value does not have the type its key requires.
 */
export class ConfigError extends OutcomeMisuseError {
  constructor(
    public readonly path: string,
    public readonly value: unknown,
  ) {
    super(
      `Invalid configuration value for "${path}": ${formatValue(value)}`,
      "config",
    );
    this.name = "ConfigError";
  }
}

function formatValue(value: unknown): string {
  return value === undefined ? "undefined" : JSON.stringify(value);
}
