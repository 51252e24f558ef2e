/**
 * Data Types Index
 *
 * - Type: `Outcome<E, A>`, `Option<A>`, `Either<E, A>`
 * - Operations: `Outcome.map(...)`, `Either.fold(...)`, etc.
 * - Constructors: `success(...)`, `failure(...)`, `Some(...)`, `None`,
 *   `Left(...)`, `Right(...)`
 */

// ============================================================================
// Outcome: many labeled failures, one success
// ============================================================================

export * as Outcome from "./outcome.js";
export {
  SUCCESS,
  success,
  failure,
  isSuccess,
  isFailure,
  hasLabel,
  fold,
  match,
  handle,
  handleMany,
  extract,
} from "./outcome.js";
export type {
  AnyFailure,
  AnyOutcome,
  Cases,
  EqTable,
  Failure,
  FailureIn,
  Failures,
  Handlers,
  LabelOf,
  OrdTable,
  PayloadOf,
  ShowTable,
  Success,
  SuccessLabel,
  Without,
  Outcome as OutcomeType,
} from "./outcome.js";

// ============================================================================
// Option: null-based optional values
// ============================================================================

export * as Option from "./option.js";
export {
  Some,
  None,
  isSome,
  isNone,
  defined,
  unwrapDefined,
} from "./option.js";
export type { Option as OptionType, Defined, Present } from "./option.js";

// ============================================================================
// Either: two-outcome result
// ============================================================================

export * as Either from "./either.js";
export { Left, Right, isLeft, isRight } from "./either.js";
export type { Either as EitherType } from "./either.js";
