/**
 * @outcome-kit/fp: labeled-failure results for TypeScript
 *
 * `Outcome<E, A>` generalizes `Either` to many independently labeled
 * failures. Failures are handled one label at a time (or several at once),
 * and each handled label disappears from the type until only the success
 * value is left.
 *
 * @example
 * ```typescript
 * import {
 *   extract,
 *   failure,
 *   getOrElse,
 *   handle,
 *   success,
 *   type Failures,
 *   type Outcome,
 * } from "@outcome-kit/fp";
 *
 * type DivErr = Failures<{ divByZero: undefined }>;
 *
 * const divide = (a: number, b: number): Outcome<DivErr, number> =>
 *   b === 0 ? failure("divByZero", undefined) : success(a / b);
 *
 * getOrElse(divide(10, 0), -1); // -1
 * extract(handle(divide(10, 2), "divByZero", () => 0)); // 5
 * ```
 */

// ============================================================================
// Outcome
// ============================================================================

export * from "./data/outcome.js";

// ============================================================================
// Option / Either - namespace export to avoid collisions
// ============================================================================

export * as Option from "./data/option.js";
export * as Either from "./data/either.js";
export {
  Some,
  None,
  isSome,
  isNone,
  defined,
  unwrapDefined,
  Left,
  Right,
  isLeft,
  isRight,
} from "./data/index.js";
export type {
  OptionType,
  EitherType,
  Defined,
  Present,
} from "./data/index.js";

// ============================================================================
// Typeclasses and Instances
// ============================================================================

export * from "./typeclasses/index.js";
export * from "./instances.js";

// ============================================================================
// Generation and Laws
// ============================================================================

export * from "./gen/index.js";
export * as Laws from "./laws/index.js";
