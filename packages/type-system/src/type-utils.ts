/**
 * Type-Level Boolean Utilities
 *
 * Compile-time comparisons used by the type tests across the workspace.
 *
 * @example
 * ```typescript
 * import { Equal, IsNever } from "@outcome-kit/type-system";
 *
 * type Timeout = Failure<"timeout", number>;
 * type Resolved = Exclude<Timeout, Failure<"timeout", unknown>>;
 * type T1 = IsNever<Resolved>;          // true
 * type T2 = Equal<1 | 2, 2 | 1>;        // true
 * type T3 = Equal<any, unknown>;        // false
 * ```
 */

/**
 * Type-level equality check.
 *
 * The deferred-conditional formulation tells `any`, `unknown` and `never`
 * apart, which `A extends B` alone cannot.
 */
export type Equal<A, B> =
  (<T>() => T extends A ? 1 : 2) extends <T>() => T extends B ? 1 : 2
    ? true
    : false;

/** `true` if `A` is assignable to `B`. */
export type Extends<A, B> = [A] extends [B] ? true : false;

export type Not<T extends boolean> = T extends true ? false : true;

/**
 * Check if a type is exactly `never`.
 *
 * Wrapped in a tuple so the check does not distribute.
 */
export type IsNever<T> = [T] extends [never] ? true : false;

/** `0 extends 1 & T` only holds when `T` is `any`. */
export type IsAny<T> = 0 extends 1 & T ? true : false;

/** `true` for `unknown` only, not for `any`. */
export type IsUnknown<T> =
  IsAny<T> extends true ? false : unknown extends T ? true : false;
