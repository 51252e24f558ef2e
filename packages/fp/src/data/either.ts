/**
 * Either Data Type
 *
 * The two-outcome result that `Outcome` generalizes. Kept small: it exists so
 * outcomes can be built from and turned back into a plain binary result.
 */

import type { Option, Present } from "./option.js";
import { Some, None } from "./option.js";

// ============================================================================
// Either Type Definition
// ============================================================================

export type Either<E, A> = Left<E> | Right<A>;

/**
 * Left variant - represents failure
 */
export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

/**
 * Right variant - represents success
 */
export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

// ============================================================================
// Constructors
// ============================================================================

export function Left<E, A = never>(left: E): Either<E, A> {
  return { _tag: "Left", left };
}

export function Right<E = never, A = unknown>(right: A): Either<E, A> {
  return { _tag: "Right", right };
}

/**
 * Create an Either from a nullable value
 */
export function fromNullable<E, A>(
  value: A | null | undefined,
  onNull: () => E,
): Either<E, A> {
  return value == null ? Left(onNull()) : Right(value);
}

// ============================================================================
// Type Guards
// ============================================================================

export function isLeft<E, A>(either: Either<E, A>): either is Left<E> {
  return either._tag === "Left";
}

export function isRight<E, A>(either: Either<E, A>): either is Right<A> {
  return either._tag === "Right";
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Pattern match on Either
 */
export function fold<E, A, B>(
  either: Either<E, A>,
  onLeft: (e: E) => B,
  onRight: (a: A) => B,
): B {
  return isLeft(either) ? onLeft(either.left) : onRight(either.right);
}

/**
 * Map over the Right value
 */
export function map<E, A, B>(
  either: Either<E, A>,
  f: (a: A) => B,
): Either<E, B> {
  return isRight(either) ? Right(f(either.right)) : either;
}

/**
 * Convert Either to Option (discards the error)
 */
export function toOption<E, A extends Present>(
  either: Either<E, A>,
): Option<A> {
  return isRight(either) ? Some(either.right) : None;
}
