/**
 * Option Data Type
 *
 * `Option<A>` is `A | null`: a present value is the value itself and absence
 * is `null`, so no wrapper object is allocated.
 *
 * A present `null` would read as None, so constructors that build a present
 * value take `A extends Present`. Wrap values that may be `null` with
 * `defined` first and read them back with `unwrapDefined`.
 *
 * @example
 * ```typescript
 * const raw = process.env.PORT;
 * const port: Option<number> = fromNullable(raw ? Number(raw) : undefined);
 * getOrElse(port, () => 8080);
 * ```
 */

// ============================================================================
// Option Type Definition
// ============================================================================

export type Option<A> = A | null;

export type Some<A> = A;

export type None = null;

/**
 * Anything but `null`
 */
export type Present = {} | undefined;

/**
 * Wrapper for values that may legitimately be `null`
 *
 * @example
 * ```typescript
 * const present: Option<Defined<null>> = Some(defined(null));
 * // { value: null }
 * const absent: Option<Defined<null>> = None;
 * ```
 */
export type Defined<T> = { readonly value: T };

export function defined<T>(value: T): Defined<T> {
  return { value };
}

export function unwrapDefined<T>(d: Defined<T>): T {
  return d.value;
}

// ============================================================================
// Constructors
// ============================================================================

export function Some<A extends Present>(value: A): Option<A> {
  return value;
}

export const None: Option<never> = null;

/**
 * `null` and `undefined` both become None
 */
export function fromNullable<A>(value: A | null | undefined): Option<A> {
  return value ?? null;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isSome<A>(opt: Option<A>): opt is A {
  return opt !== null;
}

export function isNone<A>(opt: Option<A>): opt is null {
  return opt === null;
}

// ============================================================================
// Operations
// ============================================================================

export function map<A, B>(opt: Option<A>, f: (a: A) => B): Option<B> {
  return isSome(opt) ? f(opt) : None;
}

export function fold<A, B>(
  opt: Option<A>,
  onNone: () => B,
  onSome: (a: A) => B,
): B {
  return isSome(opt) ? onSome(opt) : onNone();
}

export function getOrElse<A>(opt: Option<A>, defaultValue: () => A): A {
  return isSome(opt) ? opt : defaultValue();
}
