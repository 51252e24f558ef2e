/**
 * Representation-preserving casts.
 *
 * Outcome values are plain `{ _tag, value }` records whatever their static
 * label set. Narrowing a value after a label has been handled keeps the same
 * record and only changes what the type system knows about it; these helpers
 * are the single place that re-typing happens.
 */

/**
 * Re-type a value without touching it.
 *
 * Only sound when the caller has established that `a` already has the
 * runtime shape of `B`.
 */
export function unsafeCoerce<A, B>(a: A): B {
  return a as unknown as B;
}

/** Eliminator for the empty type. Reaching it at runtime is a bug. */
export function absurd<A>(value: never): A {
  throw new Error(`absurd: unexpected value ${String(value)}`);
}
