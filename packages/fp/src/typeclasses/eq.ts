/**
 * Eq and Ord Typeclasses
 *
 * Eq: Equality comparison
 * Ord: Total ordering
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 *   - Ord Antisymmetry: compare(x, y) <= 0 && compare(y, x) <= 0 => eqv(x, y)
 *   - Ord Totality: compare(x, y) <= 0 || compare(y, x) <= 0
 */

// ============================================================================
// Ordering
// ============================================================================

/**
 * Result of a comparison
 */
export type Ordering = -1 | 0 | 1;

export const LT: Ordering = -1;
export const EQ: Ordering = 0;
export const GT: Ordering = 1;

// ============================================================================
// Eq / Ord
// ============================================================================

export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

export interface Ord<A> extends Eq<A> {
  readonly compare: (x: A, y: A) => Ordering;
  readonly lessThan: (x: A, y: A) => boolean;
  readonly lessThanOrEqual: (x: A, y: A) => boolean;
  readonly greaterThan: (x: A, y: A) => boolean;
  readonly greaterThanOrEqual: (x: A, y: A) => boolean;
}

// ============================================================================
// Instance Creators
// ============================================================================

export function makeEq<A>(eqv: (x: A, y: A) => boolean): Eq<A> {
  return { eqv };
}

/**
 * Create an Ord instance from a compare function; the boolean comparisons
 * are derived from it.
 */
export function makeOrd<A>(compare: (x: A, y: A) => Ordering): Ord<A> {
  return {
    eqv: (x, y) => compare(x, y) === EQ,
    compare,
    lessThan: (x, y) => compare(x, y) === LT,
    lessThanOrEqual: (x, y) => compare(x, y) !== GT,
    greaterThan: (x, y) => compare(x, y) === GT,
    greaterThanOrEqual: (x, y) => compare(x, y) !== LT,
  };
}

/**
 * Eq by reference / primitive equality (`===`)
 */
export function eqStrict<A>(): Eq<A> {
  return makeEq((x, y) => x === y);
}

function comparePrimitive<A extends string | number>(x: A, y: A): Ordering {
  return x < y ? LT : x > y ? GT : EQ;
}

// ============================================================================
// Primitive Instances
// ============================================================================

export const eqString: Eq<string> = eqStrict();

export const eqNumber: Eq<number> = eqStrict();

export const eqBoolean: Eq<boolean> = eqStrict();

export const ordString: Ord<string> = makeOrd<string>(comparePrimitive);

export const ordNumber: Ord<number> = makeOrd<number>(comparePrimitive);
