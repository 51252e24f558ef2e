/**
 * Law Definition Types
 *
 * A law is a named predicate that must hold for every input. Law sets are
 * generated per instance and checked with `forAll` over generated inputs:
 *
 * ```typescript
 * const laws = functorLaws(outcomeFunctor<Err>(), eqOutcome);
 * forAll(genOutcome, (fa) => checkLaw(lawNamed(laws, "identity"), fa));
 * ```
 *
 * @module
 */

import { TableError } from "@outcome-kit/core";

// ============================================================================
// Core Law Type
// ============================================================================

export interface Law {
  /** Used in error messages and test descriptions */
  readonly name: string;

  /** Number of inputs `check` expects */
  readonly arity: number;

  /** The law in plain English, shown when it fails */
  readonly description?: string;

  check(...args: unknown[]): boolean;
}

/**
 * A collection of laws, as returned by `functorLaws`, `monadLaws`, etc.
 */
export type LawSet = readonly Law[];

// ============================================================================
// Utilities
// ============================================================================

/**
 * Look up a law by name. Law sets include the laws of their superclasses,
 * so `lawNamed(monadLaws(M, eq), "identity")` finds the functor identity.
 */
export function lawNamed(laws: LawSet, name: string): Law {
  const law = laws.find((l) => l.name === name);
  if (law === undefined) {
    const names = laws.map((l) => l.name).join(", ");
    throw new TableError("lawNamed", `no law named "${name}" (have: ${names})`);
  }
  return law;
}

/**
 * Run a law's predicate after checking it received `arity` inputs
 */
export function checkLaw(law: Law, ...args: unknown[]): boolean {
  if (args.length !== law.arity) {
    throw new RangeError(
      `${law.name}: expected ${law.arity} inputs, got ${args.length}`,
    );
  }
  return law.check(...args);
}

/**
 * Concatenate law sets, dropping later laws whose name is already present
 */
export function combineLaws(...sets: LawSet[]): LawSet {
  const seen = new Set<string>();
  return sets.flat().filter((law) => {
    if (seen.has(law.name)) return false;
    seen.add(law.name);
    return true;
  });
}
