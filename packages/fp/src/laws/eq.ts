/**
 * Eq and Ord Laws
 *
 * Eq Laws:
 *   - Reflexivity: eqv(x, x)
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 *
 * Ord Laws (extends Eq):
 *   - Antisymmetry: x <= y && y <= x => eqv(x, y)
 *   - Transitivity: x <= y && y <= z => x <= z
 *   - Totality: x <= y || y <= x
 *   - Consistency: eqv(x, y) === (compare(x, y) === 0)
 *
 * @module
 */

import type { Eq, Ord } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";
import { combineLaws } from "./types.js";

/** `premise => conclusion`, true whenever the premise fails */
const implies = (premise: boolean, conclusion: () => boolean): boolean =>
  !premise || conclusion();

// ============================================================================
// Eq Laws
// ============================================================================

export function eqLaws<A>(E: Eq<A>): LawSet {
  return [
    {
      name: "reflexivity",
      arity: 1,
      description: "Every value equals itself",
      check: (x: A): boolean => E.eqv(x, x),
    },
    {
      name: "symmetry",
      arity: 2,
      description: "eqv(x, y) === eqv(y, x)",
      check: (x: A, y: A): boolean => E.eqv(x, y) === E.eqv(y, x),
    },
    {
      name: "transitivity",
      arity: 3,
      description: "eqv(x, y) && eqv(y, z) implies eqv(x, z)",
      check: (x: A, y: A, z: A): boolean =>
        implies(E.eqv(x, y) && E.eqv(y, z), () => E.eqv(x, z)),
    },
  ];
}

// ============================================================================
// Ord Laws
// ============================================================================

/**
 * Laws for an Ord instance, including the Eq laws
 */
export function ordLaws<A>(O: Ord<A>): LawSet {
  return combineLaws(eqLaws(O), [
    {
      name: "antisymmetry",
      arity: 2,
      description: "x <= y and y <= x implies eqv(x, y)",
      check: (x: A, y: A): boolean =>
        implies(O.lessThanOrEqual(x, y) && O.lessThanOrEqual(y, x), () =>
          O.eqv(x, y),
        ),
    },
    {
      name: "ordering transitivity",
      arity: 3,
      description: "x <= y and y <= z implies x <= z",
      check: (x: A, y: A, z: A): boolean =>
        implies(O.lessThanOrEqual(x, y) && O.lessThanOrEqual(y, z), () =>
          O.lessThanOrEqual(x, z),
        ),
    },
    {
      name: "totality",
      arity: 2,
      description: "x <= y or y <= x",
      check: (x: A, y: A): boolean =>
        O.lessThanOrEqual(x, y) || O.lessThanOrEqual(y, x),
    },
    {
      name: "consistency",
      arity: 2,
      description: "eqv(x, y) === (compare(x, y) === 0)",
      check: (x: A, y: A): boolean =>
        O.eqv(x, y) === (O.compare(x, y) === 0),
    },
  ]);
}
