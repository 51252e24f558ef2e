/**
 * Functor and CoflatMap Laws
 *
 * Functor Laws:
 *   - Identity: F.map(fa, a => a) === fa
 *   - Composition: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))
 *
 * CoflatMap Laws:
 *   - Associativity: C.coflatMap(C.coflatMap(fa, f), g)
 *       === C.coflatMap(fa, x => g(C.coflatMap(x, f)))
 *
 * @module
 */

import type { Eq } from "../typeclasses/eq.js";
import type { AnyFailure, Outcome } from "../data/outcome.js";
import type { OutcomeCoflatMap, OutcomeFunctor } from "../instances.js";
import type { LawSet } from "./types.js";
import { combineLaws } from "./types.js";

// ============================================================================
// Functor Laws
// ============================================================================

/**
 * Generate laws for a Functor instance.
 *
 * @param F - The Functor instance to verify
 * @param EqFA - Eq instance for comparing results
 *
 * @example
 * ```typescript
 * const eq = getEq<DivErr, number>({ _: eqNumber, divByZero: eqStrict() });
 * const laws = functorLaws(outcomeFunctor<DivErr>(), eq);
 * forAll(genDivision, (fa) => checkLaw(lawNamed(laws, "identity"), fa));
 * ```
 */
export function functorLaws<E extends AnyFailure, A>(
  F: OutcomeFunctor<E>,
  EqFA: Eq<Outcome<E, A>>,
): LawSet {
  return [
    {
      name: "identity",
      arity: 1,
      description:
        "Mapping identity preserves structure: F.map(fa, a => a) === fa",
      check: (fa: Outcome<E, A>): boolean =>
        EqFA.eqv(
          F.map(fa, (a: A) => a),
          fa,
        ),
    },
    {
      name: "composition",
      arity: 3,
      description:
        "Mapping composed functions equals composing maps: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))",
      check: (fa: Outcome<E, A>, f: (a: A) => A, g: (a: A) => A): boolean =>
        EqFA.eqv(
          F.map(F.map(fa, f), g),
          F.map(fa, (a: A) => g(f(a))),
        ),
    },
  ];
}

// ============================================================================
// CoflatMap Laws
// ============================================================================

/**
 * Generate laws for a CoflatMap instance (includes the Functor laws).
 */
export function coflatMapLaws<E extends AnyFailure, A>(
  C: OutcomeCoflatMap<E>,
  EqFA: Eq<Outcome<E, A>>,
): LawSet {
  return combineLaws(functorLaws(C, EqFA), [
    {
      name: "coflatMap associativity",
      arity: 3,
      description:
        "C.coflatMap(C.coflatMap(fa, f), g) === C.coflatMap(fa, x => g(C.coflatMap(x, f)))",
      check: (
        fa: Outcome<E, A>,
        f: (fa: Outcome<E, A>) => A,
        g: (fa: Outcome<E, A>) => A,
      ): boolean =>
        EqFA.eqv(
          C.coflatMap(C.coflatMap(fa, f), g),
          C.coflatMap(fa, (x: Outcome<E, A>) => g(C.coflatMap(x, f))),
        ),
    },
    {
      name: "coflatMap coherence",
      arity: 3,
      description:
        "Mapping after coflatMap fuses: C.map(C.coflatMap(fa, f), g) === C.coflatMap(fa, x => g(f(x)))",
      check: (
        fa: Outcome<E, A>,
        f: (fa: Outcome<E, A>) => A,
        g: (a: A) => A,
      ): boolean =>
        EqFA.eqv(
          C.map(C.coflatMap(fa, f), g),
          C.coflatMap(fa, (x: Outcome<E, A>) => g(f(x))),
        ),
    },
  ]);
}
