/**
 * Apply and Applicative Laws
 *
 * Apply Laws (extends Functor):
 *   - Composition: F.ap(F.ap(F.map(fbc, bc => ab => a => bc(ab(a))), fab), fa)
 *       === F.ap(fbc, F.ap(fab, fa))
 *
 * Applicative Laws:
 *   - Identity: F.ap(F.pure(a => a), fa) === fa
 *   - Homomorphism: F.ap(F.pure(f), F.pure(a)) === F.pure(f(a))
 *   - Interchange: F.ap(ff, F.pure(a)) === F.ap(F.pure(f => f(a)), ff)
 *
 * @module
 */

import type { Eq } from "../typeclasses/eq.js";
import type { AnyFailure, Outcome } from "../data/outcome.js";
import type { OutcomeApplicative, OutcomeApply } from "../instances.js";
import { functorLaws } from "./functor.js";
import type { LawSet } from "./types.js";
import { combineLaws } from "./types.js";

type Endo<A> = (a: A) => A;

// ============================================================================
// Apply Laws
// ============================================================================

/**
 * Generate laws for an Apply instance.
 *
 * @param F - The Apply instance to verify
 * @param EqFA - Eq instance for comparing results
 */
export function applyLaws<E extends AnyFailure, A>(
  F: OutcomeApply<E>,
  EqFA: Eq<Outcome<E, A>>,
): LawSet {
  return combineLaws(functorLaws(F, EqFA), [
    {
      name: "apply composition",
      arity: 3,
      description:
        "ap composes: F.ap(F.ap(F.map(fbc, compose), fab), fa) === F.ap(fbc, F.ap(fab, fa))",
      check: (
        fbc: Outcome<E, Endo<A>>,
        fab: Outcome<E, Endo<A>>,
        fa: Outcome<E, A>,
      ): boolean => {
        const compose =
          (bc: Endo<A>) =>
          (ab: Endo<A>): Endo<A> =>
          (a: A) =>
            bc(ab(a));
        return EqFA.eqv(
          F.ap(F.ap(F.map(fbc, compose), fab), fa),
          F.ap(fbc, F.ap(fab, fa)),
        );
      },
    },
  ]);
}

// ============================================================================
// Applicative Laws
// ============================================================================

/**
 * Generate laws for an Applicative instance (includes the Apply laws).
 */
export function applicativeLaws<E extends AnyFailure, A>(
  F: OutcomeApplicative<E>,
  EqFA: Eq<Outcome<E, A>>,
): LawSet {
  return combineLaws(applyLaws(F, EqFA), [
    {
      name: "applicative identity",
      arity: 1,
      description:
        "Applying a wrapped identity is a no-op: F.ap(F.pure(a => a), fa) === fa",
      check: (fa: Outcome<E, A>): boolean =>
        EqFA.eqv(F.ap(F.pure((a: A) => a), fa), fa),
    },
    {
      name: "homomorphism",
      arity: 2,
      description:
        "pure preserves application: F.ap(F.pure(f), F.pure(a)) === F.pure(f(a))",
      check: (a: A, f: Endo<A>): boolean =>
        EqFA.eqv(F.ap(F.pure(f), F.pure(a)), F.pure(f(a))),
    },
    {
      name: "interchange",
      arity: 2,
      description: "F.ap(ff, F.pure(a)) === F.ap(F.pure(f => f(a)), ff)",
      check: (a: A, ff: Outcome<E, Endo<A>>): boolean =>
        EqFA.eqv(
          F.ap(ff, F.pure(a)),
          F.ap(
            F.pure((f: Endo<A>) => f(a)),
            ff,
          ),
        ),
    },
  ]);
}
