/**
 * Monad and MonadError Laws
 *
 * Monad Laws (extends Applicative):
 *   - Left identity: F.flatMap(F.pure(a), f) === f(a)
 *   - Right identity: F.flatMap(fa, F.pure) === fa
 *   - Associativity: F.flatMap(F.flatMap(fa, f), g)
 *       === F.flatMap(fa, a => F.flatMap(f(a), g))
 *
 * MonadError Laws:
 *   - F.flatMap(F.raiseError(e), f) === F.raiseError(e)
 *   - F.handleErrorWith(F.raiseError(e), f) === f(e)
 *   - F.handleErrorWith(F.pure(a), f) === F.pure(a)
 *
 * @module
 */

import type { Eq } from "../typeclasses/eq.js";
import type { AnyFailure, FailureIn, Outcome } from "../data/outcome.js";
import type { OutcomeMonad, OutcomeMonadError } from "../instances.js";
import { applicativeLaws } from "./applicative.js";
import type { LawSet } from "./types.js";
import { combineLaws } from "./types.js";

// ============================================================================
// Monad Laws
// ============================================================================

/**
 * Generate laws for a Monad instance.
 *
 * @param M - The Monad instance to verify
 * @param EqFA - Eq instance for comparing results
 */
export function monadLaws<E extends AnyFailure, A>(
  M: OutcomeMonad<E>,
  EqFA: Eq<Outcome<E, A>>,
): LawSet {
  return combineLaws(applicativeLaws(M, EqFA), [
    {
      name: "left identity",
      arity: 2,
      description:
        "pure is left identity for flatMap: F.flatMap(F.pure(a), f) === f(a)",
      check: (a: A, f: (a: A) => Outcome<E, A>): boolean =>
        EqFA.eqv(M.flatMap(M.pure(a), f), f(a)),
    },
    {
      name: "right identity",
      arity: 1,
      description:
        "pure is right identity for flatMap: F.flatMap(fa, F.pure) === fa",
      check: (fa: Outcome<E, A>): boolean =>
        EqFA.eqv(
          M.flatMap(fa, (a: A) => M.pure(a)),
          fa,
        ),
    },
    {
      name: "associativity",
      arity: 3,
      description:
        "flatMap is associative: F.flatMap(F.flatMap(fa, f), g) === F.flatMap(fa, a => F.flatMap(f(a), g))",
      check: (
        fa: Outcome<E, A>,
        f: (a: A) => Outcome<E, A>,
        g: (a: A) => Outcome<E, A>,
      ): boolean =>
        EqFA.eqv(
          M.flatMap(M.flatMap(fa, f), g),
          M.flatMap(fa, (a: A) => M.flatMap(f(a), g)),
        ),
    },
    {
      name: "ap consistency",
      arity: 2,
      description:
        "ap agrees with flatMap: F.ap(ff, fa) === F.flatMap(ff, f => F.map(fa, f))",
      check: (ff: Outcome<E, (a: A) => A>, fa: Outcome<E, A>): boolean =>
        EqFA.eqv(
          M.ap(ff, fa),
          M.flatMap(ff, (f: (a: A) => A) => M.map(fa, f)),
        ),
    },
  ]);
}

// ============================================================================
// MonadError Laws
// ============================================================================

/**
 * Generate laws for a MonadError instance (includes the Monad laws).
 */
export function monadErrorLaws<E extends AnyFailure, A>(
  M: OutcomeMonadError<E>,
  EqFA: Eq<Outcome<E, A>>,
): LawSet {
  return combineLaws(monadLaws(M, EqFA), [
    {
      name: "raiseError short-circuits",
      arity: 2,
      description: "F.flatMap(F.raiseError(e), f) === F.raiseError(e)",
      check: (e: FailureIn<E>, f: (a: A) => Outcome<E, A>): boolean =>
        EqFA.eqv(M.flatMap(M.raiseError<A>(e), f), M.raiseError<A>(e)),
    },
    {
      name: "handleErrorWith catches",
      arity: 2,
      description: "F.handleErrorWith(F.raiseError(e), f) === f(e)",
      check: (
        e: FailureIn<E>,
        f: (e: FailureIn<E>) => Outcome<E, A>,
      ): boolean =>
        EqFA.eqv(M.handleErrorWith(M.raiseError<A>(e), f), f(e)),
    },
    {
      name: "handleErrorWith pure",
      arity: 2,
      description: "F.handleErrorWith(F.pure(a), f) === F.pure(a)",
      check: (a: A, f: (e: FailureIn<E>) => Outcome<E, A>): boolean =>
        EqFA.eqv(M.handleErrorWith(M.pure(a), f), M.pure(a)),
    },
  ]);
}
