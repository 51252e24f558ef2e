/**
 * SemigroupK Laws
 *
 *   - Associativity: S.combineK(S.combineK(x, y), z)
 *       === S.combineK(x, S.combineK(y, z))
 *   - Idempotence: S.combineK(x, x) === x
 *
 * @module
 */

import type { Eq } from "../typeclasses/eq.js";
import type { AnyFailure, Outcome } from "../data/outcome.js";
import type { OutcomeSemigroupK } from "../instances.js";
import type { LawSet } from "./types.js";

export function semigroupKLaws<E extends AnyFailure, A>(
  S: OutcomeSemigroupK<E>,
  EqFA: Eq<Outcome<E, A>>,
): LawSet {
  return [
    {
      name: "combineK associativity",
      arity: 3,
      description:
        "S.combineK(S.combineK(x, y), z) === S.combineK(x, S.combineK(y, z))",
      check: (x: Outcome<E, A>, y: Outcome<E, A>, z: Outcome<E, A>): boolean =>
        EqFA.eqv(
          S.combineK(S.combineK(x, y), z),
          S.combineK(x, S.combineK(y, z)),
        ),
    },
    {
      name: "combineK idempotence",
      arity: 1,
      description: "S.combineK(x, x) === x",
      check: (x: Outcome<E, A>): boolean => EqFA.eqv(S.combineK(x, x), x),
    },
  ];
}
