/**
 * Typeclass laws for the Outcome instances
 *
 * @example
 * ```typescript
 * import { monadLaws, lawNamed, checkLaw } from "@outcome-kit/fp/laws";
 *
 * const laws = monadLaws(outcomeMonad<DivErr>(), eqDivision);
 * forAll(genDivision, (fa) => checkLaw(lawNamed(laws, "right identity"), fa));
 * ```
 *
 * @module
 */

export type { Law, LawSet } from "./types.js";
export { checkLaw, combineLaws, lawNamed } from "./types.js";

export { functorLaws, coflatMapLaws } from "./functor.js";
export { applyLaws, applicativeLaws } from "./applicative.js";
export { monadLaws, monadErrorLaws } from "./monad.js";
export { semigroupKLaws } from "./semigroupk.js";
export { eqLaws, ordLaws } from "./eq.js";
