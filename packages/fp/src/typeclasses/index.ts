/**
 * Value-level typeclasses used by the Outcome instance tables
 */

export * as EqOps from "./eq.js";
export type { Eq, Ord, Ordering } from "./eq.js";
export {
  EQ,
  GT,
  LT,
  eqBoolean,
  eqNumber,
  eqStrict,
  eqString,
  makeEq,
  makeOrd,
  ordNumber,
  ordString,
} from "./eq.js";

export * as ShowOps from "./show.js";
export type { Show } from "./show.js";
export { showBoolean, showNumber, showString, showUndefined } from "./show.js";
