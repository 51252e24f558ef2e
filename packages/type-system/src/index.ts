/**
 * Type-level helpers shared by the outcome-kit packages.
 */

export type {
  Equal,
  Extends,
  Not,
  IsNever,
  IsAny,
  IsUnknown,
} from "./type-utils.js";

export { unsafeCoerce, absurd } from "./coerce.js";
