export {
  arbitraryOutcome,
  coarbitraryOutcome,
  declaredLabels,
  genUniform,
  genWeighted,
  perturbOutcome,
} from "./outcome.js";
export type {
  ArbitraryTable,
  CoarbitraryTable,
  GenTable,
  Weighted,
  WeightedGenTable,
} from "./outcome.js";
