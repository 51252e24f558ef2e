/**
 * Outcome Generators
 *
 * Random Outcomes for property tests, derived from an explicit table with one
 * entry per label (success under `"_"`). The table is checked once when the
 * generator is built.
 *
 * Labels are visited as `"_"` first and then the failure labels in sorted
 * order, so a seed produces the same values whatever order the table was
 * written in.
 *
 * @example
 * ```typescript
 * type DivErr = Failures<{ divByZero: undefined }>;
 *
 * const genDivision = genUniform<DivErr, number>({
 *   _: chooseInt(-10, 10),
 *   divByZero: constant(undefined),
 * });
 * ```
 */

import {
  InvalidWeightError,
  TableError,
  UndeclaredLabelError,
  config,
  createReporter,
} from "@outcome-kit/core";
import {
  chooseInt,
  flatMapGen,
  frequency,
  isArbitrary,
  isCoarbitrary,
  isGen,
  mapGen,
  perturbSeed,
} from "@outcome-kit/testing";
import type { Arbitrary, Coarbitrary, Gen, Seed } from "@outcome-kit/testing";
import { unsafeCoerce } from "@outcome-kit/type-system";
import { SUCCESS } from "../data/outcome.js";
import type {
  AnyFailure,
  AnyOutcome,
  FailureIn,
  Outcome,
} from "../data/outcome.js";

const log = createReporter("gen");

// ============================================================================
// Tables
// ============================================================================

export type Weighted<A> = readonly [weight: number, gen: Gen<A>];

export type GenTable<E extends AnyFailure, A> = { readonly _: Gen<A> } & {
  readonly [F in FailureIn<E> as F["_tag"]]: Gen<F["value"]>;
};

export type WeightedGenTable<E extends AnyFailure, A> = {
  readonly _: Weighted<A>;
} & {
  readonly [F in FailureIn<E> as F["_tag"]]: Weighted<F["value"]>;
};

export type ArbitraryTable<E extends AnyFailure, A> = {
  readonly _: Arbitrary<A>;
} & {
  readonly [F in FailureIn<E> as F["_tag"]]: Arbitrary<F["value"]>;
};

export type CoarbitraryTable<E extends AnyFailure, A> = {
  readonly _: Coarbitrary<A>;
} & {
  readonly [F in FailureIn<E> as F["_tag"]]: Coarbitrary<F["value"]>;
};

/**
 * The table's labels in visiting order: `"_"`, then failure labels sorted
 */
export function declaredLabels(table: object): string[] {
  if (!Object.prototype.hasOwnProperty.call(table, SUCCESS)) {
    throw new TableError(
      "declaredLabels",
      `missing the success entry "${SUCCESS}"`,
    );
  }
  const failures = Object.keys(table)
    .filter((label) => label !== SUCCESS)
    .sort();
  return [SUCCESS, ...failures];
}

// ============================================================================
// Generators
// ============================================================================

/**
 * Pick a label uniformly, then generate its payload
 */
export function genUniform<E extends AnyFailure, A>(
  table: GenTable<E, A>,
): Gen<Outcome<E, A>> {
  return uniformOver<E, A>(entries(table, "genUniform", isGen, "a generator"));
}

/**
 * Pick a label with probability proportional to its weight.
 *
 * Negative, non-finite or all-zero weights are rejected with
 * `InvalidWeightError`. With `generation.weights` set to `"permissive"`
 * they are reported as a warning instead and used as given: a zero weight
 * is never picked, and the last label in visiting order is the fallback.
 */
export function genWeighted<E extends AnyFailure, A>(
  table: WeightedGenTable<E, A>,
): Gen<Outcome<E, A>> {
  const weighted = entries(
    table,
    "genWeighted",
    isWeighted,
    "a [weight, generator] pair",
  );
  checkWeights(weighted);
  return frequency(
    weighted.map(
      ([label, [weight, gen]]) =>
        [weight, mapGen(gen, (value) => inject<E, A>(label, value))] as const,
    ),
  );
}

/**
 * An `Arbitrary` over every label. Shrinking keeps the label and shrinks the
 * payload with that label's own shrinker.
 */
export function arbitraryOutcome<E extends AnyFailure, A>(
  table: ArbitraryTable<E, A>,
): Arbitrary<Outcome<E, A>> {
  const arbitraries = entries(
    table,
    "arbitraryOutcome",
    isArbitrary,
    "an Arbitrary",
  );
  const byLabel = new Map(arbitraries);

  return {
    arbitrary: uniformOver<E, A>(
      arbitraries.map(([label, arb]) => [label, arb.arbitrary] as const),
    ),
    *shrink(fa) {
      const shrink = byLabel.get(fa._tag)?.shrink;
      if (shrink === undefined) return;
      for (const smaller of shrink(fa.value)) {
        yield inject<E, A>(fa._tag, smaller);
      }
    },
  };
}

/**
 * Fold an Outcome into a seed: first by the active label's position in the
 * visiting order, then by the payload's own `Coarbitrary`.
 */
export function coarbitraryOutcome<E extends AnyFailure, A>(
  table: CoarbitraryTable<E, A>,
): Coarbitrary<Outcome<E, A>> {
  const coarbitraries = entries(
    table,
    "coarbitraryOutcome",
    isCoarbitrary,
    "a Coarbitrary",
  );

  return {
    perturb: (fa, seed) => {
      const index = coarbitraries.findIndex(([label]) => label === fa._tag);
      if (index < 0) {
        throw new UndeclaredLabelError("coarbitraryOutcome", fa._tag);
      }
      const [, payload] = coarbitraries[index];
      return payload.perturb(fa.value, perturbSeed(seed, index));
    },
  };
}

export function perturbOutcome<E extends AnyFailure, A>(
  table: CoarbitraryTable<E, A>,
  fa: Outcome<E, A>,
  seed: Seed,
): Seed {
  return coarbitraryOutcome<E, A>(table).perturb(fa, seed);
}

// ============================================================================
// Internals
// ============================================================================

type Entry<T> = readonly [label: string, entry: T];

function entries<T>(
  table: object,
  operation: string,
  isEntry: (value: unknown) => value is T,
  expected: string,
): Entry<T>[] {
  if (!Object.prototype.hasOwnProperty.call(table, SUCCESS)) {
    throw new TableError(operation, `missing the success entry "${SUCCESS}"`);
  }
  return declaredLabels(table).map((label) => {
    const entry: unknown = Reflect.get(table, label);
    if (!isEntry(entry)) {
      throw new TableError(
        operation,
        `entry for "${label}" is not ${expected}`,
      );
    }
    return [label, entry] as const;
  });
}

function isWeighted(value: unknown): value is Weighted<unknown> {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === "number" &&
    isGen(value[1])
  );
}

function uniformOver<E extends AnyFailure, A>(
  gens: readonly Entry<Gen<unknown>>[],
): Gen<Outcome<E, A>> {
  return flatMapGen(chooseInt(0, gens.length - 1), (index) => {
    const [label, gen] = gens[index];
    return mapGen(gen, (value) => inject<E, A>(label, value));
  });
}

/** Tables are typed so that each label's entry produces its payload. */
function inject<E extends AnyFailure, A>(
  label: string,
  value: unknown,
): Outcome<E, A> {
  const record: AnyOutcome = { _tag: label, value };
  return unsafeCoerce<AnyOutcome, Outcome<E, A>>(record);
}

function checkWeights(weighted: readonly Entry<Weighted<unknown>>[]): void {
  const problems = weighted
    .filter(([, [weight]]) => !Number.isFinite(weight) || weight < 0)
    .map(([label, [weight]]) => `weight for "${label}" is ${weight}`);
  const total = weighted.reduce(
    (sum, [, [weight]]) =>
      Number.isFinite(weight) && weight > 0 ? sum + weight : sum,
    0,
  );
  if (total === 0) {
    problems.push("no label has a positive weight");
  }
  if (problems.length === 0) return;

  const detail = problems.join("; ");
  if (config.get("generation.weights") === "strict") {
    throw new InvalidWeightError("genWeighted", detail);
  }
  log.warn(`genWeighted: ${detail}`);
}
