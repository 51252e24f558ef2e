/**
 * Outcome Data Type
 *
 * An Outcome<E, A> is either a success carrying `A` under the reserved label
 * `"_"`, or exactly one of several independently labeled failures. `E` is
 * the union of those failures, each a `Failure<Label, Payload>` record:
 *
 * ```typescript
 * type DivErr = Failures<{ divByZero: undefined; overflow: number }>;
 * //   = Failure<"divByZero", undefined> | Failure<"overflow", number>
 *
 * const divide = (a: number, b: number): Outcome<DivErr, number> =>
 *   b === 0 ? failure("divByZero", undefined) : success(a / b);
 *
 * const safe = handle(divide(1, 0), "divByZero", () => 0);
 * //    Outcome<Failure<"overflow", number>, number>
 * ```
 *
 * Handling a label removes it from `E`. Once `E` is `never` the value is a
 * plain `Success<A>` and `extract` unwraps it.
 *
 * Every combinator below is written in terms of `fold`; nothing else looks
 * at the record's tag except the guards and the per-label instance tables.
 */

import {
  ReservedLabelError,
  TableError,
  UndeclaredLabelError,
} from "@outcome-kit/core";
import { absurd, unsafeCoerce } from "@outcome-kit/type-system";
import type { Either } from "./either.js";
import { Left, Right, isRight } from "./either.js";
import type { Option, Present } from "./option.js";
import { Some, None, isSome } from "./option.js";
import type { Eq, Ord } from "../typeclasses/eq.js";
import { EQ, GT, LT, makeEq, makeOrd } from "../typeclasses/eq.js";
import type { Show } from "../typeclasses/show.js";

// ============================================================================
// Outcome Type Definition
// ============================================================================

export type SuccessLabel = "_";

/** The label reserved for success. No failure may use it. */
export const SUCCESS: SuccessLabel = "_";

/**
 * Success variant
 */
export interface Success<A> {
  readonly _tag: SuccessLabel;
  readonly value: A;
}

/**
 * Failure variant - one labeled failure mode with its payload
 */
export interface Failure<K extends string, P> {
  readonly _tag: K;
  readonly value: P;
}

export type AnyFailure = Failure<string, unknown>;

/**
 * The failure members of `E`. Inference can put a success-shaped member into
 * `E` when a value has no failure constituent; this drops it again.
 */
export type FailureIn<E> = Exclude<E, Success<unknown>>;

export type Outcome<E extends AnyFailure, A> = Success<A> | FailureIn<E>;

export type AnyOutcome = Outcome<AnyFailure, unknown>;

/**
 * Build a failure union from a row of `label: payload` entries.
 *
 * A row that declares `"_"` does not produce a failure union, so using it as
 * an Outcome's `E` is a compile error.
 */
export type Failures<R> = SuccessLabel extends keyof R
  ? "error: '_' is reserved for success and cannot be a failure label"
  : { [K in keyof R & string]: Failure<K, R[K]> }[keyof R & string];

/** Labels declared by `E`, without the success label */
export type LabelOf<E extends AnyFailure> = FailureIn<E>["_tag"];

/** Payload type declared for label `K` */
export type PayloadOf<E extends AnyFailure, K extends string> = Extract<
  FailureIn<E>,
  Failure<K, unknown>
>["value"];

/** `E` with the labels in `K` removed */
export type Without<E extends AnyFailure, K extends string> = Exclude<
  E,
  Failure<K, unknown>
>;

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a success value
 */
export function success<E extends AnyFailure = never, A = unknown>(
  value: A,
): Outcome<E, A> {
  return { _tag: SUCCESS, value };
}

/**
 * Create a failure under `label`.
 *
 * `"_"` is rejected by the parameter type; a label that only becomes `"_"`
 * at runtime throws `ReservedLabelError`.
 */
export function failure<K extends string, P, A = never>(
  label: Exclude<K, SuccessLabel>,
  value: P,
): Success<A> | Failure<K, P> {
  const tag: string = label;
  if (tag === SUCCESS) {
    throw new ReservedLabelError("failure", tag);
  }
  return { _tag: label, value };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isSuccess<E extends AnyFailure, A>(
  fa: Outcome<E, A>,
): fa is Success<A> {
  return fa._tag === SUCCESS;
}

export function isFailure<E extends AnyFailure, A>(
  fa: Outcome<E, A>,
): fa is FailureIn<E> {
  return fa._tag !== SUCCESS;
}

/**
 * Check whether `label` is the active failure
 */
export function hasLabel<E extends AnyFailure, A, K extends LabelOf<E>>(
  fa: Outcome<E, A>,
  label: K,
): fa is Extract<FailureIn<E>, Failure<K, unknown>> {
  return fold(
    fa,
    (failed) => failed._tag === label,
    () => false,
  );
}

// ============================================================================
// Elimination
// ============================================================================

/**
 * Total elimination. `onFailure` receives the whole failure record, so it
 * can dispatch on `_tag` with the payload narrowed per label.
 */
export function fold<E extends AnyFailure, A, B>(
  fa: Outcome<E, A>,
  onFailure: (failed: FailureIn<E>) => B,
  onSuccess: (a: A) => B,
): B {
  return isSuccess(fa) ? onSuccess(fa.value) : onFailure(fa);
}

/**
 * Handler table for `match`: one entry per declared label plus `_`.
 */
export type Cases<E extends AnyFailure, A, B> = {
  readonly _: (value: A) => B;
} & {
  readonly [F in FailureIn<E> as F["_tag"]]: (payload: F["value"]) => B;
};

/**
 * Pattern match with one handler per label
 *
 * @example
 * ```typescript
 * match(divide(a, b), {
 *   _: (q) => `quotient ${q}`,
 *   divByZero: () => "undefined",
 *   overflow: (n) => `overflowed at ${n}`,
 * });
 * ```
 */
export function match<E extends AnyFailure, A, B>(
  fa: Outcome<E, A>,
  cases: Cases<E, A, B>,
): B {
  return fold(
    fa,
    (failed) =>
      entryFor<(payload: unknown) => B>(
        cases,
        failed._tag,
        "match",
      )(failed.value),
    cases._,
  );
}

// ============================================================================
// Functor / Apply / Monad / Alt / Extend
// ============================================================================

/**
 * Map over the success value; failures pass through as the same record
 */
export function map<E extends AnyFailure, A, B>(
  fa: Outcome<E, A>,
  f: (a: A) => B,
): Outcome<E, B> {
  return fold<E, A, Outcome<E, B>>(
    fa,
    (failed) => failed,
    (a) => success(f(a)),
  );
}

/**
 * Chain a computation that may fail with further labels. The result carries
 * the failures of both sides.
 */
export function flatMap<E extends AnyFailure, A, E2 extends AnyFailure, B>(
  fa: Outcome<E, A>,
  f: (a: A) => Outcome<E2, B>,
): Outcome<E, B> | Outcome<E2, B> {
  return fold<E, A, Outcome<E, B> | Outcome<E2, B>>(
    fa,
    (failed) => failed,
    f,
  );
}

/**
 * Apply a wrapped function. A failure on the function side wins.
 */
export function ap<E extends AnyFailure, A, B, E2 extends AnyFailure>(
  ff: Outcome<E, (a: A) => B>,
  fa: Outcome<E2, A>,
): Outcome<E, B> | Outcome<E2, B> {
  return flatMap<E, (a: A) => B, E2, B>(ff, (f) => map(fa, f));
}

/**
 * First success wins; when both fail the left failure is kept
 */
export function alt<E extends AnyFailure, A, E2 extends AnyFailure>(
  left: Outcome<E, A>,
  right: Outcome<E2, A>,
): Outcome<E, A> | Outcome<E2, A> {
  return fold<E, A, Outcome<E, A> | Outcome<E2, A>>(
    left,
    () =>
      fold<E2, A, Outcome<E, A> | Outcome<E2, A>>(
        right,
        () => left,
        () => right,
      ),
    () => left,
  );
}

/**
 * Run `f` over the whole value and wrap its result as a success, whatever
 * the input's state.
 */
export function extend<E extends AnyFailure, A, B>(
  fa: Outcome<E, A>,
  f: (fa: Outcome<E, A>) => B,
): Outcome<E, B> {
  const extended = (): Outcome<E, B> => success(f(fa));
  return fold(fa, extended, extended);
}

/**
 * Flatten a nested Outcome
 */
export function flatten<E extends AnyFailure, E2 extends AnyFailure, A>(
  ffa: Outcome<E, Outcome<E2, A>>,
): Outcome<E, A> | Outcome<E2, A> {
  return flatMap<E, Outcome<E2, A>, E2, A>(ffa, (inner) => inner);
}

/**
 * Perform a side effect on success and return the original value
 */
export function tap<E extends AnyFailure, A>(
  fa: Outcome<E, A>,
  f: (a: A) => void,
): Outcome<E, A> {
  fold(fa, () => undefined, f);
  return fa;
}

/**
 * Perform a side effect on failure and return the original value
 */
export function tapFailure<E extends AnyFailure, A>(
  fa: Outcome<E, A>,
  f: (failed: FailureIn<E>) => void,
): Outcome<E, A> {
  fold(fa, f, () => undefined);
  return fa;
}

/**
 * Check if the success value satisfies a predicate
 */
export function exists<E extends AnyFailure, A>(
  fa: Outcome<E, A>,
  predicate: (a: A) => boolean,
): boolean {
  return fold(fa, () => false, predicate);
}

export function toArray<E extends AnyFailure, A>(fa: Outcome<E, A>): A[] {
  return fold<E, A, A[]>(
    fa,
    () => [],
    (a) => [a],
  );
}

/**
 * Map each item to an Outcome and collect the successes. Stops calling `f`
 * at the first failure and returns it.
 */
export function traverse<T, E extends AnyFailure, B>(
  items: readonly T[],
  f: (item: T) => Outcome<E, B>,
): Outcome<E, B[]> {
  return items.reduce<Outcome<E, B[]>>(
    (acc, item) =>
      flatMap<E, B[], E, B[]>(acc, (bs) => map(f(item), (b) => [...bs, b])),
    success([]),
  );
}

export function sequence<E extends AnyFailure, A>(
  items: readonly Outcome<E, A>[],
): Outcome<E, A[]> {
  return traverse(items, (item) => item);
}

// ============================================================================
// Partial Resolution
// ============================================================================

/**
 * Resolve one failure label into a success. Any other state is returned as
 * the same record, typed without `label`.
 *
 * @example
 * ```typescript
 * const r = handle(divide(1, 0), "divByZero", () => 0);
 * //    Outcome<Failure<"overflow", number>, number>
 * ```
 */
export function handle<E extends AnyFailure, A, K extends LabelOf<E>>(
  fa: Outcome<E, A>,
  label: K,
  f: (payload: PayloadOf<E, K>) => A,
): Outcome<Without<E, K>, A> {
  return fold<E, A, Outcome<Without<E, K>, A>>(
    fa,
    (failed) =>
      failed._tag === label
        ? success(f(unsafeCoerce<unknown, PayloadOf<E, K>>(failed.value)))
        : narrow<Without<E, K>, A>(failed),
    (a) => success(a),
  );
}

/**
 * Like `handle`, but the recovery may itself fail with other labels.
 */
export function handleWith<
  E extends AnyFailure,
  A,
  K extends LabelOf<E>,
  E2 extends AnyFailure,
>(
  fa: Outcome<E, A>,
  label: K,
  f: (payload: PayloadOf<E, K>) => Outcome<E2, A>,
): Outcome<Without<E, K>, A> | Outcome<E2, A> {
  return fold<E, A, Outcome<Without<E, K>, A> | Outcome<E2, A>>(
    fa,
    (failed) =>
      failed._tag === label
        ? f(unsafeCoerce<unknown, PayloadOf<E, K>>(failed.value))
        : narrow<Without<E, K>, A>(failed),
    (a) => success(a),
  );
}

/**
 * Handler table for `handleMany`: any subset of the declared labels.
 */
export type Handlers<E extends AnyFailure, A> = {
  readonly [F in FailureIn<E> as F["_tag"]]?: (payload: F["value"]) => A;
};

/** Keys of `H` that are not declared labels must not appear. */
export type NoExtraLabels<H, L extends string> = {
  readonly [K in Exclude<keyof H, L>]: never;
};

/**
 * Resolve several labels at once. Unhandled labels pass through with every
 * handled label removed from the type. Equivalent to chaining `handle` once
 * per key, in any order.
 *
 * @example
 * ```typescript
 * handleMany(divide(a, b), {
 *   divByZero: () => 0,
 *   overflow: (n) => n,
 * }); // Outcome<never, number>
 * ```
 */
export function handleMany<E extends AnyFailure, A, H extends Handlers<E, A>>(
  fa: Outcome<E, A>,
  handlers: H & NoExtraLabels<H, LabelOf<E>>,
): Outcome<Without<E, keyof H & string>, A> {
  if (Object.prototype.hasOwnProperty.call(handlers, SUCCESS)) {
    throw new ReservedLabelError("handleMany", SUCCESS);
  }
  return fold<E, A, Outcome<Without<E, keyof H & string>, A>>(
    fa,
    (failed) => {
      const handler = handlerFor<A>(handlers, failed._tag, "handleMany");
      return handler === undefined
        ? narrow<Without<E, keyof H & string>, A>(failed)
        : success(handler(failed.value));
    },
    (a) => success(a),
  );
}

/**
 * Unwrap a value with no failure labels left
 */
export function extract<A>(fa: Outcome<never, A>): A {
  return fold<never, A, A>(fa, absurd, (a) => a);
}

// ============================================================================
// Interop
// ============================================================================

/**
 * Lift a binary result: `Left` becomes a failure under `label`
 */
export function fromEither<K extends string, L, A>(
  label: Exclude<K, SuccessLabel>,
  either: Either<L, A>,
): Success<A> | Failure<K, L> {
  return isRight(either)
    ? success(either.right)
    : failure<K, L, A>(label, either.left);
}

/**
 * Success becomes `Right`; a failure becomes `Left` of its whole record
 */
export function toEither<E extends AnyFailure, A>(
  fa: Outcome<E, A>,
): Either<FailureIn<E>, A> {
  return fold<E, A, Either<FailureIn<E>, A>>(
    fa,
    (failed) => Left(failed),
    (a) => Right(a),
  );
}

/**
 * Success becomes `Some`; every failure becomes `None`. A success that may be
 * `null` goes through `map(fa, defined)` first.
 */
export function toOption<E extends AnyFailure, A extends Present>(
  fa: Outcome<E, A>,
): Option<A> {
  return fold<E, A, Option<A>>(
    fa,
    () => None,
    (a) => Some(a),
  );
}

/**
 * Turn absence into a labeled failure
 */
export function note<K extends string, P, A extends Present>(
  label: Exclude<K, SuccessLabel>,
  payload: P,
  option: Option<A>,
): Success<A> | Failure<K, P> {
  return isSome(option) ? success(option) : failure<K, P, A>(label, payload);
}

/**
 * `note` with the payload computed only when the option is empty
 */
export function noteLazy<K extends string, P, A extends Present>(
  label: Exclude<K, SuccessLabel>,
  payload: () => P,
  option: Option<A>,
): Success<A> | Failure<K, P> {
  return isSome(option)
    ? success(option)
    : failure<K, P, A>(label, payload());
}

/**
 * Get the success value or a default
 */
export function getOrElse<E extends AnyFailure, A>(
  fa: Outcome<E, A>,
  defaultValue: A,
): A {
  return fold(
    fa,
    () => defaultValue,
    (a) => a,
  );
}

/**
 * Get the success value or compute a default (called only on failure)
 */
export function getOrElseLazy<E extends AnyFailure, A>(
  fa: Outcome<E, A>,
  defaultValue: () => A,
): A {
  return fold(fa, defaultValue, (a) => a);
}

/**
 * Transform the failure, or fall back to `defaultValue` on success
 */
export function getFailureOr<E extends AnyFailure, A, B>(
  fa: Outcome<E, A>,
  defaultValue: B,
  onFailure: (failed: FailureIn<E>) => B,
): B {
  return fold(fa, onFailure, () => defaultValue);
}

export function getFailureOrLazy<E extends AnyFailure, A, B>(
  fa: Outcome<E, A>,
  defaultValue: () => B,
  onFailure: (failed: FailureIn<E>) => B,
): B {
  return fold(fa, onFailure, () => defaultValue());
}

// ============================================================================
// Typeclass Instances
// ============================================================================

export type EqTable<E extends AnyFailure, A> = { readonly _: Eq<A> } & {
  readonly [F in FailureIn<E> as F["_tag"]]: Eq<F["value"]>;
};

export type OrdTable<E extends AnyFailure, A> = { readonly _: Ord<A> } & {
  readonly [F in FailureIn<E> as F["_tag"]]: Ord<F["value"]>;
};

export type ShowTable<E extends AnyFailure, A> = { readonly _: Show<A> } & {
  readonly [F in FailureIn<E> as F["_tag"]]: Show<F["value"]>;
};

/**
 * Equal when the labels match and the label's Eq accepts the payloads
 */
export function getEq<E extends AnyFailure, A>(
  table: EqTable<E, A>,
): Eq<Outcome<E, A>> {
  return makeEq(
    (x, y) =>
      x._tag === y._tag &&
      entryFor<Eq<unknown>>(table, x._tag, "getEq").eqv(x.value, y.value),
  );
}

/**
 * Failures sort before success; failures order by label, then by payload
 */
export function getOrd<E extends AnyFailure, A>(
  table: OrdTable<E, A>,
): Ord<Outcome<E, A>> {
  return makeOrd((x, y) => {
    if (x._tag === y._tag) {
      const ord = entryFor<Ord<unknown>>(table, x._tag, "getOrd");
      return ord.compare(x.value, y.value);
    }
    if (x._tag === SUCCESS) return GT;
    if (y._tag === SUCCESS) return LT;
    return x._tag < y._tag ? LT : x._tag > y._tag ? GT : EQ;
  });
}

export function getShow<E extends AnyFailure, A>(
  table: ShowTable<E, A>,
): Show<Outcome<E, A>> {
  const showFailure = (failed: FailureIn<E>): string => {
    const S = entryFor<Show<unknown>>(table, failed._tag, "getShow");
    return `failure(${JSON.stringify(failed._tag)}, ${S.show(failed.value)})`;
  };
  return {
    show: (fa) => fold(fa, showFailure, (a) => `success(${table._.show(a)})`),
  };
}

// ============================================================================
// Internals
// ============================================================================

/**
 * Same record, typed against a narrower label set. Only called on a failure
 * whose label is not among the ones being removed.
 */
function narrow<E extends AnyFailure, A>(failed: AnyFailure): Outcome<E, A> {
  return unsafeCoerce<AnyFailure, Outcome<E, A>>(failed);
}

/**
 * Entry of a per-label table. The tables are typed so that the entry under a
 * label accepts that label's payload.
 */
function entryFor<T>(table: object, label: string, operation: string): T {
  if (!Object.prototype.hasOwnProperty.call(table, label)) {
    throw new UndeclaredLabelError(operation, label);
  }
  const entry: unknown = Reflect.get(table, label);
  return unsafeCoerce<unknown, T>(entry);
}

function handlerFor<A>(
  handlers: object,
  label: string,
  operation: string,
): ((payload: unknown) => A) | undefined {
  if (!Object.prototype.hasOwnProperty.call(handlers, label)) {
    return undefined;
  }
  const handler: unknown = Reflect.get(handlers, label);
  if (typeof handler !== "function") {
    throw new TableError(operation, `handler for "${label}" is not a function`);
  }
  return unsafeCoerce<unknown, (payload: unknown) => A>(handler);
}
