/**
 * Outcome Typeclass Instances
 *
 * Instances are specialized to `Outcome<E, _>` for a fixed failure union
 * `E`: the typeclass shapes are written out against that one constructor, so
 * every method keeps full types without a higher-kinded encoding.
 *
 * Laws:
 *   - Functor: identity, composition
 *   - Apply/Applicative: composition, identity, homomorphism, interchange
 *   - Monad: left identity, right identity, associativity
 *   - MonadError: raiseError(e) short-circuits flatMap and is caught by
 *     handleErrorWith
 *   - SemigroupK: combineK is associative
 *   - CoflatMap: coflatMap associativity
 */

import * as O from "./data/outcome.js";
import type { AnyFailure, FailureIn, Outcome } from "./data/outcome.js";

// ============================================================================
// Instance Shapes
// ============================================================================

export interface OutcomeFunctor<E extends AnyFailure> {
  readonly map: <A, B>(fa: Outcome<E, A>, f: (a: A) => B) => Outcome<E, B>;
}

export interface OutcomeApply<E extends AnyFailure> extends OutcomeFunctor<E> {
  readonly ap: <A, B>(
    ff: Outcome<E, (a: A) => B>,
    fa: Outcome<E, A>,
  ) => Outcome<E, B>;
}

export interface OutcomeApplicative<E extends AnyFailure>
  extends OutcomeApply<E> {
  readonly pure: <A>(a: A) => Outcome<E, A>;
}

export interface OutcomeMonad<E extends AnyFailure>
  extends OutcomeApplicative<E> {
  readonly flatMap: <A, B>(
    fa: Outcome<E, A>,
    f: (a: A) => Outcome<E, B>,
  ) => Outcome<E, B>;
}

/**
 * Monad with the failure record as its error channel
 */
export interface OutcomeMonadError<E extends AnyFailure>
  extends OutcomeMonad<E> {
  readonly raiseError: <A>(e: FailureIn<E>) => Outcome<E, A>;
  readonly handleErrorWith: <A>(
    fa: Outcome<E, A>,
    f: (e: FailureIn<E>) => Outcome<E, A>,
  ) => Outcome<E, A>;
}

export interface OutcomeSemigroupK<E extends AnyFailure> {
  readonly combineK: <A>(x: Outcome<E, A>, y: Outcome<E, A>) => Outcome<E, A>;
}

export interface OutcomeCoflatMap<E extends AnyFailure>
  extends OutcomeFunctor<E> {
  readonly coflatMap: <A, B>(
    fa: Outcome<E, A>,
    f: (fa: Outcome<E, A>) => B,
  ) => Outcome<E, B>;
}

export interface OutcomeFoldable<E extends AnyFailure> {
  readonly foldLeft: <A, B>(fa: Outcome<E, A>, b: B, f: (b: B, a: A) => B) => B;
  readonly foldRight: <A, B>(
    fa: Outcome<E, A>,
    b: B,
    f: (a: A, b: B) => B,
  ) => B;
}

// ============================================================================
// Instance Creators
// ============================================================================

export function outcomeFunctor<E extends AnyFailure>(): OutcomeFunctor<E> {
  return {
    map: <A, B>(fa: Outcome<E, A>, f: (a: A) => B) => O.map<E, A, B>(fa, f),
  };
}

export function outcomeMonad<E extends AnyFailure>(): OutcomeMonad<E> {
  return {
    ...outcomeFunctor<E>(),
    ap: <A, B>(ff: Outcome<E, (a: A) => B>, fa: Outcome<E, A>) =>
      O.ap<E, A, B, E>(ff, fa),
    pure: <A>(a: A) => O.success<E, A>(a),
    flatMap: <A, B>(fa: Outcome<E, A>, f: (a: A) => Outcome<E, B>) =>
      O.flatMap<E, A, E, B>(fa, f),
  };
}

/**
 * MonadError over the whole failure record. `handleErrorWith` sees every
 * label; use `handle` to resolve one label and narrow the type.
 */
export function outcomeMonadError<
  E extends AnyFailure,
>(): OutcomeMonadError<E> {
  return {
    ...outcomeMonad<E>(),
    raiseError: <A>(e: FailureIn<E>): Outcome<E, A> => e,
    handleErrorWith: <A>(
      fa: Outcome<E, A>,
      f: (e: FailureIn<E>) => Outcome<E, A>,
    ) => O.fold<E, A, Outcome<E, A>>(fa, f, (a) => O.success<E, A>(a)),
  };
}

export function outcomeSemigroupK<
  E extends AnyFailure,
>(): OutcomeSemigroupK<E> {
  return {
    combineK: <A>(x: Outcome<E, A>, y: Outcome<E, A>) =>
      O.alt<E, A, E>(x, y),
  };
}

export function outcomeCoflatMap<E extends AnyFailure>(): OutcomeCoflatMap<E> {
  return {
    ...outcomeFunctor<E>(),
    coflatMap: <A, B>(fa: Outcome<E, A>, f: (fa: Outcome<E, A>) => B) =>
      O.extend<E, A, B>(fa, f),
  };
}

export function outcomeFoldable<E extends AnyFailure>(): OutcomeFoldable<E> {
  return {
    foldLeft: <A, B>(fa: Outcome<E, A>, b: B, f: (b: B, a: A) => B) =>
      O.fold<E, A, B>(
        fa,
        () => b,
        (a) => f(b, a),
      ),
    foldRight: <A, B>(fa: Outcome<E, A>, b: B, f: (a: A, b: B) => B) =>
      O.fold<E, A, B>(
        fa,
        () => b,
        (a) => f(a, b),
      ),
  };
}
