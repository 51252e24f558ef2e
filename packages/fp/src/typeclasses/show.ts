/**
 * Show Typeclass
 *
 * Programmer-facing string rendering; strings keep their quotes so the
 * output reads like the expression that built the value.
 */

export interface Show<A> {
  readonly show: (a: A) => string;
}

export const showString: Show<string> = {
  show: (s) => JSON.stringify(s),
};

export const showNumber: Show<number> = {
  show: (n) => String(n),
};

export const showBoolean: Show<boolean> = {
  show: (b) => String(b),
};

export const showUndefined: Show<undefined> = {
  show: () => "undefined",
};
