import { describe, it, expect, expectTypeOf } from "vitest";
import { absurd, unsafeCoerce } from "../index.js";
import type {
  Equal,
  Extends,
  IsAny,
  IsNever,
  IsUnknown,
  Not,
} from "../index.js";

describe("type-level utilities", () => {
  it("Equal distinguishes any, unknown and never", () => {
    expectTypeOf<Equal<1 | 2, 2 | 1>>().toEqualTypeOf<true>();
    expectTypeOf<Equal<any, unknown>>().toEqualTypeOf<false>();
    expectTypeOf<Equal<never, never>>().toEqualTypeOf<true>();
  });

  it("Extends does not distribute over unions", () => {
    expectTypeOf<Extends<"a" | 1, string>>().toEqualTypeOf<false>();
    expectTypeOf<Extends<"a", string>>().toEqualTypeOf<true>();
    expectTypeOf<Not<Extends<never, string>>>().toEqualTypeOf<false>();
  });

  it("classifies the special types", () => {
    expectTypeOf<IsNever<Exclude<"a", "a">>>().toEqualTypeOf<true>();
    expectTypeOf<IsNever<"a">>().toEqualTypeOf<false>();
    expectTypeOf<IsAny<any>>().toEqualTypeOf<true>();
    expectTypeOf<IsAny<unknown>>().toEqualTypeOf<false>();
    expectTypeOf<IsUnknown<unknown>>().toEqualTypeOf<true>();
    expectTypeOf<IsUnknown<any>>().toEqualTypeOf<false>();
  });
});

describe("coercions", () => {
  it("unsafeCoerce returns the same reference", () => {
    const record = { _tag: "timeout", value: 30 };
    const retyped = unsafeCoerce<
      typeof record,
      { readonly _tag: string; readonly value: unknown }
    >(record);
    expect(retyped).toBe(record);
  });

  it("absurd throws when reached", () => {
    const unreachable = (n: never) => absurd<number>(n);
    expect(() => unreachable(unsafeCoerce<string, never>("boom"))).toThrow(
      "absurd: unexpected value boom",
    );
  });
});
