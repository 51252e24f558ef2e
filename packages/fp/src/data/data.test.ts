/**
 * Data Types Tests - Option, Either
 */
import { describe, it, expect } from "vitest";
import * as Option from "./option.js";
import { Some, None, fromNullable, isSome, isNone } from "./option.js";
import * as Either from "./either.js";
import {
  Left,
  Right,
  isLeft,
  isRight,
  fromNullable as eitherFromNullable,
} from "./either.js";

// ============================================================================
// Option Tests
// ============================================================================

describe("Option", () => {
  describe("constructors", () => {
    it("Some should be the value itself", () => {
      expect(Some(42)).toBe(42);
    });

    it("None should be null", () => {
      expect(None).toBeNull();
    });

    it("fromNullable should turn null and undefined into None", () => {
      expect(fromNullable(undefined)).toBeNull();
      expect(fromNullable(null)).toBeNull();
      expect(fromNullable(0)).toBe(0);
      expect(fromNullable("")).toBe("");
    });
  });

  describe("guards", () => {
    it("should tell present from absent", () => {
      expect(isSome(Some(false))).toBe(true);
      expect(isNone(Some(false))).toBe(false);
      expect(isNone(None)).toBe(true);
    });
  });

  describe("operations", () => {
    it("map should skip None", () => {
      expect(Option.map(Some(2), (n) => n * 3)).toBe(6);
      expect(Option.map(None, (n: number) => n * 3)).toBeNull();
    });

    it("fold should choose the branch", () => {
      const label = (opt: Option.Option<number>) =>
        Option.fold(
          opt,
          () => "none",
          (n) => `some ${n}`,
        );
      expect(label(Some(1))).toBe("some 1");
      expect(label(None)).toBe("none");
    });

    it("getOrElse should only call the default for None", () => {
      let calls = 0;
      const fallback = () => {
        calls++;
        return 0;
      };
      expect(Option.getOrElse(Some(5), fallback)).toBe(5);
      expect(calls).toBe(0);
      expect(Option.getOrElse(None, fallback)).toBe(0);
      expect(calls).toBe(1);
    });
  });
});

// ============================================================================
// Either Tests
// ============================================================================

describe("Either", () => {
  it("should build tagged records", () => {
    expect(Left("bad")).toEqual({ _tag: "Left", left: "bad" });
    expect(Right(1)).toEqual({ _tag: "Right", right: 1 });
    expect(isLeft(Left("bad"))).toBe(true);
    expect(isRight(Right(1))).toBe(true);
  });

  it("fromNullable should call onNull only for missing values", () => {
    expect(eitherFromNullable(null, () => "missing")).toEqual(Left("missing"));
    expect(eitherFromNullable(3, () => "missing")).toEqual(Right(3));
  });

  it("map should transform Right and keep Left", () => {
    expect(Either.map(Right(2), (n: number) => n + 1)).toEqual(Right(3));
    const left: Either.Either<string, number> = Left("bad");
    expect(Either.map(left, (n) => n + 1)).toBe(left);
  });

  it("fold should choose the branch", () => {
    expect(Either.fold(Left("bad"), (e) => e.length, (n: number) => n)).toBe(3);
    expect(Either.fold(Right(7), (e: string) => e.length, (n) => n)).toBe(7);
  });

  it("toOption should drop the Left value", () => {
    expect(Either.toOption(Right(1))).toBe(1);
    expect(Either.toOption(Left("bad"))).toBeNull();
  });
});
