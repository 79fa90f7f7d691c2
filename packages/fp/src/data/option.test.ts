/**
 * Option Tests
 */
import { describe, it, expect } from "vitest";
import {
  type Option,
  Some,
  None,
  none,
  of,
  fromNullable,
  fromPredicate,
  isSome,
  isNone,
  map,
  flatMap,
  fold,
  match,
  getOrElse,
  getOrElseStrict,
  mapOr,
  orElse,
  filter,
  exists,
  toNullable,
  toArray,
  flatten,
  traverse,
  sequence,
} from "./option.js";

describe("Option", () => {
  describe("constructors", () => {
    it("Some should wrap a value", () => {
      const opt = Some(42);
      expect(opt).toEqual({ _tag: "Some", value: 42 });
      expect(isSome(opt)).toBe(true);
    });

    it("None should represent absence", () => {
      expect(None).toEqual({ _tag: "None" });
      expect(isNone(None)).toBe(true);
      expect(none<number>()).toBe(None);
    });

    it("of should convert null and undefined to None", () => {
      expect(of(null)).toBe(None);
      expect(of(undefined)).toBe(None);
      expect(fromNullable(null)).toBe(None);
    });

    it("of should keep falsy values that are not absent", () => {
      expect(of(0)).toEqual(Some(0));
      expect(of("")).toEqual(Some(""));
      expect(of(false)).toEqual(Some(false));
    });

    it("fromPredicate should keep values that satisfy the predicate", () => {
      expect(fromPredicate(4, (n) => n % 2 === 0)).toEqual(Some(4));
      expect(fromPredicate(3, (n) => n % 2 === 0)).toBe(None);
    });
  });

  describe("functor and monad", () => {
    it("map should transform Some", () => {
      expect(map(Some(2), (n) => n * 3)).toEqual(Some(6));
    });

    it("map should never call f on None", () => {
      let calls = 0;
      const result = map(none<number>(), (n) => {
        calls++;
        return n + 1;
      });
      expect(result).toBe(None);
      expect(calls).toBe(0);
    });

    it("flatMap should chain Some and stop on None", () => {
      const half = (n: number): Option<number> => (n % 2 === 0 ? Some(n / 2) : None);
      expect(flatMap(Some(8), half)).toEqual(Some(4));
      expect(flatMap(Some(3), half)).toBe(None);
      expect(flatMap(none<number>(), half)).toBe(None);
    });

    it("flatten should collapse nested Options", () => {
      expect(flatten(Some(Some(1)))).toEqual(Some(1));
      expect(flatten(Some(none<number>()))).toBe(None);
    });
  });

  describe("elimination", () => {
    const double = (n: number) => n * 2;

    it("of(v).map(f).getOrElse(d) is f(v) for a present value", () => {
      for (const v of [0, 1, -5, 21]) {
        expect(getOrElse(map(of(v), double), () => 99)).toBe(double(v));
      }
    });

    it("of(v).map(f).getOrElse(d) is d for an absent value", () => {
      const absent: number | null = null;
      expect(getOrElse(map(of<number>(absent), double), () => 99)).toBe(99);
    });

    it("getOrElseStrict should return the value or the default", () => {
      expect(getOrElseStrict(Some("a"), "b")).toBe("a");
      expect(getOrElseStrict(none<string>(), "b")).toBe("b");
    });

    it("mapOr should map Some and fall back on None", () => {
      expect(mapOr(Some("abc"), 0, (s) => s.length)).toBe(3);
      expect(mapOr(none<string>(), 0, (s) => s.length)).toBe(0);
    });

    it("fold and match should select the right branch", () => {
      expect(fold(Some(1), () => "none", (n) => `some ${n}`)).toBe("some 1");
      expect(fold(None, () => "none", () => "some")).toBe("none");
      expect(match(Some(2), { None: () => 0, Some: (n) => n * 10 })).toBe(20);
    });

    it("orElse should only evaluate the fallback for None", () => {
      let evaluated = 0;
      const fallback = () => {
        evaluated++;
        return Some(0);
      };
      expect(orElse(Some(1), fallback)).toEqual(Some(1));
      expect(evaluated).toBe(0);
      expect(orElse(none<number>(), fallback)).toEqual(Some(0));
      expect(evaluated).toBe(1);
    });

    it("filter and exists should test the value", () => {
      expect(filter(Some(5), (n) => n > 3)).toEqual(Some(5));
      expect(filter(Some(1), (n) => n > 3)).toBe(None);
      expect(exists(Some(5), (n) => n > 3)).toBe(true);
      expect(exists(none<number>(), () => true)).toBe(false);
    });

    it("toNullable and toArray should convert", () => {
      expect(toNullable(Some(1))).toBe(1);
      expect(toNullable(None)).toBe(null);
      expect(toArray(Some(1))).toEqual([1]);
      expect(toArray(None)).toEqual([]);
    });
  });

  describe("traverse and sequence", () => {
    it("sequence should collect Some values in order", () => {
      expect(sequence([Some(1), Some(2), Some(3)])).toEqual(Some([1, 2, 3]));
    });

    it("sequence should return None when any element is None", () => {
      expect(sequence([Some(1), none<number>(), Some(3)])).toBe(None);
    });

    it("traverse should stop at the first None", () => {
      const seen: number[] = [];
      const result = traverse([1, 2, 3, 4], (n) => {
        seen.push(n);
        return n < 2 ? Some(n) : none<number>();
      });
      expect(result).toBe(None);
      expect(seen).toEqual([1, 2]);
    });
  });
});
