/**
 * Either Tests
 */
import { describe, it, expect } from "vitest";
import { Some, None } from "./option.js";
import {
  type Either,
  Left,
  Right,
  isLeft,
  isRight,
  fromNullable,
  fromOption,
  fromPredicate,
  tryCatch,
  map,
  mapLeft,
  bimap,
  flatMap,
  fold,
  match,
  swap,
  getOrElse,
  getOrElseStrict,
  orElse,
  toOption,
  flatten,
  tap,
  traverse,
  sequence,
  partition,
} from "./either.js";

const parseIntStrict = (s: string): Either<string, number> =>
  /^-?\d+$/.test(s) ? Right(Number(s)) : Left(`not an integer: ${s}`);

describe("Either", () => {
  describe("constructors", () => {
    it("Right should wrap a success value", () => {
      expect(Right(42)).toEqual({ _tag: "Right", right: 42 });
    });

    it("Left should wrap an error value", () => {
      expect(Left("error")).toEqual({ _tag: "Left", left: "error" });
    });

    it("fromNullable should convert null to Left", () => {
      expect(fromNullable(null, () => "was null")).toEqual(Left("was null"));
      expect(fromNullable(42, () => "was null")).toEqual(Right(42));
    });

    it("fromOption should convert None to Left", () => {
      expect(fromOption(Some(1), () => "missing")).toEqual(Right(1));
      expect(fromOption(None, () => "missing")).toEqual(Left("missing"));
    });

    it("fromPredicate should build Left from the failing value", () => {
      expect(fromPredicate(3, (n) => n > 0, (n) => `${n} <= 0`)).toEqual(Right(3));
      expect(fromPredicate(-1, (n) => n > 0, (n) => `${n} <= 0`)).toEqual(Left("-1 <= 0"));
    });

    it("tryCatch should turn a thrown error into Left", () => {
      const ok = tryCatch(
        (): unknown => JSON.parse("[1]"),
        () => "bad json",
      );
      const bad = tryCatch(
        (): unknown => JSON.parse("{"),
        () => "bad json",
      );
      expect(ok).toEqual(Right([1]));
      expect(bad).toEqual(Left("bad json"));
    });
  });

  describe("type guards", () => {
    it("isRight and isLeft should identify the branch", () => {
      expect(isRight(Right(42))).toBe(true);
      expect(isRight(Left("error"))).toBe(false);
      expect(isLeft(Left("error"))).toBe(true);
      expect(isLeft(Right(42))).toBe(false);
    });
  });

  describe("functor", () => {
    it("map should transform Right", () => {
      expect(map(Right(2), (n: number) => n + 1)).toEqual(Right(3));
    });

    it("map should return the same Left without calling f", () => {
      let calls = 0;
      const failure: Either<string, number> = Left("boom");
      const result = map(failure, (n) => {
        calls++;
        return n + 1;
      });
      expect(result).toBe(failure);
      expect(calls).toBe(0);
    });

    it("map should satisfy the composition law", () => {
      const f = (n: number) => n * 2;
      const g = (n: number) => `#${n}`;
      const values: Either<string, number>[] = [Right(5), Left("nope")];
      for (const e of values) {
        expect(map(map(e, f), g)).toEqual(map(e, (n) => g(f(n))));
      }
    });

    it("mapLeft and bimap should transform the Left channel", () => {
      expect(mapLeft(Left("e"), (e: string) => e.toUpperCase())).toEqual(Left("E"));
      expect(mapLeft(Right(1), (e: string) => e.length)).toEqual(Right(1));
      expect(
        bimap(
          Left<string, number>("e"),
          (e) => e.length,
          (n) => n + 1,
        ),
      ).toEqual(Left(1));
    });
  });

  describe("monad", () => {
    it("flatMap should satisfy left identity", () => {
      expect(flatMap(Right<string, string>("12"), parseIntStrict)).toEqual(parseIntStrict("12"));
      expect(flatMap(Right<string, string>("x"), parseIntStrict)).toEqual(parseIntStrict("x"));
    });

    it("flatMap should satisfy right identity", () => {
      const values: Either<string, number>[] = [Right(1), Left("e")];
      for (const e of values) {
        expect(flatMap(e, (n) => Right(n))).toEqual(e);
      }
    });

    it("flatMap should propagate Left untouched", () => {
      const failure: Either<string, string> = Left("first");
      let calls = 0;
      const result = flatMap(failure, (s) => {
        calls++;
        return parseIntStrict(s);
      });
      expect(result).toBe(failure);
      expect(calls).toBe(0);
    });

    it("flatten should collapse nested Eithers", () => {
      expect(flatten(Right(Right(1)))).toEqual(Right(1));
      expect(flatten(Right(Left("inner")))).toEqual(Left("inner"));
    });
  });

  describe("elimination", () => {
    it("fold should collapse both branches", () => {
      expect(fold(parseIntStrict("7"), (e) => e, (n) => `got ${n}`)).toBe("got 7");
      expect(fold(parseIntStrict("q"), (e) => e, (n) => `got ${n}`)).toBe("not an integer: q");
    });

    it("match should use the object syntax", () => {
      expect(match(Right(1), { Left: () => "l", Right: () => "r" })).toBe("r");
    });

    it("getOrElse variants should fall back on Left", () => {
      expect(getOrElse(parseIntStrict("x"), (e) => e.length)).toBe(17);
      expect(getOrElseStrict(parseIntStrict("x"), 0)).toBe(0);
      expect(getOrElseStrict(parseIntStrict("3"), 0)).toBe(3);
    });

    it("orElse should recover from Left", () => {
      expect(orElse(parseIntStrict("x"), () => Right(0))).toEqual(Right(0));
      expect(orElse(parseIntStrict("4"), () => Right(0))).toEqual(Right(4));
    });

    it("swap and toOption should convert", () => {
      expect(swap(Right(1))).toEqual(Left(1));
      expect(toOption(Right(1))).toEqual(Some(1));
      expect(toOption(Left("e"))).toBe(None);
    });

    it("tap should run only on Right", () => {
      const seen: number[] = [];
      tap(Right(1), (n: number) => seen.push(n));
      tap(Left<string, number>("e"), (n) => seen.push(n));
      expect(seen).toEqual([1]);
    });
  });

  describe("sequence", () => {
    it("should wrap an empty collection in Right", () => {
      expect(sequence([])).toEqual(Right([]));
    });

    it("should collect Right payloads in order", () => {
      expect(sequence([Right(1), Right(2)])).toEqual(Right([1, 2]));
    });

    it("should return the first Left", () => {
      expect(sequence<string, number>([Right(1), Left("x"), Right(2)])).toEqual(Left("x"));
      expect(sequence<string, number>([Left("x"), Right(1)])).toEqual(Left("x"));
      expect(sequence<string, number>([Right(1), Left("first"), Left("second")])).toEqual(
        Left("first"),
      );
    });

    it("should stop pulling items after the first Left", () => {
      const pulled: number[] = [];
      function* items(): Generator<Either<string, number>> {
        for (const n of [1, 2, 3, 4]) {
          pulled.push(n);
          yield n === 2 ? Left(`bad ${n}`) : Right(n);
        }
      }
      expect(sequence(items())).toEqual(Left("bad 2"));
      expect(pulled).toEqual([1, 2]);
    });

    it("traverse should apply f lazily and stop at the first Left", () => {
      const seen: string[] = [];
      const result = traverse(["1", "2", "x", "4"], (s) => {
        seen.push(s);
        return parseIntStrict(s);
      });
      expect(result).toEqual(Left("not an integer: x"));
      expect(seen).toEqual(["1", "2", "x"]);
    });
  });

  describe("partition", () => {
    it("should split Left and Right payloads", () => {
      expect(partition(["1", "a", "2"], parseIntStrict)).toEqual({
        lefts: ["not an integer: a"],
        rights: [1, 2],
      });
    });
  });
});
