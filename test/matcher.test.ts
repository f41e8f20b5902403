import { describe, expect, it, vi } from "vitest";
import {
  contains,
  ends_with,
  equals,
  greater_than,
  in_range,
  is_nil,
  less_than,
  match,
  starts_with,
  type MatchLogger,
  type TypeGuard,
} from "../src/index.js";

abstract class Shape {}
class Circle extends Shape {
  constructor(readonly r: number) {
    super();
  }
}
class Square extends Shape {
  constructor(readonly side: number) {
    super();
  }
}

type UiEvent = { kind: "click"; x: number } | { kind: "scroll"; y: number };

describe("matcher - value and predicate cases", () => {
  it("returns the first satisfied clause", () => {
    const m = match<number, string>(42);
    const out = m
      .case(1, () => "One")
      .case(in_range(10, 100), () => "Big range")
      .default(() => "Other");

    expect(out).toBe("Big range");
    expect(m.result).toBe("Big range");
    expect(m.matched).toBe(true);
    expect(m.log).toHaveLength(1);
    expect(m.log[0]).toMatchObject({
      index: 0,
      label: "10..100",
      clause: "case",
      subject: 42,
      kind: "result",
      result: "Big range",
    });
    expect(m.log[0]?.timestamp).toBeInstanceOf(Date);
  });

  it("matches literals", () => {
    const out = match<number, string>(5)
      .case(3, () => "Three")
      .case(5, () => "Five")
      .default(() => "Other");
    expect(out).toBe("Five");
  });

  it("compares object literals structurally", () => {
    const m = match<{ x: number }, string>({ x: 1 })
      .case({ x: 2 }, () => "two")
      .case({ x: 1 }, () => "one");
    expect(m.result).toBe("one");
  });

  it("lets the first true predicate win even when a later one is true", () => {
    const m = match<string, string>("foobar");
    const out = m
      .case(contains("foo"), () => "Contains foo")
      .case(starts_with("bar"), () => "Starts with bar")
      .case(ends_with("ar"), () => "Ends with ar")
      .default(() => "No match");

    expect(out).toBe("Contains foo");
    expect(m.log).toHaveLength(1);
  });

  it("uses the explicit label, then the predicate label", () => {
    const m = match<number, string>(42, { short_circuit: false })
      .case((x) => x > 10, () => "Big", "BigMatch")
      .case(greater_than(40), () => "Bigger");
    expect(m.log.map((e) => e.label)).toEqual(["BigMatch", ">40"]);
  });

  it("matches a null subject like any other value", () => {
    const m = match<string | null, string>(null)
      .case(contains("x"), () => "has x")
      .case(is_nil, () => "nil");
    expect(m.result).toBe("nil");
    expect(m.log[0]?.label).toBe("Nil");
  });
});

describe("matcher - short-circuit", () => {
  it("skips every case after the first match without evaluating it", () => {
    const later = vi.fn((_: number) => true);
    const m = match<number, string>(1)
      .case(1, () => "one")
      .case(later, () => "later")
      .case(1, () => "again");

    expect(later).not.toHaveBeenCalled();
    expect(m.log).toHaveLength(1);
    expect(m.all_results).toEqual(["one"]);
  });

  it("logs nothing for a case whose predicate is false", () => {
    const m = match<number, string>(1).case(2, () => "two");
    expect(m.log).toHaveLength(0);
    expect(m.matched).toBe(false);
    expect(m.result).toBeUndefined();
  });
});

describe("matcher - multi-result", () => {
  it("collects every satisfied clause in order", () => {
    const m = match<number, string>(6, { short_circuit: false })
      .case(greater_than(1), () => "gt1")
      .case((n) => n % 2 === 0, () => "even")
      .case(less_than(3), () => "lt3")
      .case(equals(6), () => "six");

    expect(m.short_circuit).toBe(false);
    expect(m.all_results).toEqual(["gt1", "even", "six"]);
    expect(m.result).toBe("six");
    expect(m.log.map((e) => e.label)).toEqual([">1", "Case", "==6"]);
    expect(m.log.map((e) => e.index)).toEqual([0, 1, 2]);
  });

  it("skips the default once anything matched", () => {
    const fallback = vi.fn(() => "none");
    const m = match<number, string>(6, { short_circuit: false }).case(
      6,
      () => "six",
    );
    expect(m.default(fallback)).toBe("six");
    expect(fallback).not.toHaveBeenCalled();
    expect(m.log).toHaveLength(1);
  });
});

describe("matcher - defaults", () => {
  it("runs when nothing matched and is logged as a default", () => {
    const m = match<number, string>(7).case(1, () => "one");
    expect(m.default(() => "Other")).toBe("Other");
    expect(m.matched).toBe(true);
    expect(m.all_results).toEqual(["Other"]);
    expect(m.log[0]).toMatchObject({
      index: 0,
      label: "Default",
      clause: "default",
      kind: "result",
      result: "Other",
    });
  });

  it("returns the existing result without running once matched", () => {
    const fallback = vi.fn(() => "Other");
    const m = match<number, string>(1).case(1, () => "one");
    expect(m.default(fallback, "Fallback")).toBe("one");
    expect(fallback).not.toHaveBeenCalled();
    expect(m.log).toHaveLength(1);
  });

  it("runs a side-effecting default", () => {
    const seen: number[] = [];
    const m = match<number, string>(3);
    m.default_effect(() => seen.push(m.subject), "Record");
    expect(seen).toEqual([3]);
    expect(m.result).toBeUndefined();
    expect(m.log[0]).toMatchObject({ kind: "effect", label: "Record" });
  });

  it("skips a side-effecting default once matched", () => {
    const effect = vi.fn();
    const m = match<number, string>(1).case(1, () => "one");
    m.default_effect(effect);
    expect(effect).not.toHaveBeenCalled();
    expect(m.log).toHaveLength(1);
    expect(m.result).toBe("one");
  });

  it("value_or falls back only without a result", () => {
    expect(match<number, string>(1).case(1, () => "one").value_or("x")).toBe(
      "one",
    );
    expect(match<number, string>(2).case(1, () => "one").value_or("x")).toBe(
      "x",
    );
    expect(
      match<number, string>(2).value_or_else(() => "lazy"),
    ).toBe("lazy");
  });
});

describe("matcher - side-effecting cases", () => {
  it("records the match without a result", () => {
    const calls: string[] = [];
    const m = match<number, string>(2)
      .case_effect(2, () => {
        calls.push("two");
      })
      .case(2, () => "never");

    expect(calls).toEqual(["two"]);
    expect(m.matched).toBe(true);
    expect(m.result).toBeUndefined();
    expect(m.all_results).toEqual([]);
    expect(m.log[0]).toMatchObject({ kind: "effect", label: "Case" });
    expect(m.default(() => "Other")).toBeUndefined();
  });
});

describe("matcher - type, tag and regex cases", () => {
  it("narrows by class", () => {
    const m = match<Shape, number>(new Square(3))
      .case_type(Circle, (c) => c.r)
      .case_type(Square, (s) => s.side * s.side);
    expect(m.result).toBe(9);
    expect(m.log[0]?.label).toBe("Square");
  });

  it("narrows by a named guard", () => {
    const is_string: TypeGuard<unknown, string> = {
      name: "string",
      test: (v): v is string => typeof v === "string",
    };
    const m = match<unknown, number>("abc").case_type(is_string, (s) =>
      s.length,
    );
    expect(m.result).toBe(3);
    expect(m.log[0]?.label).toBe("string");
  });

  it("narrows a tagged union by its discriminant", () => {
    const ev: UiEvent = { kind: "scroll", y: 7 };
    const m = match<UiEvent, string>(ev)
      .case_tag("kind", "click", (e) => `click ${e.x}`)
      .case_tag("kind", "scroll", (e) => `scroll ${e.y}`);
    expect(m.result).toBe("scroll 7");
    expect(m.log[0]?.label).toBe("kind=scroll");
  });

  it("passes the regex match to the body", () => {
    const m = match<string, string>("order-1234").case_regex(
      /order-(\d+)/g,
      (found) => found[1] ?? "",
    );
    expect(m.result).toBe("1234");
    expect(m.log[0]?.label).toBe("Regex: order-(\\d+)");
  });

  it("never matches a regex against a non-string", () => {
    const m = match<unknown, string>(5).case_regex("5", () => "five");
    expect(m.matched).toBe(false);
  });
});

describe("matcher - log", () => {
  it("freezes entries", () => {
    const m = match<number, string>(1).case(1, () => "one");
    expect(Object.isFrozen(m.log[0])).toBe(true);
  });
});

describe("matcher - results without a prototype", () => {
  const bare = (): Record<string, number> => Object.create(null);

  it("returns them from a default", () => {
    const dict = bare();
    const m = match<number, Record<string, number>>(1);
    expect(m.default(() => dict)).toBe(dict);
    expect(m.log.map((e) => e.kind)).toEqual(["result"]);
  });

  it("logs a single result entry for the case", () => {
    const dict = bare();
    const m = match<number, Record<string, number>>(1)
      .case(1, () => dict)
      .case(1, () => dict);

    expect(m.matched).toBe(true);
    expect(m.log.map((e) => e.kind)).toEqual(["result"]);
    expect(m.all_results).toHaveLength(1);
    expect(m.all_results[0]).toBe(dict);
  });

  it("traces them under the rethrow policy", async () => {
    const debug = vi.fn();
    const logger: MatchLogger = {
      debug,
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      at: () => logger,
    };
    const m = match<number, Record<string, number>>(1, {
      on_unhandled: "rethrow",
      logger,
    });

    expect(() => m.case(1, () => bare())).not.toThrow();
    expect(debug).toHaveBeenCalledWith("#0 case:Case -> {}");

    const dict = bare();
    const other = match<number, Record<string, number>>(2, { logger });
    await expect(other.default_async(async () => dict)).resolves.toBe(dict);
    expect(debug).toHaveBeenLastCalledWith("#0 default:DefaultAsync -> {}");
  });
});
