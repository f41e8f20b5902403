// predicates.ts
import isEqual from "fast-deep-equal";

type Nil = null | undefined;

/**
 * A clause test. `label`, when present, is what the matcher logs if the
 * clause itself was given none.
 */
export type Predicate<T> = ((value: T) => boolean) & { label?: string };

export function labeled<T>(
  label: string,
  test: (value: T) => boolean,
): Predicate<T> {
  return Object.assign((value: T) => test(value), { label });
}

/* =============================
 * Equality & membership
 * ============================= */

export function equals<T>(expected: T): Predicate<T> {
  return labeled(`==${String(expected)}`, (v) => isEqual(v, expected));
}

export function is_one_of<T>(values: Iterable<T>): Predicate<T> {
  const list = [...values];
  const fast = new Set(list);
  return labeled(
    `in [${list.map(String).join(", ")}]`,
    (v) => fast.has(v) || list.some((x) => isEqual(x, v)),
  );
}

type EnumLike = Record<string, string | number>;

/** Membership in a TypeScript `enum` object; reverse-mapping keys are ignored. */
export function in_enum<E extends EnumLike>(
  enum_object: E,
): Predicate<unknown> {
  const members = new Set<unknown>(
    Object.entries(enum_object)
      .filter(([k]) => Number.isNaN(Number(k)))
      .map(([, v]) => v),
  );
  return labeled(`in enum [${[...members].map(String).join(", ")}]`, (v) =>
    members.has(v),
  );
}

export const is_nil: Predicate<unknown> = labeled("Nil", (v) => v == null);

export const is_present: Predicate<unknown> = labeled(
  "Present",
  (v) => v != null,
);

export const is_true: Predicate<boolean | Nil> = labeled(
  "True",
  (v) => v === true,
);

export const is_false: Predicate<boolean | Nil> = labeled(
  "False",
  (v) => v === false,
);

/* =============================
 * Numeric
 * ============================= */

/** Inclusive on both ends. */
export function in_range(min: number, max: number): Predicate<number | Nil> {
  return labeled(`${min}..${max}`, (v) => v != null && v >= min && v <= max);
}

export function greater_than(n: number): Predicate<number | Nil> {
  return labeled(`>${n}`, (v) => v != null && v > n);
}

export function less_than(n: number): Predicate<number | Nil> {
  return labeled(`<${n}`, (v) => v != null && v < n);
}

/* =============================
 * Strings
 * ============================= */

export function contains(part: string): Predicate<string | Nil> {
  return labeled(`contains ${JSON.stringify(part)}`, (s) =>
    s != null && s.includes(part),
  );
}

export function starts_with(prefix: string): Predicate<string | Nil> {
  return labeled(`starts with ${JSON.stringify(prefix)}`, (s) =>
    s != null && s.startsWith(prefix),
  );
}

export function ends_with(suffix: string): Predicate<string | Nil> {
  return labeled(`ends with ${JSON.stringify(suffix)}`, (s) =>
    s != null && s.endsWith(suffix),
  );
}

/** Drops `g`/`y` so repeated tests never depend on `lastIndex`. */
export function stateless(pattern: string | RegExp): RegExp {
  if (typeof pattern === "string") return new RegExp(pattern);
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
}

export function matches(pattern: string | RegExp): Predicate<string | Nil> {
  const re = stateless(pattern);
  return labeled(`Regex: ${re.source}`, (s) => s != null && re.test(s));
}
