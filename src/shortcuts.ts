// shortcuts.ts
import type { MatchOptions } from "./config.js";
import { UnmatchedValueError } from "./errors.js";
import { match, type Constructor, type Matcher } from "./matcher.js";
import type { Predicate } from "./predicates.js";

type Nil = null | undefined;

export type ValueCase<T, R> = readonly [when: T, then: () => R];
export type PredicateCase<T, R> = readonly [when: Predicate<T>, then: () => R];
export type TypeCase<T, R> = readonly [
  when: Constructor<unknown>,
  then: (value: T) => R,
];

/**
 * Decides on `matched`, not on the result, so a case that produces
 * `undefined` still counts as a match.
 */
function settle<T, R>(m: Matcher<T, R>): R {
  if (m.matched) {
    for (const r of m.all_results) return r;
  }
  throw new UnmatchedValueError(m.subject);
}

/** switch/case over literals (structural equality). */
export function match_value<T, R>(
  subject: T,
  ...cases: ValueCase<T, R>[]
): R {
  const m = match<T, R>(subject);
  for (const [when, then] of cases) m.case(when, then);
  return settle(m);
}

export function match_when<T, R>(
  subject: T,
  ...cases: PredicateCase<T, R>[]
): R {
  const m = match<T, R>(subject);
  for (const [when, then] of cases) m.case(when, then);
  return settle(m);
}

/** First case whose class the subject is an instance of. */
export function match_type<T, R>(
  subject: T,
  ...cases: TypeCase<T, R>[]
): R {
  const m = match<T, R>(subject);
  for (const [when, then] of cases) {
    m.case((v) => v instanceof when, () => then(subject), when.name);
  }
  return settle(m);
}

export function match_null<T, R>(
  subject: T | Nil,
  when_null: () => R,
  when_present: (value: T) => R,
): R {
  return subject == null ? when_null() : when_present(subject);
}

/**
 * Runs `configure` against a fresh multi-result matcher per item and yields
 * every result, item by item. Lazy: nothing is matched until iterated.
 */
export function* switch_many<T, R>(
  items: Iterable<T>,
  configure: (m: Matcher<T, R>) => unknown,
  options: Omit<MatchOptions<T>, "short_circuit"> = {},
): Generator<R, void, undefined> {
  for (const item of items) {
    const m = match<T, R>(item, { ...options, short_circuit: false });
    configure(m);
    yield* m.all_results;
  }
}

export async function switch_async<T, R>(
  subject: T,
  configure: (m: Matcher<T, R>) => PromiseLike<Matcher<T, R>> | Matcher<T, R>,
  options?: MatchOptions<T>,
): Promise<Matcher<T, R>> {
  return configure(match<T, R>(subject, options));
}
