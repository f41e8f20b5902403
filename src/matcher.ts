// matcher.ts
import isEqual from "fast-deep-equal";
import { MatchChain } from "./chain.js";
import {
  resolve_options,
  type ErrorHandler,
  type MatchOptions,
  type ResolvedOptions,
} from "./config.js";
import { ClauseEvaluationError, type ClausePhase } from "./errors.js";
import {
  describe_entry,
  log_entry,
  type ClauseKind,
  type LogOutcome,
  type MatchLogEntry,
  type Outcome,
} from "./log.js";
import { stateless, type Predicate } from "./predicates.js";

/** A literal (compared structurally) or a predicate. */
export type Pattern<T> = T | Predicate<T>;

export type Constructor<S> = abstract new (...args: never[]) => S;

export interface TypeGuard<T, S extends T> {
  readonly name: string;
  test(value: T): value is S;
}

/** A class (checked with `instanceof`) or a named guard. */
export type TypeTest<T, S extends T> = Constructor<S> | TypeGuard<T, S>;

export type Tagged<T, K extends PropertyKey, V> = Extract<
  NonNullable<T>,
  Record<K, V>
>;

/* =============================
 * Selection
 * ============================= */

const NO_MATCH: unique symbol = Symbol("no-match");

type Selector<T, S> = (subject: T) => S | typeof NO_MATCH;

function is_predicate<T>(pattern: Pattern<T>): pattern is Predicate<T> {
  return typeof pattern === "function";
}

function select<T>(pattern: Pattern<T>): Selector<T, T> {
  if (is_predicate(pattern)) {
    const test = pattern;
    return (v) => (test(v) ? v : NO_MATCH);
  }
  const literal = pattern;
  return (v) => (isEqual(v, literal) ? v : NO_MATCH);
}

function label_of<T>(pattern: Pattern<T>, fallback: string): string {
  return (is_predicate(pattern) ? pattern.label : undefined) ?? fallback;
}

function is_constructor<T, S extends T>(
  type: TypeTest<T, S>,
): type is Constructor<S> {
  return typeof type === "function";
}

function guard_of<T, S extends T>(type: TypeTest<T, S>): Selector<T, S> {
  if (is_constructor(type)) {
    const ctor = type;
    return (v) => (v instanceof ctor ? v : NO_MATCH);
  }
  const guard = type;
  return (v) => (guard.test(v) ? v : NO_MATCH);
}

function has_tag<T, K extends keyof NonNullable<T>, V>(
  value: T,
  key: K,
  tag: V,
): value is Tagged<T, K, V> {
  return value != null && isEqual(value[key], tag);
}

const produced = <R>(result: R): Outcome<R> => ({ kind: "result", result });

const EFFECT = { kind: "effect" } as const;

/* =============================
 * Matcher
 * ============================= */

/**
 * One matching session over `subject`.
 *
 * Clauses are evaluated as they are declared. With `short_circuit` (the
 * default) the first satisfied clause wins and every later clause is skipped
 * without being evaluated or logged; otherwise every satisfied clause adds to
 * `all_results`.
 *
 * A predicate or body that throws never aborts the chain: it is logged as an
 * error entry and offered to the clause handler, then the session handler.
 * What happens to an error neither claims is `on_unhandled`.
 *
 * @example
 * ```ts
 * const size = match<number, string>(42)
 *   .case(1, () => "One")
 *   .case(in_range(10, 100), () => "Big range")
 *   .default(() => "Other");
 * ```
 */
export class Matcher<T, R> {
  readonly subject: T;

  private readonly options: ResolvedOptions<T>;
  private _matched = false;
  private _result: R | undefined = undefined;
  private readonly _all_results: R[] = [];
  private readonly _log: MatchLogEntry<T, R>[] = [];

  constructor(subject: T, options?: MatchOptions<T>) {
    this.subject = subject;
    this.options = resolve_options(options);
  }

  get short_circuit(): boolean {
    return this.options.short_circuit;
  }

  /** True once any clause or the default succeeded. */
  get matched(): boolean {
    return this._matched;
  }

  /** Result of the most recent result-producing clause. */
  get result(): R | undefined {
    return this._result;
  }

  get all_results(): readonly R[] {
    return this._all_results;
  }

  get log(): readonly MatchLogEntry<T, R>[] {
    return this._log;
  }

  value_or<F>(fallback: F): R | F {
    const r = this._result;
    return r === undefined ? fallback : r;
  }

  value_or_else<F>(fallback: () => F): R | F {
    const r = this._result;
    return r === undefined ? fallback() : r;
  }

  /* ----- sync cases ----- */

  case(
    pattern: Pattern<T>,
    produce: () => R,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): this {
    return this.evaluate(
      select(pattern),
      () => produced(produce()),
      label ?? label_of(pattern, "Case"),
      on_error,
    );
  }

  case_effect(
    pattern: Pattern<T>,
    effect: () => void,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): this {
    return this.evaluate(
      select(pattern),
      () => {
        effect();
        return EFFECT;
      },
      label ?? label_of(pattern, "Case"),
      on_error,
    );
  }

  case_type<S extends T>(
    type: TypeTest<T, S>,
    produce: (value: S) => R,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): this {
    return this.evaluate(
      guard_of(type),
      (v) => produced(produce(v)),
      label ?? type.name,
      on_error,
    );
  }

  /** Discriminated-union case: `subject[key]` equals `tag`. */
  case_tag<K extends keyof NonNullable<T> & string, V extends NonNullable<T>[K]>(
    key: K,
    tag: V,
    produce: (value: Tagged<T, K, V>) => R,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): this {
    return this.evaluate(
      (v) => (has_tag(v, key, tag) ? v : NO_MATCH),
      (v) => produced(produce(v)),
      label ?? `${key}=${String(tag)}`,
      on_error,
    );
  }

  /** Matches string subjects only; `produce` gets the match array. */
  case_regex(
    pattern: string | RegExp,
    produce: (m: RegExpExecArray) => R,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): this {
    const re = stateless(pattern);
    return this.evaluate(
      (v) => (typeof v === "string" ? (re.exec(v) ?? NO_MATCH) : NO_MATCH),
      (m) => produced(produce(m)),
      label ?? `Regex: ${re.source}`,
      on_error,
    );
  }

  /* ----- async cases ----- */

  case_async(
    pattern: Pattern<T>,
    produce: () => R | PromiseLike<R>,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): MatchChain<T, R> {
    return new MatchChain(
      this.evaluate_async(
        select(pattern),
        async () => produced(await produce()),
        label ?? label_of(pattern, "CaseAsync"),
        on_error,
      ),
    );
  }

  case_effect_async(
    pattern: Pattern<T>,
    effect: () => void | PromiseLike<void>,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): MatchChain<T, R> {
    return new MatchChain(
      this.evaluate_async(
        select(pattern),
        async () => {
          await effect();
          return EFFECT;
        },
        label ?? label_of(pattern, "CaseAsync"),
        on_error,
      ),
    );
  }

  case_type_async<S extends T>(
    type: TypeTest<T, S>,
    produce: (value: S) => R | PromiseLike<R>,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): MatchChain<T, R> {
    return new MatchChain(
      this.evaluate_async(
        guard_of(type),
        async (v) => produced(await produce(v)),
        label ?? type.name,
        on_error,
      ),
    );
  }

  /* ----- defaults ----- */

  /** Runs only when nothing matched; otherwise returns the existing result. */
  default(produce: () => R, label = "Default"): R | undefined {
    if (this._matched) return this._result;
    this.trace(this.record("default", label, produced(produce())));
    return this._result;
  }

  default_effect(effect: () => void, label = "Default"): void {
    if (this._matched) return;
    effect();
    this.trace(this.record("default", label, EFFECT));
  }

  async default_async(
    produce: () => R | PromiseLike<R>,
    label = "DefaultAsync",
  ): Promise<R | undefined> {
    if (this._matched) return this._result;
    this.trace(this.record("default", label, produced(await produce())));
    return this._result;
  }

  async default_effect_async(
    effect: () => void | PromiseLike<void>,
    label = "DefaultAsync",
  ): Promise<void> {
    if (this._matched) return;
    await effect();
    this.trace(this.record("default", label, EFFECT));
  }

  /* ----- evaluation ----- */

  private get settled(): boolean {
    return this._matched && this.options.short_circuit;
  }

  private evaluate<S>(
    selector: Selector<T, S>,
    run: (selected: S) => Outcome<R>,
    label: string,
    on_error: ErrorHandler<T> | undefined,
  ): this {
    if (this.settled) return this;
    let phase: ClausePhase = "predicate";
    let outcome: Outcome<R>;
    try {
      const selected = selector(this.subject);
      if (selected === NO_MATCH) return this;
      phase = "body";
      outcome = run(selected);
    } catch (error) {
      this.fail(error, phase, label, on_error);
      return this;
    }
    this.trace(this.record("case", label, outcome));
    return this;
  }

  private async evaluate_async<S>(
    selector: Selector<T, S>,
    run: (selected: S) => Promise<Outcome<R>>,
    label: string,
    on_error: ErrorHandler<T> | undefined,
  ): Promise<this> {
    if (this.settled) return this;
    let phase: ClausePhase = "predicate";
    let outcome: Outcome<R>;
    try {
      const selected = selector(this.subject);
      if (selected === NO_MATCH) return this;
      phase = "body";
      outcome = await run(selected);
    } catch (error) {
      this.fail(error, phase, label, on_error);
      return this;
    }
    this.trace(this.record("case", label, outcome));
    return this;
  }

  /** Commits a successful clause; tracing is left to the caller. */
  private record(
    clause: ClauseKind,
    label: string,
    outcome: Outcome<R>,
  ): MatchLogEntry<T, R> {
    if (outcome.kind === "result") {
      this._result = outcome.result;
      this._all_results.push(outcome.result);
    }
    this._matched = true;
    return this.append(label, clause, outcome);
  }

  private trace(entry: MatchLogEntry<T, R>) {
    this.options.logger.debug(describe_entry(entry));
  }

  private fail(
    cause: unknown,
    phase: ClausePhase,
    label: string,
    on_error: ErrorHandler<T> | undefined,
  ) {
    const error = new ClauseEvaluationError(label, phase, this.subject, cause);
    const entry = this.append(label, "case", { kind: "error", error });

    const handled =
      (on_error?.(cause, this.subject) ?? false) ||
      (this.options.on_error?.(cause, this.subject) ?? false);
    if (handled) return;

    if (this.options.on_unhandled === "rethrow") throw error;
    this.options.logger.warn(describe_entry(entry));
  }

  private append(
    label: string,
    clause: ClauseKind,
    outcome: LogOutcome<R>,
  ): MatchLogEntry<T, R> {
    const entry = log_entry(
      this._log.length,
      label,
      clause,
      this.subject,
      outcome,
    );
    this._log.push(entry);
    return entry;
  }
}

/** Starts a matcher over `subject`. */
export function match<T, R = unknown>(
  subject: T,
  options?: MatchOptions<T>,
): Matcher<T, R> {
  return new Matcher<T, R>(subject, options);
}
