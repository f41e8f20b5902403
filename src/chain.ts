// chain.ts
import type { ErrorHandler } from "./config.js";
import type { Matcher, Pattern, Tagged, TypeTest } from "./matcher.js";

type Step<T, R> = (
  m: Matcher<T, R>,
) => Matcher<T, R> | PromiseLike<Matcher<T, R>>;

/**
 * The rest of a match chain after an async clause.
 *
 * Each clause runs only once the one before it has settled, so sync and async
 * clauses can be mixed freely and the whole chain awaited once:
 *
 * ```ts
 * const ok = await match<string, boolean>("Hello")
 *   .case_async(starts_with("H"), async () => true)
 *   .default_async(() => false);
 * ```
 *
 * Awaiting the chain itself yields the matcher.
 */
export class MatchChain<T, R> implements PromiseLike<Matcher<T, R>> {
  private readonly pending: Promise<Matcher<T, R>>;

  constructor(pending: PromiseLike<Matcher<T, R>>) {
    this.pending = Promise.resolve(pending);
  }

  private step(next: Step<T, R>): MatchChain<T, R> {
    return new MatchChain(this.pending.then(next));
  }

  case(
    pattern: Pattern<T>,
    produce: () => R,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): MatchChain<T, R> {
    return this.step((m) => m.case(pattern, produce, label, on_error));
  }

  case_effect(
    pattern: Pattern<T>,
    effect: () => void,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): MatchChain<T, R> {
    return this.step((m) => m.case_effect(pattern, effect, label, on_error));
  }

  case_type<S extends T>(
    type: TypeTest<T, S>,
    produce: (value: S) => R,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): MatchChain<T, R> {
    return this.step((m) => m.case_type(type, produce, label, on_error));
  }

  case_tag<K extends keyof NonNullable<T> & string, V extends NonNullable<T>[K]>(
    key: K,
    tag: V,
    produce: (value: Tagged<T, K, V>) => R,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): MatchChain<T, R> {
    return this.step((m) => m.case_tag(key, tag, produce, label, on_error));
  }

  case_regex(
    pattern: string | RegExp,
    produce: (m: RegExpExecArray) => R,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): MatchChain<T, R> {
    return this.step((m) => m.case_regex(pattern, produce, label, on_error));
  }

  case_async(
    pattern: Pattern<T>,
    produce: () => R | PromiseLike<R>,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): MatchChain<T, R> {
    return this.step((m) => m.case_async(pattern, produce, label, on_error));
  }

  case_effect_async(
    pattern: Pattern<T>,
    effect: () => void | PromiseLike<void>,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): MatchChain<T, R> {
    return this.step((m) =>
      m.case_effect_async(pattern, effect, label, on_error),
    );
  }

  case_type_async<S extends T>(
    type: TypeTest<T, S>,
    produce: (value: S) => R | PromiseLike<R>,
    label?: string,
    on_error?: ErrorHandler<T>,
  ): MatchChain<T, R> {
    return this.step((m) => m.case_type_async(type, produce, label, on_error));
  }

  default(produce: () => R, label?: string): Promise<R | undefined> {
    return this.pending.then((m) => m.default(produce, label));
  }

  default_effect(effect: () => void, label?: string): Promise<void> {
    return this.pending.then((m) => m.default_effect(effect, label));
  }

  default_async(
    produce: () => R | PromiseLike<R>,
    label?: string,
  ): Promise<R | undefined> {
    return this.pending.then((m) => m.default_async(produce, label));
  }

  default_effect_async(
    effect: () => void | PromiseLike<void>,
    label?: string,
  ): Promise<void> {
    return this.pending.then((m) => m.default_effect_async(effect, label));
  }

  then<A = Matcher<T, R>, B = never>(
    onfulfilled?: ((matcher: Matcher<T, R>) => A | PromiseLike<A>) | null,
    onrejected?: ((reason: unknown) => B | PromiseLike<B>) | null,
  ): Promise<A | B> {
    return this.pending.then(onfulfilled, onrejected);
  }
}
