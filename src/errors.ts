// errors.ts

/**
 * Base class for the errors this package raises.
 * `_tag` is the discriminator; narrow with `is_match_error` then switch on it.
 */
export abstract class MatchError extends Error {
  abstract readonly _tag: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);

    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;

    if (options?.cause instanceof Error) {
      this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
    }
  }
}

export type ClausePhase = "predicate" | "body";

/** A clause's predicate or body threw. Never escapes a `case` call unless the matcher rethrows. */
export class ClauseEvaluationError extends MatchError {
  readonly _tag = "ClauseEvaluationError" as const;

  constructor(
    readonly label: string,
    readonly phase: ClausePhase,
    readonly subject: unknown,
    cause: unknown,
  ) {
    super(`clause "${label}" failed in ${phase}: ${describe_value(cause)}`, {
      cause,
    });
  }
}

/** Raised by the shortcut functions when no case matched. */
export class UnmatchedValueError extends MatchError {
  readonly _tag = "UnmatchedValueError" as const;

  constructor(readonly subject: unknown) {
    super(`no case matched value: ${describe_value(subject)}`);
  }
}

export class InvalidConfigError extends MatchError {
  readonly _tag = "InvalidConfigError" as const;

  constructor(
    readonly key: string,
    readonly value: string,
    readonly expected: readonly string[],
  ) {
    super(
      `${key}=${JSON.stringify(value)} is not one of: ${expected.join(", ")}`,
    );
  }
}

export type AnyMatchError =
  | ClauseEvaluationError
  | UnmatchedValueError
  | InvalidConfigError;

export function is_match_error(value: unknown): value is AnyMatchError {
  return value instanceof MatchError;
}

/** Renders any value for a message; never throws. */
export function describe_value(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "object" && value !== null) {
    return to_json(value) ?? Object.prototype.toString.call(value);
  }
  return String(value);
}

function to_json(value: object): string | undefined {
  try {
    // undefined when toJSON yields nothing
    const json: string | undefined = JSON.stringify(value);
    return json;
  } catch {
    return undefined;
  }
}
