// log.ts
import { describe_value, type ClauseEvaluationError } from "./errors.js";

export type ClauseKind = "case" | "default";

export type LogOutcome<R> =
  | { readonly kind: "result"; readonly result: R }
  | { readonly kind: "effect" }
  | { readonly kind: "error"; readonly error: ClauseEvaluationError };

/** Body outcomes; errors are only ever logged, never produced by a body. */
export type Outcome<R> = Exclude<LogOutcome<R>, { kind: "error" }>;

export type MatchLogEntry<T, R> = {
  readonly index: number;
  readonly timestamp: Date;
  readonly label: string;
  readonly clause: ClauseKind;
  readonly subject: T;
} & LogOutcome<R>;

export function log_entry<T, R>(
  index: number,
  label: string,
  clause: ClauseKind,
  subject: T,
  outcome: LogOutcome<R>,
): MatchLogEntry<T, R> {
  return Object.freeze({
    index,
    timestamp: new Date(),
    label,
    clause,
    subject,
    ...outcome,
  });
}

export function describe_entry(entry: MatchLogEntry<unknown, unknown>): string {
  const head = `#${entry.index} ${entry.clause}:${entry.label}`;
  switch (entry.kind) {
    case "result":
      return `${head} -> ${show(entry.result)}`;
    case "effect":
      return `${head} -> (effect)`;
    case "error":
      return `${head} !! ${entry.error.message}`;
  }
}

function show(value: unknown): string {
  return typeof value === "string" ? value : describe_value(value);
}
