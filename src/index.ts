// index.ts
export { match, Matcher } from "./matcher.js";
export type {
  Constructor,
  Pattern,
  Tagged,
  TypeGuard,
  TypeTest,
} from "./matcher.js";
export { MatchChain } from "./chain.js";

export type {
  ErrorHandler,
  MatchOptions,
  UnhandledPolicy,
} from "./config.js";
export { ENV_ON_UNHANDLED, ENV_TRACE, resolve_options } from "./config.js";

export {
  ClauseEvaluationError,
  InvalidConfigError,
  MatchError,
  UnmatchedValueError,
  is_match_error,
} from "./errors.js";
export type { AnyMatchError, ClausePhase } from "./errors.js";

export { describe_entry } from "./log.js";
export type { ClauseKind, LogOutcome, MatchLogEntry } from "./log.js";

export { create_logger, silent_logger } from "./logger.js";
export type { MatchLogger } from "./logger.js";

export {
  contains,
  ends_with,
  equals,
  greater_than,
  in_enum,
  in_range,
  is_false,
  is_nil,
  is_one_of,
  is_present,
  is_true,
  labeled,
  less_than,
  matches,
  starts_with,
} from "./predicates.js";
export type { Predicate } from "./predicates.js";

export {
  match_null,
  match_type,
  match_value,
  match_when,
  switch_async,
  switch_many,
} from "./shortcuts.js";
export type { PredicateCase, TypeCase, ValueCase } from "./shortcuts.js";
