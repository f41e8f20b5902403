// config.ts
import { InvalidConfigError } from "./errors.js";
import { create_logger, silent_logger, type MatchLogger } from "./logger.js";

/** Returns true when the error is handled and needs no further handling. */
export type ErrorHandler<T> = (error: unknown, subject: T) => boolean;

/**
 * What happens to a clause error no handler claimed.
 * `swallow` keeps the chain going and leaves the error in the log only.
 */
export type UnhandledPolicy = "swallow" | "rethrow";

export interface MatchOptions<T> {
  /** Stop at the first satisfied clause. Defaults to true. */
  short_circuit?: boolean;
  /** Session-wide fallback for clause errors. */
  on_error?: ErrorHandler<T>;
  on_unhandled?: UnhandledPolicy;
  logger?: MatchLogger;
}

export interface ResolvedOptions<T> {
  short_circuit: boolean;
  on_error: ErrorHandler<T> | undefined;
  on_unhandled: UnhandledPolicy;
  logger: MatchLogger;
}

export const ENV_ON_UNHANDLED = "FLUENT_MATCH_ON_UNHANDLED";
export const ENV_TRACE = "FLUENT_MATCH_TRACE";

const POLICIES: readonly UnhandledPolicy[] = ["swallow", "rethrow"];

function is_policy(value: string): value is UnhandledPolicy {
  return POLICIES.some((p) => p === value);
}

function env_policy(env: NodeJS.ProcessEnv): UnhandledPolicy {
  const raw = env[ENV_ON_UNHANDLED]?.trim().toLowerCase();
  if (raw == null || raw === "") return "swallow";
  if (!is_policy(raw)) {
    throw new InvalidConfigError(ENV_ON_UNHANDLED, raw, POLICIES);
  }
  return raw;
}

function env_trace(env: NodeJS.ProcessEnv): boolean {
  const raw = env[ENV_TRACE]?.trim().toLowerCase();
  return raw === "1" || raw === "true";
}

/** Caller options win; the environment fills in whatever was left out. */
export function resolve_options<T>(
  options: MatchOptions<T> = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedOptions<T> {
  return {
    short_circuit: options.short_circuit ?? true,
    on_error: options.on_error,
    on_unhandled: options.on_unhandled ?? env_policy(env),
    logger:
      options.logger ?? (env_trace(env) ? create_logger("match") : silent_logger),
  };
}
