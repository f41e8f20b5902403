// logger.ts
import colors from "colors/safe.js";
import { K } from "./comb.js";

export interface MatchLogger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  at: (scope: string) => MatchLogger;
}

function format_message(args: unknown[]): string {
  return args
    .map((a) => {
      if (typeof a === "string") return a;
      if (a instanceof Error) return a.stack ?? a.message;
      if (typeof a === "object" && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(" ");
}

export function format_line(
  level: string,
  scope: string,
  args: unknown[],
  now: Date = new Date(),
): string {
  const timestamp = now.toISOString().slice(11, 23);
  return `[${timestamp}] [${level}] [${scope}] ${format_message(args)}`;
}

function write(
  level: string,
  paint: (s: string) => string,
  scope: string,
  args: unknown[],
) {
  const line = format_line(level, scope, args);
  console.log(line.replace(`[${level}]`, `[${paint(level)}]`));
}

/** Console logger tagging every line with `scope`. */
export function create_logger(scope = "match"): MatchLogger {
  return {
    debug: (...args) => write("DEBUG", colors.gray, scope, args),
    info: (...args) => write("INFO", colors.cyan, scope, args),
    warn: (...args) => write("WARN", colors.yellow, scope, args),
    error: (...args) => write("ERROR", colors.red, scope, args),
    at: (next) => create_logger(next),
  };
}

export const silent_logger: MatchLogger = {
  debug: K(undefined),
  info: K(undefined),
  warn: K(undefined),
  error: K(undefined),
  at: () => silent_logger,
};
