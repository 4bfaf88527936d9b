import type { LogSession } from "../types.js";

/**
 * Consumes a session and produces a derived result. Implementations never
 * mutate the session and return the same result for the same session.
 */
export interface Analyzer<T> {
  readonly name: string;
  analyze(session: LogSession): T;
}

/**
 * Elapsed seconds from `from` to `to`; negative when `to` is earlier.
 */
export function secondsBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / 1000;
}
