import type { LogSession } from "../types.js";
import type { Analyzer } from "./types.js";

export type AnalyzerOutcome<T> =
  | { name: string; ok: true; value: T }
  | { name: string; ok: false; error: Error };

/**
 * Runs several analyzers with the same output type over one session.
 */
export class CompositeAnalyzer<T> {
  private readonly analyzers: Analyzer<T>[] = [];

  add(analyzer: Analyzer<T>): this {
    this.analyzers.push(analyzer);
    return this;
  }

  get size(): number {
    return this.analyzers.length;
  }

  /**
   * Collects one outcome per analyzer, in registration order. A throwing
   * analyzer yields a failed outcome and the rest still run.
   */
  runAll(session: LogSession): AnalyzerOutcome<T>[] {
    return this.analyzers.map((analyzer): AnalyzerOutcome<T> => {
      try {
        return { name: analyzer.name, ok: true, value: analyzer.analyze(session) };
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        return { name: analyzer.name, ok: false, error };
      }
    });
  }
}
