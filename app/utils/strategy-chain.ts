export type AttemptResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export interface Strategy<I, T> {
  name: string;
  attempt: (input: I) => AttemptResult<T>;
}

export interface ChainOutcome<T> {
  winner: { name: string; value: T } | null;
  failures: Array<{ name: string; reason: string }>;
}

export function succeed<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail(reason: string): { ok: false; reason: string } {
  return { ok: false, reason };
}

/**
 * Evaluates strategies in priority order and stops at the first success.
 * Failure reasons are collected so callers can log why a fallback was needed.
 */
export function runStrategyChain<I, T>(input: I, strategies: ReadonlyArray<Strategy<I, T>>): ChainOutcome<T> {
  const failures: ChainOutcome<T>["failures"] = [];
  for (const strategy of strategies) {
    const result = strategy.attempt(input);
    if (result.ok) {
      return { winner: { name: strategy.name, value: result.value }, failures };
    }
    failures.push({ name: strategy.name, reason: result.reason });
  }
  return { winner: null, failures };
}
