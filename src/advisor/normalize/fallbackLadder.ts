/**
 * Ordered fallback strategies.
 *
 * Each rung either produces a result or returns NO_RESULT; the ladder
 * returns the first result together with the name of the rung that
 * produced it.
 */

export const NO_RESULT = Symbol('NO_RESULT');

export type StrategyOutcome<TResult> = TResult | typeof NO_RESULT;

export interface FallbackStrategy<TInput, TResult, TName extends string = string> {
  name: TName;
  attempt(input: TInput): StrategyOutcome<TResult>;
}

export interface LadderResult<TResult, TName extends string = string> {
  result: TResult;
  strategy: TName;
}

export function runFallbackLadder<TInput, TResult, TName extends string>(
  strategies: ReadonlyArray<FallbackStrategy<TInput, TResult, TName>>,
  input: TInput
): LadderResult<TResult, TName> | null {
  for (const strategy of strategies) {
    const outcome = strategy.attempt(input);
    if (outcome !== NO_RESULT) {
      return { result: outcome, strategy: strategy.name };
    }
  }
  return null;
}
