import type { EvalResult } from '../schema/index.js';
import { evaluateDeterministic } from './deterministic.js';
import { evaluateWithLlm } from './llm.js';
import { isDeterministic } from './types.js';
import type { Evaluation, EvaluationInputs } from './types.js';

export async function evaluate(
  evaluation: Evaluation,
  inputs: EvaluationInputs,
): Promise<EvalResult> {
  if (evaluation.kind === 'llm') return evaluateWithLlm(evaluation, inputs);
  return evaluateDeterministic(evaluation, inputs);
}

/** Deterministic checks first, then LLM-backed ones, each group in declared order. */
export function orderEvaluations(evaluations: readonly Evaluation[]): Evaluation[] {
  return [
    ...evaluations.filter((e) => isDeterministic(e)),
    ...evaluations.filter((e) => !isDeterministic(e)),
  ];
}

/** First failing result in check order, or null when everything passes. */
export async function firstFailure(
  evaluations: readonly Evaluation[],
  inputs: EvaluationInputs,
): Promise<EvalResult | null> {
  for (const evaluation of orderEvaluations(evaluations)) {
    const result = await evaluate(evaluation, inputs);
    if (result.result !== 'PASS') return result;
  }
  return null;
}
