/**
 * Evaluation suite.
 * Deterministic checks and an LLM-backed check over a named field.
 */

export * from './types.js';
export {
  maxLength,
  noBrackets,
  noSlashes,
  blockedTerms,
  blockedList,
  noLongWords,
  evaluateDeterministic,
} from './deterministic.js';
export { llmEvaluation, evaluateWithLlm } from './llm.js';
export type { LlmEvaluationOptions } from './llm.js';
export { evaluate, orderEvaluations, firstFailure } from './evaluate.js';
export { buildEvaluation, buildField } from './factory.js';
