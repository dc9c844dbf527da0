import type { ChatEngineOptions } from '../chat/engine.js';
import type { EvaluationConfig, FieldConfig } from '../schema/index.js';
import { defineField } from '../module/field.js';
import type { Field } from '../module/field.js';
import {
  blockedList,
  blockedTerms,
  maxLength,
  noBrackets,
  noLongWords,
  noSlashes,
} from './deterministic.js';
import { llmEvaluation } from './llm.js';
import type { Evaluation } from './types.js';

/**
 * Turn one config entry into an Evaluation attached to `field`.
 * LLM-backed entries get their own engine built from `engine`.
 */
export function buildEvaluation(
  config: EvaluationConfig,
  field: Field,
  engine: ChatEngineOptions,
): Evaluation {
  const base = { field: field.name, requirement: config.label };

  switch (config.type) {
    case 'max_chars':
      return maxLength({ ...base, maxChars: config.value });
    case 'no_square_brackets':
      return noBrackets(base);
    case 'no_slashes':
      return noSlashes(base);
    case 'not_contains':
      return blockedTerms({ ...base, terms: config.value });
    case 'not_contains_field':
      return blockedTerms({ ...base, termsField: config.value });
    case 'not_in_blocked_list':
      return blockedList({ ...base, values: config.value });
    case 'not_in_blocked_list_field':
      return blockedList({ ...base, valuesField: config.value });
    case 'no_long_words':
      return noLongWords({ ...base, maxChars: config.value });
    case 'llm':
      return llmEvaluation({
        ...engine,
        field,
        requirement: config.label ?? config.value,
        useCot: config.useCot,
      });
  }
}

/** Build a field, its upstream inputs and its evaluations from config. */
export function buildField(config: FieldConfig, engine: ChatEngineOptions): Field {
  const inputs = config.inputs.map((input) => buildField(input, engine));
  const bare = defineField({
    name: config.name,
    description: config.description,
    inputs,
  });

  return defineField({
    ...bare,
    evaluations: config.evaluations.map((entry) => buildEvaluation(entry, bare, engine)),
  });
}
