import type { ChatEngineOptions } from '../chat/engine.js';
import type { EvalResult } from '../schema/index.js';
import { createPromptModule } from '../module/promptModule.js';
import { THINKING_FIELD, defineField } from '../module/field.js';
import type { Field } from '../module/field.js';
import type { EvaluationInputs, LlmEvaluation } from './types.js';

// ── Construction ─────────────────────────────────────────────

export interface LlmEvaluationOptions extends ChatEngineOptions {
  /** The evaluated field; its upstream inputs are shown to the evaluator. */
  field: Field;
  requirement: string;
  /** Ask for step-by-step thinking before the verdict. */
  useCot?: boolean | undefined;
}

export function llmEvaluation(options: LlmEvaluationOptions): LlmEvaluation {
  const { field, requirement, useCot = false, ...engine } = options;

  const requirementField = defineField({
    name: 'requirement',
    description: `A requirement for \`${field.name}\``,
  });
  const verdict = defineField({
    name: 'evaluation_result',
    description: `PASS if \`${field.name}\` meets the requirement described in \`requirement\`, FAIL otherwise`,
  });
  const reason = defineField({
    name: 'reason',
    description: 'A reason for the evaluation result. Leave blank when the evaluation passes.',
  });

  const generator = createPromptModule({
    ...engine,
    inputsHeader:
      'You will be provided a set of inputs, along with an evaluation criteria that one of the inputs is expected to satisfy.',
    task: 'Your task is to determine if the input meets the requirement.',
    inputs: [
      ...field.inputs,
      defineField({ name: field.name, description: field.description }),
      requirementField,
    ],
    outputs: useCot ? [THINKING_FIELD, verdict, reason] : [verdict, reason],
  });

  return { kind: 'llm', field: field.name, requirement, generator };
}

// ── Evaluation ───────────────────────────────────────────────

export async function evaluateWithLlm(
  evaluation: LlmEvaluation,
  inputs: EvaluationInputs,
): Promise<EvalResult> {
  const outputs = await evaluation.generator.call({
    ...inputs,
    requirement: evaluation.requirement,
  });

  const passed = (outputs['evaluation_result'] ?? '').trim().toUpperCase() === 'PASS';
  return {
    field: evaluation.field,
    requirement: evaluation.requirement,
    result: passed ? 'PASS' : 'FAIL',
    reason: passed ? '' : (outputs['reason'] ?? ''),
  };
}
