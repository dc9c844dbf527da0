import type { TemplateValue } from '../text/template.js';

// ── Inputs ───────────────────────────────────────────────────

export type EvaluationInputs = Readonly<Record<string, TemplateValue>>;

/** Anything that maps named inputs to named outputs, e.g. a PromptModule. */
export interface OutputGenerator {
  call(inputs: EvaluationInputs): Promise<Record<string, string>>;
}

// ── Variants ─────────────────────────────────────────────────

interface BaseEvaluation {
  /** Name of the field under evaluation. */
  readonly field: string;
  /** Human-readable requirement, shown to the model in prompts. */
  readonly requirement: string;
}

export interface MaxLengthEvaluation extends BaseEvaluation {
  readonly kind: 'max_length';
  readonly maxChars: number;
}

export interface NoBracketsEvaluation extends BaseEvaluation {
  readonly kind: 'no_brackets';
}

export interface NoSlashesEvaluation extends BaseEvaluation {
  readonly kind: 'no_slashes';
}

export interface BlockedTermsEvaluation extends BaseEvaluation {
  readonly kind: 'blocked_terms';
  readonly terms: readonly string[];
  readonly termsField?: string | undefined;
}

export interface BlockedListEvaluation extends BaseEvaluation {
  readonly kind: 'blocked_list';
  readonly values: readonly string[];
  readonly valuesField?: string | undefined;
}

export interface NoLongWordsEvaluation extends BaseEvaluation {
  readonly kind: 'no_long_words';
  readonly maxChars: number;
}

export interface LlmEvaluation extends BaseEvaluation {
  readonly kind: 'llm';
  readonly generator: OutputGenerator;
}

export type DeterministicEvaluation =
  | MaxLengthEvaluation
  | NoBracketsEvaluation
  | NoSlashesEvaluation
  | BlockedTermsEvaluation
  | BlockedListEvaluation
  | NoLongWordsEvaluation;

export type Evaluation = DeterministicEvaluation | LlmEvaluation;

export type EvaluationKind = Evaluation['kind'];

export function isDeterministic(evaluation: Evaluation): evaluation is DeterministicEvaluation {
  return evaluation.kind !== 'llm';
}
