import type { EvalResult } from '../schema/index.js';
import { stringifyValue } from '../text/template.js';
import type { TemplateValue } from '../text/template.js';
import { ConfigurationError } from '../utils/errors.js';
import type {
  BlockedListEvaluation,
  BlockedTermsEvaluation,
  DeterministicEvaluation,
  EvaluationInputs,
  MaxLengthEvaluation,
  NoBracketsEvaluation,
  NoLongWordsEvaluation,
  NoSlashesEvaluation,
} from './types.js';

// ── Result helpers ───────────────────────────────────────────

function pass(evaluation: DeterministicEvaluation): EvalResult {
  return {
    field: evaluation.field,
    requirement: evaluation.requirement,
    result: 'PASS',
    reason: '',
  };
}

function fail(evaluation: DeterministicEvaluation, reason: string): EvalResult {
  return {
    field: evaluation.field,
    requirement: evaluation.requirement,
    result: 'FAIL',
    reason,
  };
}

// A list-valued input may arrive as an array or as comma/newline separated text.
function toList(value: TemplateValue): string[] {
  if (Array.isArray(value)) return [...value];
  if (typeof value !== 'string') return [];
  return value
    .split(/[\n,]/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function listFrom(
  inputs: EvaluationInputs,
  fixed: readonly string[],
  fieldName: string | undefined,
): string[] {
  const fromField = fieldName !== undefined ? toList(inputs[fieldName]) : [];
  return [...fixed, ...fromField];
}

// Requirement text for list checks; field-sourced lists render as a
// placeholder so the prompt shows the caller's values.
function describeList(
  prefix: string,
  fixed: readonly string[],
  fieldName: string | undefined,
): string {
  const parts = [...fixed];
  if (fieldName !== undefined) parts.push(`{{${fieldName}}}`);
  return `${prefix}: ${parts.join(', ')}`;
}

// ── Constructors ─────────────────────────────────────────────

export function maxLength(options: {
  field: string;
  maxChars?: number;
  requirement?: string;
}): MaxLengthEvaluation {
  const maxChars = options.maxChars ?? 50;
  return {
    kind: 'max_length',
    field: options.field,
    maxChars,
    requirement: options.requirement ?? `Has at most ${String(maxChars)} characters`,
  };
}

export function noBrackets(options: {
  field: string;
  requirement?: string;
}): NoBracketsEvaluation {
  return {
    kind: 'no_brackets',
    field: options.field,
    requirement: options.requirement ?? 'Does not contain square bracket [placeholders]',
  };
}

export function noSlashes(options: {
  field: string;
  requirement?: string;
}): NoSlashesEvaluation {
  return {
    kind: 'no_slashes',
    field: options.field,
    requirement: options.requirement ?? 'Does not contain any slash/constructions',
  };
}

export function blockedTerms(options: {
  field: string;
  terms?: readonly string[];
  termsField?: string;
  requirement?: string;
}): BlockedTermsEvaluation {
  const terms = options.terms ?? [];
  if (terms.length === 0 && options.termsField === undefined) {
    throw new ConfigurationError(
      `blocked_terms on "${options.field}" needs terms or a terms field`,
    );
  }
  return {
    kind: 'blocked_terms',
    field: options.field,
    terms,
    termsField: options.termsField,
    requirement:
      options.requirement ??
      describeList('Does not contain any of the following terms', terms, options.termsField),
  };
}

export function blockedList(options: {
  field: string;
  values?: readonly string[];
  valuesField?: string;
  requirement?: string;
}): BlockedListEvaluation {
  const values = options.values ?? [];
  if (values.length === 0 && options.valuesField === undefined) {
    throw new ConfigurationError(
      `blocked_list on "${options.field}" needs values or a values field`,
    );
  }
  return {
    kind: 'blocked_list',
    field: options.field,
    values,
    valuesField: options.valuesField,
    requirement:
      options.requirement ??
      describeList(
        'Is not identical to any of the following blocked values',
        values,
        options.valuesField,
      ),
  };
}

export function noLongWords(options: {
  field: string;
  maxChars?: number;
  requirement?: string;
}): NoLongWordsEvaluation {
  const maxChars = options.maxChars ?? 10;
  return {
    kind: 'no_long_words',
    field: options.field,
    maxChars,
    requirement:
      options.requirement ??
      `Contains no words with more than ${String(maxChars)} characters`,
  };
}

// ── Checks ───────────────────────────────────────────────────

/** Length in code points, so astral characters count once. */
function charCount(text: string): number {
  return [...text].length;
}

function checkMaxLength(e: MaxLengthEvaluation, text: string): EvalResult {
  const length = charCount(text);
  if (length <= e.maxChars) return pass(e);
  return fail(
    e,
    `Should have at most ${String(e.maxChars)} chars, but has ${String(length)}`,
  );
}

function checkNoBrackets(e: NoBracketsEvaluation, text: string): EvalResult {
  const matches = text.match(/\[.*?\]/g);
  if (!matches) return pass(e);
  return fail(e, `Should not contain square brackets: ${matches.join(', ')}`);
}

function checkNoSlashes(e: NoSlashesEvaluation, text: string): EvalResult {
  const matches = text.match(/[\p{L}\p{N}_]+\/[\p{L}\p{N}_]+/gu);
  if (!matches) return pass(e);
  return fail(
    e,
    `\`${e.field}\` should not contain slash constructions: ${matches.join(', ')}`,
  );
}

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}_]+|[^\p{L}\p{N}_]+$/gu;

function checkBlockedTerms(
  e: BlockedTermsEvaluation,
  text: string,
  inputs: EvaluationInputs,
): EvalResult {
  const lowered = text.toLowerCase();
  const words = new Set<string>();
  for (const token of lowered.split(/\s+/)) {
    if (!token) continue;
    words.add(token);
    words.add(token.replace(EDGE_PUNCTUATION, ''));
  }

  const matches = listFrom(inputs, e.terms, e.termsField).filter((term) => {
    const needle = term.trim().toLowerCase();
    if (!needle) return false;
    return /\s/.test(needle) ? lowered.includes(needle) : words.has(needle);
  });

  if (matches.length === 0) return pass(e);
  return fail(e, `Should not contain the blocked terms: ${matches.join(', ')}`);
}

function checkBlockedList(
  e: BlockedListEvaluation,
  text: string,
  inputs: EvaluationInputs,
): EvalResult {
  const value = text.trim().toLowerCase();
  const blocked = listFrom(inputs, e.values, e.valuesField).map((item) =>
    item.trim().toLowerCase(),
  );

  if (!blocked.includes(value)) return pass(e);
  return fail(e, `'${value}' is one of the blocked values`);
}

function checkNoLongWords(e: NoLongWordsEvaluation, text: string): EvalResult {
  const tooLong = text.split(/\s+/).filter((word) => charCount(word) > e.maxChars);
  if (tooLong.length === 0) return pass(e);
  return fail(
    e,
    `The following words have more than ${String(e.maxChars)} characters: ${tooLong.join(', ')}`,
  );
}

// ── Dispatch ─────────────────────────────────────────────────

export function evaluateDeterministic(
  evaluation: DeterministicEvaluation,
  inputs: EvaluationInputs,
): EvalResult {
  const text = stringifyValue(inputs[evaluation.field]);

  switch (evaluation.kind) {
    case 'max_length':
      return checkMaxLength(evaluation, text);
    case 'no_brackets':
      return checkNoBrackets(evaluation, text);
    case 'no_slashes':
      return checkNoSlashes(evaluation, text);
    case 'blocked_terms':
      return checkBlockedTerms(evaluation, text, inputs);
    case 'blocked_list':
      return checkBlockedList(evaluation, text, inputs);
    case 'no_long_words':
      return checkNoLongWords(evaluation, text);
    default: {
      const unreachable: never = evaluation;
      return unreachable;
    }
  }
}
