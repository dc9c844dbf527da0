import type { Evaluation } from '../evaluation/types.js';
import { ConfigurationError } from '../utils/errors.js';

// ── Field ────────────────────────────────────────────────────

/** A named module input or output. */
export interface Field {
  readonly name: string;
  readonly description: string;
  readonly evaluations: readonly Evaluation[];
  /** Upstream fields this one depends on; fed to LLM-backed evaluators. */
  readonly inputs: readonly Field[];
}

export interface FieldSpec {
  name: string;
  description: string;
  evaluations?: readonly Evaluation[] | undefined;
  inputs?: readonly Field[] | undefined;
}

const FIELD_NAME = /^\w+$/;

export function defineField(spec: FieldSpec): Field {
  if (!FIELD_NAME.test(spec.name)) {
    throw new ConfigurationError(
      `Field name "${spec.name}" must contain only word characters`,
    );
  }

  const evaluations = spec.evaluations ?? [];
  const foreign = evaluations.find((e) => e.field !== spec.name);
  if (foreign) {
    throw new ConfigurationError(
      `Evaluation for "${foreign.field}" attached to field "${spec.name}"`,
    );
  }

  return Object.freeze({
    name: spec.name,
    description: spec.description,
    evaluations: Object.freeze([...evaluations]),
    inputs: Object.freeze([...(spec.inputs ?? [])]),
  });
}

// ── Formatting ───────────────────────────────────────────────

export function openTag(field: Field): string {
  return `<${field.name}>`;
}

export function closeTag(field: Field): string {
  return `</${field.name}>`;
}

export function markdownName(field: Field): string {
  return `\`${field.name}\``;
}

export function definition(field: Field): string {
  return `${field.name}: ${field.description}`;
}

/** `<name>\n{{name}}\n</name>`, filled in by the template engine. */
export function inputTemplate(field: Field): string {
  return `${openTag(field)}\n{{${field.name}}}\n${closeTag(field)}`;
}

export function evaluationResultsKey(field: Field): string {
  return `${field.name}_evaluation_results`;
}

// ── Common fields ────────────────────────────────────────────

export const THINKING_FIELD = defineField({
  name: 'thinking',
  description: 'Begin by thinking step by step',
});
