import { z } from 'zod';

// ── EvalResult ───────────────────────────────────────────────

export const evalVerdictSchema = z.enum(['PASS', 'FAIL']);

export type EvalVerdict = z.infer<typeof evalVerdictSchema>;

export const evalResultSchema = z.object({
  field: z.string().min(1),
  requirement: z.string(),
  result: evalVerdictSchema,
  reason: z.string(),
});

export type EvalResult = z.infer<typeof evalResultSchema>;

export function parseEvalResult(data: unknown): EvalResult {
  return evalResultSchema.parse(data);
}

// ── Evaluation config entries ────────────────────────────────
// The shape used by module config files. Each entry becomes one
// Evaluation variant once attached to its field.

const termsSchema = z.array(z.string().min(1)).min(1);

export const evaluationConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('max_chars'),
    value: z.number().int().positive(),
    label: z.string().optional(),
  }),
  z.object({
    type: z.literal('no_square_brackets'),
    label: z.string().optional(),
  }),
  z.object({
    type: z.literal('no_slashes'),
    label: z.string().optional(),
  }),
  z.object({
    type: z.literal('not_contains'),
    value: termsSchema,
    label: z.string().optional(),
  }),
  z.object({
    type: z.literal('not_contains_field'),
    value: z.string().min(1),
    label: z.string().optional(),
  }),
  z.object({
    type: z.literal('not_in_blocked_list'),
    value: termsSchema,
    label: z.string().optional(),
  }),
  z.object({
    type: z.literal('not_in_blocked_list_field'),
    value: z.string().min(1),
    label: z.string().optional(),
  }),
  z.object({
    type: z.literal('no_long_words'),
    value: z.number().int().positive(),
    label: z.string().optional(),
  }),
  z.object({
    type: z.literal('llm'),
    value: z.string().min(1),
    label: z.string().optional(),
    useCot: z.boolean().optional().default(false),
  }),
]);

export type EvaluationConfig = z.infer<typeof evaluationConfigSchema>;
