import { z } from 'zod';

import { evaluationConfigSchema } from './evaluation.js';
import type { EvaluationConfig } from './evaluation.js';

// ── Field entry ─────────────────────────────────────────────

export interface FieldConfig {
  name: string;
  description: string;
  evaluations: EvaluationConfig[];
  inputs: FieldConfig[];
}

const fieldNameSchema = z
  .string()
  .regex(/^\w+$/, 'Field names must be word characters only');

export const fieldConfigSchema: z.ZodType<FieldConfig, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: fieldNameSchema,
    description: z.string().min(1),
    evaluations: z.array(evaluationConfigSchema).optional().default([]),
    inputs: z.array(fieldConfigSchema).optional().default([]),
  }),
);

// ── Generation settings ─────────────────────────────────────

export const generationConfigSchema = z.object({
  temperature: z.number().min(0).max(2).optional().default(0),
  topP: z.number().gt(0).max(1).optional().default(1),
  maxTokens: z.number().int().positive().optional().default(4096),
});

export type GenerationConfig = z.infer<typeof generationConfigSchema>;

// ── Full module config file ─────────────────────────────────

export const moduleFileConfigSchema = z.object({
  provider: z.enum(['anthropic', 'openai', 'mock']).optional(),
  model: z.string().min(1).optional(),
  task: z.string().min(1),
  details: z.string().optional().default(''),
  maxRevisions: z.number().int().nonnegative().optional(),
  generation: generationConfigSchema.optional().default({}),
  output: fieldConfigSchema,
});

export type ModuleFileConfig = z.infer<typeof moduleFileConfigSchema>;

// ── Inputs file ─────────────────────────────────────────────

export const inputsFileSchema = z.record(
  z.string(),
  z.union([z.string(), z.array(z.string())]),
);

export type InputsFile = z.infer<typeof inputsFileSchema>;
