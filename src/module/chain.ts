import type { ChatEngineOptions } from '../chat/engine.js';
import type { TemplateValue } from '../text/template.js';
import { THINKING_FIELD, defineField, openTag } from './field.js';
import type { Field } from './field.js';
import { createPromptModule } from './promptModule.js';
import type { ModuleInputs, PromptModule } from './promptModule.js';
import { createRevisor } from './revisor.js';
import type { Revisor, RevisionReport } from './revisor.js';

// ── Public types ─────────────────────────────────────────────

export interface SingleOutputChainOptions extends ChatEngineOptions {
  task: string;
  /** Target output; its `inputs` become the module inputs. */
  output: Field;
  details?: string | undefined;
  /** Omit to generate without evaluation and revision. */
  maxRevisions?: number | undefined;
}

export interface ChainResult {
  values: Record<string, TemplateValue>;
  revision?: RevisionReport | undefined;
}

export interface SingleOutputChain {
  readonly generate: PromptModule;
  readonly revisor?: Revisor | undefined;
  run(sample: ModuleInputs): Promise<ChainResult>;
}

// ── Construction ─────────────────────────────────────────────

function createReviseModule(
  engine: ChatEngineOptions,
  output: Field,
  details: string | undefined,
): PromptModule {
  return createPromptModule({
    ...engine,
    inputsHeader:
      'You will be provided a set of inputs, along with a non-passing evaluation result.',
    task: 'Your task is to generate an updated version of the field indicated in the evaluation result so that it meets all evaluation criteria and requirements.',
    details,
    inputs: [
      ...output.inputs,
      output,
      defineField({ name: 'evaluation_result', description: 'An evaluation result' }),
    ],
    outputs: [THINKING_FIELD, output],
    footer: `Generate the required <thinking> and updated ${openTag(output)} outputs within XML tags.`,
  });
}

/**
 * Generate one output with step-by-step thinking, then (when a revision
 * budget is given) evaluate and revise it.
 */
export function createSingleOutputChain(options: SingleOutputChainOptions): SingleOutputChain {
  const { task, output, details, maxRevisions, ...engine } = options;

  const generate = createPromptModule({
    ...engine,
    task,
    details,
    inputs: output.inputs,
    outputs: [THINKING_FIELD, output],
  });

  const revisor = maxRevisions === undefined
    ? undefined
    : createRevisor({ reviser: createReviseModule(engine, output, details), maxRevisions });

  return {
    generate,
    revisor,
    async run(sample: ModuleInputs): Promise<ChainResult> {
      const generated = await generate.call(sample);
      const values: Record<string, TemplateValue> = { ...sample, ...generated };

      if (!revisor) return { values };

      const revision = await revisor.revise(values);
      return { values: { ...values, ...revision.outputs }, revision };
    },
  };
}
