import { createChatEngine } from '../chat/engine.js';
import type { ChatEngine, ChatEngineOptions } from '../chat/engine.js';
import { renderTemplate } from '../text/template.js';
import type { TemplateValues } from '../text/template.js';
import { parseTag } from '../text/tags.js';
import {
  ConfigurationError,
  IncompleteOutputError,
  UnknownToolError,
  errorMessage,
} from '../utils/errors.js';
import * as log from '../utils/logger.js';
import type { Field } from './field.js';
import {
  closeTag,
  definition,
  inputTemplate,
  markdownName,
  openTag,
} from './field.js';

// ── Public types ─────────────────────────────────────────────

export type ModuleInputs = TemplateValues;
export type ModuleOutput = Record<string, string>;

export interface PromptShape {
  inputs?: readonly Field[] | undefined;
  outputs: readonly Field[];
  task?: string | undefined;
  details?: string | undefined;
  inputsHeader?: string | undefined;
  /** Closing instruction; defaults to naming the output tags. Empty omits it. */
  footer?: string | undefined;
}

export interface PromptModuleOptions extends ChatEngineOptions, PromptShape {}

export const DEFAULT_INPUTS_HEADER = 'You are provided the following inputs:';

// ── Prompt assembly ──────────────────────────────────────────

export function defaultFooter(outputs: readonly Field[]): string {
  const wrapped = outputs.map((f) => `${openTag(f)}...${closeTag(f)}`);

  let inline: string;
  if (outputs.length > 2) {
    inline = wrapped.join(', ');
  } else if (outputs.length === 2) {
    inline = wrapped.join(' and ');
  } else {
    inline = outputs[0] ? openTag(outputs[0]) : '';
  }

  const plural = outputs.length > 1 ? 's' : '';
  return `Generate the required output${plural} within XML tags: ${inline}`;
}

export function buildPrompt(shape: PromptShape): string {
  const inputs = shape.inputs ?? [];
  const parts = ['# Task Description'];

  if (inputs.length > 0) {
    parts.push(shape.inputsHeader ?? DEFAULT_INPUTS_HEADER);
    parts.push(inputs.map((f) => `- ${definition(f)}`).join('\n'));
  }
  if (shape.task) parts.push(shape.task);

  parts.push('Generate the following outputs within XML tags:');
  for (const output of shape.outputs) {
    parts.push(`${openTag(output)}\n${output.description}\n${closeTag(output)}`);
  }

  for (const output of shape.outputs) {
    if (output.evaluations.length === 0) continue;
    parts.push(`Requirements for ${markdownName(output)}:`);
    parts.push(output.evaluations.map((e) => `- ${e.requirement}`).join('\n'));
  }

  if (shape.details) parts.push(shape.details);

  if (inputs.length > 0) {
    parts.push('# Inputs');
    for (const input of inputs) parts.push(inputTemplate(input));
  }

  const footer = shape.footer ?? defaultFooter(shape.outputs);
  if (footer) parts.push(footer);

  return parts.join('\n\n');
}

// ── Module ───────────────────────────────────────────────────

/**
 * A chat engine with a declared prompt shape. Every call is a fresh
 * single-shot: history is cleared, inputs are templated into the prompt,
 * and each output is read from its tags in the response.
 */
export class PromptModule {
  constructor(
    readonly engine: ChatEngine,
    readonly inputs: readonly Field[],
    readonly outputs: readonly Field[],
    readonly prompt: string,
  ) {}

  async call(inputs: ModuleInputs): Promise<ModuleOutput> {
    this.engine.clearHistory();
    log.llm(
      `Generating ${this.outputs.map((f) => f.name).join(', ')} with ${this.engine.config.model}`,
    );

    let responseText: string;
    try {
      responseText = await this.engine.send(renderTemplate(this.prompt, inputs));
    } catch (err) {
      // Config and tool-map defects are not transport failures.
      if (err instanceof ConfigurationError || err instanceof UnknownToolError) throw err;
      log.warn(`Module call failed: ${errorMessage(err)}`);
      responseText = '';
    }

    return this.parseOutputs(responseText);
  }

  /** Last block per output tag, trimmed. Throws when any output is absent. */
  parseOutputs(responseText: string): ModuleOutput {
    const outputs: ModuleOutput = {};
    const missing: string[] = [];

    for (const field of this.outputs) {
      const value = parseTag(responseText, field.name).at(-1);
      if (value === undefined) {
        missing.push(field.name);
      } else {
        outputs[field.name] = value.trim();
      }
    }

    if (missing.length > 0) {
      throw new IncompleteOutputError(missing, responseText);
    }
    return outputs;
  }
}

export function createPromptModule(options: PromptModuleOptions): PromptModule {
  const { inputs = [], outputs, task, details, inputsHeader, footer, ...engineOptions } = options;

  if (outputs.length === 0) {
    throw new ConfigurationError('A prompt module needs at least one output field');
  }
  const names = new Set(outputs.map((f) => f.name));
  if (names.size !== outputs.length) {
    throw new ConfigurationError('Output field names must be unique');
  }

  const prompt = buildPrompt({ inputs, outputs, task, details, inputsHeader, footer });
  return new PromptModule(createChatEngine(engineOptions), inputs, outputs, prompt);
}
