/**
 * Prompt modules.
 * Declarative prompts over typed fields, the revision loop, and chains.
 */

export {
  defineField,
  definition,
  inputTemplate,
  openTag,
  closeTag,
  markdownName,
  evaluationResultsKey,
  THINKING_FIELD,
} from './field.js';
export type { Field, FieldSpec } from './field.js';
export {
  PromptModule,
  createPromptModule,
  buildPrompt,
  defaultFooter,
  DEFAULT_INPUTS_HEADER,
} from './promptModule.js';
export type {
  ModuleInputs,
  ModuleOutput,
  PromptModuleOptions,
  PromptShape,
} from './promptModule.js';
export { Revisor, createRevisor } from './revisor.js';
export type {
  Reviser,
  RevisionPhase,
  RevisionReport,
  RevisionState,
  RevisionStatus,
  RevisorOptions,
} from './revisor.js';
export { TemplatePrompt, createTemplatePrompt } from './templatePrompt.js';
export type { TemplatePromptOptions } from './templatePrompt.js';
export { createSingleOutputChain } from './chain.js';
export type { ChainResult, SingleOutputChain, SingleOutputChainOptions } from './chain.js';
