import { createChatEngine } from '../chat/engine.js';
import type { ChatEngine, ChatEngineOptions } from '../chat/engine.js';
import { Template } from '../text/template.js';
import type { ModuleInputs } from './promptModule.js';

export interface TemplatePromptOptions extends ChatEngineOptions {
  prompt: string;
}

/** A free-form prompt template run as a fresh single-shot chat. */
export class TemplatePrompt {
  constructor(
    readonly engine: ChatEngine,
    readonly template: Template,
  ) {}

  async call(inputs: ModuleInputs): Promise<string> {
    this.engine.clearHistory();
    return this.engine.call(this.template.format(inputs));
  }

  async *stream(inputs: ModuleInputs): AsyncGenerator<string> {
    this.engine.clearHistory();
    yield* this.engine.stream(this.template.format(inputs));
  }
}

export function createTemplatePrompt(options: TemplatePromptOptions): TemplatePrompt {
  const { prompt, ...engineOptions } = options;
  return new TemplatePrompt(createChatEngine(engineOptions), new Template(prompt));
}
