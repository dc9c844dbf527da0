import { z } from 'zod';

import { defineTool } from '../chat/tools.js';
import type { Tool } from '../chat/tools.js';
import type { ChatEngineOptions } from '../chat/engine.js';
import { createTemplatePrompt } from '../module/templatePrompt.js';

// ── Demo tool ───────────────────────────────────────────────

const FORECASTS = [
  { temperature: 26, temperature_units: 'C', summary: 'sunny, chance of rain 30%' },
  { temperature: 18, temperature_units: 'F', summary: 'windy, chance of snow 80%' },
] as const;

export const weatherTool = defineTool({
  name: 'get_weather',
  description: 'Returns the weather for a location',
  parameters: z.object({
    location: z.string().describe('A location to fetch the weather for'),
  }),
  handler: ({ location }) =>
    JSON.stringify(FORECASTS[location.length % FORECASTS.length], null, 2),
});

// ── Prompt execution ────────────────────────────────────────

export interface ExecutePromptOptions {
  engine: Omit<ChatEngineOptions, 'tools'>;
  /** Return the nested prompt's snapshots instead of its final text. */
  streamOutput: boolean;
}

/**
 * Runs a prompt that appeared in the dialog inside `<prompt_id>` tags,
 * filling its placeholders from every other tagged block in the dialog.
 * Needs `provideXmlBlocksToTools` on the owning engine.
 */
export function createExecutePromptTool(options: ExecutePromptOptions): Tool {
  return defineTool({
    name: 'execute_prompt',
    description:
      'Executes a prompt marked by XML tags in this dialog on XML-tagged inputs from the dialog',
    parameters: z
      .object({
        prompt_id: z.string().describe('The xml tag of the prompt to be submitted'),
      })
      .passthrough(),
    handler: (args) => {
      const inputs: Record<string, string> = {};
      for (const [key, value] of Object.entries(args)) {
        if (typeof value === 'string') inputs[key] = value;
      }

      const template = inputs[args.prompt_id];
      if (template === undefined) {
        return `No prompt tagged <${args.prompt_id}> was found in the dialog.`;
      }

      const prompt = createTemplatePrompt({ ...options.engine, prompt: template });
      return options.streamOutput ? prompt.stream(inputs) : prompt.call(inputs);
    },
  });
}
