#!/usr/bin/env node

/**
 * promptsmith CLI entry point.
 * Thin wrapper; all logic lives in the library.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerAgentCommand, registerChatCommand } from './chat.js';
import { registerRunCommand } from './run.js';

const program = new Command();

program
  .name('promptsmith')
  .description(
    'Compose LLM prompts from typed fields, chat with tool calls, and revise outputs until their evaluations pass.',
  )
  .version('0.1.0');

registerChatCommand(program);
registerAgentCommand(program);
registerRunCommand(program);

await program.parseAsync();
