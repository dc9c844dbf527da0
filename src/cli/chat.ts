import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { createInterface } from 'node:readline/promises';
import { fileURLToPath } from 'node:url';

import type { Command } from 'commander';

import { createChatEngine } from '../chat/engine.js';
import type { ChatEngine, ChatEngineOptions } from '../chat/engine.js';
import type { Tool } from '../chat/tools.js';
import { CHAT_DEFAULTS } from '../config/defaults.js';
import { createTransport, llmProviderSchema, loadLLMConfig, resolveModel } from '../llm/index.js';
import { errorMessage } from '../utils/errors.js';
import * as log from '../utils/logger.js';
import { exitCodeFor } from './exit.js';
import { createExecutePromptTool, weatherTool } from './tools.js';

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

// ── Shared options ───────────────────────────────────────────

interface EngineFlags {
  provider?: string;
  model?: string;
  temperature?: string;
  topP?: string;
  maxTokens?: string;
  stream?: true;
}

function addEngineOptions(command: Command): Command {
  return command
    .option('--provider <name>', 'LLM provider (anthropic, openai, mock)')
    .option('--model <id>', 'Model identifier')
    .option('--temperature <n>', 'Sampling temperature')
    .option('--top-p <n>', 'Nucleus sampling mass')
    .option('--max-tokens <n>', 'Completion token limit')
    .option('--stream', 'Stream responses as they arrive');
}

function numberFlag(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function engineOptionsFrom(flags: EngineFlags): Omit<ChatEngineOptions, 'tools'> {
  const provider =
    flags.provider === undefined ? undefined : llmProviderSchema.parse(flags.provider);
  const llmConfig = loadLLMConfig({ provider, model: flags.model });

  return {
    transport: createTransport(llmConfig),
    model: resolveModel(llmConfig),
    temperature: numberFlag(flags.temperature),
    topP: numberFlag(flags.topP),
    maxTokens: numberFlag(flags.maxTokens),
    stream: flags.stream ?? false,
  };
}

// ── REPL ─────────────────────────────────────────────────────

async function runRepl(engine: ChatEngine): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  log.info(`Chatting with ${engine.config.model}. Commands: /clear, /usage, /exit`);
  rl.setPrompt('> ');
  rl.prompt();

  try {
    for await (const raw of rl) {
      const line = raw.trim();

      if (line === '/exit') break;
      if (line === '/clear') {
        engine.clearHistory();
        log.detail('History cleared.');
      } else if (line === '/usage') {
        const { inputTokens, outputTokens } = engine.tokens.usage;
        log.detail(`Tokens: ${String(inputTokens)} in, ${String(outputTokens)} out`);
      } else if (line.length > 0) {
        let printed = '';
        const text = await engine.send(line, {
          onSnapshot: (snapshot) => {
            // Snapshots are cumulative; tool output can rewrite the tail.
            if (snapshot.startsWith(printed)) {
              process.stdout.write(snapshot.slice(printed.length));
            } else {
              process.stdout.write(`\n${snapshot}`);
            }
            printed = snapshot;
          },
        });
        if (!engine.config.stream) process.stdout.write(text);
        process.stdout.write('\n');
      }

      rl.prompt();
    }
  } finally {
    rl.close();
  }
}

async function startRepl(build: () => Promise<ChatEngine>): Promise<void> {
  try {
    await runRepl(await build());
  } catch (err) {
    log.error(errorMessage(err));
    process.exitCode = exitCodeFor(err);
  }
}

// ── Command registration ─────────────────────────────────────

export function registerChatCommand(program: Command): void {
  addEngineOptions(
    program
      .command('chat')
      .description('Interactive multi-turn chat on stdin')
      .option('--system <prompt>', 'System prompt', CHAT_DEFAULTS.SYSTEM_PROMPT)
      .option('--with-tools', 'Offer the demo get_weather tool'),
  ).action(async (opts: EngineFlags & { system: string; withTools?: true }) => {
    await startRepl(async () => {
      const tools: Tool[] = opts.withTools ? [weatherTool] : [];
      return createChatEngine({
        ...engineOptionsFrom(opts),
        systemPrompt: opts.system,
        tools,
      });
    });
  });
}

export function registerAgentCommand(program: Command): void {
  addEngineOptions(
    program
      .command('agent')
      .description('Prompt-engineering assistant that can run the prompts it writes')
      .option('--max-tool-calls <n>', 'Follow-up requests allowed after tool calls')
      .option('--stream-tool-output', 'Stream nested prompt output while it runs'),
  ).action(
    async (opts: EngineFlags & { maxToolCalls?: string; streamToolOutput?: true }) => {
      await startRepl(async () => {
        const engine = engineOptionsFrom(opts);
        const streamToolOutput = opts.streamToolOutput ?? false;
        const systemPrompt = await readFile(
          path.join(PROMPTS_DIR, 'prompt_engineer.txt'),
          'utf-8',
        );

        return createChatEngine({
          ...engine,
          systemPrompt,
          maxToolCalls: numberFlag(opts.maxToolCalls),
          streamToolOutput,
          provideXmlBlocksToTools: true,
          tools: [createExecutePromptTool({ engine, streamOutput: streamToolOutput })],
        });
      });
    },
  );
}
