import type { Command } from 'commander';

import { buildField } from '../evaluation/factory.js';
import { LIMITS } from '../config/defaults.js';
import { loadInputs, loadModuleConfig } from '../config/loader.js';
import { createTransport, loadLLMConfig, resolveModel } from '../llm/index.js';
import type { ChatEngineOptions } from '../chat/engine.js';
import { createSingleOutputChain } from '../module/chain.js';
import type { ChainResult } from '../module/chain.js';
import { errorMessage } from '../utils/errors.js';
import * as log from '../utils/logger.js';
import { EXIT_NOT_CONVERGED, exitCodeFor } from './exit.js';

// ── JSON output ──────────────────────────────────────────────

interface RunOutput {
  outputs: ChainResult['values'];
  status: 'generated' | 'passed' | 'exhausted';
  revisions: number;
}

function toRunOutput(result: ChainResult): RunOutput {
  return {
    outputs: result.values,
    status: result.revision?.status ?? 'generated',
    revisions: result.revision?.revisions ?? 0,
  };
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Generate one output from a module config, then evaluate and revise it')
    .requiredOption('--config <path>', 'Module config file (YAML or JSON)')
    .requiredOption('--inputs <path>', 'Input values file (YAML or JSON)')
    .option('--max-revisions <n>', 'Override the revision budget from the config')
    .action(async (opts: { config: string; inputs: string; maxRevisions?: string }) => {
      try {
        // 1. Load config and inputs
        const config = await loadModuleConfig(opts.config);
        const inputs = await loadInputs(opts.inputs);

        // 2. Resolve backend: config file overrides env
        const llmConfig = loadLLMConfig({ provider: config.provider, model: config.model });
        const engine: ChatEngineOptions = {
          transport: createTransport(llmConfig),
          model: resolveModel(llmConfig),
          ...config.generation,
        };

        // 3. Build the target field and the chain
        const output = buildField(config.output, engine);
        // Evaluated outputs get a revision budget unless one is given.
        const defaultRevisions =
          output.evaluations.length > 0 ? LIMITS.CHAIN_MAX_REVISIONS : undefined;
        const maxRevisions =
          opts.maxRevisions !== undefined
            ? Number(opts.maxRevisions)
            : (config.maxRevisions ?? defaultRevisions);
        const chain = createSingleOutputChain({
          ...engine,
          task: config.task,
          details: config.details,
          output,
          maxRevisions,
        });

        log.section(`Generating ${output.name} with ${engine.model}`);
        const result = await chain.run(inputs);

        // 4. JSON to stdout, status to exit code
        process.stdout.write(JSON.stringify(toRunOutput(result), null, 2) + '\n');
        process.exitCode = result.revision?.status === 'exhausted' ? EXIT_NOT_CONVERGED : 0;
      } catch (err) {
        log.error(errorMessage(err));
        process.exitCode = exitCodeFor(err);
      }
    });
}
