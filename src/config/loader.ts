import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { inputsFileSchema, moduleFileConfigSchema } from '../schema/config.js';
import type { InputsFile, ModuleFileConfig } from '../schema/config.js';

// ── Parsing ─────────────────────────────────────────────────

/** Parse YAML, or JSON when the path ends in `.json`. */
export function parseConfigText(raw: string, configPath: string): unknown {
  return configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a module config file (YAML or JSON).
 * Throws if the file is missing or fails validation.
 */
export async function loadModuleConfig(configPath: string): Promise<ModuleFileConfig> {
  const raw = await readFile(configPath, 'utf-8');
  return moduleFileConfigSchema.parse(parseConfigText(raw, configPath));
}

/** Load named input values for a module run. */
export async function loadInputs(inputsPath: string): Promise<InputsFile> {
  const raw = await readFile(inputsPath, 'utf-8');
  return inputsFileSchema.parse(parseConfigText(raw, inputsPath) ?? {});
}
