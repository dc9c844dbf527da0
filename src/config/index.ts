/**
 * Configuration module.
 * Defaults, model capability table, and config file loading.
 * File contents are zod-validated before use.
 */

export {
  CHAT_DEFAULTS,
  LIMITS,
  DEFAULT_MODELS,
  MODEL_CAPABILITIES,
  MODEL_FAMILY_CAPABILITIES,
} from './defaults.js';
export type { ModelCapabilities } from './defaults.js';
export { loadModuleConfig, loadInputs, parseConfigText } from './loader.js';
