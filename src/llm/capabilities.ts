import {
  MODEL_CAPABILITIES,
  MODEL_FAMILY_CAPABILITIES,
} from '../config/defaults.js';
import type { ModelCapabilities } from '../config/defaults.js';

const UNKNOWN_MODEL: ModelCapabilities = {
  functionCalling: false,
  assistantPrefill: false,
};

/**
 * Capability flags for a model id. Exact matches win, then family prefixes;
 * unknown models are assumed to support neither feature.
 */
export function getModelCapabilities(model: string): ModelCapabilities {
  const exact = MODEL_CAPABILITIES[model];
  if (exact) return exact;

  const family = MODEL_FAMILY_CAPABILITIES.find(([prefix]) =>
    model.startsWith(prefix),
  );
  return family?.[1] ?? UNKNOWN_MODEL;
}
