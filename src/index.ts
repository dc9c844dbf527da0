/**
 * promptsmith library entry.
 * Everything the CLI uses is exported here for programmatic use.
 */

export * from './schema/index.js';
export * from './text/index.js';
export * from './config/index.js';
export * from './llm/index.js';
export * from './chat/index.js';
export * from './evaluation/index.js';
export * from './module/index.js';
export {
  ConfigurationError,
  UnknownToolError,
  ToolArgumentsError,
  IncompleteOutputError,
  errorMessage,
} from './utils/errors.js';
