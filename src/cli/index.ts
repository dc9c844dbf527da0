/**
 * CLI module, a thin wrapper over the library.
 * Parses arguments, builds engines, handles exit codes.
 */

export { registerChatCommand, registerAgentCommand } from './chat.js';
export { registerRunCommand } from './run.js';
export { exitCodeFor, EXIT_NOT_CONVERGED } from './exit.js';
export { weatherTool, createExecutePromptTool } from './tools.js';
export type { ExecutePromptOptions } from './tools.js';
