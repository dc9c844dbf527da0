/**
 * Chat orchestration module.
 * Owns conversation history, issues completions and resolves tool calls.
 */

export { ChatEngine, createChatEngine, chatConfigSchema } from './engine.js';
export type {
  CallOptions,
  ChatConfig,
  ChatEngineOptions,
  ResolvedChatConfig,
  SendOptions,
} from './engine.js';
export {
  defineTool,
  buildToolMap,
  decodeArguments,
  drainToolOutput,
  isAsyncIterable,
  renderToolCall,
} from './tools.js';
export type { Tool, ToolArgs, ToolOutput, ToolResult, ToolSpec } from './tools.js';
export { TokenTally } from './tokens.js';
export type { UsageSummary } from './tokens.js';
export { StreamAccumulator } from './accumulator.js';
