import type {
  CompletionChunk,
  CompletionResponse,
  TokenUsage,
  ToolCall,
} from '../schema/index.js';
import { EMPTY_USAGE } from '../schema/index.js';

interface PartialToolCall {
  id: string;
  name: string;
  arguments: string;
}

/**
 * Rebuilds a complete response from streamed chunks so history and token
 * tallies are updated exactly as on the non-streaming path.
 */
export class StreamAccumulator {
  private content = '';
  private sawContent = false;
  private readonly calls = new Map<number, PartialToolCall>();
  private usage: TokenUsage = EMPTY_USAGE;

  add(chunk: CompletionChunk): void {
    if (chunk.contentDelta) {
      this.content += chunk.contentDelta;
      this.sawContent = true;
    }

    for (const delta of chunk.toolCallDeltas ?? []) {
      const call = this.calls.get(delta.index) ?? { id: '', name: '', arguments: '' };
      if (delta.id) call.id = delta.id;
      if (delta.name) call.name += delta.name;
      if (delta.argumentsDelta) call.arguments += delta.argumentsDelta;
      this.calls.set(delta.index, call);
    }

    if (chunk.usage) this.usage = chunk.usage;
  }

  toResponse(): CompletionResponse {
    const toolCalls: ToolCall[] = [...this.calls.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, call]) => ({
        id: call.id || `call_${String(index)}`,
        name: call.name,
        arguments: call.arguments,
      }));

    return {
      content: this.sawContent ? this.content : null,
      toolCalls,
      usage: this.usage,
    };
  }
}
