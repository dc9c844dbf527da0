import type { CompletionTransport } from './client.js';
import type {
  CompletionChunk,
  CompletionRequest,
  CompletionResponse,
} from '../schema/index.js';
import { EMPTY_USAGE } from '../schema/index.js';

const DEFAULT_RESPONSE: CompletionResponse = {
  content: 'mock',
  toolCalls: [],
  usage: EMPTY_USAGE,
};

// A scripted turn: plain text, a full response, or a thrown error.
export type MockTurn = string | Partial<CompletionResponse> | Error;

export interface MockTransport extends CompletionTransport {
  /** Every request received, in order, with messages copied at call time. */
  readonly requests: CompletionRequest[];
}

function toResponse(turn: string | Partial<CompletionResponse>): CompletionResponse {
  if (typeof turn === 'string') {
    return { ...DEFAULT_RESPONSE, content: turn };
  }
  return {
    content: turn.content ?? null,
    toolCalls: turn.toolCalls ?? [],
    usage: turn.usage ?? EMPTY_USAGE,
  };
}

/** Splits text into chunks of at most `size` characters. */
function splitText(text: string, size: number): string[] {
  const parts: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    parts.push(text.slice(i, i + size));
  }
  return parts;
}

/**
 * Mock completion transport for testing.
 * Plays through the scripted turns in order, falling back to a default.
 * Streaming splits content into `chunkSize` pieces, then emits tool calls
 * and usage on their own chunks.
 */
export function createMockTransport(
  turns?: readonly MockTurn[],
  chunkSize = 4,
): MockTransport {
  const requests: CompletionRequest[] = [];
  let callIndex = 0;

  function next(request: CompletionRequest): CompletionResponse {
    requests.push({ ...request, messages: [...request.messages] });
    const turn = turns?.[callIndex];
    callIndex++;
    if (turn instanceof Error) throw turn;
    return turn === undefined ? DEFAULT_RESPONSE : toResponse(turn);
  }

  return {
    requests,

    async complete(request: CompletionRequest): Promise<CompletionResponse> {
      return next(request);
    },

    async *stream(request: CompletionRequest): AsyncGenerator<CompletionChunk> {
      const response = next(request);

      for (const part of splitText(response.content ?? '', chunkSize)) {
        yield { contentDelta: part };
      }

      for (const [index, call] of response.toolCalls.entries()) {
        yield {
          toolCallDeltas: [{ index, id: call.id, name: call.name }],
        };
        yield {
          toolCallDeltas: [{ index, argumentsDelta: call.arguments }],
        };
      }

      yield { usage: response.usage };
    },
  };
}
