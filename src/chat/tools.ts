import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import type { ToolCall, ToolSchema } from '../schema/index.js';
import { ConfigurationError, ToolArgumentsError } from '../utils/errors.js';

// ── Public types ─────────────────────────────────────────────

export type ToolResult = string | null | undefined;

/**
 * What a tool handler may return. An async iterable yields cumulative
 * snapshots of the tool's text, the same shape the engine streams.
 */
export type ToolOutput = ToolResult | Promise<ToolResult> | AsyncIterable<string>;

export type ToolArgs = Record<string, unknown>;

export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly schema: ToolSchema;
  invoke(args: ToolArgs): ToolOutput;
}

export interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: S;
  handler: (args: z.output<S>) => ToolOutput;
}

// ── Definition ───────────────────────────────────────────────

const TOOL_NAME = /^[a-zA-Z0-9_-]{1,64}$/;

function toParameters(schema: z.ZodTypeAny): Record<string, unknown> {
  const parameters: Record<string, unknown> = {
    ...zodToJsonSchema(schema, { $refStrategy: 'none' }),
  };
  delete parameters['$schema'];
  return parameters;
}

/**
 * Bind a handler to its zod parameter schema. The JSON schema sent to the
 * backend and the validation applied before invocation share that schema.
 */
export function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): Tool {
  if (!TOOL_NAME.test(spec.name)) {
    throw new ConfigurationError(`Invalid tool name "${spec.name}"`);
  }

  return {
    name: spec.name,
    description: spec.description,
    schema: {
      type: 'function',
      function: {
        name: spec.name,
        description: spec.description,
        parameters: toParameters(spec.parameters),
      },
    },
    invoke(args: ToolArgs): ToolOutput {
      const parsed = spec.parameters.safeParse(args);
      if (!parsed.success) {
        throw new ToolArgumentsError(spec.name, parsed.error.message);
      }
      return spec.handler(parsed.data);
    },
  };
}

/** Index tools by name; duplicate names would desync schemas and handlers. */
export function buildToolMap(tools: readonly Tool[]): ReadonlyMap<string, Tool> {
  const map = new Map<string, Tool>();
  for (const tool of tools) {
    if (map.has(tool.name)) {
      throw new ConfigurationError(`Duplicate tool name "${tool.name}"`);
    }
    map.set(tool.name, tool);
  }
  return map;
}

// ── Arguments ────────────────────────────────────────────────

const toolArgsSchema = z.record(z.string(), z.unknown());

export function decodeArguments(call: ToolCall): ToolArgs {
  let raw: unknown;
  try {
    raw = JSON.parse(call.arguments || '{}');
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new ToolArgumentsError(call.name, `Invalid JSON: ${message}`);
  }

  const parsed = toolArgsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ToolArgumentsError(call.name, 'Arguments must be a JSON object');
  }
  return parsed.data;
}

// ── Output ───────────────────────────────────────────────────

export function isAsyncIterable(value: unknown): value is AsyncIterable<string> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

/** Await a tool's output to completion; the last snapshot wins. */
export async function drainToolOutput(output: ToolOutput): Promise<string> {
  if (isAsyncIterable(output)) {
    let last = '';
    for await (const snapshot of output) {
      last = snapshot;
    }
    return last;
  }
  return (await output) ?? '';
}

// ── Rendering ────────────────────────────────────────────────

export function renderToolHeader(call: ToolCall): string {
  return `\n\n[tool] ${call.name}(${call.arguments})\n`;
}

export function renderToolCall(call: ToolCall, result: string): string {
  return `${renderToolHeader(call)}${result}\n\n`;
}
