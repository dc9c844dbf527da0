import { z } from 'zod';

// ── Tool calls ───────────────────────────────────────────────

export const toolCallSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  arguments: z.string(),
});

export type ToolCall = z.infer<typeof toolCallSchema>;

// ── Messages ─────────────────────────────────────────────────

export const systemMessageSchema = z.object({
  role: z.literal('system'),
  content: z.string(),
});

export const userMessageSchema = z.object({
  role: z.literal('user'),
  content: z.string(),
});

export const assistantMessageSchema = z.object({
  role: z.literal('assistant'),
  content: z.string(),
  toolCalls: z.array(toolCallSchema).optional(),
});

export const toolMessageSchema = z.object({
  role: z.literal('tool'),
  content: z.string(),
  toolCallId: z.string().min(1),
  name: z.string().min(1),
});

export const messageSchema = z.discriminatedUnion('role', [
  systemMessageSchema,
  userMessageSchema,
  assistantMessageSchema,
  toolMessageSchema,
]);

export type Message = z.infer<typeof messageSchema>;
export type AssistantMessage = z.infer<typeof assistantMessageSchema>;
export type ToolMessage = z.infer<typeof toolMessageSchema>;

export type MessageRole = Message['role'];

// ── Transcript ───────────────────────────────────────────────
// A transcript is the history array in conversation order.

export const transcriptSchema = z.array(messageSchema);

export function parseTranscript(data: unknown): Message[] {
  return transcriptSchema.parse(data);
}
