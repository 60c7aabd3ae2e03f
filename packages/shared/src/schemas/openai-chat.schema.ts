import { z } from 'zod';

// OpenAI Chat Completions 请求 schema

export const chatTextPartSchema = z
  .object({ type: z.literal('text'), text: z.string() })
  .passthrough();

export const chatImagePartSchema = z
  .object({
    type: z.literal('image_url'),
    image_url: z.object({ url: z.string(), detail: z.string().optional() }).passthrough(),
  })
  .passthrough();

export const chatContentPartSchema = z.discriminatedUnion('type', [
  chatTextPartSchema,
  chatImagePartSchema,
]);

export const chatToolCallSchema = z
  .object({
    id: z.string(),
    type: z.literal('function'),
    function: z.object({ name: z.string(), arguments: z.string() }).passthrough(),
  })
  .passthrough();

const textContentSchema = z.union([z.string(), z.array(chatTextPartSchema)]);

export const chatMessageSchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('system'), content: textContentSchema }).passthrough(),
  z.object({ role: z.literal('developer'), content: textContentSchema }).passthrough(),
  z
    .object({
      role: z.literal('user'),
      content: z.union([z.string(), z.array(chatContentPartSchema)]),
    })
    .passthrough(),
  z
    .object({
      role: z.literal('assistant'),
      content: z.union([z.string(), z.array(chatTextPartSchema)]).nullable().optional(),
      tool_calls: z.array(chatToolCallSchema).optional(),
      reasoning_content: z.string().optional(),
    })
    .passthrough(),
  z
    .object({ role: z.literal('tool'), tool_call_id: z.string(), content: textContentSchema })
    .passthrough(),
]);

export const chatToolSchema = z
  .object({
    type: z.literal('function'),
    function: z
      .object({
        name: z.string(),
        description: z.string().optional(),
        parameters: z.unknown().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const chatToolChoiceSchema = z.union([
  z.enum(['auto', 'none', 'required']),
  z.object({
    type: z.literal('function'),
    function: z.object({ name: z.string() }),
  }),
]);

export const chatRequestSchema = z
  .object({
    model: z.string().min(1),
    messages: z.array(chatMessageSchema).min(1),
    max_tokens: z.number().optional(),
    max_completion_tokens: z.number().optional(),
    temperature: z.number().optional(),
    top_p: z.number().optional(),
    stop: z.union([z.string(), z.array(z.string())]).optional(),
    stream: z.boolean().optional(),
    tools: z.array(chatToolSchema).optional(),
    tool_choice: chatToolChoiceSchema.optional(),
    parallel_tool_calls: z.boolean().optional(),
    reasoning_effort: z.enum(['minimal', 'low', 'medium', 'high']).optional(),
  })
  .passthrough();

export type ChatContentPart = z.infer<typeof chatContentPartSchema>;
export type ChatToolCall = z.infer<typeof chatToolCallSchema>;
export type ChatMessage = z.infer<typeof chatMessageSchema>;
export type ChatTool = z.infer<typeof chatToolSchema>;
export type ChatToolChoice = z.infer<typeof chatToolChoiceSchema>;
export type ChatRequest = z.infer<typeof chatRequestSchema>;
