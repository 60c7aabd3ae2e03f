import { z } from 'zod';

// OpenAI Responses API (Codex) 请求 schema
// 未识别 type 的内容块 / 输入项原样接受，已识别 type 的必须符合各自的结构

export const RESPONSES_CONTENT_PART_TYPES = ['input_text', 'output_text', 'input_image'] as const;
export const RESPONSES_INPUT_ITEM_TYPES = [
  'message',
  'function_call',
  'function_call_output',
  'reasoning',
] as const;

const knownPartTypes = new Set<string>(RESPONSES_CONTENT_PART_TYPES);
const knownItemTypes = new Set<string>(RESPONSES_INPUT_ITEM_TYPES);

export const responsesContentPartSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('input_text'), text: z.string() }).passthrough(),
  z.object({ type: z.literal('output_text'), text: z.string() }).passthrough(),
  z.object({ type: z.literal('input_image'), image_url: z.string() }).passthrough(),
]);

export const responsesUnknownPartSchema = z
  .object({ type: z.string() })
  .passthrough()
  .refine((part) => !knownPartTypes.has(part.type), { message: 'Malformed content part' });

const responsesPartListSchema = z.array(z.union([responsesContentPartSchema, responsesUnknownPartSchema]));

export const responsesMessageItemSchema = z
  .object({
    type: z.literal('message').optional(),
    role: z.enum(['user', 'assistant', 'system', 'developer']),
    content: z.union([z.string(), responsesPartListSchema]),
  })
  .passthrough();

export const responsesFunctionCallItemSchema = z
  .object({
    type: z.literal('function_call'),
    call_id: z.string(),
    name: z.string(),
    arguments: z.string(),
  })
  .passthrough();

export const responsesFunctionCallOutputItemSchema = z
  .object({
    type: z.literal('function_call_output'),
    call_id: z.string(),
    output: z.union([z.string(), responsesPartListSchema]),
  })
  .passthrough();

export const responsesReasoningItemSchema = z
  .object({
    type: z.literal('reasoning'),
    summary: z.array(z.object({ type: z.literal('summary_text'), text: z.string() }).passthrough()),
    encrypted_content: z.string().nullable().optional(),
  })
  .passthrough();

export const responsesInputItemSchema = z.union([
  responsesMessageItemSchema,
  responsesFunctionCallItemSchema,
  responsesFunctionCallOutputItemSchema,
  responsesReasoningItemSchema,
]);

// custom_tool_call、item_reference 等
export const responsesUnknownItemSchema = z
  .object({ type: z.string() })
  .passthrough()
  .refine((item) => !knownItemTypes.has(item.type), { message: 'Malformed input item' });

export const responsesToolSchema = z
  .object({
    type: z.string(),
    name: z.string().optional(),
    description: z.string().optional(),
    parameters: z.unknown().optional(),
  })
  .passthrough();

export const responsesToolChoiceSchema = z.union([
  z.enum(['auto', 'none', 'required']),
  z.object({ type: z.literal('function'), name: z.string() }),
]);

export const responsesReasoningSchema = z
  .object({
    effort: z.string().optional(),
  })
  .passthrough();

export const responsesRequestSchema = z
  .object({
    model: z.string().min(1),
    input: z.union([z.string(), z.array(z.union([responsesInputItemSchema, responsesUnknownItemSchema]))]),
    instructions: z.string().optional(),
    max_output_tokens: z.number().optional(),
    temperature: z.number().optional(),
    top_p: z.number().optional(),
    stream: z.boolean().optional(),
    tools: z.array(responsesToolSchema).optional(),
    tool_choice: responsesToolChoiceSchema.optional(),
    parallel_tool_calls: z.boolean().optional(),
    reasoning: responsesReasoningSchema.optional(),
  })
  .passthrough();

export type ResponsesContentPart = z.infer<typeof responsesContentPartSchema>;
export type ResponsesUnknownPart = z.infer<typeof responsesUnknownPartSchema>;
export type ResponsesInputItem = z.infer<typeof responsesInputItemSchema>;
export type ResponsesUnknownItem = z.infer<typeof responsesUnknownItemSchema>;
export type ResponsesMessageItem = z.infer<typeof responsesMessageItemSchema>;
export type ResponsesTool = z.infer<typeof responsesToolSchema>;
export type ResponsesToolChoice = z.infer<typeof responsesToolChoiceSchema>;
export type ResponsesRequest = z.infer<typeof responsesRequestSchema>;
