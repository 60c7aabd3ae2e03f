import { z } from 'zod';

// Anthropic Messages API 请求 schema
// 所有对象都 passthrough，未识别字段交给 adapter 放进 extensions
// 未识别的内容块（document、server_tool_use 等）整块保留

export const ANTHROPIC_CONTENT_BLOCK_TYPES = [
  'text',
  'image',
  'thinking',
  'redacted_thinking',
  'tool_use',
  'tool_result',
] as const;

const knownBlockTypes = new Set<string>(ANTHROPIC_CONTENT_BLOCK_TYPES);

export const anthropicTextBlockSchema = z
  .object({ type: z.literal('text'), text: z.string() })
  .passthrough();

export const anthropicImageSourceSchema = z.union([
  z.object({ type: z.literal('base64'), media_type: z.string(), data: z.string() }).passthrough(),
  z.object({ type: z.literal('url'), url: z.string() }).passthrough(),
]);

export const anthropicImageBlockSchema = z
  .object({ type: z.literal('image'), source: anthropicImageSourceSchema })
  .passthrough();

export const anthropicThinkingBlockSchema = z
  .object({ type: z.literal('thinking'), thinking: z.string(), signature: z.string().optional() })
  .passthrough();

export const anthropicRedactedThinkingBlockSchema = z
  .object({ type: z.literal('redacted_thinking'), data: z.string() })
  .passthrough();

export const anthropicUnknownBlockSchema = z
  .object({ type: z.string() })
  .passthrough()
  .refine((block) => !knownBlockTypes.has(block.type), { message: 'Malformed content block' });

export const anthropicToolUseBlockSchema = z
  .object({ type: z.literal('tool_use'), id: z.string(), name: z.string(), input: z.unknown() })
  .passthrough();

export const anthropicToolResultBlockSchema = z
  .object({
    type: z.literal('tool_result'),
    tool_use_id: z.string(),
    content: z
      .union([
        z.string(),
        z.array(z.union([anthropicTextBlockSchema, anthropicImageBlockSchema, anthropicUnknownBlockSchema])),
      ])
      .optional(),
    is_error: z.boolean().optional(),
  })
  .passthrough();

export const anthropicContentBlockSchema = z.discriminatedUnion('type', [
  anthropicTextBlockSchema,
  anthropicImageBlockSchema,
  anthropicThinkingBlockSchema,
  anthropicRedactedThinkingBlockSchema,
  anthropicToolUseBlockSchema,
  anthropicToolResultBlockSchema,
]);

export const anthropicMessageSchema = z
  .object({
    role: z.enum(['user', 'assistant']),
    content: z.union([z.string(), z.array(z.union([anthropicContentBlockSchema, anthropicUnknownBlockSchema]))]),
  })
  .passthrough();

export const anthropicToolSchema = z
  .object({
    type: z.string().optional(),
    name: z.string(),
    description: z.string().optional(),
    input_schema: z.unknown().optional(),
  })
  .passthrough();

export const anthropicToolChoiceSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('auto') }).passthrough(),
  z.object({ type: z.literal('any') }).passthrough(),
  z.object({ type: z.literal('none') }).passthrough(),
  z.object({ type: z.literal('tool'), name: z.string() }).passthrough(),
]);

export const anthropicThinkingConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('enabled'), budget_tokens: z.number() }).passthrough(),
  z.object({ type: z.literal('disabled') }).passthrough(),
]);

export const anthropicRequestSchema = z
  .object({
    model: z.string().min(1),
    messages: z.array(anthropicMessageSchema).min(1),
    system: z.union([z.string(), z.array(anthropicTextBlockSchema)]).optional(),
    max_tokens: z.number().optional(),
    temperature: z.number().optional(),
    top_p: z.number().optional(),
    top_k: z.number().optional(),
    stop_sequences: z.array(z.string()).optional(),
    stream: z.boolean().optional(),
    tools: z.array(anthropicToolSchema).optional(),
    tool_choice: anthropicToolChoiceSchema.optional(),
    thinking: anthropicThinkingConfigSchema.optional(),
  })
  .passthrough();

export type AnthropicTextBlock = z.infer<typeof anthropicTextBlockSchema>;
export type AnthropicImageBlock = z.infer<typeof anthropicImageBlockSchema>;
export type AnthropicContentBlock = z.infer<typeof anthropicContentBlockSchema>;
export type AnthropicUnknownBlock = z.infer<typeof anthropicUnknownBlockSchema>;
export type AnthropicMessage = z.infer<typeof anthropicMessageSchema>;
export type AnthropicTool = z.infer<typeof anthropicToolSchema>;
export type AnthropicToolChoice = z.infer<typeof anthropicToolChoiceSchema>;
export type AnthropicRequest = z.infer<typeof anthropicRequestSchema>;
