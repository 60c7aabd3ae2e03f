/**
 * OpenAI Responses API（Codex）响应 / SSE 事件类型和常量
 */

import { z } from 'zod';

// ==================== 响应 ====================

export const responsesUsageSchema = z
  .object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
    input_tokens_details: z.object({ cached_tokens: z.number().optional() }).passthrough().nullable().optional(),
    output_tokens_details: z
      .object({ reasoning_tokens: z.number().optional() })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

const outputContentSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
    refusal: z.string().optional(),
  })
  .passthrough();

export const responsesOutputItemSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('message'),
      id: z.string().optional(),
      role: z.string().optional(),
      content: z.array(outputContentSchema).default([]),
    })
    .passthrough(),
  z
    .object({
      type: z.literal('reasoning'),
      id: z.string().optional(),
      summary: z.array(z.object({ text: z.string() }).passthrough()).default([]),
      encrypted_content: z.string().nullable().optional(),
    })
    .passthrough(),
  z
    .object({
      type: z.literal('function_call'),
      id: z.string().optional(),
      call_id: z.string(),
      name: z.string(),
      arguments: z.string().default(''),
    })
    .passthrough(),
]);

// 输出项先按宽松结构接收，再用 responsesOutputItemSchema 识别已知类型
export const rawOutputItemSchema = z.object({ type: z.string() }).passthrough();

export const responsesResponseSchema = z
  .object({
    id: z.string(),
    model: z.string(),
    status: z.string().optional(),
    output: z.array(rawOutputItemSchema).default([]),
    usage: responsesUsageSchema.nullable().optional(),
    incomplete_details: z.object({ reason: z.string().optional() }).passthrough().nullable().optional(),
    error: z
      .object({ code: z.string().nullable().optional(), message: z.string() })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

export type ResponsesUsage = z.infer<typeof responsesUsageSchema>;
export type ResponsesOutputItem = z.infer<typeof responsesOutputItemSchema>;
export type ResponsesResponse = z.infer<typeof responsesResponseSchema>;

// ==================== SSE 事件 ====================

const itemRef = { item_id: z.string(), output_index: z.number().optional() };

export const responsesStreamEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('response.created'), response: responsesResponseSchema }).passthrough(),
  z.object({ type: z.literal('response.completed'), response: responsesResponseSchema }).passthrough(),
  z.object({ type: z.literal('response.incomplete'), response: responsesResponseSchema }).passthrough(),
  z.object({ type: z.literal('response.failed'), response: responsesResponseSchema }).passthrough(),
  z
    .object({
      type: z.literal('response.output_item.added'),
      item: rawOutputItemSchema,
    })
    .passthrough(),
  z
    .object({
      type: z.literal('response.output_item.done'),
      item: rawOutputItemSchema,
    })
    .passthrough(),
  z
    .object({
      type: z.literal('response.content_part.added'),
      ...itemRef,
      content_index: z.number(),
      part: outputContentSchema,
    })
    .passthrough(),
  z
    .object({ type: z.literal('response.output_text.delta'), ...itemRef, content_index: z.number(), delta: z.string() })
    .passthrough(),
  z
    .object({ type: z.literal('response.output_text.done'), ...itemRef, content_index: z.number(), text: z.string() })
    .passthrough(),
  z
    .object({ type: z.literal('response.refusal.delta'), ...itemRef, content_index: z.number(), delta: z.string() })
    .passthrough(),
  z
    .object({
      type: z.literal('response.reasoning_summary_text.delta'),
      ...itemRef,
      summary_index: z.number(),
      delta: z.string(),
    })
    .passthrough(),
  z
    .object({ type: z.literal('response.function_call_arguments.delta'), ...itemRef, delta: z.string() })
    .passthrough(),
  z
    .object({ type: z.literal('response.function_call_arguments.done'), ...itemRef, arguments: z.string() })
    .passthrough(),
  z
    .object({
      type: z.literal('error'),
      code: z.string().nullable().optional(),
      message: z.string(),
    })
    .passthrough(),
]);

export type ResponsesStreamEvent = z.infer<typeof responsesStreamEventSchema>;

// ==================== 常量 ====================

/** 推理摘要多段之间的分隔 */
export const SUMMARY_SEPARATOR = '\n\n';

export const RESPONSES_TERMINAL_EVENT = 'response.completed';
