/**
 * Anthropic Messages API 响应 / SSE 事件类型和常量
 */

import { z } from 'zod';
import type { StopReason } from '../../canonical/types.js';

// ==================== 响应 ====================

export const anthropicUsageSchema = z
  .object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
    cache_read_input_tokens: z.number().nullable().optional(),
    cache_creation_input_tokens: z.number().nullable().optional(),
  })
  .passthrough();

export const anthropicResponseBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
    thinking: z.string().optional(),
    signature: z.string().optional(),
    data: z.string().optional(),
    id: z.string().optional(),
    name: z.string().optional(),
    input: z.unknown().optional(),
  })
  .passthrough();

export const anthropicResponseSchema = z
  .object({
    id: z.string(),
    type: z.literal('message').optional(),
    role: z.literal('assistant').optional(),
    model: z.string(),
    content: z.array(anthropicResponseBlockSchema),
    stop_reason: z.string().nullable().optional(),
    stop_sequence: z.string().nullable().optional(),
    usage: anthropicUsageSchema.optional(),
  })
  .passthrough();

export type AnthropicUsage = z.infer<typeof anthropicUsageSchema>;
export type AnthropicResponseBlock = z.infer<typeof anthropicResponseBlockSchema>;

export interface AnthropicResponse {
  id: string;
  type: 'message';
  role: 'assistant';
  model: string;
  content: Record<string, unknown>[];
  stop_reason: string;
  stop_sequence: string | null;
  usage: {
    input_tokens: number;
    output_tokens: number;
    cache_read_input_tokens?: number;
    cache_creation_input_tokens?: number;
  };
  [key: string]: unknown;
}

// ==================== SSE 事件 ====================

export const anthropicStreamEventSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('message_start'),
      message: z
        .object({ id: z.string(), model: z.string(), usage: anthropicUsageSchema.optional() })
        .passthrough(),
    })
    .passthrough(),
  z
    .object({
      type: z.literal('content_block_start'),
      index: z.number(),
      content_block: anthropicResponseBlockSchema,
    })
    .passthrough(),
  z
    .object({
      type: z.literal('content_block_delta'),
      index: z.number(),
      delta: z
        .object({
          type: z.string(),
          text: z.string().optional(),
          thinking: z.string().optional(),
          signature: z.string().optional(),
          partial_json: z.string().optional(),
        })
        .passthrough(),
    })
    .passthrough(),
  z.object({ type: z.literal('content_block_stop'), index: z.number() }).passthrough(),
  z
    .object({
      type: z.literal('message_delta'),
      delta: z
        .object({
          stop_reason: z.string().nullable().optional(),
          stop_sequence: z.string().nullable().optional(),
        })
        .passthrough(),
      usage: anthropicUsageSchema.optional(),
    })
    .passthrough(),
  z.object({ type: z.literal('message_stop') }).passthrough(),
  z.object({ type: z.literal('ping') }).passthrough(),
  z
    .object({
      type: z.literal('error'),
      error: z.object({ type: z.string(), message: z.string() }).passthrough(),
    })
    .passthrough(),
]);

export type AnthropicStreamEvent = z.infer<typeof anthropicStreamEventSchema>;

// ==================== 常量 ====================

export const ANTHROPIC_DEFAULT_MAX_TOKENS = 4096;

export const ANTHROPIC_STOP_REASONS: Record<string, StopReason> = {
  end_turn: 'end_turn',
  max_tokens: 'max_tokens',
  tool_use: 'tool_use',
  stop_sequence: 'stop_sequence',
  refusal: 'refusal',
  pause_turn: 'end_turn',
};

export function toCanonicalStopReason(reason: string | null | undefined): StopReason {
  if (!reason) return 'end_turn';
  return ANTHROPIC_STOP_REASONS[reason] ?? 'end_turn';
}
