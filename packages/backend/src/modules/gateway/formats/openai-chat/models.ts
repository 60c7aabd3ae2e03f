/**
 * OpenAI Chat Completions 响应 / chunk 类型和常量
 */

import { z } from 'zod';
import type { StopReason } from '../../canonical/types.js';

// ==================== 响应 ====================

export const chatUsageSchema = z
  .object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
    prompt_tokens_details: z.object({ cached_tokens: z.number().optional() }).passthrough().nullable().optional(),
    completion_tokens_details: z
      .object({ reasoning_tokens: z.number().optional() })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

const chatResponseToolCallSchema = z
  .object({
    id: z.string(),
    type: z.literal('function').optional(),
    function: z.object({ name: z.string(), arguments: z.string() }).passthrough(),
  })
  .passthrough();

export const chatResponseSchema = z
  .object({
    id: z.string(),
    model: z.string(),
    choices: z
      .array(
        z
          .object({
            index: z.number().optional(),
            message: z
              .object({
                role: z.literal('assistant').optional(),
                content: z.string().nullable().optional(),
                reasoning_content: z.string().nullable().optional(),
                refusal: z.string().nullable().optional(),
                tool_calls: z.array(chatResponseToolCallSchema).nullable().optional(),
              })
              .passthrough(),
            finish_reason: z.string().nullable().optional(),
          })
          .passthrough()
      )
      .min(1),
    usage: chatUsageSchema.nullable().optional(),
  })
  .passthrough();

export type ChatUsage = z.infer<typeof chatUsageSchema>;
export type ChatResponse = z.infer<typeof chatResponseSchema>;

// ==================== chunk ====================

export const chatChunkSchema = z
  .object({
    id: z.string().optional(),
    model: z.string().optional(),
    choices: z
      .array(
        z
          .object({
            index: z.number().optional(),
            delta: z
              .object({
                role: z.string().optional(),
                content: z.string().nullable().optional(),
                reasoning_content: z.string().nullable().optional(),
                refusal: z.string().nullable().optional(),
                tool_calls: z
                  .array(
                    z
                      .object({
                        index: z.number(),
                        id: z.string().optional(),
                        function: z
                          .object({ name: z.string().optional(), arguments: z.string().optional() })
                          .passthrough()
                          .optional(),
                      })
                      .passthrough()
                  )
                  .nullable()
                  .optional(),
              })
              .passthrough()
              .optional(),
            finish_reason: z.string().nullable().optional(),
          })
          .passthrough()
      )
      .optional(),
    usage: chatUsageSchema.nullable().optional(),
    error: z
      .object({ message: z.string(), type: z.string().optional(), code: z.unknown().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type ChatChunk = z.infer<typeof chatChunkSchema>;

// ==================== 常量 ====================

export const CHAT_DONE_MARKER = '[DONE]';

/** finish_reason → canonical stop reason */
export const CHAT_FINISH_REASONS: Record<string, StopReason> = {
  stop: 'end_turn',
  length: 'max_tokens',
  tool_calls: 'tool_use',
  function_call: 'tool_use',
  content_filter: 'refusal',
};

export function toCanonicalStopReason(reason: string | null | undefined): StopReason {
  if (!reason) return 'end_turn';
  return CHAT_FINISH_REASONS[reason] ?? 'end_turn';
}

export function toFinishReason(reason: StopReason): string {
  switch (reason) {
    case 'end_turn':
    case 'stop_sequence':
      return 'stop';
    case 'max_tokens':
      return 'length';
    case 'tool_use':
      return 'tool_calls';
    case 'refusal':
      return 'content_filter';
  }
}
