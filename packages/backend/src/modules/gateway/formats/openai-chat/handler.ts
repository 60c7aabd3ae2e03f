/**
 * OpenAI Chat Completions 响应 / SSE ⇄ Canonical
 */

import { v4 as uuidv4 } from 'uuid';
import type { SseFrame } from '@ccproxy/shared';
import { logger } from '../../../../lib/logger.js';
import type {
  CanonicalResponse,
  CanonicalStreamEvent,
  ContentPart,
  StopReason,
  ToolCall,
  Usage,
} from '../../canonical/types.js';
import { ToolCallAssembler } from '../../canonical/tool-call-assembler.js';
import { EncodeError } from '../../errors.js';
import { extrasFor, parseWithSchema, pickExtras, toExtensions } from '../common.js';
import type { StreamDecoder, StreamEncoder, StreamEncoderOptions } from '../types.js';
import {
  CHAT_DONE_MARKER,
  chatChunkSchema,
  chatResponseSchema,
  toCanonicalStopReason,
  toFinishReason,
  type ChatUsage,
} from './models.js';

const FORMAT = 'openai-chat';

const RESPONSE_KEYS = ['id', 'object', 'created', 'model', 'choices', 'usage'];

// ==================== usage ====================

/**
 * prompt_tokens 含缓存命中部分；canonical inputTokens 只计未命中部分
 */
function decodeUsage(usage: ChatUsage | null | undefined): Usage {
  const cached = usage?.prompt_tokens_details?.cached_tokens ?? 0;
  const decoded: Usage = {
    inputTokens: Math.max((usage?.prompt_tokens ?? 0) - cached, 0),
    outputTokens: usage?.completion_tokens ?? 0,
  };
  if (cached) decoded.cacheReadTokens = cached;
  const reasoning = usage?.completion_tokens_details?.reasoning_tokens;
  if (reasoning) decoded.reasoningTokens = reasoning;
  return decoded;
}

function encodeUsage(usage: Usage): Record<string, unknown> {
  const promptTokens = usage.inputTokens + (usage.cacheReadTokens ?? 0) + (usage.cacheWriteTokens ?? 0);
  const encoded: Record<string, unknown> = {
    prompt_tokens: promptTokens,
    completion_tokens: usage.outputTokens,
    total_tokens: promptTokens + usage.outputTokens,
  };
  if (usage.cacheReadTokens !== undefined) {
    encoded.prompt_tokens_details = { cached_tokens: usage.cacheReadTokens };
  }
  if (usage.reasoningTokens !== undefined) {
    encoded.completion_tokens_details = { reasoning_tokens: usage.reasoningTokens };
  }
  return encoded;
}

// ==================== 非流式响应 ====================

export function decodeChatResponse(body: unknown): CanonicalResponse {
  const response = parseWithSchema(chatResponseSchema, body, FORMAT, 502);
  const [choice] = response.choices;
  const message = choice.message;

  const content: ContentPart[] = [];
  if (message.reasoning_content) content.push({ type: 'thinking', text: message.reasoning_content });
  const text = (message.content ?? '') + (message.refusal ?? '');
  if (text) content.push({ type: 'text', text });

  const toolCalls: ToolCall[] = (message.tool_calls ?? []).map((call) => ({
    id: call.id,
    name: call.function.name,
    arguments: call.function.arguments,
  }));

  const decoded: CanonicalResponse = {
    id: response.id,
    model: response.model,
    content,
    toolCalls,
    stopReason: message.refusal ? 'refusal' : toCanonicalStopReason(choice.finish_reason),
    usage: decodeUsage(response.usage),
  };

  const extensions = toExtensions(FORMAT, pickExtras(response, RESPONSE_KEYS));
  if (extensions) decoded.extensions = extensions;
  return decoded;
}

/**
 * canonical → chat.completion
 * thinking 签名 / 加密推理没有对应字段：只输出推理文本，丢弃时记 warn。
 * 不报错，否则所有带 thinking 的 Anthropic 响应都无法转成 chat
 */
export function encodeChatResponse(response: CanonicalResponse): Record<string, unknown> {
  const text: string[] = [];
  const reasoning: string[] = [];
  let dropped = 0;
  for (const part of response.content) {
    if (part.type === 'image') {
      throw new EncodeError(FORMAT, 'Image output has no openai-chat representation');
    }
    if (part.type === 'thinking' && (part.signature !== undefined || part.encrypted !== undefined)) dropped++;
    (part.type === 'text' ? text : reasoning).push(part.text);
  }
  if (dropped > 0) {
    logger.warn({ parts: dropped, id: response.id }, 'Dropping reasoning signatures with no openai-chat field');
  }

  const message: Record<string, unknown> = {
    role: 'assistant',
    content: text.length > 0 ? text.join('') : null,
  };
  if (reasoning.some(Boolean)) message.reasoning_content = reasoning.join('');
  if (response.toolCalls.length > 0) {
    message.tool_calls = response.toolCalls.map((call) => ({
      id: call.id,
      type: 'function',
      function: { name: call.name, arguments: call.arguments },
    }));
  }

  return {
    ...extrasFor(response.extensions, FORMAT),
    id: response.id,
    object: 'chat.completion',
    created: Math.floor(Date.now() / 1000),
    model: response.model,
    choices: [{ index: 0, message, finish_reason: toFinishReason(response.stopReason) }],
    usage: encodeUsage(response.usage),
  };
}

// ==================== 流式：上游 → canonical ====================

type ContentKind = 'text' | 'thinking';

/**
 * Chat Completions chunk 解码器
 * tool_calls 没有逐调用的结束标记：参数结构完整或遇到 finish_reason / [DONE] 时产出
 */
export class ChatStreamDecoder implements StreamDecoder {
  private started = false;
  private contentKind: ContentKind | null = null;
  private contentIndex = -1;
  private tools = new Map<number, ToolCallAssembler>();
  private stopReason: StopReason | undefined;
  private usage: Usage = { inputTokens: 0, outputTokens: 0 };
  private stopped = false;
  private errored = false;

  get terminated(): boolean {
    return this.stopped || this.errored;
  }

  push(frame: SseFrame): CanonicalStreamEvent[] {
    if (frame.data.trim() === CHAT_DONE_MARKER) {
      return this.terminated ? [] : this.stop();
    }

    let payload: unknown;
    try {
      payload = JSON.parse(frame.data);
    } catch {
      logger.debug({ data: frame.data.substring(0, 200) }, 'Failed to parse chat completion chunk');
      return [];
    }

    const parsed = chatChunkSchema.safeParse(payload);
    if (!parsed.success) {
      logger.debug('Unrecognized chat completion chunk');
      return [];
    }
    const chunk = parsed.data;

    if (chunk.error) {
      this.errored = true;
      return [
        {
          type: 'error',
          error: { code: chunk.error.type ?? 'upstream_error', message: chunk.error.message },
        },
      ];
    }

    const events: CanonicalStreamEvent[] = [];
    if (!this.started && (chunk.id !== undefined || chunk.model !== undefined)) {
      this.started = true;
      events.push({ type: 'message_start', id: chunk.id ?? '', model: chunk.model ?? '' });
    }
    if (chunk.usage) this.usage = decodeUsage(chunk.usage);

    const choice = chunk.choices?.[0];
    if (!choice) return events;

    const delta = choice.delta;
    if (delta?.reasoning_content) events.push(this.contentDelta('thinking', delta.reasoning_content));
    if (delta?.content) events.push(this.contentDelta('text', delta.content));
    if (delta?.refusal) {
      this.stopReason = 'refusal';
      events.push(this.contentDelta('text', delta.refusal));
    }

    for (const call of delta?.tool_calls ?? []) {
      let assembler = this.tools.get(call.index);
      if (!assembler) {
        assembler = new ToolCallAssembler(this.tools.size, call.id ?? '', call.function?.name ?? '');
        this.tools.set(call.index, assembler);
      } else {
        if (call.id && !assembler.id) assembler.id = call.id;
        if (call.function?.name && !assembler.name) assembler.name = call.function.name;
      }
      assembler.append(call.function?.arguments ?? '');
      if (!assembler.isComplete && assembler.isStructurallyComplete()) {
        events.push(assembler.complete());
      }
    }

    if (choice.finish_reason) {
      if (this.stopReason !== 'refusal') this.stopReason = toCanonicalStopReason(choice.finish_reason);
      events.push(...this.completeTools());
    }
    return events;
  }

  finish(): CanonicalStreamEvent[] {
    if (this.terminated) return [];
    return this.stop();
  }

  private contentDelta(kind: ContentKind, text: string): CanonicalStreamEvent {
    if (this.contentKind !== kind) {
      this.contentKind = kind;
      this.contentIndex++;
    }
    return { type: 'content_delta', index: this.contentIndex, delta: { type: kind, text } };
  }

  private completeTools(): CanonicalStreamEvent[] {
    const events: CanonicalStreamEvent[] = [];
    for (const assembler of this.tools.values()) {
      if (!assembler.isComplete) events.push(assembler.complete());
    }
    return events;
  }

  private stop(): CanonicalStreamEvent[] {
    const events = this.completeTools();
    this.stopped = true;
    events.push({
      type: 'message_stop',
      stopReason: this.stopReason ?? (this.tools.size > 0 ? 'tool_use' : 'end_turn'),
      usage: { ...this.usage },
    });
    return events;
  }
}

// ==================== 流式：canonical → 调用方 ====================

/**
 * canonical 事件 → chat.completion.chunk
 */
export class ChatStreamEncoder implements StreamEncoder {
  private started = false;
  private stopped = false;
  private warnedDrop = false;
  private id = '';
  private model: string;
  private readonly created = Math.floor(Date.now() / 1000);

  constructor(options: StreamEncoderOptions) {
    this.model = options.model;
  }

  encode(event: CanonicalStreamEvent): SseFrame[] {
    if (this.stopped) return [];

    switch (event.type) {
      case 'message_start':
        if (this.started) return [];
        return this.start(event.id, event.model);

      case 'content_delta': {
        const frames = this.ensureStarted();
        const delta = event.delta;
        if (delta.type === 'text' && delta.text) {
          frames.push(this.chunk({ content: delta.text }));
        } else if (delta.type === 'thinking' && delta.text) {
          frames.push(this.chunk({ reasoning_content: delta.text }));
        } else if (delta.type === 'signature' || delta.type === 'encrypted') {
          // chat chunk 没有对应字段，与非流式一致：丢弃并记一次 warn
          this.warnDropped(delta.type);
        }
        return frames;
      }

      case 'tool_call': {
        const frames = this.ensureStarted();
        frames.push(
          this.chunk({
            tool_calls: [
              {
                index: event.toolIndex,
                id: event.id,
                type: 'function',
                function: { name: event.name, arguments: event.arguments },
              },
            ],
          })
        );
        return frames;
      }

      case 'message_stop': {
        const frames = this.ensureStarted();
        frames.push(
          this.chunk({}, toFinishReason(event.stopReason), { usage: encodeUsage(event.usage) }),
          { data: CHAT_DONE_MARKER }
        );
        this.stopped = true;
        return frames;
      }

      case 'error':
        this.stopped = true;
        return [
          {
            data: JSON.stringify({
              error: { message: event.error.message, type: event.error.code, code: event.error.code },
            }),
          },
        ];
    }
  }

  private ensureStarted(): SseFrame[] {
    if (this.started) return [];
    return this.start(`chatcmpl-${uuidv4()}`, this.model);
  }

  private start(id: string, model: string): SseFrame[] {
    this.started = true;
    this.id = id;
    if (model) this.model = model;
    return [this.chunk({ role: 'assistant', content: '' })];
  }

  private warnDropped(kind: 'signature' | 'encrypted'): void {
    if (this.warnedDrop) return;
    this.warnedDrop = true;
    logger.warn({ kind, id: this.id }, 'Dropping reasoning signatures with no openai-chat field');
  }

  private chunk(
    delta: Record<string, unknown>,
    finishReason: string | null = null,
    extra: Record<string, unknown> = {}
  ): SseFrame {
    return {
      data: JSON.stringify({
        id: this.id,
        object: 'chat.completion.chunk',
        created: this.created,
        model: this.model,
        choices: [{ index: 0, delta, finish_reason: finishReason }],
        ...extra,
      }),
    };
  }
}
