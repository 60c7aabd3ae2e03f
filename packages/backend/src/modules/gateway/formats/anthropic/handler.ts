/**
 * Anthropic Messages 响应 / SSE ⇄ Canonical
 */

import { v4 as uuidv4 } from 'uuid';
import type { SseFrame } from '@ccproxy/shared';
import { logger } from '../../../../lib/logger.js';
import type {
  CanonicalResponse,
  CanonicalStreamEvent,
  ContentDelta,
  ContentPart,
  StopReason,
  ThinkingPart,
  ToolCall,
  Usage,
} from '../../canonical/types.js';
import { ToolCallAssembler } from '../../canonical/tool-call-assembler.js';
import { extrasFor, parseWithSchema, pickExtras, toExtensions } from '../common.js';
import type { StreamDecoder, StreamEncoder, StreamEncoderOptions } from '../types.js';
import { parseToolArguments } from './converter.js';
import {
  anthropicResponseSchema,
  anthropicStreamEventSchema,
  toCanonicalStopReason,
  type AnthropicResponse,
  type AnthropicResponseBlock,
  type AnthropicUsage,
} from './models.js';

const FORMAT = 'anthropic';

const RESPONSE_KEYS = ['id', 'type', 'role', 'model', 'content', 'stop_reason', 'stop_sequence', 'usage'];

// ==================== 非流式响应 ====================

/**
 * 上游 Anthropic 响应 → canonical
 */
export function decodeAnthropicResponse(body: unknown): CanonicalResponse {
  const response = parseWithSchema(anthropicResponseSchema, body, FORMAT, 502);

  const content: ContentPart[] = [];
  const toolCalls: ToolCall[] = [];

  for (const block of response.content) {
    if (block.type === 'tool_use') {
      toolCalls.push({
        id: block.id ?? '',
        name: block.name ?? '',
        arguments: JSON.stringify(block.input ?? {}),
      });
      continue;
    }
    const part = decodeResponseBlock(block);
    if (part) content.push(part);
  }

  const decoded: CanonicalResponse = {
    id: response.id,
    model: response.model,
    content,
    toolCalls,
    stopReason: toCanonicalStopReason(response.stop_reason),
    usage: decodeUsage(response.usage),
  };
  if (response.stop_sequence) decoded.stopSequence = response.stop_sequence;

  const extensions = toExtensions(FORMAT, pickExtras(response, RESPONSE_KEYS));
  if (extensions) decoded.extensions = extensions;
  return decoded;
}

function decodeResponseBlock(block: AnthropicResponseBlock): ContentPart | undefined {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text ?? '' };
    case 'thinking': {
      const part: ThinkingPart = { type: 'thinking', text: block.thinking ?? '' };
      if (block.signature) part.signature = block.signature;
      return part;
    }
    case 'redacted_thinking':
      return { type: 'thinking', text: '', encrypted: block.data ?? '' };
    default:
      // server_tool_use 等不在 canonical 范围内
      logger.debug({ blockType: block.type }, 'Skipping unsupported Anthropic response block');
      return undefined;
  }
}

function decodeUsage(usage: AnthropicUsage | undefined): Usage {
  const decoded: Usage = {
    inputTokens: usage?.input_tokens ?? 0,
    outputTokens: usage?.output_tokens ?? 0,
  };
  if (usage?.cache_read_input_tokens) decoded.cacheReadTokens = usage.cache_read_input_tokens;
  if (usage?.cache_creation_input_tokens) decoded.cacheWriteTokens = usage.cache_creation_input_tokens;
  return decoded;
}

function encodeUsage(usage: Usage): AnthropicResponse['usage'] {
  const encoded: AnthropicResponse['usage'] = {
    input_tokens: usage.inputTokens,
    output_tokens: usage.outputTokens,
  };
  if (usage.cacheReadTokens !== undefined) encoded.cache_read_input_tokens = usage.cacheReadTokens;
  if (usage.cacheWriteTokens !== undefined) encoded.cache_creation_input_tokens = usage.cacheWriteTokens;
  return encoded;
}

/**
 * canonical → Anthropic 响应体
 */
export function encodeAnthropicResponse(response: CanonicalResponse): AnthropicResponse {
  const content: Record<string, unknown>[] = response.content.map(encodeResponsePart);
  for (const call of response.toolCalls) {
    content.push({ type: 'tool_use', id: call.id, name: call.name, input: parseToolArguments(call) });
  }

  return {
    ...extrasFor(response.extensions, FORMAT),
    id: response.id,
    type: 'message',
    role: 'assistant',
    model: response.model,
    content,
    stop_reason: response.stopReason,
    stop_sequence: response.stopSequence ?? null,
    usage: encodeUsage(response.usage),
  };
}

function encodeResponsePart(part: ContentPart): Record<string, unknown> {
  switch (part.type) {
    case 'text':
      return { type: 'text', text: part.text };
    case 'thinking':
      if (part.encrypted !== undefined && !part.text) {
        return { type: 'redacted_thinking', data: part.encrypted };
      }
      return { type: 'thinking', thinking: part.text, signature: part.signature ?? '' };
    case 'image':
      return {
        type: 'image',
        source:
          part.source.kind === 'base64'
            ? { type: 'base64', media_type: part.source.mediaType, data: part.source.data }
            : { type: 'url', url: part.source.url },
      };
  }
}

// ==================== 流式：上游 → canonical ====================

type BlockState =
  | { kind: 'content'; contentIndex: number }
  | { kind: 'tool'; assembler: ToolCallAssembler };

/**
 * Anthropic SSE 解码器
 * 上游块序号 → canonical content 序号；tool_use 块的 input_json_delta 累积到 content_block_stop 才产出
 */
export class AnthropicStreamDecoder implements StreamDecoder {
  private blocks = new Map<number, BlockState>();
  private nextContentIndex = 0;
  private nextToolIndex = 0;
  private stopReason: StopReason | undefined;
  private stopSequence: string | undefined;
  private usage: Usage = { inputTokens: 0, outputTokens: 0 };
  private stopped = false;
  private errored = false;

  get terminated(): boolean {
    return this.stopped || this.errored;
  }

  push(frame: SseFrame): CanonicalStreamEvent[] {
    let payload: unknown;
    try {
      payload = JSON.parse(frame.data);
    } catch {
      logger.debug({ data: frame.data.substring(0, 200) }, 'Failed to parse Anthropic SSE data');
      return [];
    }

    const parsed = anthropicStreamEventSchema.safeParse(payload);
    if (!parsed.success) {
      logger.debug({ event: frame.event }, 'Unhandled Anthropic SSE event');
      return [];
    }

    const event = parsed.data;
    switch (event.type) {
      case 'message_start': {
        this.usage = mergeUsage(this.usage, event.message.usage);
        return [
          { type: 'message_start', id: event.message.id, model: event.message.model, usage: { ...this.usage } },
        ];
      }

      case 'content_block_start':
        return this.startBlock(event.index, event.content_block);

      case 'content_block_delta': {
        const block = this.blocks.get(event.index);
        if (!block) return [];
        const delta = event.delta;
        if (block.kind === 'tool') {
          if (delta.type === 'input_json_delta') block.assembler.append(delta.partial_json ?? '');
          return [];
        }
        const mapped = mapDelta(delta);
        return mapped ? [{ type: 'content_delta', index: block.contentIndex, delta: mapped }] : [];
      }

      case 'content_block_stop': {
        const block = this.blocks.get(event.index);
        this.blocks.delete(event.index);
        if (block?.kind === 'tool' && !block.assembler.isComplete) {
          return [block.assembler.complete()];
        }
        return [];
      }

      case 'message_delta':
        if (event.delta.stop_reason) this.stopReason = toCanonicalStopReason(event.delta.stop_reason);
        if (event.delta.stop_sequence) this.stopSequence = event.delta.stop_sequence;
        this.usage = mergeUsage(this.usage, event.usage);
        return [];

      case 'message_stop':
        return this.stop();

      case 'ping':
        return [];

      case 'error':
        this.errored = true;
        return [{ type: 'error', error: { code: event.error.type, message: event.error.message } }];
    }
  }

  finish(): CanonicalStreamEvent[] {
    if (this.terminated) return [];
    return this.stop();
  }

  private startBlock(index: number, block: AnthropicResponseBlock): CanonicalStreamEvent[] {
    if (block.type === 'tool_use') {
      const assembler = new ToolCallAssembler(this.nextToolIndex++, block.id ?? '', block.name ?? '');
      // 非空 input 说明上游一次性给出了参数
      if (block.input !== undefined && !isEmptyObject(block.input)) {
        assembler.append(JSON.stringify(block.input));
      }
      this.blocks.set(index, { kind: 'tool', assembler });
      return [];
    }

    let initial: ContentDelta;
    switch (block.type) {
      case 'text':
        initial = { type: 'text', text: block.text ?? '' };
        break;
      case 'thinking':
        initial = { type: 'thinking', text: block.thinking ?? '' };
        break;
      case 'redacted_thinking':
        initial = { type: 'encrypted', data: block.data ?? '' };
        break;
      default:
        logger.debug({ blockType: block.type }, 'Skipping unsupported Anthropic content block');
        return [];
    }

    const contentIndex = this.nextContentIndex++;
    this.blocks.set(index, { kind: 'content', contentIndex });
    // 块开始时也发一个 delta，保证空块在重建结果里占位
    return [{ type: 'content_delta', index: contentIndex, delta: initial }];
  }

  private stop(): CanonicalStreamEvent[] {
    const events: CanonicalStreamEvent[] = [];
    for (const block of this.blocks.values()) {
      if (block.kind === 'tool' && !block.assembler.isComplete) {
        events.push(block.assembler.complete());
      }
    }
    this.blocks.clear();
    this.stopped = true;

    const stopEvent: CanonicalStreamEvent = {
      type: 'message_stop',
      stopReason: this.stopReason ?? (this.nextToolIndex > 0 ? 'tool_use' : 'end_turn'),
      usage: { ...this.usage },
    };
    if (this.stopSequence) stopEvent.stopSequence = this.stopSequence;
    events.push(stopEvent);
    return events;
  }
}

function mapDelta(delta: {
  type: string;
  text?: string;
  thinking?: string;
  signature?: string;
}): ContentDelta | undefined {
  switch (delta.type) {
    case 'text_delta':
      return { type: 'text', text: delta.text ?? '' };
    case 'thinking_delta':
      return { type: 'thinking', text: delta.thinking ?? '' };
    case 'signature_delta':
      return { type: 'signature', signature: delta.signature ?? '' };
    default:
      return undefined;
  }
}

function mergeUsage(current: Usage, usage: AnthropicUsage | undefined): Usage {
  if (!usage) return current;
  const merged: Usage = { ...current };
  if (usage.input_tokens !== undefined) merged.inputTokens = usage.input_tokens;
  if (usage.output_tokens !== undefined) merged.outputTokens = usage.output_tokens;
  if (usage.cache_read_input_tokens) merged.cacheReadTokens = usage.cache_read_input_tokens;
  if (usage.cache_creation_input_tokens) merged.cacheWriteTokens = usage.cache_creation_input_tokens;
  return merged;
}

function isEmptyObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length === 0;
}

// ==================== 流式：canonical → 调用方 ====================

type OpenBlock = { contentIndex: number; blockIndex: number };

/**
 * canonical 事件 → Anthropic SSE 帧
 */
export class AnthropicStreamEncoder implements StreamEncoder {
  private started = false;
  private stopped = false;
  private openBlock: OpenBlock | null = null;
  private nextBlockIndex = 0;

  constructor(private readonly options: StreamEncoderOptions) {}

  encode(event: CanonicalStreamEvent): SseFrame[] {
    if (this.stopped) return [];

    switch (event.type) {
      case 'message_start':
        if (this.started) return [];
        return this.messageStart(event.id, event.model, event.usage);

      case 'content_delta':
        return [...this.ensureStarted(), ...this.contentDelta(event.index, event.delta)];

      case 'tool_call': {
        const frames = [...this.ensureStarted(), ...this.closeBlock()];
        const index = this.nextBlockIndex++;
        frames.push(
          frame('content_block_start', {
            type: 'content_block_start',
            index,
            content_block: { type: 'tool_use', id: event.id, name: event.name, input: {} },
          })
        );
        if (event.arguments) {
          frames.push(
            frame('content_block_delta', {
              type: 'content_block_delta',
              index,
              delta: { type: 'input_json_delta', partial_json: event.arguments },
            })
          );
        }
        frames.push(frame('content_block_stop', { type: 'content_block_stop', index }));
        return frames;
      }

      case 'message_stop': {
        const frames = [...this.ensureStarted(), ...this.closeBlock()];
        frames.push(
          frame('message_delta', {
            type: 'message_delta',
            delta: { stop_reason: event.stopReason, stop_sequence: event.stopSequence ?? null },
            usage: encodeUsage(event.usage),
          }),
          frame('message_stop', { type: 'message_stop' })
        );
        this.stopped = true;
        return frames;
      }

      case 'error':
        this.stopped = true;
        return [
          frame('error', {
            type: 'error',
            error: { type: event.error.code, message: event.error.message },
          }),
        ];
    }
  }

  private ensureStarted(): SseFrame[] {
    if (this.started) return [];
    return this.messageStart(`msg_${uuidv4()}`, this.options.model);
  }

  private messageStart(id: string, model: string, usage?: Usage): SseFrame[] {
    this.started = true;
    return [
      frame('message_start', {
        type: 'message_start',
        message: {
          id,
          type: 'message',
          role: 'assistant',
          content: [],
          model,
          stop_reason: null,
          stop_sequence: null,
          usage: encodeUsage(usage ?? { inputTokens: 0, outputTokens: 0 }),
        },
      }),
    ];
  }

  private contentDelta(contentIndex: number, delta: ContentDelta): SseFrame[] {
    const frames: SseFrame[] = [];

    const opened = this.openBlock?.contentIndex !== contentIndex;
    if (!this.openBlock || opened) {
      frames.push(...this.closeBlock());
      const blockIndex = this.nextBlockIndex++;
      this.openBlock = { contentIndex, blockIndex };
      frames.push(
        frame('content_block_start', {
          type: 'content_block_start',
          index: blockIndex,
          content_block: blockSkeleton(delta),
        })
      );
    }

    const index = this.openBlock.blockIndex;
    switch (delta.type) {
      case 'text':
        if (delta.text) {
          frames.push(deltaFrame(index, { type: 'text_delta', text: delta.text }));
        }
        break;
      case 'thinking':
        if (delta.text) {
          frames.push(deltaFrame(index, { type: 'thinking_delta', thinking: delta.text }));
        }
        break;
      case 'signature':
        frames.push(deltaFrame(index, { type: 'signature_delta', signature: delta.signature }));
        break;
      case 'encrypted':
        // redacted_thinking 的数据只能随 content_block_start 发出；
        // 已打开的块里再来的加密数据无处可写，丢弃并记 warn
        if (!opened) {
          logger.warn(
            { index, bytes: delta.data.length },
            'Dropping encrypted reasoning inside an open content block'
          );
        }
        break;
    }
    return frames;
  }

  private closeBlock(): SseFrame[] {
    if (!this.openBlock) return [];
    const index = this.openBlock.blockIndex;
    this.openBlock = null;
    return [frame('content_block_stop', { type: 'content_block_stop', index })];
  }
}

function blockSkeleton(delta: ContentDelta): Record<string, unknown> {
  switch (delta.type) {
    case 'text':
      return { type: 'text', text: '' };
    case 'thinking':
    case 'signature':
      return { type: 'thinking', thinking: '' };
    case 'encrypted':
      return { type: 'redacted_thinking', data: delta.data };
  }
}

function deltaFrame(index: number, delta: Record<string, unknown>): SseFrame {
  return frame('content_block_delta', { type: 'content_block_delta', index, delta });
}

function frame(event: string, data: unknown): SseFrame {
  return { event, data: JSON.stringify(data) };
}
