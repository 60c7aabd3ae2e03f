/**
 * OpenAI Responses 响应 / SSE ⇄ Canonical
 */

import { v4 as uuidv4 } from 'uuid';
import type { SseFrame } from '@ccproxy/shared';
import { logger } from '../../../../lib/logger.js';
import type {
  CanonicalResponse,
  CanonicalStreamEvent,
  ContentPart,
  StopReason,
  ThinkingPart,
  ToolCall,
  Usage,
} from '../../canonical/types.js';
import { ToolCallAssembler } from '../../canonical/tool-call-assembler.js';
import { EncodeError } from '../../errors.js';
import { extrasFor, parseWithSchema, pickExtras, toExtensions } from '../common.js';
import type { StreamDecoder, StreamEncoder, StreamEncoderOptions } from '../types.js';
import {
  RESPONSES_TERMINAL_EVENT,
  SUMMARY_SEPARATOR,
  responsesOutputItemSchema,
  responsesResponseSchema,
  responsesStreamEventSchema,
  type ResponsesResponse,
  type ResponsesUsage,
} from './models.js';

const FORMAT = 'openai-responses';

const RESPONSE_KEYS = [
  'id',
  'object',
  'created_at',
  'model',
  'status',
  'output',
  'usage',
  'incomplete_details',
  'error',
];

// ==================== 公共 ====================

/**
 * input_tokens 含缓存命中部分；canonical inputTokens 只计未命中部分
 */
function decodeUsage(usage: ResponsesUsage | null | undefined): Usage {
  const cached = usage?.input_tokens_details?.cached_tokens ?? 0;
  const decoded: Usage = {
    inputTokens: Math.max((usage?.input_tokens ?? 0) - cached, 0),
    outputTokens: usage?.output_tokens ?? 0,
  };
  if (cached) decoded.cacheReadTokens = cached;
  const reasoning = usage?.output_tokens_details?.reasoning_tokens;
  if (reasoning) decoded.reasoningTokens = reasoning;
  return decoded;
}

function encodeUsage(usage: Usage): Record<string, unknown> {
  const inputTokens = usage.inputTokens + (usage.cacheReadTokens ?? 0) + (usage.cacheWriteTokens ?? 0);
  return {
    input_tokens: inputTokens,
    input_tokens_details: { cached_tokens: usage.cacheReadTokens ?? 0 },
    output_tokens: usage.outputTokens,
    output_tokens_details: { reasoning_tokens: usage.reasoningTokens ?? 0 },
    total_tokens: inputTokens + usage.outputTokens,
  };
}

function toStopReason(response: ResponsesResponse, hasToolCalls: boolean, refused: boolean): StopReason {
  if (response.status === 'incomplete') {
    return response.incomplete_details?.reason === 'content_filter' ? 'refusal' : 'max_tokens';
  }
  if (refused) return 'refusal';
  return hasToolCalls ? 'tool_use' : 'end_turn';
}

function outputTextPart(text: string): Record<string, unknown> {
  return { type: 'output_text', text, annotations: [] };
}

function messageItem(id: string, content: Record<string, unknown>[]): Record<string, unknown> {
  return { id, type: 'message', status: 'completed', role: 'assistant', content };
}

function reasoningItem(id: string, text: string, encrypted: string | undefined): Record<string, unknown> {
  const item: Record<string, unknown> = {
    id,
    type: 'reasoning',
    summary: text ? [{ type: 'summary_text', text }] : [],
  };
  if (encrypted !== undefined) item.encrypted_content = encrypted;
  return item;
}

function functionCallItem(id: string, call: ToolCall): Record<string, unknown> {
  return {
    id,
    type: 'function_call',
    status: 'completed',
    call_id: call.id,
    name: call.name,
    arguments: call.arguments,
  };
}

function envelope(
  id: string,
  model: string,
  createdAt: number,
  output: Record<string, unknown>[],
  stopReason?: StopReason,
  usage?: Usage
): Record<string, unknown> {
  let status = 'in_progress';
  if (stopReason) status = stopReason === 'max_tokens' ? 'incomplete' : 'completed';
  return {
    id,
    object: 'response',
    created_at: createdAt,
    status,
    model,
    output,
    usage: usage ? encodeUsage(usage) : null,
    incomplete_details: stopReason === 'max_tokens' ? { reason: 'max_output_tokens' } : null,
  };
}

// ==================== 非流式响应 ====================

export function decodeResponsesResponse(body: unknown): CanonicalResponse {
  const response = parseWithSchema(responsesResponseSchema, body, FORMAT, 502);

  const content: ContentPart[] = [];
  const toolCalls: ToolCall[] = [];
  let refused = false;

  for (const raw of response.output) {
    const parsed = responsesOutputItemSchema.safeParse(raw);
    if (!parsed.success) {
      logger.debug({ itemType: raw.type }, 'Skipping unsupported Responses output item');
      continue;
    }
    const item = parsed.data;
    switch (item.type) {
      case 'message':
        for (const part of item.content) {
          if (part.type === 'output_text') {
            content.push({ type: 'text', text: part.text ?? '' });
          } else if (part.type === 'refusal') {
            refused = true;
            content.push({ type: 'text', text: part.refusal ?? '' });
          }
        }
        break;
      case 'reasoning': {
        const part: ThinkingPart = {
          type: 'thinking',
          text: item.summary.map((summary) => summary.text).join(SUMMARY_SEPARATOR),
        };
        if (typeof item.encrypted_content === 'string') part.encrypted = item.encrypted_content;
        content.push(part);
        break;
      }
      case 'function_call':
        toolCalls.push({ id: item.call_id, name: item.name, arguments: item.arguments });
        break;
    }
  }

  const decoded: CanonicalResponse = {
    id: response.id,
    model: response.model,
    content,
    toolCalls,
    stopReason: toStopReason(response, toolCalls.length > 0, refused),
    usage: decodeUsage(response.usage),
  };
  const extensions = toExtensions(FORMAT, pickExtras(response, RESPONSE_KEYS));
  if (extensions) decoded.extensions = extensions;
  return decoded;
}

/**
 * canonical → response 对象
 * thinking 签名没有对应字段，只输出摘要与加密内容
 */
export function encodeResponsesResponse(response: CanonicalResponse): Record<string, unknown> {
  const output: Record<string, unknown>[] = [];
  let message: Record<string, unknown>[] | undefined;

  for (const part of response.content) {
    switch (part.type) {
      case 'text':
        if (!message) {
          message = [];
          output.push(messageItem(`msg_${uuidv4()}`, message));
        }
        message.push(outputTextPart(part.text));
        break;
      case 'thinking':
        message = undefined;
        output.push(reasoningItem(`rs_${uuidv4()}`, part.text, part.encrypted));
        break;
      case 'image':
        throw new EncodeError(FORMAT, 'Image output has no openai-responses representation');
    }
  }
  for (const call of response.toolCalls) {
    output.push(functionCallItem(`fc_${uuidv4()}`, call));
  }

  return {
    ...extrasFor(response.extensions, FORMAT),
    ...envelope(
      response.id,
      response.model,
      Math.floor(Date.now() / 1000),
      output,
      response.stopReason,
      response.usage
    ),
  };
}

// ==================== 流式：上游 → canonical ====================

interface TextEntry {
  index: number;
  streamed: boolean;
}

interface ReasoningEntry extends TextEntry {
  summaryIndex: number;
}

/**
 * Responses SSE 解码器
 * 函数调用参数以 function_call_arguments.done / output_item.done 里的完整值为准
 */
export class ResponsesStreamDecoder implements StreamDecoder {
  private started = false;
  private nextContentIndex = 0;
  private texts = new Map<string, TextEntry>();
  private reasoning = new Map<string, ReasoningEntry>();
  private tools = new Map<string, ToolCallAssembler>();
  private refused = false;
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
      logger.debug({ data: frame.data.substring(0, 200) }, 'Failed to parse Responses SSE data');
      return [];
    }

    // response.in_progress 等事件不影响 canonical 结果
    const parsed = responsesStreamEventSchema.safeParse(payload);
    if (!parsed.success) return [];

    const event = parsed.data;
    switch (event.type) {
      case 'response.created':
        if (this.started) return [];
        this.started = true;
        return [{ type: 'message_start', id: event.response.id, model: event.response.model }];

      case 'response.output_item.added':
        return this.itemAdded(event.item);

      case 'response.output_item.done':
        return this.itemDone(event.item);

      case 'response.content_part.added': {
        const key = textKey(event.item_id, event.content_index);
        if (this.texts.has(key)) return [];
        const text = event.part.text ?? '';
        const entry = this.allocateText(key);
        entry.streamed = text !== '';
        return [textDelta(entry.index, text)];
      }

      case 'response.refusal.delta':
      case 'response.output_text.delta': {
        if (event.type === 'response.refusal.delta') this.refused = true;
        const key = textKey(event.item_id, event.content_index);
        const entry = this.texts.get(key) ?? this.allocateText(key);
        entry.streamed = true;
        return [textDelta(entry.index, event.delta)];
      }

      case 'response.output_text.done': {
        const key = textKey(event.item_id, event.content_index);
        const existing = this.texts.get(key);
        if (existing?.streamed || (existing && !event.text)) return [];
        const entry = existing ?? this.allocateText(key);
        entry.streamed = true;
        return [textDelta(entry.index, event.text)];
      }

      case 'response.reasoning_summary_text.delta': {
        const events: CanonicalStreamEvent[] = [];
        let entry = this.reasoning.get(event.item_id);
        if (!entry) {
          entry = this.allocateReasoning(event.item_id);
          events.push(thinkingDelta(entry.index, ''));
        }
        const separator = entry.summaryIndex >= 0 && entry.summaryIndex !== event.summary_index;
        entry.summaryIndex = event.summary_index;
        entry.streamed = true;
        events.push(thinkingDelta(entry.index, separator ? SUMMARY_SEPARATOR + event.delta : event.delta));
        return events;
      }

      case 'response.function_call_arguments.delta':
        this.tools.get(event.item_id)?.append(event.delta);
        return [];

      case 'response.function_call_arguments.done': {
        const assembler = this.tools.get(event.item_id);
        if (!assembler || assembler.isComplete) return [];
        return [assembler.complete(event.arguments)];
      }

      case 'response.completed':
      case 'response.incomplete':
        return this.stop(event.response);

      case 'response.failed':
        this.errored = true;
        return [
          {
            type: 'error',
            error: {
              code: event.response.error?.code ?? 'response_failed',
              message: event.response.error?.message ?? 'Upstream response failed',
            },
          },
        ];

      case 'error':
        this.errored = true;
        return [{ type: 'error', error: { code: event.code ?? 'upstream_error', message: event.message } }];
    }
  }

  finish(): CanonicalStreamEvent[] {
    if (this.terminated) return [];
    return this.stop();
  }

  private itemAdded(raw: { type: string }): CanonicalStreamEvent[] {
    const parsed = responsesOutputItemSchema.safeParse(raw);
    if (!parsed.success) return [];
    const item = parsed.data;

    switch (item.type) {
      case 'reasoning': {
        const key = item.id ?? `reasoning_${this.nextContentIndex}`;
        if (this.reasoning.has(key)) return [];
        const entry = this.allocateReasoning(key);
        return [thinkingDelta(entry.index, '')];
      }
      case 'function_call': {
        const assembler = new ToolCallAssembler(this.tools.size, item.call_id, item.name);
        assembler.append(item.arguments);
        this.tools.set(item.id ?? item.call_id, assembler);
        return [];
      }
      case 'message':
        return [];
    }
  }

  private itemDone(raw: { type: string }): CanonicalStreamEvent[] {
    const parsed = responsesOutputItemSchema.safeParse(raw);
    if (!parsed.success) return [];
    const item = parsed.data;
    const events: CanonicalStreamEvent[] = [];

    switch (item.type) {
      case 'reasoning': {
        const key = item.id ?? `reasoning_${this.nextContentIndex}`;
        let entry = this.reasoning.get(key);
        if (!entry) {
          entry = this.allocateReasoning(key);
          events.push(thinkingDelta(entry.index, ''));
        }
        const summary = item.summary.map((part) => part.text).join(SUMMARY_SEPARATOR);
        if (!entry.streamed && summary) {
          entry.streamed = true;
          events.push(thinkingDelta(entry.index, summary));
        }
        if (typeof item.encrypted_content === 'string') {
          events.push({
            type: 'content_delta',
            index: entry.index,
            delta: { type: 'encrypted', data: item.encrypted_content },
          });
        }
        return events;
      }

      case 'function_call': {
        const key = item.id ?? item.call_id;
        let assembler = this.tools.get(key);
        if (!assembler) {
          assembler = new ToolCallAssembler(this.tools.size, item.call_id, item.name);
          this.tools.set(key, assembler);
        }
        if (!assembler.isComplete) events.push(assembler.complete(item.arguments || undefined));
        return events;
      }

      case 'message':
        // 只有 output_item.done 而没有增量的上游
        item.content.forEach((part, index) => {
          const key = textKey(item.id ?? '', index);
          if (this.texts.has(key)) return;
          const text = part.type === 'refusal' ? part.refusal : part.text;
          if (text === undefined) return;
          if (part.type === 'refusal') this.refused = true;
          const entry = this.allocateText(key);
          entry.streamed = true;
          events.push(textDelta(entry.index, text));
        });
        return events;
    }
  }

  private allocateText(key: string): TextEntry {
    const entry: TextEntry = { index: this.nextContentIndex++, streamed: false };
    this.texts.set(key, entry);
    return entry;
  }

  private allocateReasoning(key: string): ReasoningEntry {
    const entry: ReasoningEntry = { index: this.nextContentIndex++, streamed: false, summaryIndex: -1 };
    this.reasoning.set(key, entry);
    return entry;
  }

  private stop(response?: ResponsesResponse): CanonicalStreamEvent[] {
    const events: CanonicalStreamEvent[] = [];
    for (const assembler of this.tools.values()) {
      if (!assembler.isComplete) events.push(assembler.complete());
    }
    this.stopped = true;

    const hasTools = this.tools.size > 0;
    events.push({
      type: 'message_stop',
      stopReason: response
        ? toStopReason(response, hasTools, this.refused)
        : this.refused
          ? 'refusal'
          : hasTools
            ? 'tool_use'
            : 'end_turn',
      usage: decodeUsage(response?.usage),
    });
    return events;
  }
}

function textKey(itemId: string, contentIndex: number): string {
  return `${itemId}:${contentIndex}`;
}

function textDelta(index: number, text: string): CanonicalStreamEvent {
  return { type: 'content_delta', index, delta: { type: 'text', text } };
}

function thinkingDelta(index: number, text: string): CanonicalStreamEvent {
  return { type: 'content_delta', index, delta: { type: 'thinking', text } };
}

// ==================== 流式：canonical → 调用方 ====================

type OpenItem =
  | {
      kind: 'message';
      id: string;
      outputIndex: number;
      contentIndex: number;
      partIndex: number;
      parts: Record<string, unknown>[];
      text: string;
    }
  | {
      kind: 'reasoning';
      id: string;
      outputIndex: number;
      contentIndex: number;
      text: string;
      summaryOpen: boolean;
      encrypted?: string;
    };

/**
 * canonical 事件 → Responses SSE 事件（带 sequence_number）
 */
export class ResponsesStreamEncoder implements StreamEncoder {
  private sequence = 0;
  private started = false;
  private stopped = false;
  private id = '';
  private model: string;
  private readonly createdAt = Math.floor(Date.now() / 1000);
  private output: Record<string, unknown>[] = [];
  private nextOutputIndex = 0;
  private open: OpenItem | null = null;

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
        switch (delta.type) {
          case 'text':
            frames.push(...this.textDelta(event.index, delta.text));
            break;
          case 'thinking':
            frames.push(...this.thinkingDelta(event.index, delta.text));
            break;
          case 'encrypted': {
            frames.push(...this.ensureReasoning(event.index));
            if (this.open?.kind === 'reasoning') {
              this.open.encrypted = (this.open.encrypted ?? '') + delta.data;
            }
            break;
          }
          case 'signature':
            break;
        }
        return frames;
      }

      case 'tool_call': {
        const frames = [...this.ensureStarted(), ...this.closeOpen()];
        const outputIndex = this.nextOutputIndex++;
        const item = functionCallItem(`fc_${uuidv4()}`, event);
        frames.push(
          this.emit('response.output_item.added', {
            output_index: outputIndex,
            item: { ...item, status: 'in_progress', arguments: '' },
          }),
          this.emit('response.function_call_arguments.delta', {
            item_id: item.id,
            output_index: outputIndex,
            delta: event.arguments,
          }),
          this.emit('response.function_call_arguments.done', {
            item_id: item.id,
            output_index: outputIndex,
            arguments: event.arguments,
          }),
          this.emit('response.output_item.done', { output_index: outputIndex, item })
        );
        this.output.push(item);
        return frames;
      }

      case 'message_stop': {
        const frames = [...this.ensureStarted(), ...this.closeOpen()];
        frames.push(
          this.emit(RESPONSES_TERMINAL_EVENT, {
            response: envelope(this.id, this.model, this.createdAt, this.output, event.stopReason, event.usage),
          })
        );
        this.stopped = true;
        return frames;
      }

      case 'error':
        this.stopped = true;
        return [this.emit('error', { code: event.error.code, message: event.error.message })];
    }
  }

  private emit(type: string, payload: Record<string, unknown>): SseFrame {
    return { event: type, data: JSON.stringify({ type, sequence_number: this.sequence++, ...payload }) };
  }

  private ensureStarted(): SseFrame[] {
    if (this.started) return [];
    return this.start(`resp_${uuidv4().replace(/-/g, '')}`, this.model);
  }

  private start(id: string, model: string): SseFrame[] {
    this.started = true;
    this.id = id;
    if (model) this.model = model;
    const response = envelope(this.id, this.model, this.createdAt, []);
    return [
      this.emit('response.created', { response }),
      this.emit('response.in_progress', { response }),
    ];
  }

  private textDelta(contentIndex: number, text: string): SseFrame[] {
    const frames: SseFrame[] = [];
    let open = this.open;

    if (open?.kind === 'message' && open.contentIndex !== contentIndex) {
      frames.push(...this.closePart(open));
      open.partIndex++;
      open.contentIndex = contentIndex;
      open.text = '';
      frames.push(this.partAdded(open));
    } else if (open?.kind !== 'message') {
      frames.push(...this.closeOpen());
      open = {
        kind: 'message',
        id: `msg_${uuidv4()}`,
        outputIndex: this.nextOutputIndex++,
        contentIndex,
        partIndex: 0,
        parts: [],
        text: '',
      };
      this.open = open;
      frames.push(
        this.emit('response.output_item.added', {
          output_index: open.outputIndex,
          item: { id: open.id, type: 'message', status: 'in_progress', role: 'assistant', content: [] },
        }),
        this.partAdded(open)
      );
    }

    if (text) {
      open.text += text;
      frames.push(
        this.emit('response.output_text.delta', {
          item_id: open.id,
          output_index: open.outputIndex,
          content_index: open.partIndex,
          delta: text,
        })
      );
    }
    return frames;
  }

  private thinkingDelta(contentIndex: number, text: string): SseFrame[] {
    const frames = this.ensureReasoning(contentIndex);
    const open = this.open;
    if (!text || open?.kind !== 'reasoning') return frames;

    if (!open.summaryOpen) {
      open.summaryOpen = true;
      frames.push(
        this.emit('response.reasoning_summary_part.added', {
          item_id: open.id,
          output_index: open.outputIndex,
          summary_index: 0,
          part: { type: 'summary_text', text: '' },
        })
      );
    }
    open.text += text;
    frames.push(
      this.emit('response.reasoning_summary_text.delta', {
        item_id: open.id,
        output_index: open.outputIndex,
        summary_index: 0,
        delta: text,
      })
    );
    return frames;
  }

  private ensureReasoning(contentIndex: number): SseFrame[] {
    if (this.open?.kind === 'reasoning' && this.open.contentIndex === contentIndex) return [];
    const frames = this.closeOpen();
    const open: OpenItem = {
      kind: 'reasoning',
      id: `rs_${uuidv4()}`,
      outputIndex: this.nextOutputIndex++,
      contentIndex,
      text: '',
      summaryOpen: false,
    };
    this.open = open;
    frames.push(
      this.emit('response.output_item.added', {
        output_index: open.outputIndex,
        item: { id: open.id, type: 'reasoning', summary: [] },
      })
    );
    return frames;
  }

  private partAdded(open: Extract<OpenItem, { kind: 'message' }>): SseFrame {
    return this.emit('response.content_part.added', {
      item_id: open.id,
      output_index: open.outputIndex,
      content_index: open.partIndex,
      part: outputTextPart(''),
    });
  }

  private closePart(open: Extract<OpenItem, { kind: 'message' }>): SseFrame[] {
    const ref = { item_id: open.id, output_index: open.outputIndex, content_index: open.partIndex };
    open.parts.push(outputTextPart(open.text));
    return [
      this.emit('response.output_text.done', { ...ref, text: open.text }),
      this.emit('response.content_part.done', { ...ref, part: outputTextPart(open.text) }),
    ];
  }

  private closeOpen(): SseFrame[] {
    const open = this.open;
    if (!open) return [];
    this.open = null;

    const frames: SseFrame[] = [];
    let item: Record<string, unknown>;
    if (open.kind === 'message') {
      frames.push(...this.closePart(open));
      item = messageItem(open.id, open.parts);
    } else {
      if (open.summaryOpen) {
        const ref = { item_id: open.id, output_index: open.outputIndex, summary_index: 0 };
        frames.push(
          this.emit('response.reasoning_summary_text.done', { ...ref, text: open.text }),
          this.emit('response.reasoning_summary_part.done', {
            ...ref,
            part: { type: 'summary_text', text: open.text },
          })
        );
      }
      item = reasoningItem(open.id, open.text, open.encrypted);
    }

    frames.push(this.emit('response.output_item.done', { output_index: open.outputIndex, item }));
    this.output.push(item);
    return frames;
  }
}
