/**
 * Canonical 模型
 *
 * 与具体供应商无关的请求 / 响应 / 流事件表示，所有格式转换都以它为中转
 */

import type { WireFormat } from '@ccproxy/shared';

/**
 * 透传字段袋：按来源格式分组，只在编码回同一格式时才写回
 */
export type Extensions = Partial<Record<WireFormat, Record<string, unknown>>>;

export type Role = 'system' | 'user' | 'assistant' | 'tool';

export interface TextPart {
  type: 'text';
  text: string;
  extensions?: Extensions;
}

export type ImageSource =
  | { kind: 'base64'; mediaType: string; data: string }
  | { kind: 'url'; url: string };

export interface ImagePart {
  type: 'image';
  source: ImageSource;
  extensions?: Extensions;
}

export interface ThinkingPart {
  type: 'thinking';
  text: string;
  signature?: string;
  /** 加密 / redacted 的推理内容，原样回传 */
  encrypted?: string;
  extensions?: Extensions;
}

export type ContentPart = TextPart | ImagePart | ThinkingPart;

/**
 * 没有 canonical 对应的原生内容，原样保存，只能编码回来源格式
 */
export interface OpaquePart {
  type: 'opaque';
  format: WireFormat;
  /** part：消息里的内容块；item：独立的输入项（Responses 的 item_reference 等） */
  scope: 'part' | 'item';
  value: Record<string, unknown>;
}

/** 请求消息的内容；响应内容里没有 opaque */
export type MessagePart = ContentPart | OpaquePart;

export interface ToolCall {
  id: string;
  name: string;
  /** 参数 JSON 文本，转换时只搬运不改写 */
  arguments: string;
  extensions?: Extensions;
}

export interface CanonicalMessage {
  role: Role;
  content: MessagePart[];
  toolCalls?: ToolCall[];
  /** role = tool 时对应的调用 id */
  toolCallId?: string;
  isError?: boolean;
  extensions?: Extensions;
}

export type ToolDefinition =
  | {
      type: 'function';
      name: string;
      description?: string;
      parameters?: unknown;
      extensions?: Extensions;
    }
  | {
      /** 供应商内置工具（web search 等），只能编码回原格式 */
      type: 'builtin';
      format: WireFormat;
      config: Record<string, unknown>;
    };

export type ToolChoice = 'auto' | 'none' | 'required' | { name: string };

export type ReasoningEffort = 'minimal' | 'low' | 'medium' | 'high';

export interface ReasoningConfig {
  effort?: ReasoningEffort;
  budgetTokens?: number;
  /** 显式关闭（anthropic thinking.type = disabled） */
  disabled?: boolean;
  extensions?: Extensions;
}

export interface CanonicalRequest {
  model: string;
  messages: CanonicalMessage[];
  stream: boolean;
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  topK?: number;
  stopSequences?: string[];
  tools?: ToolDefinition[];
  toolChoice?: ToolChoice;
  parallelToolCalls?: boolean;
  reasoning?: ReasoningConfig;
  extensions?: Extensions;
}

// ==================== 响应 ====================

export type StopReason = 'end_turn' | 'max_tokens' | 'tool_use' | 'stop_sequence' | 'refusal';

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens?: number;
  cacheWriteTokens?: number;
  reasoningTokens?: number;
}

export interface CanonicalResponse {
  id: string;
  model: string;
  content: ContentPart[];
  toolCalls: ToolCall[];
  stopReason: StopReason;
  stopSequence?: string;
  usage: Usage;
  extensions?: Extensions;
}

// ==================== 流事件 ====================

export type ContentDelta =
  | { type: 'text'; text: string }
  | { type: 'thinking'; text: string }
  | { type: 'signature'; signature: string }
  | { type: 'encrypted'; data: string };

export interface MessageStartEvent {
  type: 'message_start';
  id: string;
  model: string;
  usage?: Usage;
}

export interface ContentDeltaEvent {
  type: 'content_delta';
  /** 在最终 content 数组中的位置 */
  index: number;
  delta: ContentDelta;
}

export interface ToolCallEvent {
  type: 'tool_call';
  /** 在最终 toolCalls 数组中的位置 */
  toolIndex: number;
  id: string;
  name: string;
  arguments: string;
}

export interface MessageStopEvent {
  type: 'message_stop';
  stopReason: StopReason;
  stopSequence?: string;
  usage: Usage;
}

export interface StreamErrorEvent {
  type: 'error';
  error: {
    code: string;
    message: string;
    kind?: string;
  };
}

export type CanonicalStreamEvent =
  | MessageStartEvent
  | ContentDeltaEvent
  | ToolCallEvent
  | MessageStopEvent
  | StreamErrorEvent;

export function emptyUsage(): Usage {
  return { inputTokens: 0, outputTokens: 0 };
}
