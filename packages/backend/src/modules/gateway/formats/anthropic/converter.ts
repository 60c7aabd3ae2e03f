/**
 * Anthropic Messages 请求 ⇄ Canonical 请求
 *
 * 角色规则（固定表，不做推断）：
 * - system 消息全部收进顶层 system 字段
 * - tool 消息变成 user 消息里的 tool_result 块；连续的 tool 结果和随后的 user 消息合并为一条，tool_result 在前
 * - 连续同角色消息合并；第一条非 system 消息必须来自 user
 */

import {
  ANTHROPIC_CONTENT_BLOCK_TYPES,
  anthropicRequestSchema,
  type AnthropicContentBlock,
  type AnthropicImageBlock,
  type AnthropicMessage,
  type AnthropicRequest,
  type AnthropicTextBlock,
  type AnthropicTool,
  type AnthropicToolChoice,
  type AnthropicUnknownBlock,
} from '@ccproxy/shared';
import type {
  CanonicalMessage,
  CanonicalRequest,
  ContentPart,
  ImagePart,
  MessagePart,
  OpaquePart,
  ReasoningConfig,
  TextPart,
  ThinkingPart,
  ToolCall,
  ToolChoice,
  ToolDefinition,
} from '../../canonical/types.js';
import { DecodeError, EncodeError, InvalidParameterError } from '../../errors.js';
import {
  EFFORT_BUDGETS,
  extrasFor,
  mergeExtensions,
  opaqueFor,
  parseJsonBody,
  parseWithSchema,
  pickExtras,
  toExtensions,
  validateParameters,
  type ParameterLimits,
} from '../common.js';
import { ANTHROPIC_DEFAULT_MAX_TOKENS } from './models.js';

const FORMAT = 'anthropic';

const KNOWN_BLOCK_TYPES = new Set<string>(ANTHROPIC_CONTENT_BLOCK_TYPES);

type RequestBlock = AnthropicContentBlock | AnthropicUnknownBlock;

function isKnownBlock<T extends RequestBlock>(block: T): block is Extract<T, AnthropicContentBlock> {
  return KNOWN_BLOCK_TYPES.has(block.type);
}

// document、search_result、server_tool_use 等块原样保留，只能发回 Anthropic
function opaqueBlock(block: AnthropicUnknownBlock): OpaquePart {
  return { type: 'opaque', format: FORMAT, scope: 'part', value: { ...block } };
}

const REQUEST_KEYS = [
  'model',
  'messages',
  'system',
  'max_tokens',
  'temperature',
  'top_p',
  'top_k',
  'stop_sequences',
  'stream',
  'tools',
  'tool_choice',
  'thinking',
] as const;

export const ANTHROPIC_LIMITS: ParameterLimits = {
  temperature: { min: 0, max: 1 },
  topP: { min: 0, max: 1 },
  topK: { min: 0, integer: true },
  maxTokens: { min: 1, integer: true },
  stopSequences: true,
};

const MIN_THINKING_BUDGET = 1024;

// ==================== decode ====================

/**
 * 解析 Anthropic Messages 请求体
 */
export function decodeAnthropicRequest(raw: Buffer | string): CanonicalRequest {
  const body = parseWithSchema(anthropicRequestSchema, parseJsonBody(raw, FORMAT), FORMAT);

  if (body.messages[0].role !== 'user') {
    throw new DecodeError(FORMAT, 'role_order', 'The first message must use the user role');
  }

  const messages: CanonicalMessage[] = [];
  if (body.system !== undefined) {
    messages.push(decodeSystem(body.system));
  }
  for (const message of body.messages) {
    messages.push(...decodeMessage(message));
  }

  const request: CanonicalRequest = {
    model: body.model,
    messages,
    stream: body.stream ?? false,
  };

  if (body.max_tokens !== undefined) request.maxTokens = body.max_tokens;
  if (body.temperature !== undefined) request.temperature = body.temperature;
  if (body.top_p !== undefined) request.topP = body.top_p;
  if (body.top_k !== undefined) request.topK = body.top_k;
  if (body.stop_sequences !== undefined) request.stopSequences = body.stop_sequences;
  if (body.tools !== undefined) request.tools = body.tools.map(decodeTool);
  if (body.tool_choice !== undefined) {
    request.toolChoice = decodeToolChoice(body.tool_choice);
    if (body.tool_choice.disable_parallel_tool_use === true) {
      request.parallelToolCalls = false;
    }
  }
  if (body.thinking !== undefined) {
    request.reasoning = decodeThinking(body.thinking);
  }

  const extensions = toExtensions(FORMAT, pickExtras(body, REQUEST_KEYS));
  if (extensions) request.extensions = extensions;

  return request;
}

function decodeSystem(system: string | AnthropicTextBlock[]): CanonicalMessage {
  if (typeof system === 'string') {
    return { role: 'system', content: system ? [{ type: 'text', text: system }] : [] };
  }
  return { role: 'system', content: system.map(decodeTextBlock) };
}

function decodeMessage(message: AnthropicMessage): CanonicalMessage[] {
  const extensions = toExtensions(FORMAT, pickExtras(message, ['role', 'content']));

  if (typeof message.content === 'string') {
    return [
      withExtensions(
        {
          role: message.role,
          content: message.content ? [{ type: 'text', text: message.content }] : [],
        },
        extensions
      ),
    ];
  }

  if (message.role === 'user') {
    return decodeUserBlocks(message.content, extensions);
  }
  return [withExtensions(decodeAssistantBlocks(message.content), extensions)];
}

/**
 * user 消息：tool_result 拆成独立的 tool 消息（在前），其余块组成 user 消息
 */
function decodeUserBlocks(
  blocks: RequestBlock[],
  extensions: CanonicalMessage['extensions']
): CanonicalMessage[] {
  const toolMessages: CanonicalMessage[] = [];
  const parts: MessagePart[] = [];

  for (const block of blocks) {
    if (!isKnownBlock(block)) {
      parts.push(opaqueBlock(block));
      continue;
    }
    if (block.type === 'tool_result') {
      const toolMessage: CanonicalMessage = {
        role: 'tool',
        toolCallId: block.tool_use_id,
        content: decodeToolResultContent(block.content),
      };
      if (block.is_error !== undefined) toolMessage.isError = block.is_error;
      const blockExtensions = toExtensions(
        FORMAT,
        pickExtras(block, ['type', 'tool_use_id', 'content', 'is_error'])
      );
      toolMessages.push(withExtensions(toolMessage, blockExtensions));
      continue;
    }
    if (block.type === 'tool_use') {
      throw new DecodeError(FORMAT, 'unsupported_content', 'tool_use blocks are only valid in assistant messages');
    }
    parts.push(decodeContentBlock(block));
  }

  if (parts.length > 0 || toolMessages.length === 0) {
    return [...toolMessages, withExtensions({ role: 'user', content: parts }, extensions)];
  }

  // 只有 tool_result 时，消息级字段挂到第一个 tool 消息上
  toolMessages[0] = withExtensions(toolMessages[0], extensions);
  return toolMessages;
}

function decodeAssistantBlocks(blocks: RequestBlock[]): CanonicalMessage {
  const content: MessagePart[] = [];
  const toolCalls: ToolCall[] = [];

  for (const block of blocks) {
    if (!isKnownBlock(block)) {
      content.push(opaqueBlock(block));
      continue;
    }
    if (block.type === 'tool_use') {
      const call: ToolCall = {
        id: block.id,
        name: block.name,
        arguments: JSON.stringify(block.input ?? {}),
      };
      const extensions = toExtensions(FORMAT, pickExtras(block, ['type', 'id', 'name', 'input']));
      if (extensions) call.extensions = extensions;
      toolCalls.push(call);
      continue;
    }
    if (block.type === 'tool_result') {
      throw new DecodeError(FORMAT, 'unsupported_content', 'tool_result blocks are only valid in user messages');
    }
    content.push(decodeContentBlock(block));
  }

  const message: CanonicalMessage = { role: 'assistant', content };
  if (toolCalls.length > 0) message.toolCalls = toolCalls;
  return message;
}

type PartBlock = Exclude<AnthropicContentBlock, { type: 'tool_use' } | { type: 'tool_result' }>;

function decodeContentBlock(block: PartBlock): ContentPart {
  switch (block.type) {
    case 'text':
      return decodeTextBlock(block);
    case 'image':
      return decodeImageBlock(block);
    case 'thinking': {
      const part: ThinkingPart = { type: 'thinking', text: block.thinking };
      if (block.signature !== undefined) part.signature = block.signature;
      return withPartExtensions(part, pickExtras(block, ['type', 'thinking', 'signature']));
    }
    case 'redacted_thinking':
      return withPartExtensions(
        { type: 'thinking', text: '', encrypted: block.data },
        pickExtras(block, ['type', 'data'])
      );
  }
}

function decodeTextBlock(block: AnthropicTextBlock): TextPart {
  return withPartExtensions({ type: 'text', text: block.text }, pickExtras(block, ['type', 'text']));
}

function decodeImageBlock(block: AnthropicImageBlock): ImagePart {
  const source = block.source;
  const part: ImagePart =
    source.type === 'base64'
      ? { type: 'image', source: { kind: 'base64', mediaType: source.media_type, data: source.data } }
      : { type: 'image', source: { kind: 'url', url: source.url } };
  return withPartExtensions(part, pickExtras(block, ['type', 'source']));
}

function decodeToolResultContent(
  content: string | (AnthropicTextBlock | AnthropicImageBlock | AnthropicUnknownBlock)[] | undefined
): MessagePart[] {
  if (content === undefined || content === '') return [];
  if (typeof content === 'string') return [{ type: 'text', text: content }];
  return content.map((block) => {
    if (!isKnownBlock(block)) return opaqueBlock(block);
    return block.type === 'text' ? decodeTextBlock(block) : decodeImageBlock(block);
  });
}

function decodeTool(tool: AnthropicTool): ToolDefinition {
  // 带 type 的（web_search_20250305 等）是服务端内置工具
  if (tool.type !== undefined && tool.type !== 'custom') {
    return { type: 'builtin', format: FORMAT, config: { ...tool } };
  }
  const definition: ToolDefinition = { type: 'function', name: tool.name };
  if (tool.description !== undefined) definition.description = tool.description;
  if (tool.input_schema !== undefined) definition.parameters = tool.input_schema;
  const extensions = toExtensions(FORMAT, pickExtras(tool, ['name', 'description', 'input_schema']));
  if (extensions) definition.extensions = extensions;
  return definition;
}

function decodeToolChoice(choice: AnthropicToolChoice): ToolChoice {
  switch (choice.type) {
    case 'auto':
      return 'auto';
    case 'any':
      return 'required';
    case 'none':
      return 'none';
    case 'tool':
      return { name: choice.name };
  }
}

function decodeThinking(thinking: NonNullable<AnthropicRequest['thinking']>): ReasoningConfig {
  if (thinking.type === 'disabled') return { disabled: true };
  return { budgetTokens: thinking.budget_tokens };
}

// ==================== encode ====================

interface Turn {
  role: 'user' | 'assistant';
  toolResults: Record<string, unknown>[];
  blocks: Record<string, unknown>[];
  extras: Record<string, unknown>;
}

/**
 * 生成发往 Anthropic 的请求体
 */
export function encodeAnthropicRequest(request: CanonicalRequest): Record<string, unknown> {
  validateParameters(request, FORMAT, ANTHROPIC_LIMITS);

  const systemParts: TextPart[] = [];
  const turns: Turn[] = [];

  const lastTurn = (role: Turn['role']): Turn => {
    const last = turns[turns.length - 1];
    if (last && last.role === role) return last;
    const turn: Turn = { role, toolResults: [], blocks: [], extras: {} };
    turns.push(turn);
    return turn;
  };

  for (const message of request.messages) {
    switch (message.role) {
      case 'system':
        for (const part of message.content) {
          if (part.type !== 'text') {
            throw new EncodeError(FORMAT, 'System messages can only carry text for anthropic');
          }
          systemParts.push(part);
        }
        break;

      case 'tool': {
        if (!message.toolCallId) {
          throw new DecodeError(FORMAT, 'invalid_shape', 'Tool message is missing its tool call id');
        }
        lastTurn('user').toolResults.push(encodeToolResult(message));
        break;
      }

      case 'user': {
        const turn = lastTurn('user');
        turn.blocks.push(...message.content.map(encodePart));
        Object.assign(turn.extras, extrasFor(message.extensions, FORMAT));
        break;
      }

      case 'assistant': {
        const turn = lastTurn('assistant');
        turn.blocks.push(...message.content.map(encodePart));
        for (const call of message.toolCalls ?? []) {
          turn.blocks.push(encodeToolUse(call));
        }
        Object.assign(turn.extras, extrasFor(message.extensions, FORMAT));
        break;
      }
    }
  }

  if (turns.length === 0 || turns[0].role !== 'user') {
    throw new DecodeError(FORMAT, 'role_order', 'The first non-system message must come from the user');
  }

  const maxTokens = request.maxTokens ?? ANTHROPIC_DEFAULT_MAX_TOKENS;

  const body: Record<string, unknown> = {
    ...extrasFor(request.extensions, FORMAT),
    model: request.model,
    messages: turns.map(encodeTurn),
    max_tokens: maxTokens,
  };

  if (systemParts.length > 0) body.system = encodeSystem(systemParts);
  if (request.temperature !== undefined) body.temperature = request.temperature;
  if (request.topP !== undefined) body.top_p = request.topP;
  if (request.topK !== undefined) body.top_k = request.topK;
  if (request.stopSequences !== undefined) body.stop_sequences = request.stopSequences;
  if (request.tools !== undefined) body.tools = request.tools.map(encodeTool);

  const toolChoice = encodeToolChoice(request.toolChoice, request.parallelToolCalls);
  if (toolChoice) body.tool_choice = toolChoice;

  if (request.reasoning) {
    body.thinking = encodeThinking(request.reasoning, maxTokens);
  }

  body.stream = request.stream;
  return body;
}

function encodeTurn(turn: Turn): Record<string, unknown> {
  const blocks = [...turn.toolResults, ...turn.blocks];
  return { ...turn.extras, role: turn.role, content: collapseBlocks(blocks) };
}

/**
 * 单个无附加字段的 text 块折叠为字符串
 */
function collapseBlocks(blocks: Record<string, unknown>[]): string | Record<string, unknown>[] {
  if (blocks.length === 1) {
    const [only] = blocks;
    if (only.type === 'text' && typeof only.text === 'string' && Object.keys(only).length === 2) {
      return only.text;
    }
  }
  return blocks;
}

function encodeSystem(parts: TextPart[]): string | Record<string, unknown>[] {
  return collapseBlocks(parts.map(encodePart));
}

function encodePart(part: MessagePart): Record<string, unknown> {
  if (part.type === 'opaque') return opaqueFor(part, FORMAT);
  const extras = extrasFor(part.extensions, FORMAT);
  switch (part.type) {
    case 'text':
      return { type: 'text', text: part.text, ...extras };
    case 'image':
      return {
        type: 'image',
        source:
          part.source.kind === 'base64'
            ? { type: 'base64', media_type: part.source.mediaType, data: part.source.data }
            : { type: 'url', url: part.source.url },
        ...extras,
      };
    case 'thinking': {
      if (part.encrypted !== undefined) {
        if (part.text) {
          throw new EncodeError(FORMAT, 'Encrypted reasoning with a visible summary cannot be expressed as an anthropic block');
        }
        return { type: 'redacted_thinking', data: part.encrypted, ...extras };
      }
      const block: Record<string, unknown> = { type: 'thinking', thinking: part.text };
      if (part.signature !== undefined) block.signature = part.signature;
      return { ...block, ...extras };
    }
  }
}

function encodeToolUse(call: ToolCall): Record<string, unknown> {
  return {
    type: 'tool_use',
    id: call.id,
    name: call.name,
    input: parseToolArguments(call),
    ...extrasFor(call.extensions, FORMAT),
  };
}

/**
 * Anthropic 的 input 是对象，这里只做 JSON 文本 → 值 的搬运
 */
export function parseToolArguments(call: ToolCall): unknown {
  if (call.arguments.trim() === '') return {};
  try {
    return JSON.parse(call.arguments);
  } catch {
    throw new EncodeError(FORMAT, `Arguments of tool call ${call.id} are not valid JSON`);
  }
}

function encodeToolResult(message: CanonicalMessage): Record<string, unknown> {
  const block: Record<string, unknown> = {
    type: 'tool_result',
    tool_use_id: message.toolCallId,
  };
  if (message.content.length > 0) {
    block.content = collapseBlocks(message.content.map(encodePart));
  }
  if (message.isError !== undefined) block.is_error = message.isError;
  return { ...block, ...extrasFor(message.extensions, FORMAT) };
}

function encodeTool(tool: ToolDefinition): Record<string, unknown> {
  if (tool.type === 'builtin') {
    if (tool.format !== FORMAT) {
      throw new EncodeError(FORMAT, `Built-in ${tool.format} tool cannot be sent to ${FORMAT}`);
    }
    return tool.config;
  }
  const encoded: Record<string, unknown> = {
    ...extrasFor(tool.extensions, FORMAT),
    name: tool.name,
    input_schema: tool.parameters ?? { type: 'object', properties: {} },
  };
  if (tool.description !== undefined) encoded.description = tool.description;
  return encoded;
}

function encodeToolChoice(
  choice: ToolChoice | undefined,
  parallelToolCalls: boolean | undefined
): Record<string, unknown> | undefined {
  let encoded: Record<string, unknown> | undefined;
  if (choice === 'auto') encoded = { type: 'auto' };
  else if (choice === 'required') encoded = { type: 'any' };
  else if (choice === 'none') encoded = { type: 'none' };
  else if (choice) encoded = { type: 'tool', name: choice.name };

  if (parallelToolCalls === false) {
    encoded = { ...(encoded ?? { type: 'auto' }), disable_parallel_tool_use: true };
  }
  return encoded;
}

function encodeThinking(reasoning: ReasoningConfig, maxTokens: number): Record<string, unknown> {
  if (reasoning.disabled) return { type: 'disabled' };

  const budget =
    reasoning.budgetTokens ?? (reasoning.effort ? EFFORT_BUDGETS[reasoning.effort] : undefined);
  if (budget === undefined) return { type: 'disabled' };

  const bounds = { min: MIN_THINKING_BUDGET, max: maxTokens - 1, integer: true };
  if (!Number.isInteger(budget) || budget < bounds.min || budget > bounds.max) {
    throw new InvalidParameterError('thinking.budget_tokens', budget, bounds, FORMAT);
  }
  return { type: 'enabled', budget_tokens: budget };
}

// ==================== helpers ====================

function withExtensions(
  message: CanonicalMessage,
  extensions: CanonicalMessage['extensions']
): CanonicalMessage {
  const merged = mergeExtensions(message.extensions, extensions);
  return merged ? { ...message, extensions: merged } : message;
}

function withPartExtensions<T extends ContentPart>(part: T, extras: Record<string, unknown> | undefined): T {
  const extensions = toExtensions(FORMAT, extras);
  return extensions ? { ...part, extensions } : part;
}
