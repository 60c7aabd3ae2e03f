/**
 * OpenAI Responses 请求 ⇄ Canonical 请求
 *
 * 输入项分组规则：
 * - instructions ⇄ 第一条 system 消息（多段以空行拼接）；其余 system 消息保持为消息项
 * - developer 项、以及会排在第一条的 system 项，解码时在 extensions 里记下 role，编码时原样写回
 * - 相邻的 reasoning / assistant message / function_call 项合并为一条 assistant 消息
 * - function_call_output ⇄ tool 消息
 * - 未识别的输入项 / 内容块 ⇄ opaque，只能编码回 Responses
 */

import {
  RESPONSES_CONTENT_PART_TYPES,
  RESPONSES_INPUT_ITEM_TYPES,
  responsesRequestSchema,
  type ResponsesContentPart,
  type ResponsesInputItem,
  type ResponsesMessageItem,
  type ResponsesUnknownItem,
  type ResponsesUnknownPart,
  type ResponsesRequest,
  type ResponsesTool,
  type ResponsesToolChoice,
} from '@ccproxy/shared';
import type {
  CanonicalMessage,
  CanonicalRequest,
  MessagePart,
  OpaquePart,
  ReasoningConfig,
  TextPart,
  ThinkingPart,
  ToolChoice,
  ToolDefinition,
} from '../../canonical/types.js';
import { DecodeError, EncodeError } from '../../errors.js';
import {
  effortFromBudget,
  extrasFor,
  isReasoningEffort,
  mergeExtensions,
  opaqueFor,
  parseDataUrl,
  parseJsonBody,
  parseWithSchema,
  pickExtras,
  toExtensions,
  validateParameters,
  type ParameterLimits,
} from '../common.js';
import { SUMMARY_SEPARATOR } from './models.js';

const FORMAT = 'openai-responses';

const REQUEST_KEYS = [
  'model',
  'input',
  'instructions',
  'max_output_tokens',
  'temperature',
  'top_p',
  'stream',
  'tools',
  'tool_choice',
  'parallel_tool_calls',
  'reasoning',
] as const;

export const RESPONSES_LIMITS: ParameterLimits = {
  temperature: { min: 0, max: 2 },
  topP: { min: 0, max: 1 },
  maxTokens: { min: 1, integer: true },
  stopSequences: false,
};

const KNOWN_PART_TYPES = new Set<string>(RESPONSES_CONTENT_PART_TYPES);
const KNOWN_ITEM_TYPES = new Set<string>(RESPONSES_INPUT_ITEM_TYPES);

function isKnownItem(item: ResponsesInputItem | ResponsesUnknownItem): item is ResponsesInputItem {
  return item.type === undefined || KNOWN_ITEM_TYPES.has(item.type);
}

function isKnownPart(part: ResponsesContentPart | ResponsesUnknownPart): part is ResponsesContentPart {
  return KNOWN_PART_TYPES.has(part.type);
}

function opaque(scope: OpaquePart['scope'], value: Record<string, unknown>): OpaquePart {
  return { type: 'opaque', format: FORMAT, scope, value: { ...value } };
}

// ==================== decode ====================

/**
 * 解析 Responses 请求体
 */
export function decodeResponsesRequest(raw: Buffer | string): CanonicalRequest {
  const body = parseWithSchema(responsesRequestSchema, parseJsonBody(raw, FORMAT), FORMAT);

  const messages: CanonicalMessage[] = [];
  if (body.instructions !== undefined) {
    messages.push({
      role: 'system',
      content: body.instructions ? [{ type: 'text', text: body.instructions }] : [],
    });
  }
  if (typeof body.input === 'string') {
    messages.push({ role: 'user', content: body.input ? [{ type: 'text', text: body.input }] : [] });
  } else {
    messages.push(...decodeItems(body.input, messages.length === 0));
  }

  const request: CanonicalRequest = {
    model: body.model,
    messages,
    stream: body.stream ?? false,
  };

  if (body.max_output_tokens !== undefined) request.maxTokens = body.max_output_tokens;
  if (body.temperature !== undefined) request.temperature = body.temperature;
  if (body.top_p !== undefined) request.topP = body.top_p;
  if (body.tools !== undefined) request.tools = body.tools.map(decodeTool);
  if (body.tool_choice !== undefined) request.toolChoice = decodeToolChoice(body.tool_choice);
  if (body.parallel_tool_calls !== undefined) request.parallelToolCalls = body.parallel_tool_calls;
  if (body.reasoning !== undefined) request.reasoning = decodeReasoning(body.reasoning);

  const extensions = toExtensions(FORMAT, pickExtras(body, REQUEST_KEYS));
  if (extensions) request.extensions = extensions;

  return request;
}

function decodeItems(
  items: (ResponsesInputItem | ResponsesUnknownItem)[],
  first: boolean
): CanonicalMessage[] {
  const messages: CanonicalMessage[] = [];
  let assistant: CanonicalMessage | undefined;

  const assistantTurn = (): CanonicalMessage => {
    if (!assistant) {
      assistant = { role: 'assistant', content: [] };
      messages.push(assistant);
    }
    return assistant;
  };

  for (const item of items) {
    if (!isKnownItem(item)) {
      assistant = undefined;
      messages.push({ role: 'user', content: [opaque('item', item)] });
      continue;
    }

    if (item.type === 'function_call') {
      const turn = assistantTurn();
      const call = { id: item.call_id, name: item.name, arguments: item.arguments };
      const extensions = toExtensions(FORMAT, pickExtras(item, ['type', 'call_id', 'name', 'arguments']));
      (turn.toolCalls ??= []).push(extensions ? { ...call, extensions } : call);
      continue;
    }

    if (item.type === 'reasoning') {
      const part: ThinkingPart = {
        type: 'thinking',
        text: item.summary.map((summary) => summary.text).join(SUMMARY_SEPARATOR),
      };
      if (typeof item.encrypted_content === 'string') part.encrypted = item.encrypted_content;
      const extensions = toExtensions(FORMAT, pickExtras(item, ['type', 'summary', 'encrypted_content']));
      if (extensions) part.extensions = extensions;
      assistantTurn().content.push(part);
      continue;
    }

    if (item.type === 'function_call_output') {
      assistant = undefined;
      const message: CanonicalMessage = {
        role: 'tool',
        toolCallId: item.call_id,
        content: decodeOutput(item.output),
      };
      const extensions = toExtensions(FORMAT, pickExtras(item, ['type', 'call_id', 'output']));
      if (extensions) message.extensions = extensions;
      messages.push(message);
      continue;
    }

    // 带 role 的 system 消息编码时不会写成 instructions
    const marked = item.role === 'developer' || (item.role === 'system' && first && messages.length === 0);
    const kept = marked ? ['type', 'content'] : ['type', 'role', 'content'];
    const extensions = toExtensions(FORMAT, pickExtras(item, kept));
    if (item.role === 'assistant') {
      const turn = assistantTurn();
      turn.content.push(...decodeContent(item));
      const merged = mergeExtensions(turn.extensions, extensions);
      if (merged) turn.extensions = merged;
      continue;
    }

    assistant = undefined;
    const message: CanonicalMessage = {
      role: item.role === 'user' ? 'user' : 'system',
      content: decodeContent(item),
    };
    if (extensions) message.extensions = extensions;
    messages.push(message);
  }

  return messages;
}

function decodeContent(item: ResponsesMessageItem): MessagePart[] {
  if (typeof item.content === 'string') {
    return item.content ? [{ type: 'text', text: item.content }] : [];
  }
  return item.content.map(decodePart);
}

function decodeOutput(output: string | (ResponsesContentPart | ResponsesUnknownPart)[]): MessagePart[] {
  if (typeof output === 'string') return output ? [{ type: 'text', text: output }] : [];
  return output.map(decodePart);
}

function decodePart(part: ResponsesContentPart | ResponsesUnknownPart): MessagePart {
  if (!isKnownPart(part)) return opaque('part', part);
  if (part.type === 'input_image') {
    const inline = parseDataUrl(part.image_url);
    const decoded: MessagePart = inline
      ? { type: 'image', source: { kind: 'base64', mediaType: inline.mediaType, data: inline.data } }
      : { type: 'image', source: { kind: 'url', url: part.image_url } };
    const extensions = toExtensions(FORMAT, pickExtras(part, ['type', 'image_url']));
    return extensions ? { ...decoded, extensions } : decoded;
  }
  const decoded: TextPart = { type: 'text', text: part.text };
  const extensions = toExtensions(FORMAT, pickExtras(part, ['type', 'text']));
  if (extensions) decoded.extensions = extensions;
  return decoded;
}

function decodeTool(tool: ResponsesTool): ToolDefinition {
  if (tool.type !== 'function') {
    return { type: 'builtin', format: FORMAT, config: { ...tool } };
  }
  if (!tool.name) {
    throw new DecodeError(FORMAT, 'invalid_shape', 'Function tools must have a name');
  }
  const definition: ToolDefinition = { type: 'function', name: tool.name };
  if (tool.description !== undefined) definition.description = tool.description;
  if (tool.parameters !== undefined) definition.parameters = tool.parameters;
  const extensions = toExtensions(FORMAT, pickExtras(tool, ['type', 'name', 'description', 'parameters']));
  if (extensions) definition.extensions = extensions;
  return definition;
}

function decodeToolChoice(choice: ResponsesToolChoice): ToolChoice {
  return typeof choice === 'string' ? choice : { name: choice.name };
}

function decodeReasoning(reasoning: NonNullable<ResponsesRequest['reasoning']>): ReasoningConfig {
  const decoded: ReasoningConfig = {};
  const effort = reasoning.effort;
  const known = effort !== undefined && isReasoningEffort(effort);
  if (known) decoded.effort = effort;
  // 'none' 等其他取值留在 extensions 里原样写回
  else if (effort === 'none') decoded.disabled = true;
  const extensions = toExtensions(FORMAT, pickExtras(reasoning, known ? ['effort'] : []));
  if (extensions) decoded.extensions = extensions;
  return decoded;
}

// ==================== encode ====================

/**
 * 生成 Responses 请求体
 */
export function encodeResponsesRequest(request: CanonicalRequest): Record<string, unknown> {
  validateParameters(request, FORMAT, RESPONSES_LIMITS);

  let instructions: string | undefined;
  const input: Record<string, unknown>[] = [];

  request.messages.forEach((message, index) => {
    const extras = extrasFor(message.extensions, FORMAT);

    switch (message.role) {
      case 'system': {
        // 只有第一条、且不是从 developer / system 项解码来的 system 消息写成 instructions
        if (index === 0 && !('role' in extras)) {
          instructions = textsOf(message.content, 'system')
            .map((part) => part.text)
            .join(SUMMARY_SEPARATOR);
        } else {
          input.push({
            ...extras,
            type: 'message',
            role: typeof extras.role === 'string' ? extras.role : 'system',
            content: message.content.map((part) =>
              part.type === 'opaque' ? opaqueFor(part, FORMAT) : encodeTextPart(textOf(part, 'system'), 'input_text')
            ),
          });
        }
        break;
      }

      case 'user':
        input.push(...encodeUser(message, extras));
        break;

      case 'assistant':
        input.push(...encodeAssistant(message, extras));
        break;

      case 'tool': {
        if (!message.toolCallId) {
          throw new DecodeError(FORMAT, 'invalid_shape', 'Tool message is missing its tool call id');
        }
        if (message.isError === true) {
          throw new EncodeError(FORMAT, 'Tool error results have no openai-responses representation');
        }
        input.push({
          ...extras,
          type: 'function_call_output',
          call_id: message.toolCallId,
          output: encodeOutput(message.content),
        });
        break;
      }
    }
  });

  const body: Record<string, unknown> = {
    ...extrasFor(request.extensions, FORMAT),
    model: request.model,
  };
  if (instructions !== undefined) body.instructions = instructions;
  body.input = input;

  if (request.maxTokens !== undefined) body.max_output_tokens = request.maxTokens;
  if (request.temperature !== undefined) body.temperature = request.temperature;
  if (request.topP !== undefined) body.top_p = request.topP;
  if (request.tools !== undefined) body.tools = request.tools.map(encodeTool);
  if (request.toolChoice !== undefined) body.tool_choice = encodeToolChoice(request.toolChoice);
  if (request.parallelToolCalls !== undefined) body.parallel_tool_calls = request.parallelToolCalls;
  if (request.reasoning) {
    const reasoning = encodeReasoning(request.reasoning);
    if (reasoning) body.reasoning = reasoning;
  }

  body.stream = request.stream;
  return body;
}

/**
 * user 消息 → message 项；item 级 opaque 原样成为独立的输入项
 */
function encodeUser(message: CanonicalMessage, extras: Record<string, unknown>): Record<string, unknown>[] {
  const items: Record<string, unknown>[] = [];
  let content: Record<string, unknown>[] | undefined;

  for (const part of message.content) {
    if (part.type === 'opaque' && part.scope === 'item') {
      content = undefined;
      items.push(opaqueFor(part, FORMAT));
      continue;
    }
    if (!content) {
      content = [];
      items.push({ ...extras, type: 'message', role: 'user', content });
    }
    content.push(encodeUserPart(part));
  }

  if (items.length === 0) items.push({ ...extras, type: 'message', role: 'user', content: [] });
  return items;
}

/**
 * 纯文本输出拼成字符串，含图片或 opaque 内容时输出内容块数组
 */
function encodeOutput(parts: MessagePart[]): string | Record<string, unknown>[] {
  if (parts.every((part) => part.type === 'text')) {
    return parts.map((part) => (part.type === 'text' ? part.text : '')).join('');
  }
  return parts.map(encodeUserPart);
}

/**
 * assistant 消息 → reasoning / message / function_call 项
 * 内容按原顺序输出，相邻 text 部分合成一个 message 项
 */
function encodeAssistant(message: CanonicalMessage, extras: Record<string, unknown>): Record<string, unknown>[] {
  const items: Record<string, unknown>[] = [];
  let textItem: Record<string, unknown>[] | undefined;
  let wroteMessage = false;

  for (const part of message.content) {
    switch (part.type) {
      case 'text':
        if (!textItem) {
          textItem = [];
          items.push({ ...extras, type: 'message', role: 'assistant', content: textItem });
          wroteMessage = true;
        }
        textItem.push(encodeTextPart(part, 'output_text'));
        break;
      case 'thinking':
        textItem = undefined;
        items.push(encodeReasoningItem(part));
        break;
      case 'image':
        throw new EncodeError(FORMAT, 'Assistant messages cannot carry images for openai-responses');
      case 'opaque':
        if (part.scope === 'item') {
          textItem = undefined;
          items.push(opaqueFor(part, FORMAT));
          break;
        }
        if (!textItem) {
          textItem = [];
          items.push({ ...extras, type: 'message', role: 'assistant', content: textItem });
          wroteMessage = true;
        }
        textItem.push(opaqueFor(part, FORMAT));
        break;
    }
  }

  const toolCalls = message.toolCalls ?? [];
  if (!wroteMessage && items.length === 0 && toolCalls.length === 0) {
    items.push({ ...extras, type: 'message', role: 'assistant', content: [] });
  }

  for (const call of toolCalls) {
    items.push({
      ...extrasFor(call.extensions, FORMAT),
      type: 'function_call',
      call_id: call.id,
      name: call.name,
      arguments: call.arguments,
    });
  }
  return items;
}

function encodeReasoningItem(part: ThinkingPart): Record<string, unknown> {
  if (part.signature !== undefined) {
    throw new EncodeError(FORMAT, 'Signed reasoning cannot be sent to openai-responses');
  }
  const item: Record<string, unknown> = {
    ...extrasFor(part.extensions, FORMAT),
    type: 'reasoning',
    summary: part.text ? [{ type: 'summary_text', text: part.text }] : [],
  };
  if (part.encrypted !== undefined) item.encrypted_content = part.encrypted;
  return item;
}

function textOf(part: MessagePart, role: string): TextPart {
  if (part.type !== 'text') {
    throw new EncodeError(FORMAT, `${role} messages can only carry text for ${FORMAT}`);
  }
  return part;
}

function textsOf(parts: MessagePart[], role: string): TextPart[] {
  return parts.map((part) => textOf(part, role));
}

function encodeTextPart(part: TextPart, type: 'input_text' | 'output_text'): Record<string, unknown> {
  return { ...extrasFor(part.extensions, FORMAT), type, text: part.text };
}

function encodeUserPart(part: MessagePart): Record<string, unknown> {
  switch (part.type) {
    case 'text':
      return encodeTextPart(part, 'input_text');
    case 'image':
      return {
        ...extrasFor(part.extensions, FORMAT),
        type: 'input_image',
        image_url:
          part.source.kind === 'base64'
            ? `data:${part.source.mediaType};base64,${part.source.data}`
            : part.source.url,
      };
    case 'thinking':
      throw new EncodeError(FORMAT, 'Reasoning content is only valid in assistant messages');
    case 'opaque':
      return opaqueFor(part, FORMAT);
  }
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
    type: 'function',
    name: tool.name,
  };
  if (tool.description !== undefined) encoded.description = tool.description;
  if (tool.parameters !== undefined) encoded.parameters = tool.parameters;
  return encoded;
}

function encodeToolChoice(choice: ToolChoice): unknown {
  return typeof choice === 'string' ? choice : { type: 'function', name: choice.name };
}

function encodeReasoning(reasoning: ReasoningConfig): Record<string, unknown> | undefined {
  const encoded: Record<string, unknown> = { ...extrasFor(reasoning.extensions, FORMAT) };
  // 关闭推理时只写回来源带的字段（effort: 'none' 等）
  if (reasoning.disabled) return Object.keys(encoded).length > 0 ? encoded : undefined;
  const effort =
    reasoning.effort ??
    (reasoning.budgetTokens !== undefined ? effortFromBudget(reasoning.budgetTokens) : undefined);
  if (effort) encoded.effort = effort;
  return encoded;
}
