/**
 * OpenAI Chat Completions 请求 ⇄ Canonical 请求
 *
 * 角色规则：
 * - system / developer 消息原位保留（developer 解码为 system）
 * - tool 消息一一对应 canonical tool 消息
 * - assistant 的 reasoning_content 对应 thinking 部分；签名和加密推理无法表达
 */

import {
  chatRequestSchema,
  type ChatContentPart,
  type ChatMessage,
  type ChatTool,
  type ChatToolCall,
  type ChatToolChoice,
} from '@ccproxy/shared';
import type {
  CanonicalMessage,
  CanonicalRequest,
  ContentPart,
  ImagePart,
  MessagePart,
  TextPart,
  ToolCall,
  ToolChoice,
  ToolDefinition,
} from '../../canonical/types.js';
import { DecodeError, EncodeError } from '../../errors.js';
import {
  effortFromBudget,
  extrasFor,
  isRecord,
  opaqueFor,
  parseDataUrl,
  parseJsonBody,
  parseWithSchema,
  pickExtras,
  toExtensions,
  validateParameters,
  type ParameterLimits,
} from '../common.js';

const FORMAT = 'openai-chat';

const REQUEST_KEYS = [
  'model',
  'messages',
  'max_tokens',
  'max_completion_tokens',
  'temperature',
  'top_p',
  'stop',
  'stream',
  'tools',
  'tool_choice',
  'parallel_tool_calls',
  'reasoning_effort',
] as const;

export const CHAT_LIMITS: ParameterLimits = {
  temperature: { min: 0, max: 2 },
  topP: { min: 0, max: 1 },
  maxTokens: { min: 1, integer: true },
  stopSequences: true,
};

type ChatTextPart = Extract<ChatContentPart, { type: 'text' }>;
type ChatImagePart = Extract<ChatContentPart, { type: 'image_url' }>;

// ==================== decode ====================

/**
 * 解析 Chat Completions 请求体
 */
export function decodeChatRequest(raw: Buffer | string): CanonicalRequest {
  const body = parseWithSchema(chatRequestSchema, parseJsonBody(raw, FORMAT), FORMAT);

  const request: CanonicalRequest = {
    model: body.model,
    messages: body.messages.map(decodeMessage),
    stream: body.stream ?? false,
  };

  const maxTokens = body.max_completion_tokens ?? body.max_tokens;
  if (maxTokens !== undefined) request.maxTokens = maxTokens;
  if (body.temperature !== undefined) request.temperature = body.temperature;
  if (body.top_p !== undefined) request.topP = body.top_p;
  if (body.stop !== undefined) {
    request.stopSequences = typeof body.stop === 'string' ? [body.stop] : body.stop;
  }
  if (body.tools !== undefined) request.tools = body.tools.map(decodeTool);
  if (body.tool_choice !== undefined) request.toolChoice = decodeToolChoice(body.tool_choice);
  if (body.parallel_tool_calls !== undefined) request.parallelToolCalls = body.parallel_tool_calls;
  if (body.reasoning_effort !== undefined) request.reasoning = { effort: body.reasoning_effort };

  const extensions = toExtensions(FORMAT, pickExtras(body, REQUEST_KEYS));
  if (extensions) request.extensions = extensions;

  return request;
}

function decodeMessage(message: ChatMessage): CanonicalMessage {
  const { decoded, known } = decodeMessageBody(message);
  const extensions = toExtensions(FORMAT, pickExtras(message, known));
  if (extensions) decoded.extensions = extensions;
  return decoded;
}

function decodeMessageBody(message: ChatMessage): { decoded: CanonicalMessage; known: string[] } {
  switch (message.role) {
    case 'system':
    case 'developer':
      return {
        decoded: { role: 'system', content: decodeTextContent(message.content) },
        known: ['role', 'content'],
      };

    case 'user':
      return {
        decoded: {
          role: 'user',
          content:
            typeof message.content === 'string'
              ? decodeTextContent(message.content)
              : message.content.map(decodeUserPart),
        },
        known: ['role', 'content'],
      };

    case 'assistant': {
      const content: ContentPart[] = [];
      if (typeof message.reasoning_content === 'string') {
        content.push({ type: 'thinking', text: message.reasoning_content });
      }
      content.push(...decodeTextContent(message.content ?? ''));
      const decoded: CanonicalMessage = { role: 'assistant', content };
      if (message.tool_calls && message.tool_calls.length > 0) {
        decoded.toolCalls = message.tool_calls.map(decodeToolCall);
      }
      return { decoded, known: ['role', 'content', 'tool_calls', 'reasoning_content'] };
    }

    case 'tool':
      return {
        decoded: {
          role: 'tool',
          toolCallId: message.tool_call_id,
          content: decodeTextContent(message.content),
        },
        known: ['role', 'tool_call_id', 'content'],
      };
  }
}

function decodeTextContent(content: string | ChatTextPart[]): ContentPart[] {
  if (typeof content === 'string') {
    return content ? [{ type: 'text', text: content }] : [];
  }
  return content.map(decodeTextPart);
}

function decodeTextPart(part: ChatTextPart): TextPart {
  const decoded: TextPart = { type: 'text', text: part.text };
  const extensions = toExtensions(FORMAT, pickExtras(part, ['type', 'text']));
  if (extensions) decoded.extensions = extensions;
  return decoded;
}

function decodeUserPart(part: ChatContentPart): ContentPart {
  return part.type === 'text' ? decodeTextPart(part) : decodeImagePart(part);
}

function decodeImagePart(part: ChatImagePart): ImagePart {
  const url = part.image_url.url;
  const inline = parseDataUrl(url);
  const decoded: ImagePart = inline
    ? { type: 'image', source: { kind: 'base64', mediaType: inline.mediaType, data: inline.data } }
    : { type: 'image', source: { kind: 'url', url } };

  // image_url 对象里的 detail 等字段放在嵌套的 image_url 键下
  const extras = pickExtras(part, ['type', 'image_url']) ?? {};
  const imageExtras = pickExtras(part.image_url, ['url']);
  if (imageExtras) extras.image_url = imageExtras;
  const extensions = toExtensions(FORMAT, Object.keys(extras).length > 0 ? extras : undefined);
  if (extensions) decoded.extensions = extensions;
  return decoded;
}

function decodeToolCall(call: ChatToolCall): ToolCall {
  const decoded: ToolCall = { id: call.id, name: call.function.name, arguments: call.function.arguments };
  const extensions = toExtensions(FORMAT, pickExtras(call, ['id', 'type', 'function']));
  if (extensions) decoded.extensions = extensions;
  return decoded;
}

function decodeTool(tool: ChatTool): ToolDefinition {
  const definition: ToolDefinition = { type: 'function', name: tool.function.name };
  if (tool.function.description !== undefined) definition.description = tool.function.description;
  if (tool.function.parameters !== undefined) definition.parameters = tool.function.parameters;

  const extras = pickExtras(tool, ['type', 'function']) ?? {};
  const functionExtras = pickExtras(tool.function, ['name', 'description', 'parameters']);
  if (functionExtras) extras.function = functionExtras;
  const extensions = toExtensions(FORMAT, Object.keys(extras).length > 0 ? extras : undefined);
  if (extensions) definition.extensions = extensions;
  return definition;
}

function decodeToolChoice(choice: ChatToolChoice): ToolChoice {
  return typeof choice === 'string' ? choice : { name: choice.function.name };
}

// ==================== encode ====================

/**
 * 生成 Chat Completions 请求体
 */
export function encodeChatRequest(request: CanonicalRequest): Record<string, unknown> {
  validateParameters(request, FORMAT, CHAT_LIMITS);

  const body: Record<string, unknown> = {
    ...extrasFor(request.extensions, FORMAT),
    model: request.model,
    messages: request.messages.map(encodeMessage),
  };

  if (request.maxTokens !== undefined) body.max_tokens = request.maxTokens;
  if (request.temperature !== undefined) body.temperature = request.temperature;
  if (request.topP !== undefined) body.top_p = request.topP;
  if (request.stopSequences !== undefined) body.stop = request.stopSequences;
  if (request.tools !== undefined) body.tools = request.tools.map(encodeTool);
  if (request.toolChoice !== undefined) body.tool_choice = encodeToolChoice(request.toolChoice);
  if (request.parallelToolCalls !== undefined) body.parallel_tool_calls = request.parallelToolCalls;

  const reasoning = request.reasoning;
  if (reasoning && !reasoning.disabled) {
    const effort =
      reasoning.effort ??
      (reasoning.budgetTokens !== undefined ? effortFromBudget(reasoning.budgetTokens) : undefined);
    if (effort) body.reasoning_effort = effort;
  }

  body.stream = request.stream;
  return body;
}

function encodeMessage(message: CanonicalMessage): Record<string, unknown> {
  const extras = extrasFor(message.extensions, FORMAT);

  switch (message.role) {
    case 'system':
      return { ...extras, role: 'system', content: encodeTextContent(message.content, 'system') };

    case 'user':
      return { ...extras, role: 'user', content: collapseParts(message.content.map(encodeUserPart)) };

    case 'assistant': {
      const thinking: string[] = [];
      const textParts: MessagePart[] = [];
      for (const part of message.content) {
        if (part.type === 'thinking') {
          if (part.signature !== undefined || part.encrypted !== undefined) {
            throw new EncodeError(FORMAT, 'Signed or encrypted reasoning cannot be sent as openai-chat content');
          }
          thinking.push(part.text);
        } else {
          textParts.push(part);
        }
      }

      const encoded: Record<string, unknown> = { ...extras, role: 'assistant' };
      encoded.content = textParts.length > 0 ? encodeTextContent(textParts, 'assistant') : null;
      if (thinking.length > 0) encoded.reasoning_content = thinking.join('');
      if (message.toolCalls && message.toolCalls.length > 0) {
        encoded.tool_calls = message.toolCalls.map(encodeToolCall);
      }
      return encoded;
    }

    case 'tool': {
      if (!message.toolCallId) {
        throw new DecodeError(FORMAT, 'invalid_shape', 'Tool message is missing its tool call id');
      }
      if (message.isError === true) {
        throw new EncodeError(FORMAT, 'Tool error results have no openai-chat representation');
      }
      return {
        ...extras,
        role: 'tool',
        tool_call_id: message.toolCallId,
        content: encodeTextContent(message.content, 'tool'),
      };
    }
  }
}

function encodeTextContent(parts: MessagePart[], role: string): string | Record<string, unknown>[] {
  const encoded = parts.map((part) => {
    if (part.type === 'opaque') return opaqueFor(part, FORMAT);
    if (part.type !== 'text') {
      throw new EncodeError(FORMAT, `${role} messages can only carry text for ${FORMAT}`);
    }
    return encodeTextPart(part);
  });
  return collapseParts(encoded);
}

function encodeTextPart(part: TextPart): Record<string, unknown> {
  return { ...extrasFor(part.extensions, FORMAT), type: 'text', text: part.text };
}

function encodeUserPart(part: MessagePart): Record<string, unknown> {
  switch (part.type) {
    case 'text':
      return encodeTextPart(part);
    case 'image': {
      const { image_url: imageExtras, ...extras } = extrasFor(part.extensions, FORMAT);
      const url =
        part.source.kind === 'base64'
          ? `data:${part.source.mediaType};base64,${part.source.data}`
          : part.source.url;
      return {
        ...extras,
        type: 'image_url',
        image_url: { ...(isRecord(imageExtras) ? imageExtras : {}), url },
      };
    }
    case 'thinking':
      throw new EncodeError(FORMAT, 'Reasoning content is only valid in assistant messages');
    case 'opaque':
      return opaqueFor(part, FORMAT);
  }
}

/**
 * 空内容 → ''，单个无附加字段的 text 部分 → 字符串
 */
function collapseParts(parts: Record<string, unknown>[]): string | Record<string, unknown>[] {
  if (parts.length === 0) return '';
  if (parts.length === 1) {
    const [only] = parts;
    if (only.type === 'text' && typeof only.text === 'string' && Object.keys(only).length === 2) {
      return only.text;
    }
  }
  return parts;
}

function encodeToolCall(call: ToolCall): Record<string, unknown> {
  return {
    ...extrasFor(call.extensions, FORMAT),
    id: call.id,
    type: 'function',
    function: { name: call.name, arguments: call.arguments },
  };
}

function encodeTool(tool: ToolDefinition): Record<string, unknown> {
  if (tool.type === 'builtin') {
    if (tool.format !== FORMAT) {
      throw new EncodeError(FORMAT, `Built-in ${tool.format} tool cannot be sent to ${FORMAT}`);
    }
    return tool.config;
  }

  const { function: functionExtras, ...extras } = extrasFor(tool.extensions, FORMAT);
  const fn: Record<string, unknown> = { ...(isRecord(functionExtras) ? functionExtras : {}), name: tool.name };
  if (tool.description !== undefined) fn.description = tool.description;
  if (tool.parameters !== undefined) fn.parameters = tool.parameters;
  return { ...extras, type: 'function', function: fn };
}

function encodeToolChoice(choice: ToolChoice): unknown {
  return typeof choice === 'string' ? choice : { type: 'function', function: { name: choice.name } };
}
