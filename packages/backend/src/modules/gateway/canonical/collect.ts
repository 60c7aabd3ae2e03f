/**
 * 把有序的 canonical 流事件折叠成完整响应
 *
 * 与非流式解码结果逐字段一致，用于强制流式上游的非流式调用方
 */

import { TransportError } from '../errors.js';
import type {
  CanonicalResponse,
  CanonicalStreamEvent,
  ContentPart,
  ThinkingPart,
  ToolCall,
} from './types.js';
import { emptyUsage } from './types.js';

export function collectStream(events: Iterable<CanonicalStreamEvent>): CanonicalResponse {
  const response: CanonicalResponse = {
    id: '',
    model: '',
    content: [],
    toolCalls: [],
    stopReason: 'end_turn',
    usage: emptyUsage(),
  };
  const content: ContentPart[] = [];
  const toolCalls: ToolCall[] = [];

  for (const event of events) {
    switch (event.type) {
      case 'message_start':
        response.id = event.id;
        response.model = event.model;
        if (event.usage) response.usage = { ...event.usage };
        break;

      case 'content_delta': {
        const delta = event.delta;
        const existing = content[event.index];
        if (delta.type === 'text') {
          if (existing?.type === 'text') existing.text += delta.text;
          else content[event.index] = { type: 'text', text: delta.text };
          break;
        }
        const part: ThinkingPart = existing?.type === 'thinking' ? existing : { type: 'thinking', text: '' };
        content[event.index] = part;
        if (delta.type === 'thinking') part.text += delta.text;
        else if (delta.type === 'signature') part.signature = (part.signature ?? '') + delta.signature;
        else part.encrypted = (part.encrypted ?? '') + delta.data;
        break;
      }

      case 'tool_call':
        toolCalls[event.toolIndex] = { id: event.id, name: event.name, arguments: event.arguments };
        break;

      case 'message_stop':
        response.stopReason = event.stopReason;
        if (event.stopSequence) response.stopSequence = event.stopSequence;
        response.usage = { ...event.usage };
        break;

      case 'error':
        throw new TransportError('UpstreamHTTPError', `Upstream stream failed: ${event.error.message}`, {
          upstreamBody: JSON.stringify(event.error),
        });
    }
  }

  // 序号由解码器连续分配，过滤掉理论上不会出现的空洞
  response.content = content.filter((part): part is ContentPart => part !== undefined);
  response.toolCalls = toolCalls.filter((call): call is ToolCall => call !== undefined);
  return response;
}
