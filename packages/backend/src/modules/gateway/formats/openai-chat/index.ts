/**
 * OpenAI Chat Completions adapter
 */

import type { FormatAdapter } from '../types.js';
import { decodeChatRequest, encodeChatRequest } from './converter.js';
import { ChatStreamDecoder, ChatStreamEncoder, decodeChatResponse, encodeChatResponse } from './handler.js';

export * from './models.js';
export { CHAT_LIMITS, decodeChatRequest, encodeChatRequest } from './converter.js';
export { ChatStreamDecoder, ChatStreamEncoder, decodeChatResponse, encodeChatResponse } from './handler.js';

export const openaiChatAdapter: FormatAdapter = {
  format: 'openai-chat',
  decodeRequest: decodeChatRequest,
  encodeRequest: encodeChatRequest,
  decodeResponse: decodeChatResponse,
  encodeResponse: encodeChatResponse,
  createStreamDecoder: () => new ChatStreamDecoder(),
  createStreamEncoder: (options) => new ChatStreamEncoder(options),
};
