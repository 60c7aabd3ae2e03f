import type { WireFormat } from '@ccproxy/shared';
import { anthropicAdapter } from './anthropic/index.js';
import { openaiChatAdapter } from './openai-chat/index.js';
import { openaiResponsesAdapter } from './openai-responses/index.js';
import type { FormatAdapter } from './types.js';

export type { FormatAdapter, StreamDecoder, StreamEncoder, StreamEncoderOptions } from './types.js';

const ADAPTERS: Record<WireFormat, FormatAdapter> = {
  anthropic: anthropicAdapter,
  'openai-chat': openaiChatAdapter,
  'openai-responses': openaiResponsesAdapter,
};

/**
 * 按 wire format 取 adapter（新增格式只需在这里登记）
 */
export function getAdapter(format: WireFormat): FormatAdapter {
  return ADAPTERS[format];
}
