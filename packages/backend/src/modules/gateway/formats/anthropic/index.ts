/**
 * Anthropic Messages API adapter
 */

import type { FormatAdapter } from '../types.js';
import { decodeAnthropicRequest, encodeAnthropicRequest } from './converter.js';
import {
  AnthropicStreamDecoder,
  AnthropicStreamEncoder,
  decodeAnthropicResponse,
  encodeAnthropicResponse,
} from './handler.js';

export * from './models.js';
export { ANTHROPIC_LIMITS, decodeAnthropicRequest, encodeAnthropicRequest } from './converter.js';
export {
  AnthropicStreamDecoder,
  AnthropicStreamEncoder,
  decodeAnthropicResponse,
  encodeAnthropicResponse,
} from './handler.js';

export const anthropicAdapter: FormatAdapter = {
  format: 'anthropic',
  decodeRequest: decodeAnthropicRequest,
  encodeRequest: encodeAnthropicRequest,
  decodeResponse: decodeAnthropicResponse,
  encodeResponse: encodeAnthropicResponse,
  createStreamDecoder: () => new AnthropicStreamDecoder(),
  createStreamEncoder: (options) => new AnthropicStreamEncoder(options),
};
