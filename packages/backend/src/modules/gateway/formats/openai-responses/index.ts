/**
 * OpenAI Responses API adapter（Codex 上游同样使用该格式）
 */

import type { FormatAdapter } from '../types.js';
import { decodeResponsesRequest, encodeResponsesRequest } from './converter.js';
import {
  ResponsesStreamDecoder,
  ResponsesStreamEncoder,
  decodeResponsesResponse,
  encodeResponsesResponse,
} from './handler.js';
import { ResponsesStreamSnapshot } from './snapshot.js';

export * from './models.js';
export { RESPONSES_LIMITS, decodeResponsesRequest, encodeResponsesRequest } from './converter.js';
export {
  ResponsesStreamDecoder,
  ResponsesStreamEncoder,
  decodeResponsesResponse,
  encodeResponsesResponse,
} from './handler.js';
export { ResponsesStreamSnapshot } from './snapshot.js';

export const openaiResponsesAdapter: FormatAdapter = {
  format: 'openai-responses',
  decodeRequest: decodeResponsesRequest,
  encodeRequest: encodeResponsesRequest,
  decodeResponse: decodeResponsesResponse,
  encodeResponse: encodeResponsesResponse,
  createStreamDecoder: () => new ResponsesStreamDecoder(),
  createStreamEncoder: (options) => new ResponsesStreamEncoder(options),
  createStreamSnapshot: () => new ResponsesStreamSnapshot(),
};
