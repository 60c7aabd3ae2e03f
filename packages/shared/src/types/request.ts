import type { WireFormat } from '../constants/formats.js';

export interface SseFrame {
  /** `event:` 行，OpenAI Chat 格式没有 */
  event?: string;
  /** `data:` 行原文 */
  data: string;
}

export interface BindingSummary {
  method: string;
  path: string;
  requestFormat: WireFormat;
  responseFormat: WireFormat;
  upstream: string;
}
