import type { SseFrame, WireFormat } from '@ccproxy/shared';
import type {
  CanonicalRequest,
  CanonicalResponse,
  CanonicalStreamEvent,
} from '../canonical/types.js';

/**
 * 上游 SSE 流 → canonical 事件
 */
export interface StreamDecoder {
  /** 一个上游事件可能产出 0..n 个 canonical 事件 */
  push(frame: SseFrame): CanonicalStreamEvent[];
  /** 上游流结束：补齐未完成的工具调用和终止事件 */
  finish(): CanonicalStreamEvent[];
  /** 遇到过格式自身的终止标记 */
  readonly terminated: boolean;
}

/**
 * canonical 事件 → 调用方格式的 SSE 帧
 */
export interface StreamEncoder {
  encode(event: CanonicalStreamEvent): SseFrame[];
}

export interface StreamEncoderOptions {
  /** message_start 之前就需要的模型名（通常取请求里的 model） */
  model: string;
}

/**
 * 同格式收集上游流时保留上游自己的响应对象
 */
export interface StreamSnapshot {
  observe(frame: SseFrame): void;
  /** 用上游的终止响应替换收集结果；流里没有终止响应时原样返回 collected */
  finish(collected: Record<string, unknown>): Record<string, unknown>;
}

/**
 * 单个 wire format 的双向编解码器
 */
export interface FormatAdapter {
  readonly format: WireFormat;
  decodeRequest(raw: Buffer | string): CanonicalRequest;
  encodeRequest(request: CanonicalRequest): Record<string, unknown>;
  decodeResponse(body: unknown): CanonicalResponse;
  encodeResponse(response: CanonicalResponse): Record<string, unknown>;
  createStreamDecoder(): StreamDecoder;
  createStreamEncoder(options: StreamEncoderOptions): StreamEncoder;
  createStreamSnapshot?(): StreamSnapshot;
}
