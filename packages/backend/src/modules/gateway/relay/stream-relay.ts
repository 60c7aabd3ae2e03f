/**
 * 流式中继
 *
 * 上游 SSE → decoder → canonical 事件 → encoder → 调用方
 *
 * - 逐事件转发，不缓冲整个响应
 * - 调用方写缓冲满时停止读上游，等待 drain
 * - 上游和调用方任一侧空闲超过 idleTimeoutMs 即中止
 * - 上游中途失败时调用方只会收到一个 error 事件
 * - 同格式（passthrough）时原样转发上游帧，shadow encoder 只用来维护状态
 */

import type { Readable, Writable } from 'stream';
import { ErrorCodes, type SseFrame, type WireFormat } from '@ccproxy/shared';
import type { Logger } from '../../../lib/logger.js';
import { classifyTransportError } from '../../../lib/upstream-client.js';
import type { CanonicalStreamEvent } from '../canonical/types.js';
import { StreamTimeoutError, TransportError } from '../errors.js';
import { isRecord } from '../formats/common.js';
import { getAdapter, type StreamDecoder, type StreamEncoder } from '../formats/index.js';
import { SseParser, serializeSseFrame } from './sse-parser.js';

export interface RelayOptions {
  upstreamFormat: WireFormat;
  responseFormat: WireFormat;
  /** 请求里的 model，上游 message_start 之前使用 */
  model: string;
  annotateModel: boolean;
  idleTimeoutMs: number;
  logger: Logger;
}

export type RelayOutcome = 'completed' | 'upstream_error' | 'timeout' | 'caller_closed';

export interface RelayResult {
  outcome: RelayOutcome;
  /** 写给调用方的帧数 */
  frames: number;
}

class CallerDisconnectedError extends Error {
  constructor() {
    super('Caller disconnected');
    this.name = 'CallerDisconnectedError';
  }
}

export async function relayStream(
  body: Readable,
  sink: Writable,
  options: RelayOptions
): Promise<RelayResult> {
  const parser = new SseParser();
  const decoder = getAdapter(options.upstreamFormat).createStreamDecoder();
  const encoder = getAdapter(options.responseFormat).createStreamEncoder({ model: options.model });
  const passthrough = options.upstreamFormat === options.responseFormat;
  const iterator: AsyncIterator<unknown> = body[Symbol.asyncIterator]();

  let upstreamModel: string | undefined;
  let upstreamErrored = false;
  let frames = 0;
  let done = false;
  let callerGone = false;
  let callerStalled = false;

  const onCallerClose = () => {
    if (done) return;
    callerGone = true;
    body.destroy();
  };
  sink.once('close', onCallerClose);

  const write = async (frame: SseFrame) => {
    const annotated = options.annotateModel ? annotateModel(frame, upstreamModel ?? options.model) : frame;
    await writeChunk(sink, serializeSseFrame(annotated), options.idleTimeoutMs);
    frames++;
  };

  const observe = (events: CanonicalStreamEvent[]) => {
    for (const event of events) {
      if (event.type === 'message_start') upstreamModel = event.model;
      if (event.type === 'error') upstreamErrored = true;
    }
  };

  const emitEvents = async (events: CanonicalStreamEvent[]) => {
    observe(events);
    for (const event of events) {
      for (const frame of encoder.encode(event)) await write(frame);
    }
  };

  const handleFrame = async (frame: SseFrame) => {
    const events = decoder.push(frame);
    if (!passthrough) {
      await emitEvents(events);
      return;
    }
    observe(events);
    // shadow：保持 encoder 状态与已转发内容一致，产出丢弃
    for (const event of events) encoder.encode(event);
    await write(frame);
  };

  let outcome: RelayOutcome = 'completed';
  try {
    read: for (;;) {
      const next = await nextWithTimeout(iterator, options.idleTimeoutMs);
      if (next.done) break;
      for (const frame of parser.push(toChunk(next.value))) {
        await handleFrame(frame);
        if (decoder.terminated) break read;
      }
    }
    if (!decoder.terminated) {
      for (const frame of parser.flush()) {
        await handleFrame(frame);
        if (decoder.terminated) break;
      }
    }
    // 上游没有发终止事件时补一个
    await emitEvents(decoder.finish());
    if (upstreamErrored) outcome = 'upstream_error';
  } catch (error) {
    outcome = await handleFailure(error);
  } finally {
    done = true;
    sink.off('close', onCallerClose);
    body.destroy();
    // 上游超时：error 帧已写入，正常结束响应；调用方不读或已断开：只能销毁
    if (outcome === 'caller_closed' || callerStalled) {
      sink.destroy();
    } else if (!sink.writableEnded && !sink.destroyed) {
      sink.end();
    }
  }

  options.logger.debug({ outcome, frames, passthrough }, 'Stream relay finished');
  return { outcome, frames };

  async function handleFailure(error: unknown): Promise<RelayOutcome> {
    if (callerGone || error instanceof CallerDisconnectedError) {
      options.logger.info('Caller disconnected, upstream read aborted');
      return 'caller_closed';
    }
    if (error instanceof StreamTimeoutError && error.side === 'caller') {
      callerStalled = true;
      options.logger.warn({ idleTimeoutMs: options.idleTimeoutMs }, 'Caller stopped reading, stream aborted');
      return 'timeout';
    }

    const failure = error instanceof StreamTimeoutError ? error : classifyTransportError(error, options.upstreamFormat);
    options.logger.warn({ err: failure, frames }, 'Upstream stream failed');

    if (!decoder.terminated) {
      await emitStreamError(encoder, failure, write, options.logger);
    }
    return failure instanceof StreamTimeoutError ? 'timeout' : 'upstream_error';
  }
}

async function emitStreamError(
  encoder: StreamEncoder,
  failure: StreamTimeoutError | TransportError,
  write: (frame: SseFrame) => Promise<void>,
  logger: Logger
): Promise<void> {
  const event: CanonicalStreamEvent = {
    type: 'error',
    error:
      failure instanceof TransportError
        ? { code: ErrorCodes.TRANSPORT_ERROR, message: failure.message, kind: failure.kind }
        : { code: ErrorCodes.STREAM_TIMEOUT, message: failure.message },
  };
  try {
    for (const frame of encoder.encode(event)) await write(frame);
  } catch (writeError) {
    // 调用方此时也不可写，只能断开
    logger.debug({ err: writeError }, 'Failed to deliver stream error event');
  }
}

/**
 * 非流式调用方 + 强制流式上游：读完整个上游流，返回全部 canonical 事件
 * onFrame 在解码前看到每个上游帧
 */
export async function readStreamEvents(
  body: Readable,
  upstreamFormat: WireFormat,
  idleTimeoutMs: number,
  onFrame?: (frame: SseFrame) => void
): Promise<CanonicalStreamEvent[]> {
  const parser = new SseParser();
  const decoder: StreamDecoder = getAdapter(upstreamFormat).createStreamDecoder();
  const iterator: AsyncIterator<unknown> = body[Symbol.asyncIterator]();
  const events: CanonicalStreamEvent[] = [];

  try {
    read: for (;;) {
      const next = await nextWithTimeout(iterator, idleTimeoutMs);
      if (next.done) break;
      for (const frame of parser.push(toChunk(next.value))) {
        onFrame?.(frame);
        events.push(...decoder.push(frame));
        if (decoder.terminated) break read;
      }
    }
    if (!decoder.terminated) {
      for (const frame of parser.flush()) {
        onFrame?.(frame);
        events.push(...decoder.push(frame));
      }
    }
    events.push(...decoder.finish());
    return events;
  } catch (error) {
    if (error instanceof StreamTimeoutError) throw error;
    throw classifyTransportError(error, upstreamFormat);
  } finally {
    body.destroy();
  }
}

function toChunk(value: unknown): Uint8Array | string {
  if (typeof value === 'string' || value instanceof Uint8Array) return value;
  throw new TypeError('Upstream body yielded a non-binary chunk');
}

/**
 * 给缺少 model（以及 response.model）的 JSON 帧补上模型名
 */
export function annotateModel(frame: SseFrame, model: string): SseFrame {
  let payload: unknown;
  try {
    payload = JSON.parse(frame.data);
  } catch {
    return frame;
  }
  if (!isRecord(payload) || 'model' in payload) return frame;
  if (isRecord(payload.response) && 'model' in payload.response) return frame;
  return { ...frame, data: JSON.stringify({ ...payload, model }) };
}

async function nextWithTimeout<T>(iterator: AsyncIterator<T>, ms: number): Promise<IteratorResult<T>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new StreamTimeoutError('upstream', ms)), ms);
  });
  try {
    return await Promise.race([iterator.next(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

async function writeChunk(sink: Writable, chunk: string, ms: number): Promise<void> {
  if (sink.destroyed || sink.writableEnded) throw new CallerDisconnectedError();
  if (sink.write(chunk)) return;

  await new Promise<void>((resolve, reject) => {
    const cleanup = () => {
      clearTimeout(timer);
      sink.off('drain', onDrain);
      sink.off('close', onClose);
    };
    const onDrain = () => {
      cleanup();
      resolve();
    };
    const onClose = () => {
      cleanup();
      reject(new CallerDisconnectedError());
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new StreamTimeoutError('caller', ms));
    }, ms);
    sink.once('drain', onDrain);
    sink.once('close', onClose);
  });
}
