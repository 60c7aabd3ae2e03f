/**
 * 网关服务
 *
 * 核心流程：
 * 1. 按 method + path 找到 EndpointBinding
 * 2. 请求体 → 调用方格式 decoder → CanonicalRequest
 * 3. CanonicalRequest → 上游格式 encoder → 上游请求
 * 4. 流式：relay 逐事件转码；非流式：整体解码再编码
 */

import type { Response } from 'express';
import type { IncomingHttpHeaders } from 'http';
import type { WireFormat } from '@ccproxy/shared';
import type { EndpointBinding, UpstreamTarget } from '../../config/bindings.js';
import type { Logger } from '../../lib/logger.js';
import {
  classifyTransportError,
  type UpstreamBody,
  type UpstreamClient,
} from '../../lib/upstream-client.js';
import { collectStream } from './canonical/collect.js';
import type { CanonicalRequest } from './canonical/types.js';
import { DecodeError } from './errors.js';
import { getAdapter } from './formats/index.js';
import { readStreamEvents, relayStream, type RelayResult } from './relay/stream-relay.js';
import type { GatewayRouter } from './router.js';

export interface GatewayRequest {
  requestId: string;
  method: string;
  path: string;
  headers: IncomingHttpHeaders;
  body: Buffer;
  logger: Logger;
}

export interface GatewayServiceOptions {
  router: GatewayRouter;
  client: UpstreamClient;
  idleTimeoutMs: number;
}

export type GatewayResult =
  | { mode: 'stream'; relay: RelayResult }
  | { mode: 'json'; status: number };

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  if (Array.isArray(value)) return value[0];
  return value || undefined;
}

/**
 * 调用方凭证：x-api-key 优先，其次 Authorization: Bearer
 */
export function callerCredential(headers: IncomingHttpHeaders): string | undefined {
  const apiKey = headerValue(headers, 'x-api-key');
  if (apiKey) return apiKey;
  const authorization = headerValue(headers, 'authorization');
  const match = authorization ? /^Bearer\s+(.+)$/i.exec(authorization) : null;
  return match ? match[1].trim() : undefined;
}

export function buildUpstreamHeaders(
  target: UpstreamTarget,
  callerHeaders: IncomingHttpHeaders,
  stream: boolean
): Record<string, string> {
  const headers: Record<string, string> = {
    'content-type': 'application/json',
    accept: stream ? 'text/event-stream' : 'application/json',
    // 响应体需要逐字节解析，不接受压缩
    'accept-encoding': 'identity',
    ...target.headers,
  };

  for (const name of target.forwardHeaders) {
    const value = headerValue(callerHeaders, name);
    if (value) {
      // 同名固定头（大小写不同）被调用方的值替换
      for (const key of Object.keys(headers)) {
        if (key.toLowerCase() === name) delete headers[key];
      }
      headers[name] = value;
    }
  }

  const credential = callerCredential(callerHeaders) ?? target.defaultCredential;
  if (credential) {
    headers[target.credentialHeader] =
      target.credentialHeader === 'authorization' ? `Bearer ${credential}` : credential;
  }

  return headers;
}

/**
 * 编码上游请求体；requestDefaults 只补缺失的字段
 */
export function buildUpstreamBody(
  binding: EndpointBinding,
  request: CanonicalRequest,
  stream: boolean
): Record<string, unknown> {
  const target = binding.upstream;
  const wire = getAdapter(target.format).encodeRequest({ ...request, stream });
  for (const [key, value] of Object.entries(target.requestDefaults)) {
    if (!(key in wire)) wire[key] = value;
  }
  return wire;
}

export class GatewayService {
  constructor(private readonly options: GatewayServiceOptions) {}

  async handle(request: GatewayRequest, res: Response): Promise<GatewayResult> {
    const binding = this.options.router.resolve(request.method, request.path);
    const target = binding.upstream;
    const log = request.logger.child({
      requestId: request.requestId,
      binding: binding.path,
      upstream: target.name,
    });

    const canonical = getAdapter(binding.requestFormat).decodeRequest(request.body);
    const callerStream = canonical.stream;
    const upstreamStream = callerStream || target.forceStream;
    const body = buildUpstreamBody(binding, canonical, upstreamStream);

    // 调用方断开时取消上游请求
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) controller.abort();
    };
    res.once('close', onClose);

    try {
      log.debug({ model: canonical.model, callerStream, upstreamStream }, 'Forwarding request');
      const upstream = await this.options.client.send(
        {
          url: target.url,
          headers: buildUpstreamHeaders(target, request.headers, upstreamStream),
          body: JSON.stringify(body),
          stream: upstreamStream,
        },
        { signal: controller.signal }
      );

      res.setHeader('X-Request-Id', request.requestId);

      if (callerStream) {
        res.status(200);
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');
        res.flushHeaders();

        const relay = await relayStream(upstream.body, res, {
          upstreamFormat: target.format,
          responseFormat: binding.responseFormat,
          model: canonical.model,
          annotateModel: binding.annotateModel,
          idleTimeoutMs: this.options.idleTimeoutMs,
          logger: log,
        });
        return { mode: 'stream', relay };
      }

      const payload = upstreamStream
        ? await this.collectForcedStream(upstream.body, binding)
        : await this.translateResponse(upstream.body, binding);

      res.status(200).json(payload);
      return { mode: 'json', status: 200 };
    } finally {
      res.off('close', onClose);
    }
  }

  private async collectForcedStream(
    body: UpstreamBody,
    binding: EndpointBinding
  ): Promise<Record<string, unknown>> {
    const upstreamFormat = binding.upstream.format;
    // 同格式时保留上游自己的响应对象
    const snapshot =
      binding.responseFormat === upstreamFormat ? getAdapter(upstreamFormat).createStreamSnapshot?.() : undefined;
    const events = await readStreamEvents(body, upstreamFormat, this.options.idleTimeoutMs, (frame) =>
      snapshot?.observe(frame)
    );
    // 上游 error 事件在这里抛出
    const response = collectStream(events);
    const encoded = getAdapter(binding.responseFormat).encodeResponse(response);
    return snapshot ? snapshot.finish(encoded) : encoded;
  }

  private async translateResponse(
    body: UpstreamBody,
    binding: EndpointBinding
  ): Promise<unknown> {
    const upstreamFormat = binding.upstream.format;
    const json = await readJson(body, upstreamFormat, binding.upstream.url);

    // 同格式（包括 /openai/v1/chat/completions 的原生响应）原样返回
    if (binding.responseFormat === upstreamFormat) return json;

    const response = getAdapter(upstreamFormat).decodeResponse(json);
    return getAdapter(binding.responseFormat).encodeResponse(response);
  }
}

async function readJson(body: UpstreamBody, format: WireFormat, url: string): Promise<unknown> {
  let text: string;
  try {
    text = await body.text();
  } catch (error) {
    throw classifyTransportError(error, new URL(url).origin);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError(
      format,
      'invalid_json',
      'Upstream returned a non-JSON body',
      { reason: error instanceof Error ? error.message : String(error) },
      502
    );
  }
}
