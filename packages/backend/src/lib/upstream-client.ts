/**
 * 上游 HTTP 客户端
 *
 * - 直连走共享的 undici Agent，代理走按 URL 缓存的 ProxyAgent（CONNECT 隧道）
 * - CA bundle / SSL_VERIFY 同时作用于直连和隧道内的 TLS
 * - 连接阶段的失败统一归类为 TransportError
 */

import { Agent, ProxyAgent, request, type Dispatcher } from 'undici';
import type { IncomingHttpHeaders } from 'http';
import type { TransportErrorKind } from '@ccproxy/shared';
import { TransportError } from '../modules/gateway/errors.js';
import { proxyFor, type TransportConfig } from './transport-config.js';
import { logger } from './logger.js';

export interface UpstreamRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
  /** 流式响应不设 body 超时，空闲检测由 relay 负责 */
  stream: boolean;
}

export interface SendOptions {
  signal?: AbortSignal;
}

export type UpstreamBody = Dispatcher.ResponseData['body'];

export interface UpstreamResponse {
  status: number;
  headers: Record<string, string>;
  body: UpstreamBody;
}

export class UpstreamClient {
  private readonly direct: Agent;
  private readonly proxyAgents = new Map<string, ProxyAgent>();

  constructor(private readonly config: TransportConfig) {
    this.direct = new Agent({
      connect: { ...this.tlsOptions(), timeout: config.connectTimeoutMs },
    });
  }

  private tlsOptions(): { ca?: string; rejectUnauthorized: boolean } {
    return this.config.ca
      ? { ca: this.config.ca, rejectUnauthorized: this.config.verifyTls }
      : { rejectUnauthorized: this.config.verifyTls };
  }

  private dispatcherFor(target: URL): Dispatcher {
    const proxyUrl = proxyFor(this.config, target);
    if (!proxyUrl) return this.direct;

    let agent = this.proxyAgents.get(proxyUrl);
    if (!agent) {
      const tls = { ...this.tlsOptions(), timeout: this.config.connectTimeoutMs };
      agent = new ProxyAgent({ uri: proxyUrl, requestTls: tls, proxyTls: tls });
      this.proxyAgents.set(proxyUrl, agent);
    }
    return agent;
  }

  /**
   * 发送请求；HTTP >= 400 时读完响应体并抛出 UpstreamHTTPError
   */
  async send(upstreamRequest: UpstreamRequest, options: SendOptions = {}): Promise<UpstreamResponse> {
    const target = new URL(upstreamRequest.url);

    let response: Dispatcher.ResponseData;
    try {
      response = await request(target, {
        method: 'POST',
        headers: upstreamRequest.headers,
        body: upstreamRequest.body,
        signal: options.signal,
        dispatcher: this.dispatcherFor(target),
        headersTimeout: this.config.headersTimeoutMs,
        bodyTimeout: upstreamRequest.stream ? 0 : this.config.streamIdleTimeoutMs,
      });
    } catch (error) {
      throw classifyTransportError(error, target.origin);
    }

    if (response.statusCode >= 400) {
      const upstreamBody = await readErrorBody(response.body);
      throw new TransportError(
        'UpstreamHTTPError',
        `Upstream responded with HTTP ${response.statusCode}`,
        { status: response.statusCode, upstreamBody, upstream: target.origin }
      );
    }

    return {
      status: response.statusCode,
      headers: flattenHeaders(response.headers),
      body: response.body,
    };
  }

  async destroy(): Promise<void> {
    await Promise.all([this.direct.close(), ...[...this.proxyAgents.values()].map((a) => a.close())]);
    this.proxyAgents.clear();
  }
}

async function readErrorBody(body: UpstreamBody): Promise<string> {
  try {
    return await body.text();
  } catch (error) {
    logger.debug({ err: error }, 'Failed to read upstream error body');
    return '';
  }
}

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    result[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

// ==================== 错误分类 ====================

const TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'ETIMEDOUT',
]);

const TLS_CODES = new Set([
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_UNTRUSTED',
  'CERT_REJECTED',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'ERR_SSL_WRONG_VERSION_NUMBER',
  'EPROTO',
]);

function errorCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

/** error 以及 cause 链上的所有 code */
function collectCodes(error: unknown): string[] {
  const codes: string[] = [];
  let current: unknown = error;
  for (let depth = 0; current !== undefined && depth < 5; depth++) {
    const code = errorCode(current);
    if (code) codes.push(code);
    current = current instanceof Error ? current.cause : undefined;
  }
  return codes;
}

function kindFor(codes: string[]): TransportErrorKind {
  if (codes.some((code) => TLS_CODES.has(code) || code.startsWith('ERR_TLS_'))) return 'TLSVerifyFailed';
  if (codes.some((code) => TIMEOUT_CODES.has(code))) return 'Timeout';
  return 'ConnectFailed';
}

export function classifyTransportError(error: unknown, upstream: string): TransportError {
  if (error instanceof TransportError) return error;

  const codes = collectCodes(error);
  const kind = kindFor(codes);
  const reason = error instanceof Error ? error.message : String(error);

  return new TransportError(kind, `${kind} (${upstream}): ${reason}`, {
    upstream,
    cause: error,
  });
}
