/**
 * 上游传输配置
 *
 * 启动时从环境变量构建一次并冻结，之后所有请求只读共享
 */

import fs from 'fs';
import type { Env } from '../config/env.js';
import { ConfigError } from '../modules/gateway/errors.js';

export interface ProxySettings {
  http?: string;
  https?: string;
}

export interface TransportConfig {
  readonly proxies: Readonly<ProxySettings>;
  /** NO_PROXY 条目（小写，去掉前导点） */
  readonly noProxy: readonly string[];
  readonly caBundlePath?: string;
  /** CA bundle 文件内容 */
  readonly ca?: string;
  readonly verifyTls: boolean;
  readonly connectTimeoutMs: number;
  readonly headersTimeoutMs: number;
  readonly streamIdleTimeoutMs: number;
}

export type TransportEnv = Pick<
  Env,
  | 'HTTP_PROXY'
  | 'HTTPS_PROXY'
  | 'ALL_PROXY'
  | 'NO_PROXY'
  | 'http_proxy'
  | 'https_proxy'
  | 'all_proxy'
  | 'no_proxy'
  | 'REQUESTS_CA_BUNDLE'
  | 'SSL_CERT_FILE'
  | 'SSL_VERIFY'
  | 'UPSTREAM_CONNECT_TIMEOUT_MS'
  | 'UPSTREAM_HEADERS_TIMEOUT_MS'
  | 'STREAM_IDLE_TIMEOUT_MS'
>;

/**
 * 构建传输配置
 * - https 目标：HTTPS_PROXY → ALL_PROXY；http 目标：HTTP_PROXY → ALL_PROXY
 * - CA bundle：REQUESTS_CA_BUNDLE 优先于 SSL_CERT_FILE
 */
export function loadTransportConfig(source: TransportEnv): TransportConfig {
  const all = source.ALL_PROXY ?? source.all_proxy;
  const proxies: ProxySettings = {};
  const https = source.HTTPS_PROXY ?? source.https_proxy ?? all;
  const http = source.HTTP_PROXY ?? source.http_proxy ?? all;
  if (https) proxies.https = validateProxyUrl(https);
  if (http) proxies.http = validateProxyUrl(http);

  const noProxy = (source.NO_PROXY ?? source.no_proxy ?? '')
    .split(',')
    .map((entry) => entry.trim().toLowerCase().replace(/^\*?\./, ''))
    .filter(Boolean);

  const caBundlePath = source.REQUESTS_CA_BUNDLE ?? source.SSL_CERT_FILE;
  let ca: string | undefined;
  if (caBundlePath) {
    try {
      ca = fs.readFileSync(caBundlePath, 'utf8');
    } catch (error) {
      throw new ConfigError(`Cannot read CA bundle at ${caBundlePath}`, {
        path: caBundlePath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return Object.freeze({
    proxies: Object.freeze(proxies),
    noProxy: Object.freeze(noProxy),
    caBundlePath,
    ca,
    verifyTls: source.SSL_VERIFY,
    connectTimeoutMs: source.UPSTREAM_CONNECT_TIMEOUT_MS,
    headersTimeoutMs: source.UPSTREAM_HEADERS_TIMEOUT_MS,
    streamIdleTimeoutMs: source.STREAM_IDLE_TIMEOUT_MS,
  });
}

function validateProxyUrl(value: string): string {
  try {
    const url = new URL(value);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ConfigError(`Unsupported proxy protocol ${url.protocol}`, { proxy: maskProxyUrl(value) });
    }
    return url.toString();
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError('Proxy URL is not a valid URL', { proxy: maskProxyUrl(value) });
  }
}

/**
 * 目标 URL 应走的代理；命中 NO_PROXY 时返回 undefined
 */
export function proxyFor(config: TransportConfig, target: URL): string | undefined {
  const proxy = target.protocol === 'https:' ? config.proxies.https : config.proxies.http;
  if (!proxy) return undefined;
  return bypassesProxy(config.noProxy, target) ? undefined : proxy;
}

function bypassesProxy(noProxy: readonly string[], target: URL): boolean {
  const host = target.hostname.toLowerCase().replace(/^\[|\]$/g, '');
  const port = target.port || (target.protocol === 'https:' ? '443' : '80');

  return noProxy.some((entry) => {
    if (entry === '*') return true;
    const [entryHost, entryPort] = splitHostPort(entry);
    if (entryPort && entryPort !== port) return false;
    return host === entryHost || host.endsWith(`.${entryHost}`);
  });
}

function splitHostPort(entry: string): [string, string | undefined] {
  const match = /^(.*):(\d+)$/.exec(entry);
  // IPv6 字面量不带端口时也含冒号
  if (!match || match[1].includes(':')) return [entry.replace(/^\[|\]$/g, ''), undefined];
  return [match[1].replace(/^\[|\]$/g, ''), match[2]];
}

/**
 * 代理 URL 中的密码替换为 ***（用于日志）
 */
export function maskProxyUrl(value: string): string {
  try {
    const url = new URL(value);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return '<invalid proxy url>';
  }
}

export function describeTransport(config: TransportConfig): Record<string, unknown> {
  return {
    httpProxy: config.proxies.http ? maskProxyUrl(config.proxies.http) : undefined,
    httpsProxy: config.proxies.https ? maskProxyUrl(config.proxies.https) : undefined,
    noProxy: config.noProxy,
    caBundle: config.caBundlePath,
    verifyTls: config.verifyTls,
  };
}
