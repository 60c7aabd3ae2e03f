/**
 * 上游目标与端点绑定
 *
 * 启动时构建并冻结；新增一个上游 = 一个 adapter + 一条 binding
 */

import {
  CLAUDE_API_VERSION,
  CLAUDE_MESSAGES_PATH,
  CODEX_RESPONSES_PATH,
  GATEWAY_PATHS,
  type WireFormat,
} from '@ccproxy/shared';
import type { Env } from './env.js';

export type CredentialHeader = 'x-api-key' | 'authorization';

export interface UpstreamTarget {
  name: string;
  format: WireFormat;
  url: string;
  /** 调用方凭证写入哪个上游头；authorization 会加 Bearer 前缀 */
  credentialHeader: CredentialHeader;
  defaultCredential?: string;
  /** 固定发送的请求头（可被转发头覆盖） */
  headers: Readonly<Record<string, string>>;
  /** 从调用方原样转发的请求头（小写） */
  forwardHeaders: readonly string[];
  /** 上游只支持流式，非流式调用方由网关聚合 */
  forceStream: boolean;
  /** 请求体里缺失时补上的字段 */
  requestDefaults: Readonly<Record<string, unknown>>;
}

export interface EndpointBinding {
  method: string;
  /** 精确路径，或以 `/*` 结尾的固定前缀 */
  path: string;
  requestFormat: WireFormat;
  responseFormat: WireFormat;
  upstream: UpstreamTarget;
  /** 给缺少 model 的 JSON 帧补上上游模型名 */
  annotateModel: boolean;
}

export interface UpstreamTargets {
  anthropic: UpstreamTarget;
  codex: UpstreamTarget;
}

export type UpstreamEnv = Pick<
  Env,
  'ANTHROPIC_BASE_URL' | 'ANTHROPIC_API_KEY' | 'CODEX_BASE_URL' | 'CODEX_ACCESS_TOKEN' | 'CODEX_ACCOUNT_ID'
>;

function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}${path}`;
}

export function buildUpstreamTargets(source: UpstreamEnv): UpstreamTargets {
  const anthropic: UpstreamTarget = {
    name: 'anthropic',
    format: 'anthropic',
    url: joinUrl(source.ANTHROPIC_BASE_URL, CLAUDE_MESSAGES_PATH),
    credentialHeader: 'x-api-key',
    defaultCredential: source.ANTHROPIC_API_KEY,
    headers: { 'anthropic-version': CLAUDE_API_VERSION },
    forwardHeaders: ['anthropic-version', 'anthropic-beta'],
    forceStream: false,
    requestDefaults: {},
  };

  const codexHeaders: Record<string, string> = {
    'OpenAI-Beta': 'responses=experimental',
    originator: 'codex_cli_rs',
  };
  if (source.CODEX_ACCOUNT_ID) {
    codexHeaders['chatgpt-account-id'] = source.CODEX_ACCOUNT_ID;
  }

  const codex: UpstreamTarget = {
    name: 'codex',
    format: 'openai-responses',
    url: joinUrl(source.CODEX_BASE_URL, CODEX_RESPONSES_PATH),
    credentialHeader: 'authorization',
    defaultCredential: source.CODEX_ACCESS_TOKEN,
    headers: codexHeaders,
    forwardHeaders: ['chatgpt-account-id', 'openai-beta', 'session_id', 'originator'],
    forceStream: true,
    requestDefaults: { store: false },
  };

  return { anthropic: freezeTarget(anthropic), codex: freezeTarget(codex) };
}

function freezeTarget(target: UpstreamTarget): UpstreamTarget {
  return Object.freeze({
    ...target,
    headers: Object.freeze({ ...target.headers }),
    forwardHeaders: Object.freeze([...target.forwardHeaders]),
    requestDefaults: Object.freeze({ ...target.requestDefaults }),
  });
}

export function buildBindings(targets: UpstreamTargets): readonly EndpointBinding[] {
  const bindings: EndpointBinding[] = [
    // 兼容行为：Chat 请求，直接返回 Anthropic 原生响应
    {
      method: 'POST',
      path: GATEWAY_PATHS.NATIVE_CHAT_COMPLETIONS,
      requestFormat: 'openai-chat',
      responseFormat: 'anthropic',
      upstream: targets.anthropic,
      annotateModel: false,
    },
    {
      method: 'POST',
      path: GATEWAY_PATHS.CC_CHAT_COMPLETIONS,
      requestFormat: 'openai-chat',
      responseFormat: 'openai-chat',
      upstream: targets.anthropic,
      annotateModel: false,
    },
    {
      method: 'POST',
      path: GATEWAY_PATHS.CODEX_RESPONSES,
      requestFormat: 'openai-responses',
      responseFormat: 'openai-responses',
      upstream: targets.codex,
      annotateModel: true,
    },
    {
      method: 'POST',
      path: GATEWAY_PATHS.CODEX_CHAT_COMPLETIONS,
      requestFormat: 'openai-chat',
      responseFormat: 'openai-chat',
      upstream: targets.codex,
      annotateModel: false,
    },
    {
      method: 'POST',
      path: GATEWAY_PATHS.MESSAGES,
      requestFormat: 'anthropic',
      responseFormat: 'anthropic',
      upstream: targets.anthropic,
      annotateModel: false,
    },
  ];

  return Object.freeze(bindings.map((binding) => Object.freeze(binding)));
}
