export const API_VERSION = 'v1';
export const API_PREFIX = `/api/${API_VERSION}`;

export const CLAUDE_API_BASE_URL = 'https://api.anthropic.com';
export const CLAUDE_API_VERSION = '2023-06-01';
export const CLAUDE_MESSAGES_PATH = '/v1/messages';

export const CODEX_API_BASE_URL = 'https://chatgpt.com/backend-api/codex';
export const CODEX_RESPONSES_PATH = '/responses';

// 对外暴露的网关路径
export const GATEWAY_PATHS = {
  NATIVE_CHAT_COMPLETIONS: '/openai/v1/chat/completions',
  CC_CHAT_COMPLETIONS: '/cc/openai/v1/chat/completions',
  CODEX_RESPONSES: '/codex/responses',
  CODEX_CHAT_COMPLETIONS: '/codex/chat/completions',
  MESSAGES: `${API_PREFIX}/messages`,
} as const;

export const HEALTH_PATH = '/health';

export const STREAM_DEFAULTS = {
  IDLE_TIMEOUT_MS: 60_000,
  HEADERS_TIMEOUT_MS: 120_000,
  CONNECT_TIMEOUT_MS: 10_000,
} as const;
