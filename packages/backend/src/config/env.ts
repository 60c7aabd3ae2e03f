import { z } from 'zod';
import dotenv from 'dotenv';
import { CLAUDE_API_BASE_URL, CODEX_API_BASE_URL, STREAM_DEFAULTS } from '@ccproxy/shared';

dotenv.config();

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((v) => !['false', '0', 'no', 'off'].includes(v.trim().toLowerCase()));

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  // Server
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default('127.0.0.1'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  BODY_LIMIT: z.string().default('10mb'),

  // Transport（大小写两种写法都接受，见 transport-config）
  HTTP_PROXY: optionalString,
  HTTPS_PROXY: optionalString,
  ALL_PROXY: optionalString,
  NO_PROXY: optionalString,
  http_proxy: optionalString,
  https_proxy: optionalString,
  all_proxy: optionalString,
  no_proxy: optionalString,
  REQUESTS_CA_BUNDLE: optionalString,
  SSL_CERT_FILE: optionalString,
  SSL_VERIFY: booleanFlag('true'),
  UPSTREAM_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(STREAM_DEFAULTS.CONNECT_TIMEOUT_MS),
  UPSTREAM_HEADERS_TIMEOUT_MS: z.coerce.number().int().positive().default(STREAM_DEFAULTS.HEADERS_TIMEOUT_MS),
  STREAM_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(STREAM_DEFAULTS.IDLE_TIMEOUT_MS),

  // Anthropic upstream
  ANTHROPIC_BASE_URL: z.string().url().default(CLAUDE_API_BASE_URL),
  ANTHROPIC_API_KEY: optionalString,

  // Codex upstream
  CODEX_BASE_URL: z.string().url().default(CODEX_API_BASE_URL),
  CODEX_ACCESS_TOKEN: optionalString,
  CODEX_ACCOUNT_ID: optionalString,
});

export type Env = z.infer<typeof envSchema>;

/**
 * 校验环境变量；测试里直接传入对象
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:');
  console.error(parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;
