import pino, { type Logger as PinoLogger } from 'pino';
import { env } from '../config/env.js';

function resolveLevel(): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

// 开发环境：控制台美化输出
// 生产环境：JSON 输出到 stdout，交给进程管理器收集
export const logger = pino({
  level: resolveLevel(),
  transport:
    env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export type Logger = PinoLogger;
