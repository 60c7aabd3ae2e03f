import type { BindingSummary } from '@ccproxy/shared';
import type { EndpointBinding } from '../../config/bindings.js';
import { ConfigError, UnroutableRequestError } from './errors.js';

const PREFIX_SUFFIX = '/*';

function isPrefix(pattern: string): boolean {
  return pattern.endsWith(PREFIX_SUFFIX);
}

function prefixOf(pattern: string): string {
  return pattern.slice(0, -PREFIX_SUFFIX.length);
}

function normalizePath(path: string): string {
  const withoutQuery = path.split('?')[0];
  return withoutQuery.length > 1 ? withoutQuery.replace(/\/+$/, '') : withoutQuery;
}

function matches(pattern: string, path: string): boolean {
  if (!isPrefix(pattern)) return pattern === path;
  const prefix = prefixOf(pattern);
  return path === prefix || path.startsWith(`${prefix}/`);
}

function overlaps(a: EndpointBinding, b: EndpointBinding): boolean {
  if (a.method.toUpperCase() !== b.method.toUpperCase()) return false;
  if (a.path === b.path) return true;
  // 前缀对前缀：比较去掉 /* 之后的部分
  const aPath = isPrefix(a.path) ? prefixOf(a.path) : a.path;
  const bPath = isPrefix(b.path) ? prefixOf(b.path) : b.path;
  return (isPrefix(a.path) && matches(a.path, bPath)) || (isPrefix(b.path) && matches(b.path, aPath));
}

/**
 * 启动时校验：同一方法下不允许两条 binding 命中同一路径
 */
export function validateBindings(bindings: readonly EndpointBinding[]): void {
  for (let i = 0; i < bindings.length; i++) {
    for (let j = i + 1; j < bindings.length; j++) {
      if (overlaps(bindings[i], bindings[j])) {
        throw new ConfigError(
          `Endpoint bindings overlap: ${bindings[i].method} ${bindings[i].path} and ${bindings[j].method} ${bindings[j].path}`,
          { first: bindings[i].path, second: bindings[j].path }
        );
      }
    }
  }
}

export class GatewayRouter {
  private readonly bindings: readonly EndpointBinding[];

  constructor(bindings: readonly EndpointBinding[]) {
    validateBindings(bindings);
    this.bindings = Object.freeze([...bindings]);
  }

  resolve(method: string, path: string): EndpointBinding {
    const normalized = normalizePath(path);
    const upperMethod = method.toUpperCase();
    const binding = this.bindings.find(
      (candidate) => candidate.method.toUpperCase() === upperMethod && matches(candidate.path, normalized)
    );
    if (!binding) {
      throw new UnroutableRequestError(upperMethod, normalized);
    }
    return binding;
  }

  list(): BindingSummary[] {
    return this.bindings.map((binding) => ({
      method: binding.method,
      path: binding.path,
      requestFormat: binding.requestFormat,
      responseFormat: binding.responseFormat,
      upstream: binding.upstream.name,
    }));
  }
}
