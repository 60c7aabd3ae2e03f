import { describe, it, expect } from 'vitest';
import { buildBindings, buildUpstreamTargets, type EndpointBinding } from '../../../config/bindings.js';
import { parseEnv } from '../../../config/env.js';
import { ConfigError, UnroutableRequestError } from '../errors.js';
import { GatewayRouter, validateBindings } from '../router.js';

const targets = buildUpstreamTargets(parseEnv({}));

function binding(path: string, method = 'POST'): EndpointBinding {
  return {
    method,
    path,
    requestFormat: 'openai-chat',
    responseFormat: 'openai-chat',
    upstream: targets.anthropic,
    annotateModel: false,
  };
}

describe('GatewayRouter', () => {
  const router = new GatewayRouter(buildBindings(targets));

  it('should resolve the native chat completions quirk binding', () => {
    const resolved = router.resolve('POST', '/openai/v1/chat/completions');
    expect(resolved.requestFormat).toBe('openai-chat');
    expect(resolved.responseFormat).toBe('anthropic');
    expect(resolved.upstream.name).toBe('anthropic');
  });

  it('should resolve the translated chat completions binding', () => {
    const resolved = router.resolve('post', '/cc/openai/v1/chat/completions');
    expect(resolved.responseFormat).toBe('openai-chat');
  });

  it('should resolve codex responses with model annotation', () => {
    const resolved = router.resolve('POST', '/codex/responses');
    expect(resolved.upstream.name).toBe('codex');
    expect(resolved.upstream.forceStream).toBe(true);
    expect(resolved.annotateModel).toBe(true);
  });

  it('should ignore query strings and trailing slashes', () => {
    expect(router.resolve('POST', '/codex/responses?debug=1').path).toBe('/codex/responses');
    expect(router.resolve('POST', '/api/v1/messages/').path).toBe('/api/v1/messages');
  });

  it('should throw UnroutableRequestError for unknown paths and methods', () => {
    expect(() => router.resolve('POST', '/v1/unknown')).toThrow(UnroutableRequestError);
    expect(() => router.resolve('GET', '/codex/responses')).toThrow(UnroutableRequestError);
  });

  it('should match fixed prefixes', () => {
    const prefixed = new GatewayRouter([binding('/proxy/*')]);
    expect(prefixed.resolve('POST', '/proxy/v1/messages').path).toBe('/proxy/*');
    expect(prefixed.resolve('POST', '/proxy').path).toBe('/proxy/*');
    expect(() => prefixed.resolve('POST', '/proxyish')).toThrow(UnroutableRequestError);
  });

  it('should list binding summaries', () => {
    expect(router.list()).toContainEqual({
      method: 'POST',
      path: '/codex/chat/completions',
      requestFormat: 'openai-chat',
      responseFormat: 'openai-chat',
      upstream: 'codex',
    });
  });
});

describe('validateBindings', () => {
  it('should accept the default binding table', () => {
    expect(() => validateBindings(buildBindings(targets))).not.toThrow();
  });

  it('should reject duplicate exact paths', () => {
    expect(() => validateBindings([binding('/a'), binding('/a')])).toThrow(ConfigError);
  });

  it('should reject a prefix covering an exact path', () => {
    expect(() => validateBindings([binding('/v1/*'), binding('/v1/messages')])).toThrow(ConfigError);
    expect(() => validateBindings([binding('/v1/messages'), binding('/v1/*')])).toThrow(ConfigError);
  });

  it('should reject nested prefixes', () => {
    expect(() => validateBindings([binding('/v1/*'), binding('/v1/chat/*')])).toThrow(ConfigError);
  });

  it('should allow the same path under different methods', () => {
    expect(() => validateBindings([binding('/a', 'POST'), binding('/a', 'GET')])).not.toThrow();
  });

  it('should allow sibling prefixes', () => {
    expect(() => validateBindings([binding('/v1/*'), binding('/v10/*')])).not.toThrow();
  });
});
