import { describe, it, expect, vi } from 'vitest';
import type { SseFrame } from '@ccproxy/shared';
import { logger } from '../../../lib/logger.js';
import { collectStream } from '../canonical/collect.js';
import type { CanonicalRequest, CanonicalStreamEvent } from '../canonical/types.js';
import { DecodeError, EncodeError, InvalidParameterError } from '../errors.js';
import { openaiChatAdapter } from '../formats/openai-chat/index.js';

function chunk(data: Record<string, unknown>): SseFrame {
  return { data: JSON.stringify(data) };
}

function delta(fields: Record<string, unknown>, finishReason: string | null = null): SseFrame {
  return chunk({ choices: [{ index: 0, delta: fields, finish_reason: finishReason }] });
}

const DONE: SseFrame = { data: '[DONE]' };

function decodeAll(frames: SseFrame[]): CanonicalStreamEvent[] {
  const decoder = openaiChatAdapter.createStreamDecoder();
  return [...frames.flatMap((frame) => decoder.push(frame)), ...decoder.finish()];
}

const conversation: CanonicalRequest = {
  model: 'gpt-test',
  stream: true,
  maxTokens: 256,
  temperature: 1.5,
  topP: 0.5,
  stopSequences: ['END'],
  reasoning: { effort: 'high' },
  parallelToolCalls: false,
  messages: [
    { role: 'system', content: [{ type: 'text', text: 'Be terse.' }] },
    {
      role: 'user',
      content: [
        { type: 'text', text: 'Describe this' },
        {
          type: 'image',
          source: { kind: 'base64', mediaType: 'image/png', data: 'aGVsbG8=' },
          extensions: { 'openai-chat': { image_url: { detail: 'low' } } },
        },
      ],
    },
    {
      role: 'assistant',
      content: [
        { type: 'thinking', text: 'Look it up.' },
        { type: 'text', text: 'Checking.' },
      ],
      toolCalls: [{ id: 'call_1', name: 'get_weather', arguments: '{"city":"Paris"}' }],
    },
    { role: 'tool', toolCallId: 'call_1', content: [{ type: 'text', text: '18C' }] },
    { role: 'user', content: [{ type: 'text', text: 'Thanks' }] },
  ],
  tools: [
    {
      type: 'function',
      name: 'get_weather',
      description: 'Look up the weather',
      parameters: { type: 'object', properties: { city: { type: 'string' } } },
    },
  ],
  toolChoice: { name: 'get_weather' },
  extensions: { 'openai-chat': { user: 'user-1' } },
};

describe('openai-chat adapter', () => {
  describe('request', () => {
    it('should round trip a canonical request', () => {
      const wire = openaiChatAdapter.encodeRequest(conversation);
      expect(openaiChatAdapter.decodeRequest(JSON.stringify(wire))).toEqual(conversation);
    });

    it('should encode messages in chat wire shape', () => {
      const wire = openaiChatAdapter.encodeRequest(conversation);
      expect(wire.messages).toEqual([
        { role: 'system', content: 'Be terse.' },
        {
          role: 'user',
          content: [
            { type: 'text', text: 'Describe this' },
            { type: 'image_url', image_url: { detail: 'low', url: 'data:image/png;base64,aGVsbG8=' } },
          ],
        },
        {
          role: 'assistant',
          content: 'Checking.',
          reasoning_content: 'Look it up.',
          tool_calls: [
            { id: 'call_1', type: 'function', function: { name: 'get_weather', arguments: '{"city":"Paris"}' } },
          ],
        },
        { role: 'tool', tool_call_id: 'call_1', content: '18C' },
        { role: 'user', content: 'Thanks' },
      ]);
      expect(wire.user).toBe('user-1');
      expect(wire.reasoning_effort).toBe('high');
      expect(wire.tool_choice).toEqual({ type: 'function', function: { name: 'get_weather' } });
      expect(wire.stop).toEqual(['END']);
      expect(wire.max_tokens).toBe(256);
      expect(wire.stream).toBe(true);
    });

    it('should decode developer messages, string stop and max_completion_tokens', () => {
      const request = openaiChatAdapter.decodeRequest(
        JSON.stringify({
          model: 'gpt-test',
          messages: [
            { role: 'developer', content: 'Rules' },
            { role: 'user', content: 'Hi' },
            { role: 'assistant', content: null, tool_calls: [] },
          ],
          stop: 'STOP',
          max_tokens: 10,
          max_completion_tokens: 20,
        })
      );

      expect(request.stream).toBe(false);
      expect(request.maxTokens).toBe(20);
      expect(request.stopSequences).toEqual(['STOP']);
      expect(request.messages).toEqual([
        { role: 'system', content: [{ type: 'text', text: 'Rules' }] },
        { role: 'user', content: [{ type: 'text', text: 'Hi' }] },
        { role: 'assistant', content: [] },
      ]);
    });

    it('should keep remote image urls as url sources', () => {
      const request = openaiChatAdapter.decodeRequest(
        JSON.stringify({
          model: 'gpt-test',
          messages: [
            { role: 'user', content: [{ type: 'image_url', image_url: { url: 'https://example.com/a.png' } }] },
          ],
        })
      );
      expect(request.messages[0].content).toEqual([
        { type: 'image', source: { kind: 'url', url: 'https://example.com/a.png' } },
      ]);
    });

    it('should reject invalid JSON and invalid shapes', () => {
      expect(() => openaiChatAdapter.decodeRequest('')).toThrowError(/Request body is empty/);
      try {
        openaiChatAdapter.decodeRequest(JSON.stringify({ model: 'gpt-test', messages: [] }));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(DecodeError);
        if (error instanceof DecodeError) expect(error.reason).toBe('invalid_shape');
      }
    });

    it('should validate parameters against chat limits', () => {
      const base: CanonicalRequest = {
        model: 'gpt-test',
        stream: false,
        messages: [{ role: 'user', content: [{ type: 'text', text: 'Hi' }] }],
      };
      expect(() => openaiChatAdapter.encodeRequest({ ...base, temperature: 2.5 })).toThrow(InvalidParameterError);
      expect(() => openaiChatAdapter.encodeRequest({ ...base, topP: 1.1 })).toThrow(InvalidParameterError);
      expect(() => openaiChatAdapter.encodeRequest({ ...base, maxTokens: 1.5 })).toThrow(InvalidParameterError);
      expect(() => openaiChatAdapter.encodeRequest({ ...base, topK: 40 })).toThrow(EncodeError);
      expect(openaiChatAdapter.encodeRequest({ ...base, temperature: 2 }).temperature).toBe(2);
    });

    it('should map a thinking budget to a reasoning effort', () => {
      const base: CanonicalRequest = {
        model: 'gpt-test',
        stream: false,
        messages: [{ role: 'user', content: [{ type: 'text', text: 'Hi' }] }],
      };
      expect(openaiChatAdapter.encodeRequest({ ...base, reasoning: { budgetTokens: 5000 } }).reasoning_effort).toBe(
        'medium'
      );
      expect(
        openaiChatAdapter.encodeRequest({ ...base, reasoning: { budgetTokens: 5000, disabled: true } })
      ).not.toHaveProperty('reasoning_effort');
    });

    it('should refuse content chat cannot carry', () => {
      const base: CanonicalRequest = {
        model: 'gpt-test',
        stream: false,
        messages: [{ role: 'user', content: [{ type: 'text', text: 'Hi' }] }],
      };
      expect(() =>
        openaiChatAdapter.encodeRequest({
          ...base,
          messages: [
            ...base.messages,
            { role: 'assistant', content: [{ type: 'thinking', text: 'x', signature: 'sig-1' }] },
          ],
        })
      ).toThrow(EncodeError);
      expect(() =>
        openaiChatAdapter.encodeRequest({
          ...base,
          messages: [
            ...base.messages,
            { role: 'tool', toolCallId: 'call_1', isError: true, content: [{ type: 'text', text: 'failed' }] },
          ],
        })
      ).toThrow(EncodeError);
    });
  });

  describe('response', () => {
    const body = {
      id: 'chatcmpl-1',
      object: 'chat.completion',
      created: 1700000000,
      model: 'gpt-test',
      system_fingerprint: 'fp_1',
      choices: [
        {
          index: 0,
          message: {
            role: 'assistant',
            content: 'Hi',
            reasoning_content: 'hmm',
            tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'f', arguments: '{}' } }],
          },
          finish_reason: 'tool_calls',
        },
      ],
      usage: {
        prompt_tokens: 100,
        completion_tokens: 20,
        prompt_tokens_details: { cached_tokens: 30 },
        completion_tokens_details: { reasoning_tokens: 5 },
      },
    };

    it('should decode a chat completion', () => {
      expect(openaiChatAdapter.decodeResponse(body)).toEqual({
        id: 'chatcmpl-1',
        model: 'gpt-test',
        content: [
          { type: 'thinking', text: 'hmm' },
          { type: 'text', text: 'Hi' },
        ],
        toolCalls: [{ id: 'call_1', name: 'f', arguments: '{}' }],
        stopReason: 'tool_use',
        usage: { inputTokens: 70, outputTokens: 20, cacheReadTokens: 30, reasoningTokens: 5 },
        extensions: { 'openai-chat': { system_fingerprint: 'fp_1' } },
      });
    });

    it('should encode back to the same chat completion', () => {
      const encoded = openaiChatAdapter.encodeResponse(openaiChatAdapter.decodeResponse(body));
      expect(encoded).toEqual({
        ...body,
        created: expect.any(Number),
        usage: {
          prompt_tokens: 100,
          completion_tokens: 20,
          total_tokens: 120,
          prompt_tokens_details: { cached_tokens: 30 },
          completion_tokens_details: { reasoning_tokens: 5 },
        },
      });
    });

    it('should decode a refusal', () => {
      const decoded = openaiChatAdapter.decodeResponse({
        id: 'chatcmpl-2',
        model: 'gpt-test',
        choices: [{ message: { content: null, refusal: 'No.' }, finish_reason: 'stop' }],
      });
      expect(decoded.content).toEqual([{ type: 'text', text: 'No.' }]);
      expect(decoded.stopReason).toBe('refusal');
      expect(decoded.usage).toEqual({ inputTokens: 0, outputTokens: 0 });
    });

    it('should reject a response without choices with status 502', () => {
      try {
        openaiChatAdapter.decodeResponse({ id: 'x', model: 'gpt-test', choices: [] });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(DecodeError);
        if (error instanceof DecodeError) expect(error.statusCode).toBe(502);
      }
    });

    it('should keep signed reasoning text and warn about the dropped signature', () => {
      const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      try {
        const encoded = openaiChatAdapter.encodeResponse({
          id: 'msg_1',
          model: 'claude-test',
          content: [
            { type: 'thinking', text: 'Plan', signature: 'sig' },
            { type: 'text', text: 'Done' },
          ],
          toolCalls: [],
          stopReason: 'end_turn',
          usage: { inputTokens: 1, outputTokens: 1 },
        });
        expect(encoded).toMatchObject({
          choices: [{ message: { role: 'assistant', content: 'Done', reasoning_content: 'Plan' } }],
        });
        expect(warn).toHaveBeenCalledWith(
          { parts: 1, id: 'msg_1' },
          'Dropping reasoning signatures with no openai-chat field'
        );
      } finally {
        warn.mockRestore();
      }
    });
  });

  describe('stream decoder', () => {
    const frames: SseFrame[] = [
      chunk({
        id: 'chatcmpl-1',
        model: 'gpt-test',
        choices: [{ index: 0, delta: { role: 'assistant', content: '' }, finish_reason: null }],
      }),
      delta({ reasoning_content: 'hmm' }),
      delta({ content: 'Hel' }),
      delta({ content: 'lo' }),
      delta({ tool_calls: [{ index: 0, id: 'call_1', function: { name: 'get_weather', arguments: '{"ci' } }] }),
      delta({ tool_calls: [{ index: 0, function: { arguments: 'ty":"Paris"}' } }] }),
      delta({}, 'tool_calls'),
      chunk({ choices: [], usage: { prompt_tokens: 10, completion_tokens: 5 } }),
      DONE,
    ];

    it('should decode chunks into ordered canonical events', () => {
      expect(decodeAll(frames)).toEqual([
        { type: 'message_start', id: 'chatcmpl-1', model: 'gpt-test' },
        { type: 'content_delta', index: 0, delta: { type: 'thinking', text: 'hmm' } },
        { type: 'content_delta', index: 1, delta: { type: 'text', text: 'Hel' } },
        { type: 'content_delta', index: 1, delta: { type: 'text', text: 'lo' } },
        { type: 'tool_call', toolIndex: 0, id: 'call_1', name: 'get_weather', arguments: '{"city":"Paris"}' },
        { type: 'message_stop', stopReason: 'tool_use', usage: { inputTokens: 10, outputTokens: 5 } },
      ]);
    });

    it('should emit a tool call only once its arguments are complete', () => {
      const decoder = openaiChatAdapter.createStreamDecoder();
      decoder.push(frames[0]);
      expect(decoder.push(frames[4])).toEqual([]);
      expect(decoder.push(frames[5])).toEqual([
        { type: 'tool_call', toolIndex: 0, id: 'call_1', name: 'get_weather', arguments: '{"city":"Paris"}' },
      ]);
    });

    it('should collect to the same response as the non-streaming decode', () => {
      const collected = collectStream(decodeAll(frames));
      const decoded = openaiChatAdapter.decodeResponse({
        id: 'chatcmpl-1',
        model: 'gpt-test',
        choices: [
          {
            message: {
              content: 'Hello',
              reasoning_content: 'hmm',
              tool_calls: [
                { id: 'call_1', type: 'function', function: { name: 'get_weather', arguments: '{"city":"Paris"}' } },
              ],
            },
            finish_reason: 'tool_calls',
          },
        ],
        usage: { prompt_tokens: 10, completion_tokens: 5 },
      });
      expect(collected).toEqual(decoded);
    });

    it('should complete pending tool calls and synthesize a stop when [DONE] never arrives', () => {
      const events = decodeAll([
        frames[0],
        delta({ tool_calls: [{ index: 0, id: 'call_9', function: { name: 'noop' } }] }),
      ]);
      expect(events.slice(1)).toEqual([
        { type: 'tool_call', toolIndex: 0, id: 'call_9', name: 'noop', arguments: '{}' },
        { type: 'message_stop', stopReason: 'tool_use', usage: { inputTokens: 0, outputTokens: 0 } },
      ]);
    });

    it('should stop producing events after [DONE]', () => {
      const decoder = openaiChatAdapter.createStreamDecoder();
      decoder.push(frames[0]);
      decoder.push(DONE);
      expect(decoder.terminated).toBe(true);
      expect(decoder.push(DONE)).toEqual([]);
      expect(decoder.finish()).toEqual([]);
    });

    it('should turn an error chunk into a terminal error event', () => {
      const decoder = openaiChatAdapter.createStreamDecoder();
      expect(decoder.push(chunk({ error: { message: 'overloaded', type: 'server_error' } }))).toEqual([
        { type: 'error', error: { code: 'server_error', message: 'overloaded' } },
      ]);
      expect(decoder.terminated).toBe(true);
      expect(decoder.finish()).toEqual([]);
    });
  });

  describe('stream encoder', () => {
    const events: CanonicalStreamEvent[] = [
      { type: 'message_start', id: 'msg_1', model: 'claude-test' },
      { type: 'content_delta', index: 0, delta: { type: 'text', text: 'Hi' } },
      { type: 'tool_call', toolIndex: 0, id: 'toolu_1', name: 'get_weather', arguments: '{"city":"Paris"}' },
      { type: 'message_stop', stopReason: 'tool_use', usage: { inputTokens: 3, outputTokens: 4 } },
    ];

    function encodeAll(input: CanonicalStreamEvent[], model = 'fallback'): SseFrame[] {
      const encoder = openaiChatAdapter.createStreamEncoder({ model });
      return input.flatMap((event) => encoder.encode(event));
    }

    it('should encode events as chat.completion.chunk frames ending in [DONE]', () => {
      const encoded = encodeAll(events);
      expect(encoded).toHaveLength(5);
      expect(encoded[4]).toEqual({ data: '[DONE]' });

      const payloads = encoded.slice(0, 4).map((frame) => JSON.parse(frame.data));
      for (const payload of payloads) {
        expect(payload.id).toBe('msg_1');
        expect(payload.object).toBe('chat.completion.chunk');
        expect(payload.model).toBe('claude-test');
      }
      expect(payloads.map((payload) => payload.choices[0].delta)).toEqual([
        { role: 'assistant', content: '' },
        { content: 'Hi' },
        {
          tool_calls: [
            {
              index: 0,
              id: 'toolu_1',
              type: 'function',
              function: { name: 'get_weather', arguments: '{"city":"Paris"}' },
            },
          ],
        },
        {},
      ]);
      expect(payloads[3].choices[0].finish_reason).toBe('tool_calls');
      expect(payloads[3].usage).toEqual({ prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 });
    });

    it('should re-decode its own output to the same response', () => {
      expect(collectStream(decodeAll(encodeAll(events)))).toEqual({
        id: 'msg_1',
        model: 'claude-test',
        content: [{ type: 'text', text: 'Hi' }],
        toolCalls: [{ id: 'toolu_1', name: 'get_weather', arguments: '{"city":"Paris"}' }],
        stopReason: 'tool_use',
        usage: { inputTokens: 3, outputTokens: 4 },
      });
    });

    it('should start with the request model when no message_start arrived', () => {
      const [first] = encodeAll([{ type: 'content_delta', index: 0, delta: { type: 'text', text: 'Hi' } }]);
      const payload = JSON.parse(first.data);
      expect(payload.model).toBe('fallback');
      expect(payload.id).toMatch(/^chatcmpl-/);
    });

    it('should encode an error event and then stay silent', () => {
      const encoder = openaiChatAdapter.createStreamEncoder({ model: 'fallback' });
      expect(encoder.encode({ type: 'error', error: { code: 'TRANSPORT_ERROR', message: 'boom' } })).toEqual([
        { data: JSON.stringify({ error: { message: 'boom', type: 'TRANSPORT_ERROR', code: 'TRANSPORT_ERROR' } }) },
      ]);
      expect(encoder.encode(events[1])).toEqual([]);
    });

    it('should warn once when dropping reasoning signatures', () => {
      const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      try {
        const encoder = openaiChatAdapter.createStreamEncoder({ model: 'claude-test' });
        encoder.encode({ type: 'message_start', id: 'msg_1', model: 'claude-test' });
        expect(encoder.encode({ type: 'content_delta', index: 0, delta: { type: 'signature', signature: 'sig' } })).toEqual(
          []
        );
        encoder.encode({ type: 'content_delta', index: 1, delta: { type: 'encrypted', data: 'enc' } });
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith(
          { kind: 'signature', id: 'msg_1' },
          'Dropping reasoning signatures with no openai-chat field'
        );
      } finally {
        warn.mockRestore();
      }
    });
  });
});
