import { describe, it, expect } from 'vitest';
import type { SseFrame } from '@ccproxy/shared';
import { collectStream } from '../canonical/collect.js';
import type { CanonicalRequest, CanonicalStreamEvent } from '../canonical/types.js';
import { DecodeError, EncodeError } from '../errors.js';
import { anthropicAdapter } from '../formats/anthropic/index.js';
import { openaiChatAdapter } from '../formats/openai-chat/index.js';
import { openaiResponsesAdapter } from '../formats/openai-responses/index.js';

function sse(type: string, data: Record<string, unknown> = {}): SseFrame {
  return { event: type, data: JSON.stringify({ type, ...data }) };
}

function decodeAll(frames: SseFrame[]): CanonicalStreamEvent[] {
  const decoder = openaiResponsesAdapter.createStreamDecoder();
  return [...frames.flatMap((frame) => decoder.push(frame)), ...decoder.finish()];
}

const conversation: CanonicalRequest = {
  model: 'gpt-5-codex',
  stream: true,
  maxTokens: 1000,
  temperature: 0.7,
  topP: 0.9,
  parallelToolCalls: true,
  reasoning: { effort: 'medium', extensions: { 'openai-responses': { summary: 'auto' } } },
  messages: [
    { role: 'system', content: [{ type: 'text', text: 'Be terse.' }] },
    {
      role: 'user',
      content: [
        { type: 'text', text: 'Hi' },
        { type: 'image', source: { kind: 'url', url: 'https://example.com/a.png' } },
      ],
    },
    {
      role: 'assistant',
      content: [
        { type: 'thinking', text: 'Plan', encrypted: 'enc-1' },
        { type: 'text', text: 'Checking.' },
      ],
      toolCalls: [{ id: 'call_1', name: 'get_weather', arguments: '{"city":"Paris"}' }],
    },
    { role: 'tool', toolCallId: 'call_1', content: [{ type: 'text', text: '18C' }] },
    { role: 'system', content: [{ type: 'text', text: 'Stay safe.' }] },
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
  toolChoice: 'auto',
  extensions: { 'openai-responses': { store: false, include: ['reasoning.encrypted_content'] } },
};

const textOnly: CanonicalRequest = {
  model: 'gpt-5-codex',
  stream: false,
  messages: [{ role: 'user', content: [{ type: 'text', text: 'Hi' }] }],
};

describe('openai-responses adapter', () => {
  describe('request', () => {
    it('should round trip a canonical request', () => {
      const wire = openaiResponsesAdapter.encodeRequest(conversation);
      expect(openaiResponsesAdapter.decodeRequest(JSON.stringify(wire))).toEqual(conversation);
    });

    it('should encode instructions and input items', () => {
      const wire = openaiResponsesAdapter.encodeRequest(conversation);
      expect(wire.instructions).toBe('Be terse.');
      expect(wire.input).toEqual([
        {
          type: 'message',
          role: 'user',
          content: [
            { type: 'input_text', text: 'Hi' },
            { type: 'input_image', image_url: 'https://example.com/a.png' },
          ],
        },
        { type: 'reasoning', summary: [{ type: 'summary_text', text: 'Plan' }], encrypted_content: 'enc-1' },
        { type: 'message', role: 'assistant', content: [{ type: 'output_text', text: 'Checking.' }] },
        { type: 'function_call', call_id: 'call_1', name: 'get_weather', arguments: '{"city":"Paris"}' },
        { type: 'function_call_output', call_id: 'call_1', output: '18C' },
        { type: 'message', role: 'system', content: [{ type: 'input_text', text: 'Stay safe.' }] },
        { type: 'message', role: 'user', content: [{ type: 'input_text', text: 'Thanks' }] },
      ]);
      expect(wire.reasoning).toEqual({ summary: 'auto', effort: 'medium' });
      expect(wire.store).toBe(false);
      expect(wire.max_output_tokens).toBe(1000);
      expect(wire.stream).toBe(true);
    });

    it('should decode string input with instructions', () => {
      const request = openaiResponsesAdapter.decodeRequest(
        JSON.stringify({ model: 'gpt-5-codex', instructions: 'Sys', input: 'Hello' })
      );
      expect(request.messages).toEqual([
        { role: 'system', content: [{ type: 'text', text: 'Sys' }] },
        { role: 'user', content: [{ type: 'text', text: 'Hello' }] },
      ]);
      expect(request.stream).toBe(false);
    });

    it('should only write the first system message as instructions', () => {
      const request: CanonicalRequest = {
        ...textOnly,
        messages: [
          { role: 'system', content: [{ type: 'text', text: 'One' }] },
          { role: 'system', content: [{ type: 'text', text: 'Two' }] },
          ...textOnly.messages,
        ],
      };
      const wire = openaiResponsesAdapter.encodeRequest(request);
      expect(wire.instructions).toBe('One');
      expect(wire.input).toEqual([
        { type: 'message', role: 'system', content: [{ type: 'input_text', text: 'Two' }] },
        { type: 'message', role: 'user', content: [{ type: 'input_text', text: 'Hi' }] },
      ]);
      expect(openaiResponsesAdapter.decodeRequest(JSON.stringify(wire))).toEqual(request);
    });

    it('should keep developer items apart from instructions', () => {
      const body = {
        model: 'gpt-5-codex',
        instructions: 'You are a coding agent.',
        input: [
          { type: 'message', role: 'developer', content: [{ type: 'input_text', text: '<permissions>' }] },
          { type: 'message', role: 'user', content: [{ type: 'input_text', text: 'hi' }] },
        ],
        stream: true,
      };
      const request = openaiResponsesAdapter.decodeRequest(JSON.stringify(body));
      expect(request.messages[1]).toEqual({
        role: 'system',
        content: [{ type: 'text', text: '<permissions>' }],
        extensions: { 'openai-responses': { role: 'developer' } },
      });
      expect(openaiResponsesAdapter.encodeRequest(request)).toEqual(body);
    });

    it('should not turn a leading system item into instructions', () => {
      const body = {
        model: 'gpt-5-codex',
        input: [
          { type: 'message', role: 'system', content: [{ type: 'input_text', text: 'Sys' }] },
          { type: 'message', role: 'user', content: [{ type: 'input_text', text: 'hi' }] },
        ],
        stream: false,
      };
      const wire = openaiResponsesAdapter.encodeRequest(openaiResponsesAdapter.decodeRequest(JSON.stringify(body)));
      expect(wire).toEqual(body);
    });

    it('should carry unknown input items and content parts through unchanged', () => {
      const body = {
        model: 'gpt-5-codex',
        input: [
          { type: 'message', role: 'user', content: [{ type: 'input_file', file_id: 'file-1' }] },
          { type: 'custom_tool_call', call_id: 'ctc_1', name: 'apply_patch', input: '*** Begin Patch' },
          { type: 'custom_tool_call_output', call_id: 'ctc_1', output: 'Done' },
          { type: 'item_reference', id: 'msg_123' },
          {
            type: 'function_call_output',
            call_id: 'call_1',
            output: [
              { type: 'input_text', text: 'See image' },
              { type: 'input_image', image_url: 'https://example.com/a.png' },
            ],
          },
        ],
        reasoning: { effort: 'none' },
        stream: false,
      };
      const request = openaiResponsesAdapter.decodeRequest(JSON.stringify(body));
      expect(request.messages[1]).toEqual({
        role: 'user',
        content: [
          {
            type: 'opaque',
            format: 'openai-responses',
            scope: 'item',
            value: { type: 'custom_tool_call', call_id: 'ctc_1', name: 'apply_patch', input: '*** Begin Patch' },
          },
        ],
      });
      expect(request.reasoning).toEqual({ disabled: true, extensions: { 'openai-responses': { effort: 'none' } } });
      expect(openaiResponsesAdapter.encodeRequest(request)).toEqual(body);
    });

    it('should refuse opaque content for other formats', () => {
      const request = openaiResponsesAdapter.decodeRequest(
        JSON.stringify({ model: 'gpt-5-codex', input: [{ type: 'item_reference', id: 'msg_123' }] })
      );
      expect(() => anthropicAdapter.encodeRequest(request)).toThrow(EncodeError);
      expect(() => openaiChatAdapter.encodeRequest(request)).toThrow(
        'openai-responses content of type item_reference has no openai-chat representation'
      );
    });

    it('should still reject malformed known items', () => {
      expect(() =>
        openaiResponsesAdapter.decodeRequest(
          JSON.stringify({ model: 'gpt-5-codex', input: [{ type: 'function_call', name: 'x' }] })
        )
      ).toThrow(DecodeError);
    });

    it('should keep built-in tools for the same format only', () => {
      const request = openaiResponsesAdapter.decodeRequest(
        JSON.stringify({ model: 'gpt-5-codex', input: 'Hi', tools: [{ type: 'web_search' }] })
      );
      expect(request.tools).toEqual([{ type: 'builtin', format: 'openai-responses', config: { type: 'web_search' } }]);
      expect(openaiResponsesAdapter.encodeRequest(request).tools).toEqual([{ type: 'web_search' }]);
    });

    it('should reject function tools without a name', () => {
      expect(() =>
        openaiResponsesAdapter.decodeRequest(
          JSON.stringify({ model: 'gpt-5-codex', input: 'Hi', tools: [{ type: 'function' }] })
        )
      ).toThrow(DecodeError);
    });

    it('should refuse parameters and content responses cannot carry', () => {
      expect(() => openaiResponsesAdapter.encodeRequest({ ...textOnly, stopSequences: ['END'] })).toThrow(EncodeError);
      expect(() => openaiResponsesAdapter.encodeRequest({ ...textOnly, topK: 5 })).toThrow(EncodeError);
      expect(() =>
        openaiResponsesAdapter.encodeRequest({
          ...textOnly,
          messages: [
            ...textOnly.messages,
            { role: 'assistant', content: [{ type: 'thinking', text: 'x', signature: 'sig-1' }] },
          ],
        })
      ).toThrow(EncodeError);
      expect(() =>
        openaiResponsesAdapter.encodeRequest({
          ...textOnly,
          messages: [
            ...textOnly.messages,
            { role: 'tool', toolCallId: 'call_1', isError: true, content: [{ type: 'text', text: 'failed' }] },
          ],
        })
      ).toThrow(EncodeError);
    });

    it('should map a thinking budget to a reasoning effort', () => {
      const wire = openaiResponsesAdapter.encodeRequest({ ...textOnly, reasoning: { budgetTokens: 20000 } });
      expect(wire.reasoning).toEqual({ effort: 'high' });
    });
  });

  describe('response', () => {
    const body = {
      id: 'resp_1',
      object: 'response',
      created_at: 1700000000,
      status: 'completed',
      model: 'gpt-5-codex',
      output: [
        { id: 'rs_1', type: 'reasoning', summary: [{ type: 'summary_text', text: 'Plan' }], encrypted_content: 'enc-1' },
        {
          id: 'msg_1',
          type: 'message',
          status: 'completed',
          role: 'assistant',
          content: [{ type: 'output_text', text: 'Hello', annotations: [] }],
        },
        {
          id: 'fc_1',
          type: 'function_call',
          status: 'completed',
          call_id: 'call_1',
          name: 'get_weather',
          arguments: '{"city":"Paris"}',
        },
        { id: 'ws_1', type: 'web_search_call' },
      ],
      usage: {
        input_tokens: 50,
        input_tokens_details: { cached_tokens: 10 },
        output_tokens: 7,
        output_tokens_details: { reasoning_tokens: 3 },
        total_tokens: 57,
      },
      incomplete_details: null,
      parallel_tool_calls: true,
    };

    const decoded = {
      id: 'resp_1',
      model: 'gpt-5-codex',
      content: [
        { type: 'thinking', text: 'Plan', encrypted: 'enc-1' },
        { type: 'text', text: 'Hello' },
      ],
      toolCalls: [{ id: 'call_1', name: 'get_weather', arguments: '{"city":"Paris"}' }],
      stopReason: 'tool_use',
      usage: { inputTokens: 40, outputTokens: 7, cacheReadTokens: 10, reasoningTokens: 3 },
      extensions: { 'openai-responses': { parallel_tool_calls: true } },
    };

    it('should decode a response object and skip unknown output items', () => {
      expect(openaiResponsesAdapter.decodeResponse(body)).toEqual(decoded);
    });

    it('should encode a response object that decodes back to the same value', () => {
      const encoded = openaiResponsesAdapter.encodeResponse(openaiResponsesAdapter.decodeResponse(body));
      expect(encoded.status).toBe('completed');
      expect(encoded.usage).toEqual(body.usage);
      expect(encoded.parallel_tool_calls).toBe(true);
      expect(openaiResponsesAdapter.decodeResponse(encoded)).toEqual(decoded);
    });

    it('should map an incomplete response to max_tokens', () => {
      const response = openaiResponsesAdapter.decodeResponse({
        id: 'resp_2',
        model: 'gpt-5-codex',
        status: 'incomplete',
        incomplete_details: { reason: 'max_output_tokens' },
        output: [],
      });
      expect(response.stopReason).toBe('max_tokens');
      expect(response.content).toEqual([]);
    });
  });

  describe('stream decoder', () => {
    const frames: SseFrame[] = [
      sse('response.created', { response: { id: 'resp_1', model: 'gpt-5-codex', output: [] } }),
      sse('response.in_progress', { response: { id: 'resp_1', model: 'gpt-5-codex', output: [] } }),
      sse('response.output_item.added', { output_index: 0, item: { id: 'rs_1', type: 'reasoning', summary: [] } }),
      sse('response.reasoning_summary_text.delta', { item_id: 'rs_1', summary_index: 0, delta: 'Pl' }),
      sse('response.reasoning_summary_text.delta', { item_id: 'rs_1', summary_index: 0, delta: 'an' }),
      sse('response.output_item.done', {
        output_index: 0,
        item: { id: 'rs_1', type: 'reasoning', summary: [{ type: 'summary_text', text: 'Plan' }], encrypted_content: 'enc-1' },
      }),
      sse('response.output_item.added', {
        output_index: 1,
        item: { id: 'msg_1', type: 'message', role: 'assistant', content: [] },
      }),
      sse('response.content_part.added', {
        item_id: 'msg_1',
        content_index: 0,
        part: { type: 'output_text', text: '' },
      }),
      sse('response.output_text.delta', { item_id: 'msg_1', content_index: 0, delta: 'Hel' }),
      sse('response.output_text.delta', { item_id: 'msg_1', content_index: 0, delta: 'lo' }),
      sse('response.output_text.done', { item_id: 'msg_1', content_index: 0, text: 'Hello' }),
      sse('response.output_item.done', {
        output_index: 1,
        item: { id: 'msg_1', type: 'message', role: 'assistant', content: [{ type: 'output_text', text: 'Hello' }] },
      }),
      sse('response.output_item.added', {
        output_index: 2,
        item: { id: 'fc_1', type: 'function_call', call_id: 'call_1', name: 'get_weather', arguments: '' },
      }),
      sse('response.function_call_arguments.delta', { item_id: 'fc_1', delta: '{"city":' }),
      sse('response.function_call_arguments.delta', { item_id: 'fc_1', delta: '"Paris"}' }),
      sse('response.function_call_arguments.done', { item_id: 'fc_1', arguments: '{"city":"Paris"}' }),
      sse('response.output_item.done', {
        output_index: 2,
        item: {
          id: 'fc_1',
          type: 'function_call',
          call_id: 'call_1',
          name: 'get_weather',
          arguments: '{"city":"Paris"}',
        },
      }),
      sse('response.completed', {
        response: {
          id: 'resp_1',
          model: 'gpt-5-codex',
          status: 'completed',
          output: [],
          usage: { input_tokens: 50, output_tokens: 7 },
        },
      }),
    ];

    it('should decode a Codex event sequence into ordered canonical events', () => {
      expect(decodeAll(frames)).toEqual([
        { type: 'message_start', id: 'resp_1', model: 'gpt-5-codex' },
        { type: 'content_delta', index: 0, delta: { type: 'thinking', text: '' } },
        { type: 'content_delta', index: 0, delta: { type: 'thinking', text: 'Pl' } },
        { type: 'content_delta', index: 0, delta: { type: 'thinking', text: 'an' } },
        { type: 'content_delta', index: 0, delta: { type: 'encrypted', data: 'enc-1' } },
        { type: 'content_delta', index: 1, delta: { type: 'text', text: '' } },
        { type: 'content_delta', index: 1, delta: { type: 'text', text: 'Hel' } },
        { type: 'content_delta', index: 1, delta: { type: 'text', text: 'lo' } },
        { type: 'tool_call', toolIndex: 0, id: 'call_1', name: 'get_weather', arguments: '{"city":"Paris"}' },
        { type: 'message_stop', stopReason: 'tool_use', usage: { inputTokens: 50, outputTokens: 7 } },
      ]);
    });

    it('should collect to the same response as the non-streaming decode', () => {
      const expected = openaiResponsesAdapter.decodeResponse({
        id: 'resp_1',
        model: 'gpt-5-codex',
        status: 'completed',
        output: [
          { type: 'reasoning', summary: [{ type: 'summary_text', text: 'Plan' }], encrypted_content: 'enc-1' },
          { type: 'message', role: 'assistant', content: [{ type: 'output_text', text: 'Hello' }] },
          { type: 'function_call', call_id: 'call_1', name: 'get_weather', arguments: '{"city":"Paris"}' },
        ],
        usage: { input_tokens: 50, output_tokens: 7 },
      });
      expect(collectStream(decodeAll(frames))).toEqual(expected);
    });

    it('should separate reasoning summary parts', () => {
      const events = decodeAll([
        sse('response.reasoning_summary_text.delta', { item_id: 'rs_1', summary_index: 0, delta: 'One' }),
        sse('response.reasoning_summary_text.delta', { item_id: 'rs_1', summary_index: 1, delta: 'Two' }),
      ]);
      expect(collectStream(events).content).toEqual([{ type: 'thinking', text: 'One\n\nTwo' }]);
    });

    it('should synthesize a stop when the stream ends without response.completed', () => {
      const events = decodeAll([
        frames[0],
        sse('response.output_text.delta', { item_id: 'msg_1', content_index: 0, delta: 'Hi' }),
      ]);
      expect(events[events.length - 1]).toEqual({
        type: 'message_stop',
        stopReason: 'end_turn',
        usage: { inputTokens: 0, outputTokens: 0 },
      });
    });

    it('should turn response.failed and error events into terminal error events', () => {
      const failed = openaiResponsesAdapter.createStreamDecoder();
      expect(
        failed.push(
          sse('response.failed', {
            response: { id: 'resp_1', model: 'gpt-5-codex', error: { code: 'server_error', message: 'boom' } },
          })
        )
      ).toEqual([{ type: 'error', error: { code: 'server_error', message: 'boom' } }]);
      expect(failed.terminated).toBe(true);
      expect(failed.finish()).toEqual([]);

      const errored = openaiResponsesAdapter.createStreamDecoder();
      expect(errored.push(sse('error', { message: 'rate limited' }))).toEqual([
        { type: 'error', error: { code: 'upstream_error', message: 'rate limited' } },
      ]);
    });
  });

  describe('stream encoder', () => {
    const events: CanonicalStreamEvent[] = [
      { type: 'message_start', id: 'msg_9', model: 'claude-test' },
      { type: 'content_delta', index: 0, delta: { type: 'text', text: 'Hi' } },
      { type: 'tool_call', toolIndex: 0, id: 'toolu_1', name: 'get_weather', arguments: '{"city":"Paris"}' },
      { type: 'message_stop', stopReason: 'tool_use', usage: { inputTokens: 3, outputTokens: 4 } },
    ];

    function encodeAll(input: CanonicalStreamEvent[]): SseFrame[] {
      const encoder = openaiResponsesAdapter.createStreamEncoder({ model: 'fallback' });
      return input.flatMap((event) => encoder.encode(event));
    }

    it('should emit the Responses event lifecycle with sequence numbers', () => {
      const encoded = encodeAll(events);
      expect(encoded.map((frame) => frame.event)).toEqual([
        'response.created',
        'response.in_progress',
        'response.output_item.added',
        'response.content_part.added',
        'response.output_text.delta',
        'response.output_text.done',
        'response.content_part.done',
        'response.output_item.done',
        'response.output_item.added',
        'response.function_call_arguments.delta',
        'response.function_call_arguments.done',
        'response.output_item.done',
        'response.completed',
      ]);
      const payloads = encoded.map((frame) => JSON.parse(frame.data));
      expect(payloads.map((payload) => payload.sequence_number)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);

      const completed = payloads[12].response;
      expect(completed.id).toBe('msg_9');
      expect(completed.model).toBe('claude-test');
      expect(completed.status).toBe('completed');
      expect(completed.output.map((item: { type: string }) => item.type)).toEqual(['message', 'function_call']);
    });

    it('should re-decode its own output to the same response', () => {
      expect(collectStream(decodeAll(encodeAll(events)))).toEqual({
        id: 'msg_9',
        model: 'claude-test',
        content: [{ type: 'text', text: 'Hi' }],
        toolCalls: [{ id: 'toolu_1', name: 'get_weather', arguments: '{"city":"Paris"}' }],
        stopReason: 'tool_use',
        usage: { inputTokens: 3, outputTokens: 4 },
      });
    });

    it('should carry reasoning and encrypted content into the final output', () => {
      const encoded = encodeAll([
        { type: 'content_delta', index: 0, delta: { type: 'thinking', text: 'Plan' } },
        { type: 'content_delta', index: 0, delta: { type: 'encrypted', data: 'enc-1' } },
        { type: 'message_stop', stopReason: 'end_turn', usage: { inputTokens: 1, outputTokens: 1 } },
      ]);
      const last = JSON.parse(encoded[encoded.length - 1].data);
      expect(last.type).toBe('response.completed');
      expect(last.response.model).toBe('fallback');
      expect(last.response.output).toEqual([
        {
          id: expect.stringMatching(/^rs_/),
          type: 'reasoning',
          summary: [{ type: 'summary_text', text: 'Plan' }],
          encrypted_content: 'enc-1',
        },
      ]);
    });

    it('should encode an error event and then stay silent', () => {
      const encoder = openaiResponsesAdapter.createStreamEncoder({ model: 'fallback' });
      expect(encoder.encode({ type: 'error', error: { code: 'STREAM_TIMEOUT', message: 'idle' } })).toEqual([
        {
          event: 'error',
          data: JSON.stringify({ type: 'error', sequence_number: 0, code: 'STREAM_TIMEOUT', message: 'idle' }),
        },
      ]);
      expect(encoder.encode(events[3])).toEqual([]);
    });
  });
});
