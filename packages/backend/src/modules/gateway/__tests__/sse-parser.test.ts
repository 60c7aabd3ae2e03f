import { describe, it, expect } from 'vitest';
import { SseParser, serializeSseFrame } from '../relay/sse-parser.js';

describe('SseParser', () => {
  it('should parse named events with data', () => {
    const parser = new SseParser();
    const frames = parser.push('event: message_start\ndata: {"type":"message_start"}\n\n');
    expect(frames).toEqual([{ event: 'message_start', data: '{"type":"message_start"}' }]);
  });

  it('should buffer until the blank-line delimiter arrives', () => {
    const parser = new SseParser();
    expect(parser.push('data: {"a"')).toEqual([]);
    expect(parser.push(':1}\n')).toEqual([]);
    expect(parser.push('\n')).toEqual([{ data: '{"a":1}' }]);
  });

  it('should tolerate CRLF delimiters split across chunks', () => {
    const parser = new SseParser();
    expect(parser.push('data: one\r\n\r')).toEqual([]);
    expect(parser.push('\ndata: two\r\n\r\n')).toEqual([{ data: 'one' }, { data: 'two' }]);
  });

  it('should join multi-line data and skip comments', () => {
    const parser = new SseParser();
    const frames = parser.push(': keep-alive\n\nid: 7\ndata: line1\ndata: line2\n\n');
    expect(frames).toEqual([{ data: 'line1\nline2' }]);
  });

  it('should decode UTF-8 characters split between chunks', () => {
    const parser = new SseParser();
    const bytes = Buffer.from('data: 你好\n\n', 'utf8');
    // “你” 是 3 字节，从中间切开
    expect(parser.push(bytes.subarray(0, 8))).toEqual([]);
    expect(parser.push(bytes.subarray(8))).toEqual([{ data: '你好' }]);
  });

  it('should flush a trailing event without a delimiter', () => {
    const parser = new SseParser();
    expect(parser.push('data: [DONE]')).toEqual([]);
    expect(parser.flush()).toEqual([{ data: '[DONE]' }]);
    expect(parser.flush()).toEqual([]);
  });

  it('should serialize frames back to SSE text', () => {
    expect(serializeSseFrame({ event: 'ping', data: '{}' })).toBe('event: ping\ndata: {}\n\n');
    expect(serializeSseFrame({ data: 'a\nb' })).toBe('data: a\ndata: b\n\n');
  });
});
