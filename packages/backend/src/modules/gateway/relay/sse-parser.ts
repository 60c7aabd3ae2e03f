/**
 * 增量 SSE 解析
 *
 * 字节块可以在任意位置切开（包括 UTF-8 多字节字符和 \r\n 中间），
 * 只有遇到空行才产出一个完整事件
 */

import type { SseFrame } from '@ccproxy/shared';

export class SseParser {
  private buffer = '';
  private pendingCR = false;
  private readonly decoder = new TextDecoder('utf-8');

  push(chunk: Uint8Array | string): SseFrame[] {
    let text = typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });
    if (this.pendingCR) {
      text = `\r${text}`;
      this.pendingCR = false;
    }
    // 末尾的 \r 可能是被切开的 \r\n，留到下一块再处理
    if (text.endsWith('\r')) {
      this.pendingCR = true;
      text = text.slice(0, -1);
    }
    this.buffer += text.replace(/\r\n?/g, '\n');
    return this.drain();
  }

  /** 上游结束：缓冲区里没有以空行结尾的最后一个事件也要产出 */
  flush(): SseFrame[] {
    let rest = this.buffer + this.decoder.decode();
    if (this.pendingCR) rest += '\n';
    this.buffer = '';
    this.pendingCR = false;
    const frame = parseBlock(rest);
    return frame ? [frame] : [];
  }

  private drain(): SseFrame[] {
    const frames: SseFrame[] = [];
    let boundary = this.buffer.indexOf('\n\n');
    while (boundary !== -1) {
      const frame = parseBlock(this.buffer.slice(0, boundary));
      if (frame) frames.push(frame);
      this.buffer = this.buffer.slice(boundary + 2);
      boundary = this.buffer.indexOf('\n\n');
    }
    return frames;
  }
}

function parseBlock(block: string): SseFrame | null {
  let event: string | undefined;
  const data: string[] = [];

  for (const line of block.split('\n')) {
    if (!line || line.startsWith(':')) continue;
    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    if (field === 'event') event = value;
    else if (field === 'data') data.push(value);
    // id / retry 对转发无意义
  }

  if (data.length === 0) return null;
  return event === undefined ? { data: data.join('\n') } : { event, data: data.join('\n') };
}

export function serializeSseFrame(frame: SseFrame): string {
  const lines = frame.data.split('\n').map((line) => `data: ${line}`);
  if (frame.event !== undefined) lines.unshift(`event: ${frame.event}`);
  return `${lines.join('\n')}\n\n`;
}
