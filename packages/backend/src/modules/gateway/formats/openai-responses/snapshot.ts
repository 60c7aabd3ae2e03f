import type { SseFrame } from '@ccproxy/shared';
import { isRecord } from '../common.js';
import type { StreamSnapshot } from '../types.js';

const TERMINAL_EVENTS = new Set(['response.completed', 'response.incomplete']);

/**
 * 非流式 Codex 调用方拿到的是上游终止事件里的 response，
 * instructions、metadata、created_at 和各输出项 id 都保持上游的值
 */
export class ResponsesStreamSnapshot implements StreamSnapshot {
  private terminal: Record<string, unknown> | undefined;
  private readonly items = new Map<number, Record<string, unknown>>();

  observe(frame: SseFrame): void {
    let payload: unknown;
    try {
      payload = JSON.parse(frame.data);
    } catch {
      // 非 JSON 帧由 decoder 报错
      return;
    }
    if (!isRecord(payload) || typeof payload.type !== 'string') return;

    if (payload.type === 'response.output_item.done') {
      if (isRecord(payload.item) && typeof payload.output_index === 'number') {
        this.items.set(payload.output_index, payload.item);
      }
      return;
    }
    if (TERMINAL_EVENTS.has(payload.type) && isRecord(payload.response)) {
      this.terminal = payload.response;
    }
  }

  finish(collected: Record<string, unknown>): Record<string, unknown> {
    if (!this.terminal) return collected;
    return { ...this.terminal, output: this.output(collected) };
  }

  // Codex 的终止事件里 output 常为空，依次退回 output_item.done 和收集结果
  private output(collected: Record<string, unknown>): unknown {
    const output = this.terminal?.output;
    if (Array.isArray(output) && output.length > 0) return output;
    if (this.items.size > 0) {
      return [...this.items.entries()].sort(([a], [b]) => a - b).map(([, item]) => item);
    }
    return collected.output;
  }
}
