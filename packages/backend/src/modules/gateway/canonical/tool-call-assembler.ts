/**
 * 工具调用参数重组
 *
 * 上游把参数 JSON 切成多段发送，每个调用维护一个小状态机：
 * collecting → complete。只有遇到终止标记或参数结构完整时才产出 tool_call 事件
 */

import type { ToolCallEvent } from './types.js';

export type AssemblerState = 'collecting' | 'complete';

export class ToolCallAssembler {
  private buffer = '';
  private state: AssemblerState = 'collecting';
  // 增量扫描状态
  private depth = 0;
  private sawOpen = false;
  private inString = false;
  private escaped = false;
  private malformed = false;

  constructor(
    public readonly toolIndex: number,
    public id: string,
    public name: string
  ) {}

  get isComplete(): boolean {
    return this.state === 'complete';
  }

  get text(): string {
    return this.buffer;
  }

  append(fragment: string): void {
    if (this.state === 'complete' || !fragment) return;
    this.buffer += fragment;
    this.scan(fragment);
  }

  /**
   * 已累积的参数是否已是完整的 JSON 值
   * 用于没有逐调用终止标记的格式（Chat Completions）
   */
  isStructurallyComplete(): boolean {
    if (this.malformed || !this.sawOpen || this.inString || this.depth !== 0) return false;
    try {
      JSON.parse(this.buffer);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * 提升为完成状态
   * @param finalArguments 上游在终止标记里给出的完整参数（优先使用）
   */
  complete(finalArguments?: string): ToolCallEvent {
    this.state = 'complete';
    const args = finalArguments ?? (this.buffer === '' ? '{}' : this.buffer);
    return {
      type: 'tool_call',
      toolIndex: this.toolIndex,
      id: this.id,
      name: this.name,
      arguments: args,
    };
  }

  private scan(fragment: string): void {
    for (const ch of fragment) {
      if (this.inString) {
        if (this.escaped) {
          this.escaped = false;
        } else if (ch === '\\') {
          this.escaped = true;
        } else if (ch === '"') {
          this.inString = false;
        }
        continue;
      }

      switch (ch) {
        case '"':
          this.inString = true;
          break;
        case '{':
        case '[':
          this.depth++;
          this.sawOpen = true;
          break;
        case '}':
        case ']':
          this.depth--;
          if (this.depth < 0) this.malformed = true;
          break;
        default:
          break;
      }
    }
  }
}
