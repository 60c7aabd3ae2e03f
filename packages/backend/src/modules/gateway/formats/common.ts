/**
 * 各格式 adapter 共用的解析、透传与参数校验工具
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { WIRE_FORMATS, type WireFormat } from '@ccproxy/shared';
import type { CanonicalRequest, Extensions, OpaquePart, ReasoningEffort } from '../canonical/types.js';
import {
  DecodeError,
  EncodeError,
  InvalidParameterError,
  type ParameterBounds,
} from '../errors.js';

/**
 * 解析请求体字节为 JSON
 */
export function parseJsonBody(raw: Buffer | string, format: WireFormat): unknown {
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');
  if (!text.trim()) {
    throw new DecodeError(format, 'invalid_json', 'Request body is empty');
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError(
      format,
      'invalid_json',
      `Request body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * 用 zod schema 校验结构，失败时抛出带 issues 的 DecodeError
 */
export function parseWithSchema<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  format: WireFormat,
  statusCode = 400
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DecodeError(
      format,
      'invalid_shape',
      `Payload does not match the ${format} schema`,
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      statusCode
    );
  }
  return result.data;
}

/**
 * 拆出未识别字段
 */
export function pickExtras(
  obj: Record<string, unknown>,
  known: readonly string[]
): Record<string, unknown> | undefined {
  let extras: Record<string, unknown> | undefined;
  for (const [key, value] of Object.entries(obj)) {
    if (known.includes(key)) continue;
    extras ??= {};
    extras[key] = value;
  }
  return extras;
}

/**
 * 把某格式的未识别字段包装为 Extensions
 */
export function toExtensions(
  format: WireFormat,
  extras: Record<string, unknown> | undefined
): Extensions | undefined {
  return extras ? { [format]: extras } : undefined;
}

/**
 * 取出属于目标格式的透传字段（其他格式的一律不写回）
 */
export function extrasFor(
  extensions: Extensions | undefined,
  format: WireFormat
): Record<string, unknown> {
  return extensions?.[format] ?? {};
}

export function mergeExtensions(
  a: Extensions | undefined,
  b: Extensions | undefined
): Extensions | undefined {
  if (!a) return b;
  if (!b) return a;
  const merged: Extensions = { ...a };
  for (const format of WIRE_FORMATS) {
    const fields = b[format];
    if (fields) merged[format] = { ...merged[format], ...fields };
  }
  return merged;
}

// ==================== 参数范围校验 ====================

export interface ParameterLimits {
  temperature: ParameterBounds;
  topP: ParameterBounds;
  maxTokens: ParameterBounds;
  /** undefined 表示目标格式不支持该参数 */
  topK?: ParameterBounds;
  stopSequences: boolean;
}

function checkBounds(
  param: string,
  value: number | undefined,
  bounds: ParameterBounds,
  format: WireFormat
): void {
  if (value === undefined) return;
  const outOfRange =
    !Number.isFinite(value) ||
    (bounds.integer === true && !Number.isInteger(value)) ||
    (bounds.min !== undefined && value < bounds.min) ||
    (bounds.max !== undefined && value > bounds.max);
  if (outOfRange) {
    throw new InvalidParameterError(param, value, bounds, format);
  }
}

/**
 * 按目标上游的范围校验生成参数，越界直接报错，不做截断
 */
export function validateParameters(
  request: CanonicalRequest,
  format: WireFormat,
  limits: ParameterLimits
): void {
  checkBounds('temperature', request.temperature, limits.temperature, format);
  checkBounds('top_p', request.topP, limits.topP, format);
  checkBounds('max_tokens', request.maxTokens, limits.maxTokens, format);

  if (request.topK !== undefined) {
    if (!limits.topK) {
      throw new EncodeError(format, `top_k is not supported by ${format}`);
    }
    checkBounds('top_k', request.topK, limits.topK, format);
  }

  if (request.stopSequences && request.stopSequences.length > 0 && !limits.stopSequences) {
    throw new EncodeError(format, `stop sequences are not supported by ${format}`);
  }
}

// ==================== reasoning effort ↔ budget ====================

export const EFFORT_BUDGETS: Record<ReasoningEffort, number> = {
  minimal: 1024,
  low: 1024,
  medium: 4096,
  high: 16384,
};

export function isReasoningEffort(value: string): value is ReasoningEffort {
  return Object.prototype.hasOwnProperty.call(EFFORT_BUDGETS, value);
}

export function effortFromBudget(budgetTokens: number): ReasoningEffort {
  if (budgetTokens >= EFFORT_BUDGETS.high) return 'high';
  if (budgetTokens >= EFFORT_BUDGETS.medium) return 'medium';
  return 'low';
}

// ==================== 其他 ====================

/**
 * opaque 内容只能原样写回来源格式
 */
export function opaqueFor(part: OpaquePart, format: WireFormat): Record<string, unknown> {
  if (part.format !== format) {
    const kind = typeof part.value.type === 'string' ? part.value.type : 'unknown';
    throw new EncodeError(format, `${part.format} content of type ${kind} has no ${format} representation`);
  }
  return part.value;
}

const DATA_URL_RE = /^data:([^;,]+);base64,(.*)$/s;

export function parseDataUrl(url: string): { mediaType: string; data: string } | undefined {
  const match = DATA_URL_RE.exec(url);
  if (!match) return undefined;
  return { mediaType: match[1], data: match[2] };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
