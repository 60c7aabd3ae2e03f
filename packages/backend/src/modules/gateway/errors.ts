/**
 * 网关错误分类
 *
 * 每类错误对应固定的 HTTP 状态码，details 保留足够的诊断信息
 */

import { ErrorCodes, type TransportErrorKind, type WireFormat } from '@ccproxy/shared';
import { AppError } from '../../middlewares/error.middleware.js';

export class UnroutableRequestError extends AppError {
  constructor(method: string, path: string) {
    super(404, ErrorCodes.UNROUTABLE_REQUEST, `No endpoint binding for ${method} ${path}`, {
      method,
      path,
    });
    this.name = 'UnroutableRequestError';
  }
}

export type DecodeReason = 'invalid_json' | 'invalid_shape' | 'role_order' | 'unsupported_content';

export class DecodeError extends AppError {
  constructor(
    public readonly format: WireFormat,
    public readonly reason: DecodeReason,
    message: string,
    issues?: unknown,
    statusCode = 400
  ) {
    super(statusCode, ErrorCodes.DECODE_ERROR, message, { format, reason, issues });
    this.name = 'DecodeError';
  }
}

export interface ParameterBounds {
  min?: number;
  max?: number;
  integer?: boolean;
}

export class InvalidParameterError extends AppError {
  constructor(
    public readonly param: string,
    value: unknown,
    bounds: ParameterBounds,
    format: WireFormat
  ) {
    super(
      400,
      ErrorCodes.INVALID_PARAMETER,
      `${param}=${String(value)} is out of range for ${format}`,
      { param, value, bounds, format }
    );
    this.name = 'InvalidParameterError';
  }
}

export class EncodeError extends AppError {
  constructor(
    public readonly format: WireFormat,
    message: string
  ) {
    super(502, ErrorCodes.ENCODE_ERROR, message, { format });
    this.name = 'EncodeError';
  }
}

export interface TransportErrorInfo {
  status?: number;
  upstreamBody?: string;
  upstream?: string;
  cause?: unknown;
}

export class TransportError extends AppError {
  public readonly kind: TransportErrorKind;
  public readonly status?: number;

  constructor(kind: TransportErrorKind, message: string, info: TransportErrorInfo = {}) {
    super(kind === 'Timeout' ? 504 : 502, ErrorCodes.TRANSPORT_ERROR, message, {
      kind,
      status: info.status,
      upstream: info.upstream,
      upstreamBody: info.upstreamBody,
    });
    this.name = 'TransportError';
    this.kind = kind;
    this.status = info.status;
    if (info.cause !== undefined) {
      this.cause = info.cause;
    }
  }
}

export type StalledSide = 'upstream' | 'caller';

export class StreamTimeoutError extends AppError {
  constructor(
    public readonly side: StalledSide,
    idleTimeoutMs: number
  ) {
    super(504, ErrorCodes.STREAM_TIMEOUT, `Stream idle for ${idleTimeoutMs}ms waiting on ${side}`, {
      side,
      idleTimeoutMs,
    });
    this.name = 'StreamTimeoutError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(500, ErrorCodes.CONFIG_ERROR, message, details);
    this.name = 'ConfigError';
  }
}
