export const ErrorCodes = {
  UNROUTABLE_REQUEST: 'UNROUTABLE_REQUEST',
  DECODE_ERROR: 'DECODE_ERROR',
  INVALID_PARAMETER: 'INVALID_PARAMETER',
  ENCODE_ERROR: 'ENCODE_ERROR',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  STREAM_TIMEOUT: 'STREAM_TIMEOUT',
  CONFIG_ERROR: 'CONFIG_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const TRANSPORT_ERROR_KINDS = [
  'ConnectFailed',
  'TLSVerifyFailed',
  'Timeout',
  'UpstreamHTTPError',
] as const;

export type TransportErrorKind = (typeof TRANSPORT_ERROR_KINDS)[number];
