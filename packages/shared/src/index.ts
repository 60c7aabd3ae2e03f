export * from './constants/api.js';
export * from './constants/errors.js';
export * from './constants/formats.js';

export * from './schemas/common.schema.js';
export * from './schemas/anthropic.schema.js';
export * from './schemas/openai-chat.schema.js';
export * from './schemas/openai-responses.schema.js';

export type * from './types/error.js';
export type * from './types/request.js';
