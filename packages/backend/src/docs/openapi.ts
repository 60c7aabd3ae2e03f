import {
  OpenAPIRegistry,
  OpenApiGeneratorV3,
  extendZodWithOpenApi,
} from '@asteasolutions/zod-to-openapi';
import type { OpenAPIObject } from 'openapi3-ts/oas30';
import { z } from 'zod';
import {
  GATEWAY_PATHS,
  HEALTH_PATH,
  WIRE_FORMAT_LABELS,
  anthropicRequestSchema,
  chatRequestSchema,
  errorResponseSchema,
  healthResponseSchema,
  responsesRequestSchema,
  type WireFormat,
} from '@ccproxy/shared';

extendZodWithOpenApi(z);

export const registry = new OpenAPIRegistry();

const REQUEST_SCHEMAS: Record<WireFormat, z.ZodTypeAny> = {
  anthropic: anthropicRequestSchema,
  'openai-chat': chatRequestSchema,
  'openai-responses': responsesRequestSchema,
};

const errorResponses = {
  400: {
    description: 'DECODE_ERROR / INVALID_PARAMETER',
    content: { 'application/json': { schema: errorResponseSchema } },
  },
  502: {
    description: 'TRANSPORT_ERROR / ENCODE_ERROR',
    content: { 'application/json': { schema: errorResponseSchema } },
  },
  504: {
    description: 'Upstream timeout',
    content: { 'application/json': { schema: errorResponseSchema } },
  },
};

function registerGatewayPath(
  path: string,
  requestFormat: WireFormat,
  responseFormat: WireFormat,
  summary: string
): void {
  registry.registerPath({
    method: 'post',
    path,
    tags: ['Gateway'],
    summary,
    request: {
      body: {
        content: { 'application/json': { schema: REQUEST_SCHEMAS[requestFormat] } },
      },
    },
    responses: {
      200: {
        description: `${WIRE_FORMAT_LABELS[responseFormat]} response (JSON, or SSE when stream=true)`,
      },
      ...errorResponses,
    },
  });
}

registerGatewayPath(
  GATEWAY_PATHS.NATIVE_CHAT_COMPLETIONS,
  'openai-chat',
  'anthropic',
  'Chat Completions request, native Anthropic Messages response'
);
registerGatewayPath(
  GATEWAY_PATHS.CC_CHAT_COMPLETIONS,
  'openai-chat',
  'openai-chat',
  'Chat Completions via Anthropic upstream'
);
registerGatewayPath(
  GATEWAY_PATHS.CODEX_RESPONSES,
  'openai-responses',
  'openai-responses',
  'Responses API via Codex upstream'
);
registerGatewayPath(
  GATEWAY_PATHS.CODEX_CHAT_COMPLETIONS,
  'openai-chat',
  'openai-chat',
  'Chat Completions via Codex upstream'
);
registerGatewayPath(GATEWAY_PATHS.MESSAGES, 'anthropic', 'anthropic', 'Anthropic Messages passthrough');

registry.registerPath({
  method: 'get',
  path: HEALTH_PATH,
  tags: ['Health'],
  summary: 'Liveness check',
  responses: {
    200: {
      description: 'Service is up',
      content: { 'application/json': { schema: healthResponseSchema } },
    },
  },
});

registry.registerComponent('securitySchemes', 'apiKey', {
  type: 'apiKey',
  in: 'header',
  name: 'x-api-key',
});

export function generateOpenAPIDocument(serverUrl: string): OpenAPIObject {
  const generator = new OpenApiGeneratorV3(registry.definitions);

  return generator.generateDocument({
    openapi: '3.0.0',
    info: {
      title: 'CCProxy',
      version: '0.1.0',
      description: 'Protocol translation gateway between Anthropic Messages, OpenAI Chat Completions and OpenAI Responses',
    },
    servers: [{ url: serverUrl }],
  });
}
