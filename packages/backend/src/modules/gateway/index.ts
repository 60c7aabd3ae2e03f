export { createGatewayRoutes } from './gateway.routes.js';
export { GatewayController } from './gateway.controller.js';
export { GatewayService } from './gateway.service.js';
export { GatewayRouter, validateBindings } from './router.js';
export { getAdapter } from './formats/index.js';
export { collectStream } from './canonical/collect.js';
export { relayStream, readStreamEvents } from './relay/stream-relay.js';
export { SseParser, serializeSseFrame } from './relay/sse-parser.js';
export * from './errors.js';
export type * from './canonical/types.js';
