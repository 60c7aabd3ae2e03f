import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { pinoHttp } from 'pino-http';
import swaggerUi from 'swagger-ui-express';
import { HEALTH_PATH } from '@ccproxy/shared';
import type { EndpointBinding } from './config/bindings.js';
import { logger } from './lib/logger.js';
import type { UpstreamClient } from './lib/upstream-client.js';
import { errorHandler } from './middlewares/error.middleware.js';
import { generateOpenAPIDocument } from './docs/openapi.js';
import {
  GatewayController,
  GatewayRouter,
  GatewayService,
  createGatewayRoutes,
} from './modules/gateway/index.js';

export interface AppOptions {
  bindings: readonly EndpointBinding[];
  client: UpstreamClient;
  idleTimeoutMs: number;
  bodyLimit: string;
  /** OpenAPI 文档里的 server 地址 */
  publicUrl?: string;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // 启动时校验 binding，重叠直接抛 ConfigError
  const router = new GatewayRouter(options.bindings);
  const service = new GatewayService({
    router,
    client: options.client,
    idleTimeoutMs: options.idleTimeoutMs,
  });

  // Security middleware
  app.use(
    helmet({
      crossOriginOpenerPolicy: false,
      crossOriginResourcePolicy: false,
      crossOriginEmbedderPolicy: false,
      contentSecurityPolicy: false,
      hsts: false,
    })
  );
  app.use(cors());

  // Request logging
  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === HEALTH_PATH,
      },
    })
  );

  // Health check
  app.get(HEALTH_PATH, (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API documentation
  const openApiDoc = generateOpenAPIDocument(options.publicUrl ?? 'http://localhost:8000');
  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDoc));
  app.get('/api/docs.json', (_req, res) => {
    res.json(openApiDoc);
  });

  app.get('/api/bindings', (_req, res) => {
    res.json({ success: true, data: router.list() });
  });

  // Gateway（其余所有路径，未绑定的返回 UNROUTABLE_REQUEST）
  app.use(createGatewayRoutes(new GatewayController(service), { bodyLimit: options.bodyLimit }));

  // Error handling
  app.use(errorHandler);

  return app;
}
