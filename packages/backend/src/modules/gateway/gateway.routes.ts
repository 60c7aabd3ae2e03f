import express, { Router, type IRouter } from 'express';
import { asyncHandler } from '../../utils/async-handler.js';
import type { GatewayController } from './gateway.controller.js';

export interface GatewayRoutesOptions {
  bodyLimit: string;
}

export function createGatewayRoutes(controller: GatewayController, options: GatewayRoutesOptions): IRouter {
  const router: IRouter = Router();

  // adapter 自己解析字节，方便区分 invalid_json 和 invalid_shape
  router.use(express.raw({ type: () => true, limit: options.bodyLimit }));

  router.all(
    '*',
    asyncHandler((req, res) => controller.handle(req, res))
  );

  return router;
}
