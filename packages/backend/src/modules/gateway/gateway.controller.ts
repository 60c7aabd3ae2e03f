import type { Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { GatewayService } from './gateway.service.js';

export class GatewayController {
  constructor(private readonly service: GatewayService) {}

  async handle(req: Request, res: Response): Promise<void> {
    // express.raw 对所有 content-type 生效，空请求体时不是 Buffer
    const body = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

    await this.service.handle(
      {
        requestId: uuidv4(),
        method: req.method,
        path: req.path,
        headers: req.headers,
        body,
        logger: req.log,
      },
      res
    );
  }
}
