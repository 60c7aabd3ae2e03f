import { env } from './config/env.js';
import { buildBindings, buildUpstreamTargets } from './config/bindings.js';
import { logger } from './lib/logger.js';
import { describeTransport, loadTransportConfig } from './lib/transport-config.js';
import { UpstreamClient } from './lib/upstream-client.js';
import { createApp } from './app.js';

async function main() {
  try {
    const transport = loadTransportConfig(env);
    const client = new UpstreamClient(transport);
    const targets = buildUpstreamTargets(env);
    const bindings = buildBindings(targets);

    const app = createApp({
      bindings,
      client,
      idleTimeoutMs: transport.streamIdleTimeoutMs,
      bodyLimit: env.BODY_LIMIT,
      publicUrl: `http://${env.HOST}:${env.PORT}`,
    });

    const server = app.listen(env.PORT, env.HOST, () => {
      logger.info(`Server running on http://${env.HOST}:${env.PORT}`);
      logger.info(`API docs available at http://${env.HOST}:${env.PORT}/api/docs`);

      // 显示传输配置
      logger.info(describeTransport(transport), 'Upstream transport configured');
      if (!transport.verifyTls) {
        logger.warn('✗ SSL_VERIFY=false: upstream certificates are NOT verified (insecure)');
      }
      for (const binding of bindings) {
        logger.info(
          { upstream: binding.upstream.name, request: binding.requestFormat, response: binding.responseFormat },
          `${binding.method} ${binding.path}`
        );
      }
    });

    // Graceful shutdown
    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully`);

      server.close(() => {
        logger.info('HTTP server closed');

        client
          .destroy()
          .then(() => {
            logger.info('Upstream client destroyed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Failed to destroy upstream client');
            process.exit(1);
          });
      });

      // Force shutdown after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

void main();
