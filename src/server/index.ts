/**
 * Webhook server module
 *
 * Usage:
 *   import { startServer } from './server';
 *   await startServer({ port: 3000, host: '0.0.0.0', ... });
 */

export { createServer, type ServerConfig } from './app';
export { registerWebhooks, verifySignature } from './webhooks';

import type { ServerConfig } from './app';
import { createServer } from './app';
import { createLogger } from '../core/logger';

const log = createLogger('server');

/**
 * Start the webhook server and close it on SIGINT/SIGTERM
 */
export async function startServer(config: ServerConfig): Promise<void> {
  const fastify = await createServer(config);

  try {
    await fastify.listen({ port: config.port, host: config.host });
    log.info({ host: config.host, port: config.port, comment: config.comment }, 'Server listening');
    log.info({ url: `http://${config.host}:${config.port}/webhooks` }, 'Webhook endpoint registered');
  } catch (error) {
    log.error({ err: error }, 'Failed to start server');
    throw error;
  }

  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutting down');
    try {
      await fastify.close();
      log.info('Server shutdown complete');
      process.exit(0);
    } catch (error) {
      log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}
