/**
 * Webhook server using Fastify
 */

import Fastify, { type FastifyInstance } from 'fastify';
import type { LinkSourceClient } from '../core/types';
import { registerWebhooks } from './webhooks';
import { createLogger } from '../core/logger';

const log = createLogger('server');

export interface ServerConfig {
  port: number;
  host: string;
  webhookSecret: string;
  client: LinkSourceClient;
  comment: boolean;
}

/**
 * Create and configure Fastify server instance
 * Returns the instance without calling listen() - caller handles startup
 */
export async function createServer(config: ServerConfig): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false, // pino logger from src/core/logger.ts is used instead
  });

  fastify.get('/health', async () => ({ status: 'ok' }));

  await fastify.register(async scope => {
    registerWebhooks(scope, {
      secret: config.webhookSecret,
      client: config.client,
      comment: config.comment,
    });
  });

  log.debug('Routes registered');
  return fastify;
}
