/**
 * GitHub Webhook Handler
 *
 * - ping: answered with pong
 * - pull_request / pull_request_target (opened, edited, synchronize, reopened):
 *   run the linked-issue check and set a commit status on the PR head
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { createHmac, timingSafeEqual } from 'crypto';
import { PULL_REQUEST_EVENTS, pullRequestPayloadSchema } from '../core/config';
import { CommitStatusReporter } from '../core/reporter';
import { runLinkCheck } from '../core/runner';
import { isTriggerAction, type LinkSourceClient } from '../core/types';
import { createLogger } from '../core/logger';

const log = createLogger('webhooks');

export interface WebhookConfig {
  secret: string;
  client: LinkSourceClient;
  comment: boolean;
}

type PullRequestOutcome =
  | { status: 'processed'; linked: boolean }
  | { status: 'ignored'; reason: string }
  | { status: 'invalid'; reason: string };

/**
 * Verify GitHub webhook signature using HMAC-SHA256
 */
export function verifySignature(payload: string, signature: string, secret: string): boolean {
  if (!signature) return false;

  const hmac = createHmac('sha256', secret);
  hmac.update(payload, 'utf8');
  const expected = `sha256=${hmac.digest('hex')}`;

  if (signature.length !== expected.length) return false;

  try {
    return timingSafeEqual(Buffer.from(signature), Buffer.from(expected));
  } catch {
    return false;
  }
}

function header(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Register the webhook endpoint. JSON bodies in this scope stay raw strings so the
 * signature is checked against the exact bytes GitHub signed.
 */
export function registerWebhooks(fastify: FastifyInstance, config: WebhookConfig): void {
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.post('/webhooks', async (request: FastifyRequest, reply: FastifyReply) => {
    const signature = header(request, 'x-hub-signature-256');
    const event = header(request, 'x-github-event');
    const deliveryId = header(request, 'x-github-delivery');

    log.info({ event, deliveryId }, 'Webhook received');

    const rawBody = typeof request.body === 'string' ? request.body : '';

    if (!signature || !verifySignature(rawBody, signature, config.secret)) {
      log.warn({ deliveryId }, 'Invalid webhook signature');
      return reply.code(401).send({ error: 'Invalid signature' });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch {
      return reply.code(400).send({ error: 'Invalid JSON payload' });
    }

    try {
      if (event === 'ping') {
        log.info('Webhook ping received');
        return reply.code(200).send({ status: 'pong' });
      }
      if (PULL_REQUEST_EVENTS.some(e => e === event)) {
        const outcome = await handlePullRequestEvent(payload, config);
        if (outcome.status === 'invalid') {
          return reply.code(400).send({ error: outcome.reason });
        }
        return reply.code(200).send(outcome);
      }
      log.debug({ event }, 'Ignoring event');
      return reply.code(200).send({ status: 'ignored' });
    } catch (error) {
      log.error({ err: error, deliveryId }, 'Webhook processing error');
      return reply.code(500).send({
        error: 'Webhook processing failed',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  });

  log.info('Webhook endpoint registered at POST /webhooks');
}

/**
 * Handle pull_request webhook events
 */
export async function handlePullRequestEvent(
  payload: unknown,
  config: WebhookConfig,
): Promise<PullRequestOutcome> {
  const parsed = pullRequestPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return { status: 'invalid', reason: 'Invalid pull_request payload' };
  }

  const { action, pull_request, repository } = parsed.data;
  if (!isTriggerAction(action)) {
    log.debug({ action }, 'Ignoring PR action');
    return { status: 'ignored', reason: `action ${action ?? 'unknown'}` };
  }
  if (!pull_request?.head || !repository) {
    return { status: 'invalid', reason: 'Missing pull_request or repository in payload' };
  }

  const ref = { owner: repository.owner.login, repo: repository.name, number: pull_request.number };
  log.info({ action, repo: `${ref.owner}/${ref.repo}`, pr: ref.number }, 'Processing PR event');

  const result = await runLinkCheck(ref, {
    client: config.client,
    comment: config.comment,
    reporter: new CommitStatusReporter(config.client, ref, pull_request.head.sha),
  });

  return { status: 'processed', linked: result.linked };
}
