/**
 * Configuration from the environment and the GitHub Actions event payload.
 *
 *   GITHUB_TOKEN            token for REST + GraphQL calls
 *   GITHUB_REPOSITORY       owner/repo (set by Actions)
 *   GITHUB_EVENT_NAME       triggering event (set by Actions)
 *   GITHUB_EVENT_PATH       path of the event payload JSON (set by Actions)
 *   GITHUB_WEBHOOK_SECRET   HMAC secret for the webhook server
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { PullRequestRef } from './types';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type RunMode = 'cli' | 'action' | 'server';

/** Events whose payload carries a pull request */
export const PULL_REQUEST_EVENTS = ['pull_request', 'pull_request_target'] as const;

export const pullRequestPayloadSchema = z.object({
  action: z.string().optional(),
  number: z.number().int().optional(),
  pull_request: z.object({
    number: z.number().int(),
    head: z.object({ sha: z.string() }).optional(),
  }).optional(),
  repository: z.object({
    owner: z.object({ login: z.string() }),
    name: z.string(),
  }).optional(),
});

export type PullRequestPayload = z.infer<typeof pullRequestPayloadSchema>;

export interface EventContext {
  eventName: string;
  action?: string;
  ref: PullRequestRef | null;   // null when the event has no pull request
}

export function parseRepo(fullName: string): { owner: string; repo: string } {
  const parts = fullName.split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ConfigError(`Invalid repo format "${fullName}". Expected: owner/repo`);
  }
  return { owner: parts[0], repo: parts[1] };
}

export function parsePRNumber(value: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num < 1) {
    throw new ConfigError(`Invalid PR number "${value}"`);
  }
  return num;
}

export function getToken(explicit?: string): string {
  return explicit || process.env.GITHUB_TOKEN || '';
}

export function getWebhookSecret(explicit?: string): string {
  return explicit || process.env.GITHUB_WEBHOOK_SECRET || '';
}

/** Pull request reference from a payload, falling back to GITHUB_REPOSITORY for the repo */
export function refFromPayload(payload: PullRequestPayload, repository?: string): PullRequestRef | null {
  const number = payload.pull_request?.number ?? payload.number;
  if (number === undefined) return null;

  if (payload.repository) {
    return { owner: payload.repository.owner.login, repo: payload.repository.name, number };
  }
  if (!repository) {
    throw new ConfigError('Event payload has no repository and GITHUB_REPOSITORY is not set');
  }
  return { ...parseRepo(repository), number };
}

/**
 * Reads the Actions event context.
 * Throws ConfigError when the payload file is missing or malformed.
 */
export function loadEventContext(env: NodeJS.ProcessEnv = process.env): EventContext {
  const eventName = env.GITHUB_EVENT_NAME ?? '';
  const eventPath = env.GITHUB_EVENT_PATH;
  if (!eventPath) {
    throw new ConfigError('GITHUB_EVENT_PATH is not set; run inside GitHub Actions or use the check command');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(eventPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read event payload from ${eventPath}: ${reason}`);
  }

  const parsed = pullRequestPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid event payload: ${parsed.error.issues.map(i => i.message).join('; ')}`);
  }

  const isPullRequestEvent = PULL_REQUEST_EVENTS.some(e => e === eventName);
  return {
    eventName,
    action: parsed.data.action,
    ref: isPullRequestEvent ? refFromPayload(parsed.data, env.GITHUB_REPOSITORY) : null,
  };
}

/**
 * Validate that all required configuration is present for a run mode
 */
export function validateConfig(mode: RunMode): { mode: RunMode; valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!process.env.GITHUB_TOKEN) {
    errors.push('GITHUB_TOKEN environment variable is required');
  }
  if (mode === 'server' && !process.env.GITHUB_WEBHOOK_SECRET) {
    errors.push('GITHUB_WEBHOOK_SECRET environment variable is required');
  }
  if (mode === 'action') {
    if (!process.env.GITHUB_REPOSITORY) errors.push('GITHUB_REPOSITORY environment variable is required');
    if (!process.env.GITHUB_EVENT_PATH) errors.push('GITHUB_EVENT_PATH environment variable is required');
  }

  return { mode, valid: errors.length === 0, errors };
}
