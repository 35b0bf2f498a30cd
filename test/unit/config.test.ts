/**
 * Unit tests for config
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import {
  ConfigError,
  getToken,
  getWebhookSecret,
  loadEventContext,
  parsePRNumber,
  parseRepo,
  refFromPayload,
  validateConfig,
} from '../../src/core/config';

describe('config', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('parseRepo', () => {
    it('splits owner/repo', () => {
      expect(parseRepo('acme/widgets')).toEqual({ owner: 'acme', repo: 'widgets' });
    });

    it.each(['acme', 'acme/', '/widgets', 'a/b/c', ''])('rejects "%s"', value => {
      expect(() => parseRepo(value)).toThrow(ConfigError);
    });

    it('names the expected format', () => {
      expect(() => parseRepo('acme')).toThrow('Invalid repo format "acme". Expected: owner/repo');
    });
  });

  describe('parsePRNumber', () => {
    it('parses a positive integer', () => {
      expect(parsePRNumber('12')).toBe(12);
    });

    it.each(['0', '-3', '1.5', 'abc', ''])('rejects "%s"', value => {
      expect(() => parsePRNumber(value)).toThrow(ConfigError);
    });
  });

  describe('getToken / getWebhookSecret', () => {
    it('prefers the explicit value', () => {
      process.env.GITHUB_TOKEN = 'env-token';
      expect(getToken('flag-token')).toBe('flag-token');
    });

    it('falls back to the environment', () => {
      process.env.GITHUB_TOKEN = 'env-token';
      process.env.GITHUB_WEBHOOK_SECRET = 'test-secret';
      expect(getToken()).toBe('env-token');
      expect(getWebhookSecret()).toBe('test-secret');
    });

    it('returns an empty string when nothing is set', () => {
      delete process.env.GITHUB_TOKEN;
      delete process.env.GITHUB_WEBHOOK_SECRET;
      expect(getToken()).toBe('');
      expect(getWebhookSecret()).toBe('');
    });
  });

  describe('refFromPayload', () => {
    it('prefers the payload repository', () => {
      const ref = refFromPayload(
        { pull_request: { number: 4 }, repository: { owner: { login: 'acme' }, name: 'widgets' } },
        'other/repo',
      );
      expect(ref).toEqual({ owner: 'acme', repo: 'widgets', number: 4 });
    });

    it('uses the top-level number when pull_request is absent', () => {
      expect(refFromPayload({ number: 9 }, 'octo/tools')).toEqual({ owner: 'octo', repo: 'tools', number: 9 });
    });

    it('returns null without a PR number', () => {
      expect(refFromPayload({ action: 'opened' }, 'octo/tools')).toBeNull();
    });

    it('throws without any repository', () => {
      expect(() => refFromPayload({ number: 9 })).toThrow(ConfigError);
    });
  });

  describe('loadEventContext', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(tmpdir(), 'link-guard-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    function writeEvent(payload: unknown): string {
      const file = path.join(dir, 'event.json');
      writeFileSync(file, typeof payload === 'string' ? payload : JSON.stringify(payload));
      return file;
    }

    it('reads a pull_request event', () => {
      const eventPath = writeEvent({
        action: 'opened',
        pull_request: { number: 12, head: { sha: 'abc123' } },
        repository: { owner: { login: 'acme' }, name: 'widgets' },
      });
      expect(loadEventContext({ GITHUB_EVENT_NAME: 'pull_request', GITHUB_EVENT_PATH: eventPath })).toEqual({
        eventName: 'pull_request',
        action: 'opened',
        ref: { owner: 'acme', repo: 'widgets', number: 12 },
      });
    });

    it('falls back to GITHUB_REPOSITORY', () => {
      const eventPath = writeEvent({ action: 'edited', pull_request: { number: 3 } });
      const context = loadEventContext({
        GITHUB_EVENT_NAME: 'pull_request_target',
        GITHUB_EVENT_PATH: eventPath,
        GITHUB_REPOSITORY: 'octo/tools',
      });
      expect(context.ref).toEqual({ owner: 'octo', repo: 'tools', number: 3 });
    });

    it('has no ref for other events', () => {
      const eventPath = writeEvent({ ref: 'refs/heads/main' });
      expect(loadEventContext({ GITHUB_EVENT_NAME: 'push', GITHUB_EVENT_PATH: eventPath }).ref).toBeNull();
    });

    it('throws when GITHUB_EVENT_PATH is not set', () => {
      expect(() => loadEventContext({ GITHUB_EVENT_NAME: 'pull_request' })).toThrow(ConfigError);
    });

    it('throws on unreadable JSON', () => {
      const eventPath = writeEvent('{not json');
      expect(() => loadEventContext({ GITHUB_EVENT_NAME: 'pull_request', GITHUB_EVENT_PATH: eventPath }))
        .toThrow(/^Failed to read event payload from /);
    });

    it('throws on a malformed payload', () => {
      const eventPath = writeEvent({ pull_request: { number: 'twelve' } });
      expect(() => loadEventContext({ GITHUB_EVENT_NAME: 'pull_request', GITHUB_EVENT_PATH: eventPath }))
        .toThrow(/^Invalid event payload: /);
    });
  });

  describe('validateConfig', () => {
    it('requires a token for the CLI', () => {
      delete process.env.GITHUB_TOKEN;
      expect(validateConfig('cli')).toEqual({
        mode: 'cli',
        valid: false,
        errors: ['GITHUB_TOKEN environment variable is required'],
      });
    });

    it('requires a webhook secret for the server', () => {
      process.env.GITHUB_TOKEN = 'test-token';
      delete process.env.GITHUB_WEBHOOK_SECRET;
      const result = validateConfig('server');
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['GITHUB_WEBHOOK_SECRET environment variable is required']);
    });

    it('requires the Actions context for the action', () => {
      process.env.GITHUB_TOKEN = 'test-token';
      delete process.env.GITHUB_REPOSITORY;
      delete process.env.GITHUB_EVENT_PATH;
      expect(validateConfig('action').errors).toEqual([
        'GITHUB_REPOSITORY environment variable is required',
        'GITHUB_EVENT_PATH environment variable is required',
      ]);
    });

    it('is valid when everything is set', () => {
      process.env.GITHUB_TOKEN = 'test-token';
      process.env.GITHUB_REPOSITORY = 'acme/widgets';
      process.env.GITHUB_EVENT_PATH = '/tmp/event.json';
      expect(validateConfig('action')).toEqual({ mode: 'action', valid: true, errors: [] });
    });
  });
});
