#!/usr/bin/env node

import { Command } from 'commander';
import { GitHubClient } from './core/github';
import { ConfigError, getToken, getWebhookSecret, parsePRNumber, parseRepo } from './core/config';
import { ConsoleReporter, type ConsoleFormat } from './core/reporter';
import { runLinkCheck } from './core/runner';
import { findIssueReferences } from './core/text-scanner';

const program = new Command();

interface CLIOpts {
  repo?: string;
  pr?: string;
  token?: string;
  comment?: boolean;
  format?: string;
  port?: string;
  host?: string;
  webhookSecret?: string;
}

function parseFormat(value: string | undefined): ConsoleFormat {
  if (value === undefined || value === 'text') return 'text';
  if (value === 'json') return 'json';
  throw new ConfigError(`Invalid format "${value}". Use text or json.`);
}

function fail(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`❌ ${message}`);
  process.exit(1);
}

program
  .name('issue-link-guard')
  .description('Require every pull request to be linked to an issue')
  .version('0.1.0');

program
  .command('check')
  .description('Check a single PR for a linked issue')
  .requiredOption('-r, --repo <owner/repo>', 'GitHub repository')
  .requiredOption('-n, --pr <number>', 'PR number')
  .option('-t, --token <token>', 'GitHub token (or GITHUB_TOKEN env)')
  .option('--comment', 'Post the missing linked issue comment on failure', false)
  .option('-f, --format <format>', 'Output format: text|json', 'text')
  .action(async (opts: CLIOpts) => {
    try {
      const { owner, repo } = parseRepo(opts.repo ?? '');
      const number = parsePRNumber(opts.pr ?? '');
      const format = parseFormat(opts.format);
      const token = getToken(opts.token);
      if (!token) throw new ConfigError('GITHUB_TOKEN required.');

      await runLinkCheck({ owner, repo, number }, {
        client: new GitHubClient(token),
        reporter: new ConsoleReporter(format),
        comment: opts.comment ?? false,
      });
    } catch (err) {
      fail(err);
    }
  });

program
  .command('scan-text')
  .description('Print the issue references found in a piece of text')
  .argument('<text...>', 'Text to scan, e.g. a PR title')
  .option('-f, --format <format>', 'Output format: text|json', 'text')
  .action((words: string[], opts: CLIOpts) => {
    try {
      const format = parseFormat(opts.format);
      const matches = findIssueReferences(words.join(' '));
      if (format === 'json') {
        console.log(JSON.stringify(matches, null, 2));
        return;
      }
      if (matches.length === 0) {
        console.log('No issue references found.');
        process.exitCode = 1;
        return;
      }
      for (const m of matches) {
        console.log(`#${m.issue.padEnd(8)} ${m.pattern}`);
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command('server')
  .description('Start a webhook server that checks PRs and sets a commit status')
  .option('--port <number>', 'Server port', '3000')
  .option('--host <host>', 'Server host', '0.0.0.0')
  .option('-t, --token <token>', 'GitHub token (or GITHUB_TOKEN env)')
  .option('--webhook-secret <secret>', 'GitHub webhook secret (or GITHUB_WEBHOOK_SECRET env)')
  .option('--no-comment', 'Do not comment on PRs without a linked issue')
  .action(async (opts: CLIOpts) => {
    const token = getToken(opts.token);
    const webhookSecret = getWebhookSecret(opts.webhookSecret);
    if (!token) fail(new ConfigError('GITHUB_TOKEN required.'));
    if (!webhookSecret) fail(new ConfigError('Webhook secret required (--webhook-secret or GITHUB_WEBHOOK_SECRET).'));

    const port = parseInt(opts.port ?? '3000', 10);
    if (isNaN(port) || port < 0 || port > 65535) fail(new ConfigError(`Invalid port "${opts.port}"`));
    const host = opts.host ?? '0.0.0.0';

    console.log(`🚀 Starting issue-link-guard server on ${host}:${port}...`);

    try {
      // Loaded lazily so check and scan-text do not pull in fastify
      const { startServer } = await import('./server');
      await startServer({
        port,
        host,
        webhookSecret,
        client: new GitHubClient(token),
        comment: opts.comment !== false,
      });
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);
