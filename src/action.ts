/**
 * GitHub Action entry point
 *
 * Runs on pull_request events and fails the step when the PR has no linked issue.
 */

import * as core from '@actions/core';
import { GitHubClient } from './core/github';
import { ConfigError, loadEventContext, validateConfig } from './core/config';
import { ActionsReporter } from './core/reporter';
import { runLinkCheck } from './core/runner';
import { isTriggerAction } from './core/types';
import { createLogger } from './core/logger';

const log = createLogger('action');

export async function run(): Promise<void> {
  const tokenInput = core.getInput('github-token');
  if (tokenInput) process.env.GITHUB_TOKEN = tokenInput;

  const { valid, errors } = validateConfig('action');
  if (!valid) {
    core.setFailed(errors.join('\n'));
    return;
  }

  let recorded = false;
  try {
    const event = loadEventContext();
    if (!event.ref) {
      core.info(`Skipping: event "${event.eventName}" has no pull request`);
      return;
    }
    if (!isTriggerAction(event.action)) {
      core.info(`Skipping: pull request action "${event.action ?? 'unknown'}" does not trigger the check`);
      return;
    }

    const comment = core.getBooleanInput('comment');
    const client = new GitHubClient(process.env.GITHUB_TOKEN ?? '');
    const reporter = new ActionsReporter();

    await runLinkCheck(event.ref, {
      client,
      comment,
      reporter: {
        pass: async (notice, result) => {
          await reporter.pass(notice, result);
          recorded = true;
        },
        fail: async (message, result) => {
          await reporter.fail(message, result);
          recorded = true;
        },
      },
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof ConfigError || !recorded) {
      core.setFailed(message);
    } else {
      // The check result is already recorded; only the comment step failed.
      log.error({ err: error }, 'Post-check step failed');
      core.error(message);
    }
  }
}

if (require.main === module) {
  run().catch(err => core.setFailed(err instanceof Error ? err.message : String(err)));
}
