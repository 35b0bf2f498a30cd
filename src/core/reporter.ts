/**
 * Outcome Reporter — records the check result and, on failure, explains on the
 * pull request how to link an issue.
 */

import * as core from '@actions/core';
import type { CommitState, DetectionResult, LinkSourceClient, PullRequestRef } from './types';
import { createLogger } from './logger';

const log = createLogger('reporter');

export const FAILURE_MESSAGE = `❌ This pull request must be linked to an issue.

Please link this PR to an issue by:
1. Adding "Fixes #<issue-number>" or "Closes #<issue-number>" to the PR description
2. Using GitHub's UI to link the PR to an existing issue
3. Referencing the issue number with #<issue-number> in the PR title or description

Example: "Fixes #123" or "Closes #456"`;

export const MISSING_ISSUE_COMMENT = `## ❌ Missing Linked Issue

This pull request needs to be linked to at least one issue before it can be merged.

### How to link an issue:

1. **Add keywords to PR description:**
   - \`Fixes #123\`
   - \`Closes #456\`
   - \`Resolves #789\`
   - \`Fixes #123, #456, and #789\` (multiple issues)

2. **Reference issue in PR title or description:**
   - \`#123\`
   - \`Issue #456\`
   - \`Addresses #123 and #456\` (multiple issues)

3. **Use GitHub's UI:**
   - Go to the "Development" section in the right sidebar
   - Click "Link an issue"
   - Select the relevant issue(s)

💡 **Tip:** You can link multiple issues using any combination of the above methods!

Once you've linked at least one issue, this check will automatically pass! 🚀`;

export function formatSuccessNotice(issues: string[]): string {
  return `✅ Pull request is properly linked to issue(s): ${issues.join(', ')}`;
}

export interface CheckReporter {
  pass(notice: string, result: DetectionResult): Promise<void>;
  fail(message: string, result: DetectionResult): Promise<void>;
}

/** Step result for a GitHub Actions run */
export class ActionsReporter implements CheckReporter {
  async pass(notice: string, result: DetectionResult): Promise<void> {
    core.setOutput('linked', 'true');
    core.setOutput('issues', result.issues.join(','));
    core.notice(notice);
  }

  async fail(message: string, result: DetectionResult): Promise<void> {
    core.setOutput('linked', 'false');
    core.setOutput('issues', result.issues.join(','));
    core.setFailed(message);
  }
}

export type ConsoleFormat = 'text' | 'json';

/** Terminal output for the CLI; a failed check sets a non-zero exit code */
export class ConsoleReporter implements CheckReporter {
  private format: ConsoleFormat;

  constructor(format: ConsoleFormat = 'text') {
    this.format = format;
  }

  async pass(notice: string, result: DetectionResult): Promise<void> {
    if (this.format === 'json') {
      console.log(JSON.stringify({ ...result, message: notice }, null, 2));
    } else {
      console.log(notice);
    }
  }

  async fail(message: string, result: DetectionResult): Promise<void> {
    if (this.format === 'json') {
      console.log(JSON.stringify({ ...result, message }, null, 2));
    } else {
      console.error(message);
    }
    process.exitCode = 1;
  }
}

/** Commit status on the pull request head, for webhook-driven checks */
export class CommitStatusReporter implements CheckReporter {
  private client: LinkSourceClient;
  private ref: PullRequestRef;
  private sha: string;

  constructor(client: LinkSourceClient, ref: PullRequestRef, sha: string) {
    this.client = client;
    this.ref = ref;
    this.sha = sha;
  }

  async pass(notice: string): Promise<void> {
    await this.setStatus('success', notice);
  }

  async fail(message: string): Promise<void> {
    // First line only; the full instructions go into the PR comment.
    await this.setStatus('failure', message.split('\n')[0]);
  }

  private async setStatus(state: CommitState, description: string): Promise<void> {
    await this.client.createCommitStatus(this.ref, this.sha, state, description);
    log.info({ pr: this.ref.number, sha: this.sha, state }, 'Commit status set');
  }
}

export interface ReportOptions {
  reporter: CheckReporter;
  client: LinkSourceClient;
  comment: boolean;
}

/**
 * Records the outcome. On failure the comment is posted even when recording the
 * result failed; the first error is re-thrown once both steps have run.
 */
export async function reportOutcome(
  result: DetectionResult,
  ref: PullRequestRef,
  opts: ReportOptions,
): Promise<void> {
  if (result.linked) {
    const notice = formatSuccessNotice(result.issues);
    log.info({ pr: ref.number, issues: result.issues, sources: result.sources }, 'PR is linked to issue(s)');
    await opts.reporter.pass(notice, result);
    return;
  }

  log.info({ pr: ref.number }, 'PR is not linked to any issue');
  const errors: unknown[] = [];
  try {
    await opts.reporter.fail(FAILURE_MESSAGE, result);
  } catch (err) {
    log.error({ pr: ref.number, err }, 'Failed to record check failure');
    errors.push(err);
  }

  if (opts.comment) {
    try {
      await opts.client.createComment(ref, MISSING_ISSUE_COMMENT);
      log.info({ pr: ref.number }, 'Posted missing linked issue comment');
    } catch (err) {
      log.error({ pr: ref.number, err }, 'Failed to post missing linked issue comment');
      errors.push(err);
    }
  }

  if (errors.length > 0) throw errors[0];
}
