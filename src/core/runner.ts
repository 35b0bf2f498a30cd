/**
 * Runs one linked-issue check: fetch the PR, detect, report.
 *
 * A failure to fetch or analyse the PR is reported the same way as a PR without
 * a link; users see one message whatever the cause.
 */

import { LinkedIssueDetector } from './detector';
import { reportOutcome, type CheckReporter } from './reporter';
import type { DetectionResult, LinkSourceClient, PullRequestRef } from './types';
import { createLogger } from './logger';

const log = createLogger('runner');

export interface RunOptions {
  client: LinkSourceClient;
  reporter: CheckReporter;
  comment: boolean;
}

const UNDETERMINED: DetectionResult = {
  linked: false,
  issues: [],
  sources: [],
  fallbackUsed: false,
};

export async function runLinkCheck(ref: PullRequestRef, opts: RunOptions): Promise<DetectionResult> {
  log.info({ repo: `${ref.owner}/${ref.repo}`, pr: ref.number }, 'Checking for linked issue');

  let result: DetectionResult;
  try {
    const pr = await opts.client.getPullRequest(ref);
    result = await new LinkedIssueDetector(opts.client).detect(pr);
  } catch (err) {
    log.error({ pr: ref.number, err }, 'Linked issue detection failed');
    result = { ...UNDETERMINED };
  }

  await reportOutcome(result, ref, opts);
  return result;
}
