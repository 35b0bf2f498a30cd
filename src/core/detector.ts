/**
 * LinkedIssueDetector — decides whether a pull request is linked to an issue.
 *
 * 1. Text scan of title + body (always)
 * 2. GraphQL closing issue references (always)
 * 3. Timeline connected/disconnected events (only when step 2 throws)
 *
 * Findings of 1 and 2 are unioned. The timeline only sets the flag; it never adds
 * issue numbers, so a timeline-only link reports an empty issue list.
 */

import { scanText } from './text-scanner';
import { connectedIssueIds, foldConnectionState } from './timeline';
import type {
  ClosingIssue,
  DetectionResult,
  LinkSource,
  LinkSourceClient,
  PullRequestContext,
  PullRequestRef,
  QueryResult,
} from './types';
import { createLogger } from './logger';

const log = createLogger('detector');

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class LinkedIssueDetector {
  private client: LinkSourceClient;

  constructor(client: LinkSourceClient) {
    this.client = client;
  }

  async detect(pr: PullRequestContext): Promise<DetectionResult> {
    const issues = new Set<string>();
    const sources: LinkSource[] = [];

    const fromText = scanText(pr.title, pr.body);
    if (fromText.size > 0) {
      for (const issue of fromText) issues.add(issue);
      sources.push('text');
      log.info({ pr: pr.number, issues: [...fromText] }, 'Found issue references in PR text');
    }

    let fallbackUsed = false;
    const query = await this.queryClosingIssues(pr);
    if (query.ok) {
      if (query.value.length > 0) {
        const numbers = query.value.map(issue => issue.number.toString());
        for (const issue of numbers) issues.add(issue);
        sources.push('graphql');
        log.info({ pr: pr.number, count: numbers.length, issues: numbers }, 'Found linked issues via GitHub API');
      }
    } else {
      log.warn({ pr: pr.number, err: query.error }, 'Could not fetch linked issues via GraphQL');
      fallbackUsed = true;
      if (await this.scanTimeline(pr)) {
        sources.push('timeline');
      }
    }

    return {
      linked: sources.length > 0,
      issues: [...issues],
      sources,
      fallbackUsed,
    };
  }

  /** Closing issue references, or the error that should trigger the fallback */
  async queryClosingIssues(ref: PullRequestRef): Promise<QueryResult<ClosingIssue[]>> {
    try {
      return { ok: true, value: await this.client.fetchClosingIssues(ref) };
    } catch (err) {
      return { ok: false, error: toError(err) };
    }
  }

  /**
   * True when at least one issue is connected after replaying the timeline.
   * A failed fetch is logged and counts as no evidence either way.
   */
  async scanTimeline(ref: PullRequestRef): Promise<boolean> {
    try {
      const events = await this.client.listTimelineEvents(ref);
      const connected = connectedIssueIds(foldConnectionState(events));
      if (connected.length > 0) {
        log.info({ pr: ref.number, issueIds: connected }, 'Found currently linked issues via timeline events fallback');
        return true;
      }
      log.info({ pr: ref.number }, 'No currently linked issues in timeline events');
      return false;
    } catch (err) {
      log.warn({ pr: ref.number, err }, 'Could not fetch timeline events');
      return false;
    }
  }
}
