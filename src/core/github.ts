/**
 * GitHubClient — the only module that talks to GitHub.
 * REST for pull request metadata, timeline, comments and statuses; GraphQL for
 * closing issue references.
 */

import { Octokit } from '@octokit/rest';
import { graphql } from '@octokit/graphql';
import { CLOSING_ISSUES_LIMIT, CLOSING_ISSUES_QUERY, mapClosingIssues } from './graphql';
import { parseTimelineEvents } from './timeline';
import type {
  ClosingIssue,
  CommitState,
  LinkSourceClient,
  PullRequestContext,
  PullRequestRef,
  TimelineEvent,
} from './types';
import { createLogger } from './logger';

const log = createLogger('github');

export const STATUS_CONTEXT = 'linked-issue';
export const MAX_STATUS_DESCRIPTION = 140;

export class GitHubClient implements LinkSourceClient {
  private octokit: Octokit;
  private graphqlClient: typeof graphql;

  constructor(token: string) {
    this.octokit = new Octokit({ auth: token, request: { timeout: 15000 } });
    this.graphqlClient = graphql.defaults({
      headers: { authorization: `token ${token}` },
    });
  }

  async getPullRequest(ref: PullRequestRef): Promise<PullRequestContext> {
    const { data } = await this.octokit.rest.pulls.get({
      owner: ref.owner,
      repo: ref.repo,
      pull_number: ref.number,
    });
    return { ...ref, title: data.title ?? '', body: data.body ?? null };
  }

  async fetchClosingIssues(ref: PullRequestRef): Promise<ClosingIssue[]> {
    const data = await this.graphqlClient<unknown>(CLOSING_ISSUES_QUERY, {
      owner: ref.owner,
      repo: ref.repo,
      number: ref.number,
      first: CLOSING_ISSUES_LIMIT,
    });
    return mapClosingIssues(data);
  }

  async listTimelineEvents(ref: PullRequestRef): Promise<TimelineEvent[]> {
    const events = await this.octokit.paginate(this.octokit.rest.issues.listEventsForTimeline, {
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.number,
      per_page: 100,
    });
    log.debug({ pr: ref.number, count: events.length }, 'Fetched timeline events');
    return parseTimelineEvents(events);
  }

  async createComment(ref: PullRequestRef, body: string): Promise<void> {
    await this.octokit.rest.issues.createComment({
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.number,
      body,
    });
  }

  async createCommitStatus(ref: PullRequestRef, sha: string, state: CommitState, description: string): Promise<void> {
    await this.octokit.rest.repos.createCommitStatus({
      owner: ref.owner,
      repo: ref.repo,
      sha,
      state,
      context: STATUS_CONTEXT,
      description: truncate(description, MAX_STATUS_DESCRIPTION),
    });
  }
}

/** Cuts by code point so a surrogate pair is never split */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return `${chars.slice(0, max - 1).join('')}…`;
}
