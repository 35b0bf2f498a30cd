/**
 * Core type definitions for issue-link-guard
 */

export interface PullRequestRef {
  owner: string;
  repo: string;
  number: number;
}

export interface PullRequestContext extends PullRequestRef {
  title: string;
  body: string | null;        // GitHub sends null for an empty description
}

export interface ClosingIssue {
  number: number;
  title: string;
}

export interface TimelineEvent {
  event?: string;
  created_at?: string | null;
  source?: {
    issue?: {
      id: number | string;     // platform-internal id, not the issue number
    } | null;
  } | null;
}

/** Source issue id → currently connected */
export type ConnectionState = Map<string, boolean>;

export type QueryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

export type LinkSource = 'text' | 'graphql' | 'timeline';

export interface DetectionResult {
  linked: boolean;
  issues: string[];           // deduplicated issue numbers, discovery order
  sources: LinkSource[];      // sources that produced evidence of a link
  fallbackUsed: boolean;      // timeline was consulted because the query failed
}

export type CommitState = 'success' | 'failure' | 'pending' | 'error';

/**
 * Everything the detector and runner need from GitHub.
 * Implemented by GitHubClient; tests pass plain objects.
 */
export interface LinkSourceClient {
  getPullRequest(ref: PullRequestRef): Promise<PullRequestContext>;
  fetchClosingIssues(ref: PullRequestRef): Promise<ClosingIssue[]>;
  listTimelineEvents(ref: PullRequestRef): Promise<TimelineEvent[]>;
  createComment(ref: PullRequestRef, body: string): Promise<void>;
  createCommitStatus(ref: PullRequestRef, sha: string, state: CommitState, description: string): Promise<void>;
}

/** Pull request actions that trigger a check */
export const TRIGGER_ACTIONS = ['opened', 'edited', 'synchronize', 'reopened'] as const;

export type TriggerAction = typeof TRIGGER_ACTIONS[number];

export function isTriggerAction(action: string | undefined): action is TriggerAction {
  return TRIGGER_ACTIONS.some(a => a === action);
}
