/**
 * issue-link-guard — requires every pull request to be linked to an issue
 *
 * Detection pipeline:
 * 1. Scan PR title + description for issue references
 * 2. Ask GitHub's GraphQL API which issues the PR will close
 * 3. If that query fails, replay the PR timeline's connected/disconnected events
 * 4. Pass with a notice, or fail with instructions and a PR comment
 */

export { LinkedIssueDetector } from './core/detector';
export { GitHubClient } from './core/github';
export { scanText, findIssueReferences, ISSUE_PATTERNS } from './core/text-scanner';
export { foldConnectionState, hasActiveConnection, parseTimelineEvents } from './core/timeline';
export { mapClosingIssues, CLOSING_ISSUES_QUERY } from './core/graphql';
export {
  reportOutcome,
  formatSuccessNotice,
  ActionsReporter,
  ConsoleReporter,
  CommitStatusReporter,
  FAILURE_MESSAGE,
  MISSING_ISSUE_COMMENT,
} from './core/reporter';
export type { CheckReporter } from './core/reporter';
export { runLinkCheck } from './core/runner';
export type {
  PullRequestRef,
  PullRequestContext,
  ClosingIssue,
  TimelineEvent,
  DetectionResult,
  LinkSourceClient,
  QueryResult,
} from './core/types';
