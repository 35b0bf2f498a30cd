/**
 * Text Scanner — finds issue references in a pull request's title and description.
 *
 * Purely textual: a captured number is never checked against the issue tracker.
 * The bare `#N` pattern also counts references that do not close anything.
 */

export interface IssuePattern {
  name: string;
  regex: RegExp;
}

export interface IssueMatch {
  issue: string;
  pattern: string;
}

// Evaluated in order against the whole text; not mutually exclusive.
export const ISSUE_PATTERNS: readonly IssuePattern[] = [
  {
    name: 'closing-keyword',
    regex: /(?:close[sd]?|fix(?:e[sd])?|resolve[sd]?)\s+#(\d+)/gi,
  },
  {
    name: 'closing-keyword-url',
    regex: /(?:close[sd]?|fix(?:e[sd])?|resolve[sd]?)\s+(?:https?:\/\/github\.com\/[^/]+\/[^/]+\/issues\/)(\d+)/gi,
  },
  {
    name: 'hash-reference',
    regex: /#(\d+)/g,
  },
  {
    name: 'issue-keyword',
    regex: /(?:issue|issues)\s+#?(\d+)/gi,
  },
];

/** Every pattern match in `text`, in pattern order then position order */
export function findIssueReferences(text: string): IssueMatch[] {
  const matches: IssueMatch[] = [];
  for (const { name, regex } of ISSUE_PATTERNS) {
    for (const match of text.matchAll(regex)) {
      const issue = match[1];
      if (issue) matches.push({ issue, pattern: name });
    }
  }
  return matches;
}

/** Issue numbers referenced by the title and body, deduplicated */
export function scanText(title: string | null | undefined, body: string | null | undefined): Set<string> {
  const text = `${title ?? ''} ${body ?? ''}`;
  return new Set(findIssueReferences(text).map(m => m.issue));
}
