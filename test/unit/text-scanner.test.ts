import { findIssueReferences, scanText, ISSUE_PATTERNS } from '../../src/core/text-scanner';

describe('scanText', () => {
  it('finds a closing keyword reference in the body', () => {
    expect(scanText('Update docs', 'Fixes #123')).toEqual(new Set(['123']));
  });

  it('finds bare references in the title', () => {
    const issues = scanText('Addresses #5 and #7', '');
    expect(issues).toEqual(new Set(['5', '7']));
    expect([...issues]).toEqual(['5', '7']);
  });

  it('finds a closing keyword followed by an issue URL', () => {
    expect(scanText('Cleanup', 'Resolves https://github.com/acme/widgets/issues/88')).toEqual(new Set(['88']));
  });

  it('finds "issue N" without a hash', () => {
    expect(scanText('Related to issue 42', '')).toEqual(new Set(['42']));
  });

  it('matches keywords case-insensitively', () => {
    expect(scanText('', 'CLOSES #10')).toEqual(new Set(['10']));
  });

  it('deduplicates numbers found by several patterns', () => {
    const issues = scanText('Fixes #12', 'Closes #12 and issue 12');
    expect(issues.size).toBe(1);
    expect(issues.has('12')).toBe(true);
  });

  it('counts a bare reference without a closing keyword', () => {
    expect(scanText('Bump version, see #300 for context', null)).toEqual(new Set(['300']));
  });

  it('returns an empty set for empty title and body', () => {
    expect(scanText('', '')).toEqual(new Set());
  });

  it('treats missing title and body as empty', () => {
    expect(scanText(undefined, null)).toEqual(new Set());
  });

  it('returns an empty set when nothing references an issue', () => {
    expect(scanText('feat: add retry option', 'Adds a retry option to the HTTP client.')).toEqual(new Set());
  });

  it('is stable across repeated scans', () => {
    const first = scanText('Fixes #1', 'see #2');
    const second = scanText('Fixes #1', 'see #2');
    expect(second).toEqual(first);
  });
});

describe('findIssueReferences', () => {
  it('reports matches in pattern order', () => {
    expect(findIssueReferences('Fixes #3, see issue 4')).toEqual([
      { issue: '3', pattern: 'closing-keyword' },
      { issue: '3', pattern: 'hash-reference' },
      { issue: '4', pattern: 'issue-keyword' },
    ]);
  });

  it('names the URL pattern', () => {
    expect(findIssueReferences('closed https://github.com/o/r/issues/9')).toEqual([
      { issue: '9', pattern: 'closing-keyword-url' },
    ]);
  });

  it('returns nothing for text without references', () => {
    expect(findIssueReferences('refactor: split module')).toEqual([]);
  });

  it('does not carry regex state between calls', () => {
    expect(findIssueReferences('#1')).toHaveLength(1);
    expect(findIssueReferences('#1')).toHaveLength(1);
    expect(ISSUE_PATTERNS.every(p => p.regex.lastIndex === 0)).toBe(true);
  });
});
