/**
 * GitHub GraphQL query for the issues a pull request will close on merge,
 * and the response mapper.
 */

import { z } from 'zod';
import type { ClosingIssue } from './types';

export const CLOSING_ISSUES_LIMIT = 10;

export const CLOSING_ISSUES_QUERY = `
  query($owner: String!, $repo: String!, $number: Int!, $first: Int!) {
    repository(owner: $owner, name: $repo) {
      pullRequest(number: $number) {
        closingIssuesReferences(first: $first) {
          nodes {
            number
            title
          }
        }
      }
    }
  }
`;

const closingIssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
});

// repository and pullRequest are required: a null there is a failed query,
// not an empty result.
const closingIssuesResponseSchema = z.object({
  repository: z.object({
    pullRequest: z.object({
      closingIssuesReferences: z.object({
        nodes: z.array(closingIssueSchema.nullable()).nullable(),
      }),
    }),
  }),
});

/**
 * Maps a raw GraphQL response to the closing issue list.
 * Throws a ZodError when the response does not have the expected shape.
 */
export function mapClosingIssues(data: unknown): ClosingIssue[] {
  const parsed = closingIssuesResponseSchema.parse(data);
  const nodes = parsed.repository.pullRequest.closingIssuesReferences.nodes ?? [];
  return nodes.filter((n): n is ClosingIssue => n !== null);
}
