import { z } from 'zod';
import type { Group } from '../types/index.js';
import { InvalidInputFormatError } from './errorUtils.js';

const groupSchema = z.array(z.string());
const groupListSchema = z.array(groupSchema);

function describeIssue(issue: z.ZodIssue, source: string): string {
  const [groupIndex] = issue.path;
  if (issue.path.length === 0) return `Expected a list of groups in ${source}`;
  if (issue.path.length === 1) return `Group ${String(groupIndex)} in ${source} is not a list`;
  return `All group members in ${source} must be strings`;
}

/**
 * Validates decoded group data (a list of lists of strings).
 * @param source Label used in error messages, usually a file path.
 * @throws InvalidInputFormatError listing every problem, first one as the message.
 */
export function parseGroups(data: unknown, source: string): Group[] {
  const parsed = groupListSchema.safeParse(data);
  if (parsed.success) return parsed.data;

  const issues: string[] = [];
  for (const issue of parsed.error.issues) {
    const msg = describeIssue(issue, source);
    if (!issues.includes(msg)) issues.push(msg);
  }
  throw new InvalidInputFormatError(issues);
}
