import type { ZodError } from 'zod';

/** One line per issue: `path: message`, or just the message at the root. */
export function describeIssues(error: ZodError): string[] {
  return error.errors.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
