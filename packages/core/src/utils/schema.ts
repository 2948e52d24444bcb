/**
 * Zod helpers shared by configuration, intake files and data tables
 */

import { z, type ZodIssue, type ZodTypeAny } from 'zod';
import type { CustodianError } from '../errors.js';
import { fail, ok, type Result } from '../result.js';

/**
 * One "path: message" line per issue; root-level issues carry no path
 */
export function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Parse `data`, collecting every issue instead of stopping at the first
 */
export function validateSchema<S extends ZodTypeAny>(
  schema: S,
  data: unknown
): Result<z.output<S>, string[]> {
  const parsed = schema.safeParse(data);
  return parsed.success ? ok(parsed.data) : fail(formatIssues(parsed.error.issues));
}

/**
 * Like {@link validateSchema}, but throws the error built from the issue list
 */
export function parseOrThrow<S extends ZodTypeAny>(
  schema: S,
  data: unknown,
  onInvalid: (issues: string[]) => CustodianError
): z.output<S> {
  const result = validateSchema(schema, data);
  if (!result.success) {
    throw onInvalid(result.error);
  }
  return result.data;
}

export { z };

export const nonEmptyString = z.string().trim().min(1);

/**
 * Boolean written as an environment variable
 */
export const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');
