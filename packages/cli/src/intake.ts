/**
 * YAML intake files for `custodian run`
 *
 * ```yaml
 * case: "5"
 * investigator: Det. Example
 * crimeType: fraud
 * files:
 *   - ./evidence/photo.jpg
 * report: true
 * ```
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { parse } from 'yaml';
import {
  BATCH_LIMITS,
  Errors,
  nonEmptyString,
  parseOrThrow,
  toError,
  z,
} from '@custodian/core';

export const IntakeSchema = z
  .object({
    case: z.union([nonEmptyString, z.number().int().nonnegative().transform(String)]),
    investigator: nonEmptyString,
    victim: nonEmptyString.optional(),
    suspect: nonEmptyString.optional(),
    crimeType: nonEmptyString.optional(),
    files: z.array(nonEmptyString).default([]),
    sample: z.boolean().default(false),
    verify: z.boolean().default(false),
    report: z.boolean().default(false),
    upload: z.boolean().default(false),
    concurrency: z
      .number()
      .int()
      .min(BATCH_LIMITS.MIN_CONCURRENCY)
      .max(BATCH_LIMITS.MAX_CONCURRENCY)
      .optional(),
  })
  .strict()
  .refine(intake => intake.files.length > 0 || intake.sample, {
    message: 'List at least one file or set sample: true',
    path: ['files'],
  });

export type Intake = z.output<typeof IntakeSchema>;

/**
 * Validate a parsed intake document. Relative file paths resolve against `baseDir`.
 * @throws CustodianError INVALID_INTAKE listing every issue
 */
export function parseIntake(document: unknown, baseDir: string): Intake {
  const intake = parseOrThrow(IntakeSchema, document, issues =>
    Errors.invalidIntake(`Invalid intake: ${issues.join('; ')}`, { issues })
  );
  return {
    ...intake,
    files: intake.files.map(file => (isAbsolute(file) ? file : resolve(baseDir, file))),
  };
}

/**
 * Read and validate an intake file
 */
export async function loadIntake(filePath: string): Promise<Intake> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw Errors.invalidIntake(`Cannot read intake file ${filePath}: ${toError(error).message}`);
  }

  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    throw Errors.invalidIntake(`Intake file ${filePath} is not valid YAML: ${toError(error).message}`);
  }

  return parseIntake(document, dirname(resolve(filePath)));
}
