/**
 * Runtime configuration read from environment variables
 *
 * Variables:
 * - CUSTODIAN_ROOT            root of all case directories (default ~/forensics)
 * - CUSTODIAN_CASE_WIDTH      zero-padding width of case numbers (default 3)
 * - CUSTODIAN_ORPHAN_POLICY   quarantine | delete | retain (default quarantine)
 * - CUSTODIAN_CONCURRENCY     batch worker count (default 1)
 * - CUSTODIAN_ECHO_LOG        echo audit entries to the console (default true)
 * - CUSTODIAN_S3_BUCKET       upload bucket; upload is disabled when unset
 * - CUSTODIAN_S3_REGION       upload region (default us-east-1)
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z, booleanFlag, parseOrThrow } from './utils/schema.js';
import { Errors } from './errors.js';
import { BATCH_LIMITS, CASE_DEFAULTS } from './constants.js';

/**
 * What to do with a stored copy whose digest could not be persisted
 */
export const ORPHAN_POLICIES = ['quarantine', 'delete', 'retain'] as const;
export type OrphanPolicy = (typeof ORPHAN_POLICIES)[number];

export const CustodianEnvSchema = z.object({
  CUSTODIAN_ROOT: z.string().trim().min(1).optional(),
  CUSTODIAN_CASE_WIDTH: z.coerce.number().int().min(1).max(12).default(CASE_DEFAULTS.NUMBER_WIDTH),
  CUSTODIAN_ORPHAN_POLICY: z.enum(ORPHAN_POLICIES).default('quarantine'),
  CUSTODIAN_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(BATCH_LIMITS.MIN_CONCURRENCY)
    .max(BATCH_LIMITS.MAX_CONCURRENCY)
    .default(BATCH_LIMITS.MIN_CONCURRENCY),
  CUSTODIAN_ECHO_LOG: booleanFlag.default('true'),
  CUSTODIAN_S3_BUCKET: z.string().trim().min(1).optional(),
  CUSTODIAN_S3_REGION: z.string().trim().min(1).default('us-east-1'),
});

/**
 * Resolved configuration
 */
export interface CustodianConfig {
  /** Directory holding one sub-directory per case */
  rootDir: string;
  caseNumberWidth: number;
  orphanPolicy: OrphanPolicy;
  concurrency: number;
  echoLog: boolean;
  upload?: {
    bucket: string;
    region: string;
  };
}

/**
 * Build configuration from an environment map
 * @param env - Environment variables (defaults to process.env)
 * @throws CustodianError CONFIGURATION_ERROR listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): CustodianConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('CUSTODIAN_') && value !== '')
  );

  const parsed = parseOrThrow(CustodianEnvSchema, present, issues =>
    Errors.configurationError(`Invalid configuration: ${issues.join('; ')}`, { issues })
  );

  return {
    rootDir: parsed.CUSTODIAN_ROOT ?? join(homedir(), CASE_DEFAULTS.ROOT_DIRNAME),
    caseNumberWidth: parsed.CUSTODIAN_CASE_WIDTH,
    orphanPolicy: parsed.CUSTODIAN_ORPHAN_POLICY,
    concurrency: parsed.CUSTODIAN_CONCURRENCY,
    echoLog: parsed.CUSTODIAN_ECHO_LOG,
    upload: parsed.CUSTODIAN_S3_BUCKET
      ? { bucket: parsed.CUSTODIAN_S3_BUCKET, region: parsed.CUSTODIAN_S3_REGION }
      : undefined,
  };
}
