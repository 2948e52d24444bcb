/**
 * Integrity verification: re-hash stored copies and compare with what was
 * recorded at acquisition.
 */

import { readdir, readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import {
  DIGEST_FILE_EXTENSION,
  Errors,
  digestFile,
  parseDigestLine,
  systemClock,
  systemErrorCode,
  toError,
} from '@custodian/core';
import type { CaseLayout, Clock, EvidenceRecord } from '@custodian/core';
import type { IntegrityCheck, IntegrityReport } from './types.js';

/**
 * Digest of a file, or undefined when it does not exist
 */
async function digestIfPresent(path: string): Promise<string | undefined> {
  try {
    return await digestFile(path);
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') return undefined;
    throw error;
  }
}

async function readIfPresent(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') return undefined;
    throw error;
  }
}

/**
 * Check one ledger record against the store and its digest file
 */
export async function verifyRecord(record: EvidenceRecord): Promise<IntegrityCheck> {
  const base = {
    digestPath: record.digestPath,
    storedPath: record.storedPath,
    storedFilename: record.storedFilename,
    expected: record.sha256,
  };

  const actual = await digestIfPresent(record.storedPath);
  if (actual === undefined) {
    return { ...base, status: 'missing', detail: 'Stored copy not found' };
  }

  const digestText = await readIfPresent(record.digestPath);
  if (digestText === undefined) {
    return { ...base, actual, status: 'missing', detail: 'Digest file not found' };
  }

  if (actual !== record.sha256) {
    return { ...base, actual, status: 'tampered', detail: 'Stored copy does not match recorded digest' };
  }

  const line = parseDigestLine(digestText);
  if (!line || line.sha256 !== record.sha256 || line.path !== record.storedPath) {
    return { ...base, actual, status: 'tampered', detail: 'Digest file does not match record' };
  }

  return { ...base, actual, status: 'intact' };
}

/**
 * Check one digest file on its own. A stored path that no longer exists is
 * looked up by name in `evidenceDir`, so a moved case directory still verifies.
 */
export async function verifyDigestFile(digestPath: string, evidenceDir: string): Promise<IntegrityCheck> {
  const text = await readIfPresent(digestPath);
  if (text === undefined) {
    return { digestPath, status: 'missing', detail: 'Digest file not found' };
  }

  const line = parseDigestLine(text);
  if (!line) {
    return { digestPath, status: 'tampered', detail: 'Digest file is malformed' };
  }

  const candidates = [line.path, join(evidenceDir, basename(line.path))];
  for (const storedPath of candidates) {
    const actual = await digestIfPresent(storedPath);
    if (actual === undefined) continue;

    const check = {
      digestPath,
      storedPath,
      storedFilename: basename(storedPath),
      expected: line.sha256,
      actual,
    };
    return actual === line.sha256
      ? { ...check, status: 'intact' }
      : { ...check, status: 'tampered', detail: 'Stored copy does not match recorded digest' };
  }

  return {
    digestPath,
    storedPath: line.path,
    storedFilename: basename(line.path),
    expected: line.sha256,
    status: 'missing',
    detail: 'Stored copy not found',
  };
}

/**
 * Fold checks into a report
 */
export function buildIntegrityReport(checks: IntegrityCheck[], checkedAt: Date): IntegrityReport {
  const count = (status: IntegrityCheck['status']) => checks.filter(c => c.status === status).length;
  const intact = count('intact');

  return {
    checkedAt,
    checks,
    intact,
    tampered: count('tampered'),
    missing: count('missing'),
    passed: intact === checks.length,
  };
}

/**
 * Verify a case from disk alone, using every digest file in its hashes directory
 * @throws CustodianError CASE_LAYOUT_MISSING when the hashes directory cannot be read
 */
export async function verifyCaseDirectory(
  layout: CaseLayout,
  clock: Clock = systemClock
): Promise<IntegrityReport> {
  let names: string[];
  try {
    names = await readdir(layout.hashesDir);
  } catch (error) {
    throw Errors.caseLayoutMissing(layout.hashesDir, toError(error));
  }

  const digestFiles = names.filter(name => name.endsWith(DIGEST_FILE_EXTENSION)).sort();

  const checks: IntegrityCheck[] = [];
  for (const name of digestFiles) {
    checks.push(await verifyDigestFile(join(layout.hashesDir, name), layout.evidenceDir));
  }

  return buildIntegrityReport(checks, clock());
}

/**
 * Audit line for one check
 */
export function formatIntegrityLine(check: IntegrityCheck): string {
  const subject = check.storedFilename ?? basename(check.digestPath);
  if (check.status === 'intact') {
    return `Integrity verified: ${subject}`;
  }
  return `Integrity check failed for ${subject}: ${check.status}${check.detail ? ` (${check.detail})` : ''}`;
}

/**
 * Audit line for a whole report
 */
export function formatIntegritySummary(report: IntegrityReport): string {
  return `Integrity check: ${report.intact} intact, ${report.tampered} tampered, ${report.missing} missing`;
}
