/**
 * Case directory layout
 */

import { access, mkdir } from 'node:fs/promises';
import { constants } from 'node:fs';
import { join } from 'node:path';
import { CASE_DIRECTORIES, CASE_LOG_FILENAME, Errors, toError } from '@custodian/core';
import type { CaseIdentifier, CaseLayout, Clock } from '@custodian/core';
import { createAuditLogger } from '@custodian/audit-logger';

/**
 * Paths of a case under `rootDir`; touches nothing on disk
 */
export function caseLayoutFor(rootDir: string, caseId: CaseIdentifier): CaseLayout {
  const root = join(rootDir, caseId.directoryName);
  const logsDir = join(root, CASE_DIRECTORIES.LOGS);

  return {
    root,
    evidenceDir: join(root, CASE_DIRECTORIES.EVIDENCE),
    hashesDir: join(root, CASE_DIRECTORIES.HASHES),
    logsDir,
    reportsDir: join(root, CASE_DIRECTORIES.REPORTS),
    quarantineDir: join(root, CASE_DIRECTORIES.QUARANTINE),
    logFile: join(logsDir, CASE_LOG_FILENAME),
  };
}

/**
 * Create the case directories (idempotent) and record it in the case log.
 * The quarantine directory is created on first use.
 * @throws CustodianError CASE_LAYOUT_MISSING when a directory cannot be created
 */
export async function provisionCaseLayout(
  rootDir: string,
  caseId: CaseIdentifier,
  options: { clock?: Clock } = {}
): Promise<CaseLayout> {
  const layout = caseLayoutFor(rootDir, caseId);

  for (const dir of [layout.evidenceDir, layout.hashesDir, layout.logsDir, layout.reportsDir]) {
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw Errors.caseLayoutMissing(dir, toError(error));
    }
  }

  const audit = createAuditLogger(layout.logFile, { clock: options.clock });
  await audit.info(`Folders created: ${layout.root}`);
  await audit.close();

  return layout;
}

/**
 * Check the directories acquisition writes to
 * @throws CustodianError CASE_LAYOUT_MISSING naming the first unusable directory
 */
export async function assertCaseLayout(layout: CaseLayout): Promise<void> {
  for (const dir of [layout.evidenceDir, layout.hashesDir, layout.logsDir]) {
    try {
      await access(dir, constants.W_OK);
    } catch (error) {
      throw Errors.caseLayoutMissing(dir, toError(error));
    }
  }
}
