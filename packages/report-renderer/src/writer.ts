/**
 * Write a case report into its reports directory
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Errors, formatFileTimestamp, systemClock, toError } from '@custodian/core';
import type { Clock } from '@custodian/core';
import type { CaseSession, IntegrityReport } from '@custodian/case-session';
import { renderReport } from './generator.js';

export interface WriteReportOptions {
  clock?: Clock;
  integrity?: IntegrityReport;
}

export function reportFilenameFor(caseNumber: string, generatedAt: Date): string {
  return `forensic_report_case_${caseNumber}_${formatFileTimestamp(generatedAt)}.html`;
}

/**
 * Render the session's ledger, write it and log the report name
 * @returns Path of the written report
 * @throws CustodianError REPORT_FAILED when the file cannot be written
 */
export async function writeReport(session: CaseSession, options: WriteReportOptions = {}): Promise<string> {
  const generatedAt = (options.clock ?? systemClock)();
  const reportFilename = reportFilenameFor(session.caseId.number, generatedAt);
  const reportPath = join(session.layout.reportsDir, reportFilename);

  const html = renderReport({
    caseInfo: session.caseInfo,
    records: session.exportLedger(),
    generatedAt,
    caseRoot: session.layout.root,
    reportFilename,
    integrity: options.integrity,
  });

  try {
    await writeFile(reportPath, html, { encoding: 'utf8', flag: 'wx' });
  } catch (error) {
    const cause = toError(error);
    await session.audit.error(`Report generation failed: ${cause.message}`);
    throw Errors.reportFailed(`Could not write report ${reportPath}`, cause);
  }

  await session.audit.info(`Forensic report generated: ${reportFilename}`);
  return reportPath;
}
