/**
 * One case from intake to close: provision, acquire, summarize, then the
 * optional integrity check, report and upload.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Errors, normalizeCaseNumber, systemClock } from '@custodian/core';
import type { CaseInfo, CaseLayout, Clock, CustodianConfig, EvidenceRecord, ProcessingFailure } from '@custodian/core';
import { createAuditLogger, readAuditLog } from '@custodian/audit-logger';
import type { AuditLogContents, AuditTransport } from '@custodian/audit-logger';
import { createSampleEvidence } from '@custodian/evidence-store';
import {
  assertCaseLayout,
  caseLayoutFor,
  formatIntegrityLine,
  formatIntegritySummary,
  openCaseSession,
  provisionCaseLayout,
  verifyCaseDirectory,
} from '@custodian/case-session';
import type { BatchResult, EvidenceSummary, IntegrityReport } from '@custodian/case-session';
import { writeReport } from '@custodian/report-renderer';
import { S3ObjectStorage, uploadEvidence } from '@custodian/uploader';
import type { ObjectStorage, UploadResult } from '@custodian/uploader';

export interface CaseRunOptions {
  caseNumber: string;
  investigator: string;
  victim?: string;
  suspect?: string;
  crimeType?: string;
  /** Source files in acquisition order */
  files: string[];
  /** Also acquire a generated sample evidence file */
  sample?: boolean;
  verify?: boolean;
  report?: boolean;
  upload?: boolean;
  /** Overrides config.concurrency */
  concurrency?: number;
  config: CustodianConfig;
  clock?: Clock;
  /** Upload target; S3 from config.upload when omitted */
  storage?: ObjectStorage;
  /** Extra audit transports (e.g. console echo) */
  transports?: AuditTransport[];
  onRecord?: (record: EvidenceRecord) => void;
  onFailure?: (failure: ProcessingFailure) => void;
}

export interface CaseRunResult {
  sessionId: string;
  caseInfo: CaseInfo;
  layout: CaseLayout;
  batch: BatchResult;
  summary: EvidenceSummary;
  integrity?: IntegrityReport;
  reportPath?: string;
  upload?: UploadResult;
}

function resolveStorage(options: CaseRunOptions): ObjectStorage | undefined {
  if (!options.upload) return undefined;
  if (options.storage) return options.storage;

  const target = options.config.upload;
  if (!target) {
    throw Errors.configurationError('Upload requested but CUSTODIAN_S3_BUCKET is not set');
  }
  return new S3ObjectStorage(target.bucket, { region: target.region });
}

/**
 * Run a whole case.
 * Per-file failures end up in `batch.failures`; only unrecoverable errors throw.
 */
export async function runCase(options: CaseRunOptions): Promise<CaseRunResult> {
  const { config } = options;
  const clock = options.clock ?? systemClock;

  const caseId = normalizeCaseNumber(options.caseNumber, config.caseNumberWidth);
  const caseInfo: CaseInfo = {
    caseId,
    investigator: options.investigator,
    victim: options.victim,
    suspect: options.suspect,
    crimeType: options.crimeType,
  };
  const storage = resolveStorage(options);

  const layout = await provisionCaseLayout(config.rootDir, caseId, { clock });
  const session = await openCaseSession({
    caseInfo,
    layout,
    config: {
      clock,
      orphanPolicy: config.orphanPolicy,
      concurrency: config.concurrency,
      transports: options.transports ?? [],
    },
  });

  const sampleDir = options.sample ? await mkdtemp(join(tmpdir(), 'custodian-sample-')) : undefined;
  let closed = false;

  try {
    const sources = [...options.files];
    if (sampleDir) {
      sources.push(await createSampleEvidence(sampleDir, clock));
    }

    const batch = await session.processEvidenceFiles(sources, {
      concurrency: options.concurrency,
      onRecord: options.onRecord,
      onFailure: options.onFailure,
    });

    await session.completeCollection();
    const summary = await session.summarize();

    const integrity = options.verify ? await session.verifyLedger() : undefined;
    const reportPath = options.report ? await writeReport(session, { clock, integrity }) : undefined;
    let upload: UploadResult | undefined;
    if (storage) {
      upload = await uploadEvidence(session.uploadManifest(), { storage, caseId, audit: session.audit });
    } else {
      await session.audit.info('Evidence upload skipped: not requested');
    }

    await session.close();
    closed = true;

    return {
      sessionId: session.sessionId,
      caseInfo,
      layout,
      batch,
      summary,
      integrity,
      reportPath,
      upload,
    };
  } finally {
    if (!closed) {
      await session.audit.close();
    }
    if (sampleDir) {
      await rm(sampleDir, { recursive: true, force: true });
    }
  }
}

export interface VerifyCaseOptions {
  caseNumber: string;
  config: CustodianConfig;
  clock?: Clock;
  transports?: AuditTransport[];
}

/**
 * Verify an existing case from its digest files and record the outcome in its audit log
 * @throws CustodianError CASE_LAYOUT_MISSING when the case has not been provisioned
 */
export async function verifyCase(
  options: VerifyCaseOptions
): Promise<{ layout: CaseLayout; report: IntegrityReport }> {
  const clock = options.clock ?? systemClock;
  const caseId = normalizeCaseNumber(options.caseNumber, options.config.caseNumberWidth);
  const layout = caseLayoutFor(options.config.rootDir, caseId);

  await assertCaseLayout(layout);
  const report = await verifyCaseDirectory(layout, clock);

  const audit = createAuditLogger(layout.logFile, { clock, transports: options.transports ?? [] });
  try {
    for (const check of report.checks) {
      const line = formatIntegrityLine(check);
      await (check.status === 'intact' ? audit.info(line) : audit.error(line));
    }
    await audit.info(formatIntegritySummary(report));
  } finally {
    await audit.close();
  }

  return { layout, report };
}

/**
 * Read a case audit log
 * @throws CustodianError INVALID_CASE_NUMBER, or NOT_FOUND when the case has no log
 */
export function readCaseLog(caseNumber: string, config: CustodianConfig): Promise<AuditLogContents> {
  const layout = caseLayoutFor(config.rootDir, normalizeCaseNumber(caseNumber, config.caseNumberWidth));
  return readAuditLog(layout.logFile);
}
