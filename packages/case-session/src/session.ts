/**
 * Case Session Implementation
 *
 * Owns one case: its identifier, directory layout, audit log, evidence store
 * and ledger. Drives acquire -> hash -> log -> record for each source file.
 */

import { link, mkdir, rm, stat, writeFile } from 'node:fs/promises';
import { join, parse } from 'node:path';
import {
  BATCH_LIMITS,
  DIGEST_FILE_EXTENSION,
  Errors,
  digestFile,
  fail,
  formatDigestLine,
  generateSessionId,
  isCustodianError,
  ok,
  systemErrorCode,
  toError,
} from '@custodian/core';
import type {
  CaseIdentifier,
  CaseInfo,
  CaseLayout,
  EvidenceRecord,
  ProcessingErrorReason,
  ProcessingFailure,
  Result,
  UploadItem,
} from '@custodian/core';
import { createAuditLogger, type AuditLogger } from '@custodian/audit-logger';
import { EvidenceStore, type AcquiredFile } from '@custodian/evidence-store';
import { assertCaseLayout } from './layout.js';
import { EvidenceLedger } from './ledger.js';
import { formatSummaryLine, summarizeEvidence } from './summary.js';
import {
  buildIntegrityReport,
  formatIntegrityLine,
  formatIntegritySummary,
  verifyRecord,
} from './integrity.js';
import type {
  BatchOptions,
  BatchResult,
  CaseSessionConfig,
  EvidenceSummary,
  IntegrityCheck,
  IntegrityReport,
  OpenCaseSessionOptions,
} from './types.js';
import { DEFAULT_SESSION_CONFIG } from './types.js';

const ACQUISITION_REASONS: readonly ProcessingErrorReason[] = [
  'SOURCE_NOT_FOUND',
  'CLASSIFICATION_FAILED',
  'COPY_FAILED',
];

function acquisitionReason(code: string): ProcessingErrorReason {
  return ACQUISITION_REASONS.find(reason => reason === code) ?? 'COPY_FAILED';
}

function clampConcurrency(value: number): number {
  if (!Number.isFinite(value)) return BATCH_LIMITS.MIN_CONCURRENCY;
  return Math.min(
    BATCH_LIMITS.MAX_CONCURRENCY,
    Math.max(BATCH_LIMITS.MIN_CONCURRENCY, Math.floor(value))
  );
}

/**
 * Case Session class
 */
export class CaseSession {
  readonly sessionId: string;
  readonly caseInfo: CaseInfo;
  readonly layout: CaseLayout;
  readonly audit: AuditLogger;

  private config: Required<CaseSessionConfig>;
  private store: EvidenceStore;
  private ledger = new EvidenceLedger();
  private closed = false;

  private constructor(
    caseInfo: CaseInfo,
    layout: CaseLayout,
    audit: AuditLogger,
    config: Required<CaseSessionConfig>
  ) {
    this.sessionId = generateSessionId(config.clock());
    this.caseInfo = caseInfo;
    this.layout = layout;
    this.audit = audit;
    this.config = config;
    this.store = new EvidenceStore({
      clock: config.clock,
      maxNameAttempts: config.maxNameAttempts,
    });
  }

  /**
   * Open a session over an existing case layout and log the case start
   * @throws CustodianError CASE_LAYOUT_MISSING or AUDIT_LOG_UNAVAILABLE
   */
  static async open(options: OpenCaseSessionOptions): Promise<CaseSession> {
    const config: Required<CaseSessionConfig> = {
      ...DEFAULT_SESSION_CONFIG,
      ...options.config,
    };

    await assertCaseLayout(options.layout);

    const audit =
      options.audit ??
      createAuditLogger(options.layout.logFile, {
        clock: config.clock,
        transports: config.transports,
      });

    const session = new CaseSession(options.caseInfo, options.layout, audit, config);
    await session.logStart();
    return session;
  }

  get caseId(): CaseIdentifier {
    return this.caseInfo.caseId;
  }

  /**
   * Number of records in the ledger
   */
  get size(): number {
    return this.ledger.size;
  }

  /**
   * Acquire, hash and record one source file
   * @returns The new ledger record, or the failure (already logged)
   * @throws CustodianError AUDIT_LOG_UNAVAILABLE when the case log cannot be written
   */
  async processEvidenceFile(sourcePath: string): Promise<Result<EvidenceRecord, ProcessingFailure>> {
    const acquired = await this.store.acquire(sourcePath, this.layout.evidenceDir);

    if (!acquired.success) {
      await this.audit.error(acquired.error.message);
      return fail({
        sourcePath,
        reason: acquisitionReason(acquired.error.code),
        error: acquired.error,
      });
    }

    await this.audit.info(`File copied: ${sourcePath} -> ${acquired.data.storedPath}`);
    return this.seal(sourcePath, acquired.data);
  }

  /**
   * Process each path independently; one failure never stops the batch
   * @throws CustodianError AUDIT_LOG_UNAVAILABLE, after in-flight files settle
   */
  async processEvidenceFiles(sourcePaths: string[], options: BatchOptions = {}): Promise<BatchResult> {
    const concurrency = clampConcurrency(options.concurrency ?? this.config.concurrency);
    const processed: EvidenceRecord[] = [];
    const failures: ProcessingFailure[] = [];
    const state: { next: number; fatal?: Error } = { next: 0 };

    const worker = async (): Promise<void> => {
      while (state.fatal === undefined && state.next < sourcePaths.length) {
        const sourcePath = sourcePaths[state.next++];
        try {
          const result = await this.processEvidenceFile(sourcePath);
          if (result.success) {
            processed.push(result.data);
            options.onRecord?.(result.data);
          } else {
            failures.push(result.error);
            options.onFailure?.(result.error);
          }
        } catch (error) {
          state.fatal = toError(error);
        }
      }
    };

    const workerCount = Math.min(concurrency, sourcePaths.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (state.fatal) {
      throw state.fatal;
    }

    return {
      records: this.ledger.records(),
      processed,
      failures,
      failureCount: failures.length,
    };
  }

  /**
   * Log the end of evidence collection
   */
  async completeCollection(): Promise<number> {
    await this.audit.info(`Evidence collection completed. Total files: ${this.ledger.size}`);
    return this.ledger.size;
  }

  /**
   * Summarize the ledger and log the totals
   */
  async summarize(): Promise<EvidenceSummary> {
    const summary = summarizeEvidence(this.ledger.records());
    await this.audit.info(formatSummaryLine(summary));
    return summary;
  }

  /**
   * Re-hash every stored copy and compare with the ledger and digest files
   */
  async verifyLedger(): Promise<IntegrityReport> {
    const checks: IntegrityCheck[] = [];

    for (const record of this.ledger) {
      const check = await verifyRecord(record);
      checks.push(check);
      if (check.status === 'intact') {
        await this.audit.info(formatIntegrityLine(check));
      } else {
        await this.audit.error(formatIntegrityLine(check));
      }
    }

    const report = buildIntegrityReport(checks, this.config.clock());
    await this.audit.info(formatIntegritySummary(report));
    return report;
  }

  /**
   * Read-only records in evidence order
   */
  exportLedger(): readonly EvidenceRecord[] {
    return this.ledger.records();
  }

  /**
   * What an uploader needs per record
   */
  uploadManifest(): UploadItem[] {
    return this.ledger.uploadManifest();
  }

  /**
   * Log the case as completed and release the audit log
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await this.audit.info(`=== CASE ${this.caseId.number} COMPLETED SUCCESSFULLY ===`);
    await this.audit.close();
  }

  // Private helper methods

  private async logStart(): Promise<void> {
    const { caseId, investigator, victim, suspect, crimeType } = this.caseInfo;

    await this.audit.info(`=== CASE ${caseId.number} STARTED ===`);
    await this.audit.info(`Session: ${this.sessionId}`);
    await this.audit.info(`Investigator: ${investigator}`);
    if (victim) await this.audit.info(`Victim: ${victim}`);
    if (suspect) await this.audit.info(`Suspect: ${suspect}`);
    if (crimeType) await this.audit.info(`Crime Type: ${crimeType}`);
  }

  /**
   * Hash the stored copy, persist the digest and append the record.
   * On failure nothing enters the ledger and the copy is handled per orphan policy.
   */
  private async seal(
    sourcePath: string,
    acquired: AcquiredFile
  ): Promise<Result<EvidenceRecord, ProcessingFailure>> {
    const { storedPath, storedFilename, file } = acquired;
    let digestPath: string | undefined;

    try {
      const sha256 = await digestFile(storedPath);
      digestPath = await this.writeDigestFile(storedPath, storedFilename, sha256);
      await this.audit.info(`Hash calculated for ${storedFilename}: ${sha256}`);

      await Promise.all([stat(storedPath), stat(digestPath)]);

      const record: EvidenceRecord = Object.freeze({
        originalPath: sourcePath,
        storedPath,
        digestPath,
        storedFilename,
        originalFilename: file.filename,
        sha256,
        file,
        processedAt: this.config.clock(),
      });

      this.ledger.append(record);
      return ok(record);
    } catch (error) {
      if (isCustodianError(error) && !error.recoverable) {
        throw error;
      }

      const failure = Errors.hashOrPersistFailed(storedPath, toError(error));
      await this.audit.error(failure.message);
      await this.resolveOrphan(acquired, digestPath);

      return fail({ sourcePath, reason: 'HASH_OR_PERSIST_FAILED', error: failure });
    }
  }

  /**
   * Write `{stem}.sha256`, or `{stored name}.sha256` when the stem is taken.
   * Never overwrites an existing digest file.
   */
  private async writeDigestFile(storedPath: string, storedFilename: string, sha256: string): Promise<string> {
    const stem = parse(storedFilename).name;
    const candidates = [...new Set([stem, storedFilename])].map(name =>
      join(this.layout.hashesDir, `${name}${DIGEST_FILE_EXTENSION}`)
    );

    for (const candidate of candidates) {
      try {
        await writeFile(candidate, formatDigestLine(sha256, storedPath), { encoding: 'utf8', flag: 'wx' });
        return candidate;
      } catch (error) {
        if (systemErrorCode(error) === 'EEXIST') continue;
        await rm(candidate, { force: true });
        throw error;
      }
    }

    throw new Error(`Digest file already exists for ${storedFilename}`);
  }

  /**
   * Move a file into quarantine without replacing an earlier orphan of the same name
   * @returns The quarantined path
   */
  private async moveToQuarantine(path: string, name: string): Promise<string> {
    for (let attempt = 0; attempt < this.config.maxNameAttempts; attempt++) {
      const target = join(this.layout.quarantineDir, attempt === 0 ? name : `${attempt}_${name}`);
      try {
        await link(path, target);
      } catch (error) {
        if (systemErrorCode(error) === 'EEXIST') continue;
        throw error;
      }
      await rm(path, { force: true });
      return target;
    }

    throw new Error(`No free quarantine name for ${name}`);
  }

  private async resolveOrphan(acquired: AcquiredFile, digestPath: string | undefined): Promise<void> {
    const { storedPath, storedFilename } = acquired;
    const policy = this.config.orphanPolicy;

    try {
      switch (policy) {
        case 'retain':
          await this.audit.info(`Orphaned copy retained for review: ${storedPath}`);
          return;

        case 'delete':
          await rm(storedPath, { force: true });
          if (digestPath) await rm(digestPath, { force: true });
          await this.audit.info(`Orphaned copy deleted: ${storedPath}`);
          return;

        case 'quarantine': {
          await mkdir(this.layout.quarantineDir, { recursive: true });
          const quarantined = await this.moveToQuarantine(storedPath, storedFilename);
          if (digestPath) {
            await this.moveToQuarantine(digestPath, parse(digestPath).base);
          }
          await this.audit.info(`Orphaned copy quarantined: ${storedPath} -> ${quarantined}`);
          return;
        }
      }
    } catch (error) {
      if (isCustodianError(error) && !error.recoverable) {
        throw error;
      }
      await this.audit.error(`Could not ${policy} orphaned copy ${storedPath}: ${toError(error).message}`);
    }
  }
}

/**
 * Open a case session
 */
export function openCaseSession(options: OpenCaseSessionOptions): Promise<CaseSession> {
  return CaseSession.open(options);
}
