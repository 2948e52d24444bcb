/**
 * Case Session Types
 */

import type {
  CaseInfo,
  CaseLayout,
  Clock,
  EvidenceRecord,
  FileCategory,
  OrphanPolicy,
  ProcessingFailure,
} from '@custodian/core';
import { BATCH_LIMITS, STORE_DEFAULTS, systemClock } from '@custodian/core';
import type { AuditLogger, AuditTransport } from '@custodian/audit-logger';

/**
 * Case session configuration
 */
export interface CaseSessionConfig {
  /** Time source for log lines, stored names and record timestamps */
  clock?: Clock;
  /** What to do with a stored copy that never reaches the ledger */
  orphanPolicy?: OrphanPolicy;
  /** Default batch worker count */
  concurrency?: number;
  /** Counter suffixes the store tries for a taken name */
  maxNameAttempts?: number;
  /** Extra audit transports next to the case log file (e.g. console echo) */
  transports?: AuditTransport[];
}

/**
 * Default configuration
 */
export const DEFAULT_SESSION_CONFIG: Required<CaseSessionConfig> = {
  clock: systemClock,
  orphanPolicy: 'quarantine',
  concurrency: BATCH_LIMITS.MIN_CONCURRENCY,
  maxNameAttempts: STORE_DEFAULTS.MAX_NAME_ATTEMPTS,
  transports: [],
};

/**
 * Options for opening a case session
 */
export interface OpenCaseSessionOptions {
  caseInfo: CaseInfo;
  layout: CaseLayout;
  config?: CaseSessionConfig;
  /** Use this audit logger instead of one over the case log file */
  audit?: AuditLogger;
}

/**
 * Per-call batch options
 */
export interface BatchOptions {
  /** Worker count for this batch (clamped to 1-16) */
  concurrency?: number;
  /** Called after each record enters the ledger */
  onRecord?: (record: EvidenceRecord) => void;
  /** Called after each failed file */
  onFailure?: (failure: ProcessingFailure) => void;
}

/**
 * Outcome of a batch
 */
export interface BatchResult {
  /** The whole ledger after the batch */
  records: readonly EvidenceRecord[];
  /** Records added by this batch, in completion order */
  processed: EvidenceRecord[];
  failures: ProcessingFailure[];
  failureCount: number;
}

/**
 * Files of one category in a summary
 */
export interface CategoryCount {
  category: FileCategory;
  count: number;
  /** Share of all files, 0-100 */
  percentage: number;
}

/**
 * Numbered line of the evidence summary
 */
export interface EvidenceSummaryEntry {
  /** 1-based evidence number (ledger order) */
  number: number;
  originalFilename: string;
  storedFilename: string;
  sizeMb: number;
  category: FileCategory;
  sha256: string;
}

/**
 * Aggregate view of the ledger
 */
export interface EvidenceSummary {
  totalFiles: number;
  /** Sum of per-file MiB sizes, rounded to 2 decimals */
  totalSizeMb: number;
  /** In order of first appearance in the ledger */
  categories: CategoryCount[];
  entries: EvidenceSummaryEntry[];
}

/**
 * Result of re-checking one stored copy
 */
export type IntegrityStatus = 'intact' | 'tampered' | 'missing';

export interface IntegrityCheck {
  status: IntegrityStatus;
  digestPath: string;
  storedPath?: string;
  storedFilename?: string;
  /** Digest recorded at acquisition */
  expected?: string;
  /** Digest of the stored copy now */
  actual?: string;
  /** Why the check did not pass */
  detail?: string;
}

export interface IntegrityReport {
  checkedAt: Date;
  checks: IntegrityCheck[];
  intact: number;
  tampered: number;
  missing: number;
  /** True when every check is intact */
  passed: boolean;
}
