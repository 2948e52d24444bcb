/**
 * @custodian/case-session
 *
 * Case layout, evidence ledger and the per-case acquisition workflow.
 */

// Types
export type {
  CaseSessionConfig,
  OpenCaseSessionOptions,
  BatchOptions,
  BatchResult,
  CategoryCount,
  EvidenceSummary,
  EvidenceSummaryEntry,
  IntegrityStatus,
  IntegrityCheck,
  IntegrityReport,
} from './types.js';

export { DEFAULT_SESSION_CONFIG } from './types.js';

// Layout
export { caseLayoutFor, provisionCaseLayout, assertCaseLayout } from './layout.js';

// Ledger
export { EvidenceLedger } from './ledger.js';

// Session
export { CaseSession, openCaseSession } from './session.js';

// Summary
export { summarizeEvidence, formatSummaryLine } from './summary.js';

// Integrity
export {
  verifyRecord,
  verifyDigestFile,
  verifyCaseDirectory,
  buildIntegrityReport,
  formatIntegrityLine,
  formatIntegritySummary,
} from './integrity.js';
