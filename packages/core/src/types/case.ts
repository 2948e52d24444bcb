/**
 * Case-level types
 */

/**
 * Normalized case identifier, fixed for the lifetime of a session
 */
export interface CaseIdentifier {
  /** Zero-padded case number (e.g. "005") */
  readonly number: string;
  /** Directory name under the case root (e.g. "case_005") */
  readonly directoryName: string;
}

/**
 * Intake metadata collected before acquisition starts
 */
export interface CaseInfo {
  caseId: CaseIdentifier;
  investigator: string;
  victim?: string;
  suspect?: string;
  crimeType?: string;
}

/**
 * On-disk layout of a single case
 */
export interface CaseLayout {
  /** Case base directory */
  root: string;
  /** Stored evidence copies */
  evidenceDir: string;
  /** Digest files */
  hashesDir: string;
  /** Audit log directory */
  logsDir: string;
  /** Generated reports */
  reportsDir: string;
  /** Stored copies that never made it into the ledger */
  quarantineDir: string;
  /** The case audit log resource */
  logFile: string;
}
