/**
 * Constants for the Custodian system
 */

/**
 * Case naming and layout
 */
export const CASE_DEFAULTS = {
  /** Minimum width of a case number, zero-padded */
  NUMBER_WIDTH: 3,

  /** Prefix of the per-case directory */
  DIRECTORY_PREFIX: 'case_',

  /** Root directory under the user's home when none is configured */
  ROOT_DIRNAME: 'forensics',
} as const;

/**
 * Sub-directories of a case directory
 */
export const CASE_DIRECTORIES = {
  EVIDENCE: 'evidence',
  HASHES: 'hashes',
  LOGS: 'logs',
  REPORTS: 'reports',
  QUARANTINE: 'quarantine',
} as const;

/**
 * Name of the per-case audit log file inside the logs directory
 */
export const CASE_LOG_FILENAME = 'case_log.txt';

/**
 * Storage behaviour
 */
export const STORE_DEFAULTS = {
  /** How many counter suffixes to try when a stored name is already taken */
  MAX_NAME_ATTEMPTS: 1000,
} as const;

/**
 * Size conversion for display
 */
export const BYTES_PER_MIB = 1024 * 1024;

/**
 * Batch processing limits
 */
export const BATCH_LIMITS = {
  MIN_CONCURRENCY: 1,
  MAX_CONCURRENCY: 16,
} as const;

/**
 * Product name shown in generated reports
 */
export const PRODUCT_NAME = 'Custodian Evidence Integrity System';
