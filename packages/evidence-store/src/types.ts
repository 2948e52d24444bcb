/**
 * Evidence Store Types
 */

import type { Clock, FileCategory, FileDescriptor } from '@custodian/core';
import { STORE_DEFAULTS, systemClock } from '@custodian/core';

/**
 * Entry of the extension table
 */
export interface FileTypeInfo {
  category: FileCategory;
  mimeType: string;
}

/**
 * A source file copied into a case evidence directory
 */
export interface AcquiredFile {
  /** Absolute path of the stored copy */
  storedPath: string;
  /** Time-prefixed name of the stored copy */
  storedFilename: string;
  /** Metadata of the original file */
  file: FileDescriptor;
}

/**
 * Evidence store configuration
 */
export interface EvidenceStoreConfig {
  /** Time source for the stored-name prefix */
  clock?: Clock;
  /** Counter suffixes to try when a stored name is taken */
  maxNameAttempts?: number;
  /** Copy access and modification times onto the stored copy */
  preserveTimestamps?: boolean;
}

/**
 * Default configuration
 */
export const DEFAULT_STORE_CONFIG: Required<EvidenceStoreConfig> = {
  clock: systemClock,
  maxNameAttempts: STORE_DEFAULTS.MAX_NAME_ATTEMPTS,
  preserveTimestamps: true,
};

/**
 * Evidence store statistics
 */
export interface EvidenceStoreStats {
  /** Successful acquisitions */
  acquired: number;
  /** Failed acquisitions */
  failed: number;
  /** Bytes copied into the store */
  bytesCopied: number;
  /** Acquisitions that needed a counter suffix */
  nameCollisions: number;
}
