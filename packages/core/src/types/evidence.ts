/**
 * Evidence types shared by the store, the ledger and downstream consumers
 */

import type { CustodianError, ErrorCode } from '../errors.js';

/**
 * Coarse media category derived from the file extension
 */
export type FileCategory = 'image' | 'video' | 'document' | 'archive' | 'unknown';

export const FILE_CATEGORIES: readonly FileCategory[] = [
  'image',
  'video',
  'document',
  'archive',
  'unknown',
];

/**
 * Filesystem metadata of an evidence file
 */
export interface FileDescriptor {
  /** Base name including extension */
  readonly filename: string;
  /** Size in bytes */
  readonly size: number;
  /** Size in MiB, rounded to 2 decimals (display only) */
  readonly sizeMb: number;
  /** Birth time, or status-change time where the platform has none */
  readonly created: Date;
  /** Last modification time */
  readonly modified: Date;
  /** MIME type hint, "unknown" when the extension is not listed */
  readonly mimeType: string;
  readonly category: FileCategory;
  /** Lower-cased extension with leading dot, or "" */
  readonly extension: string;
}

/**
 * One successfully acquired and hashed evidence file
 */
export interface EvidenceRecord {
  /** Source path as resolved at acquisition */
  readonly originalPath: string;
  /** Absolute path of the stored copy */
  readonly storedPath: string;
  /** Absolute path of the digest file */
  readonly digestPath: string;
  /** Time-prefixed stored file name */
  readonly storedFilename: string;
  readonly originalFilename: string;
  /** SHA-256 of the stored copy, lower-case hex */
  readonly sha256: string;
  /** Metadata of the original file */
  readonly file: FileDescriptor;
  readonly processedAt: Date;
}

/**
 * Reasons a single file can fail the acquisition pipeline
 */
export type ProcessingErrorReason = Extract<
  ErrorCode,
  'SOURCE_NOT_FOUND' | 'CLASSIFICATION_FAILED' | 'COPY_FAILED' | 'HASH_OR_PERSIST_FAILED'
>;

/**
 * Failed pipeline run for one source path
 */
export interface ProcessingFailure {
  sourcePath: string;
  reason: ProcessingErrorReason;
  error: CustodianError;
}

/**
 * What an uploader needs for one record
 */
export interface UploadItem {
  storedPath: string;
  digestPath: string;
  storedFilename: string;
}
