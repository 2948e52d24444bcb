/**
 * Uploader Types
 */

import type { CaseIdentifier, CustodianError } from '@custodian/core';
import type { AuditLogger } from '@custodian/audit-logger';

/**
 * Remote object store
 */
export interface ObjectStorage {
  /** Shown in audit lines, e.g. "s3://bucket" */
  readonly name: string;
  /** Upload a local file under `key` */
  uploadFile(key: string, filePath: string, contentType?: string): Promise<void>;
}

/**
 * Upload options
 */
export interface UploadOptions {
  storage: ObjectStorage;
  caseId: CaseIdentifier;
  /** Case audit log that records the outcome */
  audit?: AuditLogger;
}

/**
 * One record whose evidence and digest files both reached the store
 */
export interface UploadedItem {
  storedFilename: string;
  evidenceKey: string;
  digestKey: string;
}

export interface FailedUpload {
  storedFilename: string;
  error: CustodianError;
}

/**
 * Outcome of an upload run
 */
export interface UploadResult {
  total: number;
  uploaded: UploadedItem[];
  failed: FailedUpload[];
  /** At least one record uploaded and none failed */
  complete: boolean;
}
