/**
 * @custodian/uploader
 *
 * Copies a case's stored evidence and digest files to object storage.
 */

export type {
  ObjectStorage,
  UploadOptions,
  UploadResult,
  UploadedItem,
  FailedUpload,
} from './types.js';

export { MemoryObjectStorage, S3ObjectStorage } from './storage.js';
export { uploadEvidence, evidenceKeyFor, digestKeyFor } from './upload.js';
