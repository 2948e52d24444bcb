/**
 * Type exports for @custodian/core
 */

export type {
  CaseIdentifier,
  CaseInfo,
  CaseLayout,
} from './case.js';

export type {
  FileCategory,
  FileDescriptor,
  EvidenceRecord,
  ProcessingErrorReason,
  ProcessingFailure,
  UploadItem,
} from './evidence.js';

export { FILE_CATEGORIES } from './evidence.js';
