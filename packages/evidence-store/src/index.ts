/**
 * @custodian/evidence-store
 *
 * File classification and acquisition of evidence copies into a case store.
 */

// Types
export type {
  AcquiredFile,
  EvidenceStoreConfig,
  EvidenceStoreStats,
  FileTypeInfo,
} from './types.js';

export { DEFAULT_STORE_CONFIG } from './types.js';

// Classifier
export { classify, describeFile, toMebibytes } from './classifier.js';
export { lookupFileType, extensionsFor } from './file-types.js';

// Store
export { EvidenceStore, createEvidenceStore, storedFilenameFor } from './store.js';

// Sample evidence
export { createSampleEvidence, sampleEvidenceContent, SAMPLE_EVIDENCE_FILENAME } from './sample.js';
