/**
 * Utility exports for @custodian/core
 */

// ID utilities
export { generateSessionId } from './id.js';

// Digest engine
export {
  digest,
  digestFile,
  verifyDigest,
  isDigest,
  formatDigestLine,
  parseDigestLine,
  HASH_ALGORITHM,
  DIGEST_FILE_EXTENSION,
  EMPTY_DIGEST,
} from './digest.js';

// Case identifiers
export { parseCaseIdentifier, normalizeCaseNumber } from './case-id.js';

// Time formatting
export {
  formatLogTimestamp,
  formatFileTimestamp,
  parseLogTimestamp,
  systemClock,
} from './time.js';
export type { Clock } from './time.js';

// Schema validation utilities
export {
  validateSchema,
  parseOrThrow,
  formatIssues,
  z,
  nonEmptyString,
  booleanFlag,
} from './schema.js';

// Error utilities
export { formatError, describeCauseChain, systemErrorCode } from './error-helpers.js';
