/**
 * @custodian/core
 *
 * Data model, errors, digest engine and configuration shared by every Custodian package.
 */

// Types
export * from './types/index.js';

// Errors
export {
  CustodianError,
  Errors,
  isCustodianError,
  toCustodianError,
  toError,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Result values
export { ok, fail } from './result.js';
export type { Result, Success, Failure } from './result.js';

// Utilities
export * from './utils/index.js';

// Configuration
export { loadConfig, CustodianEnvSchema, ORPHAN_POLICIES } from './config.js';
export type { CustodianConfig, OrphanPolicy } from './config.js';

// Constants
export {
  CASE_DEFAULTS,
  CASE_DIRECTORIES,
  CASE_LOG_FILENAME,
  STORE_DEFAULTS,
  BYTES_PER_MIB,
  BATCH_LIMITS,
  PRODUCT_NAME,
} from './constants.js';
