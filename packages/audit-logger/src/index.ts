/**
 * @custodian/audit-logger
 *
 * Append-only, timestamped chain-of-custody log for a case.
 */

// Types
export type {
  AuditSeverity,
  AuditEntry,
  AuditTransport,
  AuditLoggerConfig,
  AuditStats,
  AuditLogContents,
} from './types.js';

export { ERROR_PREFIX } from './types.js';

// Logger
export { AuditLogger, createAuditLogger, createTestAuditLogger } from './logger.js';

// Transports
export { FileTransport, MemoryTransport, ConsoleTransport } from './transports.js';

// Line format and reading
export { formatAuditLine, parseAuditLine, toSingleLine } from './format.js';
export { readAuditLog } from './reader.js';
