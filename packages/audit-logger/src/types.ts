/**
 * Audit Logger Types
 *
 * Types for the append-only chain-of-custody trail of a case.
 */

import type { Clock } from '@custodian/core';

/**
 * Audit entry severity levels
 */
export type AuditSeverity = 'info' | 'error';

/**
 * A single audit entry
 */
export interface AuditEntry {
  /** When the entry was written */
  timestamp: Date;
  /** Text after the timestamp, including the "ERROR: " prefix for errors */
  message: string;
  severity: AuditSeverity;
}

/**
 * Audit log transport interface
 */
export interface AuditTransport {
  /** Transport name */
  readonly name: string;
  /** Whether a failed write must fail the append (durable trails) */
  readonly required: boolean;
  /** Write an entry to the transport */
  write(entry: AuditEntry): Promise<void>;
  /** Release any resources */
  close(): Promise<void>;
}

/**
 * Audit logger configuration
 */
export interface AuditLoggerConfig {
  /** Time source for entry timestamps (default: system clock) */
  clock?: Clock;
  /** Transports attached at construction */
  transports?: AuditTransport[];
}

/**
 * Audit statistics
 */
export interface AuditStats {
  /** Total entries appended */
  totalEntries: number;
  /** Entries by severity */
  bySeverity: Record<AuditSeverity, number>;
  /** Time range of appended entries */
  timeRange?: {
    first: Date;
    last: Date;
  };
}

/**
 * Contents of an audit log file read back from disk
 */
export interface AuditLogContents {
  entries: AuditEntry[];
  /** 1-based line numbers that did not match the entry format */
  malformedLines: number[];
}

/**
 * Prefix carried by error entries
 */
export const ERROR_PREFIX = 'ERROR: ';
