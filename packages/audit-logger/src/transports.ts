/**
 * Audit transports
 */

import { appendFile } from 'node:fs/promises';
import chalk from 'chalk';
import type { AuditEntry, AuditTransport } from './types.js';
import { formatAuditLine } from './format.js';

/**
 * Per-case log file. Each write opens the file in append mode and closes it
 * again, so no handle or lock is held between entries.
 */
export class FileTransport implements AuditTransport {
  readonly name = 'file';
  readonly required = true;

  constructor(readonly filePath: string) {}

  async write(entry: AuditEntry): Promise<void> {
    await appendFile(this.filePath, formatAuditLine(entry), { encoding: 'utf8', flag: 'a' });
  }

  async close(): Promise<void> {
    // Nothing held open between writes
  }
}

/**
 * In-memory transport for development/testing
 */
export class MemoryTransport implements AuditTransport {
  readonly name = 'memory';
  readonly required = true;
  private entries: AuditEntry[] = [];

  async write(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }

  async close(): Promise<void> {
    // No-op for memory transport
  }

  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /** Entries rendered exactly as the file transport would write them */
  getLines(): string[] {
    return this.entries.map(entry => formatAuditLine(entry).trimEnd());
  }
}

/**
 * Console echo of audit entries for the operator
 */
export class ConsoleTransport implements AuditTransport {
  readonly name = 'console';
  readonly required = false;
  private print: (line: string) => void;

  constructor(options: { print?: (line: string) => void } = {}) {
    this.print = options.print ?? (line => console.log(line));
  }

  async write(entry: AuditEntry): Promise<void> {
    const text = entry.severity === 'error' ? chalk.red(entry.message) : entry.message;
    this.print(`${chalk.gray('📝 LOG:')} ${text}`);
  }

  async close(): Promise<void> {
    // No-op for console transport
  }
}
