/**
 * Audit Logger Implementation
 *
 * Append-only chain-of-custody trail. Appends are written in call order,
 * one at a time, even when callers do not await each other.
 */

import { Errors, systemClock, toError, type Clock } from '@custodian/core';
import type {
  AuditEntry,
  AuditLoggerConfig,
  AuditSeverity,
  AuditStats,
  AuditTransport,
} from './types.js';
import { ERROR_PREFIX } from './types.js';
import { toSingleLine } from './format.js';
import { FileTransport, MemoryTransport } from './transports.js';

/**
 * Audit Logger class
 */
export class AuditLogger {
  private transports: AuditTransport[] = [];
  private clock: Clock;
  private queue: Promise<void> = Promise.resolve();
  private stats: AuditStats;

  constructor(config: AuditLoggerConfig = {}) {
    this.clock = config.clock ?? systemClock;
    this.stats = this.initializeStats();

    for (const transport of config.transports ?? []) {
      this.addTransport(transport);
    }
  }

  /**
   * Add a transport to the logger
   */
  addTransport(transport: AuditTransport): void {
    this.transports.push(transport);
  }

  /**
   * Remove a transport by name
   */
  removeTransport(name: string): boolean {
    const index = this.transports.findIndex(t => t.name === name);
    if (index >= 0) {
      this.transports.splice(index, 1);
      return true;
    }
    return false;
  }

  /**
   * Append an entry.
   * @throws CustodianError AUDIT_LOG_UNAVAILABLE when a required transport fails
   */
  append(message: string, severity: AuditSeverity = 'info'): Promise<AuditEntry> {
    const task = this.queue.then(() => this.write(toSingleLine(message), severity));
    // The caller sees the rejection through `task`; the queue itself moves on
    this.queue = task.then(
      () => undefined,
      () => undefined
    );
    return task;
  }

  /**
   * Append an info entry
   */
  info(message: string): Promise<AuditEntry> {
    return this.append(message, 'info');
  }

  /**
   * Append an error entry, prefixed with "ERROR: "
   */
  error(message: string): Promise<AuditEntry> {
    return this.append(`${ERROR_PREFIX}${message}`, 'error');
  }

  /**
   * Wait for every pending append to settle
   */
  async drain(): Promise<void> {
    await this.queue;
  }

  /**
   * Drain pending appends and close all transports
   */
  async close(): Promise<void> {
    await this.drain();

    for (const transport of this.transports) {
      await transport.close();
    }
  }

  /**
   * Get audit statistics
   */
  getStats(): AuditStats {
    return {
      ...this.stats,
      bySeverity: { ...this.stats.bySeverity },
      timeRange: this.stats.timeRange ? { ...this.stats.timeRange } : undefined,
    };
  }

  // Private helper methods

  private async write(message: string, severity: AuditSeverity): Promise<AuditEntry> {
    const entry: AuditEntry = {
      timestamp: this.clock(),
      message,
      severity,
    };

    await Promise.all(this.transports.map(transport => this.writeToTransport(transport, entry)));

    this.updateStats(entry);
    return entry;
  }

  private async writeToTransport(transport: AuditTransport, entry: AuditEntry): Promise<void> {
    try {
      await transport.write(entry);
    } catch (err) {
      if (transport.required) {
        throw Errors.auditLogUnavailable(transport.name, toError(err));
      }
      console.error(`Audit transport ${transport.name} failed:`, err);
    }
  }

  private updateStats(entry: AuditEntry): void {
    this.stats.totalEntries++;
    this.stats.bySeverity[entry.severity]++;

    if (!this.stats.timeRange) {
      this.stats.timeRange = {
        first: entry.timestamp,
        last: entry.timestamp,
      };
    } else {
      this.stats.timeRange.last = entry.timestamp;
    }
  }

  private initializeStats(): AuditStats {
    return {
      totalEntries: 0,
      bySeverity: {
        info: 0,
        error: 0,
      },
    };
  }
}

/**
 * Create an audit logger writing to a case log file
 */
export function createAuditLogger(
  logFile: string,
  config: AuditLoggerConfig = {}
): AuditLogger {
  return new AuditLogger({
    ...config,
    transports: [new FileTransport(logFile), ...(config.transports ?? [])],
  });
}

/**
 * Create a pre-configured audit logger with memory transport (for testing)
 */
export function createTestAuditLogger(
  config: Omit<AuditLoggerConfig, 'transports'> = {}
): { logger: AuditLogger; transport: MemoryTransport } {
  const transport = new MemoryTransport();
  const logger = new AuditLogger({ ...config, transports: [transport] });
  return { logger, transport };
}
