/**
 * Audit line format: `[YYYY-MM-DD HH:MM:SS] message`
 */

import { formatLogTimestamp, parseLogTimestamp } from '@custodian/core';
import type { AuditEntry } from './types.js';
import { ERROR_PREFIX } from './types.js';

const LINE_PATTERN = /^\[(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2})\] (.*)$/;

/**
 * Collapse line breaks so one entry always occupies one line
 */
export function toSingleLine(message: string): string {
  return message.replace(/\r\n|[\r\n\u2028\u2029]/g, ' ');
}

/**
 * Render an entry as a log line, including the trailing newline
 */
export function formatAuditLine(entry: AuditEntry): string {
  return `[${formatLogTimestamp(entry.timestamp)}] ${entry.message}\n`;
}

/**
 * Parse one log line (without its newline)
 * @returns The entry, or undefined when the line is not in audit format
 */
export function parseAuditLine(line: string): AuditEntry | undefined {
  const match = LINE_PATTERN.exec(line);
  if (!match) return undefined;

  const timestamp = parseLogTimestamp(match[1]);
  if (!timestamp) return undefined;

  const message = match[2];
  return {
    timestamp,
    message,
    severity: message.startsWith(ERROR_PREFIX) ? 'error' : 'info',
  };
}
