/**
 * Session identifiers
 */

import { customAlphabet } from 'nanoid';
import { formatFileTimestamp } from './time.js';

const SESSION_SUFFIX_LENGTH = 8;

// Lowercase alphanumerics keep ids safe in file names and log lines
const suffix = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', SESSION_SUFFIX_LENGTH);

/**
 * `session_{YYYYMMDD_HHMMSS}_{suffix}`, sortable by start time
 */
export function generateSessionId(startedAt: Date): string {
  return `session_${formatFileTimestamp(startedAt)}_${suffix()}`;
}
