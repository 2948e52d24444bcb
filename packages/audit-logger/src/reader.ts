/**
 * Read a case audit log back from disk
 */

import { readFile } from 'node:fs/promises';
import { Errors, systemErrorCode, toError } from '@custodian/core';
import type { AuditEntry, AuditLogContents } from './types.js';
import { parseAuditLine } from './format.js';

export async function readAuditLog(filePath: string): Promise<AuditLogContents> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') {
      throw Errors.notFound(filePath);
    }
    throw Errors.auditLogUnavailable(filePath, toError(error));
  }

  const entries: AuditEntry[] = [];
  const malformedLines: number[] = [];

  const lines = text.split('\n');
  // A complete log ends with a newline, leaving one empty trailing element
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  lines.forEach((line, index) => {
    const entry = parseAuditLine(line);
    if (entry) {
      entries.push(entry);
    } else {
      malformedLines.push(index + 1);
    }
  });

  return { entries, malformedLines };
}
