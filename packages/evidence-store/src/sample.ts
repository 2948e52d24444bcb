/**
 * Sample evidence file for trying the pipeline end to end
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { formatLogTimestamp, systemClock } from '@custodian/core';
import type { Clock } from '@custodian/core';

export const SAMPLE_EVIDENCE_FILENAME = 'sample_evidence.txt';

/**
 * Render the sample file body
 */
export function sampleEvidenceContent(createdAt: Date): string {
  return [
    'DIGITAL EVIDENCE FILE',
    '='.repeat(30),
    `Created: ${formatLogTimestamp(createdAt)}`,
    '',
    'This is a test evidence file.',
    'In real cases, this would be actual evidence data.',
    'Examples: phone dumps, computer files, photos, videos, etc.',
    '',
  ].join('\n');
}

/**
 * Write the sample file into `directory`
 * @returns Path of the written file
 */
export async function createSampleEvidence(
  directory: string,
  clock: Clock = systemClock
): Promise<string> {
  const filePath = join(directory, SAMPLE_EVIDENCE_FILENAME);
  await writeFile(filePath, sampleEvidenceContent(clock()), 'utf8');
  return filePath;
}
