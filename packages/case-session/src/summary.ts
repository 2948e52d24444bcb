/**
 * Aggregates derived from the ledger
 */

import type { EvidenceRecord, FileCategory } from '@custodian/core';
import type { CategoryCount, EvidenceSummary } from './types.js';

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function summarizeEvidence(records: readonly EvidenceRecord[]): EvidenceSummary {
  const counts = new Map<FileCategory, number>();
  for (const record of records) {
    counts.set(record.file.category, (counts.get(record.file.category) ?? 0) + 1);
  }

  const categories: CategoryCount[] = [...counts.entries()].map(([category, count]) => ({
    category,
    count,
    percentage: (count / records.length) * 100,
  }));

  return {
    totalFiles: records.length,
    totalSizeMb: roundTo2(records.reduce((sum, record) => sum + record.file.sizeMb, 0)),
    categories,
    entries: records.map((record, index) => ({
      number: index + 1,
      originalFilename: record.originalFilename,
      storedFilename: record.storedFilename,
      sizeMb: record.file.sizeMb,
      category: record.file.category,
      sha256: record.sha256,
    })),
  };
}

/**
 * Audit line for a summary
 */
export function formatSummaryLine(summary: EvidenceSummary): string {
  return `Evidence summary: ${summary.totalFiles} files, ${summary.totalSizeMb.toFixed(2)} MB total`;
}
