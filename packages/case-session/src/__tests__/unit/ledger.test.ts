/**
 * Evidence Ledger and Summary Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { digest } from '@custodian/core';
import type { EvidenceRecord, FileCategory } from '@custodian/core';
import { EvidenceLedger, summarizeEvidence, formatSummaryLine } from '../../index.js';

function record(name: string, category: FileCategory, size: number, sizeMb: number): EvidenceRecord {
  const storedFilename = `20240101_120000_${name}`;
  return {
    originalPath: `/incoming/${name}`,
    storedPath: `/cases/case_001/evidence/${storedFilename}`,
    digestPath: `/cases/case_001/hashes/${storedFilename}.sha256`,
    storedFilename,
    originalFilename: name,
    sha256: digest(name),
    file: {
      filename: name,
      size,
      sizeMb,
      created: new Date(2024, 0, 1),
      modified: new Date(2024, 0, 1),
      mimeType: 'unknown',
      category,
      extension: '',
    },
    processedAt: new Date(2024, 0, 1, 12, 0, 0),
  };
}

describe('EvidenceLedger', () => {
  let ledger: EvidenceLedger;

  beforeEach(() => {
    ledger = new EvidenceLedger();
  });

  it('should number records in insertion order', () => {
    expect(ledger.append(record('a.jpg', 'image', 10, 0))).toBe(1);
    expect(ledger.append(record('b.pdf', 'document', 20, 0))).toBe(2);

    expect(ledger.size).toBe(2);
    expect(ledger.get(1)?.originalFilename).toBe('a.jpg');
    expect(ledger.get(2)?.originalFilename).toBe('b.pdf');
    expect(ledger.get(0)).toBeUndefined();
    expect(ledger.get(3)).toBeUndefined();
  });

  it('should reject a second record for the same stored copy', () => {
    ledger.append(record('a.jpg', 'image', 10, 0));

    expect(() => ledger.append(record('a.jpg', 'image', 10, 0))).toThrow(
      'Ledger already holds a record for /cases/case_001/evidence/20240101_120000_a.jpg'
    );
    expect(ledger.size).toBe(1);
  });

  it('should hand out frozen snapshots', () => {
    ledger.append(record('a.jpg', 'image', 10, 0));

    const snapshot = ledger.records();
    ledger.append(record('b.jpg', 'image', 10, 0));

    expect(snapshot).toHaveLength(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
  });

  it('should find records by digest in any case', () => {
    const a = record('a.jpg', 'image', 10, 0);
    ledger.append(a);

    expect(ledger.findByDigest(a.sha256.toUpperCase())).toHaveLength(1);
    expect(ledger.findByDigest('f'.repeat(64))).toEqual([]);
  });

  it('should total original sizes and iterate in order', () => {
    ledger.append(record('a.jpg', 'image', 10, 0));
    ledger.append(record('b.jpg', 'image', 32, 0));

    expect(ledger.totalBytes()).toBe(42);
    expect([...ledger].map(r => r.originalFilename)).toEqual(['a.jpg', 'b.jpg']);
  });
});

describe('summarizeEvidence', () => {
  it('should count categories in order of first appearance', () => {
    const summary = summarizeEvidence([
      record('a.pdf', 'document', 0, 1.25),
      record('b.jpg', 'image', 0, 0.5),
      record('c.txt', 'document', 0, 2),
      record('d.bin', 'unknown', 0, 0.01),
    ]);

    expect(summary.totalFiles).toBe(4);
    expect(summary.totalSizeMb).toBe(3.76);
    expect(summary.categories).toEqual([
      { category: 'document', count: 2, percentage: 50 },
      { category: 'image', count: 1, percentage: 25 },
      { category: 'unknown', count: 1, percentage: 25 },
    ]);
    expect(summary.entries.map(e => e.number)).toEqual([1, 2, 3, 4]);
    expect(summary.entries[1]).toMatchObject({ originalFilename: 'b.jpg', category: 'image', sizeMb: 0.5 });
  });

  it('should summarize an empty ledger', () => {
    const summary = summarizeEvidence([]);

    expect(summary).toEqual({ totalFiles: 0, totalSizeMb: 0, categories: [], entries: [] });
    expect(formatSummaryLine(summary)).toBe('Evidence summary: 0 files, 0.00 MB total');
  });

  it('should format the audit line with two decimals', () => {
    const summary = summarizeEvidence([record('a.mp4', 'video', 0, 12.5)]);

    expect(formatSummaryLine(summary)).toBe('Evidence summary: 1 files, 12.50 MB total');
  });
});
