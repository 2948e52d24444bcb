/**
 * Evidence Ledger
 *
 * Ordered, append-only collection of the records of one case session.
 * Insertion order is the evidence numbering used in reports.
 */

import type { EvidenceRecord, UploadItem } from '@custodian/core';

export class EvidenceLedger implements Iterable<EvidenceRecord> {
  private entries: EvidenceRecord[] = [];
  private storedPaths = new Set<string>();

  /**
   * Append a record
   * @returns The record's 1-based evidence number
   * @throws Error if a record for the same stored copy is already present
   */
  append(record: EvidenceRecord): number {
    if (this.storedPaths.has(record.storedPath)) {
      throw new Error(`Ledger already holds a record for ${record.storedPath}`);
    }

    this.storedPaths.add(record.storedPath);
    this.entries.push(Object.freeze({ ...record }));
    return this.entries.length;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Read-only snapshot in evidence order
   */
  records(): readonly EvidenceRecord[] {
    return Object.freeze([...this.entries]);
  }

  /**
   * Record by 1-based evidence number
   */
  get(number: number): EvidenceRecord | undefined {
    return number >= 1 ? this.entries[number - 1] : undefined;
  }

  findByDigest(sha256: string): EvidenceRecord[] {
    const wanted = sha256.toLowerCase();
    return this.entries.filter(record => record.sha256 === wanted);
  }

  /**
   * Total bytes of the original files
   */
  totalBytes(): number {
    return this.entries.reduce((sum, record) => sum + record.file.size, 0);
  }

  uploadManifest(): UploadItem[] {
    return this.entries.map(({ storedPath, digestPath, storedFilename }) => ({
      storedPath,
      digestPath,
      storedFilename,
    }));
  }

  [Symbol.iterator](): Iterator<EvidenceRecord> {
    return this.entries[Symbol.iterator]();
  }
}
