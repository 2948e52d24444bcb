/**
 * Case Session Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  readdirSync,
  rmSync,
  writeFileSync,
} from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { EMPTY_DIGEST, digest, normalizeCaseNumber } from '@custodian/core';
import type { CaseLayout, EvidenceRecord, ProcessingFailure } from '@custodian/core';
import { AuditLogger, createTestAuditLogger } from '@custodian/audit-logger';
import type { AuditTransport } from '@custodian/audit-logger';
import {
  CaseSession,
  caseLayoutFor,
  provisionCaseLayout,
  type CaseSessionConfig,
} from '../../index.js';

const FIXED_TIME = new Date(2024, 5, 1, 9, 15, 30);
const fixedClock = () => FIXED_TIME;
const caseId = normalizeCaseNumber('7');

function logLines(layout: CaseLayout): string[] {
  return readFileSync(layout.logFile, 'utf8').split('\n').filter(line => line.length > 0);
}

describe('CaseSession', () => {
  let root: string;
  let sourceDir: string;
  let layout: CaseLayout;

  async function openSession(config: CaseSessionConfig = {}): Promise<CaseSession> {
    return CaseSession.open({
      caseInfo: { caseId, investigator: 'Test Investigator', crimeType: 'Fraud' },
      layout,
      config: { clock: fixedClock, ...config },
    });
  }

  function source(name: string, content: string | Buffer): string {
    const path = join(sourceDir, name);
    writeFileSync(path, content);
    return path;
  }

  beforeEach(async () => {
    root = mkdtempSync(join(tmpdir(), 'custodian-session-'));
    sourceDir = join(root, 'incoming');
    mkdirSync(sourceDir);
    layout = await provisionCaseLayout(join(root, 'forensics'), caseId, { clock: fixedClock });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('open', () => {
    it('should log the case start and intake metadata', async () => {
      const session = await openSession();

      const lines = logLines(layout);
      expect(lines[0]).toBe(`[2024-06-01 09:15:30] Folders created: ${layout.root}`);
      expect(lines[1]).toBe('[2024-06-01 09:15:30] === CASE 007 STARTED ===');
      expect(lines[2]).toBe(`[2024-06-01 09:15:30] Session: ${session.sessionId}`);
      expect(lines[3]).toBe('[2024-06-01 09:15:30] Investigator: Test Investigator');
      expect(lines[4]).toBe('[2024-06-01 09:15:30] Crime Type: Fraud');
      expect(lines).toHaveLength(5);
      expect(session.sessionId).toMatch(/^session_/);
    });

    it('should refuse a layout that was never provisioned', async () => {
      const missing = caseLayoutFor(join(root, 'elsewhere'), caseId);

      await expect(
        CaseSession.open({ caseInfo: { caseId, investigator: 'Test Investigator' }, layout: missing })
      ).rejects.toMatchObject({ code: 'CASE_LAYOUT_MISSING', recoverable: false });
    });

    it('should escalate when the audit log cannot be written', async () => {
      const broken: AuditTransport = {
        name: 'broken',
        required: true,
        write: async () => {
          throw new Error('read-only filesystem');
        },
        close: async () => {},
      };

      await expect(
        CaseSession.open({
          caseInfo: { caseId, investigator: 'Test Investigator' },
          layout,
          audit: new AuditLogger({ transports: [broken] }),
        })
      ).rejects.toMatchObject({ code: 'AUDIT_LOG_UNAVAILABLE' });
    });
  });

  describe('processEvidenceFile', () => {
    it('should store, hash and record a file', async () => {
      const session = await openSession();
      const path = source('photo.jpg', 'jpeg bytes');

      const result = await session.processEvidenceFile(path);

      expect(result.success).toBe(true);
      if (!result.success) return;
      const record = result.data;
      expect(record.storedFilename).toBe('20240601_091530_photo.jpg');
      expect(record.storedPath).toBe(join(layout.evidenceDir, '20240601_091530_photo.jpg'));
      expect(record.digestPath).toBe(join(layout.hashesDir, '20240601_091530_photo.sha256'));
      expect(record.originalFilename).toBe('photo.jpg');
      expect(record.originalPath).toBe(path);
      expect(record.sha256).toBe(digest('jpeg bytes'));
      expect(record.file.category).toBe('image');
      expect(record.processedAt).toEqual(FIXED_TIME);
      expect(Object.isFrozen(record)).toBe(true);
      expect(session.size).toBe(1);
    });

    it('should write the digest file in the interchange format', async () => {
      const session = await openSession();
      const result = await session.processEvidenceFile(source('notes.txt', 'abc'));

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(readFileSync(result.data.digestPath, 'utf8')).toBe(
        `ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad  ${result.data.storedPath}\n`
      );
    });

    it('should round-trip the bytes of the source', async () => {
      const session = await openSession();
      const bytes = Buffer.from([0, 1, 2, 250, 251, 252, 255]);
      const result = await session.processEvidenceFile(source('blob.bin', bytes));

      expect(result.success && readFileSync(result.data.storedPath)).toEqual(bytes);
    });

    it('should hash a zero-byte file to the empty digest', async () => {
      const session = await openSession();
      const result = await session.processEvidenceFile(source('empty.txt', ''));

      expect(result.success && result.data.sha256).toBe(EMPTY_DIGEST);
    });

    it('should log the copy and the hash', async () => {
      const session = await openSession();
      const path = source('a.txt', 'abc');

      await session.processEvidenceFile(path);

      const lines = logLines(layout);
      const stored = join(layout.evidenceDir, '20240601_091530_a.txt');
      expect(lines.slice(5)).toEqual([
        `[2024-06-01 09:15:30] File copied: ${path} -> ${stored}`,
        '[2024-06-01 09:15:30] Hash calculated for 20240601_091530_a.txt: ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
      ]);
    });

    it('should fail with SOURCE_NOT_FOUND and log exactly one error', async () => {
      const session = await openSession();
      const before = logLines(layout).length;
      const missing = join(sourceDir, 'ghost.pdf');

      const result = await session.processEvidenceFile(missing);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.reason).toBe('SOURCE_NOT_FOUND');
      expect(result.error.sourcePath).toBe(missing);
      expect(session.size).toBe(0);

      const lines = logLines(layout);
      expect(lines).toHaveLength(before + 1);
      expect(lines[before]).toBe(`[2024-06-01 09:15:30] ERROR: File not found: ${missing}`);
    });

    it('should fail with CLASSIFICATION_FAILED for a directory', async () => {
      const session = await openSession();

      const result = await session.processEvidenceFile(sourceDir);

      expect(!result.success && result.error.reason).toBe('CLASSIFICATION_FAILED');
      expect(session.size).toBe(0);
    });

    it('should give same-name files acquired in different seconds distinct records', async () => {
      let second = 0;
      const session = await openSession({ clock: () => new Date(2024, 5, 1, 9, 15, second++) });
      const first = source('same.txt', 'one');
      const a = await session.processEvidenceFile(first);
      writeFileSync(first, 'two');
      const b = await session.processEvidenceFile(first);

      expect(a.success && b.success).toBe(true);
      if (!a.success || !b.success) return;
      expect(a.data.storedFilename).not.toBe(b.data.storedFilename);
      expect(a.data.digestPath).not.toBe(b.data.digestPath);
      expect(session.size).toBe(2);
    });

    it('should suffix same-name files acquired in the same second', async () => {
      const session = await openSession();
      const path = source('same.txt', 'one');

      const a = await session.processEvidenceFile(path);
      const b = await session.processEvidenceFile(path);

      expect(a.success && a.data.storedFilename).toBe('20240601_091530_same.txt');
      expect(b.success && b.data.storedFilename).toBe('20240601_091530-1_same.txt');
      expect(b.success && b.data.digestPath).toBe(join(layout.hashesDir, '20240601_091530-1_same.sha256'));
    });

    it('should fall back to the full stored name when the stem digest file exists', async () => {
      const session = await openSession();
      writeFileSync(join(layout.hashesDir, '20240601_091530_clip.sha256'), 'unrelated');

      const result = await session.processEvidenceFile(source('clip.mp4', 'frames'));

      expect(result.success && result.data.digestPath).toBe(
        join(layout.hashesDir, '20240601_091530_clip.mp4.sha256')
      );
      expect(readFileSync(join(layout.hashesDir, '20240601_091530_clip.sha256'), 'utf8')).toBe('unrelated');
    });
  });

  describe('orphan handling', () => {
    function blockDigestNames(stem: string, filename: string): void {
      writeFileSync(join(layout.hashesDir, `${stem}.sha256`), 'taken');
      writeFileSync(join(layout.hashesDir, `${filename}.sha256`), 'taken');
    }

    it('should quarantine the stored copy by default', async () => {
      const session = await openSession();
      blockDigestNames('20240601_091530_x', '20240601_091530_x.doc');

      const result = await session.processEvidenceFile(source('x.doc', 'doc'));

      expect(!result.success && result.error.reason).toBe('HASH_OR_PERSIST_FAILED');
      expect(session.size).toBe(0);
      expect(readdirSync(layout.evidenceDir)).toEqual([]);
      expect(readdirSync(layout.quarantineDir)).toEqual(['20240601_091530_x.doc']);

      const lines = logLines(layout);
      const stored = join(layout.evidenceDir, '20240601_091530_x.doc');
      expect(lines[lines.length - 2]).toBe(
        `[2024-06-01 09:15:30] ERROR: Failed to hash or persist digest for ${stored}: Digest file already exists for 20240601_091530_x.doc`
      );
      expect(lines[lines.length - 1]).toBe(
        `[2024-06-01 09:15:30] Orphaned copy quarantined: ${stored} -> ${join(layout.quarantineDir, '20240601_091530_x.doc')}`
      );
    });

    it('should keep earlier orphans of the same name in quarantine', async () => {
      const session = await openSession();
      blockDigestNames('20240601_091530_x', '20240601_091530_x.doc');

      await session.processEvidenceFile(source('x.doc', 'first'));
      await session.processEvidenceFile(source('x.doc', 'second'));

      expect(readdirSync(layout.quarantineDir).sort()).toEqual([
        '1_20240601_091530_x.doc',
        '20240601_091530_x.doc',
      ]);
      expect(readFileSync(join(layout.quarantineDir, '20240601_091530_x.doc'), 'utf8')).toBe('first');
      expect(readFileSync(join(layout.quarantineDir, '1_20240601_091530_x.doc'), 'utf8')).toBe('second');
      const lines = logLines(layout);
      expect(lines[lines.length - 1]).toBe(
        `[2024-06-01 09:15:30] Orphaned copy quarantined: ${join(layout.evidenceDir, '20240601_091530_x.doc')} -> ${join(layout.quarantineDir, '1_20240601_091530_x.doc')}`
      );
    });

    it('should delete the stored copy under the delete policy', async () => {
      const session = await openSession({ orphanPolicy: 'delete' });
      blockDigestNames('20240601_091530_y', '20240601_091530_y.zip');

      const result = await session.processEvidenceFile(source('y.zip', 'zip'));

      expect(result.success).toBe(false);
      expect(readdirSync(layout.evidenceDir)).toEqual([]);
      expect(existsSync(layout.quarantineDir)).toBe(false);
    });

    it('should leave the stored copy under the retain policy', async () => {
      const session = await openSession({ orphanPolicy: 'retain' });
      blockDigestNames('20240601_091530_z', '20240601_091530_z.png');

      const result = await session.processEvidenceFile(source('z.png', 'png'));

      expect(result.success).toBe(false);
      expect(readdirSync(layout.evidenceDir)).toEqual(['20240601_091530_z.png']);
      expect(session.size).toBe(0);
      const lines = logLines(layout);
      expect(lines[lines.length - 1]).toBe(
        `[2024-06-01 09:15:30] Orphaned copy retained for review: ${join(layout.evidenceDir, '20240601_091530_z.png')}`
      );
    });
  });

  describe('processEvidenceFiles', () => {
    it('should continue past failures and report them', async () => {
      const session = await openSession();
      const good1 = source('one.txt', '1');
      const good2 = source('two.txt', '2');
      const missing = join(sourceDir, 'nope.txt');
      const seenRecords: EvidenceRecord[] = [];
      const seenFailures: ProcessingFailure[] = [];

      const result = await session.processEvidenceFiles([good1, missing, good2], {
        onRecord: record => seenRecords.push(record),
        onFailure: failure => seenFailures.push(failure),
      });

      expect(result.records.map(r => r.originalFilename)).toEqual(['one.txt', 'two.txt']);
      expect(result.processed).toHaveLength(2);
      expect(result.failureCount).toBe(1);
      expect(result.failures[0].sourcePath).toBe(missing);
      expect(seenRecords).toHaveLength(2);
      expect(seenFailures).toHaveLength(1);
    });

    it('should keep ledger size equal to successful calls under concurrency', async () => {
      const session = await openSession();
      const paths = Array.from({ length: 12 }, (_, i) => source(`file-${i}.txt`, `content ${i}`));
      paths.push(join(sourceDir, 'absent-1.txt'), join(sourceDir, 'absent-2.txt'));

      const result = await session.processEvidenceFiles(paths, { concurrency: 4 });

      expect(result.records).toHaveLength(12);
      expect(result.failureCount).toBe(2);
      expect(new Set(result.records.map(r => r.storedPath)).size).toBe(12);
      expect(readdirSync(layout.evidenceDir)).toHaveLength(12);
      expect(readdirSync(layout.hashesDir)).toHaveLength(12);
    });

    it('should keep every digest file consistent with its record', async () => {
      const session = await openSession();
      const paths = ['a.pdf', 'b.pdf', 'c.mov'].map(name => source(name, `data for ${name}`));

      const { records } = await session.processEvidenceFiles(paths, { concurrency: 3 });

      for (const record of records) {
        expect(readFileSync(record.digestPath, 'utf8')).toBe(`${record.sha256}  ${record.storedPath}\n`);
        expect(digest(readFileSync(record.storedPath))).toBe(record.sha256);
      }
    });

    it('should handle an empty batch', async () => {
      const session = await openSession();

      const result = await session.processEvidenceFiles([]);

      expect(result).toEqual({ records: [], processed: [], failures: [], failureCount: 0 });
    });

    it('should stop and rethrow when the audit log fails', async () => {
      const { logger, transport } = createTestAuditLogger({ clock: fixedClock });
      const session = await CaseSession.open({
        caseInfo: { caseId, investigator: 'Test Investigator' },
        layout,
        audit: logger,
        config: { clock: fixedClock },
      });
      logger.addTransport({
        name: 'broken',
        required: true,
        write: async () => {
          throw new Error('disk gone');
        },
        close: async () => {},
      });

      await expect(
        session.processEvidenceFiles([source('a.txt', 'a'), source('b.txt', 'b')])
      ).rejects.toMatchObject({ code: 'AUDIT_LOG_UNAVAILABLE' });
      expect(session.size).toBe(0);
      expect(transport.getEntries()[0].message).toBe('=== CASE 007 STARTED ===');
    });
  });

  describe('audit trail', () => {
    it('should never shrink across a session', async () => {
      const session = await openSession();
      const counts = [logLines(layout).length];

      await session.processEvidenceFile(source('a.txt', 'a'));
      counts.push(logLines(layout).length);
      await session.processEvidenceFile(join(sourceDir, 'missing.txt'));
      counts.push(logLines(layout).length);
      await session.completeCollection();
      counts.push(logLines(layout).length);
      await session.summarize();
      counts.push(logLines(layout).length);
      await session.close();
      counts.push(logLines(layout).length);

      expect(counts).toEqual([5, 7, 8, 9, 10, 11]);
    });

    it('should log collection, summary and completion lines', async () => {
      const session = await openSession();
      await session.processEvidenceFile(source('a.txt', 'a'));

      expect(await session.completeCollection()).toBe(1);
      await session.summarize();
      await session.close();
      await session.close();

      const lines = logLines(layout);
      expect(lines.slice(-3)).toEqual([
        '[2024-06-01 09:15:30] Evidence collection completed. Total files: 1',
        '[2024-06-01 09:15:30] Evidence summary: 1 files, 0.00 MB total',
        '[2024-06-01 09:15:30] === CASE 007 COMPLETED SUCCESSFULLY ===',
      ]);
    });
  });

  describe('verifyLedger', () => {
    it('should report intact copies', async () => {
      const session = await openSession();
      await session.processEvidenceFiles([source('a.txt', 'a'), source('b.txt', 'b')]);

      const report = await session.verifyLedger();

      expect(report.passed).toBe(true);
      expect(report.intact).toBe(2);
      expect(logLines(layout).slice(-1)[0]).toBe(
        '[2024-06-01 09:15:30] Integrity check: 2 intact, 0 tampered, 0 missing'
      );
    });

    it('should detect a stored copy changed in place', async () => {
      const session = await openSession();
      const result = await session.processEvidenceFile(source('evidence.txt', 'original'));
      if (!result.success) throw result.error.error;
      writeFileSync(result.data.storedPath, 'altered');

      const report = await session.verifyLedger();

      expect(report.passed).toBe(false);
      expect(report.tampered).toBe(1);
      expect(report.checks[0]).toMatchObject({
        status: 'tampered',
        expected: digest('original'),
        actual: digest('altered'),
      });
      const lines = logLines(layout);
      expect(lines[lines.length - 2]).toBe(
        '[2024-06-01 09:15:30] ERROR: Integrity check failed for 20240601_091530_evidence.txt: tampered (Stored copy does not match recorded digest)'
      );
    });

    it('should report a deleted stored copy as missing', async () => {
      const session = await openSession();
      const result = await session.processEvidenceFile(source('gone.txt', 'x'));
      if (!result.success) throw result.error.error;
      rmSync(result.data.storedPath);

      const report = await session.verifyLedger();

      expect(report.missing).toBe(1);
      expect(report.checks[0].status).toBe('missing');
    });
  });

  describe('exports', () => {
    it('should expose the ledger read-only', async () => {
      const session = await openSession();
      await session.processEvidenceFile(source('a.txt', 'a'));

      const records = session.exportLedger();

      expect(Object.isFrozen(records)).toBe(true);
      expect(Object.isFrozen(records[0])).toBe(true);
    });

    it('should build the upload manifest in evidence order', async () => {
      const session = await openSession();
      await session.processEvidenceFiles([source('a.txt', 'a'), source('b.txt', 'b')]);

      expect(session.uploadManifest()).toEqual([
        {
          storedPath: join(layout.evidenceDir, '20240601_091530_a.txt'),
          digestPath: join(layout.hashesDir, '20240601_091530_a.sha256'),
          storedFilename: '20240601_091530_a.txt',
        },
        {
          storedPath: join(layout.evidenceDir, '20240601_091530_b.txt'),
          digestPath: join(layout.hashesDir, '20240601_091530_b.sha256'),
          storedFilename: '20240601_091530_b.txt',
        },
      ]);
    });
  });
});
