/**
 * Uploader Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { normalizeCaseNumber } from '@custodian/core';
import type { UploadItem } from '@custodian/core';
import { createTestAuditLogger } from '@custodian/audit-logger';
import {
  MemoryObjectStorage,
  S3ObjectStorage,
  uploadEvidence,
  evidenceKeyFor,
  digestKeyFor,
} from '../../index.js';

const caseId = normalizeCaseNumber('5');

describe('uploadEvidence', () => {
  let dir: string;

  function item(name: string): UploadItem {
    const stem = name.replace(/\.[^.]+$/, '');
    const storedPath = join(dir, `20240101_000000_${name}`);
    const digestPath = join(dir, `20240101_000000_${stem}.sha256`);
    writeFileSync(storedPath, `content of ${name}`);
    writeFileSync(digestPath, `digest of ${name}\n`);
    return { storedPath, digestPath, storedFilename: `20240101_000000_${name}` };
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'custodian-upload-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should upload evidence and digest files under the case prefix', async () => {
    const storage = new MemoryObjectStorage();
    const { logger, transport } = createTestAuditLogger();

    const result = await uploadEvidence([item('photo.jpg'), item('notes.txt')], {
      storage,
      caseId,
      audit: logger,
    });

    expect(result.complete).toBe(true);
    expect(result.total).toBe(2);
    expect(storage.keys()).toEqual([
      'case_005/evidence/20240101_000000_photo.jpg',
      'case_005/hashes/20240101_000000_photo.sha256',
      'case_005/evidence/20240101_000000_notes.txt',
      'case_005/hashes/20240101_000000_notes.sha256',
    ]);
    expect(storage.get('case_005/evidence/20240101_000000_photo.jpg')?.toString()).toBe('content of photo.jpg');
    expect(storage.contentType('case_005/evidence/20240101_000000_photo.jpg')).toBe('image/jpeg');
    expect(storage.contentType('case_005/hashes/20240101_000000_photo.sha256')).toBe('text/plain');
    expect(transport.getEntries().map(e => e.message)).toEqual([
      'Files uploaded: 2/2 to memory://evidence',
    ]);
  });

  it('should continue past a failed item and report it', async () => {
    const storage = new MemoryObjectStorage({
      failOn: key => key === 'case_005/hashes/20240101_000000_b.sha256',
    });
    const { logger, transport } = createTestAuditLogger();

    const result = await uploadEvidence([item('a.txt'), item('b.txt'), item('c.txt')], {
      storage,
      caseId,
      audit: logger,
    });

    expect(result.complete).toBe(false);
    expect(result.uploaded.map(u => u.storedFilename)).toEqual([
      '20240101_000000_a.txt',
      '20240101_000000_c.txt',
    ]);
    expect(result.failed).toHaveLength(1);
    expect(result.failed[0].error.code).toBe('UPLOAD_FAILED');
    expect(transport.getEntries().map(e => e.message)).toEqual([
      'ERROR: Failed to upload case_005/hashes/20240101_000000_b.sha256: Simulated failure for case_005/hashes/20240101_000000_b.sha256',
      'ERROR: Upload failed or incomplete: 2/3 files to memory://evidence',
    ]);
  });

  it('should report a missing stored file as a failed upload', async () => {
    const storage = new MemoryObjectStorage();
    const missing: UploadItem = {
      storedPath: join(dir, 'gone.txt'),
      digestPath: join(dir, 'gone.sha256'),
      storedFilename: 'gone.txt',
    };

    const result = await uploadEvidence([missing], { storage, caseId });

    expect(result.failed[0].error.code).toBe('UPLOAD_FAILED');
    expect(storage.keys()).toEqual([]);
  });

  it('should upload nothing for an empty manifest', async () => {
    const storage = new MemoryObjectStorage();
    const { logger, transport } = createTestAuditLogger();

    const result = await uploadEvidence([], { storage, caseId, audit: logger });

    expect(result).toEqual({ total: 0, uploaded: [], failed: [], complete: false });
    expect(transport.getEntries().map(e => e.message)).toEqual(['No evidence files to upload']);
  });
});

describe('object keys', () => {
  it('should follow the case directory layout', () => {
    expect(evidenceKeyFor(caseId, '20240101_000000_x.zip')).toBe('case_005/evidence/20240101_000000_x.zip');
    expect(digestKeyFor(caseId, '/cases/case_005/hashes/20240101_000000_x.sha256')).toBe(
      'case_005/hashes/20240101_000000_x.sha256'
    );
  });
});

describe('S3ObjectStorage', () => {
  it('should name itself after the bucket', () => {
    expect(new S3ObjectStorage('evidence-bucket', { region: 'us-east-1' }).name).toBe('s3://evidence-bucket');
  });
});
