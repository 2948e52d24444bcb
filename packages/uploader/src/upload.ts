/**
 * Upload stored evidence and digest files of a case
 */

import { basename, extname } from 'node:path';
import { Errors, toCustodianError } from '@custodian/core';
import type { CaseIdentifier, UploadItem } from '@custodian/core';
import { lookupFileType } from '@custodian/evidence-store';
import type { FailedUpload, UploadOptions, UploadResult, UploadedItem } from './types.js';

const DIGEST_CONTENT_TYPE = 'text/plain';

export function evidenceKeyFor(caseId: CaseIdentifier, storedFilename: string): string {
  return `${caseId.directoryName}/evidence/${storedFilename}`;
}

export function digestKeyFor(caseId: CaseIdentifier, digestPath: string): string {
  return `${caseId.directoryName}/hashes/${basename(digestPath)}`;
}

function contentTypeFor(storedFilename: string): string | undefined {
  const { mimeType } = lookupFileType(extname(storedFilename));
  return mimeType === 'unknown' ? undefined : mimeType;
}

/**
 * Upload every item, continuing past individual failures
 */
export async function uploadEvidence(
  manifest: readonly UploadItem[],
  options: UploadOptions
): Promise<UploadResult> {
  const { storage, caseId, audit } = options;

  if (manifest.length === 0) {
    await audit?.info('No evidence files to upload');
    return { total: 0, uploaded: [], failed: [], complete: false };
  }

  const uploaded: UploadedItem[] = [];
  const failed: FailedUpload[] = [];

  for (const item of manifest) {
    const evidenceKey = evidenceKeyFor(caseId, item.storedFilename);
    const digestKey = digestKeyFor(caseId, item.digestPath);
    let currentKey = evidenceKey;

    try {
      await storage.uploadFile(evidenceKey, item.storedPath, contentTypeFor(item.storedFilename));
      currentKey = digestKey;
      await storage.uploadFile(digestKey, item.digestPath, DIGEST_CONTENT_TYPE);
      uploaded.push({ storedFilename: item.storedFilename, evidenceKey, digestKey });
    } catch (error) {
      const failure = toCustodianError(error, cause => Errors.uploadFailed(currentKey, cause));
      failed.push({ storedFilename: item.storedFilename, error: failure });
      await audit?.error(failure.message);
    }
  }

  const complete = failed.length === 0;
  if (complete) {
    await audit?.info(`Files uploaded: ${uploaded.length}/${manifest.length} to ${storage.name}`);
  } else {
    await audit?.error(
      `Upload failed or incomplete: ${uploaded.length}/${manifest.length} files to ${storage.name}`
    );
  }

  return { total: manifest.length, uploaded, failed, complete };
}
