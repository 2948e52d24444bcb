/**
 * File classifier: filesystem metadata plus a category from the extension table
 */

import { stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { basename, extname } from 'node:path';
import { BYTES_PER_MIB, Errors, fail, ok, systemErrorCode, toError } from '@custodian/core';
import type { FileDescriptor, Result } from '@custodian/core';
import { lookupFileType } from './file-types.js';

/**
 * Size in MiB rounded to 2 decimals
 */
export function toMebibytes(bytes: number): number {
  return Math.round((bytes / BYTES_PER_MIB) * 100) / 100;
}

/**
 * Build a descriptor from stats already taken for `filePath`
 */
export function describeFile(filePath: string, stats: Stats): Result<FileDescriptor> {
  if (!stats.isFile()) {
    return fail(Errors.classificationFailed(filePath, new Error('Not a regular file')));
  }

  const extension = extname(filePath).toLowerCase();
  const { category, mimeType } = lookupFileType(extension);

  // birthtimeMs is 0 where the filesystem does not record it
  const created = stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime;

  return ok(
    Object.freeze({
      filename: basename(filePath),
      size: stats.size,
      sizeMb: toMebibytes(stats.size),
      created,
      modified: stats.mtime,
      mimeType,
      category,
      extension,
    })
  );
}

/**
 * Classify the file at `filePath`
 * @returns NOT_FOUND when nothing exists at the path, CLASSIFICATION_FAILED
 * for any other stat failure or a non-file entry
 */
export async function classify(filePath: string): Promise<Result<FileDescriptor>> {
  let stats: Stats;
  try {
    stats = await stat(filePath);
  } catch (error) {
    const code = systemErrorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return fail(Errors.notFound(filePath));
    }
    return fail(Errors.classificationFailed(filePath, toError(error)));
  }

  return describeFile(filePath, stats);
}
