/**
 * Evidence Store Implementation
 *
 * Copies source files into a case evidence directory under time-prefixed
 * names. A stored copy is never overwritten: the source is copied to a
 * private staging file, then hard-linked under the first free name.
 */

import { constants, type Stats } from 'node:fs';
import { copyFile, link, rm, stat, utimes } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import {
  Errors,
  fail,
  formatFileTimestamp,
  ok,
  systemErrorCode,
  toError,
} from '@custodian/core';
import type { CustodianError, Result } from '@custodian/core';
import { describeFile } from './classifier.js';
import type { AcquiredFile, EvidenceStoreConfig, EvidenceStoreStats } from './types.js';
import { DEFAULT_STORE_CONFIG } from './types.js';

let stagingCounter = 0;

/**
 * Stored name for the n-th attempt: `{stamp}_{name}`, then `{stamp}-{n}_{name}`
 */
export function storedFilenameFor(stamp: string, originalFilename: string, attempt: number): string {
  return attempt === 0 ? `${stamp}_${originalFilename}` : `${stamp}-${attempt}_${originalFilename}`;
}

/**
 * Evidence Store class
 */
export class EvidenceStore {
  private config: Required<EvidenceStoreConfig>;
  private stats: EvidenceStoreStats = {
    acquired: 0,
    failed: 0,
    bytesCopied: 0,
    nameCollisions: 0,
  };

  constructor(config: EvidenceStoreConfig = {}) {
    this.config = {
      ...DEFAULT_STORE_CONFIG,
      ...config,
    };
  }

  /**
   * Copy `sourcePath` into `evidenceDir`
   * @returns The stored copy and the descriptor of the original, or
   * SOURCE_NOT_FOUND, CLASSIFICATION_FAILED or COPY_FAILED
   */
  async acquire(sourcePath: string, evidenceDir: string): Promise<Result<AcquiredFile>> {
    const result = await this.copyIntoStore(resolve(sourcePath), resolve(evidenceDir));
    if (result.success) {
      this.stats.acquired++;
      this.stats.bytesCopied += result.data.file.size;
    } else {
      this.stats.failed++;
    }
    return result;
  }

  /**
   * Get store statistics
   */
  getStats(): EvidenceStoreStats {
    return { ...this.stats };
  }

  private async copyIntoStore(source: string, evidenceDir: string): Promise<Result<AcquiredFile>> {
    let sourceStats: Stats;
    try {
      sourceStats = await stat(source);
    } catch (error) {
      const code = systemErrorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return fail(Errors.sourceNotFound(source));
      }
      return fail(Errors.classificationFailed(source, toError(error)));
    }

    const described = describeFile(source, sourceStats);
    if (!described.success) {
      return described;
    }
    const file = described.data;

    const stamp = formatFileTimestamp(this.config.clock());
    const originalFilename = basename(source);

    // Private to this call; a failure removes nothing but this file
    const staging = join(
      evidenceDir,
      `.${stamp}_${originalFilename}.${process.pid}-${++stagingCounter}.partial`
    );
    const staged = await this.stage(source, staging, sourceStats);
    if (staged !== undefined) {
      return fail(staged);
    }

    try {
      for (let attempt = 0; attempt < this.config.maxNameAttempts; attempt++) {
        const storedFilename = storedFilenameFor(stamp, originalFilename, attempt);
        const storedPath = join(evidenceDir, storedFilename);

        try {
          await link(staging, storedPath);
        } catch (error) {
          if (systemErrorCode(error) === 'EEXIST') continue;
          return fail(Errors.copyFailed(source, storedPath, toError(error)));
        }

        if (attempt > 0) {
          this.stats.nameCollisions++;
        }
        return ok({ storedPath, storedFilename, file });
      }
    } finally {
      await this.discardStaging(staging);
    }

    return fail(
      Errors.copyFailed(
        source,
        join(evidenceDir, storedFilenameFor(stamp, originalFilename, 0)),
        new Error(`No free stored name after ${this.config.maxNameAttempts} attempts`)
      )
    );
  }

  /**
   * Copy the source to its staging file and carry over its timestamps
   * @returns undefined on success, or the failure
   */
  private async stage(
    source: string,
    staging: string,
    sourceStats: Stats
  ): Promise<CustodianError | undefined> {
    try {
      await copyFile(source, staging, constants.COPYFILE_EXCL);
      if (this.config.preserveTimestamps) {
        await utimes(staging, sourceStats.atime, sourceStats.mtime);
      }
    } catch (error) {
      if (systemErrorCode(error) !== 'EEXIST') {
        await this.discardStaging(staging);
      }
      if (systemErrorCode(error) === 'ENOENT' && !(await this.exists(source))) {
        return Errors.sourceNotFound(source);
      }
      return Errors.copyFailed(source, staging, toError(error));
    }
    return undefined;
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch {
      return false;
    }
  }

  private async discardStaging(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (error) {
      console.error(`Could not remove staging copy ${path}:`, error);
    }
  }
}

/**
 * Create an evidence store
 */
export function createEvidenceStore(config: EvidenceStoreConfig = {}): EvidenceStore {
  return new EvidenceStore(config);
}
