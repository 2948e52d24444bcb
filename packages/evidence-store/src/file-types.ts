/**
 * Extension table: lower-cased extension -> category and MIME hint
 */

import { readFileSync } from 'node:fs';
import { z, parseOrThrow, Errors } from '@custodian/core';
import type { FileCategory } from '@custodian/core';
import type { FileTypeInfo } from './types.js';

const FileTypeTableSchema = z.object({
  extensions: z.record(
    z.string().regex(/^\.[a-z0-9]+$/, 'Extension must be lower-case with a leading dot'),
    z.object({
      category: z.enum(['image', 'video', 'document', 'archive', 'unknown']),
      mimeType: z.string().min(1),
    })
  ),
});

const UNKNOWN_TYPE: FileTypeInfo = { category: 'unknown', mimeType: 'unknown' };

function loadFileTypeTable(): ReadonlyMap<string, FileTypeInfo> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('./data/file-types.json', import.meta.url), 'utf8')
  );

  const table = parseOrThrow(FileTypeTableSchema, raw, issues =>
    Errors.configurationError(`Invalid file type table: ${issues.join('; ')}`)
  );

  return new Map(Object.entries(table.extensions));
}

const FILE_TYPES = loadFileTypeTable();

/**
 * Look up an extension (with leading dot, any case)
 */
export function lookupFileType(extension: string): FileTypeInfo {
  return FILE_TYPES.get(extension.toLowerCase()) ?? UNKNOWN_TYPE;
}

/**
 * Extensions listed for a category, sorted
 */
export function extensionsFor(category: FileCategory): string[] {
  return [...FILE_TYPES.entries()]
    .filter(([, info]) => info.category === category)
    .map(([extension]) => extension)
    .sort();
}
