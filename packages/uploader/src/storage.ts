/**
 * Object storage backends
 */

import { createReadStream } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { ObjectStorage } from './types.js';

/**
 * In-memory object storage (for testing/development)
 */
export class MemoryObjectStorage implements ObjectStorage {
  readonly name: string;
  private objects: Map<string, { body: Buffer; contentType?: string }> = new Map();
  private shouldFail: (key: string) => boolean;

  constructor(options: { name?: string; failOn?: (key: string) => boolean } = {}) {
    this.name = options.name ?? 'memory://evidence';
    this.shouldFail = options.failOn ?? (() => false);
  }

  async uploadFile(key: string, filePath: string, contentType?: string): Promise<void> {
    if (this.shouldFail(key)) {
      throw new Error(`Simulated failure for ${key}`);
    }
    this.objects.set(key, { body: await readFile(filePath), contentType });
  }

  get(key: string): Buffer | undefined {
    return this.objects.get(key)?.body;
  }

  contentType(key: string): string | undefined {
    return this.objects.get(key)?.contentType;
  }

  keys(): string[] {
    return [...this.objects.keys()];
  }

  // For testing
  clear(): void {
    this.objects.clear();
  }
}

/**
 * Amazon S3 bucket. Credentials come from the default AWS provider chain
 * (environment, shared config, instance role).
 */
export class S3ObjectStorage implements ObjectStorage {
  readonly name: string;
  private client: S3Client;

  constructor(
    private readonly bucket: string,
    options: { region: string; client?: S3Client }
  ) {
    this.name = `s3://${bucket}`;
    this.client = options.client ?? new S3Client({ region: options.region });
  }

  async uploadFile(key: string, filePath: string, contentType?: string): Promise<void> {
    const { size } = await stat(filePath);

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: createReadStream(filePath),
        ContentLength: size,
        ContentType: contentType,
      })
    );
  }
}
