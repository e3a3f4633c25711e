import fs from 'node:fs/promises';
import path from 'node:path';

import {
  DeleteObjectCommand,
  GetObjectCommand,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';

/**
 * Key/value blob storage. Keys are slash-separated paths such as `kdn/KDN_GROUP_SANCTION_LIST.json`.
 * `get` returns null for a key that was never written, which is distinct from an empty body.
 */
export interface BlobStore {
  readonly description: string;
  get(key: string): Promise<string | null>;
  put(key: string, body: string, contentType: string): Promise<void>;
  /** Removing a key that does not exist is not an error. */
  delete(key: string): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class LocalBlobStore implements BlobStore {
  readonly description: string;

  constructor(private readonly rootDir: string) {
    this.description = `local:${rootDir}`;
  }

  private resolve(key: string): string {
    const target = path.resolve(this.rootDir, key);
    const relative = path.relative(this.rootDir, target);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`blob key escapes the output directory: ${key}`);
    }
    return target;
  }

  async get(key: string): Promise<string | null> {
    try {
      return await fs.readFile(this.resolve(key), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async put(key: string, body: string, _contentType: string): Promise<void> {
    const target = this.resolve(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, body, 'utf8');
  }

  async delete(key: string): Promise<void> {
    await fs.rm(this.resolve(key), { force: true });
  }
}

export interface S3BlobStoreOptions {
  bucket: string;
  region: string;
  endpoint?: string;
  client?: S3Client;
}

export class S3BlobStore implements BlobStore {
  readonly description: string;
  private readonly bucket: string;
  private readonly client: S3Client;

  constructor(options: S3BlobStoreOptions) {
    this.bucket = options.bucket;
    this.description = `s3://${options.bucket}`;

    if (options.client) {
      this.client = options.client;
    } else {
      const clientConfig: S3ClientConfig = { region: options.region };
      if (options.endpoint) {
        clientConfig.endpoint = options.endpoint;
        clientConfig.forcePathStyle = true;
      }
      this.client = new S3Client(clientConfig);
    }
  }

  async get(key: string): Promise<string | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) {
        return '';
      }
      return await response.Body.transformToString('utf-8');
    } catch (error) {
      if (error instanceof NoSuchKey || (error instanceof Error && error.name === 'NoSuchKey')) {
        return null;
      }
      throw error;
    }
  }

  async put(key: string, body: string, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      }),
    );
  }

  async delete(key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }
}

/** In-process store for tests and dry runs. */
export class MemoryBlobStore implements BlobStore {
  readonly description = 'memory';
  readonly objects = new Map<string, { body: string; contentType: string }>();

  async get(key: string): Promise<string | null> {
    return this.objects.get(key)?.body ?? null;
  }

  async put(key: string, body: string, contentType: string): Promise<void> {
    this.objects.set(key, { body, contentType });
  }

  async delete(key: string): Promise<void> {
    this.objects.delete(key);
  }
}
