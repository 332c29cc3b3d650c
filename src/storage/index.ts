/**
 * Storage Module
 *
 * Responsibilities:
 * - Implement S3StorageAdapter using AWS SDK v3
 * - Implement MemoryStorageAdapter for testing and local runs
 * - Report object metadata
 *
 * Objects are addressed by namespace and key. A namespace is one or more
 * slash-separated segments, a key is a single segment:
 * - {prefix}/sessions/{session_id}/{run_id}.json
 * - {prefix}/shares/{share_id}.json
 *
 * Usage:
 * ```typescript
 * const storage = createStorageAdapter({ type: 'memory' });
 * await storage.save('shares', shareId, JSON.stringify(record));
 * ```
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  type GetObjectCommandOutput,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import type { ObjectMetadata, StorageAdapter } from '../types/index.js';

export type { StorageAdapter, ObjectMetadata };

/**
 * S3 configuration for storage adapter
 */
export interface S3Config {
  /** S3 bucket name */
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'research') */
  prefix?: string;
  /** Custom S3 endpoint for local development or alternative S3-compatible services */
  endpoint?: string;
  /** AWS credentials (optional if using IAM roles or environment variables) */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean;
}

const SEGMENT_PATTERN = /^[A-Za-z0-9_-]+$/;
const DEFAULT_CONTENT_TYPE = 'application/json';

/**
 * Reject namespaces and keys that could escape their prefix
 *
 * @throws Error if any segment is empty or contains characters outside [A-Za-z0-9_-]
 */
export function assertValidLocation(namespace: string, key?: string): void {
  const segments = namespace.split('/');
  if (key !== undefined) {
    segments.push(key);
  }
  for (const segment of segments) {
    if (!SEGMENT_PATTERN.test(segment)) {
      throw new Error(`Invalid storage path segment: "${segment}"`);
    }
  }
}

function getContentSize(content: string | Buffer): number {
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.length;
}

function fileNameFor(key: string): string {
  return `${key}.json`;
}

/**
 * Error raised when an object does not exist
 */
export class ObjectNotFoundError extends Error {
  constructor(namespace: string, key: string) {
    super(`Object not found: ${namespace}/${key}`);
    this.name = 'ObjectNotFoundError';
  }
}

/**
 * S3 implementation of StorageAdapter using AWS SDK v3
 */
export class S3StorageAdapter implements StorageAdapter {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(config: S3Config) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'research';

    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };

    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }

    if (config.credentials) {
      clientConfig.credentials = config.credentials;
    }

    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = new S3Client(clientConfig);
  }

  private getKey(namespace: string, key: string): string {
    assertValidLocation(namespace, key);
    return `${this.prefix}/${namespace}/${fileNameFor(key)}`;
  }

  async save(
    namespace: string,
    key: string,
    content: string | Buffer,
    metadata?: Record<string, string>
  ): Promise<ObjectMetadata> {
    const objectKey = this.getKey(namespace, key);
    const now = new Date().toISOString();
    const size = getContentSize(content);
    const contentType = metadata?.contentType ?? DEFAULT_CONTENT_TYPE;

    const s3Metadata: Record<string, string> = {
      'created-at': now,
    };

    if (metadata) {
      for (const [k, v] of Object.entries(metadata)) {
        if (k !== 'contentType') {
          s3Metadata[k] = v;
        }
      }
    }

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: objectKey,
        Body: content,
        ContentType: contentType,
        Metadata: s3Metadata,
      })
    );

    return {
      namespace,
      key,
      fileName: fileNameFor(key),
      createdAt: now,
      contentType,
      size,
    };
  }

  /**
   * @throws ObjectNotFoundError if the object does not exist
   */
  async load(namespace: string, key: string): Promise<{ content: string; metadata: ObjectMetadata }> {
    const objectKey = this.getKey(namespace, key);
    let response: GetObjectCommandOutput;
    try {
      response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: objectKey,
        })
      );
    } catch (error: unknown) {
      if (error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound')) {
        throw new ObjectNotFoundError(namespace, key);
      }
      throw error;
    }

    if (!response.Body) {
      throw new ObjectNotFoundError(namespace, key);
    }

    const content = await response.Body.transformToString();

    const metadata: ObjectMetadata = {
      namespace,
      key,
      fileName: fileNameFor(key),
      createdAt: response.Metadata?.['created-at'] ?? new Date().toISOString(),
      contentType: response.ContentType ?? DEFAULT_CONTENT_TYPE,
    };

    if (response.ContentLength !== undefined) {
      metadata.size = response.ContentLength;
    }

    return { content, metadata };
  }

  async exists(namespace: string, key: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(namespace, key),
        })
      );
      return true;
    } catch (error: unknown) {
      if (
        error instanceof Error &&
        (error.name === 'NotFound' ||
          error.name === 'NoSuchKey' ||
          error.message.includes('404') ||
          error.message.includes('Not Found'))
      ) {
        return false;
      }
      throw error;
    }
  }

  /**
   * List the objects directly inside a namespace (not in nested namespaces)
   */
  async list(namespace: string): Promise<ObjectMetadata[]> {
    assertValidLocation(namespace);
    const prefix = `${this.prefix}/${namespace}/`;
    const objects: ObjectMetadata[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          Delimiter: '/',
          ContinuationToken: continuationToken,
        })
      );

      for (const obj of response.Contents ?? []) {
        const fileName = obj.Key?.slice(prefix.length) ?? '';
        if (!fileName.endsWith('.json')) continue;
        const metadata: ObjectMetadata = {
          namespace,
          key: fileName.slice(0, -'.json'.length),
          fileName,
          createdAt: obj.LastModified?.toISOString() ?? new Date().toISOString(),
          contentType: DEFAULT_CONTENT_TYPE,
        };
        if (obj.Size !== undefined) {
          metadata.size = obj.Size;
        }
        objects.push(metadata);
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return objects;
  }

  /**
   * Delete one object, or every object directly inside the namespace when no key is given
   */
  async delete(namespace: string, key?: string): Promise<void> {
    const keys = key !== undefined ? [key] : (await this.list(namespace)).map((object) => object.key);
    for (const objectKey of keys) {
      await this.client.send(
        new DeleteObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(namespace, objectKey),
        })
      );
    }
  }
}

/**
 * In-memory storage adapter for testing and development
 *
 * Provides the same interface as S3StorageAdapter but keeps objects in a Map.
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private store: Map<string, { content: string; metadata: ObjectMetadata }> = new Map();

  private getKey(namespace: string, key: string): string {
    assertValidLocation(namespace, key);
    return `${namespace}/${key}`;
  }

  async save(
    namespace: string,
    key: string,
    content: string | Buffer,
    metadata?: Record<string, string>
  ): Promise<ObjectMetadata> {
    const storeKey = this.getKey(namespace, key);
    const objectMetadata: ObjectMetadata = {
      namespace,
      key,
      fileName: fileNameFor(key),
      createdAt: new Date().toISOString(),
      contentType: metadata?.contentType ?? DEFAULT_CONTENT_TYPE,
      size: getContentSize(content),
    };

    this.store.set(storeKey, {
      content: typeof content === 'string' ? content : content.toString('utf-8'),
      metadata: objectMetadata,
    });

    return objectMetadata;
  }

  /**
   * @throws ObjectNotFoundError if nothing is stored under the key
   */
  async load(namespace: string, key: string): Promise<{ content: string; metadata: ObjectMetadata }> {
    const item = this.store.get(this.getKey(namespace, key));
    if (!item) {
      throw new ObjectNotFoundError(namespace, key);
    }
    return item;
  }

  async exists(namespace: string, key: string): Promise<boolean> {
    return this.store.has(this.getKey(namespace, key));
  }

  async list(namespace: string): Promise<ObjectMetadata[]> {
    assertValidLocation(namespace);
    const objects: ObjectMetadata[] = [];
    for (const { metadata } of this.store.values()) {
      if (metadata.namespace === namespace) {
        objects.push(metadata);
      }
    }
    return objects;
  }

  async delete(namespace: string, key?: string): Promise<void> {
    if (key !== undefined) {
      this.store.delete(this.getKey(namespace, key));
      return;
    }
    assertValidLocation(namespace);
    for (const [storeKey, { metadata }] of this.store.entries()) {
      if (metadata.namespace === namespace) {
        this.store.delete(storeKey);
      }
    }
  }
}

/**
 * Factory function to create the storage adapter selected by configuration
 */
export function createStorageAdapter(config: (S3Config & { type: 's3' }) | { type: 'memory' }): StorageAdapter {
  if (config.type === 'memory') {
    return new MemoryStorageAdapter();
  }
  return new S3StorageAdapter(config);
}
