import { Readable } from 'node:stream';
import {
  S3Client,
  S3ServiceException,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
} from '@aws-sdk/client-s3';
import { StorageError, type StorageBackend } from '@appraise/domain';
import { assertSafeKey } from './keys';
import { DEFAULT_STREAM_CHUNK_SIZE } from './local-storage';

export interface S3StorageConfig {
  endpoint: string;
  accessKey: string;
  secretKey: string;
  bucket: string;
  /** Prepended to every key, e.g. `evaluations` → `evaluations/attachments/...`. */
  prefix?: string;
  region?: string;
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof S3ServiceException &&
    (err.name === 'NoSuchKey' || err.name === 'NotFound' || err.$metadata.httpStatusCode === 404)
  );
}

function toBuffer(piece: unknown): Buffer {
  if (Buffer.isBuffer(piece)) return piece;
  if (piece instanceof Uint8Array) return Buffer.from(piece);
  return Buffer.from(String(piece));
}

/** S3-compatible object store (MinIO in development). */
export class S3StorageBackend implements StorageBackend {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(config: S3StorageConfig) {
    this.bucket = config.bucket;
    this.prefix = (config.prefix ?? '').replace(/^\/+|\/+$/g, '');
    this.client = new S3Client({
      region: config.region ?? 'us-east-1',
      endpoint: config.endpoint,
      credentials: {
        accessKeyId: config.accessKey,
        secretAccessKey: config.secretKey,
      },
      forcePathStyle: true,
    });
  }

  async ensureReady(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (err) {
      if (!isNotFound(err)) {
        throw new StorageError('IO', `Bucket ${this.bucket} is not reachable`, '', { cause: err });
      }
      await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }));
    }
  }

  async store(key: string, data: Buffer): Promise<void> {
    await this.call(key, () =>
      this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: this.objectKey(key),
          Body: data,
          ContentLength: data.length,
        }),
      ),
    );
  }

  async retrieve(key: string): Promise<Buffer> {
    const body = await this.getBody(key);
    return Buffer.from(await body.transformToByteArray());
  }

  async *stream(key: string, chunkSize: number = DEFAULT_STREAM_CHUNK_SIZE): AsyncIterable<Buffer> {
    const size = Math.max(1, Math.floor(chunkSize));
    const body = await this.getBody(key);
    if (!(body instanceof Readable)) {
      throw new StorageError('IO', `Unexpected response body for ${key}`, key);
    }

    let pending = Buffer.alloc(0);
    for await (const piece of body) {
      pending = Buffer.concat([pending, toBuffer(piece)]);
      while (pending.length >= size) {
        yield pending.subarray(0, size);
        pending = pending.subarray(size);
      }
    }
    if (pending.length > 0) {
      yield pending;
    }
  }

  async delete(key: string): Promise<void> {
    await this.call(key, () =>
      this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: this.objectKey(key) })),
    );
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.call(key, () =>
        this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: this.objectKey(key) })),
      );
      return true;
    } catch (err) {
      if (err instanceof StorageError && err.kind === 'NOT_FOUND') return false;
      throw err;
    }
  }

  /** Read-modify-write: S3 has no append, so concurrent appends to one key can lose data. */
  async appendChunk(key: string, data: Buffer): Promise<void> {
    let existing: Buffer;
    try {
      existing = await this.retrieve(key);
    } catch (err) {
      if (!(err instanceof StorageError && err.kind === 'NOT_FOUND')) throw err;
      existing = Buffer.alloc(0);
    }
    await this.store(key, Buffer.concat([existing, data]));
  }

  private objectKey(key: string): string {
    assertSafeKey(key);
    return this.prefix ? `${this.prefix}/${key}` : key;
  }

  private async getBody(key: string) {
    const response = await this.call(key, () =>
      this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: this.objectKey(key) })),
    );
    if (!response.Body) {
      throw new StorageError('NOT_FOUND', `Object not found: ${key}`, key);
    }
    return response.Body;
  }

  private async call<T>(key: string, op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      if (err instanceof StorageError) throw err;
      if (isNotFound(err)) {
        throw new StorageError('NOT_FOUND', `Object not found: ${key}`, key, { cause: err });
      }
      throw new StorageError('IO', `Storage operation failed for ${key}`, key, { cause: err });
    }
  }
}
