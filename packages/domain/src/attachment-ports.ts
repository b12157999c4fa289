import { type Attachment, type AttachmentStatus, type NewAttachment } from './attachment';

export interface AttachmentRepository {
  create(tx: unknown, att: NewAttachment): Promise<Attachment>;

  findById(tx: unknown, id: string): Promise<Attachment | null>;

  /** Same as findById but holds a row lock until the transaction ends. */
  findByIdForUpdate(tx: unknown, id: string): Promise<Attachment | null>;

  /**
   * Record receipt of one chunk index while the row is uploading. A repeated index is not
   * counted twice. Returns null when the row is gone, not uploading, or the index is out of range.
   */
  recordChunk(
    tx: unknown,
    id: string,
    chunkIndex: number,
  ): Promise<{ receivedChunks: number; totalChunks: number } | null>;

  /** uploading → processing, only when every chunk was received. Null if the condition failed. */
  completeUpload(tx: unknown, id: string): Promise<Attachment | null>;

  /** processing → ready with the verified checksum and actual size. */
  markReady(
    tx: unknown,
    id: string,
    result: { checksumSha256: string; fileSize: number },
  ): Promise<Attachment | null>;

  /** processing → quarantined. Returns false if the row was not processing. */
  quarantine(tx: unknown, id: string): Promise<boolean>;

  /** Set comment_id only if it is still null and the row is ready. */
  bindToComment(tx: unknown, id: string, commentId: string): Promise<Attachment | null>;

  /** Delete an unlinked, not-processing row owned by uploaderId. */
  deleteUnlinked(tx: unknown, id: string, uploaderId: string): Promise<Attachment | null>;

  /** Atomically delete unlinked rows in the given statuses created before cutoff. */
  deleteOrphans(
    tx: unknown,
    cutoff: Date,
    statuses: readonly AttachmentStatus[],
    limit: number,
  ): Promise<Attachment[]>;

  deleteByCommentId(tx: unknown, commentId: string): Promise<Attachment[]>;

  /** Lease rows stuck in processing longer than olderThanMs by touching updated_at. */
  claimStuckProcessing(tx: unknown, olderThanMs: number, limit: number): Promise<Attachment[]>;
}

/**
 * Byte store addressed by slash-separated keys resolved under a fixed root.
 * Writers to the same key must be serialized by the caller.
 */
export interface StorageBackend {
  ensureReady(): Promise<void>;

  store(key: string, data: Buffer): Promise<void>;

  /** Throws StorageError('NOT_FOUND') when absent. */
  retrieve(key: string): Promise<Buffer>;

  /** Finite, lazy sequence of at most chunkSize bytes per item. */
  stream(key: string, chunkSize?: number): AsyncIterable<Buffer>;

  /** Deleting a missing key is not an error. */
  delete(key: string): Promise<void>;

  exists(key: string): Promise<boolean>;

  appendChunk(key: string, data: Buffer): Promise<void>;
}

export type StorageErrorKind = 'NOT_FOUND' | 'PATH_TRAVERSAL' | 'IO';

export class StorageError extends Error {
  constructor(
    public readonly kind: StorageErrorKind,
    message: string,
    public readonly key: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export interface DecryptedChunk {
  index: number;
  data: Buffer;
}

export interface EnvelopeEncryptor {
  generateFileKey(): Buffer;

  /** Encrypt a DEK under the master key. The result is the only form that is persisted. */
  wrapKey(fileKey: Buffer): Promise<string>;

  unwrapKey(wrappedKey: string): Promise<Buffer>;

  encryptFile(data: Buffer, fileKey: Buffer): Buffer;

  decryptFile(encrypted: Buffer, fileKey: Buffer): Buffer;

  encryptChunk(data: Buffer, fileKey: Buffer, chunkIndex: number): Buffer;

  decryptChunk(encrypted: Buffer, fileKey: Buffer): DecryptedChunk;
}

export class EncryptionError extends Error {
  constructor(
    public readonly kind: 'AUTHENTICATION_FAILED' | 'MALFORMED' | 'INVALID_KEY',
    message: string,
  ) {
    super(message);
    this.name = 'EncryptionError';
  }
}

/** Runs work after the caller returns; each task gets its own error boundary. */
export interface TaskScheduler {
  schedule(name: string, task: () => Promise<unknown>): void;
}
