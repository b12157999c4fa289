import { createHash } from 'node:crypto';
import {
  type Attachment,
  canTransition,
  checkChunkAcceptance,
  chunkKeyFor,
  chunkKeysFor,
  isUploadComplete,
  storageKeyFor,
  storageKeysOwnedBy,
} from './attachment';
import {
  EncryptionError,
  StorageError,
  type AttachmentRepository,
  type EnvelopeEncryptor,
  type StorageBackend,
  type TaskScheduler,
} from './attachment-ports';
import {
  ATTACHMENT_QUARANTINED,
  ATTACHMENT_READY,
  type AttachmentQuarantinedPayload,
  type AttachmentReadyPayload,
} from './attachment-events';
import { type FileValidator } from './file-validator';
import { type LoggerPort, type OutboxPort, type WithTransaction } from './ports';

export const SIMPLE_UPLOAD_LIMIT = 5 * 1024 * 1024;

export interface UploadOrchestratorDeps {
  attachmentRepo: AttachmentRepository;
  storage: StorageBackend;
  encryptor: EnvelopeEncryptor;
  validator: FileValidator;
  outbox: OutboxPort;
  scheduler: TaskScheduler;
  logger: LoggerPort;
  generateUuid: () => string;
  withTransaction: WithTransaction;
  simpleUploadLimit?: number;
}

export interface ChunkReceipt {
  chunkIndex: number;
  receivedChunks: number;
  totalChunks: number;
}

export type ReassemblyOutcome = 'ready' | 'quarantined' | 'skipped' | 'failed';

export class UploadOrchestrator {
  private readonly simpleUploadLimit: number;

  constructor(private readonly deps: UploadOrchestratorDeps) {
    this.simpleUploadLimit = deps.simpleUploadLimit ?? SIMPLE_UPLOAD_LIMIT;
  }

  /** Small files: validated, encrypted and stored in one request, created directly as ready. */
  async simpleUpload(
    userId: string,
    input: { filename: string; contentType: string; data: Buffer },
  ): Promise<Attachment> {
    const { attachmentRepo, storage, encryptor, validator, logger } = this.deps;
    const { data, contentType } = input;

    if (data.length > this.simpleUploadLimit) {
      throw new AttachmentError(
        'TOO_LARGE',
        `File too large for simple upload (${data.length} bytes). ` +
          `Use chunked upload for files > ${Math.floor(this.simpleUploadLimit / (1024 * 1024))}MB.`,
      );
    }

    const check = validator.validateUpload(data, contentType, input.filename);
    if (!check.ok) {
      throw new AttachmentError('VALIDATION', check.reason);
    }

    const id = this.deps.generateUuid();
    const fileKey = encryptor.generateFileKey();
    const wrappedKey = await encryptor.wrapKey(fileKey);
    const storageKey = storageKeyFor(id, check.filename);

    await this.storeOrFail(storageKey, encryptor.encryptFile(data, fileKey));

    try {
      const attachment = await this.deps.withTransaction((tx) =>
        attachmentRepo.create(tx, {
          id,
          uploaderId: userId,
          uploadSession: null,
          filename: check.filename,
          contentType,
          fileSize: data.length,
          storageKey,
          checksumSha256: sha256Hex(data),
          encryptedFileKey: wrappedKey,
          status: 'ready',
          totalChunks: null,
          receivedChunks: null,
        }),
      );
      logger.info({ attachmentId: id, fileSize: data.length }, 'Simple upload complete');
      return attachment;
    } catch (err) {
      await this.deleteQuietly([storageKey], id);
      throw err;
    }
  }

  async initChunkedUpload(
    userId: string,
    input: { filename: string; contentType: string; totalSize: number; totalChunks: number },
  ): Promise<{ uploadId: string; uploadSession: string; totalChunks: number }> {
    const { attachmentRepo, encryptor, validator, logger } = this.deps;

    if (!validator.validateContentType(input.contentType)) {
      throw new AttachmentError('VALIDATION', `Content type not allowed: ${input.contentType}`);
    }
    const size = validator.validateFileSize(input.totalSize, input.contentType);
    if (!size.ok) {
      throw new AttachmentError('VALIDATION', size.reason);
    }

    const filename = validator.sanitizeFilename(input.filename);
    const id = this.deps.generateUuid();
    const uploadSession = this.deps.generateUuid();
    const wrappedKey = await encryptor.wrapKey(encryptor.generateFileKey());

    await this.deps.withTransaction((tx) =>
      attachmentRepo.create(tx, {
        id,
        uploaderId: userId,
        uploadSession,
        filename,
        contentType: input.contentType,
        fileSize: input.totalSize,
        storageKey: storageKeyFor(id, filename),
        checksumSha256: null,
        encryptedFileKey: wrappedKey,
        status: 'uploading',
        totalChunks: input.totalChunks,
        receivedChunks: 0,
      }),
    );

    logger.info(
      { attachmentId: id, totalChunks: input.totalChunks, totalSize: input.totalSize },
      'Chunked upload initialized',
    );
    return { uploadId: id, uploadSession, totalChunks: input.totalChunks };
  }

  /**
   * The row lock taken here serializes every write to this upload's chunk keys, and makes
   * complete() wait for in-flight chunks.
   */
  async uploadChunk(
    userId: string,
    uploadId: string,
    chunkIndex: number,
    data: Buffer,
    uploadSession?: string,
  ): Promise<ChunkReceipt> {
    const { attachmentRepo, encryptor, logger } = this.deps;

    if (data.length === 0) {
      throw new AttachmentError('VALIDATION', 'Empty chunk');
    }

    const receipt = await this.deps.withTransaction(async (tx) => {
      const att = await attachmentRepo.findByIdForUpdate(tx, uploadId);
      if (!att) {
        throw new AttachmentError('NOT_FOUND', 'Upload not found');
      }
      if (att.uploaderId !== userId) {
        throw new AttachmentError('FORBIDDEN', 'Not the uploader of this attachment');
      }
      if (uploadSession !== undefined && uploadSession !== att.uploadSession) {
        throw new AttachmentError('FORBIDDEN', 'Upload session does not match');
      }

      const acceptance = checkChunkAcceptance(att, chunkIndex);
      if (!acceptance.ok) {
        throw new AttachmentError(acceptance.kind, acceptance.reason);
      }

      const fileKey = await encryptor.unwrapKey(att.encryptedFileKey);
      await this.storeOrFail(
        chunkKeyFor(att.storageKey, chunkIndex),
        encryptor.encryptChunk(data, fileKey, chunkIndex),
      );

      const counts = await attachmentRepo.recordChunk(tx, uploadId, chunkIndex);
      if (!counts) {
        throw new AttachmentError('STATE', 'Upload is no longer accepting chunks');
      }
      return { chunkIndex, ...counts };
    });

    logger.debug({ attachmentId: uploadId, chunkIndex, chunkBytes: data.length }, 'Chunk stored');
    return receipt;
  }

  /** Flips uploading → processing once and hands reassembly to the scheduler. */
  async completeChunkedUpload(userId: string, uploadId: string): Promise<Attachment> {
    const { attachmentRepo, scheduler } = this.deps;

    const processing = await this.deps.withTransaction(async (tx) => {
      const att = await attachmentRepo.findById(tx, uploadId);
      if (!att) {
        throw new AttachmentError('NOT_FOUND', 'Upload not found');
      }
      if (att.uploaderId !== userId) {
        throw new AttachmentError('FORBIDDEN', 'Not the uploader of this attachment');
      }
      if (!canTransition(att.status, 'processing')) {
        throw new AttachmentError('STATE', `Upload is not in uploading state (status: ${att.status})`);
      }
      if (!isUploadComplete(att)) {
        throw new AttachmentError(
          'STATE',
          `Missing chunks: received ${att.receivedChunks ?? 0}/${att.totalChunks ?? 0}`,
        );
      }

      const updated = await attachmentRepo.completeUpload(tx, uploadId);
      if (!updated) {
        throw new AttachmentError('STATE', 'Upload was already completed');
      }
      return updated;
    });

    scheduler.schedule(`reassemble:${uploadId}`, () => this.reassemble(uploadId));
    return processing;
  }

  /**
   * Decrypts chunks in index order, validates the real bytes, and replaces the chunks with one
   * whole-file object. Never throws: every failure ends in quarantine or is logged.
   */
  async reassemble(attachmentId: string): Promise<ReassemblyOutcome> {
    const { attachmentRepo, storage, encryptor, validator, outbox, logger } = this.deps;

    let att: Attachment | null;
    try {
      att = await this.deps.withTransaction((tx) => attachmentRepo.findById(tx, attachmentId));
    } catch (err) {
      logger.error({ attachmentId, err: errorMessage(err) }, 'Could not load attachment for reassembly');
      return 'failed';
    }
    if (!att || !canTransition(att.status, 'ready')) {
      logger.warn({ attachmentId, status: att?.status ?? null }, 'Skipping reassembly');
      return 'skipped';
    }

    let plaintext: Buffer;
    let fileKey: Buffer;
    try {
      fileKey = await encryptor.unwrapKey(att.encryptedFileKey);
      const parts: Buffer[] = [];
      for (let i = 0; i < (att.totalChunks ?? 0); i++) {
        const sealed = await storage.retrieve(chunkKeyFor(att.storageKey, i));
        const chunk = encryptor.decryptChunk(sealed, fileKey);
        if (chunk.index !== i) {
          return this.quarantine(att, `Chunk ordering mismatch: expected ${i}, got ${chunk.index}`);
        }
        parts.push(chunk.data);
      }
      plaintext = Buffer.concat(parts);
    } catch (err) {
      return this.quarantine(att, `Reassembly failed: ${errorMessage(err)}`);
    }

    if (!validator.validateMagicBytes(plaintext, att.contentType)) {
      return this.quarantine(att, 'File content does not match claimed content type');
    }
    const size = validator.validateFileSize(plaintext.length, att.contentType);
    if (!size.ok) {
      return this.quarantine(att, size.reason);
    }

    const checksum = sha256Hex(plaintext);
    try {
      await storage.store(att.storageKey, encryptor.encryptFile(plaintext, fileKey));
      const ready = await this.deps.withTransaction(async (tx) => {
        const updated = await attachmentRepo.markReady(tx, attachmentId, {
          checksumSha256: checksum,
          fileSize: plaintext.length,
        });
        if (updated) {
          await outbox.append(tx, {
            aggregateType: 'user',
            aggregateId: updated.uploaderId,
            eventType: ATTACHMENT_READY,
            payload: {
              attachmentId,
              userId: updated.uploaderId,
              filename: updated.filename,
              contentType: updated.contentType,
              fileSize: updated.fileSize,
            } satisfies AttachmentReadyPayload,
          });
        }
        return updated;
      });
      if (!ready) {
        logger.warn({ attachmentId }, 'Attachment left processing during reassembly');
        return 'skipped';
      }
    } catch (err) {
      return this.quarantine(att, `Could not persist reassembled file: ${errorMessage(err)}`);
    }

    await this.deleteQuietly(chunkKeysFor(att), attachmentId);
    logger.info(
      { attachmentId, fileSize: plaintext.length, checksum: checksum.slice(0, 16) },
      'Chunked upload processed',
    );
    return 'ready';
  }

  /** Decrypts the stored object and refuses to return bytes whose checksum drifted. */
  async download(attachmentId: string): Promise<{ attachment: Attachment; data: Buffer }> {
    const { attachmentRepo, storage, encryptor, logger } = this.deps;

    const att = await this.deps.withTransaction((tx) => attachmentRepo.findById(tx, attachmentId));
    if (!att || att.status !== 'ready') {
      throw new AttachmentError('NOT_FOUND', 'Attachment not found or not ready');
    }

    let sealed: Buffer;
    try {
      sealed = await storage.retrieve(att.storageKey);
    } catch (err) {
      if (err instanceof StorageError && err.kind === 'NOT_FOUND') {
        throw new AttachmentError('NOT_FOUND', 'Attachment file not found in storage');
      }
      throw new AttachmentError('STORAGE', 'Attachment storage unavailable', { cause: err });
    }

    let data: Buffer;
    try {
      data = encryptor.decryptFile(sealed, await encryptor.unwrapKey(att.encryptedFileKey));
    } catch (err) {
      if (err instanceof EncryptionError) {
        logger.error({ attachmentId, reason: err.kind }, 'Attachment decryption failed');
        throw new AttachmentError('INTEGRITY', 'File integrity check failed', { cause: err });
      }
      throw err;
    }

    const actual = sha256Hex(data);
    if (actual !== att.checksumSha256) {
      logger.error({ attachmentId, expected: att.checksumSha256, actual }, 'Checksum mismatch');
      throw new AttachmentError('INTEGRITY', 'File integrity check failed');
    }

    return { attachment: att, data };
  }

  async getInfo(attachmentId: string): Promise<Attachment> {
    const att = await this.deps.withTransaction((tx) =>
      this.deps.attachmentRepo.findById(tx, attachmentId),
    );
    if (!att) {
      throw new AttachmentError('NOT_FOUND', 'Attachment not found');
    }
    return att;
  }

  /** Uploader-only, and only while unlinked. Linked attachments go away with their comment. */
  async deleteAttachment(userId: string, attachmentId: string): Promise<void> {
    const { attachmentRepo, logger } = this.deps;

    const deleted = await this.deps.withTransaction(async (tx) => {
      const att = await attachmentRepo.findById(tx, attachmentId);
      if (!att) {
        throw new AttachmentError('NOT_FOUND', 'Attachment not found');
      }
      if (att.uploaderId !== userId) {
        throw new AttachmentError('FORBIDDEN', 'Not the uploader of this attachment');
      }
      if (att.commentId !== null) {
        throw new AttachmentError(
          'STATE',
          'Cannot delete an attachment linked to a comment. Delete the comment instead.',
        );
      }
      if (att.status === 'processing') {
        throw new AttachmentError('STATE', 'Attachment is being processed');
      }

      const removed = await attachmentRepo.deleteUnlinked(tx, attachmentId, userId);
      if (!removed) {
        throw new AttachmentError('STATE', 'Attachment changed while deleting; retry');
      }
      return removed;
    });

    await this.deleteQuietly(storageKeysOwnedBy(deleted), attachmentId);
    logger.info({ attachmentId }, 'Attachment deleted');
  }

  /** Binds ready attachments to a newly created comment, once and for good. */
  async linkToComment(userId: string, commentId: string, attachmentIds: string[]): Promise<Attachment[]> {
    const { attachmentRepo, logger } = this.deps;
    const unique = [...new Set(attachmentIds)];

    const linked = await this.deps.withTransaction(async (tx) => {
      const result: Attachment[] = [];
      for (const id of unique) {
        const att = await attachmentRepo.findById(tx, id);
        if (!att) {
          throw new AttachmentError('NOT_FOUND', `Attachment ${id} not found`);
        }
        if (att.uploaderId !== userId) {
          throw new AttachmentError('FORBIDDEN', `Not the uploader of attachment ${id}`);
        }
        if (att.commentId !== null) {
          throw new AttachmentError('STATE', `Attachment ${id} is already linked to a comment`);
        }
        if (att.status !== 'ready') {
          throw new AttachmentError('STATE', `Attachment ${id} is not ready (status: ${att.status})`);
        }

        const bound = await attachmentRepo.bindToComment(tx, id, commentId);
        if (!bound) {
          throw new AttachmentError('STATE', `Attachment ${id} could not be linked`);
        }
        result.push(bound);
      }
      return result;
    });

    logger.info({ commentId, count: linked.length }, 'Attachments linked to comment');
    return linked;
  }

  /** Called by the comment subsystem after it deletes a comment. */
  async purgeCommentAttachments(commentId: string): Promise<number> {
    const removed = await this.deps.withTransaction((tx) =>
      this.deps.attachmentRepo.deleteByCommentId(tx, commentId),
    );
    for (const att of removed) {
      await this.deleteQuietly(storageKeysOwnedBy(att), att.id);
    }
    if (removed.length > 0) {
      this.deps.logger.info({ commentId, count: removed.length }, 'Comment attachments purged');
    }
    return removed.length;
  }

  private async quarantine(att: Attachment, reason: string): Promise<ReassemblyOutcome> {
    const { attachmentRepo, outbox, logger } = this.deps;
    logger.warn({ attachmentId: att.id, reason }, 'Quarantining attachment');

    let moved: boolean;
    try {
      moved = await this.deps.withTransaction(async (tx) => {
        const ok = await attachmentRepo.quarantine(tx, att.id);
        if (ok) {
          await outbox.append(tx, {
            aggregateType: 'user',
            aggregateId: att.uploaderId,
            eventType: ATTACHMENT_QUARANTINED,
            payload: { attachmentId: att.id, userId: att.uploaderId, reason } satisfies AttachmentQuarantinedPayload,
          });
        }
        return ok;
      });
    } catch (err) {
      logger.error({ attachmentId: att.id, err: errorMessage(err) }, 'Failed to quarantine attachment');
      return 'failed';
    }

    if (!moved) {
      return 'skipped';
    }
    await this.deleteQuietly(chunkKeysFor(att), att.id);
    return 'quarantined';
  }

  private async storeOrFail(key: string, data: Buffer): Promise<void> {
    try {
      await this.deps.storage.store(key, data);
    } catch (err) {
      this.deps.logger.error({ key, err: errorMessage(err) }, 'Storage write failed');
      throw new AttachmentError('STORAGE', 'Attachment storage unavailable', { cause: err });
    }
  }

  private async deleteQuietly(keys: string[], attachmentId: string): Promise<void> {
    for (const key of keys) {
      try {
        await this.deps.storage.delete(key);
      } catch (err) {
        this.deps.logger.warn({ attachmentId, key, err: errorMessage(err) }, 'Failed to delete storage object');
      }
    }
  }
}

export type AttachmentErrorKind =
  | 'VALIDATION'
  | 'TOO_LARGE'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'STATE'
  | 'RANGE'
  | 'INTEGRITY'
  | 'STORAGE';

export class AttachmentError extends Error {
  constructor(
    public readonly kind: AttachmentErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AttachmentError';
  }
}

export function sha256Hex(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
