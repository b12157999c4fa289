import { type PoolClient } from 'pg';
import {
  isAttachmentStatus,
  type Attachment,
  type AttachmentRepository,
  type AttachmentStatus,
  type NewAttachment,
} from '@appraise/domain';

const COLUMNS = `id, comment_id, uploader_id, upload_session, filename, content_type, file_size,
  storage_key, checksum_sha256, encrypted_file_key, thumbnail_storage_key, status,
  total_chunks, received_chunks, created_at, updated_at`;

export class PgAttachmentRepository implements AttachmentRepository {
  async create(tx: unknown, att: NewAttachment): Promise<Attachment> {
    const client = tx as PoolClient;
    const result = await client.query(
      `INSERT INTO attachments (id, uploader_id, upload_session, filename, content_type, file_size,
         storage_key, checksum_sha256, encrypted_file_key, status, total_chunks, received_chunks)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       RETURNING ${COLUMNS}`,
      [
        att.id,
        att.uploaderId,
        att.uploadSession,
        att.filename,
        att.contentType,
        att.fileSize,
        att.storageKey,
        att.checksumSha256,
        att.encryptedFileKey,
        att.status,
        att.totalChunks,
        att.receivedChunks,
      ],
    );
    return mapAttachmentRow(result.rows[0]);
  }

  async findById(tx: unknown, id: string): Promise<Attachment | null> {
    const client = tx as PoolClient;
    const result = await client.query(`SELECT ${COLUMNS} FROM attachments WHERE id = $1`, [id]);
    return result.rows[0] ? mapAttachmentRow(result.rows[0]) : null;
  }

  async findByIdForUpdate(tx: unknown, id: string): Promise<Attachment | null> {
    const client = tx as PoolClient;
    const result = await client.query(`SELECT ${COLUMNS} FROM attachments WHERE id = $1 FOR UPDATE`, [id]);
    return result.rows[0] ? mapAttachmentRow(result.rows[0]) : null;
  }

  async recordChunk(
    tx: unknown,
    id: string,
    chunkIndex: number,
  ): Promise<{ receivedChunks: number; totalChunks: number } | null> {
    const client = tx as PoolClient;
    await client.query(
      `INSERT INTO attachment_chunks (attachment_id, chunk_index)
       SELECT id, $2::int FROM attachments
       WHERE id = $1 AND status = 'uploading' AND $2::int >= 0 AND $2::int < total_chunks
       ON CONFLICT (attachment_id, chunk_index) DO NOTHING`,
      [id, chunkIndex],
    );
    const result = await client.query(
      `UPDATE attachments
       SET received_chunks = (SELECT COUNT(*) FROM attachment_chunks WHERE attachment_id = $1),
           updated_at = NOW()
       WHERE id = $1 AND status = 'uploading' AND $2::int >= 0 AND $2::int < total_chunks
       RETURNING received_chunks, total_chunks`,
      [id, chunkIndex],
    );
    const row = result.rows[0];
    return row ? { receivedChunks: Number(row.received_chunks), totalChunks: Number(row.total_chunks) } : null;
  }

  async completeUpload(tx: unknown, id: string): Promise<Attachment | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `UPDATE attachments
       SET status = 'processing', upload_session = NULL, updated_at = NOW()
       WHERE id = $1 AND status = 'uploading' AND received_chunks = total_chunks
       RETURNING ${COLUMNS}`,
      [id],
    );
    return result.rows[0] ? mapAttachmentRow(result.rows[0]) : null;
  }

  async markReady(
    tx: unknown,
    id: string,
    outcome: { checksumSha256: string; fileSize: number },
  ): Promise<Attachment | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `UPDATE attachments
       SET status = 'ready', checksum_sha256 = $2, file_size = $3, updated_at = NOW()
       WHERE id = $1 AND status = 'processing'
       RETURNING ${COLUMNS}`,
      [id, outcome.checksumSha256, outcome.fileSize],
    );
    return result.rows[0] ? mapAttachmentRow(result.rows[0]) : null;
  }

  async quarantine(tx: unknown, id: string): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query(
      `UPDATE attachments SET status = 'quarantined', updated_at = NOW()
       WHERE id = $1 AND status = 'processing'`,
      [id],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async bindToComment(tx: unknown, id: string, commentId: string): Promise<Attachment | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `UPDATE attachments SET comment_id = $2, updated_at = NOW()
       WHERE id = $1 AND comment_id IS NULL AND status = 'ready'
       RETURNING ${COLUMNS}`,
      [id, commentId],
    );
    return result.rows[0] ? mapAttachmentRow(result.rows[0]) : null;
  }

  async deleteUnlinked(tx: unknown, id: string, uploaderId: string): Promise<Attachment | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `DELETE FROM attachments
       WHERE id = $1 AND uploader_id = $2 AND comment_id IS NULL AND status <> 'processing'
       RETURNING ${COLUMNS}`,
      [id, uploaderId],
    );
    return result.rows[0] ? mapAttachmentRow(result.rows[0]) : null;
  }

  /** The outer comment_id check re-runs after the lock, so a row linked meanwhile survives. */
  async deleteOrphans(
    tx: unknown,
    cutoff: Date,
    statuses: readonly AttachmentStatus[],
    limit: number,
  ): Promise<Attachment[]> {
    const client = tx as PoolClient;
    const result = await client.query(
      `DELETE FROM attachments
       WHERE id IN (
         SELECT id FROM attachments
         WHERE comment_id IS NULL
           AND status = ANY($2::attachment_status[])
           AND created_at < $1
         ORDER BY created_at ASC
         LIMIT $3
         FOR UPDATE SKIP LOCKED
       )
       AND comment_id IS NULL
       RETURNING ${COLUMNS}`,
      [cutoff, [...statuses], limit],
    );
    return result.rows.map(mapAttachmentRow);
  }

  async deleteByCommentId(tx: unknown, commentId: string): Promise<Attachment[]> {
    const client = tx as PoolClient;
    const result = await client.query(
      `DELETE FROM attachments WHERE comment_id = $1 RETURNING ${COLUMNS}`,
      [commentId],
    );
    return result.rows.map(mapAttachmentRow);
  }

  async claimStuckProcessing(tx: unknown, olderThanMs: number, limit: number): Promise<Attachment[]> {
    const client = tx as PoolClient;
    const result = await client.query(
      `UPDATE attachments SET updated_at = NOW()
       WHERE id IN (
         SELECT id FROM attachments
         WHERE status = 'processing'
           AND updated_at < NOW() - ($1::bigint * interval '1 millisecond')
         ORDER BY updated_at ASC
         LIMIT $2
         FOR UPDATE SKIP LOCKED
       )
       RETURNING ${COLUMNS}`,
      [olderThanMs, limit],
    );
    return result.rows.map(mapAttachmentRow);
  }
}

function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}

function toNullableNumber(value: unknown): number | null {
  return value === null || value === undefined ? null : Number(value);
}

function toNullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

export function mapAttachmentRow(row: Record<string, unknown>): Attachment {
  const status = row.status;
  if (!isAttachmentStatus(status)) {
    throw new Error(`Unknown attachment status: ${String(status)}`);
  }
  return {
    id: String(row.id),
    commentId: toNullableString(row.comment_id),
    uploaderId: String(row.uploader_id),
    uploadSession: toNullableString(row.upload_session),
    filename: String(row.filename),
    contentType: String(row.content_type),
    fileSize: Number(row.file_size),
    storageKey: String(row.storage_key),
    checksumSha256: toNullableString(row.checksum_sha256),
    encryptedFileKey: String(row.encrypted_file_key),
    thumbnailStorageKey: toNullableString(row.thumbnail_storage_key),
    status,
    totalChunks: toNullableNumber(row.total_chunks),
    receivedChunks: toNullableNumber(row.received_chunks),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}
