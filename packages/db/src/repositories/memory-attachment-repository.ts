import {
  canTransition,
  isOrphaned,
  type Attachment,
  type AttachmentRepository,
  type AttachmentStatus,
  type NewAttachment,
  type WithTransaction,
} from '@appraise/domain';

/**
 * Process-local stand-in for PgAttachmentRepository with the same conditional-update semantics.
 * Transactions run one at a time and roll back on error.
 */
export class InMemoryAttachmentRepository implements AttachmentRepository {
  private rows = new Map<string, Attachment>();
  private chunks = new Map<string, Set<number>>();
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly now: () => Date = () => new Date()) {}

  readonly withTransaction: WithTransaction = <T>(fn: (tx: unknown) => Promise<T>): Promise<T> => {
    const run = this.tail.then(() => this.runIsolated(fn));
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  };

  /** Insert a fully formed row, bypassing create(). */
  seed(att: Attachment): void {
    this.rows.set(att.id, { ...att });
  }

  all(): Attachment[] {
    return [...this.rows.values()].map((row) => ({ ...row }));
  }

  async create(_tx: unknown, att: NewAttachment): Promise<Attachment> {
    if (this.rows.has(att.id)) {
      throw new Error(`Duplicate attachment id ${att.id}`);
    }
    const now = this.now();
    const row: Attachment = { ...att, commentId: null, thumbnailStorageKey: null, createdAt: now, updatedAt: now };
    assertRowConstraints(row);
    this.rows.set(row.id, row);
    return { ...row };
  }

  async findById(_tx: unknown, id: string): Promise<Attachment | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async findByIdForUpdate(tx: unknown, id: string): Promise<Attachment | null> {
    return this.findById(tx, id);
  }

  async recordChunk(
    _tx: unknown,
    id: string,
    chunkIndex: number,
  ): Promise<{ receivedChunks: number; totalChunks: number } | null> {
    const row = this.rows.get(id);
    if (!row || row.status !== 'uploading' || row.totalChunks === null) return null;
    if (chunkIndex < 0 || chunkIndex >= row.totalChunks) return null;

    const seen = this.chunks.get(id) ?? new Set<number>();
    seen.add(chunkIndex);
    this.chunks.set(id, seen);
    this.update(row, { receivedChunks: seen.size });
    return { receivedChunks: seen.size, totalChunks: row.totalChunks };
  }

  async completeUpload(_tx: unknown, id: string): Promise<Attachment | null> {
    const row = this.rows.get(id);
    if (!row || !canTransition(row.status, 'processing') || row.receivedChunks !== row.totalChunks) return null;
    return this.update(row, { status: 'processing', uploadSession: null });
  }

  async markReady(
    _tx: unknown,
    id: string,
    outcome: { checksumSha256: string; fileSize: number },
  ): Promise<Attachment | null> {
    const row = this.rows.get(id);
    if (!row || !canTransition(row.status, 'ready')) return null;
    return this.update(row, { status: 'ready', ...outcome });
  }

  async quarantine(_tx: unknown, id: string): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || !canTransition(row.status, 'quarantined')) return false;
    this.update(row, { status: 'quarantined' });
    return true;
  }

  async bindToComment(_tx: unknown, id: string, commentId: string): Promise<Attachment | null> {
    const row = this.rows.get(id);
    if (!row || row.commentId !== null || row.status !== 'ready') return null;
    return this.update(row, { commentId });
  }

  async deleteUnlinked(_tx: unknown, id: string, uploaderId: string): Promise<Attachment | null> {
    const row = this.rows.get(id);
    if (!row || row.uploaderId !== uploaderId || row.commentId !== null || row.status === 'processing') {
      return null;
    }
    return this.remove(row);
  }

  async deleteOrphans(
    _tx: unknown,
    cutoff: Date,
    statuses: readonly AttachmentStatus[],
    limit: number,
  ): Promise<Attachment[]> {
    return [...this.rows.values()]
      .filter((row) => isOrphaned(row, cutoff) && statuses.includes(row.status))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, limit)
      .map((row) => this.remove(row));
  }

  async deleteByCommentId(_tx: unknown, commentId: string): Promise<Attachment[]> {
    return [...this.rows.values()].filter((row) => row.commentId === commentId).map((row) => this.remove(row));
  }

  async claimStuckProcessing(_tx: unknown, olderThanMs: number, limit: number): Promise<Attachment[]> {
    const threshold = this.now().getTime() - olderThanMs;
    return [...this.rows.values()]
      .filter((row) => row.status === 'processing' && row.updatedAt.getTime() < threshold)
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .slice(0, limit)
      .map((row) => this.update(row, {}));
  }

  private async runIsolated<T>(fn: (tx: unknown) => Promise<T>): Promise<T> {
    const rows = new Map([...this.rows].map(([id, row]) => [id, { ...row }]));
    const chunks = new Map([...this.chunks].map(([id, set]) => [id, new Set(set)]));
    try {
      return await fn(this);
    } catch (err) {
      this.rows = rows;
      this.chunks = chunks;
      throw err;
    }
  }

  private update(row: Attachment, patch: Partial<Attachment>): Attachment {
    if (patch.status !== undefined && patch.status !== row.status && !canTransition(row.status, patch.status)) {
      throw new Error(`Illegal status transition ${row.status} -> ${patch.status} for attachment ${row.id}`);
    }
    if (row.commentId !== null && patch.commentId !== undefined && patch.commentId !== row.commentId) {
      throw new Error(`Attachment ${row.id} is already linked to comment ${row.commentId}`);
    }
    const next: Attachment = { ...row, ...patch, updatedAt: this.now() };
    assertRowConstraints(next);
    this.rows.set(row.id, next);
    return { ...next };
  }

  private remove(row: Attachment): Attachment {
    this.rows.delete(row.id);
    this.chunks.delete(row.id);
    return { ...row };
  }
}

/** Same rules as the CHECK constraints on the attachments table. */
function assertRowConstraints(row: Attachment): void {
  const violation = constraintViolation(row);
  if (violation) {
    throw new Error(`Attachment ${row.id} violates ${violation}`);
  }
}

function constraintViolation(row: Attachment): string | null {
  if (row.fileSize < 0) return 'file_size >= 0';
  if (row.totalChunks !== null && (row.totalChunks < 1 || row.totalChunks > 10_000)) {
    return 'total_chunks BETWEEN 1 AND 10000';
  }
  if ((row.totalChunks === null) !== (row.receivedChunks === null)) return 'attachments_chunk_counts_paired';
  if (row.receivedChunks !== null && row.receivedChunks < 0) return 'received_chunks >= 0';
  if (row.totalChunks !== null && row.receivedChunks !== null && row.receivedChunks > row.totalChunks) {
    return 'attachments_received_within_total';
  }
  if (row.status === 'ready' && row.checksumSha256 === null) return 'attachments_ready_has_checksum';
  return null;
}
