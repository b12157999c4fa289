import { ABANDONABLE_STATUSES, storageKeysOwnedBy } from './attachment';
import { type AttachmentRepository, type StorageBackend } from './attachment-ports';
import { type LoggerPort, type WithTransaction } from './ports';
import { errorMessage } from './upload-orchestrator';

export interface OrphanReaperDeps {
  attachmentRepo: AttachmentRepository;
  storage: StorageBackend;
  withTransaction: WithTransaction;
  logger: LoggerPort;
  ttlMinutes: number;
  batchSize: number;
  now?: () => Date;
}

/**
 * Reclaims attachments that were never bound to a comment within the TTL.
 * The row is removed first, in one statement that re-checks comment_id, so a
 * concurrent link either wins (row kept) or loses (row gone before it binds).
 */
export class OrphanReaper {
  private readonly now: () => Date;

  constructor(private readonly deps: OrphanReaperDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  cutoff(): Date {
    return new Date(this.now().getTime() - this.deps.ttlMinutes * 60_000);
  }

  async sweep(): Promise<number> {
    const { attachmentRepo, storage, logger } = this.deps;
    const cutoff = this.cutoff();

    const removed = await this.deps.withTransaction((tx) =>
      attachmentRepo.deleteOrphans(tx, cutoff, ABANDONABLE_STATUSES, this.deps.batchSize),
    );

    for (const att of removed) {
      for (const key of storageKeysOwnedBy(att)) {
        try {
          await storage.delete(key);
        } catch (err) {
          logger.warn({ attachmentId: att.id, key, err: errorMessage(err) }, 'Failed to delete orphaned object');
        }
      }
    }

    if (removed.length > 0) {
      logger.info({ count: removed.length, cutoff: cutoff.toISOString() }, 'Cleaned up orphaned attachments');
    }
    return removed.length;
  }
}
