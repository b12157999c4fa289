import { createLogger } from '@appraise/shared';
import { withTransaction, deletePublishedBefore } from '@appraise/db';

const logger = createLogger({ name: 'worker:retention' });

const DAY_MS = 24 * 60 * 60 * 1000;

export async function runRetentionJob(retentionDays: number, now: Date = new Date()): Promise<number> {
  const cutoff = new Date(now.getTime() - retentionDays * DAY_MS);

  const count = await withTransaction((tx) => deletePublishedBefore(tx, cutoff));
  if (count > 0) {
    logger.info({ count, cutoff: cutoff.toISOString() }, 'Cleaned up old outbox events');
  }
  return count;
}
