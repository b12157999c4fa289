export { initPool, closePool, getPool, withTransaction } from './client';
export {
  appendOutboxEvent,
  createPgOutbox,
  fetchUnpublishedEvents,
  markPublished,
  incrementRetryCount,
  deletePublishedBefore,
  type OutboxEvent,
} from './outbox';
export { PgAttachmentRepository, mapAttachmentRow } from './repositories/attachment-repository';
export { InMemoryAttachmentRepository } from './repositories/memory-attachment-repository';
