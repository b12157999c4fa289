import { randomUUID } from 'node:crypto';
import { type PoolClient } from 'pg';
import { type OutboxPort } from '@appraise/domain';

export interface OutboxEvent {
  id: string;
  aggregateType: string;
  aggregateId: string;
  eventType: string;
  payload: Record<string, unknown>;
  createdAt: Date;
  publishedAt: Date | null;
  retryCount: number;
}

export async function appendOutboxEvent(
  client: PoolClient,
  id: string,
  event: {
    aggregateType: string;
    aggregateId: string;
    eventType: string;
    payload: Record<string, unknown>;
  },
): Promise<void> {
  await client.query(
    `INSERT INTO outbox_events (id, aggregate_type, aggregate_id, event_type, payload)
     VALUES ($1, $2, $3, $4, $5)`,
    [id, event.aggregateType, event.aggregateId, event.eventType, JSON.stringify(event.payload)],
  );
}

/** Outbox writes share the caller's transaction, so an event exists iff its state change committed. */
export function createPgOutbox(generateId: () => string = randomUUID): OutboxPort {
  return {
    async append(tx, event) {
      const eventId = generateId();
      await appendOutboxEvent(tx as PoolClient, eventId, event);
      return eventId;
    },
  };
}

export async function fetchUnpublishedEvents(
  client: PoolClient,
  batchSize: number,
): Promise<OutboxEvent[]> {
  const result = await client.query(
    `SELECT id, aggregate_type, aggregate_id, event_type, payload,
            created_at, published_at, retry_count
     FROM outbox_events
     WHERE published_at IS NULL
     ORDER BY created_at ASC
     LIMIT $1
     FOR UPDATE SKIP LOCKED`,
    [batchSize],
  );
  return result.rows.map(mapRow);
}

export async function markPublished(
  client: PoolClient,
  ids: string[],
): Promise<void> {
  if (ids.length === 0) return;
  await client.query(
    `UPDATE outbox_events SET published_at = NOW() WHERE id = ANY($1::uuid[])`,
    [ids],
  );
}

export async function incrementRetryCount(client: PoolClient, id: string): Promise<void> {
  await client.query(`UPDATE outbox_events SET retry_count = retry_count + 1 WHERE id = $1`, [id]);
}

export async function deletePublishedBefore(client: PoolClient, cutoff: Date): Promise<number> {
  const result = await client.query(
    `DELETE FROM outbox_events WHERE published_at IS NOT NULL AND published_at < $1`,
    [cutoff],
  );
  return result.rowCount ?? 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function mapRow(row: Record<string, unknown>): OutboxEvent {
  return {
    id: String(row.id),
    aggregateType: String(row.aggregate_type),
    aggregateId: String(row.aggregate_id),
    eventType: String(row.event_type),
    payload: isRecord(row.payload) ? row.payload : {},
    createdAt: row.created_at instanceof Date ? row.created_at : new Date(String(row.created_at)),
    publishedAt: row.published_at instanceof Date ? row.published_at : null,
    retryCount: Number(row.retry_count),
  };
}
