import { type NatsConnection, StringCodec } from 'nats';
import { type PoolClient } from 'pg';
import { fetchUnpublishedEvents, markPublished, incrementRetryCount, getPool } from '@appraise/db';
import { errorMessage } from '@appraise/domain';
import { createLogger } from '@appraise/shared';
import { createEnvelope, resolveOutboxSubject } from '@appraise/proto';

const logger = createLogger({ name: 'worker:outbox' });
const sc = StringCodec();

type Publisher = Pick<NatsConnection, 'publish'>;

/** Publishes one batch inside the caller's transaction. Returns how many events went out. */
export async function publishOutboxBatch(
  client: PoolClient,
  natsConn: Publisher,
  batchSize: number,
): Promise<number> {
  const events = await fetchUnpublishedEvents(client, batchSize);
  const publishedIds: string[] = [];

  for (const event of events) {
    const subject = resolveOutboxSubject(event.aggregateType, event.aggregateId, event.eventType);
    const envelope = createEnvelope(event.id, event.eventType, {
      aggregateType: event.aggregateType,
      aggregateId: event.aggregateId,
      payload: event.payload,
      timestamp: event.createdAt,
    });
    try {
      natsConn.publish(subject, sc.encode(JSON.stringify(envelope)));
      publishedIds.push(event.id);
    } catch (err) {
      logger.warn(
        { eventId: event.id, subject, retryCount: event.retryCount + 1, err: errorMessage(err) },
        'Failed to publish outbox event',
      );
      await incrementRetryCount(client, event.id);
    }
  }

  await markPublished(client, publishedIds);
  return publishedIds.length;
}

export async function startOutboxPublisher(
  natsConn: NatsConnection,
  opts: { pollIntervalMs: number; batchSize: number },
): Promise<{ stop: () => void }> {
  let running = true;

  const loop = async () => {
    while (running) {
      try {
        const client = await getPool().connect();
        try {
          await client.query('BEGIN');
          const count = await publishOutboxBatch(client, natsConn, opts.batchSize);
          await client.query('COMMIT');
          if (count > 0) {
            logger.info({ count }, 'Published outbox events');
          }
        } catch (innerErr) {
          await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
            logger.warn({ err: errorMessage(rollbackErr) }, 'Outbox rollback failed');
          });
          throw innerErr;
        } finally {
          client.release();
        }
      } catch (err) {
        logger.error({ err: errorMessage(err) }, 'Outbox publisher error');
      }

      await sleep(opts.pollIntervalMs);
    }
  };

  loop().catch((err) => {
    logger.fatal({ err: errorMessage(err) }, 'Outbox publisher crashed');
  });

  return {
    stop: () => {
      running = false;
    },
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
