import { randomUUID } from 'node:crypto';
import {
  loadConfig,
  WorkerConfigSchema,
  createLogger,
  setLogLevel,
  createStorageBackend,
  validatorOptionsFromConfig,
  startHealthBeat,
  FileEncryptor,
  InProcessTaskQueue,
} from '@appraise/shared';
import { initPool, closePool, withTransaction, createPgOutbox, PgAttachmentRepository } from '@appraise/db';
import { FileValidator, OrphanReaper, UploadOrchestrator, errorMessage } from '@appraise/domain';
import { connect } from 'nats';
import { startOutboxPublisher } from './outbox-publisher';
import { runRetentionJob } from './jobs/retention';
import { runOrphanSweepJob } from './jobs/orphan-sweep';
import { runReassemblyRecoveryJob } from './jobs/reassembly-recovery';

const logger = createLogger({ name: 'worker' });

const RECOVERY_INTERVAL_MS = 60_000;
const RECOVERY_BATCH_SIZE = 10;
const RETENTION_INTERVAL_MS = 3_600_000;

async function main() {
  const config = loadConfig(WorkerConfigSchema);
  setLogLevel(config.LOG_LEVEL);

  initPool({ connectionString: config.DATABASE_URL });

  const storage = createStorageBackend(config);
  await storage.ensureReady();

  const natsConn = await connect({ servers: config.NATS_URL });
  logger.info({}, 'Connected to NATS');

  const healthBeat = startHealthBeat(logger, 5000, config.WORKER_HEALTHCHECK_PATH);

  const attachmentRepo = new PgAttachmentRepository();
  const queue = new InProcessTaskQueue(logger.child({ component: 'tasks' }));
  const orchestrator = new UploadOrchestrator({
    attachmentRepo,
    storage,
    encryptor: new FileEncryptor(config.ATTACHMENT_MASTER_KEY),
    validator: new FileValidator(validatorOptionsFromConfig(config)),
    outbox: createPgOutbox(),
    scheduler: queue,
    logger: logger.child({ component: 'orchestrator' }),
    generateUuid: () => randomUUID(),
    withTransaction,
  });
  const reaper = new OrphanReaper({
    attachmentRepo,
    storage,
    withTransaction,
    logger: logger.child({ component: 'orphan-reaper' }),
    ttlMinutes: config.STORAGE_ORPHAN_TTL_MINUTES,
    batchSize: config.ORPHAN_SWEEP_BATCH_SIZE,
  });

  const outboxPublisher = await startOutboxPublisher(natsConn, {
    pollIntervalMs: config.OUTBOX_POLL_INTERVAL_MS,
    batchSize: config.OUTBOX_BATCH_SIZE,
  });

  const jobIntervals = [
    setInterval(() => {
      runOrphanSweepJob(reaper, config.ORPHAN_SWEEP_BATCH_SIZE).catch(logJobError('orphan-sweep'));
    }, config.ORPHAN_SWEEP_INTERVAL_MS),
    setInterval(() => {
      runReassemblyRecoveryJob({
        attachmentRepo,
        orchestrator,
        withTransaction,
        logger: logger.child({ job: 'reassembly-recovery' }),
        stuckMs: config.REASSEMBLY_STUCK_MS,
        batchSize: RECOVERY_BATCH_SIZE,
      }).catch(logJobError('reassembly-recovery'));
    }, RECOVERY_INTERVAL_MS),
    setInterval(() => {
      runRetentionJob(config.OUTBOX_RETENTION_DAYS).catch(logJobError('retention'));
    }, RETENTION_INTERVAL_MS),
  ];

  logger.info(
    { orphanTtlMinutes: config.STORAGE_ORPHAN_TTL_MINUTES, storage: config.STORAGE_BACKEND },
    'Worker started',
  );

  const shutdown = async () => {
    logger.info({}, 'Shutting down worker');
    healthBeat.stop();
    outboxPublisher.stop();
    for (const interval of jobIntervals) clearInterval(interval);
    await queue.onIdle();
    await natsConn.drain();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

function logJobError(jobName: string) {
  return (err: unknown) => {
    logger.error({ err: errorMessage(err), job: jobName }, 'Job failed');
  };
}

main().catch((err) => {
  logger.fatal({ err: errorMessage(err) }, 'Failed to start worker');
  process.exit(1);
});
