import { randomUUID } from 'node:crypto';
import { buildServer } from './server';
import {
  loadConfig,
  ApiConfigSchema,
  createLogger,
  setLogLevel,
  createStorageBackend,
  validatorOptionsFromConfig,
  FileEncryptor,
  InProcessTaskQueue,
  JoseTokenVerifier,
} from '@appraise/shared';
import { FileValidator, UploadOrchestrator, errorMessage } from '@appraise/domain';
import { initPool, closePool, withTransaction, createPgOutbox, PgAttachmentRepository } from '@appraise/db';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);
  setLogLevel(config.LOG_LEVEL);

  initPool({ connectionString: config.DATABASE_URL });

  const storage = createStorageBackend(config);
  await storage.ensureReady();

  const queue = new InProcessTaskQueue(logger.child({ component: 'tasks' }));

  const orchestrator = new UploadOrchestrator({
    attachmentRepo: new PgAttachmentRepository(),
    storage,
    encryptor: new FileEncryptor(config.ATTACHMENT_MASTER_KEY),
    validator: new FileValidator(validatorOptionsFromConfig(config)),
    outbox: createPgOutbox(),
    scheduler: queue,
    logger: logger.child({ component: 'orchestrator' }),
    generateUuid: () => randomUUID(),
    withTransaction,
    simpleUploadLimit: config.SIMPLE_UPLOAD_LIMIT_BYTES,
  });

  const app = await buildServer({
    orchestrator,
    tokenVerifier: new JoseTokenVerifier({ keys: config.JWT_KEYS, issuer: config.JWT_ISSUER }),
    uploadBodyLimit: Math.max(config.SIMPLE_UPLOAD_LIMIT_BYTES, config.CHUNK_BODY_LIMIT_BYTES),
  });

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT, storage: config.STORAGE_BACKEND }, 'API server started');

  const shutdown = async () => {
    logger.info({ pendingTasks: queue.size }, 'Shutting down API server');
    await app.close();
    await queue.onIdle();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  logger.fatal({ err: errorMessage(err) }, 'Failed to start API');
  process.exit(1);
});
