export { createLogger, sanitize, setLogLevel, LOG_LEVELS, type LogLevel, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  validatorOptionsFromConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  NatsConfigSchema,
  StorageConfigSchema,
  AttachmentConfigSchema,
  JwtConfigSchema,
  ApiConfigSchema,
  WorkerConfigSchema,
  type BaseConfig,
  type StorageConfig,
  type AttachmentConfig,
  type ApiConfig,
  type WorkerConfig,
} from './config';
export {
  createStorageBackend,
  LocalStorageBackend,
  InMemoryStorageBackend,
  S3StorageBackend,
  DEFAULT_STREAM_CHUNK_SIZE,
  assertSafeKey,
  resolveWithinRoot,
  type S3StorageConfig,
} from './storage';
export { FileEncryptor } from './crypto/file-encryptor';
export { InProcessTaskQueue } from './task-queue';
export { JoseTokenVerifier, type TokenVerifierConfig } from './auth/token-verifier';
export { touchHealthFile, startHealthBeat } from './healthcheck';
