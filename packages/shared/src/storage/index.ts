import { type StorageBackend } from '@appraise/domain';
import { type StorageConfig } from '../config';
import { LocalStorageBackend } from './local-storage';
import { InMemoryStorageBackend } from './memory-storage';
import { S3StorageBackend } from './s3-storage';

export { LocalStorageBackend, DEFAULT_STREAM_CHUNK_SIZE } from './local-storage';
export { InMemoryStorageBackend } from './memory-storage';
export { S3StorageBackend, type S3StorageConfig } from './s3-storage';
export { assertSafeKey, resolveWithinRoot } from './keys';

export function createStorageBackend(config: StorageConfig): StorageBackend {
  switch (config.STORAGE_BACKEND) {
    case 'local':
      return new LocalStorageBackend(config.STORAGE_LOCAL_PATH);
    case 'memory':
      return new InMemoryStorageBackend();
    case 's3':
      if (!config.S3_ENDPOINT || !config.S3_ACCESS_KEY || !config.S3_SECRET_KEY) {
        throw new Error('S3 storage requires S3_ENDPOINT, S3_ACCESS_KEY and S3_SECRET_KEY');
      }
      return new S3StorageBackend({
        endpoint: config.S3_ENDPOINT,
        accessKey: config.S3_ACCESS_KEY,
        secretKey: config.S3_SECRET_KEY,
        bucket: config.S3_BUCKET,
        prefix: config.S3_PREFIX,
        region: config.S3_REGION,
      });
  }
}
