import { z } from 'zod';
import { KNOWN_CONTENT_TYPES, type FileValidatorOptions } from '@appraise/domain';
import { LOG_LEVELS } from './logger';

const MB = 1024 * 1024;

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

export const NatsConfigSchema = z.object({
  NATS_URL: z.string().default('nats://localhost:4222'),
});

export const StorageConfigSchema = z
  .object({
    STORAGE_BACKEND: z.enum(['local', 's3', 'memory']).default('local'),
    STORAGE_LOCAL_PATH: z.string().min(1).default('./data/attachments'),
    S3_ENDPOINT: z.string().url().optional(),
    S3_ACCESS_KEY: z.string().min(1).optional(),
    S3_SECRET_KEY: z.string().min(1).optional(),
    S3_BUCKET: z.string().min(1).default('attachments'),
    S3_PREFIX: z.string().default(''),
    S3_REGION: z.string().default('us-east-1'),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.STORAGE_BACKEND !== 's3') return;
    for (const key of ['S3_ENDPOINT', 'S3_ACCESS_KEY', 'S3_SECRET_KEY'] as const) {
      if (!cfg[key]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Required when STORAGE_BACKEND=s3' });
      }
    }
  });

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

const contentTypeList = z
  .string()
  .transform((raw) =>
    raw
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  )
  .pipe(
    z
      .array(z.string().refine((t) => KNOWN_CONTENT_TYPES.includes(t), (t) => ({ message: `Unknown content type: ${t}` })))
      .min(1),
  );

export const AttachmentConfigSchema = z.object({
  ATTACHMENT_MASTER_KEY: z.string().min(32),
  STORAGE_ORPHAN_TTL_MINUTES: z.coerce.number().int().positive().default(60),
  SIZE_LIMIT_IMAGE_MB: z.coerce.number().positive().default(20),
  SIZE_LIMIT_VIDEO_MB: z.coerce.number().positive().default(200),
  SIZE_LIMIT_AUDIO_MB: z.coerce.number().positive().default(50),
  SIZE_LIMIT_DOCUMENT_MB: z.coerce.number().positive().default(30),
  ALLOWED_CONTENT_TYPES: contentTypeList.optional(),
});

export type AttachmentConfig = z.infer<typeof AttachmentConfigSchema>;

export const JwtConfigSchema = z.object({
  JWT_KEYS: z
    .string()
    .transform((raw, ctx) => {
      try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_KEYS must be valid JSON' });
        return z.NEVER;
      }
    })
    .pipe(z.array(z.object({ kid: z.string().min(1), secret: z.string().min(32) })).min(1)),
  JWT_ISSUER: z.string().min(1).optional(),
});

const SharedAppSchema = BaseConfigSchema.merge(DatabaseConfigSchema).merge(AttachmentConfigSchema);

export const ApiConfigSchema = SharedAppSchema.merge(JwtConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().default(3000),
    SIMPLE_UPLOAD_LIMIT_BYTES: z.coerce.number().int().positive().default(5 * MB),
    CHUNK_BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(16 * MB),
  })
  .and(StorageConfigSchema);

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const WorkerConfigSchema = SharedAppSchema.merge(NatsConfigSchema)
  .extend({
    OUTBOX_POLL_INTERVAL_MS: z.coerce.number().default(1000),
    OUTBOX_BATCH_SIZE: z.coerce.number().default(100),
    WORKER_HEALTHCHECK_PATH: z.string().default('/tmp/.worker-healthy'),
    ORPHAN_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
    ORPHAN_SWEEP_BATCH_SIZE: z.coerce.number().int().positive().default(100),
    REASSEMBLY_STUCK_MS: z.coerce.number().int().positive().default(15 * 60_000),
    OUTBOX_RETENTION_DAYS: z.coerce.number().int().positive().default(7),
  })
  .and(StorageConfigSchema);

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

export function validatorOptionsFromConfig(cfg: AttachmentConfig): FileValidatorOptions {
  return {
    allowedContentTypes: cfg.ALLOWED_CONTENT_TYPES,
    sizeLimits: {
      image: cfg.SIZE_LIMIT_IMAGE_MB * MB,
      video: cfg.SIZE_LIMIT_VIDEO_MB * MB,
      audio: cfg.SIZE_LIMIT_AUDIO_MB * MB,
      document: cfg.SIZE_LIMIT_DOCUMENT_MB * MB,
    },
  };
}

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
