import pino from 'pino';

const SECRET_KEYS = new Set([
  'masterkey',
  'filekey',
  'encryptedfilekey',
  'dek',
  'uploadsession',
  'token',
  'accesstoken',
  'secret',
  'authorization',
  'cookie',
  'data',
  'body',
  'plaintext',
]);

function isSecretKey(key: string): boolean {
  return SECRET_KEYS.has(key.toLowerCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sanitizeValue(value: unknown): unknown {
  if (value instanceof Uint8Array) {
    return `[${value.byteLength} bytes]`;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (isRecord(value)) {
    return sanitize(value);
  }
  return value;
}

/** Redacts key material and never lets raw file bytes reach the log stream. */
export function sanitize(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = isSecretKey(key) ? '[REDACTED]' : sanitizeValue(value);
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta: Record<string, unknown>, msg: string) {
      logger.info(sanitize(meta), msg);
    },
    warn(meta: Record<string, unknown>, msg: string) {
      logger.warn(sanitize(meta), msg);
    },
    error(meta: Record<string, unknown>, msg: string) {
      logger.error(sanitize(meta), msg);
    },
    debug(meta: Record<string, unknown>, msg: string) {
      logger.debug(sanitize(meta), msg);
    },
    fatal(meta: Record<string, unknown>, msg: string) {
      logger.fatal(sanitize(meta), msg);
    },
    child(bindings: Record<string, unknown>): SafeLogger {
      return wrapPino(logger.child(sanitize(bindings)));
    },
  };
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// Loggers created without an explicit level follow setLogLevel().
const followers = new Set<pino.Logger>();
let processLevel: LogLevel = 'info';

/** Call once LOG_LEVEL is known; module-level loggers exist before config is loaded. */
export function setLogLevel(level: LogLevel): void {
  processLevel = level;
  for (const logger of followers) {
    logger.level = level;
  }
}

export function createLogger(
  opts: { name: string; level?: LogLevel | 'silent' },
  destination?: pino.DestinationStream,
): SafeLogger {
  const options: pino.LoggerOptions = {
    name: opts.name,
    level: opts.level ?? processLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const logger = destination ? pino(options, destination) : pino(options);
  if (!opts.level) followers.add(logger);
  return wrapPino(logger);
}
