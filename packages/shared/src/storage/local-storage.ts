import { randomUUID } from 'node:crypto';
import { appendFile, mkdir, open, readFile, rename, rm, rmdir, stat, writeFile, type FileHandle } from 'node:fs/promises';
import { dirname, join, resolve, sep } from 'node:path';
import { StorageError, errorMessage, type StorageBackend } from '@appraise/domain';
import { resolveWithinRoot } from './keys';

export const DEFAULT_STREAM_CHUNK_SIZE = 64 * 1024;

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

function toStorageError(key: string, err: unknown): StorageError {
  if (err instanceof StorageError) return err;
  if (errnoCode(err) === 'ENOENT') {
    return new StorageError('NOT_FOUND', `Object not found: ${key}`, key, { cause: err });
  }
  return new StorageError('IO', `Storage operation failed for ${key}`, key, { cause: err });
}

/** Files under a root directory. Keys map one-to-one onto relative paths. */
export class LocalStorageBackend implements StorageBackend {
  private readonly root: string;

  constructor(rootPath: string) {
    this.root = resolve(rootPath);
  }

  async ensureReady(): Promise<void> {
    await mkdir(this.root, { recursive: true });
  }

  async store(key: string, data: Buffer): Promise<void> {
    const target = resolveWithinRoot(this.root, key);
    // The target leaf may already use the full 255 bytes of a path segment.
    const tmp = join(dirname(target), `.${randomUUID()}.tmp`);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(tmp, data);
      await rename(tmp, target);
    } catch (err) {
      const failure = toStorageError(key, err);
      try {
        await rm(tmp, { force: true });
      } catch (cleanupErr) {
        throw new StorageError(
          failure.kind,
          `${failure.message} (temp file cleanup failed: ${errorMessage(cleanupErr)})`,
          key,
          { cause: err },
        );
      }
      throw failure;
    }
  }

  async retrieve(key: string): Promise<Buffer> {
    const target = resolveWithinRoot(this.root, key);
    try {
      return await readFile(target);
    } catch (err) {
      throw toStorageError(key, err);
    }
  }

  async *stream(key: string, chunkSize: number = DEFAULT_STREAM_CHUNK_SIZE): AsyncIterable<Buffer> {
    const target = resolveWithinRoot(this.root, key);
    const size = Math.max(1, Math.floor(chunkSize));

    let handle: FileHandle;
    try {
      handle = await open(target, 'r');
    } catch (err) {
      throw toStorageError(key, err);
    }

    try {
      for (;;) {
        const buf = Buffer.alloc(size);
        const { bytesRead } = await handle.read(buf, 0, size, null);
        if (bytesRead === 0) break;
        yield bytesRead === size ? buf : buf.subarray(0, bytesRead);
      }
    } finally {
      await handle.close();
    }
  }

  async delete(key: string): Promise<void> {
    const target = resolveWithinRoot(this.root, key);
    try {
      await rm(target, { force: true });
      await this.pruneEmptyParents(dirname(target));
    } catch (err) {
      throw toStorageError(key, err);
    }
  }

  async exists(key: string): Promise<boolean> {
    const target = resolveWithinRoot(this.root, key);
    try {
      return (await stat(target)).isFile();
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return false;
      throw toStorageError(key, err);
    }
  }

  async appendChunk(key: string, data: Buffer): Promise<void> {
    const target = resolveWithinRoot(this.root, key);
    try {
      await mkdir(dirname(target), { recursive: true });
      await appendFile(target, data);
    } catch (err) {
      throw toStorageError(key, err);
    }
  }

  /** Walk up from dir removing empty directories, never touching the root itself. */
  private async pruneEmptyParents(dir: string): Promise<void> {
    let current = dir;
    while (current.startsWith(this.root + sep)) {
      try {
        await rmdir(current);
      } catch (err) {
        const code = errnoCode(err);
        if (code === 'ENOTEMPTY' || code === 'EEXIST') return;
        if (code !== 'ENOENT') throw err;
      }
      current = dirname(current);
    }
  }
}
