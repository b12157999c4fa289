import { StorageError, type StorageBackend } from '@appraise/domain';
import { assertSafeKey } from './keys';
import { DEFAULT_STREAM_CHUNK_SIZE } from './local-storage';

export class InMemoryStorageBackend implements StorageBackend {
  private readonly objects = new Map<string, Buffer>();

  async ensureReady(): Promise<void> {}

  async store(key: string, data: Buffer): Promise<void> {
    assertSafeKey(key);
    this.objects.set(key, Buffer.from(data));
  }

  async retrieve(key: string): Promise<Buffer> {
    assertSafeKey(key);
    const found = this.objects.get(key);
    if (!found) {
      throw new StorageError('NOT_FOUND', `Object not found: ${key}`, key);
    }
    return Buffer.from(found);
  }

  async *stream(key: string, chunkSize: number = DEFAULT_STREAM_CHUNK_SIZE): AsyncIterable<Buffer> {
    const data = await this.retrieve(key);
    const size = Math.max(1, Math.floor(chunkSize));
    for (let offset = 0; offset < data.length; offset += size) {
      yield data.subarray(offset, offset + size);
    }
  }

  async delete(key: string): Promise<void> {
    assertSafeKey(key);
    this.objects.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    assertSafeKey(key);
    return this.objects.has(key);
  }

  async appendChunk(key: string, data: Buffer): Promise<void> {
    assertSafeKey(key);
    this.objects.set(key, Buffer.concat([this.objects.get(key) ?? Buffer.alloc(0), data]));
  }

  /** Sorted list of stored keys. */
  keys(): string[] {
    return [...this.objects.keys()].sort();
  }
}
