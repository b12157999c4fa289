import { describe, it, expect } from 'vitest';
import { InMemoryStorageBackend } from '../storage/memory-storage';

describe('InMemoryStorageBackend', () => {
  it('copies data in and out', async () => {
    const storage = new InMemoryStorageBackend();
    const data = Buffer.from('abc');

    await storage.store('k', data);
    data[0] = 0x7a;
    const out = await storage.retrieve('k');
    out[1] = 0x7a;

    expect(await storage.retrieve('k')).toEqual(Buffer.from('abc'));
  });

  it('deletes idempotently', async () => {
    const storage = new InMemoryStorageBackend();
    await storage.store('k', Buffer.from('x'));

    await storage.delete('k');
    await storage.delete('k');

    expect(storage.keys()).toEqual([]);
    await expect(storage.retrieve('k')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
  });

  it('streams and appends', async () => {
    const storage = new InMemoryStorageBackend();
    await storage.appendChunk('k', Buffer.from('hello '));
    await storage.appendChunk('k', Buffer.from('world'));

    const parts: string[] = [];
    for await (const part of storage.stream('k', 5)) parts.push(part.toString());

    expect(parts).toEqual(['hello', ' worl', 'd']);
  });

  it('applies the same key rules as the disk backend', async () => {
    const storage = new InMemoryStorageBackend();

    await expect(storage.store('../x', Buffer.from('x'))).rejects.toMatchObject({ kind: 'PATH_TRAVERSAL' });
  });
});
