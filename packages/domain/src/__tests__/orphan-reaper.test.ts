import { describe, it, expect, vi } from 'vitest';
import { OrphanReaper, type OrphanReaperDeps } from '../orphan-reaper';
import { ABANDONABLE_STATUSES, type Attachment } from '../attachment';
import { StorageError } from '../attachment-ports';

function makeAttachment(overrides: Partial<Attachment> = {}): Attachment {
  return {
    id: 'att-1',
    commentId: null,
    uploaderId: 'user-1',
    uploadSession: null,
    filename: 'photo.jpg',
    contentType: 'image/jpeg',
    fileSize: 1024,
    storageKey: 'attachments/at/t-/att-1/photo.jpg',
    checksumSha256: 'abc',
    encryptedFileKey: 'wrapped',
    thumbnailStorageKey: null,
    status: 'ready',
    totalChunks: null,
    receivedChunks: null,
    createdAt: new Date('2026-03-01T09:00:00Z'),
    updatedAt: new Date('2026-03-01T09:00:00Z'),
    ...overrides,
  };
}

function createMockDeps(overrides: Partial<OrphanReaperDeps> = {}): OrphanReaperDeps {
  return {
    attachmentRepo: {
      create: vi.fn(),
      findById: vi.fn(async () => null),
      findByIdForUpdate: vi.fn(async () => null),
      recordChunk: vi.fn(async () => null),
      completeUpload: vi.fn(async () => null),
      markReady: vi.fn(async () => null),
      quarantine: vi.fn(async () => false),
      bindToComment: vi.fn(async () => null),
      deleteUnlinked: vi.fn(async () => null),
      deleteOrphans: vi.fn(async () => []),
      deleteByCommentId: vi.fn(async () => []),
      claimStuckProcessing: vi.fn(async () => []),
    },
    storage: {
      ensureReady: vi.fn(async () => {}),
      store: vi.fn(async () => {}),
      retrieve: vi.fn(async () => Buffer.alloc(0)),
      stream: vi.fn(),
      delete: vi.fn(async () => {}),
      exists: vi.fn(async () => false),
      appendChunk: vi.fn(async () => {}),
    },
    withTransaction: (fn) => fn({}),
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
    ttlMinutes: 60,
    batchSize: 100,
    now: () => new Date('2026-03-01T12:00:00Z'),
    ...overrides,
  };
}

describe('OrphanReaper', () => {
  it('asks for unlinked rows older than the TTL', async () => {
    const deps = createMockDeps();

    await new OrphanReaper(deps).sweep();

    expect(deps.attachmentRepo.deleteOrphans).toHaveBeenCalledWith(
      expect.anything(),
      new Date('2026-03-01T11:00:00Z'),
      ABANDONABLE_STATUSES,
      100,
    );
  });

  it('deletes the objects of every removed row', async () => {
    const deps = createMockDeps();
    vi.mocked(deps.attachmentRepo.deleteOrphans).mockResolvedValue([
      makeAttachment(),
      makeAttachment({
        id: 'att-2',
        status: 'uploading',
        storageKey: 'attachments/at/t-/att-2/clip.mp4',
        totalChunks: 2,
        receivedChunks: 1,
      }),
    ]);

    const count = await new OrphanReaper(deps).sweep();

    expect(count).toBe(2);
    expect(vi.mocked(deps.storage.delete).mock.calls.map(([key]) => key)).toEqual([
      'attachments/at/t-/att-1/photo.jpg',
      'attachments/at/t-/att-2/clip.mp4',
      'attachments/at/t-/att-2/clip.mp4.chunk_000000',
      'attachments/at/t-/att-2/clip.mp4.chunk_000001',
    ]);
    expect(deps.logger.info).toHaveBeenCalledWith(
      { count: 2, cutoff: '2026-03-01T11:00:00.000Z' },
      'Cleaned up orphaned attachments',
    );
  });

  it('keeps going when an object cannot be deleted', async () => {
    const deps = createMockDeps();
    vi.mocked(deps.attachmentRepo.deleteOrphans).mockResolvedValue([
      makeAttachment(),
      makeAttachment({ id: 'att-2', storageKey: 'attachments/at/t-/att-2/b.jpg' }),
    ]);
    vi.mocked(deps.storage.delete).mockRejectedValueOnce(new StorageError('IO', 'timeout', 'k'));

    expect(await new OrphanReaper(deps).sweep()).toBe(2);
    expect(deps.storage.delete).toHaveBeenCalledTimes(2);
    expect(deps.logger.warn).toHaveBeenCalledTimes(1);
  });

  it('returns zero and logs nothing when there is nothing to reclaim', async () => {
    const deps = createMockDeps();

    expect(await new OrphanReaper(deps).sweep()).toBe(0);
    expect(deps.logger.info).not.toHaveBeenCalled();
  });

  it('computes the cutoff from the configured TTL', () => {
    const reaper = new OrphanReaper(createMockDeps({ ttlMinutes: 1 }));
    expect(reaper.cutoff()).toEqual(new Date('2026-03-01T11:59:00Z'));
  });
});
