export const ATTACHMENT_STATUSES = [
  'uploading',
  'processing',
  'ready',
  'quarantined',
  // Never persisted by this service; orphaned rows are found with isOrphaned().
  'orphaned',
] as const;

export type AttachmentStatus = (typeof ATTACHMENT_STATUSES)[number];

export interface Attachment {
  id: string;
  commentId: string | null;
  uploaderId: string;
  uploadSession: string | null;
  filename: string;
  contentType: string;
  fileSize: number;
  storageKey: string;
  checksumSha256: string | null;
  encryptedFileKey: string;
  thumbnailStorageKey: string | null;
  status: AttachmentStatus;
  totalChunks: number | null;
  receivedChunks: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewAttachment = Omit<Attachment, 'commentId' | 'thumbnailStorageKey' | 'createdAt' | 'updatedAt'>;

/** Statuses the orphan reaper may reclaim. `processing` is excluded: reassembly owns it. */
export const ABANDONABLE_STATUSES: readonly AttachmentStatus[] = ['uploading', 'ready', 'quarantined'];

const TRANSITIONS: Record<AttachmentStatus, readonly AttachmentStatus[]> = {
  uploading: ['processing'],
  processing: ['ready', 'quarantined'],
  ready: [],
  quarantined: [],
  orphaned: [],
};

const STATUS_SET: ReadonlySet<string> = new Set(ATTACHMENT_STATUSES);

export function isAttachmentStatus(value: unknown): value is AttachmentStatus {
  return typeof value === 'string' && STATUS_SET.has(value);
}

export function canTransition(from: AttachmentStatus, to: AttachmentStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export type ChunkAcceptance =
  | { ok: true }
  | { ok: false; kind: 'STATE' | 'RANGE'; reason: string };

export function checkChunkAcceptance(att: Attachment, chunkIndex: number): ChunkAcceptance {
  if (att.status !== 'uploading') {
    return { ok: false, kind: 'STATE', reason: `Upload is not accepting chunks (status: ${att.status})` };
  }
  const total = att.totalChunks ?? 0;
  if (!Number.isInteger(chunkIndex) || chunkIndex < 0 || chunkIndex >= total) {
    return { ok: false, kind: 'RANGE', reason: `Chunk index ${chunkIndex} exceeds total chunks ${total}` };
  }
  return { ok: true };
}

export function isUploadComplete(att: Attachment): boolean {
  return att.totalChunks !== null && att.receivedChunks === att.totalChunks;
}

export function isOrphaned(att: Attachment, cutoff: Date): boolean {
  return (
    att.commentId === null &&
    ABANDONABLE_STATUSES.includes(att.status) &&
    att.createdAt.getTime() < cutoff.getTime()
  );
}

/** Chunk keys append `.chunk_NNNNNN` (13 bytes); the leaf plus that suffix must fit in 255 bytes. */
export const MAX_KEY_LEAF_BYTES = 242;

/** attachments/ab/cd/<id>/<filename>: two shard levels keep directories small. */
export function storageKeyFor(attachmentId: string, filename: string): string {
  const leaf = fitFilename(filename, MAX_KEY_LEAF_BYTES);
  return `attachments/${attachmentId.slice(0, 2)}/${attachmentId.slice(2, 4)}/${attachmentId}/${leaf}`;
}

/** Truncates to maxBytes of UTF-8, keeping the extension when there is room for it. */
export function fitFilename(name: string, maxBytes: number): string {
  if (Buffer.byteLength(name, 'utf8') <= maxBytes) return name;
  const dot = name.lastIndexOf('.');
  const ext = dot > 0 ? name.slice(dot) : '';
  const stem = dot > 0 ? name.slice(0, dot) : name;
  const budget = maxBytes - Buffer.byteLength(ext, 'utf8');
  return budget > 0 ? truncateUtf8(stem, budget) + ext : truncateUtf8(name, maxBytes);
}

function truncateUtf8(value: string, maxBytes: number): string {
  let out = '';
  let used = 0;
  for (const ch of value) {
    const size = Buffer.byteLength(ch, 'utf8');
    if (used + size > maxBytes) break;
    out += ch;
    used += size;
  }
  return out;
}

export function chunkKeyFor(storageKey: string, chunkIndex: number): string {
  return `${storageKey}.chunk_${String(chunkIndex).padStart(6, '0')}`;
}

export function chunkKeysFor(att: Pick<Attachment, 'storageKey' | 'totalChunks'>): string[] {
  const keys: string[] = [];
  for (let i = 0; i < (att.totalChunks ?? 0); i++) {
    keys.push(chunkKeyFor(att.storageKey, i));
  }
  return keys;
}

/** Objects a row may own in storage. Ready rows already had their chunks removed. */
export function storageKeysOwnedBy(att: Attachment): string[] {
  const keys = [att.storageKey];
  if (att.thumbnailStorageKey) keys.push(att.thumbnailStorageKey);
  return att.status === 'ready' ? keys : keys.concat(chunkKeysFor(att));
}
