export {
  ATTACHMENT_STATUSES,
  ABANDONABLE_STATUSES,
  isAttachmentStatus,
  canTransition,
  checkChunkAcceptance,
  isUploadComplete,
  isOrphaned,
  storageKeyFor,
  fitFilename,
  MAX_KEY_LEAF_BYTES,
  chunkKeyFor,
  chunkKeysFor,
  storageKeysOwnedBy,
  type Attachment,
  type AttachmentStatus,
  type NewAttachment,
  type ChunkAcceptance,
} from './attachment';
export {
  ATTACHMENT_READY,
  ATTACHMENT_QUARANTINED,
  type AttachmentReadyPayload,
  type AttachmentQuarantinedPayload,
} from './attachment-events';
export {
  StorageError,
  EncryptionError,
  type AttachmentRepository,
  type StorageBackend,
  type StorageErrorKind,
  type EnvelopeEncryptor,
  type DecryptedChunk,
  type TaskScheduler,
} from './attachment-ports';
export type { OutboxPort, TokenVerifier, LoggerPort, WithTransaction } from './ports';
export {
  FileValidator,
  sanitizeFilename,
  CONTENT_TYPE_CATEGORIES,
  KNOWN_CONTENT_TYPES,
  DEFAULT_SIZE_LIMITS,
  DEFAULT_FILENAME,
  type ContentCategory,
  type FileValidatorOptions,
  type SizeCheck,
  type UploadCheck,
} from './file-validator';
export {
  UploadOrchestrator,
  AttachmentError,
  SIMPLE_UPLOAD_LIMIT,
  sha256Hex,
  errorMessage,
  type AttachmentErrorKind,
  type UploadOrchestratorDeps,
  type ChunkReceipt,
  type ReassemblyOutcome,
} from './upload-orchestrator';
export { OrphanReaper, type OrphanReaperDeps } from './orphan-reaper';
