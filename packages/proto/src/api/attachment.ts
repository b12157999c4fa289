import { z } from 'zod';

export const MAX_TOTAL_CHUNKS = 10_000;
export const MAX_FILENAME_INPUT = 1000;

/** Filenames are sanitized server-side; this only bounds the raw input. */
const FilenameInput = z.string().trim().min(1, 'Filename is required').max(MAX_FILENAME_INPUT);

export const InitChunkedUploadRequestSchema = z.object({
  filename: FilenameInput,
  contentType: z.string().trim().min(1, 'Content type is required').max(100),
  totalSize: z.number().int().min(1),
  totalChunks: z.number().int().min(1).max(MAX_TOTAL_CHUNKS),
});

export const SimpleUploadQuerySchema = z.object({
  filename: FilenameInput,
});

export const AttachmentIdParamsSchema = z.object({
  id: z.string().uuid(),
});

export const UploadIdParamsSchema = z.object({
  uploadId: z.string().uuid(),
});

export const ChunkParamsSchema = z.object({
  uploadId: z.string().uuid(),
  index: z.coerce.number().int().min(0).max(MAX_TOTAL_CHUNKS - 1),
});

export const AttachmentResponseSchema = z.object({
  id: z.string(),
  commentId: z.string().nullable(),
  uploaderId: z.string(),
  filename: z.string(),
  contentType: z.string(),
  fileSize: z.number(),
  status: z.string(),
  checksumSha256: z.string().nullable(),
  totalChunks: z.number().nullable(),
  receivedChunks: z.number().nullable(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export const InitChunkedUploadResponseSchema = z.object({
  uploadId: z.string(),
  uploadSession: z.string(),
  totalChunks: z.number(),
});

export const ChunkReceiptResponseSchema = z.object({
  status: z.literal('received'),
  chunkIndex: z.number(),
  receivedChunks: z.number(),
  totalChunks: z.number(),
});

export type InitChunkedUploadRequest = z.infer<typeof InitChunkedUploadRequestSchema>;
export type SimpleUploadQuery = z.infer<typeof SimpleUploadQuerySchema>;
export type ChunkParams = z.infer<typeof ChunkParamsSchema>;
export type AttachmentResponse = z.infer<typeof AttachmentResponseSchema>;
export type InitChunkedUploadResponse = z.infer<typeof InitChunkedUploadResponseSchema>;
export type ChunkReceiptResponse = z.infer<typeof ChunkReceiptResponseSchema>;

export interface AttachmentView {
  id: string;
  commentId: string | null;
  uploaderId: string;
  filename: string;
  contentType: string;
  fileSize: number;
  status: string;
  checksumSha256: string | null;
  totalChunks: number | null;
  receivedChunks: number | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Storage keys and wrapped file keys never leave the service. */
export function toAttachmentResponse(att: AttachmentView): AttachmentResponse {
  return {
    id: att.id,
    commentId: att.commentId,
    uploaderId: att.uploaderId,
    filename: att.filename,
    contentType: att.contentType,
    fileSize: att.fileSize,
    status: att.status,
    checksumSha256: att.checksumSha256,
    totalChunks: att.totalChunks,
    receivedChunks: att.receivedChunks,
    createdAt: att.createdAt.toISOString(),
    updatedAt: att.updatedAt.toISOString(),
  };
}
