import { type FastifyInstance, type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@appraise/shared';
import {
  AttachmentError,
  EncryptionError,
  type AttachmentErrorKind,
  type UploadOrchestrator,
} from '@appraise/domain';
import {
  AttachmentIdParamsSchema,
  ChunkParamsSchema,
  InitChunkedUploadRequestSchema,
  SimpleUploadQuerySchema,
  UploadIdParamsSchema,
  toAttachmentResponse,
  type ChunkReceiptResponse,
} from '@appraise/proto';
import { type ZodType } from 'zod';
import { requireUserId, type createAuthMiddleware } from '../plugins/auth';

interface AttachmentRouteDeps {
  orchestrator: UploadOrchestrator;
  authenticate: ReturnType<typeof createAuthMiddleware>;
  uploadBodyLimit: number;
}

const KIND_TO_CODE: Record<AttachmentErrorKind, ErrorCode> = {
  VALIDATION: ErrorCode.VALIDATION,
  TOO_LARGE: ErrorCode.PAYLOAD_TOO_LARGE,
  NOT_FOUND: ErrorCode.NOT_FOUND,
  FORBIDDEN: ErrorCode.FORBIDDEN,
  STATE: ErrorCode.CONFLICT,
  RANGE: ErrorCode.BAD_REQUEST,
  INTEGRITY: ErrorCode.INTEGRITY,
  STORAGE: ErrorCode.STORAGE_UNAVAILABLE,
};

export function mapAttachmentError(err: unknown): never {
  if (err instanceof AttachmentError) {
    throw new AppError(KIND_TO_CODE[err.kind], err.message);
  }
  if (err instanceof EncryptionError) {
    throw new AppError(ErrorCode.INTEGRITY, 'File integrity check failed');
  }
  throw err;
}

function parseOrThrow<T>(schema: ZodType<T>, value: unknown, message: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new AppError(ErrorCode.VALIDATION, message, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}

function rawBody(request: FastifyRequest): Buffer {
  if (Buffer.isBuffer(request.body)) return request.body;
  if (request.body === undefined || request.body === null) return Buffer.alloc(0);
  throw new AppError(ErrorCode.BAD_REQUEST, 'Request body must be the raw file bytes');
}

function claimedContentType(request: FastifyRequest): string {
  const header = request.headers['content-type'];
  const mediaType = header?.split(';')[0]?.trim().toLowerCase();
  if (!mediaType) {
    throw new AppError(ErrorCode.VALIDATION, 'Content-Type header is required');
  }
  return mediaType;
}

/** RFC 6266: plain ASCII fallback plus the exact UTF-8 name. */
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

export function registerAttachmentRoutes(app: FastifyInstance, deps: AttachmentRouteDeps): void {
  const { orchestrator, authenticate, uploadBodyLimit } = deps;

  app.post(
    '/attachments/upload',
    { preHandler: [authenticate], bodyLimit: uploadBodyLimit },
    async (request, reply) => {
      const userId = requireUserId(request);
      const { filename } = parseOrThrow(SimpleUploadQuerySchema, request.query, 'Invalid upload parameters');
      const contentType = claimedContentType(request);
      const data = rawBody(request);

      try {
        const attachment = await orchestrator.simpleUpload(userId, { filename, contentType, data });
        return reply.status(201).send(toAttachmentResponse(attachment));
      } catch (err) {
        return mapAttachmentError(err);
      }
    },
  );

  app.post('/attachments/upload/init', { preHandler: [authenticate] }, async (request, reply) => {
    const userId = requireUserId(request);
    const body = parseOrThrow(InitChunkedUploadRequestSchema, request.body, 'Invalid upload data');

    try {
      const result = await orchestrator.initChunkedUpload(userId, body);
      return reply.status(201).send(result);
    } catch (err) {
      return mapAttachmentError(err);
    }
  });

  app.patch(
    '/attachments/upload/:uploadId/chunk/:index',
    { preHandler: [authenticate], bodyLimit: uploadBodyLimit },
    async (request, reply) => {
      const userId = requireUserId(request);
      const { uploadId, index } = parseOrThrow(ChunkParamsSchema, request.params, 'Invalid chunk parameters');
      const sessionHeader = request.headers['x-upload-session'];
      const uploadSession = typeof sessionHeader === 'string' ? sessionHeader : undefined;
      const data = rawBody(request);

      try {
        const receipt = await orchestrator.uploadChunk(userId, uploadId, index, data, uploadSession);
        const response: ChunkReceiptResponse = { status: 'received', ...receipt };
        return reply.status(200).send(response);
      } catch (err) {
        return mapAttachmentError(err);
      }
    },
  );

  app.post('/attachments/upload/:uploadId/complete', { preHandler: [authenticate] }, async (request, reply) => {
    const userId = requireUserId(request);
    const { uploadId } = parseOrThrow(UploadIdParamsSchema, request.params, 'Invalid upload id');

    try {
      const attachment = await orchestrator.completeChunkedUpload(userId, uploadId);
      return reply.status(202).send({
        attachment: toAttachmentResponse(attachment),
        message: 'Upload complete; processing started',
      });
    } catch (err) {
      return mapAttachmentError(err);
    }
  });

  app.get('/attachments/:id/download', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = parseOrThrow(AttachmentIdParamsSchema, request.params, 'Invalid attachment id');

    try {
      const { attachment, data } = await orchestrator.download(id);
      return reply
        .status(200)
        .header('content-type', attachment.contentType)
        .header('content-disposition', contentDisposition(attachment.filename))
        .header('content-length', data.length)
        .header('x-content-type-options', 'nosniff')
        .send(data);
    } catch (err) {
      return mapAttachmentError(err);
    }
  });

  app.get('/attachments/:id', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = parseOrThrow(AttachmentIdParamsSchema, request.params, 'Invalid attachment id');

    try {
      const attachment = await orchestrator.getInfo(id);
      return reply.status(200).send(toAttachmentResponse(attachment));
    } catch (err) {
      return mapAttachmentError(err);
    }
  });

  app.delete('/attachments/:id', { preHandler: [authenticate] }, async (request, reply) => {
    const userId = requireUserId(request);
    const { id } = parseOrThrow(AttachmentIdParamsSchema, request.params, 'Invalid attachment id');

    try {
      await orchestrator.deleteAttachment(userId, id);
      return reply.status(204).send();
    } catch (err) {
      return mapAttachmentError(err);
    }
  });
}
