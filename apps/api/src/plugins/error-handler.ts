import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@appraise/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      logger.warn(
        { code: error.code, requestId: request.id, ...error.safeMeta },
        error.message,
      );
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Fastify's own client errors: oversized bodies, malformed JSON, unsupported media types.
    const statusCode = error.statusCode;
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      logger.warn({ statusCode, fastifyCode: error.code, requestId: request.id }, error.message);
      return reply.status(statusCode).send({
        code: statusCode === 413 ? ErrorCode.PAYLOAD_TOO_LARGE : ErrorCode.BAD_REQUEST,
        message: error.message,
      });
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
