import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@appraise/shared';
import { type TokenVerifier } from '@appraise/domain';

declare module 'fastify' {
  interface FastifyRequest {
    userId?: string;
  }
}

export function createAuthMiddleware(tokenVerifier: TokenVerifier) {
  return async function authenticate(request: FastifyRequest) {
    const header = request.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Missing or invalid authorization header');
    }

    const token = header.slice(7);
    try {
      const { userId } = await tokenVerifier.verifyAccessToken(token);
      request.userId = userId;
    } catch {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid or expired access token');
    }
  };
}

export function requireUserId(request: FastifyRequest): string {
  if (!request.userId) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Authentication required');
  }
  return request.userId;
}
