import Fastify from 'fastify';
import { createLogger } from '@appraise/shared';
import { type TokenVerifier, type UploadOrchestrator } from '@appraise/domain';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthMiddleware } from './plugins/auth';
import { registerAttachmentRoutes } from './routes/attachments';

const logger = createLogger({ name: 'api' });

export interface ServerDeps {
  orchestrator: UploadOrchestrator;
  tokenVerifier: TokenVerifier;
  /** Upper bound for raw upload bodies (simple uploads and single chunks). */
  uploadBodyLimit: number;
}

export async function buildServer(deps: ServerDeps) {
  const app = Fastify({
    logger: false,
    bodyLimit: 1_048_576,
  });

  registerErrorHandler(app);

  // Uploads arrive as raw bytes under their own media type; JSON keeps Fastify's parser.
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  const authenticate = createAuthMiddleware(deps.tokenVerifier);

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerAttachmentRoutes(app, {
    orchestrator: deps.orchestrator,
    authenticate,
    uploadBodyLimit: deps.uploadBodyLimit,
  });

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info(
      { method: request.method, url: request.url, requestId: request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
    done();
  });

  return app;
}
