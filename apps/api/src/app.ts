import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import formbody from '@fastify/formbody';
import multipart from '@fastify/multipart';
import { AppError } from '@autodialer/domain';
import type { ContentGenerator } from './adapters/content-generator.js';
import type { TelephonyGateway } from './adapters/telephony-gateway.js';
import { adminRoutes } from './routes/admin.js';
import { blogRoutes } from './routes/blog.js';
import { callRoutes } from './routes/calls.js';
import { healthRoutes } from './routes/health.js';
import { webhookRoutes } from './routes/webhooks.js';
import { BlogService } from './services/blog-service.js';
import { CallService } from './services/call-service.js';
import type { Logger } from './services/logger.js';
import type { JsonRecordStore } from './services/record-store.js';

export interface AppDependencies {
  store: JsonRecordStore;
  telephony: TelephonyGateway;
  generator: ContentGenerator;
  logger: Logger;
  callMessage: string;
  publicBaseUrl?: string;
  validateSignatures: boolean;
}

export async function buildServer(deps: AppDependencies): Promise<FastifyInstance> {
  const app = Fastify({ loggerInstance: deps.logger });
  await app.register(cors, { origin: true });
  await app.register(formbody);
  await app.register(multipart, { limits: { files: 1, fileSize: 1024 * 1024 } });

  app.setErrorHandler<FastifyError>(async (error, req, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        req.log.error({ err: error }, error.code);
      }
      return reply.status(error.statusCode).send({ error: error.code, message: error.message });
    }

    if (typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
      const code = error.statusCode === 400 ? 'invalid_input' : error.code;
      return reply.status(error.statusCode).send({ error: code, message: error.message });
    }

    req.log.error({ err: error }, 'unhandled_error');
    return reply.status(500).send({ error: 'internal_error', message: 'Internal Server Error' });
  });

  const calls = new CallService(deps.store, deps.telephony, deps.logger);
  const blog = new BlogService(deps.store, deps.generator, deps.logger);

  await app.register(healthRoutes, { store: deps.store, telephony: deps.telephony, generator: deps.generator });
  await app.register(callRoutes, { calls });
  await app.register(webhookRoutes, {
    calls,
    telephony: deps.telephony,
    callMessage: deps.callMessage,
    publicBaseUrl: deps.publicBaseUrl,
    validateSignatures: deps.validateSignatures
  });
  await app.register(blogRoutes, { blog });
  await app.register(adminRoutes, { store: deps.store });

  return app;
}
