import Fastify, { type FastifyInstance, type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import type { TenantValidationService } from '../validation/index.js';
import validationRoutes from './routes/validation.js';
import settingsRoutes from './routes/settings.js';

const HSTS_MAX_AGE_SECONDS = 180 * 24 * 3600;

export interface ApiServerDeps {
  config: Config;
  validator: TenantValidationService;
  logger: Logger;
}

export async function createApiServer(deps: ApiServerDeps): Promise<FastifyInstance> {
  const { config, validator, logger } = deps;
  const { body_limit: bodyLimit, cors_origin: corsOrigin, rate_limit: limits } = config.server;

  // Request logging goes through the application logger below
  const app = Fastify({ logger: false, bodyLimit });

  const hsts =
    process.env.NODE_ENV === 'production' && { maxAge: HSTS_MAX_AGE_SECONDS, includeSubDomains: true };
  await app.register(helmet, { hsts, referrerPolicy: { policy: 'no-referrer' } });

  await app.register(rateLimit, {
    max: limits.max,
    timeWindow: limits.window_ms,
    allowList: (request) => request.url === '/health',
  });

  await app.register(cors, { origin: corsOrigin ?? false, methods: ['GET', 'POST', 'PUT'] });

  app.decorate('validator', validator);
  app.decorate('appLogger', logger);

  app.addHook('onResponse', async (request, reply) => {
    logger.debug(
      { method: request.method, url: request.url, statusCode: reply.statusCode, ms: reply.elapsedTime },
      'Request completed'
    );
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error({ err: error, method: request.method, url: request.url }, 'Request failed');
      return reply.code(statusCode).send({ error: 'Internal Server Error' });
    }
    logger.warn({ err: error, url: request.url, statusCode }, 'Request rejected');
    return reply.code(statusCode).send({ error: error.message });
  });

  app.get('/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }));

  await app.register(validationRoutes, { prefix: '/api' });
  await app.register(settingsRoutes, { prefix: '/api/settings' });

  return app;
}

declare module 'fastify' {
  interface FastifyInstance {
    validator: TenantValidationService;
    appLogger: Logger;
  }
}
