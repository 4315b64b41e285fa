import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import type { AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { AccessGate } from './auth/gate.js';
import { createOrcidTokenValidator, type TokenValidator } from './auth/validator.js';
import { registerInfoRoutes } from './routes/info.js';
import { registerProtectedRoutes } from './routes/protected.js';
import { registerSessionRoutes } from './routes/session.js';
import { KeySetUnavailableError, sendError } from './utils/errors.js';

export interface BuildAppOptions {
  logger?: FastifyBaseLogger;
  /** Replaces the remote ORCID key set validator, e.g. with a local key set. */
  validator?: TokenValidator;
}

export async function buildApp(config: AppConfig, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const logger: FastifyBaseLogger = options.logger ?? createLogger(config);
  const app = Fastify({ logger });

  const routes = new Set<string>();
  app.addHook('onRoute', (route) => {
    const methods = Array.isArray(route.method) ? route.method : [route.method];
    for (const method of methods) {
      if (method !== 'HEAD') {
        routes.add(`${method} ${route.url}`);
      }
    }
  });
  const listRoutes = () => [...routes].sort();

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof KeySetUnavailableError) {
      request.log.error({ err: error.cause }, 'Signing key set unavailable');
      return reply.send(sendError(reply, error.statusCode, error.code, 'Service Unavailable'));
    }

    const status = error.statusCode ?? 500;
    if (status >= 500) {
      request.log.error({ err: error }, 'Unhandled request error');
      return reply.send(sendError(reply, 500, 'internal', 'Internal Server Error'));
    }
    return reply.send(sendError(reply, status, error.code ?? 'request.invalid', error.message));
  });

  await app.register(cors, {
    origin: config.cors.origins.includes('*') ? true : config.cors.origins,
    methods: config.cors.methods,
    allowedHeaders: ['authorization'],
  });
  await app.register(cookie, { secret: config.secretKey });

  const gate = new AccessGate(options.validator ?? createOrcidTokenValidator(config));

  await app.register(async (scope) => registerInfoRoutes(scope, { config, listRoutes }));
  await app.register(async (scope) => registerSessionRoutes(scope, { config }), { prefix: config.protectedPath });
  await app.register(async (scope) => registerProtectedRoutes(scope, { config, gate, listRoutes }), {
    prefix: config.protectedPath,
  });

  return app;
}
