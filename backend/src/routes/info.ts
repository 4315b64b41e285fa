import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config.js';

export const SERVICE_NAME = 'orcid-gate';

interface RegisterInfoRoutesOptions {
  config: AppConfig;
  listRoutes: () => string[];
}

export async function registerInfoRoutes(app: FastifyInstance, options: RegisterInfoRoutesOptions) {
  const { config, listRoutes } = options;

  app.get('/', async () => ({
    service: SERVICE_NAME,
    protectedPath: config.protectedPath,
    loginUrl: config.orcid.clientSecret ? `${config.protectedPath}/login` : null,
    logoutUrl: `${config.protectedPath}/logout`,
    routes: listRoutes(),
  }));

  app.get('/health', async () => ({ status: 'ok' }) as const);
}
