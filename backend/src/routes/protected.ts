import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config.js';
import type { AccessGate } from '../auth/gate.js';
import type { IdentityContext } from '../auth/context.js';
import { buildAuthHook } from '../middleware/auth.js';
import { sendError } from '../utils/errors.js';

export const ORCID_PROVIDER = 'orcid';

interface RegisterProtectedRoutesOptions {
  config: AppConfig;
  gate: AccessGate;
  listRoutes: () => string[];
}

function summariseIdentity(identity: IdentityContext) {
  const name = [identity.givenName, identity.familyName].filter(Boolean).join(' ');
  return {
    orcid: identity.subject,
    name: name.length > 0 ? name : null,
    issuer: identity.issuer,
    audience: identity.audience,
    source: identity.source,
    issuedAt: identity.issuedAt?.toISOString() ?? null,
    expiresAt: identity.expiresAt?.toISOString() ?? null,
  };
}

export async function registerProtectedRoutes(app: FastifyInstance, options: RegisterProtectedRoutesOptions) {
  const { config, gate, listRoutes } = options;

  app.addHook(
    'onRequest',
    buildAuthHook({ gate, sessionCookieName: config.sessionCookieName, realm: ORCID_PROVIDER }),
  );

  app.get('/', async (request, reply) => {
    if (!request.identity) {
      return sendError(reply, 401, 'unauthorized', 'Unauthorized');
    }

    return {
      user: summariseIdentity(request.identity),
      appInfo: {
        rootPath: config.protectedPath,
        logoutUrl: `${config.protectedPath}/logout`,
        routes: listRoutes(),
      },
    };
  });

  app.get('/service', async (request, reply) => {
    if (!request.identity) {
      return sendError(reply, 401, 'unauthorized', 'Unauthorized');
    }

    return {
      provider: ORCID_PROVIDER,
      identity: summariseIdentity(request.identity),
      claims: request.identity.payload,
    };
  });
}
