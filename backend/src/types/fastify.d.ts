import 'fastify';
import type { OAuth2Namespace } from '@fastify/oauth2';
import type { IdentityContext } from '../auth/context.js';

declare module 'fastify' {
  interface FastifyRequest {
    identity?: IdentityContext;
  }

  interface FastifyInstance {
    /** Present only where the OAuth plugin registered, i.e. with a client secret. */
    orcid?: OAuth2Namespace;
  }
}
