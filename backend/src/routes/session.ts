import type { FastifyInstance } from 'fastify';
import oauthPlugin from '@fastify/oauth2';
import type { CookieSerializeOptions } from '@fastify/cookie';
import { isProduction, type AppConfig } from '../config.js';
import { sendError } from '../utils/errors.js';

interface RegisterSessionRoutesOptions {
  config: AppConfig;
}

export function sessionCookieOptions(config: AppConfig): CookieSerializeOptions {
  return {
    path: '/',
    httpOnly: true,
    sameSite: 'lax',
    secure: isProduction(config),
    signed: true,
  };
}

/**
 * Login, OAuth callback and logout. These stay reachable without credentials;
 * the session they manage is nothing more than the signed ID token cookie.
 */
export async function registerSessionRoutes(app: FastifyInstance, options: RegisterSessionRoutesOptions) {
  const { config } = options;
  const cookieOptions = sessionCookieOptions(config);

  if (config.orcid.clientSecret) {
    await app.register(oauthPlugin, {
      name: 'orcid',
      scope: ['openid'],
      credentials: {
        client: {
          id: config.orcid.clientId,
          secret: config.orcid.clientSecret,
        },
        auth: {
          authorizeHost: config.orcid.issuer,
          authorizePath: '/oauth/authorize',
          tokenHost: config.orcid.issuer,
          tokenPath: '/oauth/token',
        },
      },
      startRedirectPath: '/login',
      callbackUri: config.orcid.redirectUri,
    });

    const { orcid } = app;
    if (!orcid) {
      throw new Error('ORCID OAuth plugin did not decorate the instance');
    }

    // Registered as the OAuth callback URL with ORCID
    app.get('/auth', async (request, reply) => {
      const { token } = await orcid.getAccessTokenFromAuthorizationCodeFlow(request);
      const idToken = 'id_token' in token && typeof token.id_token === 'string' ? token.id_token : undefined;

      if (!idToken) {
        request.log.error('ORCID token response did not include an id_token');
        return sendError(reply, 502, 'auth.missing_id_token', 'Login failed');
      }

      reply.setCookie(config.sessionCookieName, idToken, {
        ...cookieOptions,
        maxAge: typeof token.expires_in === 'number' ? token.expires_in : undefined,
      });
      return reply.redirect(config.protectedPath);
    });
  }

  // Drops the cookie only. The ID token stays valid until it expires.
  app.get('/logout', async (_request, reply) => {
    reply.clearCookie(config.sessionCookieName, { path: cookieOptions.path });
    return reply.redirect('/');
  });
}
