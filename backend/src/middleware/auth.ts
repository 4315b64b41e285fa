import type { FastifyBaseLogger, FastifyReply, FastifyRequest } from 'fastify';
import type { RejectReason } from '../auth/context.js';
import { extractCredential, type CookieMap } from '../auth/credentials.js';
import type { AccessGate } from '../auth/gate.js';
import { usesDefaultSecret, type AppConfig } from '../config.js';
import { sendError } from '../utils/errors.js';

type OnRequestHook = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;

export interface AuthHookOptions {
  gate: AccessGate;
  sessionCookieName: string;
  realm: string;
}

/**
 * Reads the session cookie through its signature. A cookie that was not signed
 * with our secret counts as absent.
 */
export function readSessionCookie(request: FastifyRequest, cookieName: string): CookieMap {
  const raw = request.cookies[cookieName];
  if (!raw) {
    return {};
  }

  const unsigned = request.unsignCookie(raw);
  if (!unsigned.valid || unsigned.value === null) {
    request.log.debug({ cookie: cookieName }, 'Ignoring session cookie with invalid signature');
    return {};
  }
  return { [cookieName]: unsigned.value };
}

function describeReason(reason: RejectReason): Record<string, string> {
  switch (reason.code) {
    case 'validation_failed':
      return { reason: reason.code, detail: reason.reason, source: reason.source };
    default:
      return { reason: reason.code };
  }
}

function buildChallenge(realm: string, reason: RejectReason): string {
  const parts = [`Bearer realm="${realm}"`];
  if (reason.code !== 'no_credential') {
    parts.push('error="invalid_token"');
  }
  return parts.join(', ');
}

export function buildAuthHook(options: AuthHookOptions): OnRequestHook {
  const { gate, sessionCookieName, realm } = options;

  return async function authHook(request: FastifyRequest, reply: FastifyReply) {
    // Skip auth for CORS preflight
    if (request.method.toUpperCase() === 'OPTIONS') {
      return;
    }

    const extraction = extractCredential(request.headers, readSessionCookie(request, sessionCookieName), sessionCookieName);
    const decision = await gate.evaluate(extraction);

    if (decision.outcome === 'admit') {
      request.identity = decision.identity;
      return;
    }

    request.log.warn({ path: request.url.split('?')[0], ...describeReason(decision.reason) }, 'Rejected unauthenticated request');
    reply.header('WWW-Authenticate', buildChallenge(realm, decision.reason));
    return reply.send(sendError(reply, 401, 'unauthorized', 'Unauthorized'));
  };
}

export function logAuthStartupDetails(logger: FastifyBaseLogger, config: AppConfig): void {
  if (usesDefaultSecret(config)) {
    logger.warn('SECRET_KEY is not set; session cookies are signed with a placeholder secret');
  }
  if (!config.orcid.clientSecret) {
    logger.warn('ORCID_CLIENT_SECRET is not set; ORCID login is disabled and only bearer tokens are accepted');
  }

  logger.info(
    {
      issuer: config.orcid.issuer,
      audience: config.orcid.clientId,
      jwksUri: config.orcid.jwksUri,
      protectedPath: config.protectedPath,
      sessionCookie: config.sessionCookieName,
    },
    'ORCID authentication enabled',
  );
}
