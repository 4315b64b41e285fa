import type { Credential } from './context.js';

const AUTHORIZATION_HEADER = 'authorization';

export type HeaderMap = Readonly<Record<string, string | string[] | undefined>>;
export type CookieMap = Readonly<Record<string, string | undefined>>;

export interface CredentialExtraction {
  credential: Credential | null;
  /** An Authorization header was sent but was not a usable Bearer credential. */
  malformedHeader: boolean;
}

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function parseBearerToken(headerValue: string | undefined): string | undefined {
  if (!headerValue) {
    return undefined;
  }

  const match = headerValue.match(/^Bearer\s+(\S+)\s*$/i);
  return match?.[1];
}

/**
 * Finds the request's bearer credential. The Authorization header wins over the
 * session cookie; a header that is not `Bearer <token>` is ignored.
 */
export function extractCredential(headers: HeaderMap, cookies: CookieMap, cookieName: string): CredentialExtraction {
  const header = firstHeaderValue(headers[AUTHORIZATION_HEADER]);
  const headerToken = parseBearerToken(header);

  if (headerToken) {
    return { credential: { token: headerToken, source: 'header' }, malformedHeader: false };
  }

  const malformedHeader = header !== undefined && header.trim().length > 0;
  const cookieToken = cookies[cookieName]?.trim();

  if (cookieToken) {
    return { credential: { token: cookieToken, source: 'cookie' }, malformedHeader };
  }

  return { credential: null, malformedHeader };
}
