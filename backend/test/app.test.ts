import { after, before, test } from 'node:test';
import assert from 'node:assert/strict';
import pino from 'pino';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/app.js';
import { JwtTokenValidator, guardKeySet } from '../src/auth/validator.js';
import { KeySetUnavailableError } from '../src/utils/errors.js';
import {
  TEST_CLIENT_ID,
  TEST_ISSUER,
  TEST_ORCID,
  createTestConfig,
  createTestIssuer,
  nowSeconds,
  type TestIssuer,
} from './helpers/tokens.js';
import { startTokenEndpoint } from './helpers/tokenEndpoint.js';

const silentLogger = pino({ level: 'silent' });

let issuer: TestIssuer;
let app: FastifyInstance;

before(async () => {
  issuer = await createTestIssuer();
  const config = createTestConfig();
  app = await buildApp(config, {
    logger: silentLogger,
    validator: new JwtTokenValidator({
      issuer: TEST_ISSUER,
      audience: TEST_CLIENT_ID,
      keySet: issuer.keySet,
      clockSkewMs: config.orcid.clockSkewMs,
    }),
  });
  await app.ready();
});

after(async () => {
  await app.close();
});

test('the info page is public and lists the routes', async () => {
  const res = await app.inject({ method: 'GET', url: '/' });

  assert.equal(res.statusCode, 200);
  const body = res.json();
  assert.equal(body.service, 'orcid-gate');
  assert.equal(body.protectedPath, '/protected');
  assert.equal(body.loginUrl, null);
  assert.equal(body.logoutUrl, '/protected/logout');
  assert.ok(body.routes.includes('GET /health'));
  assert.ok(body.routes.includes('GET /protected/service'));
});

test('the health probe is public', async () => {
  const res = await app.inject({ method: 'GET', url: '/health' });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { status: 'ok' });
});

test('admits a bearer token and returns the ORCID identity', async () => {
  const token = await issuer.sign();
  const res = await app.inject({
    method: 'GET',
    url: '/protected/service',
    headers: { authorization: `Bearer ${token}` },
  });

  assert.equal(res.statusCode, 200);
  const body = res.json();
  assert.equal(body.provider, 'orcid');
  assert.equal(body.identity.orcid, TEST_ORCID);
  assert.equal(body.identity.name, 'Ada Lovelace');
  assert.equal(body.identity.source, 'header');
  assert.equal(body.claims.sub, TEST_ORCID);
});

test('rejects a request without credentials', async () => {
  const res = await app.inject({ method: 'GET', url: '/protected/service' });

  assert.equal(res.statusCode, 401);
  assert.deepEqual(res.json(), { error: 'Unauthorized', code: 'unauthorized' });
  assert.equal(res.headers['www-authenticate'], 'Bearer realm="orcid"');
});

test('rejects an empty session cookie as no credential', async () => {
  const res = await app.inject({ method: 'GET', url: '/protected/service', cookies: { session: '' } });

  assert.equal(res.statusCode, 401);
  assert.equal(res.headers['www-authenticate'], 'Bearer realm="orcid"');
});

test('admits a signed session cookie and records the cookie source', async () => {
  const token = await issuer.sign();
  const res = await app.inject({
    method: 'GET',
    url: '/protected/service',
    cookies: { session: app.signCookie(token) },
  });

  assert.equal(res.statusCode, 200);
  assert.equal(res.json().identity.source, 'cookie');
});

test('ignores a session cookie that was not signed by the server', async () => {
  const token = await issuer.sign();
  const res = await app.inject({ method: 'GET', url: '/protected/service', cookies: { session: token } });

  assert.equal(res.statusCode, 401);
});

test('rejects an expired cookie token without revealing why', async () => {
  const token = await issuer.sign({}, { expiresAt: nowSeconds() - 3600 });
  const res = await app.inject({
    method: 'GET',
    url: '/protected/service',
    cookies: { session: app.signCookie(token) },
  });

  assert.equal(res.statusCode, 401);
  assert.deepEqual(res.json(), { error: 'Unauthorized', code: 'unauthorized' });
  assert.equal(res.headers['www-authenticate'], 'Bearer realm="orcid", error="invalid_token"');
});

test('a valid header wins over a garbage cookie', async () => {
  const token = await issuer.sign();
  const res = await app.inject({
    method: 'GET',
    url: '/protected/service',
    headers: { authorization: `Bearer ${token}` },
    cookies: { session: app.signCookie('garbage') },
  });

  assert.equal(res.statusCode, 200);
  assert.equal(res.json().identity.source, 'header');
});

test('a header with the wrong scheme falls through to the cookie', async () => {
  const token = await issuer.sign();
  const res = await app.inject({
    method: 'GET',
    url: '/protected/service',
    headers: { authorization: 'Token abc' },
    cookies: { session: app.signCookie(token) },
  });

  assert.equal(res.statusCode, 200);
  assert.equal(res.json().identity.source, 'cookie');
});

test('the protected home shows the signed-in user', async () => {
  const token = await issuer.sign();
  const res = await app.inject({ method: 'GET', url: '/protected', headers: { authorization: `Bearer ${token}` } });

  assert.equal(res.statusCode, 200);
  const body = res.json();
  assert.equal(body.user.orcid, TEST_ORCID);
  assert.equal(body.appInfo.rootPath, '/protected');
});

test('logout is public and clears the session cookie', async () => {
  const res = await app.inject({ method: 'GET', url: '/protected/logout' });

  assert.equal(res.statusCode, 302);
  assert.equal(res.headers.location, '/');
  const cleared = res.cookies.find((cookie) => cookie.name === 'session');
  assert.ok(cleared);
  assert.equal(cleared.value, '');
});

test('login and callback are not registered without a client secret', async () => {
  const login = await app.inject({ method: 'GET', url: '/protected/login' });
  const callback = await app.inject({ method: 'GET', url: '/protected/auth?code=test-code' });

  assert.equal(login.statusCode, 404);
  assert.equal(callback.statusCode, 404);
});

test('CORS preflight requests are not gated', async () => {
  const res = await app.inject({
    method: 'OPTIONS',
    url: '/protected/service',
    headers: {
      origin: 'https://app.test',
      'access-control-request-method': 'GET',
    },
  });

  assert.equal(res.statusCode, 204);
  assert.equal(res.headers['access-control-allow-origin'], 'https://app.test');
});

test('answers 503 when the signing key set cannot be loaded', async () => {
  const unavailable = await buildApp(createTestConfig(), {
    logger: silentLogger,
    validator: {
      async validate() {
        throw new KeySetUnavailableError(new Error('request timed out'));
      },
    },
  });

  try {
    const res = await unavailable.inject({
      method: 'GET',
      url: '/protected/service',
      headers: { authorization: 'Bearer some-token' },
    });
    assert.equal(res.statusCode, 503);
    assert.deepEqual(res.json(), { error: 'Service Unavailable', code: 'auth.key_set_unavailable' });
  } finally {
    await unavailable.close();
  }
});

test('login redirects to the ORCID authorize endpoint when a client secret is set', async () => {
  const withLogin = await buildApp(createTestConfig({ ORCID_CLIENT_SECRET: 'test-secret' }), {
    logger: silentLogger,
    validator: { validate: async () => ({ ok: false, reason: 'malformed' }) },
  });

  try {
    const info = await withLogin.inject({ method: 'GET', url: '/' });
    assert.equal(info.json().loginUrl, '/protected/login');

    const res = await withLogin.inject({ method: 'GET', url: '/protected/login' });
    assert.equal(res.statusCode, 302);
    const location = new URL(String(res.headers.location));
    assert.equal(`${location.origin}${location.pathname}`, `${TEST_ISSUER}/oauth/authorize`);
    assert.equal(location.searchParams.get('client_id'), TEST_CLIENT_ID);
    assert.equal(location.searchParams.get('scope'), 'openid');
    assert.equal(location.searchParams.get('redirect_uri'), 'http://127.0.0.1:8000/protected/auth');
  } finally {
    await withLogin.close();
  }
});

test('answers 503 when the key set host refuses the connection', async () => {
  const refusing = await buildApp(createTestConfig(), {
    logger: silentLogger,
    validator: new JwtTokenValidator({
      issuer: TEST_ISSUER,
      audience: TEST_CLIENT_ID,
      keySet: guardKeySet(async () => {
        throw new TypeError('fetch failed');
      }),
    }),
  });

  try {
    const res = await refusing.inject({
      method: 'GET',
      url: '/protected/service',
      headers: { authorization: `Bearer ${await issuer.sign()}` },
    });
    assert.equal(res.statusCode, 503);
    assert.deepEqual(res.json(), { error: 'Service Unavailable', code: 'auth.key_set_unavailable' });
  } finally {
    await refusing.close();
  }
});

async function completeOrcidLogin(tokenResponse: Record<string, unknown>) {
  const endpoint = await startTokenEndpoint(tokenResponse);
  const withLogin = await buildApp(
    createTestConfig({ ORCID_ISSUER: endpoint.url, ORCID_CLIENT_SECRET: 'test-secret' }),
    { logger: silentLogger, validator: { validate: async () => ({ ok: false, reason: 'malformed' }) } },
  );

  try {
    const login = await withLogin.inject({ method: 'GET', url: '/protected/login' });
    const state = new URL(String(login.headers.location)).searchParams.get('state');
    assert.ok(state);

    const callback = await withLogin.inject({
      method: 'GET',
      url: `/protected/auth?code=test-code&state=${encodeURIComponent(state)}`,
      cookies: Object.fromEntries(login.cookies.map((cookie) => [cookie.name, cookie.value])),
    });
    const session = callback.cookies.find((cookie) => cookie.name === 'session');
    const unsigned = session ? withLogin.unsignCookie(session.value) : undefined;

    return { callback, session, unsigned, requests: endpoint.requests };
  } finally {
    await withLogin.close();
    await endpoint.close();
  }
}

test('the ORCID callback stores the ID token in the signed session cookie', async () => {
  const idToken = await issuer.sign();
  const { callback, session, unsigned, requests } = await completeOrcidLogin({
    access_token: 'test-access-token',
    token_type: 'bearer',
    expires_in: 600,
    id_token: idToken,
  });

  assert.equal(callback.statusCode, 302);
  assert.equal(callback.headers.location, '/protected');
  assert.ok(session);
  assert.equal(session.httpOnly, true);
  assert.equal(session.maxAge, 600);
  assert.ok(unsigned);
  assert.equal(unsigned.valid, true);
  assert.equal(unsigned.value, idToken);
  assert.equal(requests.length, 1);
  assert.equal(new URLSearchParams(requests[0]).get('code'), 'test-code');
});

test('the ORCID callback fails with 502 when no ID token comes back', async () => {
  const { callback, session } = await completeOrcidLogin({
    access_token: 'test-access-token',
    token_type: 'bearer',
    expires_in: 600,
  });

  assert.equal(callback.statusCode, 502);
  assert.deepEqual(callback.json(), { error: 'Login failed', code: 'auth.missing_id_token' });
  assert.equal(session, undefined);
});
