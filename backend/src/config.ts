import { z } from 'zod';

const DEFAULT_SECRET_KEY = 'secret-key-not-set';

function parseEnvList(raw: string | undefined): string[] {
  const unique = new Set<string>();
  if (!raw) {
    return [];
  }
  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    if (trimmed.length > 0) {
      unique.add(trimmed);
    }
  }
  return [...unique];
}

function normalisePath(value: string): string {
  const withSlash = value.startsWith('/') ? value : `/${value}`;
  return withSlash.length > 1 && withSlash.endsWith('/') ? withSlash.slice(0, -1) : withSlash;
}

const ConfigSchema = z
  .object({
    nodeEnv: z.string().default('development'),
    host: z.string().min(1).default('127.0.0.1'),
    port: z.coerce.number().int().positive().default(8000),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    secretKey: z.string().min(1).default(DEFAULT_SECRET_KEY),
    protectedPath: z
      .string()
      .min(1)
      .default('/protected')
      .transform(normalisePath)
      .refine((value) => value !== '/', 'PROTECTED_PATH must not be the site root'),
    sessionCookieName: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, 'SESSION_COOKIE_NAME may only contain letters, digits, "_" and "-"')
      .default('session'),
    cors: z.object({
      origins: z.array(z.string().min(1)).nonempty(),
      methods: z.array(z.string().min(1)).nonempty(),
    }),
    orcid: z.object({
      issuer: z.string().url().default('https://orcid.org'),
      jwksUri: z.string().url().default('https://orcid.org/oauth/jwks'),
      clientId: z.string({ required_error: 'ORCID_CLIENT_ID is required' }).min(1, 'ORCID_CLIENT_ID is required'),
      clientSecret: z.string().min(1).optional(),
      redirectUri: z.string().url().optional(),
      jwksCacheMs: z.coerce.number().int().positive().default(600_000),
      clockSkewMs: z.coerce.number().int().nonnegative().default(5_000),
    }),
  })
  .transform((value) => ({
    ...value,
    orcid: {
      ...value.orcid,
      issuer: value.orcid.issuer.endsWith('/') ? value.orcid.issuer.slice(0, -1) : value.orcid.issuer,
      redirectUri: value.orcid.redirectUri ?? `http://${value.host}:${value.port}${value.protectedPath}/auth`,
    },
  }));

export type AppConfig = z.output<typeof ConfigSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim().length === 0 ? undefined : value.trim();
}

/**
 * Builds the application configuration from environment variables.
 * Throws a ZodError listing every invalid or missing setting.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const corsOrigins = parseEnvList(env.CORS_ORIGINS);
  const corsMethods = parseEnvList(env.CORS_METHODS).map((method) => method.toUpperCase());

  return ConfigSchema.parse({
    nodeEnv: emptyToUndefined(env.NODE_ENV),
    host: emptyToUndefined(env.HOST),
    port: emptyToUndefined(env.PORT),
    logLevel: emptyToUndefined(env.LOG_LEVEL)?.toLowerCase(),
    secretKey: emptyToUndefined(env.SECRET_KEY),
    protectedPath: emptyToUndefined(env.PROTECTED_PATH),
    sessionCookieName: emptyToUndefined(env.SESSION_COOKIE_NAME),
    cors: {
      origins: corsOrigins.length ? corsOrigins : ['*'],
      methods: corsMethods.length ? corsMethods : ['GET', 'HEAD'],
    },
    orcid: {
      issuer: emptyToUndefined(env.ORCID_ISSUER),
      jwksUri: emptyToUndefined(env.ORCID_KEYS),
      clientId: emptyToUndefined(env.ORCID_CLIENT_ID),
      clientSecret: emptyToUndefined(env.ORCID_CLIENT_SECRET),
      redirectUri: emptyToUndefined(env.ORCID_REDIRECT_URI),
      jwksCacheMs: emptyToUndefined(env.JWKS_CACHE_MS),
      clockSkewMs: emptyToUndefined(env.CLOCK_SKEW_MS),
    },
  });
}

export function isProduction(config: Pick<AppConfig, 'nodeEnv'>): boolean {
  return config.nodeEnv === 'production';
}

export function usesDefaultSecret(config: AppConfig): boolean {
  return config.secretKey === DEFAULT_SECRET_KEY;
}
