import { createRemoteJWKSet, errors, jwtVerify, type JWTPayload, type JWTVerifyGetKey } from 'jose';
import type { AppConfig } from '../config.js';
import { KeySetUnavailableError } from '../utils/errors.js';
import type { ValidatedClaims, ValidationFailureReason, ValidationResult } from './context.js';

export interface TokenValidator {
  validate(token: string): Promise<ValidationResult>;
}

export interface JwtTokenValidatorOptions {
  issuer: string;
  audience: string | string[];
  keySet: JWTVerifyGetKey;
  clockSkewMs?: number;
}

const acceptedAlgorithms = ['RS256', 'RS384', 'RS512', 'PS256', 'PS384', 'PS512'] as const;

function toDate(seconds?: number): Date | undefined {
  if (typeof seconds !== 'number' || Number.isNaN(seconds)) {
    return undefined;
  }
  return new Date(seconds * 1000);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toAudienceList(aud: JWTPayload['aud']): string[] {
  if (aud === undefined) return [];
  return Array.isArray(aud) ? aud : [aud];
}

/** Maps a jose failure to a rejection reason. Key set failures and errors from outside jose are rethrown. */
export function classifyVerificationError(error: unknown): ValidationFailureReason {
  if (error instanceof errors.JWKSTimeout || error instanceof errors.JWKSInvalid) {
    throw new KeySetUnavailableError(error);
  }
  // jose raises the bare JOSEError for non-200 key set responses
  if (error instanceof errors.JOSEError && error.code === 'ERR_JOSE_GENERIC') {
    throw new KeySetUnavailableError(error);
  }
  if (error instanceof errors.JWTExpired) {
    return 'expired';
  }
  if (error instanceof errors.JWTClaimValidationFailed) {
    switch (error.claim) {
      case 'iss':
        return 'unknown-issuer';
      case 'aud':
        return 'audience-mismatch';
      case 'nbf':
        return 'not-yet-valid';
      default:
        return 'malformed';
    }
  }
  if (
    error instanceof errors.JWSSignatureVerificationFailed ||
    error instanceof errors.JWKSNoMatchingKey ||
    error instanceof errors.JWKSMultipleMatchingKeys ||
    error instanceof errors.JOSEAlgNotAllowed
  ) {
    return 'bad-signature';
  }
  if (error instanceof errors.JOSEError) {
    return 'malformed';
  }
  throw error;
}

/**
 * Validates JWTs with jose against a key set, checking signature, issuer,
 * audience and lifetime. Holds no per-request state.
 */
export class JwtTokenValidator implements TokenValidator {
  constructor(private readonly options: JwtTokenValidatorOptions) {}

  async validate(token: string): Promise<ValidationResult> {
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, this.options.keySet, {
        issuer: this.options.issuer,
        audience: this.options.audience,
        algorithms: [...acceptedAlgorithms],
        clockTolerance: (this.options.clockSkewMs ?? 0) / 1000,
      }));
    } catch (error) {
      return { ok: false, reason: classifyVerificationError(error) };
    }

    const subject = optionalString(payload.sub);
    const issuer = optionalString(payload.iss);
    if (!subject || !issuer) {
      return { ok: false, reason: 'malformed' };
    }

    const claims: ValidatedClaims = {
      subject,
      issuer,
      audience: toAudienceList(payload.aud),
      givenName: optionalString(payload.given_name),
      familyName: optionalString(payload.family_name),
      issuedAt: toDate(payload.iat),
      expiresAt: toDate(payload.exp),
      payload,
    };
    return { ok: true, claims };
  }
}

/**
 * Wraps a key set so that failures to reach it (refused connections, DNS
 * errors) surface as KeySetUnavailableError. jose's own errors pass through.
 */
export function guardKeySet(keySet: JWTVerifyGetKey): JWTVerifyGetKey {
  return async (protectedHeader, token) => {
    try {
      return await keySet(protectedHeader, token);
    } catch (error) {
      if (error instanceof errors.JOSEError) {
        throw error;
      }
      throw new KeySetUnavailableError(error);
    }
  };
}

export function createOrcidTokenValidator(config: AppConfig): JwtTokenValidator {
  const remoteKeySet = createRemoteJWKSet(new URL(config.orcid.jwksUri), {
    cacheMaxAge: config.orcid.jwksCacheMs,
    cooldownDuration: 30_000,
  });

  return new JwtTokenValidator({
    issuer: config.orcid.issuer,
    audience: config.orcid.clientId,
    keySet: guardKeySet(remoteKeySet),
    clockSkewMs: config.orcid.clockSkewMs,
  });
}
