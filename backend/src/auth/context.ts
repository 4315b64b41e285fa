import type { JWTPayload } from 'jose';

export type CredentialSource = 'header' | 'cookie';

export interface Credential {
  /** Raw bearer token exactly as presented by the client. */
  readonly token: string;
  readonly source: CredentialSource;
}

/** Claims returned by a successful token validation. */
export interface ValidatedClaims {
  /** Subject identifier, for ORCID tokens the ORCID iD. */
  subject: string;
  issuer: string;
  audience: string[];
  /** ORCID puts these in the ID token when the record makes them public. */
  givenName?: string;
  familyName?: string;
  issuedAt?: Date;
  expiresAt?: Date;
  /** Full decoded payload for downstream checks. */
  payload: JWTPayload;
}

export interface IdentityContext extends ValidatedClaims {
  /** Where the credential that produced this identity was found. */
  source: CredentialSource;
}

export type ValidationFailureReason =
  | 'expired'
  | 'bad-signature'
  | 'unknown-issuer'
  | 'audience-mismatch'
  | 'not-yet-valid'
  | 'malformed';

export type ValidationResult =
  | { ok: true; claims: ValidatedClaims }
  | { ok: false; reason: ValidationFailureReason };

export type RejectReason =
  | { code: 'no_credential' }
  | { code: 'malformed_credential' }
  | { code: 'validation_failed'; reason: ValidationFailureReason; source: CredentialSource };

export type AccessDecision =
  | { outcome: 'admit'; identity: IdentityContext }
  | { outcome: 'reject'; reason: RejectReason };
