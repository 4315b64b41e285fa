import type { AccessDecision } from './context.js';
import type { CredentialExtraction } from './credentials.js';
import type { TokenValidator } from './validator.js';

export class AccessGate {
  constructor(private readonly validator: TokenValidator) {}

  async evaluate(extraction: CredentialExtraction): Promise<AccessDecision> {
    const { credential } = extraction;

    if (!credential) {
      return {
        outcome: 'reject',
        reason: extraction.malformedHeader ? { code: 'malformed_credential' } : { code: 'no_credential' },
      };
    }

    const result = await this.validator.validate(credential.token);
    if (!result.ok) {
      return {
        outcome: 'reject',
        reason: { code: 'validation_failed', reason: result.reason, source: credential.source },
      };
    }

    return { outcome: 'admit', identity: { ...result.claims, source: credential.source } };
  }
}
