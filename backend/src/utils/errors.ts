import type { FastifyReply } from 'fastify';

export interface ErrorPayload {
  error: string;
  code: string;
  details?: unknown;
}

export function sendError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ErrorPayload {
  reply.status(status);
  const payload: ErrorPayload = { error: message, code };
  if (details !== undefined) payload.details = details;
  return payload;
}

/** The signing key set could not be fetched or parsed; no token can be judged. */
export class KeySetUnavailableError extends Error {
  readonly statusCode = 503;
  readonly code = 'auth.key_set_unavailable';

  constructor(cause: unknown) {
    super('Signing key set is unavailable', { cause });
    this.name = 'KeySetUnavailableError';
  }
}
