// Mapping of mail outcomes and errors onto HTTP responses
import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { MailError, ProviderRateLimitedError } from '../shared/errors.js';
import type { Failure } from '../shared/types/api.js';

export function statusForError(error: MailError): ContentfulStatusCode {
  switch (error.code) {
    case 'NEEDS_REAUTH':
    case 'INVALID_GRANT':
    case 'TOKEN_REVOKED':
      return 409;
    case 'INVALID_REQUEST':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'TRANSIENT_NETWORK':
    case 'RATE_LIMITED':
    case 'REPOSITORY_UNAVAILABLE':
    case 'CLIENT_MISCONFIGURED':
      return 503;
    case 'MALFORMED_RESPONSE':
    case 'PROVIDER_REJECTED':
      return 502;
  }
}

/**
 * JSON error body. Re-authorization is flagged explicitly so clients can start the consent flow.
 */
export function errorResponse(c: Context, error: MailError) {
  const status = statusForError(error);

  if (error instanceof ProviderRateLimitedError && error.retryAfterMs !== undefined) {
    c.header('Retry-After', String(Math.ceil(error.retryAfterMs / 1000)));
  }

  return c.json(
    {
      detail: error.message,
      code: error.code,
      retryable: error.retryable,
      ...(status === 409 ? { reauth_required: true } : {}),
    },
    status
  );
}

export function failureResponse(
  c: Context,
  outcome: Failure<'retryable' | 'fatal' | 'needs_reauth'>
) {
  return errorResponse(c, outcome.error);
}
