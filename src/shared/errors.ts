// Error taxonomy shared by the credential, provider, sync and send layers

export type MailErrorCode =
  | 'TRANSIENT_NETWORK'
  | 'RATE_LIMITED'
  | 'INVALID_GRANT'
  | 'TOKEN_REVOKED'
  | 'NEEDS_REAUTH'
  | 'MALFORMED_RESPONSE'
  | 'NOT_FOUND'
  | 'PROVIDER_REJECTED'
  | 'INVALID_REQUEST'
  | 'REPOSITORY_UNAVAILABLE'
  | 'CLIENT_MISCONFIGURED';

/**
 * Base class for every failure the mailbox core reports.
 * `retryable` tells the caller whether repeating the same call later can succeed.
 */
export abstract class MailError extends Error {
  abstract readonly code: MailErrorCode;
  abstract readonly retryable: boolean;
  readonly httpStatus?: number;

  constructor(message: string, options: { cause?: unknown; httpStatus?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.httpStatus = options.httpStatus;
  }
}

export class TransientNetworkError extends MailError {
  readonly code = 'TRANSIENT_NETWORK';
  readonly retryable = true;
}

export class ProviderRateLimitedError extends MailError {
  readonly code = 'RATE_LIMITED';
  readonly retryable = true;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: { cause?: unknown; httpStatus?: number; retryAfterMs?: number } = {}
  ) {
    super(message, options);
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class InvalidGrantError extends MailError {
  readonly code = 'INVALID_GRANT';
  readonly retryable = false;
}

export class TokenRevokedError extends MailError {
  readonly code = 'TOKEN_REVOKED';
  readonly retryable = false;
}

/**
 * The principal has to run the authorization flow again.
 * Raised for missing credentials, demoted credentials and missing refresh tokens.
 */
export class NeedsReauthError extends MailError {
  readonly code = 'NEEDS_REAUTH';
  readonly retryable = false;
}

export class MalformedResponseError extends MailError {
  readonly code = 'MALFORMED_RESPONSE';
  readonly retryable = false;
}

export class NotFoundError extends MailError {
  readonly code = 'NOT_FOUND';
  readonly retryable = false;
}

export class ProviderRejectedError extends MailError {
  readonly code = 'PROVIDER_REJECTED';
  readonly retryable = false;
}

export class InvalidRequestError extends MailError {
  readonly code = 'INVALID_REQUEST';
  readonly retryable = false;
}

export class RepositoryUnavailableError extends MailError {
  readonly code = 'REPOSITORY_UNAVAILABLE';
  readonly retryable = true;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** The OAuth client itself was refused (bad client id or secret); an operator has to fix the config */
export class ClientMisconfiguredError extends MailError {
  readonly code = 'CLIENT_MISCONFIGURED';
  readonly retryable = true;
}
