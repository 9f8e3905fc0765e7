/**
 * Error hierarchy for the OpenAI client.
 *
 * All client errors inherit from SDKError. Provider-reported failures carry
 * the HTTP status and the provider's own message so callers can surface it
 * verbatim.
 */

// ---------------------------------------------------------------------------
// SDKError: base for all client errors
// ---------------------------------------------------------------------------

/** Base error for all OpenAI client errors. */
export class SDKError extends Error {
  /** Whether this error is safe to retry. */
  readonly retryable: boolean;

  constructor(
    message: string,
    options?: { cause?: unknown; retryable?: boolean },
  ) {
    super(message, { cause: options?.cause });
    this.name = "SDKError";
    this.retryable = options?.retryable ?? false;
  }
}

// ---------------------------------------------------------------------------
// ProviderError: errors reported by the provider
// ---------------------------------------------------------------------------

/** Constructor options shared by ProviderError and its subclasses. */
export interface ProviderErrorOptions {
  /** Which provider returned the error. */
  provider: string;
  status_code?: number;
  error_code?: string;
  retry_after?: number;
  raw?: Record<string, unknown>;
  cause?: unknown;
}

/** Error returned by the provider's API. */
export class ProviderError extends SDKError {
  readonly provider: string;
  /** HTTP status code, if applicable. */
  readonly status_code?: number;
  /** Provider-specific error code. */
  readonly error_code?: string;
  /** Seconds to wait before retrying. */
  readonly retry_after?: number;
  /** Raw error response body from the provider. */
  readonly raw?: Record<string, unknown>;

  constructor(
    message: string,
    options: ProviderErrorOptions & { retryable?: boolean },
  ) {
    super(message, {
      cause: options.cause,
      retryable: options.retryable ?? false,
    });
    this.name = "ProviderError";
    this.provider = options.provider;
    this.status_code = options.status_code;
    this.error_code = options.error_code;
    this.retry_after = options.retry_after;
    this.raw = options.raw;
  }
}

/** 401: Invalid API key, expired token. */
export class AuthenticationError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AuthenticationError";
  }
}

/** 403: Insufficient permissions. */
export class AccessDeniedError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AccessDeniedError";
  }
}

/** 404: Unknown model or endpoint. */
export class NotFoundError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "NotFoundError";
  }
}

/** 400/422: Malformed request, invalid parameters. */
export class InvalidRequestError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "InvalidRequestError";
  }
}

/** 429: Rate limit exceeded. */
export class RateLimitError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: true });
    this.name = "RateLimitError";
  }
}

/** 500-599: Provider internal error. */
export class ServerError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { ...options, retryable: true });
    this.name = "ServerError";
  }
}

// ---------------------------------------------------------------------------
// Non-provider errors
// ---------------------------------------------------------------------------

/** Request timed out. Retryable. */
export class RequestTimeoutError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "RequestTimeoutError";
  }
}

/** Request cancelled via abort signal. Not retryable. */
export class AbortError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "AbortError";
  }
}

/** Network-level failure (DNS, refused connection, reset). Retryable. */
export class NetworkError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "NetworkError";
  }
}

/** Error during stream consumption. Retryable. */
export class StreamError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "StreamError";
  }
}

/** A 2xx response whose body does not have the documented shape. */
export class InvalidResponseError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "InvalidResponseError";
  }
}
