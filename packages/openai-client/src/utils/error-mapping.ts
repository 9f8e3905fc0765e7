/**
 * Error mapping for provider HTTP responses.
 *
 * Maps HTTP status codes and OpenAI-style error bodies
 * (`{"error": {"message", "type", "code"}}`) to the typed error hierarchy.
 */

import {
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  RequestTimeoutError,
  type ProviderErrorOptions,
} from "../types/errors.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

/** Extract a human-readable error message from a provider response body. */
function extractMessage(body: unknown): string {
  if (isRecord(body)) {
    const error = body["error"];
    if (isRecord(error) && typeof error["message"] === "string") {
      return error["message"];
    }
    if (typeof body["message"] === "string") {
      return body["message"];
    }
    if (typeof error === "string") {
      return error;
    }
  }

  if (typeof body === "string") return body;
  if (body === undefined) return "Unknown provider error";
  return JSON.stringify(body);
}

/** Extract an error code (`code`, falling back to `type`). */
function extractErrorCode(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;

  const error = body["error"];
  const source = isRecord(error) ? error : body;
  if (typeof source["code"] === "string") return source["code"];
  if (typeof source["type"] === "string") return source["type"];
  return undefined;
}

/**
 * Parse the integer-seconds form of `Retry-After`. HTTP-date values are not
 * used by the provider and yield `undefined`.
 */
function parseRetryAfter(headers?: Headers): number | undefined {
  const raw = headers?.get("retry-after");
  if (raw == null) return undefined;

  const seconds = parseFloat(raw);
  return !Number.isNaN(seconds) && seconds >= 0 ? seconds : undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map an HTTP error response to a typed `ProviderError`.
 *
 * @param status  - HTTP status code from the provider response.
 * @param body    - Parsed JSON body (or raw text) from the response.
 * @param provider - Provider name used in the error.
 * @param headers - Response headers (used to extract Retry-After).
 */
export function mapHttpError(
  status: number,
  body: unknown,
  provider: string,
  headers?: Headers,
): ProviderError | RequestTimeoutError {
  const message = extractMessage(body);
  const opts: ProviderErrorOptions = {
    provider,
    status_code: status,
    error_code: extractErrorCode(body),
    retry_after: parseRetryAfter(headers),
    raw: isRecord(body) ? body : undefined,
  };

  switch (status) {
    case 400:
    case 422:
      return new InvalidRequestError(message, opts);
    case 401:
      return new AuthenticationError(message, opts);
    case 403:
      return new AccessDeniedError(message, opts);
    case 404:
      return new NotFoundError(message, opts);
    case 408:
      return new RequestTimeoutError(message);
    case 429:
      return new RateLimitError(message, opts);
  }

  if (status >= 500 && status <= 599) {
    return new ServerError(message, opts);
  }

  return new ProviderError(message, opts);
}

/**
 * Map an `{"error": {...}}` payload delivered inside a 2xx stream.
 * Returns `undefined` when the payload is not an error.
 */
export function mapStreamedError(
  payload: unknown,
  provider: string,
): ProviderError | undefined {
  if (!isRecord(payload) || !isRecord(payload["error"])) return undefined;

  return new ProviderError(extractMessage(payload), {
    provider,
    error_code: extractErrorCode(payload),
    raw: payload,
  });
}
