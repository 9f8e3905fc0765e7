/**
 * Error taxonomy for the bridge.
 *
 * Every failure a host sees is a BridgeError subclass with a human-readable
 * message. Provider and network failures arrive from the client as SDKError
 * instances and are reclassified as TransportError with the original kept as
 * `cause`.
 */

import { ProviderError, SDKError } from "@call-bridge/openai-client";

// ---------------------------------------------------------------------------
// BridgeError: base for all bridge errors
// ---------------------------------------------------------------------------

export class BridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "BridgeError";
  }
}

/** The per-call execution context could not be created. Fatal for the call. */
export class ContextCreationError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ContextCreationError";
  }
}

/** The client handle is closed, or waiting for it took too long. */
export class LockError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LockError";
  }
}

/** Input rejected before any request was built. */
export class ValidationError extends BridgeError {
  readonly details: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ValidationError";
    this.details = Object.freeze({ ...details });
  }
}

/** A host value could not be interpreted as its target type. */
export class DecodeError extends BridgeError {
  /** The option key (or message path) that failed. */
  readonly key: string;
  /** Diagnostic context, e.g. input length and supplied option keys. */
  readonly context?: string;

  constructor(
    message: string,
    options: { key: string; context?: string; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "DecodeError";
    this.key = options.key;
    this.context = options.context;
  }
}

/** A well-typed but unusable combination of request fields. */
export class RequestBuildError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RequestBuildError";
  }
}

/** Network or provider failure. The provider's message is kept verbatim. */
export class TransportError extends BridgeError {
  readonly providerMessage: string;
  readonly retryable: boolean;
  readonly statusCode?: number;

  constructor(
    message: string,
    options: {
      providerMessage: string;
      retryable?: boolean;
      statusCode?: number;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.providerMessage = options.providerMessage;
    this.retryable = options.retryable ?? false;
    this.statusCode = options.statusCode;
  }
}

/** A chat completion came back with zero choices. */
export class EmptyResultError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmptyResultError";
  }
}

/** Bridge misconfiguration (missing API key, invalid limits). */
export class ConfigurationError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/**
 * Reclassify whatever a network operation threw. Bridge errors pass through
 * untouched; everything else becomes a TransportError labelled with the
 * operation, e.g. "API transcription request failed: <provider text>".
 */
export function classifyFailure(operation: string, error: unknown): BridgeError {
  if (error instanceof BridgeError) return error;

  const providerMessage = error instanceof Error ? error.message : String(error);
  return new TransportError(
    `API ${operation} request failed: ${providerMessage}`,
    {
      providerMessage,
      retryable: error instanceof SDKError ? error.retryable : false,
      statusCode: error instanceof ProviderError ? error.status_code : undefined,
      cause: error,
    },
  );
}
