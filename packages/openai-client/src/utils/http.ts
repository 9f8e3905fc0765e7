/**
 * Thin HTTP wrapper around the native `fetch` API.
 *
 * Provides a JSON POST, a multipart POST for file uploads, a binary POST for
 * audio downloads and a streaming variant that returns the raw
 * ReadableStream. Fetch-level failures are rethrown as typed SDK errors;
 * non-2xx responses resolve normally and are mapped by the caller.
 */

import {
  AbortError,
  NetworkError,
  RequestTimeoutError,
  type SDKError,
} from "../types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Resolved response from a non-streaming HTTP request. */
export interface HttpResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON body (or `undefined` if response was not valid JSON). */
  body: unknown;
  /** Raw response text. */
  text: string;
}

/** Resolved response whose body is kept as raw bytes. */
export interface HttpBinaryResponse {
  status: number;
  headers: Headers;
  data: Uint8Array;
}

/** Resolved response from a streaming HTTP request. */
export interface HttpStreamResponse {
  status: number;
  headers: Headers;
  body: ReadableStream<Uint8Array>;
}

/** Options shared by every request helper. */
export interface HttpRequestOptions {
  /** Request timeout in milliseconds. Combined with any user-provided signal. */
  timeout?: number;
  /** Optional caller-provided abort signal. */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge multiple header objects. Later entries override earlier ones.
 * A `Content-Type: application/json` default is always present unless
 * explicitly overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) {
      for (const [key, value] of Object.entries(set)) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

/** Parse a response body as JSON, returning `undefined` when it is not JSON. */
export function parseJsonBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Build a combined `AbortSignal` from an optional user signal and an
 * optional timeout value.  Returns `undefined` when neither is provided.
 */
function buildSignal(
  options?: HttpRequestOptions,
): AbortSignal | undefined {
  const signals: AbortSignal[] = [];

  if (options?.signal) {
    signals.push(options.signal);
  }

  if (options?.timeout != null && options.timeout > 0) {
    signals.push(AbortSignal.timeout(options.timeout));
  }

  if (signals.length <= 1) return signals[0];
  return AbortSignal.any(signals);
}

/** Classify a rejection from `fetch` (or from reading its body). */
export function toTransportError(error: unknown): SDKError {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && error.name === "TimeoutError") {
    return new RequestTimeoutError(`Request timed out: ${message}`, {
      cause: error,
    });
  }
  if (error instanceof Error && error.name === "AbortError") {
    return new AbortError(`Request aborted: ${message}`, { cause: error });
  }
  return new NetworkError(message, { cause: error });
}

async function send(
  url: string,
  init: { headers: Record<string, string>; body: string | FormData },
  options?: HttpRequestOptions,
): Promise<Response> {
  try {
    return await fetch(url, {
      method: "POST",
      headers: init.headers,
      body: init.body,
      signal: buildSignal(options),
    });
  } catch (error) {
    throw toTransportError(error);
  }
}

async function readText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch (error) {
    throw toTransportError(error);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Send a JSON POST request and return the parsed response.
 *
 * On non-2xx status codes the promise still resolves; it is the caller's
 * responsibility to inspect `status` and throw an appropriate error.
 *
 * @throws {NetworkError | RequestTimeoutError | AbortError} On fetch-level
 *   failures.
 */
export async function httpPost(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpResponse> {
  const res = await send(
    url,
    { headers: mergeHeaders(headers), body: JSON.stringify(body) },
    options,
  );
  const text = await readText(res);

  return {
    status: res.status,
    headers: res.headers,
    body: parseJsonBody(text),
    text,
  };
}

/**
 * Send a multipart/form-data POST request.
 *
 * No Content-Type header is set here: `fetch` derives it, boundary included,
 * from the FormData body.
 */
export async function httpPostForm(
  url: string,
  form: FormData,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpResponse> {
  const res = await send(url, { headers: { ...headers }, body: form }, options);
  const text = await readText(res);

  return {
    status: res.status,
    headers: res.headers,
    body: parseJsonBody(text),
    text,
  };
}

/** Send a JSON POST request and keep the response body as raw bytes. */
export async function httpPostBinary(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpBinaryResponse> {
  const res = await send(
    url,
    { headers: mergeHeaders(headers), body: JSON.stringify(body) },
    options,
  );

  let buffer: ArrayBuffer;
  try {
    buffer = await res.arrayBuffer();
  } catch (error) {
    throw toTransportError(error);
  }

  return {
    status: res.status,
    headers: res.headers,
    data: new Uint8Array(buffer),
  };
}

/**
 * Send a JSON POST request and return a streaming response.
 *
 * The caller is responsible for consuming and closing the stream.
 */
export async function httpStream(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpStreamResponse> {
  const res = await send(
    url,
    { headers: mergeHeaders(headers), body: JSON.stringify(body) },
    options,
  );

  if (!res.body) {
    throw new NetworkError("Response body is null -- streaming not supported");
  }

  return {
    status: res.status,
    headers: res.headers,
    body: res.body,
  };
}
