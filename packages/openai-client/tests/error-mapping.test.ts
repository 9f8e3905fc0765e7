import { describe, it, expect } from "vitest";
import {
  mapHttpError,
  mapStreamedError,
} from "../src/utils/error-mapping.js";
import {
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  RequestTimeoutError,
} from "../src/types/errors.js";

function errorBody(message: string, code?: string) {
  return {
    error: {
      message,
      type: "invalid_request_error",
      ...(code ? { code } : {}),
    },
  };
}

describe("mapHttpError: status code mapping", () => {
  it("400 → InvalidRequestError", () => {
    const err = mapHttpError(400, errorBody("bad request"), "openai");
    expect(err).toBeInstanceOf(InvalidRequestError);
    expect(err.message).toBe("bad request");
    expect(err.retryable).toBe(false);
  });

  it("422 → InvalidRequestError", () => {
    expect(mapHttpError(422, errorBody("bad field"), "openai")).toBeInstanceOf(
      InvalidRequestError,
    );
  });

  it("401 → AuthenticationError", () => {
    const err = mapHttpError(401, errorBody("Incorrect API key provided"), "openai");
    expect(err).toBeInstanceOf(AuthenticationError);
    expect(err.message).toBe("Incorrect API key provided");
  });

  it("403 → AccessDeniedError", () => {
    expect(mapHttpError(403, errorBody("forbidden"), "openai")).toBeInstanceOf(
      AccessDeniedError,
    );
  });

  it("404 → NotFoundError", () => {
    expect(
      mapHttpError(404, errorBody("model does not exist"), "openai"),
    ).toBeInstanceOf(NotFoundError);
  });

  it("408 → RequestTimeoutError", () => {
    expect(mapHttpError(408, errorBody("timeout"), "openai")).toBeInstanceOf(
      RequestTimeoutError,
    );
  });

  it("429 → RateLimitError with retry_after", () => {
    const err = mapHttpError(
      429,
      errorBody("slow down", "rate_limit_exceeded"),
      "openai",
      new Headers({ "retry-after": "7" }),
    );
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err.retryable).toBe(true);
    const rate = err as RateLimitError;
    expect(rate.retry_after).toBe(7);
    expect(rate.error_code).toBe("rate_limit_exceeded");
    expect(rate.status_code).toBe(429);
  });

  it("5xx → ServerError", () => {
    for (const status of [500, 502, 503, 504, 529]) {
      const err = mapHttpError(status, errorBody("overloaded"), "openai");
      expect(err).toBeInstanceOf(ServerError);
      expect(err.retryable).toBe(true);
    }
  });

  it("other statuses → plain ProviderError", () => {
    const err = mapHttpError(418, errorBody("teapot"), "openai");
    expect(err.constructor).toBe(ProviderError);
    expect(err.retryable).toBe(false);
  });
});

describe("mapHttpError: message extraction", () => {
  it("falls back to `type` when there is no `code`", () => {
    const err = mapHttpError(400, errorBody("bad"), "openai") as ProviderError;
    expect(err.error_code).toBe("invalid_request_error");
  });

  it("uses a top-level message", () => {
    expect(mapHttpError(400, { message: "top level" }, "openai").message).toBe(
      "top level",
    );
  });

  it("uses a string error field", () => {
    expect(mapHttpError(400, { error: "plain" }, "openai").message).toBe(
      "plain",
    );
  });

  it("uses a raw text body", () => {
    expect(mapHttpError(502, "Bad Gateway", "openai").message).toBe(
      "Bad Gateway",
    );
  });

  it("keeps the raw body and provider name", () => {
    const body = errorBody("bad");
    const err = mapHttpError(400, body, "my-proxy") as ProviderError;
    expect(err.raw).toBe(body);
    expect(err.provider).toBe("my-proxy");
  });
});

describe("mapStreamedError", () => {
  it("maps an in-stream error payload", () => {
    const err = mapStreamedError(
      { error: { message: "server had an error", type: "server_error" } },
      "openai",
    );
    expect(err).toBeInstanceOf(ProviderError);
    expect(err?.message).toBe("server had an error");
    expect(err?.error_code).toBe("server_error");
  });

  it("ignores ordinary frames", () => {
    expect(mapStreamedError({ id: "c1", choices: [] }, "openai")).toBeUndefined();
  });
});
