import { describe, it, expect, vi, afterEach } from "vitest";
import {
  httpPost,
  httpPostBinary,
  httpPostForm,
  httpStream,
  mergeHeaders,
  parseJsonBody,
} from "../src/utils/http.js";
import {
  AbortError,
  NetworkError,
  RequestTimeoutError,
} from "../src/types/errors.js";

type FetchFn = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

function stubFetch(response: Response) {
  const mockFn = vi.fn<FetchFn>().mockResolvedValue(response);
  vi.stubGlobal("fetch", mockFn);
  return mockFn;
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("mergeHeaders", () => {
  it("sets Content-Type: application/json by default", () => {
    expect(mergeHeaders()["Content-Type"]).toBe("application/json");
  });

  it("merges multiple header objects, later overriding earlier", () => {
    const result = mergeHeaders(
      { Authorization: "Bearer abc", "X-Custom": "first" },
      undefined,
      { "X-Custom": "second" },
    );
    expect(result).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer abc",
      "X-Custom": "second",
    });
  });
});

describe("parseJsonBody", () => {
  it("returns parsed JSON or undefined", () => {
    expect(parseJsonBody('{"a":1}')).toEqual({ a: 1 });
    expect(parseJsonBody("plain transcript")).toBeUndefined();
  });
});

describe("httpPost", () => {
  it("sends a JSON POST and parses a JSON response", async () => {
    const mockFn = stubFetch(
      new Response('{"result":"ok"}', {
        status: 200,
        headers: { "x-request-id": "123" },
      }),
    );

    const result = await httpPost(
      "https://api.example.com/v1/chat/completions",
      { model: "gpt-4o-mini", messages: [] },
      { Authorization: "Bearer test-key" },
    );

    expect(mockFn).toHaveBeenCalledOnce();
    const [url, init] = mockFn.mock.calls[0]!;
    expect(url).toBe("https://api.example.com/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"model":"gpt-4o-mini","messages":[]}');
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key",
    });

    expect(result.status).toBe(200);
    expect(result.body).toEqual({ result: "ok" });
    expect(result.text).toBe('{"result":"ok"}');
    expect(result.headers.get("x-request-id")).toBe("123");
  });

  it("resolves on non-2xx status (does not throw)", async () => {
    stubFetch(
      new Response('{"error":{"message":"rate limited"}}', {
        status: 429,
        headers: { "retry-after": "5" },
      }),
    );

    const result = await httpPost("https://example.com", {}, {});
    expect(result.status).toBe(429);
    expect(result.body).toEqual({ error: { message: "rate limited" } });
  });

  it("wraps fetch failures in NetworkError", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<FetchFn>().mockRejectedValue(new TypeError("fetch failed")),
    );

    const err = await httpPost("https://example.com", {}, {}).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(NetworkError);
    expect((err as NetworkError).message).toBe("fetch failed");
  });

  it("maps a timed-out signal to RequestTimeoutError", async () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    vi.stubGlobal("fetch", vi.fn<FetchFn>().mockRejectedValue(timeout));

    await expect(
      httpPost("https://example.com", {}, {}, { timeout: 10 }),
    ).rejects.toBeInstanceOf(RequestTimeoutError);
  });

  it("maps an aborted signal to AbortError", async () => {
    const aborted = new Error("This operation was aborted");
    aborted.name = "AbortError";
    vi.stubGlobal("fetch", vi.fn<FetchFn>().mockRejectedValue(aborted));

    await expect(
      httpPost("https://example.com", {}, {}),
    ).rejects.toBeInstanceOf(AbortError);
  });
});

describe("httpPostForm", () => {
  it("sends the FormData body without a JSON content type", async () => {
    const mockFn = stubFetch(new Response("hello", { status: 200 }));
    const form = new FormData();
    form.append("model", "whisper-1");

    const result = await httpPostForm("https://example.com", form, {
      Authorization: "Bearer test-key",
    });

    const [, init] = mockFn.mock.calls[0]!;
    expect(init?.body).toBe(form);
    expect(init?.headers).toEqual({ Authorization: "Bearer test-key" });
    expect(result.body).toBeUndefined();
    expect(result.text).toBe("hello");
  });
});

describe("httpPostBinary", () => {
  it("returns the body as bytes", async () => {
    stubFetch(new Response(new Uint8Array([1, 2, 3]), { status: 200 }));

    const result = await httpPostBinary("https://example.com", {}, {});
    expect(result.status).toBe(200);
    expect(Array.from(result.data)).toEqual([1, 2, 3]);
  });
});

describe("httpStream", () => {
  it("returns a streaming response", async () => {
    stubFetch(new Response("chunk1", { status: 200 }));

    const result = await httpStream("https://example.com", {}, {});
    expect(result.status).toBe(200);

    const reader = result.body.getReader();
    const { value } = await reader.read();
    expect(new TextDecoder().decode(value)).toBe("chunk1");
  });

  it("throws if response body is null", async () => {
    stubFetch(new Response(null, { status: 200 }));

    await expect(httpStream("https://example.com", {}, {})).rejects.toThrow(
      "Response body is null",
    );
  });
});
