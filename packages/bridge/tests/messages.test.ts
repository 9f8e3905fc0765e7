import { describe, it, expect } from "vitest";
import {
  buildChatRequest,
  decodeMessages,
  decodeRole,
  type HostMessage,
} from "../src/messages.js";
import { DecodeError, RequestBuildError } from "../src/errors.js";

describe("decodeRole", () => {
  it("maps system and assistant to themselves", () => {
    expect(decodeRole("system")).toBe("system");
    expect(decodeRole("assistant")).toBe("assistant");
  });

  it("maps user and anything unrecognized to user", () => {
    expect(decodeRole("user")).toBe("user");
    expect(decodeRole("tool")).toBe("user");
    expect(decodeRole("")).toBe("user");
    expect(decodeRole("System")).toBe("user");
  });
});

describe("decodeMessages", () => {
  it("decodes a list of role/content maps", () => {
    const decoded = decodeMessages([
      { role: "system", content: "Be brief." },
      { role: "user", content: "Hi" },
    ]);
    expect(decoded).toEqual([
      { role: "system", content: "Be brief." },
      { role: "user", content: "Hi" },
    ]);
  });

  it("treats a missing or null role as user", () => {
    const decoded = decodeMessages([{ content: "a" }, { role: null, content: "b" }]);
    expect(decoded).toEqual([
      { role: "user", content: "a" },
      { role: "user", content: "b" },
    ]);
  });

  it("rejects a non-list", () => {
    expect(() => decodeMessages({ role: "user" })).toThrow(DecodeError);
    expect(() => decodeMessages("hello")).toThrow(
      "Failed to decode messages: expected a list",
    );
  });

  it("names the offending content path", () => {
    try {
      decodeMessages([{ role: "user", content: "ok" }, { role: "user", content: 42 }]);
      expect.fail("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(DecodeError);
      expect((error as DecodeError).key).toBe("messages[1].content");
    }
  });

  it("names the offending role path", () => {
    expect(() => decodeMessages([{ role: 7, content: "x" }])).toThrow(
      "Failed to decode messages[0].role: expected a string",
    );
  });

  it("rejects entries that are not maps", () => {
    expect(() => decodeMessages(["hi"])).toThrow(
      "Failed to decode messages[0]: expected a map with role and content",
    );
  });
});

describe("buildChatRequest", () => {
  const messages: HostMessage[] = [
    { role: "system", content: "S" },
    { role: "user", content: "U" },
    { role: "assistant", content: "A" },
    { role: "critic", content: "C" },
  ];

  it("preserves order and maps roles", () => {
    const request = buildChatRequest(messages, "gpt-4o-mini", false);
    expect(request).toEqual({
      model: "gpt-4o-mini",
      messages: [
        { role: "system", content: "S" },
        { role: "user", content: "U" },
        { role: "assistant", content: "A" },
        { role: "user", content: "C" },
      ],
    });
  });

  it("sets stream only when streaming", () => {
    expect(buildChatRequest(messages, "m", true).stream).toBe(true);
    expect("stream" in buildChatRequest(messages, "m", false)).toBe(false);
  });

  it("forwards chat options", () => {
    const request = buildChatRequest(messages, "m", false, {
      temperature: 0.2,
      max_tokens: 64,
    });
    expect(request.temperature).toBe(0.2);
    expect(request.max_tokens).toBe(64);
  });

  it("fails without a model", () => {
    expect(() => buildChatRequest(messages, undefined, false)).toThrow(RequestBuildError);
    expect(() => buildChatRequest(messages, "", false)).toThrow(
      "Failed to build request: no model specified",
    );
  });

  it("fails with no messages", () => {
    expect(() => buildChatRequest([], "m", false)).toThrow(
      "Failed to build request: at least one message is required",
    );
  });

  it("fails when content is not a string", () => {
    const bad = [{ role: "assistant", content: 5 }] as unknown as HostMessage[];
    expect(() => buildChatRequest(bad, "m", false)).toThrow(
      "Failed to build assistant message at position 0: content must be a string",
    );
  });
});
