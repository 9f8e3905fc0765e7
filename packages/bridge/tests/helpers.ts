/**
 * Shared test helpers: an in-process ProviderClient stub and frame builders.
 */

import { vi, type Mock } from "vitest";
import type {
  ChatCompletion,
  ChatCompletionChunk,
  ProviderClient,
} from "@call-bridge/openai-client";

export interface StubClient extends ProviderClient {
  createChatCompletion: Mock<ProviderClient["createChatCompletion"]>;
  streamChatCompletion: Mock<ProviderClient["streamChatCompletion"]>;
  createTranscription: Mock<ProviderClient["createTranscription"]>;
  createSpeech: Mock<ProviderClient["createSpeech"]>;
}

/** A stub whose methods reject until a test gives them behavior. */
export function createStubClient(): StubClient {
  const unconfigured = () => Promise.reject(new Error("not configured"));
  return {
    name: "stub",
    createChatCompletion: vi.fn<ProviderClient["createChatCompletion"]>(unconfigured),
    streamChatCompletion: vi.fn<ProviderClient["streamChatCompletion"]>(() =>
      frameStream([], { error: new Error("not configured") }),
    ),
    createTranscription: vi.fn<ProviderClient["createTranscription"]>(unconfigured),
    createSpeech: vi.fn<ProviderClient["createSpeech"]>(unconfigured),
  };
}

export function completion(...contents: Array<string | null>): ChatCompletion {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1700000000,
    model: "gpt-4o-mini",
    choices: contents.map((content, index) => ({
      index,
      message: { role: "assistant", content },
      finish_reason: "stop",
    })),
  };
}

export function frame(
  content: string | null | undefined,
  finishReason: string | null = null,
): ChatCompletionChunk {
  return {
    id: "chatcmpl-test",
    model: "gpt-4o-mini",
    choices: [
      {
        index: 0,
        delta: content === undefined ? {} : { content },
        finish_reason: finishReason,
      },
    ],
  };
}

/** `count` frames with content "t1", "t2", ... and no finish reason. */
export function numberedFrames(count: number): ChatCompletionChunk[] {
  return Array.from({ length: count }, (_, i) => frame(`t${i + 1}`));
}

/**
 * Yield `frames`, then throw `error` if given. `onClose` runs when the
 * generator finishes, fails or is returned early.
 */
export async function* frameStream(
  frames: readonly ChatCompletionChunk[],
  options: { error?: Error; onClose?: () => void } = {},
): AsyncGenerator<ChatCompletionChunk> {
  try {
    for (const f of frames) {
      yield f;
    }
    if (options.error) throw options.error;
  } finally {
    options.onClose?.();
  }
}

/** Yield `frames` from a stream whose `return()` rejects with `closeError`. */
export function streamWithFailingClose(
  frames: readonly ChatCompletionChunk[],
  closeError: Error,
): AsyncIterableIterator<ChatCompletionChunk> {
  const inner = frameStream(frames);
  return {
    next: () => inner.next(),
    return: () => Promise.reject(closeError),
    [Symbol.asyncIterator]() {
      return this;
    },
  };
}

/** A promise plus the functions that settle it. */
export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let pending promise callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
