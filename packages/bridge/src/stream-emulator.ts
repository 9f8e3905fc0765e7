/**
 * Streaming chunk emulator.
 *
 * Each invocation is one bounded polling pass: build a streaming request,
 * open the network stream, read at most `frameLimit` frames, then report the
 * collected text to the caller as notifications. Nothing carries over between
 * invocations; calling again re-issues the request from the first frame.
 */

import type {
  ChatCompletionChunk,
  ChatCompletionRequest,
  ProviderClient,
} from "@call-bridge/openai-client";
import { classifyFailure } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { execute } from "./execution.js";
import type { ClientHandle } from "./handle.js";
import { buildChatRequest, type HostMessage } from "./messages.js";
import type {
  CallerIdentity,
  CorrelationToken,
  DoneReason,
  Notification,
  Notifier,
} from "./notifications.js";

export type StreamOutcome =
  | { state: "done"; reason: DoneReason }
  | { state: "error"; error: unknown };

export interface StreamPass {
  /** Non-empty delta fragments in arrival order. */
  chunks: string[];
  /** Frames read from the stream. */
  frames: number;
  outcome: StreamOutcome;
}

export interface Accepted {
  status: "accepted";
}

function collectFragments(frame: ChatCompletionChunk, into: string[]): boolean {
  let finished = false;
  for (const choice of frame.choices) {
    const content = choice.delta.content;
    if (content) into.push(content);
    if (choice.finish_reason) finished = true;
  }
  return finished;
}

/**
 * Read up to `frameLimit` frames of a streamed chat completion. Transport
 * errors end the pass in the error state with the fragments read so far. The
 * stream is closed before this returns; a failure while closing it is logged
 * and does not change the pass.
 */
export async function runStreamPass(
  client: ProviderClient,
  request: ChatCompletionRequest,
  frameLimit: number,
  signal?: AbortSignal,
  logger: Logger = silentLogger,
): Promise<StreamPass> {
  const chunks: string[] = [];
  let frames = 0;
  let outcome: StreamOutcome = { state: "done", reason: "frame_limit" };
  const stream = client.streamChatCompletion(request, { signal });

  try {
    while (frames < frameLimit) {
      const next = await stream.next();
      if (next.done) {
        outcome = { state: "done", reason: "finished" };
        break;
      }
      frames += 1;
      if (collectFragments(next.value, chunks)) {
        outcome = { state: "done", reason: "finished" };
        break;
      }
    }
  } catch (error) {
    outcome = { state: "error", error };
  }

  try {
    await stream.return?.();
  } catch (error) {
    logger.warn("stream close failed", {
      frames,
      message: error instanceof Error ? error.message : String(error),
    });
  }

  return { chunks, frames, outcome };
}

function errorMessage(error: unknown): string {
  return classifyFailure("stream", error).message;
}

/**
 * Run one polling pass and notify `caller`: a `chunk` per fragment, then
 * exactly one `done` or `error`, all carrying `token`.
 *
 * Always resolves to `{ status: "accepted" }`. Request-build, lock and
 * context failures are reported as the `error` notification.
 */
export async function streamChatChunk(
  handle: ClientHandle,
  messages: readonly HostMessage[],
  model: string | undefined,
  caller: CallerIdentity,
  token: CorrelationToken,
  notifier: Notifier = handle.settings.notifier,
): Promise<Accepted> {
  const { logger, frameLimit } = handle.settings;
  const notifications: Notification[] = [];

  try {
    const request = buildChatRequest(
      messages,
      model || handle.settings.defaultModel,
      true,
    );
    const pass = await execute(handle, "stream", (client, ctx) =>
      runStreamPass(client, request, frameLimit, ctx.signal, logger),
    );

    for (const text of pass.chunks) {
      notifications.push({ type: "chunk", text, token });
    }
    if (pass.outcome.state === "done") {
      logger.debug("stream pass ended", {
        frames: pass.frames,
        chunks: pass.chunks.length,
        reason: pass.outcome.reason,
      });
      notifications.push({ type: "done", reason: pass.outcome.reason, token });
    } else {
      const message = errorMessage(pass.outcome.error);
      logger.error("stream pass failed", { frames: pass.frames, message });
      notifications.push({ type: "error", message, token });
    }
  } catch (error) {
    notifications.push({ type: "error", message: errorMessage(error), token });
  }

  try {
    for (const notification of notifications) {
      await notifier.send(caller, notification);
    }
  } catch (error) {
    logger.error("notification delivery failed", {
      caller,
      message: error instanceof Error ? error.message : String(error),
    });
  }

  return { status: "accepted" };
}
