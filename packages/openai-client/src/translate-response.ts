/**
 * Parse provider response bodies into the client's typed shapes.
 *
 * Bodies arrive as `unknown`; every field is checked before it is read so a
 * malformed 2xx body surfaces as an InvalidResponseError rather than a
 * TypeError deep inside a caller.
 */

import type {
  ChatCompletion,
  ChatCompletionChoice,
  ChatCompletionChunk,
  ChatCompletionChunkChoice,
  ChatCompletionUsage,
  Transcription,
} from "./types/index.js";
import { InvalidResponseError } from "./types/index.js";
import { isRecord } from "./utils/error-mapping.js";

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

function stringField(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  return typeof value === "string" ? value : "";
}

function numberField(obj: Record<string, unknown>, key: string): number {
  const value = obj[key];
  return typeof value === "number" ? value : 0;
}

function nullableString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function choicesOf(body: Record<string, unknown>, what: string): unknown[] {
  const choices = body["choices"];
  if (choices === undefined) return [];
  if (!Array.isArray(choices)) {
    throw new InvalidResponseError(`${what}: "choices" is not an array`);
  }
  return choices;
}

function parseUsage(raw: unknown): ChatCompletionUsage | undefined {
  if (!isRecord(raw)) return undefined;
  return {
    prompt_tokens: numberField(raw, "prompt_tokens"),
    completion_tokens: numberField(raw, "completion_tokens"),
    total_tokens: numberField(raw, "total_tokens"),
  };
}

// ---------------------------------------------------------------------------
// Chat completion
// ---------------------------------------------------------------------------

function parseChoice(raw: unknown, position: number): ChatCompletionChoice {
  if (!isRecord(raw) || !isRecord(raw["message"])) {
    throw new InvalidResponseError(
      `Chat completion: choice ${position} has no message`,
    );
  }
  const message = raw["message"];
  return {
    index: typeof raw["index"] === "number" ? raw["index"] : position,
    message: {
      role: stringField(message, "role") || "assistant",
      content: nullableString(message["content"]),
    },
    finish_reason: nullableString(raw["finish_reason"]),
  };
}

export function parseChatCompletion(raw: unknown): ChatCompletion {
  if (!isRecord(raw)) {
    throw new InvalidResponseError("Chat completion: body is not a JSON object");
  }

  return {
    id: stringField(raw, "id"),
    object: stringField(raw, "object"),
    created: numberField(raw, "created"),
    model: stringField(raw, "model"),
    choices: choicesOf(raw, "Chat completion").map(parseChoice),
    usage: parseUsage(raw["usage"]),
  };
}

// ---------------------------------------------------------------------------
// Streaming frames
// ---------------------------------------------------------------------------

function parseChunkChoice(
  raw: unknown,
  position: number,
): ChatCompletionChunkChoice {
  if (!isRecord(raw)) {
    throw new InvalidResponseError(
      `Chat completion chunk: choice ${position} is not an object`,
    );
  }
  const delta = isRecord(raw["delta"]) ? raw["delta"] : {};
  const role = delta["role"];
  const content = delta["content"];

  return {
    index: typeof raw["index"] === "number" ? raw["index"] : position,
    delta: {
      ...(typeof role === "string" ? { role } : {}),
      ...(content !== undefined ? { content: nullableString(content) } : {}),
    },
    finish_reason: nullableString(raw["finish_reason"]),
  };
}

export function parseChatCompletionChunk(raw: unknown): ChatCompletionChunk {
  if (!isRecord(raw)) {
    throw new InvalidResponseError(
      "Chat completion chunk: frame is not a JSON object",
    );
  }

  return {
    id: stringField(raw, "id"),
    model: stringField(raw, "model"),
    choices: choicesOf(raw, "Chat completion chunk").map(parseChunkChoice),
  };
}

// ---------------------------------------------------------------------------
// Transcription
// ---------------------------------------------------------------------------

/**
 * `json` and `verbose_json` responses carry the transcript under `text`;
 * `text`, `srt` and `vtt` responses are the transcript itself.
 */
export function parseTranscription(
  body: unknown,
  text: string,
): Transcription {
  if (isRecord(body)) {
    if (typeof body["text"] !== "string") {
      throw new InvalidResponseError('Transcription: JSON body has no "text"');
    }
    return { text: body["text"] };
  }
  return { text };
}
