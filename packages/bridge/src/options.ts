/**
 * Option decoding for chat, transcription and speech calls.
 *
 * Hosts pass options as a loosely-typed mapping. Each decoder is a pure
 * function from that mapping to a typed config plus the list of decode
 * errors it found, so every field is checked in one place.
 *
 * Rules shared by all decoders:
 * - A missing key, `null` and `undefined` all mean "not provided" and resolve
 *   to the default.
 * - A present value of the wrong type is a DecodeError for that key.
 * - Enumerated string options map unrecognized strings to the default. These
 *   substitutions are reported in `fallbacks`, not as errors.
 */

import {
  SpeechFormat,
  SpeechModel,
  TranscriptionFormat,
  Voice,
} from "@call-bridge/openai-client";
import { DecodeError } from "./errors.js";

export type OptionMap = Readonly<Record<string, unknown>>;

export interface OptionFallback {
  key: string;
  /** The unrecognized value that was replaced. */
  value: string;
  /** The default used instead. */
  used: string;
}

export interface DecodeResult<T> {
  config: T;
  errors: DecodeError[];
  fallbacks: OptionFallback[];
}

export interface ChatConfig {
  temperature?: number;
  max_tokens?: number;
}

export interface TranscriptionConfig {
  model: string;
  language?: string;
  prompt?: string;
  response_format: TranscriptionFormat;
  temperature?: number;
}

export interface SpeechConfig {
  model: SpeechModel;
  voice: Voice;
  response_format: SpeechFormat;
  speed?: number;
}

export const DEFAULT_TRANSCRIPTION_MODEL = "whisper-1";

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

function describeValue(value: unknown): string {
  if (typeof value === "string") return `string "${value}"`;
  if (Array.isArray(value)) return "list";
  return typeof value;
}

class OptionReader {
  readonly errors: DecodeError[] = [];
  readonly fallbacks: OptionFallback[] = [];

  constructor(
    private readonly options: OptionMap,
    private readonly context?: string,
  ) {}

  private fail(key: string, expected: string, value: unknown): undefined {
    const suffix = this.context ? `. ${this.context}` : "";
    this.errors.push(
      new DecodeError(
        `Failed to decode ${key}: expected ${expected}, got ${describeValue(value)}${suffix}`,
        { key, context: this.context },
      ),
    );
    return undefined;
  }

  private raw(key: string): unknown {
    return Object.hasOwn(this.options, key) ? this.options[key] : undefined;
  }

  string(key: string): string | undefined {
    const value = this.raw(key);
    if (value == null) return undefined;
    if (typeof value === "string") return value;
    return this.fail(key, "a string", value);
  }

  float(key: string): number | undefined {
    const value = this.raw(key);
    if (value == null) return undefined;
    if (typeof value === "number" && Number.isFinite(value)) return value;
    return this.fail(key, "a number", value);
  }

  integer(key: string): number | undefined {
    const value = this.raw(key);
    if (value == null) return undefined;
    if (typeof value === "number" && Number.isInteger(value)) return value;
    return this.fail(key, "an integer", value);
  }

  /** Read a string option constrained to `choices`, falling back to `fallback`. */
  choice<T extends string>(
    key: string,
    choices: Record<string, T>,
    fallback: T,
  ): T {
    const value = this.string(key);
    if (value === undefined) return fallback;

    const match = Object.values(choices).find((c) => c === value);
    if (match !== undefined) return match;

    this.fallbacks.push({ key, value, used: fallback });
    return fallback;
  }

  result<T>(config: T): DecodeResult<T> {
    return { config, errors: this.errors, fallbacks: this.fallbacks };
  }
}

// ---------------------------------------------------------------------------
// Decoders
// ---------------------------------------------------------------------------

/** Chat options: `temperature` (number) and `max_tokens` (integer). */
export function decodeChatOptions(
  options: OptionMap,
  context?: string,
): DecodeResult<ChatConfig> {
  const reader = new OptionReader(options, context);
  const temperature = reader.float("temperature");
  const maxTokens = reader.integer("max_tokens");

  return reader.result({
    ...(temperature !== undefined ? { temperature } : {}),
    ...(maxTokens !== undefined ? { max_tokens: maxTokens } : {}),
  });
}

export function decodeTranscriptionOptions(
  options: OptionMap,
  context?: string,
): DecodeResult<TranscriptionConfig> {
  const reader = new OptionReader(options, context);
  const model = reader.string("model");
  const language = reader.string("language");
  const prompt = reader.string("prompt");
  const responseFormat = reader.choice(
    "response_format",
    TranscriptionFormat,
    TranscriptionFormat.TEXT,
  );
  const temperature = reader.float("temperature");

  return reader.result({
    model: model ?? DEFAULT_TRANSCRIPTION_MODEL,
    ...(language !== undefined ? { language } : {}),
    ...(prompt !== undefined ? { prompt } : {}),
    response_format: responseFormat,
    ...(temperature !== undefined ? { temperature } : {}),
  });
}

export function decodeSpeechOptions(
  options: OptionMap,
  context?: string,
): DecodeResult<SpeechConfig> {
  const reader = new OptionReader(options, context);
  const model = reader.choice("model", SpeechModel, SpeechModel.TTS_1);
  const voice = reader.choice("voice", Voice, Voice.ALLOY);
  const responseFormat = reader.choice(
    "response_format",
    SpeechFormat,
    SpeechFormat.MP3,
  );
  const speed = reader.float("speed");

  return reader.result({
    model,
    voice,
    response_format: responseFormat,
    ...(speed !== undefined ? { speed } : {}),
  });
}

/** Return the config, or throw the first decode error. */
export function unwrapDecoded<T>(result: DecodeResult<T>): T {
  const [first] = result.errors;
  if (first) throw first;
  return result.config;
}
