/**
 * Audio adapters: speech-to-text and text-to-speech.
 */

import { ValidationError } from "./errors.js";
import { execute } from "./execution.js";
import type { ClientHandle } from "./handle.js";
import type { Logger } from "./logger.js";
import {
  decodeSpeechOptions,
  decodeTranscriptionOptions,
  unwrapDecoded,
  type DecodeResult,
  type OptionMap,
} from "./options.js";

/** Upload name for a transcription buffer: `audio-<epoch seconds>.webm`. */
export function audioFileName(now: number = Date.now()): string {
  return `audio-${Math.floor(now / 1000)}.webm`;
}

function optionKeys(options: OptionMap): string {
  return `[${Object.keys(options).join(", ")}]`;
}

function reportFallbacks<T>(logger: Logger, result: DecodeResult<T>): void {
  for (const fallback of result.fallbacks) {
    logger.warn("unrecognized option value, using default", {
      key: fallback.key,
      value: fallback.value,
      used: fallback.used,
    });
  }
}

/**
 * Transcribe an encoded audio buffer and return the transcript verbatim.
 *
 * @throws {ValidationError} The buffer is shorter than `settings.minAudioBytes`.
 * @throws {DecodeError} An option has the wrong type.
 * @throws {TransportError} Network or provider failure.
 */
export async function transcribeAudio(
  handle: ClientHandle,
  audio: Uint8Array,
  options: OptionMap = {},
): Promise<string> {
  const context = `Audio binary length: ${audio.byteLength}, Opts: ${optionKeys(options)}`;

  if (audio.byteLength < handle.settings.minAudioBytes) {
    throw new ValidationError(
      `Audio binary too small. ${context}`,
      {
        length: audio.byteLength,
        minimum: handle.settings.minAudioBytes,
        options: Object.keys(options),
      },
    );
  }

  const decoded = decodeTranscriptionOptions(options, context);
  reportFallbacks(handle.settings.logger, decoded);
  const config = unwrapDecoded(decoded);

  return execute(handle, "transcription", async (client, ctx) => {
    const transcription = await client.createTranscription(
      {
        file: { name: audioFileName(), data: audio },
        ...config,
      },
      { signal: ctx.signal },
    );
    return transcription.text;
  });
}

/**
 * Synthesize `input` as speech and return the encoded audio bytes.
 * Unrecognized model, voice and format values fall back to their defaults.
 *
 * @throws {DecodeError} An option has the wrong type.
 * @throws {TransportError} Network or provider failure.
 */
export async function synthesizeSpeech(
  handle: ClientHandle,
  input: string,
  options: OptionMap = {},
): Promise<Uint8Array> {
  const context = `Input text length: ${input.length}, Opts: ${optionKeys(options)}`;

  const decoded = decodeSpeechOptions(options, context);
  reportFallbacks(handle.settings.logger, decoded);
  const config = unwrapDecoded(decoded);

  return execute(handle, "speech", (client, ctx) =>
    client.createSpeech({ input, ...config }, { signal: ctx.signal }),
  );
}
