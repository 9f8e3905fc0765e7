/**
 * Audio endpoint types: transcription and speech synthesis.
 *
 * Uses the `as const satisfies` pattern instead of TypeScript enums; each
 * object doubles as the list of accepted wire values.
 */

// ---------------------------------------------------------------------------
// Transcription
// ---------------------------------------------------------------------------

export const TranscriptionFormat = {
  TEXT: "text",
  JSON: "json",
  SRT: "srt",
  VERBOSE_JSON: "verbose_json",
  VTT: "vtt",
} as const satisfies Record<string, string>;

export type TranscriptionFormat =
  (typeof TranscriptionFormat)[keyof typeof TranscriptionFormat];

/** An in-memory audio upload. */
export interface AudioFile {
  readonly name: string;
  readonly data: Uint8Array;
}

export interface TranscriptionRequest {
  readonly file: AudioFile;
  readonly model: string;
  readonly language?: string;
  readonly prompt?: string;
  readonly response_format?: TranscriptionFormat;
  readonly temperature?: number;
}

export interface Transcription {
  text: string;
}

// ---------------------------------------------------------------------------
// Speech
// ---------------------------------------------------------------------------

export const SpeechModel = {
  TTS_1: "tts-1",
  TTS_1_HD: "tts-1-hd",
} as const satisfies Record<string, string>;

export type SpeechModel = (typeof SpeechModel)[keyof typeof SpeechModel];

export const Voice = {
  ALLOY: "alloy",
  ECHO: "echo",
  FABLE: "fable",
  ONYX: "onyx",
  NOVA: "nova",
  SHIMMER: "shimmer",
} as const satisfies Record<string, string>;

export type Voice = (typeof Voice)[keyof typeof Voice];

export const SpeechFormat = {
  MP3: "mp3",
  OPUS: "opus",
  AAC: "aac",
  FLAC: "flac",
} as const satisfies Record<string, string>;

export type SpeechFormat = (typeof SpeechFormat)[keyof typeof SpeechFormat];

export interface SpeechRequest {
  readonly input: string;
  readonly model: SpeechModel;
  readonly voice: Voice;
  readonly response_format?: SpeechFormat;
  readonly speed?: number;
}
