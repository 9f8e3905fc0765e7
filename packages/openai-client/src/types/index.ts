/**
 * Barrel re-export for all type modules.
 */

// Chat types
export { ChatRole } from "./chat.js";
export type {
  ChatMessage,
  ChatCompletionRequest,
  ChatCompletionChoice,
  ChatCompletionUsage,
  ChatCompletion,
  ChatCompletionChunkChoice,
  ChatCompletionChunk,
} from "./chat.js";

// Audio types
export {
  TranscriptionFormat,
  SpeechModel,
  Voice,
  SpeechFormat,
} from "./audio.js";
export type {
  AudioFile,
  TranscriptionRequest,
  Transcription,
  SpeechRequest,
} from "./audio.js";

// Error types
export {
  SDKError,
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  RequestTimeoutError,
  AbortError,
  NetworkError,
  StreamError,
  InvalidResponseError,
} from "./errors.js";
export type { ProviderErrorOptions } from "./errors.js";
