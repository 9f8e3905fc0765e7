export const VERSION = "0.1.0";

// Handle
export { ClientHandle, createClient, createClientFromEnv } from "./handle.js";

// Operations
export { completeChat } from "./chat.js";
export { streamChatChunk, runStreamPass } from "./stream-emulator.js";
export type { Accepted, StreamOutcome, StreamPass } from "./stream-emulator.js";
export { transcribeAudio, synthesizeSpeech, audioFileName } from "./audio.js";
export { execute, openContext } from "./execution.js";

// Translation and decoding
export { buildChatRequest, decodeMessages, decodeRole } from "./messages.js";
export type { HostMessage } from "./messages.js";
export {
  decodeChatOptions,
  decodeTranscriptionOptions,
  decodeSpeechOptions,
  unwrapDecoded,
  DEFAULT_TRANSCRIPTION_MODEL,
} from "./options.js";
export type {
  OptionMap,
  OptionFallback,
  DecodeResult,
  ChatConfig,
  TranscriptionConfig,
  SpeechConfig,
} from "./options.js";

// Notifications
export { CallbackNotifier, Mailbox } from "./notifications.js";
export type {
  CallerIdentity,
  CorrelationToken,
  DoneReason,
  Notification,
  Notifier,
} from "./notifications.js";

// Configuration, context, logging, locking
export {
  DEFAULT_BASE_URL,
  DEFAULT_FRAME_LIMIT,
  DEFAULT_MIN_AUDIO_BYTES,
  loadConfigFromEnv,
  resolveHandleSettings,
} from "./config.js";
export type { EnvConfig, HandleOptions, HandleSettings } from "./config.js";
export { createExecutionContext } from "./context.js";
export type { ContextFactory, ExecutionContext } from "./context.js";
export { createConsoleLogger, isLogLevel, silentLogger } from "./logger.js";
export type { LogFields, Logger, LogLevel, LogSink } from "./logger.js";
export { Mutex } from "./lock.js";
export type { Release } from "./lock.js";

// Errors
export {
  BridgeError,
  ContextCreationError,
  LockError,
  ValidationError,
  DecodeError,
  RequestBuildError,
  TransportError,
  EmptyResultError,
  ConfigurationError,
  classifyFailure,
} from "./errors.js";
