export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export HTTP and parsing utilities
export * from "./utils/index.js";

export {
  parseChatCompletion,
  parseChatCompletionChunk,
  parseTranscription,
} from "./translate-response.js";

export { OpenAIClient, DEFAULT_BASE_URL } from "./client.js";
export type {
  ProviderClient,
  OpenAIClientOptions,
  CallOptions,
} from "./client.js";
