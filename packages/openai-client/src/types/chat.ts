/**
 * Chat Completions wire types.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** Roles the bridge sends to the Chat Completions endpoint. */
export const ChatRole = {
  /** High-level instructions shaping model behavior. */
  SYSTEM: "system",
  /** Human input. */
  USER: "user",
  /** Earlier model output replayed as context. */
  ASSISTANT: "assistant",
} as const satisfies Record<string, string>;

export type ChatRole = (typeof ChatRole)[keyof typeof ChatRole];

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

export interface ChatCompletionRequest {
  readonly model: string;
  readonly messages: readonly ChatMessage[];
  readonly temperature?: number;
  readonly max_tokens?: number;
  readonly stream?: boolean;
}

// ---------------------------------------------------------------------------
// Response
// ---------------------------------------------------------------------------

export interface ChatCompletionChoice {
  index: number;
  message: {
    role: string;
    content: string | null;
  };
  finish_reason: string | null;
}

export interface ChatCompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletion {
  id: string;
  object: string;
  created: number;
  model: string;
  choices: ChatCompletionChoice[];
  usage?: ChatCompletionUsage;
}

// ---------------------------------------------------------------------------
// Streaming
// ---------------------------------------------------------------------------

export interface ChatCompletionChunkChoice {
  index: number;
  delta: {
    role?: string;
    content?: string | null;
  };
  finish_reason: string | null;
}

/** One frame of a streamed chat completion. */
export interface ChatCompletionChunk {
  id: string;
  model: string;
  choices: ChatCompletionChunkChoice[];
}
