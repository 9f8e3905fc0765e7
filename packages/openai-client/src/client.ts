/**
 * OpenAI client: the network collaborator the bridge drives.
 *
 * Speaks the Chat Completions, audio transcription and speech endpoints of
 * any OpenAI-compatible base URL. The configuration is frozen at
 * construction, so one instance can be shared by concurrent callers.
 */

import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionRequest,
  SpeechRequest,
  Transcription,
  TranscriptionRequest,
} from "./types/index.js";
import { SDKError, StreamError } from "./types/index.js";
import {
  httpPost,
  httpPostBinary,
  httpPostForm,
  httpStream,
  parseJsonBody,
  parseSSEStream,
  mapHttpError,
  mapStreamedError,
  toTransportError,
  type HttpRequestOptions,
} from "./utils/index.js";
import {
  parseChatCompletion,
  parseChatCompletionChunk,
  parseTranscription,
} from "./translate-response.js";

export const DEFAULT_BASE_URL = "https://api.openai.com/v1";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Per-call options. */
export interface CallOptions {
  /** Aborts the in-flight request. */
  signal?: AbortSignal;
}

/**
 * The contract the bridge consumes. `OpenAIClient` is the production
 * implementation; tests substitute in-process stubs.
 */
export interface ProviderClient {
  /** Provider name used in error reports. */
  readonly name: string;

  createChatCompletion(
    request: ChatCompletionRequest,
    options?: CallOptions,
  ): Promise<ChatCompletion>;

  /** Stream a chat completion frame by frame. Ends at the `[DONE]` sentinel. */
  streamChatCompletion(
    request: ChatCompletionRequest,
    options?: CallOptions,
  ): AsyncIterableIterator<ChatCompletionChunk>;

  createTranscription(
    request: TranscriptionRequest,
    options?: CallOptions,
  ): Promise<Transcription>;

  /** Returns the encoded audio bytes. */
  createSpeech(request: SpeechRequest, options?: CallOptions): Promise<Uint8Array>;
}

export interface OpenAIClientOptions {
  apiKey: string;
  /** Base URL including the version segment. Default: DEFAULT_BASE_URL. */
  baseUrl?: string;
  /** Sent as `OpenAI-Organization` when set. */
  organization?: string;
  providerName?: string;
  defaultHeaders?: Record<string, string>;
  /** Request timeout in milliseconds. */
  timeout?: number;
}

interface ResolvedClientConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly organization?: string;
  readonly defaultHeaders: Readonly<Record<string, string>>;
  readonly timeout?: number;
}

// ---------------------------------------------------------------------------
// Request bodies
// ---------------------------------------------------------------------------

function chatBody(
  request: ChatCompletionRequest,
  stream: boolean,
): Record<string, unknown> {
  const body: Record<string, unknown> = {
    model: request.model,
    messages: request.messages.map((m) => ({
      role: m.role,
      content: m.content,
    })),
  };
  if (request.temperature !== undefined) {
    body["temperature"] = request.temperature;
  }
  if (request.max_tokens !== undefined) {
    body["max_tokens"] = request.max_tokens;
  }
  if (stream) {
    body["stream"] = true;
  }
  return body;
}

function transcriptionForm(request: TranscriptionRequest): FormData {
  const form = new FormData();
  // Copy so the Blob owns a plain ArrayBuffer regardless of the caller's view.
  form.append(
    "file",
    new Blob([new Uint8Array(request.file.data)]),
    request.file.name,
  );
  form.append("model", request.model);
  if (request.language !== undefined) {
    form.append("language", request.language);
  }
  if (request.prompt !== undefined) {
    form.append("prompt", request.prompt);
  }
  if (request.response_format !== undefined) {
    form.append("response_format", request.response_format);
  }
  if (request.temperature !== undefined) {
    form.append("temperature", String(request.temperature));
  }
  return form;
}

function speechBody(request: SpeechRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    model: request.model,
    input: request.input,
    voice: request.voice,
  };
  if (request.response_format !== undefined) {
    body["response_format"] = request.response_format;
  }
  if (request.speed !== undefined) {
    body["speed"] = request.speed;
  }
  return body;
}

// ---------------------------------------------------------------------------
// OpenAIClient
// ---------------------------------------------------------------------------

export class OpenAIClient implements ProviderClient {
  readonly name: string;
  private readonly config: ResolvedClientConfig;

  constructor(options: OpenAIClientOptions) {
    this.name = options.providerName ?? "openai";
    this.config = Object.freeze({
      apiKey: options.apiKey,
      baseUrl: (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
      organization: options.organization,
      defaultHeaders: Object.freeze({ ...(options.defaultHeaders ?? {}) }),
      timeout: options.timeout,
    });
  }

  /** The base URL requests are sent to, without a trailing slash. */
  get baseUrl(): string {
    return this.config.baseUrl;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.config.apiKey) {
      headers["Authorization"] = `Bearer ${this.config.apiKey}`;
    }
    if (this.config.organization) {
      headers["OpenAI-Organization"] = this.config.organization;
    }
    return { ...headers, ...this.config.defaultHeaders };
  }

  private requestOptions(options?: CallOptions): HttpRequestOptions {
    return { timeout: this.config.timeout, signal: options?.signal };
  }

  async createChatCompletion(
    request: ChatCompletionRequest,
    options?: CallOptions,
  ): Promise<ChatCompletion> {
    const res = await httpPost(
      `${this.config.baseUrl}/chat/completions`,
      chatBody(request, false),
      this.buildHeaders(),
      this.requestOptions(options),
    );

    if (res.status < 200 || res.status >= 300) {
      throw mapHttpError(res.status, res.body ?? res.text, this.name, res.headers);
    }

    return parseChatCompletion(res.body);
  }

  async *streamChatCompletion(
    request: ChatCompletionRequest,
    options?: CallOptions,
  ): AsyncIterableIterator<ChatCompletionChunk> {
    const res = await httpStream(
      `${this.config.baseUrl}/chat/completions`,
      chatBody(request, true),
      this.buildHeaders(),
      this.requestOptions(options),
    );

    if (res.status < 200 || res.status >= 300) {
      let text: string;
      try {
        text = await new Response(res.body).text();
      } catch (error) {
        throw toTransportError(error);
      }
      throw mapHttpError(
        res.status,
        parseJsonBody(text) ?? text,
        this.name,
        res.headers,
      );
    }

    try {
      for await (const sse of parseSSEStream(res.body)) {
        const data = sse.data.trim();
        if (data === "[DONE]") return;

        const payload = parseJsonBody(data);
        if (payload === undefined) {
          throw new StreamError(`Malformed stream frame: ${data}`);
        }
        const streamed = mapStreamedError(payload, this.name);
        if (streamed) throw streamed;

        yield parseChatCompletionChunk(payload);
      }
    } catch (error) {
      if (error instanceof SDKError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new StreamError(`Stream interrupted: ${message}`, { cause: error });
    }
  }

  async createTranscription(
    request: TranscriptionRequest,
    options?: CallOptions,
  ): Promise<Transcription> {
    const res = await httpPostForm(
      `${this.config.baseUrl}/audio/transcriptions`,
      transcriptionForm(request),
      this.buildHeaders(),
      this.requestOptions(options),
    );

    if (res.status < 200 || res.status >= 300) {
      throw mapHttpError(res.status, res.body ?? res.text, this.name, res.headers);
    }

    return parseTranscription(res.body, res.text);
  }

  async createSpeech(
    request: SpeechRequest,
    options?: CallOptions,
  ): Promise<Uint8Array> {
    const res = await httpPostBinary(
      `${this.config.baseUrl}/audio/speech`,
      speechBody(request),
      this.buildHeaders(),
      this.requestOptions(options),
    );

    if (res.status < 200 || res.status >= 300) {
      const text = new TextDecoder().decode(res.data);
      throw mapHttpError(
        res.status,
        parseJsonBody(text) ?? text,
        this.name,
        res.headers,
      );
    }

    return res.data;
  }
}
