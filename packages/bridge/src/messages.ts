/**
 * Host message translation and chat request assembly.
 */

import {
  ChatRole,
  type ChatCompletionRequest,
  type ChatMessage,
} from "@call-bridge/openai-client";
import { DecodeError, RequestBuildError } from "./errors.js";
import type { ChatConfig } from "./options.js";

/** A message as the host supplies it. `role` is free-form. */
export interface HostMessage {
  readonly role: string;
  readonly content: string;
}

/** "system" and "assistant" map to themselves; anything else is a user message. */
export function decodeRole(role: string): ChatRole {
  switch (role) {
    case "system":
      return ChatRole.SYSTEM;
    case "assistant":
      return ChatRole.ASSISTANT;
    default:
      return ChatRole.USER;
  }
}

/**
 * Decode untyped host data into messages.
 *
 * A missing or null role decodes as "user"; any other non-string role, and
 * any non-string content, is a DecodeError naming the offending path.
 */
export function decodeMessages(value: unknown): HostMessage[] {
  if (!Array.isArray(value)) {
    throw new DecodeError("Failed to decode messages: expected a list", {
      key: "messages",
    });
  }

  return value.map((item: unknown, index): HostMessage => {
    if (item == null || typeof item !== "object") {
      throw new DecodeError(
        `Failed to decode messages[${index}]: expected a map with role and content`,
        { key: `messages[${index}]` },
      );
    }
    const role: unknown = Reflect.get(item, "role");
    const content: unknown = Reflect.get(item, "content");

    if (role != null && typeof role !== "string") {
      throw new DecodeError(
        `Failed to decode messages[${index}].role: expected a string`,
        { key: `messages[${index}].role` },
      );
    }
    if (typeof content !== "string") {
      throw new DecodeError(
        `Failed to decode messages[${index}].content: expected a string`,
        { key: `messages[${index}].content` },
      );
    }
    return { role: role ?? "user", content };
  });
}

function toChatMessage(message: HostMessage, index: number): ChatMessage {
  const role = decodeRole(message.role);
  // Host runtimes hand over untyped data; the declared type is not a guarantee.
  const content: unknown = message.content;
  if (typeof content !== "string") {
    throw new RequestBuildError(
      `Failed to build ${role} message at position ${index}: content must be a string`,
    );
  }
  return { role, content };
}

/**
 * Build a Chat Completions request, preserving host message order.
 *
 * @throws {RequestBuildError} If a message cannot be constructed, no model
 *   is given, or there are no messages.
 */
export function buildChatRequest(
  messages: readonly HostMessage[],
  model: string | undefined,
  streaming: boolean,
  options: ChatConfig = {},
): ChatCompletionRequest {
  const chatMessages = messages.map(toChatMessage);

  if (!model) {
    throw new RequestBuildError(
      "Failed to build request: no model specified. Provide a model on the call or as the handle's default model.",
    );
  }
  if (chatMessages.length === 0) {
    throw new RequestBuildError(
      "Failed to build request: at least one message is required",
    );
  }

  return {
    model,
    messages: chatMessages,
    ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
    ...(options.max_tokens !== undefined ? { max_tokens: options.max_tokens } : {}),
    ...(streaming ? { stream: true } : {}),
  };
}
