/**
 * Blocking chat completion.
 */

import { EmptyResultError } from "./errors.js";
import { execute } from "./execution.js";
import type { ClientHandle } from "./handle.js";
import { buildChatRequest, type HostMessage } from "./messages.js";
import {
  decodeChatOptions,
  unwrapDecoded,
  type OptionMap,
} from "./options.js";

/**
 * Send `messages` to the chat endpoint and return the first choice's text.
 * A choice with null content yields "".
 *
 * `model` falls back to the handle's default model. `options` accepts
 * `temperature` and `max_tokens`.
 *
 * @throws {RequestBuildError} No model, no messages, or a malformed message.
 * @throws {DecodeError} An option has the wrong type.
 * @throws {EmptyResultError} The provider returned zero choices.
 * @throws {TransportError} Network or provider failure.
 */
export async function completeChat(
  handle: ClientHandle,
  messages: readonly HostMessage[],
  model?: string,
  options: OptionMap = {},
): Promise<string> {
  const context = `Message count: ${messages.length}, Opts: [${Object.keys(options).join(", ")}]`;
  const config = unwrapDecoded(decodeChatOptions(options, context));
  const request = buildChatRequest(
    messages,
    model || handle.settings.defaultModel,
    false,
    config,
  );

  return execute(handle, "chat", async (client, ctx) => {
    const completion = await client.createChatCompletion(request, {
      signal: ctx.signal,
    });
    const [first] = completion.choices;
    if (!first) {
      throw new EmptyResultError("No completion choices returned");
    }
    return first.message.content ?? "";
  });
}
