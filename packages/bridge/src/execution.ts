/**
 * Execution adapter: runs one network exchange on a handle's client inside a
 * fresh execution context and classifies whatever goes wrong.
 */

import type { ProviderClient } from "@call-bridge/openai-client";
import { ContextCreationError, classifyFailure } from "./errors.js";
import type { ExecutionContext } from "./context.js";
import type { ClientHandle } from "./handle.js";

/**
 * Create the single-use context for one call.
 *
 * @throws {ContextCreationError} If the handle's context factory throws.
 */
export function openContext(
  handle: ClientHandle,
  operation: string,
): ExecutionContext {
  try {
    return handle.settings.createContext(operation, handle.settings.timeout);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ContextCreationError(
      `Failed to create execution context: ${detail}`,
      { cause: error },
    );
  }
}

/**
 * Run `run` with exclusive access to the handle's client. The context, and so
 * the per-call timeout, starts once the lock is granted; the lock is held
 * until `run` settles. Failures come back as BridgeError subclasses.
 */
export async function execute<T>(
  handle: ClientHandle,
  operation: string,
  run: (client: ProviderClient, ctx: ExecutionContext) => Promise<T>,
): Promise<T> {
  const { logger } = handle.settings;

  try {
    return await handle.withClient(async (client) => {
      const ctx = openContext(handle, operation);
      logger.debug(`${operation} started`, { context: ctx.id });

      const result = await run(client, ctx);

      logger.debug(`${operation} finished`, {
        context: ctx.id,
        elapsedMs: Date.now() - ctx.startedAt,
      });
      return result;
    });
  } catch (error) {
    const failure = classifyFailure(operation, error);
    logger.error(`${operation} failed`, {
      error: failure.name,
      message: failure.message,
    });
    throw failure;
  }
}
