/**
 * Client handle: a shared, lock-guarded reference to one configured client.
 *
 * Created once and reused by every call. Each network operation holds the
 * handle's lock for its whole round trip, so at most one exchange per handle
 * is in flight and concurrent callers queue in arrival order.
 */

import {
  OpenAIClient,
  type ProviderClient,
} from "@call-bridge/openai-client";
import { LockError } from "./errors.js";
import { Mutex } from "./lock.js";
import type { Mailbox } from "./notifications.js";
import {
  loadConfigFromEnv,
  resolveHandleSettings,
  type HandleOptions,
  type HandleSettings,
} from "./config.js";

export class ClientHandle {
  readonly settings: HandleSettings;
  private readonly client: ProviderClient;
  private readonly lock = new Mutex();
  private closed = false;

  private constructor(client: ProviderClient, settings: HandleSettings) {
    this.client = client;
    this.settings = settings;
  }

  /** Wrap an existing client, e.g. a stub or a custom ProviderClient. */
  static fromClient(client: ProviderClient, options?: HandleOptions): ClientHandle {
    return new ClientHandle(client, resolveHandleSettings(options));
  }

  get provider(): string {
    return this.client.name;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * The in-process Mailbox that streaming calls notify when they name no
   * notifier. Undefined when the handle was given a notifier of another kind.
   */
  get mailbox(): Mailbox | undefined {
    return this.settings.mailbox;
  }

  /** Whether a call currently holds the lock. */
  get busy(): boolean {
    return this.lock.isLocked;
  }

  /**
   * Run `fn` with exclusive access to the client. The lock is released when
   * `fn` settles.
   *
   * @throws {LockError} If the handle is closed or the lock wait exceeds
   *   `settings.lockTimeout`.
   */
  async withClient<T>(fn: (client: ProviderClient) => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new LockError("Failed to lock client: handle is closed");
    }
    const release = await this.lock.acquire(this.settings.lockTimeout);
    try {
      if (this.closed) {
        throw new LockError("Failed to lock client: handle is closed");
      }
      return await fn(this.client);
    } finally {
      release();
    }
  }

  /**
   * Refuse further calls. Callers still waiting for the lock fail with
   * LockError; a call already holding it runs to completion.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.lock.rejectWaiting(
      new LockError("Failed to lock client: handle is closed"),
    );
  }
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/**
 * Create a handle around an OpenAI client for the given credentials and base
 * endpoint (e.g. "https://api.openai.com/v1").
 */
export function createClient(
  apiKey: string,
  baseUrl: string,
  options?: HandleOptions & { organization?: string },
): ClientHandle {
  const client = new OpenAIClient({
    apiKey,
    baseUrl,
    organization: options?.organization,
  });
  return ClientHandle.fromClient(client, options);
}

/**
 * Create a handle from environment variables (see loadConfigFromEnv).
 *
 * @throws {ConfigurationError} If OPENAI_API_KEY is missing or a numeric
 *   setting is invalid.
 */
export function createClientFromEnv(
  env?: Record<string, string | undefined>,
): ClientHandle {
  const config = loadConfigFromEnv(env);
  return createClient(config.apiKey, config.baseUrl, {
    ...config.options,
    organization: config.organization,
  });
}
