/**
 * Bridge configuration: per-handle settings and environment loading.
 */

import { DEFAULT_BASE_URL } from "@call-bridge/openai-client";
import { ConfigurationError } from "./errors.js";
import { createExecutionContext, type ContextFactory } from "./context.js";
import {
  createConsoleLogger,
  isLogLevel,
  silentLogger,
  type Logger,
} from "./logger.js";
import { Mailbox, type Notifier } from "./notifications.js";

/** Frames read per streaming poll. */
export const DEFAULT_FRAME_LIMIT = 10;

/** Smallest audio buffer accepted for transcription, in bytes. */
export const DEFAULT_MIN_AUDIO_BYTES = 10;

export { DEFAULT_BASE_URL };

// ---------------------------------------------------------------------------
// Handle settings
// ---------------------------------------------------------------------------

export interface HandleOptions {
  /** Chat model used when a call does not name one. */
  defaultModel?: string;
  /** Default: DEFAULT_FRAME_LIMIT. */
  frameLimit?: number;
  /** Default: DEFAULT_MIN_AUDIO_BYTES. */
  minAudioBytes?: number;
  /**
   * Per-call timeout in milliseconds, applied through the context signal.
   * Counted from when the call holds the lock; time queued does not count.
   */
  timeout?: number;
  /** Longest wait for the handle's lock in milliseconds. Unbounded by default. */
  lockTimeout?: number;
  /** Default: silentLogger. */
  logger?: Logger;
  /** Where streaming notifications go when a call names no notifier. Default: a new Mailbox. */
  notifier?: Notifier;
  /** Default: createExecutionContext. */
  createContext?: ContextFactory;
}

export interface HandleSettings {
  readonly defaultModel?: string;
  readonly frameLimit: number;
  readonly minAudioBytes: number;
  readonly timeout?: number;
  readonly lockTimeout?: number;
  readonly logger: Logger;
  readonly notifier: Notifier;
  /** The default Mailbox, or the configured notifier when it is one. */
  readonly mailbox?: Mailbox;
  readonly createContext: ContextFactory;
}

function positiveInteger(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function optionalDuration(name: string, value: number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number of milliseconds, got ${value}`);
  }
  return value;
}

/** Apply defaults and validate. The result is frozen. */
export function resolveHandleSettings(options: HandleOptions = {}): HandleSettings {
  const notifier = options.notifier ?? new Mailbox();
  return Object.freeze({
    defaultModel: options.defaultModel || undefined,
    frameLimit: positiveInteger("frameLimit", options.frameLimit, DEFAULT_FRAME_LIMIT),
    minAudioBytes: positiveInteger("minAudioBytes", options.minAudioBytes, DEFAULT_MIN_AUDIO_BYTES),
    timeout: optionalDuration("timeout", options.timeout),
    lockTimeout: optionalDuration("lockTimeout", options.lockTimeout),
    logger: options.logger ?? silentLogger,
    notifier,
    mailbox: notifier instanceof Mailbox ? notifier : undefined,
    createContext: options.createContext ?? createExecutionContext,
  });
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

export interface EnvConfig {
  apiKey: string;
  baseUrl: string;
  organization?: string;
  options: HandleOptions;
}

function envNumber(
  env: Record<string, string | undefined>,
  key: string,
): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Read bridge configuration from environment variables:
 *
 * - `OPENAI_API_KEY` (required)
 * - `OPENAI_BASE_URL` (default: DEFAULT_BASE_URL)
 * - `OPENAI_ORG_ID`, `OPENAI_MODEL`
 * - `BRIDGE_FRAME_LIMIT`, `BRIDGE_TIMEOUT_MS`, `BRIDGE_LOCK_TIMEOUT_MS`
 * - `BRIDGE_LOG_LEVEL` (debug | info | warn | error | silent)
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): EnvConfig {
  const apiKey = env["OPENAI_API_KEY"];
  if (!apiKey) {
    throw new ConfigurationError(
      "OpenAI API key not provided. Set OPENAI_API_KEY.",
    );
  }

  const logLevel = env["BRIDGE_LOG_LEVEL"];
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `BRIDGE_LOG_LEVEL must be one of debug, info, warn, error, silent; got "${logLevel}"`,
    );
  }

  return {
    apiKey,
    baseUrl: env["OPENAI_BASE_URL"] || DEFAULT_BASE_URL,
    organization: env["OPENAI_ORG_ID"] || undefined,
    options: {
      defaultModel: env["OPENAI_MODEL"] || undefined,
      frameLimit: envNumber(env, "BRIDGE_FRAME_LIMIT"),
      timeout: envNumber(env, "BRIDGE_TIMEOUT_MS"),
      lockTimeout: envNumber(env, "BRIDGE_LOCK_TIMEOUT_MS"),
      logger: logLevel !== undefined ? createConsoleLogger(logLevel) : undefined,
    },
  };
}
