/**
 * Per-call execution contexts.
 *
 * Every bridge operation gets a fresh, single-use context that is never
 * pooled or reused. It carries the call's abort signal, which enforces the
 * optional per-call timeout.
 */

export interface ExecutionContext {
  /** Process-unique, increasing id. */
  readonly id: number;
  /** Operation label, e.g. "chat" or "transcription". */
  readonly operation: string;
  readonly signal: AbortSignal;
  /** Epoch milliseconds. */
  readonly startedAt: number;
}

/** Builds the context for one call. May throw; the bridge reports that as ContextCreationError. */
export type ContextFactory = (
  operation: string,
  timeout: number | undefined,
) => ExecutionContext;

let nextContextId = 0;

export const createExecutionContext: ContextFactory = (operation, timeout) => {
  const signal =
    timeout !== undefined
      ? AbortSignal.timeout(timeout)
      : new AbortController().signal;

  nextContextId += 1;
  return Object.freeze({
    id: nextContextId,
    operation,
    signal,
    startedAt: Date.now(),
  });
};
