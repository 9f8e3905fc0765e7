/**
 * Server-Sent Events (SSE) stream parser.
 *
 * Parses a `ReadableStream<Uint8Array>` into an async iterable of SSE events:
 *   - `event:` lines set the event type
 *   - `data:` lines form the payload (multiple `data:` lines are joined with "\n")
 *   - Lines starting with `:` are comments (ignored)
 *   - A blank line dispatches the accumulated event
 *
 * Handles chunks that split mid-line. When the consumer stops iterating
 * before the stream closes, the underlying stream is cancelled so the
 * connection is released.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A single parsed SSE event. */
export interface SSEEvent {
  /** The event type (from `event:` line). `undefined` if not specified. */
  event?: string;
  /** The event data (from `data:` lines, joined with newlines). */
  data: string;
}

interface PendingEvent {
  eventType: string | undefined;
  dataLines: string[];
}

/** Apply one non-blank, non-comment line to the pending event. */
function applyLine(line: string, pending: PendingEvent): void {
  const colonIdx = line.indexOf(":");
  const field = colonIdx === -1 ? line : line.slice(0, colonIdx);
  let value = colonIdx === -1 ? "" : line.slice(colonIdx + 1);
  if (value.startsWith(" ")) {
    value = value.slice(1);
  }

  if (field === "event") {
    pending.eventType = value;
  } else if (field === "data") {
    pending.dataLines.push(value);
  }
  // `id`, `retry` and unknown fields carry nothing the client uses.
}

function takeEvent(pending: PendingEvent): SSEEvent | undefined {
  const event =
    pending.dataLines.length > 0
      ? { event: pending.eventType, data: pending.dataLines.join("\n") }
      : undefined;
  pending.eventType = undefined;
  pending.dataLines = [];
  return event;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse a ReadableStream of bytes as an SSE event stream.
 *
 * Yields `SSEEvent` objects as they become complete. Read errors from the
 * underlying stream propagate to the consumer unchanged.
 */
export async function* parseSSEStream(
  stream: ReadableStream<Uint8Array>,
): AsyncIterableIterator<SSEEvent> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  const pending: PendingEvent = { eventType: undefined, dataLines: [] };
  let buffer = "";
  let drained = false;

  try {
    for (;;) {
      const { value, done } = await reader.read();

      if (done) {
        drained = true;
        buffer += decoder.decode();
        // A trailing line without a final newline still counts.
        if (buffer !== "" && !buffer.startsWith(":")) {
          applyLine(buffer, pending);
        }
        const last = takeEvent(pending);
        if (last) yield last;
        return;
      }

      buffer += decoder.decode(value, { stream: true });

      // Lines end in \r\n, \r, or \n; the last segment may be incomplete.
      const lines = buffer.split(/\r\n|\r|\n/);
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        if (line === "") {
          const event = takeEvent(pending);
          if (event) yield event;
        } else if (!line.startsWith(":")) {
          applyLine(line, pending);
        }
      }
    }
  } finally {
    if (!drained) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}
