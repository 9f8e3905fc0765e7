/**
 * Asynchronous notifications delivered to a caller identity.
 *
 * A streaming poll reports its content out of band: zero or more `chunk`
 * notifications followed by exactly one `done` or `error`, each carrying
 * the caller's correlation token.
 */

/** Opaque caller-supplied value echoed back in every notification. */
export type CorrelationToken = string | number;

/** An addressable caller. */
export type CallerIdentity = string;

/** Why a poll ended without error. */
export type DoneReason = "finished" | "frame_limit";

export type Notification =
  | { type: "chunk"; text: string; token: CorrelationToken }
  | { type: "done"; reason: DoneReason; token: CorrelationToken }
  | { type: "error"; message: string; token: CorrelationToken };

/** The host's "send a message to this caller" primitive. */
export interface Notifier {
  send(caller: CallerIdentity, notification: Notification): void | Promise<void>;
}

/** Adapts a plain function to the Notifier contract. */
export class CallbackNotifier implements Notifier {
  constructor(
    private readonly callback: (
      caller: CallerIdentity,
      notification: Notification,
    ) => void | Promise<void>,
  ) {}

  send(caller: CallerIdentity, notification: Notification): void | Promise<void> {
    return this.callback(caller, notification);
  }
}

type NotificationHandler = (notification: Notification) => void;

/**
 * In-process notifier with one mailbox per caller.
 *
 * Notifications for a caller with subscribers are handed to them
 * synchronously; otherwise they queue until the caller subscribes or drains.
 */
export class Mailbox implements Notifier {
  private readonly queues = new Map<CallerIdentity, Notification[]>();
  private readonly handlers = new Map<CallerIdentity, NotificationHandler[]>();

  send(caller: CallerIdentity, notification: Notification): void {
    const handlers = this.handlers.get(caller);
    if (handlers && handlers.length > 0) {
      for (const handler of handlers) {
        handler(notification);
      }
      return;
    }

    let queue = this.queues.get(caller);
    if (!queue) {
      queue = [];
      this.queues.set(caller, queue);
    }
    queue.push(notification);
  }

  /**
   * Subscribe to a caller's notifications. Anything already queued for the
   * caller is delivered first. Returns an unsubscribe function.
   */
  subscribe(caller: CallerIdentity, handler: NotificationHandler): () => void {
    for (const queued of this.drain(caller)) {
      handler(queued);
    }

    let handlers = this.handlers.get(caller);
    if (!handlers) {
      handlers = [];
      this.handlers.set(caller, handlers);
    }
    handlers.push(handler);

    return () => {
      const current = this.handlers.get(caller);
      if (!current) return;
      const remaining = current.filter((h) => h !== handler);
      if (remaining.length > 0) {
        this.handlers.set(caller, remaining);
      } else {
        this.handlers.delete(caller);
      }
    };
  }

  /** Remove and return every queued notification for a caller. */
  drain(caller: CallerIdentity): Notification[] {
    const queue = this.queues.get(caller) ?? [];
    this.queues.delete(caller);
    return queue;
  }

  /** Number of queued notifications for a caller. */
  pending(caller: CallerIdentity): number {
    return this.queues.get(caller)?.length ?? 0;
  }
}
