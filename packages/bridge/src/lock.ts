/**
 * FIFO mutual-exclusion lock for promise-based callers.
 */

import { LockError } from "./errors.js";

export type Release = () => void;

interface Waiter {
  grant(release: Release): void;
  fail(error: LockError): void;
}

export class Mutex {
  private locked = false;
  private readonly waiters: Waiter[] = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock. */
  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Wait for the lock. Resolves with a release function that must be called
   * exactly once; extra calls are ignored.
   *
   * @param timeout - Give up with LockError after this many milliseconds.
   */
  acquire(timeout?: number): Promise<Release> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const waiter: Waiter = {
        grant: (release) => {
          if (timer !== undefined) clearTimeout(timer);
          resolve(release);
        },
        fail: (error) => {
          if (timer !== undefined) clearTimeout(timer);
          reject(error);
        },
      };
      this.waiters.push(waiter);

      if (timeout !== undefined) {
        timer = setTimeout(() => {
          const idx = this.waiters.indexOf(waiter);
          if (idx === -1) return;
          this.waiters.splice(idx, 1);
          reject(
            new LockError(`Timed out after ${timeout}ms waiting for the client lock`),
          );
        }, timeout);
      }
    });
  }

  /** Run `fn` while holding the lock. */
  async runExclusive<T>(fn: () => Promise<T>, timeout?: number): Promise<T> {
    const release = await this.acquire(timeout);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Fail every waiting caller. The current holder keeps the lock. */
  rejectWaiting(error: LockError): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter.fail(error);
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next.grant(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
