/**
 * Serial lock: one mutating task at a time per instrument.
 *
 * Tasks queue on a promise chain and run strictly in arrival order,
 * outbound transfers included. A call made from inside the running task
 * (a recipient calling back during a transfer) cannot wait for the lock
 * it is nested in; `isHeldByCaller()` lets the owner reject it instead.
 */

import { AsyncLocalStorage } from "node:async_hooks";

export class LockReentryError extends Error {
  constructor() {
    super("Task re-entered the lock it is running under");
    this.name = "LockReentryError";
  }
}

export class SerialLock {
  private readonly owner = new AsyncLocalStorage<symbol>();
  private tail: Promise<void> = Promise.resolve();
  private active: symbol | undefined;
  private queued = 0;

  /**
   * True when the current async context belongs to the running task.
   */
  isHeldByCaller(): boolean {
    const token = this.owner.getStore();
    return token !== undefined && token === this.active;
  }

  /** Tasks waiting or running. */
  get pending(): number {
    return this.queued;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    if (this.isHeldByCaller()) {
      return Promise.reject(new LockReentryError());
    }

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => done);
    this.queued++;

    return previous
      .then(() => {
        const token = Symbol("serial-lock-task");
        this.active = token;
        return this.owner.run(token, task);
      })
      .finally(() => {
        this.active = undefined;
        this.queued--;
        release();
      });
  }
}
