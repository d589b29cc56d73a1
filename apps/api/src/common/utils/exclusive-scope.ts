import { AsyncLocalStorage } from 'async_hooks';

interface ScopeFrame {
  active: boolean;
}

/**
 * Reentrant async mutex.
 *
 * `run` queues callers in FIFO order. A call made from inside an active
 * `run` on the same scope executes immediately instead of queueing behind
 * itself. Work scheduled from inside the scope that outlives it does not
 * inherit the lock.
 */
export class ExclusiveScope {
  private tail: Promise<void> = Promise.resolve();
  private readonly frames = new AsyncLocalStorage<ScopeFrame>();
  private holders = 0;
  private waiting = 0;

  async run<T>(fn: () => Promise<T> | T): Promise<T> {
    const current = this.frames.getStore();
    if (current?.active) {
      return fn();
    }

    let release: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => released);

    this.waiting++;
    await previous;
    this.waiting--;

    const frame: ScopeFrame = { active: true };
    this.holders++;
    try {
      return await this.frames.run(frame, fn);
    } finally {
      frame.active = false;
      this.holders--;
      release();
    }
  }

  get isLocked(): boolean {
    return this.holders > 0;
  }

  get waitingCount(): number {
    return this.waiting;
  }
}
