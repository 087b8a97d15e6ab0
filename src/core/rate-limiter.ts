import { logDebug } from "./logging.js";

/**
 * Spaces out call starts through a promise chain: at least `delayMs`
 * between the start of consecutive calls, in arrival order.
 */
export class RateLimiter {
  private chain: Promise<void> = Promise.resolve();
  private lastRequestTime = 0;
  private readonly delayMs: number;

  constructor(delayMs: number) {
    this.delayMs = Math.max(0, delayMs);
  }

  waitIfNeeded(): Promise<void> {
    this.chain = this.chain.then(async () => {
      const elapsed = Date.now() - this.lastRequestTime;
      if (elapsed < this.delayMs) {
        const waitTime = this.delayMs - elapsed;
        logDebug(`Rate limiting: waiting ${waitTime}ms`);
        await new Promise<void>((r) => setTimeout(r, waitTime));
      }
      this.lastRequestTime = Date.now();
    });
    return this.chain;
  }

  /** Run `task` once its turn in the chain comes up. */
  async schedule<T>(task: () => Promise<T>): Promise<T> {
    await this.waitIfNeeded();
    return task();
  }
}

/**
 * Runs tasks one at a time per key, in arrival order. Tasks on different
 * keys run concurrently.
 */
export class KeyedSerializer {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release = (): void => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => done);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Keys with a running or queued task. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
