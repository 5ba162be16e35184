// runtime/src/mutex.ts
// Counting semaphore and a mutex built on it. Waiters are served in arrival
// order; a released permit passes directly to the oldest waiter.

type Waiter = (release: () => void) => void;

export class Semaphore {
  private readonly waiters: Waiter[] = [];
  private free: number;

  constructor(maxConcurrency: number) {
    this.free = Math.max(0, Math.floor(maxConcurrency));
  }

  /** Resolves once a permit is held; the returned release is idempotent. */
  acquire(): Promise<() => void> {
    if (this.free > 0) {
      this.free -= 1;
      return Promise.resolve(this.makeRelease());
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  async withPermit<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get queued(): number {
    return this.waiters.length;
  }

  get available(): number {
    return this.free;
  }

  private makeRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const waiter = this.waiters.shift();
      if (waiter) waiter(this.makeRelease());
      else this.free += 1;
    };
  }
}

export class Mutex extends Semaphore {
  constructor() {
    super(1);
  }

  get locked(): boolean {
    return this.available === 0;
  }
}
